// src/features/footprint/api/getSummaryHandler.ts
import { NextRequest } from "next/server";
import { successResponse } from "@/shared/utils/api";
import { serializeSummary } from "@/core/history/historyAggregator";
import { parseDateRangeQuery } from "@/features/footprint/validation";
import { footprintService, handleFootprintError, resolveRequestContext } from "./handlerUtils";

export async function getSummaryHandler(req: NextRequest) {
  try {
    const ctx = await resolveRequestContext(req);
    const range = parseDateRangeQuery(Object.fromEntries(req.nextUrl.searchParams.entries()));

    const summary = await footprintService.getSummary(ctx, range);
    return successResponse({ summary: serializeSummary(summary) });
  } catch (error) {
    return handleFootprintError("Get summary API", error);
  }
}
