// src/features/footprint/api/getEntriesHandler.ts
import { NextRequest } from "next/server";
import { successResponse } from "@/shared/utils/api";
import { parseDateRangeQuery } from "@/features/footprint/validation";
import { footprintService, handleFootprintError, resolveRequestContext } from "./handlerUtils";

export async function getEntriesHandler(req: NextRequest) {
  try {
    const ctx = await resolveRequestContext(req);
    const range = parseDateRangeQuery(Object.fromEntries(req.nextUrl.searchParams.entries()));

    const entries = await footprintService.getEntries(ctx, range);
    return successResponse({ entries });
  } catch (error) {
    return handleFootprintError("Get entries API", error);
  }
}
