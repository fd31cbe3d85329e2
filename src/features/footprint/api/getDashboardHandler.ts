// src/features/footprint/api/getDashboardHandler.ts
import { NextRequest } from "next/server";
import { successResponse } from "@/shared/utils/api";
import { serializeSummary } from "@/core/history/historyAggregator";
import { footprintService, handleFootprintError, resolveRequestContext } from "./handlerUtils";

export async function getDashboardHandler(req: NextRequest) {
  try {
    const ctx = await resolveRequestContext(req);
    const { streak, summary, periodComparison } = await footprintService.getDashboard(ctx);

    return successResponse({
      dashboard: { streak, summary: serializeSummary(summary), periodComparison },
    });
  } catch (error) {
    return handleFootprintError("Get dashboard API", error);
  }
}
