// src/features/footprint/api/getStreakHandler.ts
import { NextRequest } from "next/server";
import { successResponse } from "@/shared/utils/api";
import { footprintService, handleFootprintError, resolveRequestContext } from "./handlerUtils";

export async function getStreakHandler(req: NextRequest) {
  try {
    const ctx = await resolveRequestContext(req);
    const streak = await footprintService.getStreak(ctx);
    return successResponse({ streak });
  } catch (error) {
    return handleFootprintError("Get streak API", error);
  }
}
