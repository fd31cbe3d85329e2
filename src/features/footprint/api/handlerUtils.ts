// src/features/footprint/api/handlerUtils.ts
import { NextRequest, NextResponse } from "next/server";
import { verifyAuth, handleAuthError, AuthError } from "@/utils/serverAuth";
import { errorResponse } from "@/shared/utils/api";
import { config } from "@/config";
import { daysBetween, isDateString, toDateString } from "@/shared/utils/dateUtils";
import { DateString } from "@/core/calculations/type";
import { createFootprintService, RequestContext } from "@/features/footprint/footprintService";
import { firestoreEntryRepository } from "@/features/footprint/footprintStorageService";
import { InvalidInputError } from "@/features/footprint/validation";

export const footprintService = createFootprintService(firestoreEntryRepository);

/**
 * The caller's calendar day: the client's header when it is within
 * `localDateToleranceDays` of the server's date, otherwise the server's date.
 */
export function resolveToday(localDate: string | null, now: Date = new Date()): DateString {
  const serverToday = toDateString(now);
  if (!localDate) return serverToday;

  if (
    isDateString(localDate) &&
    Math.abs(daysBetween(serverToday, localDate)) <= config.footprint.localDateToleranceDays
  ) {
    return localDate;
  }
  console.warn(`resolveToday: Ignoring ${config.footprint.localDateHeader} "${localDate}", using ${serverToday}`);
  return serverToday;
}

/** Verifies the caller and builds the context every service call receives. */
export async function resolveRequestContext(req: NextRequest): Promise<RequestContext> {
  const decodedToken = await verifyAuth(req);

  return {
    userId: decodedToken.uid,
    today: resolveToday(req.headers.get(config.footprint.localDateHeader)),
  };
}

export function handleFootprintError(handlerName: string, error: unknown): NextResponse {
  if (error instanceof AuthError) {
    return handleAuthError(error);
  }
  if (error instanceof InvalidInputError) {
    console.warn(`${handlerName}: ${error.message}`);
    return errorResponse(error.message, error.status, error.details);
  }
  console.error(`❌ ${handlerName} error:`, error);
  const errorMessage = error instanceof Error ? error.message : "Internal server error";
  return errorResponse(errorMessage, 500);
}
