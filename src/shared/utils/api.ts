// src/shared/utils/api.ts
import { NextResponse } from "next/server";

export interface ApiErrorBody {
  error: string;
  details?: unknown;
}

export interface ApiSuccessBody<T> {
  success: true;
  data: T;
}

/** Standard JSON error response used by every API handler. */
export function errorResponse(message: string, status: number = 500, details?: unknown): NextResponse<ApiErrorBody> {
  const body: ApiErrorBody = details === undefined ? { error: message } : { error: message, details };
  return NextResponse.json(body, { status });
}

export function successResponse<T>(data: T, status: number = 200): NextResponse<ApiSuccessBody<T>> {
  return NextResponse.json({ success: true as const, data }, { status });
}
