// src/features/footprint/api/logActivityHandler.ts
import { NextRequest, NextResponse } from "next/server";
import { errorResponse } from "@/shared/utils/api";
import { footprintService, handleFootprintError, resolveRequestContext } from "./handlerUtils";

export async function logActivityHandler(req: NextRequest) {
  try {
    // 1. Verify Authentication
    const ctx = await resolveRequestContext(req);
    console.log(`logActivityHandler: Verified UID: ${ctx.userId}`);

    // 2. Parse Request Body
    let requestBody: unknown;
    try {
      requestBody = await req.json();
    } catch (parseError) {
      console.error("Log activity API error: Invalid JSON format", parseError);
      return errorResponse("Invalid JSON format", 400, parseError instanceof Error ? parseError.message : 'Unknown parsing error');
    }

    // 3. Validate, compute and store (validation errors surface as InvalidInputError)
    const result = await footprintService.logActivity(ctx, requestBody);

    return NextResponse.json({ success: true, result }, { status: 201 });
  } catch (error) {
    return handleFootprintError("Log activity API", error);
  }
}
