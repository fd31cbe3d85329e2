// src/app/api/footprint/summary/route.ts
import { getSummaryHandler } from "@/features/footprint/api/getSummaryHandler";

export { getSummaryHandler as GET };
