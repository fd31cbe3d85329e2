// src/app/api/footprint/dashboard/route.ts
import { getDashboardHandler } from "@/features/footprint/api/getDashboardHandler";

export { getDashboardHandler as GET };
