// src/app/api/footprint/streak/route.ts
import { getStreakHandler } from "@/features/footprint/api/getStreakHandler";

export { getStreakHandler as GET };
