// src/app/api/footprint/entries/route.ts
import { logActivityHandler } from "@/features/footprint/api/logActivityHandler";
import { getEntriesHandler } from "@/features/footprint/api/getEntriesHandler";

// POST upserts one day's activity; GET lists stored days in a range
export { logActivityHandler as POST, getEntriesHandler as GET };
