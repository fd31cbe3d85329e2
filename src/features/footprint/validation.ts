// src/features/footprint/validation.ts
import { z } from "zod";
import { ActivityEntry, DateRange, DateString, StreakState } from "@/core/calculations/type";
import { isDateString } from "@/shared/utils/dateUtils";

export class InvalidInputError extends Error {
  status: number;
  details?: unknown;
  constructor(message: string, details?: unknown) {
    super(message);
    this.name = "InvalidInputError";
    this.status = 400;
    this.details = details;
  }
}

// --- Zod Schemas ---

export const DateStringSchema = z
  .string()
  .refine(isDateString, { message: "Expected a calendar date formatted yyyy-MM-dd" });

const QuantitySchema = z
  .number({ invalid_type_error: "Quantity must be a number" })
  .finite()
  .nonnegative({ message: "Quantity cannot be negative" })
  .default(0);

export const ActivityInputSchema = z.object({
  date: DateStringSchema.optional(),
  electricityKwh: QuantitySchema,
  naturalGasTherms: QuantitySchema,
  waterGallons: QuantitySchema,
  carMiles: QuantitySchema,
  transitMiles: QuantitySchema,
  shortHaulFlights: QuantitySchema,
  longHaulFlights: QuantitySchema,
  meatServings: QuantitySchema,
  dairyServings: QuantitySchema,
  plantServings: QuantitySchema,
});

export type ActivityInput = z.input<typeof ActivityInputSchema>;

export const DateRangeQuerySchema = z.object({
  start: DateStringSchema.optional(),
  end: DateStringSchema.optional(),
});

// Shape of a document under users/{uid}/footprintEntries
export const StoredRecordSchema = z.object({
  userId: z.string(),
  entry: ActivityInputSchema.extend({ date: DateStringSchema }),
  breakdown: z.object({
    homeEnergy: z.number(),
    transportation: z.number(),
    food: z.number(),
    total: z.number(),
  }),
  updatedAt: z.number(),
});

export const StoredStreakSchema = z.object({
  currentStreak: z.number().int().nonnegative(),
  bestStreak: z.number().int().nonnegative(),
  lastLoggedDate: DateStringSchema.nullable(),
  totalEntries: z.number().int().nonnegative().default(0),
});

// --- Parsers ---

/**
 * Validates raw activity input and fills omitted quantities with zero.
 * This is where negative or non-numeric quantities are rejected; the emission
 * model assumes they never get past here.
 * @throws InvalidInputError
 */
export function parseActivityEntry(input: unknown, defaultDate: DateString): ActivityEntry {
  const result = ActivityInputSchema.safeParse(input);
  if (!result.success) {
    throw new InvalidInputError("Invalid activity entry", result.error.flatten());
  }
  const { date, ...quantities } = result.data;
  return { date: date ?? defaultDate, ...quantities };
}

/**
 * Parses optional `start`/`end` query values. Missing bounds are left to the caller.
 * @throws InvalidInputError
 */
export function parseDateRangeQuery(params: Record<string, string>): Partial<DateRange> {
  const result = DateRangeQuerySchema.safeParse(params);
  if (!result.success) {
    throw new InvalidInputError("Invalid date range", result.error.flatten());
  }
  return result.data;
}

export function parseStoredStreak(data: unknown): StreakState {
  return StoredStreakSchema.parse(data);
}
