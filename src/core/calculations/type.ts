// src/core/calculations/type.ts

/** A calendar day encoded as `yyyy-MM-dd`. Sorts lexicographically. */
export type DateString = string;

/**
 * One user's raw inputs for one calendar day.
 * Quantities are non-negative; an omitted quantity contributes nothing.
 */
export interface ActivityEntry {
  date: DateString;

  // Home energy
  electricityKwh: number;
  naturalGasTherms: number;
  waterGallons: number;

  // Transportation
  carMiles: number;
  transitMiles: number;
  shortHaulFlights: number;
  longHaulFlights: number;

  // Food
  meatServings: number;
  dairyServings: number;
  plantServings: number;
}

export type ActivityQuantities = Omit<ActivityEntry, "date">;

/**
 * Emissions derived from an ActivityEntry, in kg CO2.
 * `total` is always homeEnergy + transportation + food.
 */
export interface EmissionBreakdown {
  homeEnergy: number;
  transportation: number;
  food: number;
  total: number;
}

export type EmissionCategory = Exclude<keyof EmissionBreakdown, "total">;

/** The per-source split the categories are summed from (kg CO2). */
export interface SourceEmissions {
  electricity: number;
  naturalGas: number;
  water: number;
  car: number;
  transit: number;
  flights: number;
  food: number;
}

/** What the repository stores for one (user, date). */
export interface FootprintRecord {
  userId: string;
  entry: ActivityEntry;
  breakdown: EmissionBreakdown;
  updatedAt: number; // ms
}

export interface StreakState {
  currentStreak: number;
  bestStreak: number;
  lastLoggedDate: DateString | null;
  totalEntries: number;
}

export interface DateRange {
  start: DateString;
  end: DateString;
}
