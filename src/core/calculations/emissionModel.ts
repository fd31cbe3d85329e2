// src/core/calculations/emissionModel.ts
import {
  ActivityQuantities,
  EmissionBreakdown,
  SourceEmissions,
} from "@/core/calculations/type";
import {
  BASELINE_DAILY_KG,
  CAR_MILES_PER_GALLON,
  EMISSION_FACTORS,
  TREE_ABSORPTION_KG_PER_YEAR,
} from "@/config/emissionFactors";

export const ZERO_BREAKDOWN: EmissionBreakdown = Object.freeze({
  homeEnergy: 0,
  transportation: 0,
  food: 0,
  total: 0,
});

/**
 * Splits one day's activity into per-source emissions (kg CO2).
 *
 * Precondition: every quantity is a finite, non-negative number. Nothing here
 * checks that; `parseActivityEntry` does, before any entry reaches the model.
 */
export function computeSourceEmissions(entry: ActivityQuantities): SourceEmissions {
  const carGallons = entry.carMiles / CAR_MILES_PER_GALLON;

  return {
    electricity: entry.electricityKwh * EMISSION_FACTORS.electricityPerKwh,
    naturalGas: entry.naturalGasTherms * EMISSION_FACTORS.naturalGasPerTherm,
    water: entry.waterGallons * EMISSION_FACTORS.waterPerGallon,
    car: carGallons * EMISSION_FACTORS.carPerGallon,
    transit: entry.transitMiles * EMISSION_FACTORS.transitPerMile,
    flights:
      entry.shortHaulFlights * EMISSION_FACTORS.shortHaulFlight +
      entry.longHaulFlights * EMISSION_FACTORS.longHaulFlight,
    food:
      entry.meatServings * EMISSION_FACTORS.meatServing +
      entry.dairyServings * EMISSION_FACTORS.dairyServing +
      entry.plantServings * EMISSION_FACTORS.plantServing,
  };
}

/** Folds per-source emissions into the three reporting categories. */
export function breakdownFromSources(sources: SourceEmissions): EmissionBreakdown {
  const homeEnergy = sources.electricity + sources.naturalGas + sources.water;
  const transportation = sources.car + sources.transit + sources.flights;
  const food = sources.food;

  return {
    homeEnergy,
    transportation,
    food,
    total: homeEnergy + transportation + food,
  };
}

/**
 * Computes category and total emissions for one day. Pure and deterministic;
 * an all-zero entry yields ZERO_BREAKDOWN's values.
 */
export function computeEmissions(entry: ActivityQuantities): EmissionBreakdown {
  return breakdownFromSources(computeSourceEmissions(entry));
}

/**
 * Signed percentage difference between a daily footprint and the baseline.
 * +10 means 10% above the global average.
 */
export function compareToBaseline(dailyKg: number, baselineKg: number = BASELINE_DAILY_KG): number {
  return ((dailyKg - baselineKg) / baselineKg) * 100;
}

export function treesToOffset(totalKg: number): number {
  return totalKg / TREE_ABSORPTION_KG_PER_YEAR;
}
