// src/config/emissionFactors.ts
/** kg CO2 per unit of activity. */
export const EMISSION_FACTORS = {
  electricityPerKwh: 0.4,
  naturalGasPerTherm: 5.3,
  waterPerGallon: 0.0002, // pumping and treatment
  carPerGallon: 8.887, // gasoline
  transitPerMile: 0.17,
  shortHaulFlight: 500,
  longHaulFlight: 1600,
  meatServing: 3.0,
  dairyServing: 0.7,
  plantServing: 0.2,
} as const;

// Car miles are converted to gallons at this fuel economy before applying carPerGallon.
export const CAR_MILES_PER_GALLON = 25;

// Global average daily footprint per person, kg CO2.
export const BASELINE_DAILY_KG = 49.3;

// kg CO2 one tree absorbs in a year.
export const TREE_ABSORPTION_KG_PER_YEAR = 21.77;
