import { ActivityEntry, FootprintRecord } from "@/core/calculations/type";
import { computeEmissions } from "@/core/calculations/emissionModel";

export function makeEntry(date: string, quantities: Partial<Omit<ActivityEntry, "date">> = {}): ActivityEntry {
  return {
    date,
    electricityKwh: 0,
    naturalGasTherms: 0,
    waterGallons: 0,
    carMiles: 0,
    transitMiles: 0,
    shortHaulFlights: 0,
    longHaulFlights: 0,
    meatServings: 0,
    dairyServings: 0,
    plantServings: 0,
    ...quantities,
  };
}

export function makeRecord(
  date: string,
  quantities: Partial<Omit<ActivityEntry, "date">> = {},
  userId = "user-1"
): FootprintRecord {
  const entry = makeEntry(date, quantities);
  return { userId, entry, breakdown: computeEmissions(entry), updatedAt: 0 };
}
