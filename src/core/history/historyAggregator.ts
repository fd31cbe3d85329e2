// src/core/history/historyAggregator.ts
import {
  DateRange,
  DateString,
  EmissionBreakdown,
  EmissionCategory,
  FootprintRecord,
  SourceEmissions,
} from "@/core/calculations/type";
import {
  compareToBaseline,
  computeSourceEmissions,
  treesToOffset,
} from "@/core/calculations/emissionModel";
import { BASELINE_DAILY_KG } from "@/config/emissionFactors";
import { isWithinRange, lastNDaysRange, addDaysToDateString } from "@/shared/utils/dateUtils";

export interface TrendPoint {
  date: DateString;
  total: number;
}

/**
 * Daily totals over a summarized range, oldest first. Iterating it walks the
 * underlying records each time, so it can be consumed more than once.
 */
export class TrendSeries implements Iterable<TrendPoint> {
  constructor(private readonly records: readonly FootprintRecord[]) {}

  *[Symbol.iterator](): Iterator<TrendPoint> {
    for (const record of this.records) {
      yield { date: record.entry.date, total: record.breakdown.total };
    }
  }

  get length(): number {
    return this.records.length;
  }

  toArray(): TrendPoint[] {
    return Array.from(this);
  }

  // JSON.stringify (and NextResponse.json) emit a plain array.
  toJSON(): TrendPoint[] {
    return this.toArray();
  }
}

export type CategoryBreakdown = Record<EmissionCategory, number>;

export interface Summary {
  range: DateRange;
  entryCount: number;
  totals: EmissionBreakdown;
  /** Share of the range total per category. All zero when the total is zero. */
  categoryBreakdown: CategoryBreakdown;
  sourceTotals: SourceEmissions;
  trendSeries: TrendSeries;
  averageDailyKg: number | null;
  minDailyKg: number | null;
  maxDailyKg: number | null;
  /** Signed % of averageDailyKg against the baseline; null for an empty range. */
  comparisonToBaseline: number | null;
  treesToOffset: number;
}

/** Summary as it travels over JSON. */
export type SerializedSummary = Omit<Summary, "trendSeries"> & { trendSeries: TrendPoint[] };

export interface SummarizeOptions {
  baselineDailyKg?: number;
}

const emptySources = (): SourceEmissions => ({
  electricity: 0,
  naturalGas: 0,
  water: 0,
  car: 0,
  transit: 0,
  flights: 0,
  food: 0,
});

function recordsInRange(records: readonly FootprintRecord[], range: DateRange): FootprintRecord[] {
  return records
    .filter((record) => isWithinRange(record.entry.date, range))
    .sort((a, b) => (a.entry.date < b.entry.date ? -1 : a.entry.date > b.entry.date ? 1 : 0));
}

/**
 * Summarizes a user's stored entries over an inclusive date range.
 * Records outside the range are ignored; input order does not matter.
 */
export function summarize(
  records: readonly FootprintRecord[],
  range: DateRange,
  options: SummarizeOptions = {}
): Summary {
  const baselineDailyKg = options.baselineDailyKg ?? BASELINE_DAILY_KG;
  const included = recordsInRange(records, range);

  const totals = included.reduce<EmissionBreakdown>(
    (acc, { breakdown }) => ({
      homeEnergy: acc.homeEnergy + breakdown.homeEnergy,
      transportation: acc.transportation + breakdown.transportation,
      food: acc.food + breakdown.food,
      total: acc.total + breakdown.total,
    }),
    { homeEnergy: 0, transportation: 0, food: 0, total: 0 }
  );

  const sourceTotals = included.reduce<SourceEmissions>((acc, { entry }) => {
    const sources = computeSourceEmissions(entry);
    return {
      electricity: acc.electricity + sources.electricity,
      naturalGas: acc.naturalGas + sources.naturalGas,
      water: acc.water + sources.water,
      car: acc.car + sources.car,
      transit: acc.transit + sources.transit,
      flights: acc.flights + sources.flights,
      food: acc.food + sources.food,
    };
  }, emptySources());

  const categoryBreakdown: CategoryBreakdown =
    totals.total > 0
      ? {
          homeEnergy: totals.homeEnergy / totals.total,
          transportation: totals.transportation / totals.total,
          food: totals.food / totals.total,
        }
      : { homeEnergy: 0, transportation: 0, food: 0 };

  const extremes = included.reduce<{ min: number; max: number } | null>((acc, { breakdown }) => {
    if (!acc) return { min: breakdown.total, max: breakdown.total };
    return { min: Math.min(acc.min, breakdown.total), max: Math.max(acc.max, breakdown.total) };
  }, null);
  const averageDailyKg = included.length > 0 ? totals.total / included.length : null;

  return {
    range,
    entryCount: included.length,
    totals,
    categoryBreakdown,
    sourceTotals,
    trendSeries: new TrendSeries(included),
    averageDailyKg,
    minDailyKg: extremes?.min ?? null,
    maxDailyKg: extremes?.max ?? null,
    comparisonToBaseline:
      averageDailyKg === null ? null : compareToBaseline(averageDailyKg, baselineDailyKg),
    treesToOffset: treesToOffset(totals.total),
  };
}

export function serializeSummary(summary: Summary): SerializedSummary {
  return { ...summary, trendSeries: summary.trendSeries.toArray() };
}

export type TrendDirection = "improving" | "worsening" | "stable";

export interface PeriodComparison {
  recentRange: DateRange;
  previousRange: DateRange;
  recentAverageKg: number;
  previousAverageKg: number;
  direction: TrendDirection;
}

function averageTotal(records: readonly FootprintRecord[], range: DateRange): number {
  const included = records.filter((record) => isWithinRange(record.entry.date, range));
  if (included.length === 0) return 0;
  return included.reduce((sum, record) => sum + record.breakdown.total, 0) / included.length;
}

/**
 * Compares the last `windowDays` days (ending today) with the window before it.
 * An empty window averages 0.
 */
export function comparePeriods(
  records: readonly FootprintRecord[],
  today: DateString,
  windowDays = 30
): PeriodComparison {
  const recentRange = lastNDaysRange(today, windowDays);
  const previousRange = lastNDaysRange(addDaysToDateString(recentRange.start, -1), windowDays);

  const recentAverageKg = averageTotal(records, recentRange);
  const previousAverageKg = averageTotal(records, previousRange);

  const direction: TrendDirection =
    recentAverageKg < previousAverageKg
      ? "improving"
      : recentAverageKg > previousAverageKg
        ? "worsening"
        : "stable";

  return { recentRange, previousRange, recentAverageKg, previousAverageKg, direction };
}
