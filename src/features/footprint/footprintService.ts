// src/features/footprint/footprintService.ts
// Request-scoped orchestration around the pure footprint core

import { DateRange, DateString, FootprintRecord, StreakState } from "@/core/calculations/type";
import { compareToBaseline, computeEmissions, treesToOffset } from "@/core/calculations/emissionModel";
import { advanceStreak } from "@/core/streaks/streakTracker";
import {
  comparePeriods,
  PeriodComparison,
  summarize,
  Summary,
} from "@/core/history/historyAggregator";
import { EntryRepository } from "@/core/storage/entryRepository";
import { config } from "@/config";
import { lastNDaysRange } from "@/shared/utils/dateUtils";
import { InvalidInputError, parseActivityEntry } from "@/features/footprint/validation";

/** Everything a call needs to know about the request it serves. */
export interface RequestContext {
  userId: string;
  /** The caller's current calendar day. */
  today: DateString;
}

export interface LogActivityResult {
  record: FootprintRecord;
  streak: StreakState;
  replacedExisting: boolean;
  comparisonToBaseline: number;
  treesToOffset: number;
}

export interface Dashboard {
  streak: StreakState;
  summary: Summary;
  periodComparison: PeriodComparison;
}

export interface FootprintService {
  logActivity(ctx: RequestContext, input: unknown): Promise<LogActivityResult>;
  getEntries(ctx: RequestContext, range?: Partial<DateRange>): Promise<FootprintRecord[]>;
  getSummary(ctx: RequestContext, range?: Partial<DateRange>): Promise<Summary>;
  getStreak(ctx: RequestContext): Promise<StreakState>;
  getDashboard(ctx: RequestContext): Promise<Dashboard>;
}

export function createFootprintService(repository: EntryRepository): FootprintService {
  const resolveRange = (ctx: RequestContext, range: Partial<DateRange> = {}): DateRange => {
    const fallback = lastNDaysRange(range.end ?? ctx.today, config.footprint.historyWindowDays);
    const resolved = { start: range.start ?? fallback.start, end: range.end ?? fallback.end };
    if (resolved.start > resolved.end) {
      throw new InvalidInputError(`Range start ${resolved.start} is after end ${resolved.end}`);
    }
    return resolved;
  };

  return {
    async logActivity(ctx, input) {
      const entry = parseActivityEntry(input, ctx.today);
      if (entry.date > ctx.today) {
        throw new InvalidInputError(`Cannot log activity for a future date (${entry.date})`);
      }

      const breakdown = computeEmissions(entry);
      const { record, streak, replacedExisting } = await repository.commitEntry(
        ctx.userId,
        entry,
        breakdown,
        (prior, replacesExisting) => advanceStreak(prior, entry.date, { replacesExisting })
      );

      console.log(
        `logActivity: ${replacedExisting ? "Replaced" : "Saved"} ${entry.date} for user ${ctx.userId} ` +
          `(${breakdown.total.toFixed(2)} kg CO2, streak ${streak.currentStreak})`
      );

      return {
        record,
        streak,
        replacedExisting,
        comparisonToBaseline: compareToBaseline(breakdown.total),
        treesToOffset: treesToOffset(breakdown.total),
      };
    },

    async getEntries(ctx, range) {
      return repository.getEntries(ctx.userId, resolveRange(ctx, range));
    },

    async getSummary(ctx, range) {
      const resolved = resolveRange(ctx, range);
      const records = await repository.getEntries(ctx.userId, resolved);
      return summarize(records, resolved);
    },

    async getStreak(ctx) {
      return repository.getStreakState(ctx.userId);
    },

    async getDashboard(ctx) {
      const windowDays = config.footprint.historyWindowDays;
      // Two windows back, so the comparison has a previous period to look at
      const comparisonRange = lastNDaysRange(ctx.today, windowDays * 2);

      const [records, streak] = await Promise.all([
        repository.getEntries(ctx.userId, comparisonRange),
        repository.getStreakState(ctx.userId),
      ]);

      return {
        streak,
        summary: summarize(records, lastNDaysRange(ctx.today, windowDays)),
        periodComparison: comparePeriods(records, ctx.today, windowDays),
      };
    },
  };
}
