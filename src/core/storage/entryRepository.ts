// src/core/storage/entryRepository.ts
import {
  ActivityEntry,
  DateRange,
  DateString,
  EmissionBreakdown,
  FootprintRecord,
  StreakState,
} from "@/core/calculations/type";

/** Computes the next streak from the stored one, given whether the day was already logged. */
export type StreakAdvance = (prior: StreakState, replacesExisting: boolean) => StreakState;

export interface CommitResult {
  record: FootprintRecord;
  streak: StreakState;
  replacedExisting: boolean;
}

/**
 * Persistence the footprint service reads from and writes to.
 * Writes for the same (user, date) are last-write-wins.
 */
export interface EntryRepository {
  /** Records in the inclusive range, ascending by date. */
  getEntries(userId: string, range: DateRange): Promise<FootprintRecord[]>;
  getEntry(userId: string, date: DateString): Promise<FootprintRecord | null>;
  /** The stored state, or the initial (never logged) state. */
  getStreakState(userId: string): Promise<StreakState>;
  putEntry(
    userId: string,
    date: DateString,
    entry: ActivityEntry,
    breakdown: EmissionBreakdown
  ): Promise<void>;
  putStreakState(userId: string, state: StreakState): Promise<void>;
  /**
   * Upserts the entry and replaces the streak with `advance(prior, replacesExisting)`
   * atomically. Either both writes land or neither does.
   */
  commitEntry(
    userId: string,
    entry: ActivityEntry,
    breakdown: EmissionBreakdown,
    advance: StreakAdvance
  ): Promise<CommitResult>;
}
