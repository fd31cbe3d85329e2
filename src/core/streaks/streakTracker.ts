// src/core/streaks/streakTracker.ts
import { DateString, StreakState } from "@/core/calculations/type";
import { daysBetween, maxDateString } from "@/shared/utils/dateUtils";

export const INITIAL_STREAK_STATE: StreakState = Object.freeze({
  currentStreak: 0,
  bestStreak: 0,
  lastLoggedDate: null,
  totalEntries: 0,
});

export interface AdvanceStreakOptions {
  /** The committed entry overwrote one already stored for that date. */
  replacesExisting?: boolean;
}

/**
 * Returns the streak state after an entry for `newDate` is committed.
 *
 * Any date that is neither the last logged day nor the day after it resets
 * the current streak to 1. That includes backfilling an older, missed day
 * after today was already logged; `lastLoggedDate` never moves backwards.
 */
export function advanceStreak(
  prior: StreakState,
  newDate: DateString,
  options: AdvanceStreakOptions = {}
): StreakState {
  const { replacesExisting = false } = options;

  if (prior.lastLoggedDate === null) {
    return {
      currentStreak: 1,
      bestStreak: Math.max(prior.bestStreak, 1),
      lastLoggedDate: newDate,
      totalEntries: prior.totalEntries + (replacesExisting ? 0 : 1),
    };
  }

  const gap = daysBetween(prior.lastLoggedDate, newDate);
  const isSameDay = gap === 0;

  let currentStreak: number;
  if (gap === 1) {
    currentStreak = prior.currentStreak + 1;
  } else if (isSameDay) {
    currentStreak = prior.currentStreak;
  } else {
    currentStreak = 1;
  }

  return {
    currentStreak,
    bestStreak: Math.max(prior.bestStreak, currentStreak),
    lastLoggedDate: maxDateString(prior.lastLoggedDate, newDate),
    totalEntries: prior.totalEntries + (isSameDay || replacesExisting ? 0 : 1),
  };
}

/** Rebuilds a streak state from a user's logging dates, oldest first. */
export function replayStreak(
  dates: Iterable<DateString>,
  initial: StreakState = INITIAL_STREAK_STATE
): StreakState {
  const sorted = Array.from(dates).sort();
  return sorted.reduce<StreakState>((state, date) => advanceStreak(state, date), initial);
}
