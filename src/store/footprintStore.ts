// src/store/footprintStore.ts

import { create } from "zustand";
import type { User } from "firebase/auth";
import { DateRange, EmissionBreakdown, StreakState } from "@/core/calculations/type";
import { computeEmissions, ZERO_BREAKDOWN } from "@/core/calculations/emissionModel";
import { PeriodComparison, SerializedSummary } from "@/core/history/historyAggregator";
import { ActivityInput, ActivityInputSchema } from "@/features/footprint/validation";
import type { LogActivityResult } from "@/features/footprint/footprintService";
import { config } from "@/config";
import { toDateString } from "@/shared/utils/dateUtils";

// --- TYPES ---
export type AppStatus = "idle" | "submitting" | "loading_summary" | "loading_dashboard" | "error";

/** Only the part of a Firebase user the store needs. */
export type AuthUser = Pick<User, "getIdToken">;

export interface SerializedDashboard {
  streak: StreakState;
  summary: SerializedSummary;
  periodComparison: PeriodComparison;
}

export interface FootprintState {
  draft: ActivityInput;
  preview: EmissionBreakdown;
  lastResult: LogActivityResult | null;
  summary: SerializedSummary | null;
  streak: StreakState | null;
  dashboard: SerializedDashboard | null;
  appStatus: AppStatus;
  error: string | null;
  setDraft: (patch: Partial<ActivityInput>) => void;
  submitDraft: (user: AuthUser | null) => Promise<boolean>;
  loadSummary: (user: AuthUser | null, range?: Partial<DateRange>) => Promise<void>;
  loadDashboard: (user: AuthUser | null) => Promise<void>;
  resetState: () => void;
}

// --- Helper Functions ---

const getAuthHeader = async (user: AuthUser | null): Promise<HeadersInit | null> => {
  if (!user) {
    console.warn("getAuthHeader: No current user found.");
    return null;
  }
  try {
    const token = await user.getIdToken();
    if (!token) {
      console.warn("getAuthHeader: Failed to get ID token.");
      return null;
    }
    return {
      Authorization: `Bearer ${token}`,
      "Content-Type": "application/json",
      [config.footprint.localDateHeader]: toDateString(new Date()),
    };
  } catch (error) {
    console.error("getAuthHeader: Error getting ID token:", error);
    return null;
  }
};

async function readError(response: Response): Promise<string> {
  try {
    const body: unknown = await response.json();
    if (typeof body === "object" && body !== null && "error" in body && typeof body.error === "string") {
      return body.error;
    }
  } catch (parseError) {
    console.warn("readError: Response body was not JSON", parseError);
  }
  return `Request failed with status ${response.status}`;
}

// Invalid drafts (a negative field mid-edit) preview as zero rather than throwing
function previewFor(draft: ActivityInput): EmissionBreakdown {
  const parsed = ActivityInputSchema.safeParse(draft);
  return parsed.success ? computeEmissions(parsed.data) : ZERO_BREAKDOWN;
}

type DataState = Omit<FootprintState, "setDraft" | "submitDraft" | "loadSummary" | "loadDashboard" | "resetState">;

const initialState: DataState = {
  draft: {},
  preview: ZERO_BREAKDOWN,
  lastResult: null,
  summary: null,
  streak: null,
  dashboard: null,
  appStatus: "idle",
  error: null,
};

// --- Store Implementation ---

export const useFootprintStore = create<FootprintState>((set, get) => ({
  ...initialState,

  // The preview is recomputed here, once per edit, never during render
  setDraft: (patch) => {
    const draft = { ...get().draft, ...patch };
    set({ draft, preview: previewFor(draft) });
  },

  submitDraft: async (user) => {
    const headers = await getAuthHeader(user);
    if (!headers) {
      set({ appStatus: "error", error: "You must be signed in to log activity." });
      return false;
    }

    set({ appStatus: "submitting", error: null });
    try {
      const response = await fetch("/api/footprint/entries", {
        method: "POST",
        headers,
        body: JSON.stringify(get().draft),
      });
      if (!response.ok) {
        set({ appStatus: "error", error: await readError(response) });
        return false;
      }
      const { result }: { result: LogActivityResult } = await response.json();
      set({ lastResult: result, streak: result.streak, draft: {}, preview: ZERO_BREAKDOWN, appStatus: "idle" });
      return true;
    } catch (error) {
      console.error("submitDraft: Request failed:", error);
      set({ appStatus: "error", error: error instanceof Error ? error.message : "Failed to save activity" });
      return false;
    }
  },

  loadSummary: async (user, range = {}) => {
    const headers = await getAuthHeader(user);
    if (!headers) {
      set({ appStatus: "error", error: "You must be signed in to view your history." });
      return;
    }

    const params = new URLSearchParams();
    if (range.start) params.set("start", range.start);
    if (range.end) params.set("end", range.end);
    const query = params.toString();

    set({ appStatus: "loading_summary", error: null });
    try {
      const response = await fetch(`/api/footprint/summary${query ? `?${query}` : ""}`, { headers });
      if (!response.ok) {
        set({ appStatus: "error", error: await readError(response) });
        return;
      }
      const { data }: { data: { summary: SerializedSummary } } = await response.json();
      set({ summary: data.summary, appStatus: "idle" });
    } catch (error) {
      console.error("loadSummary: Request failed:", error);
      set({ appStatus: "error", error: error instanceof Error ? error.message : "Failed to load summary" });
    }
  },

  loadDashboard: async (user) => {
    const headers = await getAuthHeader(user);
    if (!headers) {
      set({ appStatus: "error", error: "You must be signed in to view your dashboard." });
      return;
    }

    set({ appStatus: "loading_dashboard", error: null });
    try {
      const response = await fetch("/api/footprint/dashboard", { headers });
      if (!response.ok) {
        set({ appStatus: "error", error: await readError(response) });
        return;
      }
      const { data }: { data: { dashboard: SerializedDashboard } } = await response.json();
      set({
        dashboard: data.dashboard,
        summary: data.dashboard.summary,
        streak: data.dashboard.streak,
        appStatus: "idle",
      });
    } catch (error) {
      console.error("loadDashboard: Request failed:", error);
      set({ appStatus: "error", error: error instanceof Error ? error.message : "Failed to load dashboard" });
    }
  },

  resetState: () => set({ ...initialState }),
}));
