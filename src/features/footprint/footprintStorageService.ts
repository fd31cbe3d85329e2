// src/features/footprint/footprintStorageService.ts
// Firestore persistence for footprint entries and streaks - no HTTP concerns

import type { OrderByDirection, WhereFilterOp } from 'firebase-admin/firestore';
import { firebaseAdminDb } from '@/lib/firebaseAdmin'; // Admin Firestore instance (possibly null)
import { firebaseDebug } from '@/core/firebase/debugUtils';
import { config } from '@/config';
import {
  ActivityEntry,
  DateRange,
  DateString,
  EmissionBreakdown,
  FootprintRecord,
  StreakState,
} from '@/core/calculations/type';
import { CommitResult, EntryRepository, StreakAdvance } from '@/core/storage/entryRepository';
import { INITIAL_STREAK_STATE } from '@/core/streaks/streakTracker';
import { StoredRecordSchema, parseStoredStreak } from '@/features/footprint/validation';

// --- The slice of the Admin SDK's Firestore this repository uses ---

export interface FootprintSnapshot {
  readonly id: string;
  readonly exists: boolean;
  data(): unknown;
}

export interface FootprintDocument {
  readonly path: string;
  get(): Promise<FootprintSnapshot>;
  set(data: object): Promise<unknown>;
  collection(path: string): FootprintCollection;
}

export interface FootprintQuery {
  where(field: string, op: WhereFilterOp, value: unknown): FootprintQuery;
  orderBy(field: string, direction: OrderByDirection): FootprintQuery;
  get(): Promise<{ readonly size: number; forEach(callback: (doc: FootprintSnapshot) => void): void }>;
}

export interface FootprintCollection extends FootprintQuery {
  doc(id: string): FootprintDocument;
}

export interface FootprintTransaction {
  get(ref: FootprintDocument): Promise<FootprintSnapshot>;
  set(ref: FootprintDocument, data: object): unknown;
}

export interface FootprintDatabase {
  collection(path: string): FootprintCollection;
  runTransaction<T>(update: (transaction: FootprintTransaction) => Promise<T>): Promise<T>;
}

const { usersCollection, entriesSubcollection, streaksCollection } = config.footprint;

function describeFirestoreError(error: unknown): { code?: string | number; message: string } {
  if (typeof error === 'object' && error !== null) {
    const code = 'code' in error && (typeof error.code === 'string' || typeof error.code === 'number')
      ? error.code
      : undefined;
    const message = error instanceof Error ? error.message : 'Unknown error';
    return { code, message };
  }
  return { message: String(error) };
}

function wrapFirestoreError(action: string, error: unknown): Error {
  const { code, message } = describeFirestoreError(error);
  if (code === 7 || code === 'permission-denied') {
    console.error("Firestore permission denied despite using Admin SDK. Check Service Account IAM roles.");
    return new Error(`Firestore Permission Denied (Admin SDK) while trying to ${action}. Original: ${message}`);
  }
  return new Error(`Failed to ${action}: ${message}`);
}

export class FirestoreEntryRepository implements EntryRepository {
  constructor(private readonly db: FootprintDatabase | null) {}

  private requireDb(): FootprintDatabase {
    if (!this.db) {
      console.error("Firestore Admin SDK is not initialized. Cannot perform database operation.");
      throw new Error("Firestore Admin SDK not initialized. Check server logs.");
    }
    return this.db;
  }

  private entriesRef(userId: string) {
    if (!userId) { throw new Error("User ID is required to access footprint entries"); }
    return this.requireDb().collection(usersCollection).doc(userId).collection(entriesSubcollection);
  }

  private streakRef(userId: string, action: string) {
    if (!userId) { throw new Error(`User ID is required to ${action}`); }
    return this.requireDb().collection(streaksCollection).doc(userId);
  }

  private decodeRecord(id: string, data: unknown): FootprintRecord | null {
    const parsed = StoredRecordSchema.safeParse(data);
    if (!parsed.success) {
      console.warn(`FirestoreEntryRepository: Skipping malformed entry "${id}".`, parsed.error.flatten());
      return null;
    }
    return parsed.data;
  }

  private decodeStreak(snap: FootprintSnapshot): StreakState {
    return snap.exists ? parseStoredStreak(snap.data()) : { ...INITIAL_STREAK_STATE };
  }

  async getEntries(userId: string, range: DateRange): Promise<FootprintRecord[]> {
    const ref = this.entriesRef(userId);
    const path = `${usersCollection}/${userId}/${entriesSubcollection}`;

    try {
      // Entry ids are yyyy-MM-dd, so the date field orders the same way
      const q = ref
        .where("entry.date", ">=", range.start)
        .where("entry.date", "<=", range.end)
        .orderBy("entry.date", "asc");

      firebaseDebug.logRead(path, range, { status: 'pending' });
      const snapshot = await q.get();
      firebaseDebug.logRead(path, range, { count: snapshot.size });

      const records: FootprintRecord[] = [];
      snapshot.forEach((doc) => {
        const record = this.decodeRecord(doc.id, doc.data());
        if (record) records.push(record);
      });
      return records;
    } catch (error: unknown) {
      console.error("Error getting footprint entries (Admin SDK):", error);
      throw wrapFirestoreError("load footprint history", error);
    }
  }

  async getEntry(userId: string, date: DateString): Promise<FootprintRecord | null> {
    const ref = this.entriesRef(userId).doc(date);

    try {
      firebaseDebug.logRead(ref.path, { date }, { status: 'pending' });
      const snap = await ref.get();
      firebaseDebug.logRead(ref.path, { date }, { exists: snap.exists });

      if (!snap.exists) return null;
      return this.decodeRecord(snap.id, snap.data());
    } catch (error: unknown) {
      console.error(`Error getting footprint entry ${date} (Admin SDK):`, error);
      throw wrapFirestoreError(`load footprint entry for ${date}`, error);
    }
  }

  async putEntry(
    userId: string,
    date: DateString,
    entry: ActivityEntry,
    breakdown: EmissionBreakdown
  ): Promise<void> {
    const ref = this.entriesRef(userId).doc(date);
    const record: FootprintRecord = {
      userId,
      entry: { ...entry, date },
      breakdown,
      updatedAt: Date.now(),
    };

    try {
      firebaseDebug.logWrite(ref.path, record, { status: 'pending' });
      // Full overwrite: a resubmitted day replaces the stored one
      await ref.set(record);
      firebaseDebug.logWrite(ref.path, record, { status: 'done' });
    } catch (error: unknown) {
      console.error(`Error saving footprint entry ${date} (Admin SDK):`, error);
      throw wrapFirestoreError(`save footprint entry for ${date}`, error);
    }
  }

  async getStreakState(userId: string): Promise<StreakState> {
    const ref = this.streakRef(userId, "get streak state");

    try {
      firebaseDebug.logRead(ref.path, { userId }, { status: 'pending' });
      const snap = await ref.get();
      firebaseDebug.logRead(ref.path, { userId }, { exists: snap.exists });
      return this.decodeStreak(snap);
    } catch (error: unknown) {
      console.error("Error getting streak state (Admin SDK):", error);
      throw wrapFirestoreError("load streak state", error);
    }
  }

  async putStreakState(userId: string, state: StreakState): Promise<void> {
    const ref = this.streakRef(userId, "save streak state");

    try {
      firebaseDebug.logWrite(ref.path, state, { status: 'pending' });
      await ref.set({ ...state, updatedAt: Date.now() });
      firebaseDebug.logWrite(ref.path, state, { status: 'done' });
    } catch (error: unknown) {
      console.error("Error saving streak state (Admin SDK):", error);
      throw wrapFirestoreError("save streak state", error);
    }
  }

  async commitEntry(
    userId: string,
    entry: ActivityEntry,
    breakdown: EmissionBreakdown,
    advance: StreakAdvance
  ): Promise<CommitResult> {
    const entryRef = this.entriesRef(userId).doc(entry.date);
    const streakRef = this.streakRef(userId, "save streak state");

    try {
      // Firestore reruns this callback on contention; only the last attempt's writes land
      return await this.requireDb().runTransaction(async (tx) => {
        const entrySnap = await tx.get(entryRef);
        const streakSnap = await tx.get(streakRef);

        // A stored document counts as the day being logged even if it no longer decodes
        const replacedExisting = entrySnap.exists;
        const streak = advance(this.decodeStreak(streakSnap), replacedExisting);
        const updatedAt = Date.now();
        const record: FootprintRecord = { userId, entry: { ...entry }, breakdown, updatedAt };

        tx.set(entryRef, record);
        tx.set(streakRef, { ...streak, updatedAt });
        firebaseDebug.logWrite(entryRef.path, record, { status: 'in-transaction' });
        firebaseDebug.logWrite(streakRef.path, streak, { status: 'in-transaction' });

        return { record, streak, replacedExisting };
      });
    } catch (error: unknown) {
      console.error(`Error committing footprint entry ${entry.date} (Admin SDK):`, error);
      throw wrapFirestoreError(`save footprint entry for ${entry.date}`, error);
    }
  }
}

export const firestoreEntryRepository = new FirestoreEntryRepository(firebaseAdminDb);
