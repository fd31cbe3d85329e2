import { FirestoreEntryRepository } from '../footprintStorageService';
import { advanceStreak } from '@/core/streaks/streakTracker';
import { computeEmissions } from '@/core/calculations/emissionModel';
import { StreakAdvance } from '@/core/storage/entryRepository';
import { makeEntry, makeRecord } from '@/core/calculations/__tests__/fixtures';
import { FakeFirestore } from './fakeFirestore';

jest.mock('@/lib/firebaseAdmin', () => ({
  firebaseAdminAuth: null,
  firebaseAdminDb: null,
}));

const entryPath = (date: string, userId = 'user-1') => `users/${userId}/footprintEntries/${date}`;
const streakPath = (userId = 'user-1') => `footprintStreaks/${userId}`;

const advanceTo = (date: string): StreakAdvance => (prior, replacesExisting) =>
  advanceStreak(prior, date, { replacesExisting });

function firestoreError(message: string, code: string | number) {
  return Object.assign(new Error(message), { code });
}

describe('FirestoreEntryRepository', () => {
  let db: FakeFirestore;
  let repository: FirestoreEntryRepository;

  beforeEach(() => {
    db = new FakeFirestore();
    repository = new FirestoreEntryRepository(db);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('fails fast when the Admin SDK is not initialized', async () => {
    const uninitialized = new FirestoreEntryRepository(null);

    await expect(uninitialized.getEntries('user-1', { start: '2024-03-01', end: '2024-03-31' })).rejects.toThrow(
      'Firestore Admin SDK not initialized. Check server logs.'
    );
    await expect(uninitialized.getStreakState('user-1')).rejects.toThrow(
      'Firestore Admin SDK not initialized. Check server logs.'
    );
  });

  it('requires a user id', async () => {
    await expect(repository.getEntry('', '2024-03-01')).rejects.toThrow(
      'User ID is required to access footprint entries'
    );
    await expect(repository.putStreakState('', {
      currentStreak: 0,
      bestStreak: 0,
      lastLoggedDate: null,
      totalEntries: 0,
    })).rejects.toThrow('User ID is required to save streak state');
  });

  describe('getEntries', () => {
    it('returns the user\'s records in the range, ascending, skipping malformed documents', async () => {
      db.documents.set(entryPath('2024-03-03'), makeRecord('2024-03-03', { electricityKwh: 10 }));
      db.documents.set(entryPath('2024-03-01'), makeRecord('2024-03-01', { meatServings: 1 }));
      db.documents.set(entryPath('2024-02-28'), makeRecord('2024-02-28'));
      db.documents.set(entryPath('2024-03-02'), { userId: 'user-1', entry: { date: '2024-03-02' } });
      db.documents.set(entryPath('2024-03-02', 'user-2'), makeRecord('2024-03-02', {}, 'user-2'));

      const records = await repository.getEntries('user-1', { start: '2024-03-01', end: '2024-03-31' });

      expect(records).toEqual([
        makeRecord('2024-03-01', { meatServings: 1 }),
        makeRecord('2024-03-03', { electricityKwh: 10 }),
      ]);
      expect(console.warn).toHaveBeenCalledWith(
        'FirestoreEntryRepository: Skipping malformed entry "2024-03-02".',
        expect.anything()
      );
    });

    it('maps a permission error code to a descriptive error', async () => {
      db.failNextOperation(firestoreError('PERMISSION_DENIED: Missing or insufficient permissions.', 7));

      await expect(repository.getEntries('user-1', { start: '2024-03-01', end: '2024-03-31' })).rejects.toThrow(
        'Firestore Permission Denied (Admin SDK) while trying to load footprint history. ' +
          'Original: PERMISSION_DENIED: Missing or insufficient permissions.'
      );
    });
  });

  describe('putEntry', () => {
    it('overwrites the whole stored document', async () => {
      jest.spyOn(Date, 'now').mockReturnValue(1_700_000_000_000);
      db.documents.set(entryPath('2024-03-01'), { ...makeRecord('2024-03-01', { carMiles: 50 }), note: 'stale' });

      const entry = makeEntry('2024-03-01', { electricityKwh: 5 });
      await repository.putEntry('user-1', '2024-03-01', entry, computeEmissions(entry));

      expect(db.documents.get(entryPath('2024-03-01'))).toEqual({
        userId: 'user-1',
        entry,
        breakdown: computeEmissions(entry),
        updatedAt: 1_700_000_000_000,
      });
    });

    it('wraps other failures with the action that failed', async () => {
      db.failNextOperation(firestoreError('Service unavailable', 14));
      const entry = makeEntry('2024-03-01');

      await expect(repository.putEntry('user-1', '2024-03-01', entry, computeEmissions(entry))).rejects.toThrow(
        'Failed to save footprint entry for 2024-03-01: Service unavailable'
      );
    });
  });

  describe('getStreakState', () => {
    it('returns the initial state when nothing is stored', async () => {
      expect(await repository.getStreakState('user-1')).toEqual({
        currentStreak: 0,
        bestStreak: 0,
        lastLoggedDate: null,
        totalEntries: 0,
      });
    });

    it('defaults totalEntries for documents written without it', async () => {
      db.documents.set(streakPath(), { currentStreak: 3, bestStreak: 5, lastLoggedDate: '2024-03-03', updatedAt: 1 });

      expect(await repository.getStreakState('user-1')).toEqual({
        currentStreak: 3,
        bestStreak: 5,
        lastLoggedDate: '2024-03-03',
        totalEntries: 0,
      });
    });

    it('reads back what putStreakState stored', async () => {
      const state = { currentStreak: 4, bestStreak: 9, lastLoggedDate: '2024-03-10', totalEntries: 20 };

      await repository.putStreakState('user-1', state);

      expect(await repository.getStreakState('user-1')).toEqual(state);
    });

    it('maps a permission-denied code to a descriptive error', async () => {
      db.failNextOperation(firestoreError('denied', 'permission-denied'));

      await expect(repository.getStreakState('user-1')).rejects.toThrow(
        'Firestore Permission Denied (Admin SDK) while trying to load streak state. Original: denied'
      );
    });
  });

  describe('commitEntry', () => {
    it('stores the entry and the advanced streak together', async () => {
      jest.spyOn(Date, 'now').mockReturnValue(1_700_000_000_000);
      const entry = makeEntry('2024-03-01', { transitMiles: 10 });

      const result = await repository.commitEntry('user-1', entry, computeEmissions(entry), advanceTo('2024-03-01'));

      const streak = { currentStreak: 1, bestStreak: 1, lastLoggedDate: '2024-03-01', totalEntries: 1 };
      expect(result.replacedExisting).toBe(false);
      expect(result.streak).toEqual(streak);
      expect(db.documents.get(entryPath('2024-03-01'))).toEqual(result.record);
      expect(db.documents.get(streakPath())).toEqual({ ...streak, updatedAt: 1_700_000_000_000 });
    });

    it('treats an undecodable stored day as already logged', async () => {
      db.documents.set(entryPath('2024-03-01'), { userId: 'user-1', entry: { date: '2024-03-01' } });
      db.documents.set(streakPath(), { currentStreak: 1, bestStreak: 1, lastLoggedDate: '2024-03-01', totalEntries: 1 });
      const entry = makeEntry('2024-03-01', { plantServings: 3 });

      const result = await repository.commitEntry('user-1', entry, computeEmissions(entry), advanceTo('2024-03-01'));

      expect(result.replacedExisting).toBe(true);
      expect(result.streak.totalEntries).toBe(1);
      expect((await repository.getEntry('user-1', '2024-03-01'))?.entry.plantServings).toBe(3);
    });

    it('applies concurrent commits one after the other', async () => {
      const first = makeEntry('2024-03-01');
      const second = makeEntry('2024-03-02');

      await Promise.all([
        repository.commitEntry('user-1', first, computeEmissions(first), advanceTo('2024-03-01')),
        repository.commitEntry('user-1', second, computeEmissions(second), advanceTo('2024-03-02')),
      ]);

      expect(await repository.getStreakState('user-1')).toEqual({
        currentStreak: 2,
        bestStreak: 2,
        lastLoggedDate: '2024-03-02',
        totalEntries: 2,
      });
    });

    it('writes nothing when the transaction fails', async () => {
      db.failNextOperation(firestoreError('Transaction aborted', 10));
      const entry = makeEntry('2024-03-01');

      await expect(
        repository.commitEntry('user-1', entry, computeEmissions(entry), advanceTo('2024-03-01'))
      ).rejects.toThrow('Failed to save footprint entry for 2024-03-01: Transaction aborted');
      expect(db.documents.size).toBe(0);
    });
  });
});
