// src/config/index.ts
const parsePositiveInt = (value: string | undefined, fallback: number): number => {
  const parsed = Number.parseInt(value ?? "", 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
};

export const config = {
  firebaseAdmin: {
    projectId: process.env.FIREBASE_ADMIN_PROJECT_ID,
    privateKey: process.env.FIREBASE_ADMIN_PRIVATE_KEY?.replace(/\\n/g, "\n"),
    clientEmail: process.env.FIREBASE_ADMIN_CLIENT_EMAIL,
    debug: process.env.FIREBASE_DEBUG === "true",
  },
  footprint: {
    usersCollection: "users",
    entriesSubcollection: "footprintEntries",
    streaksCollection: "footprintStreaks",
    // Default window for summaries and the dashboard
    historyWindowDays: parsePositiveInt(process.env.FOOTPRINT_HISTORY_WINDOW_DAYS, 30),
    // Lets the client tell the API which calendar day it is where the user is
    localDateHeader: "X-Local-Date",
    // Timezones put a user's day at most one calendar day from the server's
    localDateToleranceDays: 1,
  },
};
