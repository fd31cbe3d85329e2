// src/core/firebase/debugUtils.ts
import { config } from "@/config";

type DebugDetails = Record<string, unknown>;

function log(operation: "read" | "write", path: string, request: unknown, details: DebugDetails) {
  if (!config.firebaseAdmin.debug) return;
  console.log(`[firestore:${operation}] ${path}`, { request, ...details });
}

/** Traces Firestore traffic when FIREBASE_DEBUG=true. */
export const firebaseDebug = {
  logRead(path: string, query: unknown, details: DebugDetails = {}) {
    log("read", path, query, details);
  },
  logWrite(path: string, data: unknown, details: DebugDetails = {}) {
    log("write", path, data, details);
  },
};
