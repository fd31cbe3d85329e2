// src/lib/firebaseAdmin.ts
import admin from 'firebase-admin';
import { config } from '@/config';

// Credentials come from FIREBASE_ADMIN_PROJECT_ID / FIREBASE_ADMIN_PRIVATE_KEY /
// FIREBASE_ADMIN_CLIENT_EMAIL, or from GOOGLE_APPLICATION_CREDENTIALS when the key is unset.

try {
  if (!admin.apps.length) {
    const { projectId, privateKey, clientEmail } = config.firebaseAdmin;
    const credential = privateKey
      ? admin.credential.cert({ projectId, privateKey, clientEmail })
      : admin.credential.applicationDefault();

    admin.initializeApp({ credential });
    console.log('Firebase Admin SDK initialized successfully.');
  }
} catch (error: unknown) {
  if (error instanceof Error) {
    console.error('Firebase Admin SDK initialization error:', error.stack);
  } else {
    console.error('Firebase Admin SDK initialization error (unknown type):', error);
  }
}

export const firebaseAdminAuth = admin.apps.length ? admin.auth() : null; // Can be null
export const firebaseAdminDb = admin.apps.length ? admin.firestore() : null; // Can be null
