// src/utils/serverAuth.ts
import { NextRequest, NextResponse } from 'next/server';
import { firebaseAdminAuth } from '@/lib/firebaseAdmin'; // Import initialized admin auth
import { DecodedIdToken } from 'firebase-admin/auth';

export class AuthError extends Error {
  status: number;
  constructor(message: string, status: number = 401) {
    super(message);
    this.name = 'AuthError';
    this.status = status;
  }
}

/**
 * Verifies the Firebase ID token from the Authorization header.
 * @returns The decoded ID token (its `uid` identifies the user).
 * @throws AuthError if the token is missing, invalid, or expired.
 */
export async function verifyAuth(req: NextRequest): Promise<DecodedIdToken> {
  const authorization = req.headers.get('Authorization');
  if (!authorization?.startsWith('Bearer ')) {
    throw new AuthError('Missing or invalid Authorization header', 401);
  }

  const idToken = authorization.slice('Bearer '.length).trim();
  if (!idToken) {
    throw new AuthError('Missing token in Authorization header', 401);
  }

  if (!firebaseAdminAuth) {
    console.error('verifyAuth Error: Firebase Admin Auth is not available.');
    throw new AuthError('Authentication service temporarily unavailable.', 503);
  }

  try {
    return await firebaseAdminAuth.verifyIdToken(idToken);
  } catch (error: unknown) {
    let errorCode: string | undefined;
    let internalErrorMessage = 'Authentication error';

    if (typeof error === 'object' && error !== null) {
      if ('code' in error && typeof error.code === 'string') {
        errorCode = error.code;
      }
      if ('message' in error && typeof error.message === 'string') {
        internalErrorMessage = error.message;
      }
    }

    // Full detail stays in the server log; the client gets a sanitized message
    console.error('Firebase token verification error:', errorCode, internalErrorMessage);

    if (errorCode === 'auth/id-token-expired') {
      throw new AuthError('Token expired. Please sign in again.', 401);
    }
    if (errorCode === 'auth/argument-error' || internalErrorMessage.includes('invalid signature')) {
      throw new AuthError('Invalid token format.', 401);
    }
    if (internalErrorMessage.includes('credential') || internalErrorMessage.includes('private_key')) {
      throw new AuthError('Authentication configuration error.', 500);
    }
    throw new AuthError('Authentication failed. Please try again later.', 403);
  }
}

export function handleAuthError(error: unknown): NextResponse {
  if (error instanceof AuthError) {
    return NextResponse.json({ error: error.message }, { status: error.status });
  }
  console.error("Unexpected error during auth handling:", error);
  return NextResponse.json({ error: 'Internal Server Error during authentication' }, { status: 500 });
}
