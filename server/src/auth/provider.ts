// ============================================================
// Vibe Studio - Identity Provider
// In-memory sign-up / sign-in with scrypt password hashes
// ============================================================

import { randomBytes, randomUUID, scryptSync, timingSafeEqual } from 'node:crypto';
import type { UserIdentity } from '@shared/types';

export interface SignUpInput {
  name: string;
  email: string;
  password: string;
}

export interface IdentityProvider {
  signUp(input: SignUpInput): Promise<UserIdentity>;
  signIn(email: string, password: string): Promise<UserIdentity>;
}

export type AuthErrorCode = 'EMAIL_TAKEN' | 'INVALID_CREDENTIALS';

export class AuthError extends Error {
  readonly code: AuthErrorCode;

  constructor(message: string, code: AuthErrorCode) {
    super(message);
    this.name = 'AuthError';
    this.code = code;
  }
}

interface StoredUser {
  identity: UserIdentity;
  salt: string;
  passwordHash: string;
}

const KEY_LENGTH = 64;

/**
 * Keeps accounts in a Map keyed by normalized email. Lost on restart.
 */
export class InMemoryIdentityProvider implements IdentityProvider {
  private readonly users = new Map<string, StoredUser>();

  async signUp(input: SignUpInput): Promise<UserIdentity> {
    const email = normalizeEmail(input.email);
    if (this.users.has(email)) {
      throw new AuthError(`An account for ${email} already exists`, 'EMAIL_TAKEN');
    }

    const salt = randomBytes(16).toString('hex');
    const identity: UserIdentity = { id: randomUUID(), email, name: input.name.trim() };
    this.users.set(email, { identity, salt, passwordHash: hashPassword(input.password, salt) });

    console.log(`[auth] Registered ${email}`);
    return { ...identity };
  }

  async signIn(email: string, password: string): Promise<UserIdentity> {
    const user = this.users.get(normalizeEmail(email));
    if (!user || !verifyPassword(password, user.salt, user.passwordHash)) {
      throw new AuthError('Invalid email or password', 'INVALID_CREDENTIALS');
    }
    return { ...user.identity };
  }
}

function normalizeEmail(email: string): string {
  return email.trim().toLowerCase();
}

function hashPassword(password: string, salt: string): string {
  return scryptSync(password, salt, KEY_LENGTH).toString('hex');
}

function verifyPassword(password: string, salt: string, expectedHash: string): boolean {
  const actual = Buffer.from(hashPassword(password, salt), 'hex');
  const expected = Buffer.from(expectedHash, 'hex');
  return actual.length === expected.length && timingSafeEqual(actual, expected);
}
