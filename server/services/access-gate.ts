/**
 * JIE Mastery AI Tutor Platform
 * Copyright (c) 2025 JIE Mastery AI, Inc.
 * All Rights Reserved.
 * 
 * This source code is confidential and proprietary.
 * Unauthorized copying, modification, or distribution is strictly prohibited.
 */

/**
 * Access Gate
 *
 * Verifies HS256 bearer tokens issued by the learning platform and resolves
 * the caller's role. Admin role comes only from the configured email
 * allow-list; any role claim inside the token is ignored.
 */

import crypto from 'crypto';
import { z } from 'zod';
import { AuthError, AuthorizationError } from '../errors';

export type Role = 'student' | 'admin';

export interface Identity {
  studentId: string;
  role: Role;
  email: string | null;
  name: string | null;
}

const headerSchema = z.object({
  alg: z.literal('HS256'),
  typ: z.string().optional(),
});

const claimsSchema = z.object({
  student_id: z.union([z.string().min(1), z.number()]).transform(String).optional(),
  sub: z.string().min(1).optional(),
  email: z.string().optional(),
  name: z.string().optional(),
  exp: z.number(),
  iat: z.number().optional(),
  nbf: z.number().optional(),
  jti: z.string().optional(),
});

export interface AccessGateOptions {
  secret: string;
  adminEmails: string[];
  clockSkewSeconds?: number;
  cacheSize?: number;
  now?: () => number;
}

interface CachedVerification {
  identity: Identity;
  expiresAtMs: number;
  jti?: string;
}

const SEGMENT = /^[A-Za-z0-9_-]+$/;
// Width of the student_id columns
const MAX_STUDENT_ID_LENGTH = 255;

function decodeSegment(segment: string): unknown {
  try {
    return JSON.parse(Buffer.from(segment, 'base64url').toString('utf8'));
  } catch {
    throw new AuthError('Malformed token');
  }
}

export class AccessGate {
  private readonly secret: string;
  private readonly adminEmails: Set<string>;
  private readonly clockSkewMs: number;
  private readonly cacheSize: number;
  private readonly now: () => number;
  private readonly cache = new Map<string, CachedVerification>();
  private readonly revoked = new Map<string, number>();

  constructor(options: AccessGateOptions) {
    if (!options.secret) throw new Error('AccessGate requires a verification secret');
    this.secret = options.secret;
    this.adminEmails = new Set(options.adminEmails.map((email) => email.trim().toLowerCase()));
    this.clockSkewMs = (options.clockSkewSeconds ?? 30) * 1000;
    this.cacheSize = options.cacheSize ?? 1000;
    this.now = options.now ?? Date.now;
  }

  /** Revocations still in force or not yet pruned. */
  get revokedCount(): number {
    return this.revoked.size;
  }

  isAdminEmail(email: string | null | undefined): boolean {
    return !!email && this.adminEmails.has(email.trim().toLowerCase());
  }

  /**
   * Accepts a raw token or an Authorization header value ("Bearer <token>").
   */
  authenticate(credential: string | null | undefined): Identity {
    if (!credential || !credential.trim()) {
      throw new AuthError('No token provided');
    }
    const token = credential.startsWith('Bearer ') ? credential.slice(7).trim() : credential.trim();
    const now = this.now();
    const cacheKey = crypto.createHash('sha256').update(token).digest('hex');

    const cached = this.cache.get(cacheKey);
    if (cached) {
      if (cached.expiresAtMs > now && !this.isRevoked(cached.jti, now)) {
        return cached.identity;
      }
      this.cache.delete(cacheKey);
    }

    const { identity, expiresAtMs, jti } = this.verify(token, now);
    this.remember(cacheKey, { identity, expiresAtMs, jti });
    return identity;
  }

  /** Rejects a token id until its natural expiry. */
  revoke(jti: string, expiresAt: Date): void {
    const now = this.now();
    for (const [id, until] of this.revoked) {
      if (until <= now) this.revoked.delete(id);
    }
    this.revoked.set(jti, expiresAt.getTime());
    for (const [key, entry] of this.cache) {
      if (entry.jti === jti) this.cache.delete(key);
    }
    console.log(`[AccessGate] Token ${jti.substring(0, 8)}... revoked`);
  }

  requireAdmin(identity: Identity): void {
    if (identity.role !== 'admin') {
      throw new AuthorizationError('Admin access required');
    }
  }

  requireSelfOrAdmin(identity: Identity, studentId: string): void {
    if (identity.role !== 'admin' && identity.studentId !== studentId) {
      throw new AuthorizationError("Cannot access another student's data");
    }
  }

  private verify(token: string, now: number): CachedVerification {
    const parts = token.split('.');
    if (parts.length !== 3 || !parts.every((part) => SEGMENT.test(part))) {
      throw new AuthError('Malformed token');
    }
    const [encodedHeader, encodedPayload, encodedSignature] = parts;

    const header = headerSchema.safeParse(decodeSegment(encodedHeader));
    if (!header.success) {
      throw new AuthError('Unsupported token algorithm');
    }

    const expected = crypto
      .createHmac('sha256', this.secret)
      .update(`${encodedHeader}.${encodedPayload}`)
      .digest();
    const provided = Buffer.from(encodedSignature, 'base64url');
    if (provided.length !== expected.length || !crypto.timingSafeEqual(provided, expected)) {
      throw new AuthError('Invalid token signature');
    }

    const claims = claimsSchema.safeParse(decodeSegment(encodedPayload));
    if (!claims.success) {
      throw new AuthError('Malformed token claims');
    }
    const { exp, nbf, iat, jti, email, name } = claims.data;
    const studentId = claims.data.student_id ?? claims.data.sub;
    if (!studentId) {
      throw new AuthError('Token has no subject');
    }
    if (studentId.length > MAX_STUDENT_ID_LENGTH) {
      throw new AuthError('Token subject too long');
    }

    const expiresAtMs = exp * 1000;
    if (expiresAtMs <= now) {
      throw new AuthError('Token expired');
    }
    const notBefore = Math.max(nbf ?? 0, iat ?? 0) * 1000;
    if (notBefore - this.clockSkewMs > now) {
      throw new AuthError('Token not yet valid');
    }
    if (this.isRevoked(jti, now)) {
      throw new AuthError('Token revoked');
    }

    const identity: Identity = {
      studentId,
      role: this.isAdminEmail(email) ? 'admin' : 'student',
      email: email ?? null,
      name: name ?? null,
    };
    return { identity, expiresAtMs, jti };
  }

  private isRevoked(jti: string | undefined, now: number): boolean {
    if (!jti) return false;
    const until = this.revoked.get(jti);
    if (until === undefined) return false;
    if (until <= now) {
      this.revoked.delete(jti);
      return false;
    }
    return true;
  }

  private remember(key: string, entry: CachedVerification): void {
    if (this.cache.size >= this.cacheSize) {
      const oldest = this.cache.keys().next();
      if (!oldest.done) this.cache.delete(oldest.value);
    }
    this.cache.set(key, entry);
  }
}
