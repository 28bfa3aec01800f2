/**
 * Local run identifier.
 *
 * Shaped like a JWT so the task SDKs accept it, but unsigned (`alg: none`).
 * It only tells the dev server which run a request came from; it is NOT a credential.
 */
import { z } from 'zod';

export interface LocalRunClaims {
  runID: string;
}

const HEADER = { alg: 'none', typ: 'JWT' } as const;

const claimsSchema = z.object({ runID: z.string() });

function encodeSegment(value: unknown): string {
  return Buffer.from(JSON.stringify(value), 'utf8').toString('base64url');
}

export function createLocalRunIdentifier(claims: LocalRunClaims): string {
  return `${encodeSegment(HEADER)}.${encodeSegment({ runID: claims.runID, iat: Math.floor(Date.now() / 1000) })}.`;
}

/** Decodes the claims without any verification. Returns null for anything that is not such a token. */
export function parseLocalRunIdentifier(token: string): LocalRunClaims | null {
  const parts = token.split('.');
  if (parts.length !== 3) return null;
  try {
    const payload: unknown = JSON.parse(Buffer.from(parts[1], 'base64url').toString('utf8'));
    const parsed = claimsSchema.safeParse(payload);
    return parsed.success ? { runID: parsed.data.runID } : null;
  } catch {
    return null;
  }
}
