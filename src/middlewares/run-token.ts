/**
 * Run token header
 * Tasks calling back into the dev server send the local run identifier of the run
 * they belong to in X-Airplane-Token.
 */

import type { Request } from 'express';
import { parseLocalRunIdentifier } from '../env/token.js';
import { BadRequestError } from '../errors.js';

export const TOKEN_HEADER = 'x-airplane-token';

/** Run id carried by the request's token, or undefined when no token was sent. */
export function readRunIDFromRequest(req: Request): string | undefined {
  const token = req.header(TOKEN_HEADER)?.trim();
  if (!token) return undefined;
  const claims = parseLocalRunIdentifier(token);
  if (!claims) throw new BadRequestError('invalid airplane token');
  return claims.runID;
}

/** Same as readRunIDFromRequest, for routes that only make sense inside a run. */
export function requireRunIDFromRequest(req: Request): string {
  const runID = readRunIDFromRequest(req);
  if (!runID) throw new BadRequestError('expected a X-Airplane-Token header');
  return runID;
}
