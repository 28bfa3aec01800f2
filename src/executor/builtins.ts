/**
 * Builtins are platform-implemented tasks (SQL queries, REST requests, ...) that run
 * through a separately installed binary taking one JSON request argument.
 */
import fs from 'node:fs';
import { DevServerError } from '../errors.js';
import type { ParamValues, StdAPIRequest } from '../types.js';
import type { PreparedCommand } from './runtimes.js';

const BUILTIN_SLUG = /^airplane:([a-z0-9]+)_([a-z0-9_]+)$/;

export function isBuiltinSlug(slug: string): boolean {
  return slug.startsWith('airplane:');
}

/** `airplane:sql_query` → `{namespace: 'sql', name: 'query'}`. */
export function builtinRequest(slug: string, paramValues: ParamValues): StdAPIRequest {
  const m = BUILTIN_SLUG.exec(slug);
  if (!m) throw new DevServerError(`invalid builtin slug ${slug}`, { statusCode: 400 });
  return { namespace: m[1], name: m[2], request: paramValues };
}

export interface BuiltinClient {
  prepareRun(req: StdAPIRequest): PreparedCommand;
}

/** Runs builtins through a locally installed binary. */
export class BinaryBuiltinClient implements BuiltinClient {
  constructor(private readonly binaryPath: string | undefined, private readonly cwd = process.cwd()) {}

  prepareRun(req: StdAPIRequest): PreparedCommand {
    if (!this.binaryPath) {
      throw new DevServerError('builtins are not available locally: set DEV_BUILTINS_BINARY to the builtins binary');
    }
    if (!fs.existsSync(this.binaryPath)) {
      throw new DevServerError(`builtins binary not found at ${this.binaryPath}`);
    }
    return { command: this.binaryPath, args: [JSON.stringify(req)], cwd: this.cwd };
  }
}
