import fs from 'node:fs';
import path from 'node:path';
import dotenv from 'dotenv';
import { EnvResolutionError } from '../errors.js';
import { createLogger } from '../logger.js';

const log = createLogger('dotenv');

const DOTENV_FILES = ['.env', 'airplane.env'] as const;

/** Directories from `root` down to the directory holding `entrypoint`, both inclusive. */
export function dirsFromRoot(root: string, entrypoint: string): string[] {
  const stop = path.dirname(path.resolve(root));
  const dirs: string[] = [];
  let dir = path.dirname(path.resolve(entrypoint));
  while (dir !== stop) {
    dirs.unshift(dir);
    const parent = path.dirname(dir);
    if (parent === dir) break; // entrypoint is not under root
    dir = parent;
  }
  return dirs;
}

/**
 * Reads `.env` files in every directory between the runtime root and the entrypoint,
 * then `airplane.env` files in the same order. Later files override earlier ones.
 */
export function getDotEnvEnvVars(runtimeRoot: string, entrypoint: string): Record<string, string> {
  const dirs = dirsFromRoot(runtimeRoot, entrypoint);
  const env: Record<string, string> = {};

  for (const file of DOTENV_FILES) {
    for (const dir of dirs) {
      const fp = path.join(dir, file);
      if (!fs.existsSync(fp)) continue;
      log.debug(`Loading env vars from ${fp}`);
      try {
        Object.assign(env, dotenv.parse(fs.readFileSync(fp)));
      } catch (err) {
        throw new EnvResolutionError(`reading ${fp}`, { cause: err });
      }
    }
  }
  return env;
}
