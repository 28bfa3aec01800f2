/**
 * Dev config: a developer-local YAML file with config vars, env var overrides and resources.
 *
 *   configVars:
 *     API_BASE: http://localhost:8080
 *     DB_PASSWORD: { remote: true, isSecret: true, envSlug: prod }
 *   envVars:
 *     LOG_FORMAT: pretty
 *   resources:
 *     - id: res-db
 *       slug: db
 *       kind: postgres
 *       name: Local DB
 *       host: localhost
 */
import fs from 'node:fs';
import * as yaml from 'js-yaml';
import { z } from 'zod';
import { DevServerError } from './errors.js';
import { createLogger } from './logger.js';
import type { ConfigVar, JsonValue, Resource } from './types.js';

const log = createLogger('devconf');

const resourceSchema = z
  .object({
    id: z.string().optional(),
    slug: z.string().min(1),
    kind: z.string().min(1),
    name: z.string().optional(),
  })
  .catchall(z.custom<JsonValue>());

const scalar = z.union([z.string(), z.number(), z.boolean()]);

/** A literal value, or a reference to a config kept on the remote platform. */
const configVarSchema = z.union([
  scalar,
  z.object({
    value: scalar.optional(),
    isSecret: z.boolean().default(false),
    remote: z.boolean().default(false),
    envSlug: z.string().optional(),
  }),
]);

const devConfigSchema = z
  .object({
    configVars: z.record(z.string(), configVarSchema).default({}),
    envVars: z.record(z.string(), scalar).default({}),
    resources: z.array(resourceSchema).default([]),
  })
  .default({});

export interface DevConfig {
  path: string;
  configVars: Record<string, ConfigVar>;
  envVars: Record<string, string>;
  /** slug -> resource */
  resources: Record<string, Resource>;
}

export function emptyDevConfig(path = ''): DevConfig {
  return { path, configVars: {}, envVars: {}, resources: {} };
}

/** Parses dev config YAML. An empty document is an empty config. */
export function parseDevConfig(text: string, path = ''): DevConfig {
  let raw: unknown;
  try {
    raw = yaml.load(text);
  } catch (err) {
    throw new DevServerError(`parsing dev config ${path}`, { cause: err });
  }
  const parsed = devConfigSchema.safeParse(raw ?? undefined);
  if (!parsed.success) {
    throw new DevServerError(`invalid dev config ${path}: ${parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')}`);
  }

  const cfg = emptyDevConfig(path);
  for (const [name, cv] of Object.entries(parsed.data.configVars)) {
    cfg.configVars[name] =
      typeof cv === 'object'
        ? { name, value: cv.value === undefined ? '' : String(cv.value), isSecret: cv.isSecret, remote: cv.remote, envSlug: cv.envSlug }
        : { name, value: String(cv), isSecret: false, remote: false };
  }
  for (const [name, value] of Object.entries(parsed.data.envVars)) {
    cfg.envVars[name] = String(value);
  }
  for (const res of parsed.data.resources) {
    cfg.resources[res.slug] = { ...res, id: res.id ?? res.slug, name: res.name ?? res.slug };
  }
  return cfg;
}

/** Loads the dev config; a missing file yields an empty config. */
export function loadDevConfig(path: string): DevConfig {
  if (!fs.existsSync(path)) {
    log.debug(`no dev config at ${path}`);
    return emptyDevConfig(path);
  }
  const cfg = parseDevConfig(fs.readFileSync(path, 'utf8'), path);
  log.info(
    `loaded dev config ${path} (${Object.keys(cfg.configVars).length} configs, ${Object.keys(cfg.resources).length} resources)`
  );
  return cfg;
}
