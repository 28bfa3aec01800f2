/**
 * Server configuration from process.env, validated once at startup.
 */
import path from 'node:path';
import { z } from 'zod';

const optionalString = z
  .string()
  .optional()
  .transform((v) => (v && v.trim() ? v.trim() : undefined));

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(4000),
  HOST: z.string().default('127.0.0.1'),
  DEV_API_HOST: z.string().default('api.airplane.dev'),
  DEV_API_KEY: optionalString,
  DEV_TEAM_ID: optionalString,
  DEV_ENV_SLUG: optionalString,
  DEV_CONFIG_PATH: z.string().default('airplane.dev.yaml'),
  DEV_TASKS_MANIFEST: z.string().default('tasks.manifest.json'),
  DEV_STUDIO_URL: optionalString,
  DEV_TUNNEL_TOKEN: optionalString,
  DEV_BUILTINS_BINARY: optionalString,
  DEV_KILL_GRACE_MS: z.coerce.number().int().nonnegative().default(5000),
  DEV_OUTPUT_LINE_MAX_BYTES: z.coerce.number().int().nonnegative().default(0),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
});

export interface ServerConfig {
  port: number;
  host: string;
  remote: { host: string; apiKey?: string; teamID?: string };
  /** Remote env that config vars missing locally are looked up in. */
  envSlug?: string;
  devConfigPath: string;
  tasksManifestPath: string;
  studioURL?: string;
  tunnelToken?: string;
  builtinsBinary?: string;
  killGracePeriodMs: number;
  outputLineMaxBytes: number;
  nodeEnv: 'development' | 'production' | 'test';
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env, cwd = process.cwd()): ServerConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`Invalid configuration: ${details}`);
  }
  const e = parsed.data;
  return {
    port: e.PORT,
    host: e.HOST,
    remote: { host: e.DEV_API_HOST, apiKey: e.DEV_API_KEY, teamID: e.DEV_TEAM_ID },
    envSlug: e.DEV_ENV_SLUG,
    devConfigPath: path.resolve(cwd, e.DEV_CONFIG_PATH),
    tasksManifestPath: path.resolve(cwd, e.DEV_TASKS_MANIFEST),
    studioURL: e.DEV_STUDIO_URL,
    tunnelToken: e.DEV_TUNNEL_TOKEN,
    builtinsBinary: e.DEV_BUILTINS_BINARY,
    killGracePeriodMs: e.DEV_KILL_GRACE_MS,
    outputLineMaxBytes: e.DEV_OUTPUT_LINE_MAX_BYTES,
    nodeEnv: e.NODE_ENV,
  };
}
