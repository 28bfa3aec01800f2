/**
 * Environment resolution for local runs and views.
 *
 * Precedence, later wins: task-declared -> .env / airplane.env files -> dev config
 * -> materialized configs -> template interpolation. Built-in AIRPLANE_* variables
 * are appended last.
 */
import type { RemoteClient } from '../api/remote-client.js';
import { EnvResolutionError, errorMessage } from '../errors.js';
import { createLogger } from '../logger.js';
import type { AuthInfo, ConfigVar, EvaluateTemplateRequest, Resource, TaskEnv } from '../types.js';
import { getDotEnvEnvVars } from './dotenv.js';
import { STUDIO_ENV_ID, interpolateEnvVars, needsInterpolation } from './expressions.js';
import { createLocalRunIdentifier } from './token.js';

const log = createLogger('envvars');

/** System variables passed through to task processes. */
const ALLOWED_SYSTEM_ENV_VARS = new Set(['HOME', 'PATH']);

/** Where dotenv files are looked up; absent for builtins and views. */
export interface DotEnvSource {
  runtimeRoot: string;
  entrypoint: string;
}

export interface TaskEnvContext {
  runID: string;
  parentRunID?: string;
  slug: string;
  name: string;
  taskEnvVars: TaskEnv;
  devConfigEnvVars: Record<string, string>;
  configVars: Record<string, ConfigVar>;
  fallbackEnvSlug?: string;
  authInfo: AuthInfo;
  /** Base URL of this dev server, handed to tasks as AIRPLANE_API_HOST. */
  apiHost: string;
  studioURL: string;
  tunnelToken?: string;
  /** alias -> resource */
  aliasToResource: Record<string, Resource>;
  remoteClient: RemoteClient;
  signal?: AbortSignal;
}

export interface ViewEnvContext {
  viewEnvVars: TaskEnv;
  devConfigEnvVars: Record<string, string>;
  configVars: Record<string, ConfigVar>;
  fallbackEnvSlug?: string;
  authInfo: AuthInfo;
  slug: string;
  name: string;
  viewURL: string;
  apiHeaders?: Record<string, string>;
  signal?: AbortSignal;
}

/** Steps 1-3: declared entries overlaid by dotenv files (tasks only) and the dev config. */
export function applyEnvVarFileOverrides(
  declared: TaskEnv,
  devConfigEnvVars: Record<string, string>,
  dotenvSource?: DotEnvSource
): TaskEnv {
  const envVars: TaskEnv = { ...declared };

  if (dotenvSource) {
    const fromFiles = getDotEnvEnvVars(dotenvSource.runtimeRoot, dotenvSource.entrypoint);
    for (const [k, value] of Object.entries(fromFiles)) envVars[k] = { value };
  }

  for (const [k, value] of Object.entries(devConfigEnvVars)) envVars[k] = { value };

  return envVars;
}

/** Step 4: config references become values. Remote secrets are fetched decrypted. */
export async function materializeEnvVars(
  client: RemoteClient,
  entries: TaskEnv,
  configVars: Record<string, ConfigVar>,
  fallbackEnvSlug?: string,
  signal?: AbortSignal
): Promise<Record<string, string>> {
  const out: Record<string, string> = {};
  for (const [key, entry] of Object.entries(entries)) {
    if (entry.value !== undefined) {
      out[key] = entry.value;
      continue;
    }
    if (entry.config === undefined) continue;

    const configVar = Object.prototype.hasOwnProperty.call(configVars, entry.config)
      ? configVars[entry.config]
      : undefined;
    if (!configVar) {
      let msg = `Config var ${entry.config} not defined in the dev config`;
      if (fallbackEnvSlug) msg += ` or remotely in env ${fallbackEnvSlug}`;
      msg += ` (referenced by env var ${key}).`;
      throw new EnvResolutionError(msg);
    }
    out[key] = await getConfigValue(client, configVar, key, signal);
  }
  return out;
}

export async function getConfigValue(
  client: RemoteClient,
  configVar: ConfigVar,
  envVarKey: string,
  signal?: AbortSignal
): Promise<string> {
  if (!(configVar.remote && configVar.isSecret)) return configVar.value;
  try {
    const resp = await client.getConfig({ name: configVar.name, envSlug: configVar.envSlug, decrypt: true }, signal);
    return resp.config.value;
  } catch (err) {
    throw new EnvResolutionError(
      `decrypting config ${configVar.name} (referenced by env var ${envVarKey}): ${errorMessage(err)}`,
      { cause: err }
    );
  }
}

/** Env for a task process as KEY=VALUE strings. Builtins only get system and built-in variables. */
export async function getEnvVars(
  ctx: TaskEnvContext,
  dotenvSource: DotEnvSource | undefined,
  baseRequest: EvaluateTemplateRequest,
  isBuiltin = false
): Promise<string[]> {
  const env = filteredSystemEnvVars();

  if (!isBuiltin) {
    const entries = applyEnvVarFileOverrides(ctx.taskEnvVars, ctx.devConfigEnvVars, dotenvSource);
    const materialized = await materializeEnvVars(
      ctx.remoteClient,
      entries,
      ctx.configVars,
      ctx.fallbackEnvSlug,
      ctx.signal
    );
    const interpolated = needsInterpolation(materialized)
      ? await interpolateEnvVars(ctx.remoteClient, baseRequest, materialized, ctx.signal)
      : materialized;
    for (const [k, v] of Object.entries(interpolated)) env.push(`${k}=${v}`);
  }

  env.push(...getBuiltInTaskEnvVars(ctx));
  return env;
}

/** Env for a view. Views read no dotenv files and skip interpolation. */
export async function getEnvVarsForView(client: RemoteClient, ctx: ViewEnvContext): Promise<Record<string, string>> {
  const entries = applyEnvVarFileOverrides(ctx.viewEnvVars, ctx.devConfigEnvVars);
  const materialized = await materializeEnvVars(client, entries, ctx.configVars, ctx.fallbackEnvSlug, ctx.signal);
  return { ...materialized, ...getBuiltInViewEnvVars(ctx) };
}

export function getBuiltInTaskEnvVars(ctx: TaskEnvContext): string[] {
  const user = ctx.authInfo.user;
  const studio = ctx.studioURL.replace(/\/$/, '');
  const vars: Record<string, string> = {
    AIRPLANE_API_HOST: ctx.apiHost,
    AIRPLANE_RESOURCES_VERSION: '2',
    AIRPLANE_RUN_ID: ctx.runID,
    AIRPLANE_PARENT_RUN_ID: ctx.parentRunID ?? '',
    AIRPLANE_RUNNER_EMAIL: user?.email ?? '',
    AIRPLANE_RUNNER_ID: user?.id ?? '',
    AIRPLANE_RUNTIME: 'dev',
    // Locally the slug doubles as the task id.
    AIRPLANE_TASK_ID: ctx.slug,
    AIRPLANE_TASK_SLUG: ctx.slug,
    AIRPLANE_TASK_NAME: ctx.name,
    AIRPLANE_TEAM_ID: ctx.authInfo.team?.id ?? '',
    AIRPLANE_RUNNER_NAME: user?.name ?? '',
    AIRPLANE_TASK_URL: `${studio}/task/${ctx.slug}`,
    AIRPLANE_RUN_URL: `${studio}/runs/${ctx.runID}`,
    ...getCommonEnvVars(),
    AIRPLANE_TOKEN: createLocalRunIdentifier({ runID: ctx.runID }),
    AIRPLANE_RESOURCES: JSON.stringify(ctx.aliasToResource),
  };
  if (ctx.tunnelToken) vars.AIRPLANE_TUNNEL_TOKEN = ctx.tunnelToken;
  return Object.entries(vars).map(([k, v]) => `${k}=${v}`);
}

export function getBuiltInViewEnvVars(ctx: ViewEnvContext): Record<string, string> {
  const user = ctx.authInfo.user;
  const env: Record<string, string> = {
    AIRPLANE_USER_EMAIL: user?.email ?? '',
    AIRPLANE_USER_ID: user?.id ?? '',
    AIRPLANE_USER_NAME: user?.name ?? '',
    AIRPLANE_VIEW_ID: ctx.slug,
    AIRPLANE_VIEW_SLUG: ctx.slug,
    AIRPLANE_VIEW_NAME: ctx.name,
    AIRPLANE_VIEW_URL: ctx.viewURL,
    AIRPLANE_TEAM_ID: ctx.authInfo.team?.id ?? '',
  };
  if (ctx.apiHeaders && Object.keys(ctx.apiHeaders).length > 0) {
    env.AIRPLANE_API_HEADERS = JSON.stringify(ctx.apiHeaders);
  }
  return { ...env, ...getCommonEnvVars() };
}

/** Shared by tasks and views: local dev has exactly one env. */
export function getCommonEnvVars(): Record<string, string> {
  return {
    AIRPLANE_ENV_ID: STUDIO_ENV_ID,
    AIRPLANE_ENV_SLUG: STUDIO_ENV_ID,
    AIRPLANE_ENV_NAME: STUDIO_ENV_ID,
    AIRPLANE_ENV_IS_DEFAULT: 'true',
  };
}

export function filteredSystemEnvVars(source: NodeJS.ProcessEnv = process.env): string[] {
  const out: string[] = [];
  for (const [k, v] of Object.entries(source)) {
    if (v !== undefined && ALLOWED_SYSTEM_ENV_VARS.has(k)) out.push(`${k}=${v}`);
  }
  return out;
}

/** KEY=VALUE list to an env object for child_process; later entries win. */
export function envListToRecord(list: readonly string[]): Record<string, string> {
  const env: Record<string, string> = {};
  for (const entry of list) {
    const i = entry.indexOf('=');
    if (i <= 0) {
      log.debug(`skipping malformed env entry ${entry}`);
      continue;
    }
    env[entry.slice(0, i)] = entry.slice(i + 1);
  }
  return env;
}
