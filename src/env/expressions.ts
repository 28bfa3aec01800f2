/**
 * Server-side template interpolation of `{{ }}` expressions. One base request is built
 * per run and reused for env vars, resources and kind options.
 */
import { z } from 'zod';
import type { RemoteClient } from '../api/remote-client.js';
import { EnvResolutionError, RemoteApiError } from '../errors.js';
import type { Env, EvaluateTemplateRequest, JsonValue, ParamValues, Resource } from '../types.js';

/** The single environment local runs execute in. */
export const STUDIO_ENV_ID = 'studio';

export function newLocalEnv(): Env {
  return { id: STUDIO_ENV_ID, slug: STUDIO_ENV_ID, name: STUDIO_ENV_ID, isDefault: true };
}

export interface BaseRequestInput {
  runID: string;
  parentRunID?: string;
  taskSlug: string;
  paramValues: ParamValues;
  configs: Record<string, string>;
  resources?: Record<string, Resource>;
}

export function baseEvaluateTemplateRequest(input: BaseRequestInput): EvaluateTemplateRequest {
  const req: EvaluateTemplateRequest = {
    runID: input.runID,
    env: newLocalEnv(),
    configs: input.configs,
    paramValues: input.paramValues,
    // Locally a task has no id of its own.
    taskID: input.runID,
    taskSlug: input.taskSlug,
  };
  if (input.parentRunID) req.parentRunID = input.parentRunID;
  if (input.resources) req.resources = input.resources;
  return req;
}

export async function interpolate(
  client: RemoteClient,
  base: EvaluateTemplateRequest,
  strict: boolean,
  value: unknown,
  signal?: AbortSignal
): Promise<unknown> {
  try {
    const resp = await client.evaluateTemplate(
      {
        value,
        runID: base.runID,
        env: base.env,
        resources: base.resources,
        configs: base.configs,
        paramValues: base.paramValues,
        disableStrictMode: !strict,
      },
      signal
    );
    return resp.value;
  } catch (err) {
    if (err instanceof RemoteApiError) {
      throw new EnvResolutionError(err.message, { cause: err });
    }
    throw err;
  }
}

/** Whether a value contains any `{{ }}` template to evaluate. */
export function needsInterpolation(value: unknown): boolean {
  if (typeof value === 'string') return value.includes('{{');
  if (Array.isArray(value)) return value.some(needsInterpolation);
  if (typeof value === 'object' && value !== null) return Object.values(value).some(needsInterpolation);
  return false;
}

const stringMapSchema = z.record(z.string(), z.unknown());

/** Interpolates an env var map; values come back as strings. */
export async function interpolateEnvVars(
  client: RemoteClient,
  base: EvaluateTemplateRequest,
  envVars: Record<string, string>,
  signal?: AbortSignal
): Promise<Record<string, string>> {
  const result = await interpolate(client, base, true, envVars, signal);
  const parsed = stringMapSchema.safeParse(result);
  if (!parsed.success) {
    throw new EnvResolutionError('expected map of env vars (key=value pairs) after interpolation');
  }
  const out: Record<string, string> = {};
  for (const [k, v] of Object.entries(parsed.data)) {
    out[k] = typeof v === 'string' ? v : JSON.stringify(v);
  }
  return out;
}

const resourceSchema = z
  .object({ id: z.string(), slug: z.string(), kind: z.string(), name: z.string() })
  .catchall(z.custom<JsonValue>());

/** Interpolates resource fields (non-strict), keeping each resource's identity fields. */
export async function interpolateResources(
  client: RemoteClient,
  base: EvaluateTemplateRequest,
  resources: Record<string, Resource>,
  signal?: AbortSignal
): Promise<Record<string, Resource>> {
  if (Object.keys(resources).length === 0) return {};
  const result = await interpolate(client, base, false, resources, signal);
  const parsed = z.record(z.string(), resourceSchema).safeParse(result);
  if (!parsed.success) {
    throw new EnvResolutionError('expected a map of resources after interpolation', { cause: parsed.error });
  }
  const out: Record<string, Resource> = {};
  for (const [slug, res] of Object.entries(parsed.data)) {
    if (!(slug in resources)) {
      throw new EnvResolutionError(`resource ${slug} not found`);
    }
    out[slug] = res;
  }
  return out;
}
