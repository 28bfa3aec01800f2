/**
 * Client for the remote platform API: template evaluation, config lookup and env lookup.
 * Responses are validated with zod before they reach the pipeline.
 */
import { z } from 'zod';
import { RemoteApiError } from '../errors.js';
import type {
  Env,
  EvaluateTemplateRequest,
  EvaluateTemplateResponse,
  GetConfigRequest,
  GetConfigResponse,
} from '../types.js';

export interface RemoteClient {
  evaluateTemplate(req: EvaluateTemplateRequest, signal?: AbortSignal): Promise<EvaluateTemplateResponse>;
  getConfig(req: GetConfigRequest, signal?: AbortSignal): Promise<GetConfigResponse>;
  getEnv(envSlug: string, signal?: AbortSignal): Promise<Env>;
}

export interface HttpRemoteClientOptions {
  host: string;
  apiKey?: string;
  teamID?: string;
}

const evaluateTemplateResponseSchema = z.object({ value: z.unknown() });

const getConfigResponseSchema = z.object({
  config: z.object({
    name: z.string(),
    value: z.string(),
    isSecret: z.boolean().default(false),
  }),
});

const envSchema = z.object({
  id: z.string(),
  slug: z.string(),
  name: z.string(),
  isDefault: z.boolean().default(false),
});

const errorBodySchema = z.object({ error: z.string() });

export class HttpRemoteClient implements RemoteClient {
  private readonly baseUrl: string;

  constructor(private readonly opts: HttpRemoteClientOptions) {
    const host = opts.host.replace(/\/$/, '');
    this.baseUrl = /^https?:\/\//.test(host) ? host : `https://${host}`;
  }

  async evaluateTemplate(req: EvaluateTemplateRequest, signal?: AbortSignal): Promise<EvaluateTemplateResponse> {
    const body = await this.fetchJSON('/v0/templates/evaluate', { method: 'POST', body: JSON.stringify(req), signal });
    return { value: evaluateTemplateResponseSchema.parse(body).value };
  }

  async getConfig(req: GetConfigRequest, signal?: AbortSignal): Promise<GetConfigResponse> {
    const qs = new URLSearchParams({ name: req.name });
    if (req.envSlug) qs.set('envSlug', req.envSlug);
    if (req.decrypt) qs.set('decrypt', 'true');
    const body = await this.fetchJSON(`/v0/configs/get?${qs.toString()}`, { signal });
    return getConfigResponseSchema.parse(body);
  }

  async getEnv(envSlug: string, signal?: AbortSignal): Promise<Env> {
    const qs = new URLSearchParams({ slug: envSlug });
    const body = await this.fetchJSON(`/v0/envs/get?${qs.toString()}`, { signal });
    return envSchema.parse(body);
  }

  private async fetchJSON(path: string, init: RequestInit): Promise<unknown> {
    const res = await fetch(`${this.baseUrl}${path}`, {
      ...init,
      headers: {
        Accept: 'application/json',
        'Content-Type': 'application/json',
        ...(this.opts.apiKey ? { 'X-Airplane-API-Key': this.opts.apiKey } : {}),
        ...(this.opts.teamID ? { 'X-Team-ID': this.opts.teamID } : {}),
      },
    });
    if (!res.ok) {
      const text = await res.text();
      throw new RemoteApiError(res.status, remoteErrorMessage(res.status, text));
    }
    const body: unknown = await res.json();
    return body;
  }
}

/** Prefers the API's own `{error}` message over the raw body. */
function remoteErrorMessage(status: number, text: string): string {
  const fallback = `remote API error ${status}: ${text}`;
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch {
    return fallback;
  }
  const parsed = errorBodySchema.safeParse(json);
  return parsed.success ? parsed.data.error : fallback;
}
