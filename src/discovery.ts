/**
 * Task discovery. The executor only reads TaskConfig records; where they come
 * from is behind the Discoverer interface.
 */
import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { DevServerError } from './errors.js';
import { createLogger } from './logger.js';
import type { JsonValue, TaskConfig, ViewConfig } from './types.js';

const log = createLogger('discovery');

export interface Discoverer {
  getTask(slug: string): TaskConfig | undefined;
  listTasks(): TaskConfig[];
  getView(slug: string): ViewConfig | undefined;
}

const jsonValue = z.custom<JsonValue>((v) => v !== undefined);

const envVarValueSchema = z.union([
  z.string().transform((value) => ({ value })),
  z
    .object({ value: z.string().optional(), config: z.string().optional() })
    .refine((v) => (v.value === undefined) !== (v.config === undefined), {
      message: 'exactly one of value or config is required',
    }),
]);

export const parameterSchema = z.object({
  slug: z.string().min(1),
  name: z.string().optional(),
  type: z
    .enum(['shorttext', 'longtext', 'sql', 'boolean', 'upload', 'integer', 'float', 'date', 'datetime', 'configvar', 'json'])
    .default('shorttext'),
  required: z.boolean().optional(),
  default: jsonValue.optional(),
}).transform((p) => ({ ...p, name: p.name ?? p.slug }));

const taskSchema = z.object({
  slug: z.string().regex(/^[a-z0-9_]+$/, 'slugs use lowercase letters, digits and underscores'),
  name: z.string().optional(),
  kind: z.enum(['node', 'python', 'shell', 'image', 'sql', 'rest']),
  entrypoint: z.string().default(''),
  kindOptions: z.record(z.string(), jsonValue).default({}),
  parameters: z.array(parameterSchema).default([]),
  envVars: z.record(z.string(), envVarValueSchema).default({}),
  resources: z.record(z.string(), z.string()).default({}),
});

const viewSchema = z.object({
  slug: z.string().regex(/^[a-z0-9_]+$/, 'slugs use lowercase letters, digits and underscores'),
  name: z.string().optional(),
  entrypoint: z.string().default(''),
  envVars: z.record(z.string(), envVarValueSchema).default({}),
});

const manifestSchema = z.object({
  tasks: z.array(taskSchema).default([]),
  views: z.array(viewSchema).default([]),
});

export interface Manifest {
  tasks: Map<string, TaskConfig>;
  views: Map<string, ViewConfig>;
}

/** Reads task definitions from a JSON manifest; entrypoints resolve against the manifest's directory. */
export class ManifestDiscoverer implements Discoverer {
  private manifest: Manifest = { tasks: new Map(), views: new Map() };

  constructor(private readonly manifestPath: string) {}

  load(): this {
    if (!fs.existsSync(this.manifestPath)) {
      log.warn(`no task manifest at ${this.manifestPath}; no local tasks registered`);
      this.manifest = { tasks: new Map(), views: new Map() };
      return this;
    }
    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(this.manifestPath, 'utf8'));
    } catch (err) {
      throw new DevServerError(`reading task manifest ${this.manifestPath}`, { cause: err });
    }
    this.manifest = parseManifest(raw, path.dirname(this.manifestPath));
    log.info(
      `discovered ${this.manifest.tasks.size} task(s) and ${this.manifest.views.size} view(s) from ${this.manifestPath}`
    );
    return this;
  }

  getTask(slug: string): TaskConfig | undefined {
    return this.manifest.tasks.get(slug);
  }

  listTasks(): TaskConfig[] {
    return [...this.manifest.tasks.values()];
  }

  getView(slug: string): ViewConfig | undefined {
    return this.manifest.views.get(slug);
  }
}

export function parseManifest(raw: unknown, baseDir: string): Manifest {
  const parsed = manifestSchema.safeParse(raw);
  if (!parsed.success) {
    const details = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new DevServerError(`invalid task manifest: ${details}`);
  }

  const tasks = new Map<string, TaskConfig>();
  for (const t of parsed.data.tasks) {
    if (tasks.has(t.slug)) {
      log.warn(`duplicate task slug ${t.slug}; keeping the first definition`);
      continue;
    }
    tasks.set(t.slug, {
      slug: t.slug,
      name: t.name ?? t.slug,
      kind: t.kind,
      kindOptions: t.kindOptions,
      entrypoint: t.entrypoint ? path.resolve(baseDir, t.entrypoint) : '',
      parameters: t.parameters,
      envVars: t.envVars,
      resources: t.resources,
    });
  }

  const views = new Map<string, ViewConfig>();
  for (const v of parsed.data.views) {
    if (views.has(v.slug)) {
      log.warn(`duplicate view slug ${v.slug}; keeping the first definition`);
      continue;
    }
    views.set(v.slug, {
      slug: v.slug,
      name: v.name ?? v.slug,
      entrypoint: v.entrypoint ? path.resolve(baseDir, v.entrypoint) : '',
      envVars: v.envVars,
    });
  }
  return { tasks, views };
}

/** In-memory discoverer, used when tasks are registered programmatically. */
export class StaticDiscoverer implements Discoverer {
  private readonly tasks: Map<string, TaskConfig>;
  private readonly views: Map<string, ViewConfig>;

  constructor(tasks: TaskConfig[], views: ViewConfig[] = []) {
    this.tasks = new Map(tasks.map((t) => [t.slug, t]));
    this.views = new Map(views.map((v) => [v.slug, v]));
  }

  getTask(slug: string): TaskConfig | undefined {
    return this.tasks.get(slug);
  }

  listTasks(): TaskConfig[] {
    return [...this.tasks.values()];
  }

  getView(slug: string): ViewConfig | undefined {
    return this.views.get(slug);
  }
}
