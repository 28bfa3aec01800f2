/** Shared types for runs, tasks, resources and the remote API. */

export type JsonValue = string | number | boolean | null | JsonObject | JsonValue[];
export type JsonObject = { [key: string]: JsonValue };

export type RunStatus = 'Queued' | 'Active' | 'Succeeded' | 'Failed' | 'Cancelled';

export const TERMINAL_RUN_STATUSES: readonly RunStatus[] = ['Succeeded', 'Failed', 'Cancelled'];

export type TaskKind = 'node' | 'python' | 'shell' | 'image' | 'sql' | 'rest' | 'builtin';

/** Kind-specific options, e.g. `entrypointFunc` for python or `query` for sql. */
export type KindOptions = Record<string, JsonValue>;

export type ParamValues = Record<string, JsonValue>;

export interface Parameter {
  slug: string;
  name: string;
  type: 'shorttext' | 'longtext' | 'sql' | 'boolean' | 'upload' | 'integer' | 'float' | 'date' | 'datetime' | 'configvar' | 'json';
  required?: boolean;
  default?: JsonValue;
}

/** An env var declared by a task or view: a literal value or a reference to a config var. */
export interface EnvVarValue {
  value?: string;
  config?: string;
}

export type TaskEnv = Record<string, EnvVarValue>;

export interface ConfigVar {
  name: string;
  value: string;
  isSecret: boolean;
  /** Set when the config was pulled from the remote platform rather than the dev config file. */
  remote: boolean;
  envSlug?: string;
}

export interface Resource {
  id: string;
  slug: string;
  kind: string;
  name: string;
  [field: string]: JsonValue;
}

/** A task as produced by discovery. The core only reads these. */
export interface TaskConfig {
  slug: string;
  name: string;
  kind: TaskKind;
  kindOptions: KindOptions;
  /** Absolute path of the file that defines the task. */
  entrypoint: string;
  parameters: Parameter[];
  envVars: TaskEnv;
  /** alias -> resource slug */
  resources: Record<string, string>;
}

export interface ViewConfig {
  slug: string;
  name: string;
  entrypoint: string;
  envVars: TaskEnv;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogItem {
  timestamp: string;
  insertID: number;
  text: string;
  level: LogLevel;
  taskSlug: string;
}

export interface StdAPIRequest {
  namespace: string;
  name: string;
  request: ParamValues;
}

export interface DisplayTableColumn {
  name: string;
  slug: string;
}

export type DisplayKind = 'markdown' | 'table' | 'json';

/** Rich content a run shows in the studio next to its logs. */
export interface Display {
  id: string;
  runID: string;
  kind: DisplayKind;
  createdAt: string;
  updatedAt: string;
  /** kind=markdown */
  content: string;
  /** kind=table */
  rows: JsonValue[];
  columns: DisplayTableColumn[];
  /** kind=json */
  value: JsonValue;
}

export interface PromptReviewers {
  /** group slugs */
  groups: string[];
  /** user emails */
  users: string[];
  allowSelfApprovals: boolean;
}

/** A form a run waits on until someone submits it. */
export interface Prompt {
  id: string;
  runID: string;
  schema: Parameter[];
  values: ParamValues;
  createdAt: string;
  submittedAt: string | null;
  submittedBy: string | null;
  reviewers: PromptReviewers;
  confirmText: string;
  cancelText: string;
  description: string;
}

export interface Sleep {
  id: string;
  runID: string;
  /** Shown in the studio only; `until` is what the run waits for. */
  durationMs: number;
  createdAt: string;
  until: string;
  skippedAt: string | null;
  skippedBy: string | null;
}

/** A run as served over HTTP. */
export interface LocalRunRecord {
  id: string;
  runID: string;
  taskID: string;
  taskName: string;
  kind: TaskKind | '';
  status: RunStatus;
  outputs: JsonValue;
  createdAt: string;
  creatorID: string;
  succeededAt: string | null;
  failedAt: string | null;
  cancelledAt: string | null;
  cancelledBy: string;
  paramValues: ParamValues;
  parameters: Parameter[];
  parentID: string;
  envSlug: string;
  /** alias -> resource id */
  resources: Record<string, string>;
  isStdAPI: boolean;
  stdAPIRequest: StdAPIRequest | null;
  displays: Display[];
  prompts: Prompt[];
  sleeps: Sleep[];
  /** True while any prompt is unsubmitted. */
  isWaitingForUser: boolean;
}

export interface AuthInfo {
  user?: { id: string; email: string; name: string };
  team?: { id: string };
}

export interface Env {
  id: string;
  slug: string;
  name: string;
  isDefault: boolean;
}

export interface EvaluateTemplateRequest {
  value?: unknown;
  runID: string;
  parentRunID?: string;
  taskID?: string;
  taskSlug?: string;
  env: Env;
  paramValues: ParamValues;
  resources?: Record<string, Resource>;
  configs: Record<string, string>;
  disableStrictMode?: boolean;
}

export interface EvaluateTemplateResponse {
  value: unknown;
}

export interface GetConfigRequest {
  name: string;
  envSlug?: string;
  decrypt?: boolean;
}

export interface GetConfigResponse {
  config: { name: string; value: string; isSecret: boolean };
}
