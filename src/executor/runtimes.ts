/**
 * Per-kind command builders for local execution.
 */
import fs from 'node:fs';
import path from 'node:path';
import { UnsupportedKindError } from '../errors.js';
import type { KindOptions, ParamValues, TaskKind } from '../types.js';

export interface PrepareRunOptions {
  entrypoint: string;
  paramValues: ParamValues;
  kindOptions: KindOptions;
}

export interface PreparedCommand {
  command: string;
  args: string[];
  cwd: string;
}

export interface Runtime {
  readonly kind: TaskKind;
  readonly supportsLocalExecution: boolean;
  /** Directory the task's dependencies live in. */
  root(entrypoint: string): string;
  prepareRun(opts: PrepareRunOptions): PreparedCommand;
}

export interface RuntimeLookup {
  lookup(kind: TaskKind): Runtime | undefined;
}

/** Nearest ancestor of the entrypoint containing one of `markers`, else the entrypoint's directory. */
export function findRoot(entrypoint: string, markers: readonly string[]): string {
  const start = path.dirname(path.resolve(entrypoint));
  let dir = start;
  for (;;) {
    if (markers.some((m) => fs.existsSync(path.join(dir, m)))) return dir;
    const parent = path.dirname(dir);
    if (parent === dir) return start;
    dir = parent;
  }
}

function requireExtension(kind: TaskKind, entrypoint: string, allowed: readonly string[]): string {
  const ext = path.extname(entrypoint).toLowerCase();
  if (!allowed.includes(ext)) {
    throw new UnsupportedKindError(kind, `Unsupported file type for ${kind} task: ${path.basename(entrypoint) || '(none)'}`);
  }
  return ext;
}

function stringifyParam(v: ParamValues[string]): string {
  return typeof v === 'string' ? v : JSON.stringify(v);
}

class NodeRuntime implements Runtime {
  readonly kind = 'node' as const;
  readonly supportsLocalExecution = true;

  root(entrypoint: string): string {
    return findRoot(entrypoint, ['package.json']);
  }

  prepareRun({ entrypoint, paramValues }: PrepareRunOptions): PreparedCommand {
    const ext = requireExtension(this.kind, entrypoint, ['.js', '.mjs', '.cjs', '.ts', '.mts', '.cts']);
    const params = JSON.stringify(paramValues);
    const cwd = this.root(entrypoint);
    if (ext === '.ts' || ext === '.mts' || ext === '.cts') {
      return { command: 'npx', args: ['--yes', 'tsx', entrypoint, params], cwd };
    }
    return { command: process.execPath, args: [entrypoint, params], cwd };
  }
}

class PythonRuntime implements Runtime {
  readonly kind = 'python' as const;
  readonly supportsLocalExecution = true;

  root(entrypoint: string): string {
    return findRoot(entrypoint, ['requirements.txt', 'pyproject.toml']);
  }

  prepareRun({ entrypoint, paramValues }: PrepareRunOptions): PreparedCommand {
    requireExtension(this.kind, entrypoint, ['.py']);
    return { command: 'python3', args: [entrypoint, JSON.stringify(paramValues)], cwd: this.root(entrypoint) };
  }
}

class ShellRuntime implements Runtime {
  readonly kind = 'shell' as const;
  readonly supportsLocalExecution = true;

  root(entrypoint: string): string {
    return path.dirname(path.resolve(entrypoint));
  }

  prepareRun({ entrypoint, paramValues }: PrepareRunOptions): PreparedCommand {
    requireExtension(this.kind, entrypoint, ['.sh']);
    const args = Object.entries(paramValues).map(([k, v]) => `${k}=${stringifyParam(v)}`);
    return { command: 'bash', args: [entrypoint, ...args], cwd: this.root(entrypoint) };
  }
}

/** Kinds the platform runs remotely only. */
class RemoteOnlyRuntime implements Runtime {
  readonly supportsLocalExecution = false;

  constructor(readonly kind: TaskKind) {}

  root(entrypoint: string): string {
    return path.dirname(path.resolve(entrypoint));
  }

  prepareRun(): PreparedCommand {
    throw new UnsupportedKindError(this.kind);
  }
}

export class DefaultRuntimeLookup implements RuntimeLookup {
  private readonly runtimes = new Map<TaskKind, Runtime>();

  constructor(runtimes: Runtime[] = [
    new NodeRuntime(),
    new PythonRuntime(),
    new ShellRuntime(),
    new RemoteOnlyRuntime('image'),
    new RemoteOnlyRuntime('sql'),
    new RemoteOnlyRuntime('rest'),
  ]) {
    for (const r of runtimes) this.runtimes.set(r.kind, r);
  }

  lookup(kind: TaskKind): Runtime | undefined {
    return this.runtimes.get(kind);
  }
}
