/**
 * Local executor: runs one task as a child process and drives the run through
 * Queued → Active → Succeeded | Failed | Cancelled.
 *
 * stdout and stderr are drained concurrently; each line is parsed for output
 * commands, checked for known error signatures and recorded to the run's log broker.
 */
import { spawn, type ChildProcess } from 'node:child_process';
import readline from 'node:readline';
import type { Readable } from 'node:stream';
import type { RemoteClient } from '../api/remote-client.js';
import { envListToRecord, getEnvVars, type TaskEnvContext } from '../env/envvars.js';
import {
  baseEvaluateTemplateRequest,
  interpolate,
  interpolateResources,
  needsInterpolation,
} from '../env/expressions.js';
import { DevServerError, ProcessError, UnsupportedKindError, errorMessage } from '../errors.js';
import type { LogBroker } from '../logs/broker.js';
import { createLogger, type Logger } from '../logger.js';
import { applyOutputCommand, newOutputDocument, type OutputDocument } from '../outputs/apply.js';
import { parseOutputLine, type ChunkBuffers } from '../outputs/parse.js';
import type { RunStore } from '../state/runs.js';
import type {
  AuthInfo,
  ConfigVar,
  EvaluateTemplateRequest,
  JsonValue,
  KindOptions,
  LogItem,
  LogLevel,
  ParamValues,
  Resource,
  RunStatus,
  StdAPIRequest,
  TaskConfig,
} from '../types.js';
import type { BuiltinClient } from './builtins.js';
import { ErrorSignatureScanner } from './error-signatures.js';
import { Mutex } from './mutex.js';
import { DefaultRuntimeLookup, type PreparedCommand, type RuntimeLookup } from './runtimes.js';

const baseLog = createLogger('executor');

export const DEFAULT_KILL_GRACE_PERIOD_MS = 5000;

/** Per-server settings shared by every run. */
export interface ExecutionEnvironment {
  devConfigEnvVars: Record<string, string>;
  configVars: Record<string, ConfigVar>;
  fallbackEnvSlug?: string;
  authInfo: AuthInfo;
  apiHost: string;
  studioURL: string;
  tunnelToken?: string;
}

export interface LocalRunConfig {
  runID: string;
  parentRunID?: string;
  task: TaskConfig;
  paramValues: ParamValues;
  /** alias -> resource */
  aliasToResource: Record<string, Resource>;
  /** Set for builtins; `task.kind` is then 'builtin'. */
  stdAPIRequest?: StdAPIRequest;
  env: ExecutionEnvironment;
  signal?: AbortSignal;
}

export interface ExecuteResult {
  status: RunStatus;
  outputs: JsonValue;
  /** Set when local execution was skipped. */
  warning?: string;
  error?: string;
}

export interface LocalExecutorOptions {
  runs: RunStore;
  remoteClient: RemoteClient;
  runtimes?: RuntimeLookup;
  builtins?: BuiltinClient;
  killGracePeriodMs?: number;
  outputLineMaxBytes?: number;
}

type ExitResult =
  | { kind: 'exit'; code: number | null; signal: NodeJS.Signals | null }
  | { kind: 'error'; error: Error };

export class LocalExecutor {
  private readonly runs: RunStore;
  private readonly remoteClient: RemoteClient;
  private readonly runtimes: RuntimeLookup;
  private readonly builtins?: BuiltinClient;
  private readonly killGracePeriodMs: number;
  private readonly outputLineMaxBytes: number;

  constructor(opts: LocalExecutorOptions) {
    this.runs = opts.runs;
    this.remoteClient = opts.remoteClient;
    this.runtimes = opts.runtimes ?? new DefaultRuntimeLookup();
    this.builtins = opts.builtins;
    this.killGracePeriodMs = opts.killGracePeriodMs ?? DEFAULT_KILL_GRACE_PERIOD_MS;
    this.outputLineMaxBytes = opts.outputLineMaxBytes ?? 0;
  }

  /**
   * Executes a run that is already registered in the run store. Always resolves with the
   * terminal state; the run's log broker is closed before this returns.
   * Outputs written before a failure are kept; a failed run with none records `{ error }`.
   */
  async execute(config: LocalRunConfig): Promise<ExecuteResult> {
    const run = this.runs.get(config.runID);
    if (!run) throw new DevServerError(`run ${config.runID} is not registered`);
    const broker = run.logBroker;
    const log = baseLog.child({ runID: config.runID, task: config.task.slug });
    const doc = newOutputDocument();

    try {
      let result: ExecuteResult;
      try {
        result = await this.executeInner(config, broker, doc, log);
      } catch (err) {
        const cancelled = config.signal?.aborted === true;
        const message = errorMessage(err);
        result = cancelled
          ? { status: 'Cancelled', outputs: doc.value, error: message }
          : { status: 'Failed', outputs: doc.value ?? { error: message }, error: message };
        if (cancelled) {
          log.info('run cancelled');
        } else {
          log.error(`run failed: ${errorMessage(err)}`, err);
        }
      }
      this.finalize(config.runID, result);
      return result;
    } finally {
      broker.close();
    }
  }

  private finalize(runID: string, result: ExecuteResult): void {
    this.runs.update(runID, (r) => {
      r.outputs = result.outputs;
      r.abortController = null;
    });
    this.runs.transition(runID, result.status);
  }

  private async executeInner(
    config: LocalRunConfig,
    broker: LogBroker,
    doc: OutputDocument,
    log: Logger
  ): Promise<ExecuteResult> {
    const { task } = config;
    const signal = config.signal;
    throwIfAborted(signal);

    const configs: Record<string, string> = {};
    for (const [name, cv] of Object.entries(config.env.configVars)) configs[name] = cv.value;

    const baseRequest = baseEvaluateTemplateRequest({
      runID: config.runID,
      parentRunID: config.parentRunID,
      taskSlug: task.slug,
      paramValues: config.paramValues,
      configs,
    });

    let aliasToResource = config.aliasToResource;
    if (needsInterpolation(aliasToResource)) {
      aliasToResource = await interpolateResources(this.remoteClient, baseRequest, aliasToResource, signal);
    }
    baseRequest.resources = aliasToResource;

    let prepared: PreparedCommand;
    let dotenvSource: { runtimeRoot: string; entrypoint: string } | undefined;
    if (task.kind === 'builtin') {
      if (!config.stdAPIRequest) throw new DevServerError(`builtin run ${config.runID} has no request`);
      if (!this.builtins) throw new DevServerError('builtins are not available on this dev server');
      prepared = this.builtins.prepareRun(config.stdAPIRequest);
    } else {
      const runtime = this.runtimes.lookup(task.kind);
      if (!runtime || !runtime.supportsLocalExecution || !task.entrypoint) {
        return skipped(new UnsupportedKindError(task.kind), log);
      }
      let kindOptions: KindOptions = task.kindOptions;
      if (needsInterpolation(kindOptions)) {
        kindOptions = await this.interpolateKindOptions(baseRequest, kindOptions, signal);
      }
      try {
        prepared = runtime.prepareRun({ entrypoint: task.entrypoint, paramValues: config.paramValues, kindOptions });
      } catch (err) {
        if (err instanceof UnsupportedKindError) return skipped(err, log);
        throw err;
      }
      dotenvSource = { runtimeRoot: runtime.root(task.entrypoint), entrypoint: task.entrypoint };
    }

    const envCtx: TaskEnvContext = {
      runID: config.runID,
      parentRunID: config.parentRunID,
      slug: task.slug,
      name: task.name,
      taskEnvVars: task.envVars,
      devConfigEnvVars: config.env.devConfigEnvVars,
      configVars: config.env.configVars,
      fallbackEnvSlug: config.env.fallbackEnvSlug,
      authInfo: config.env.authInfo,
      apiHost: config.env.apiHost,
      studioURL: config.env.studioURL,
      tunnelToken: config.env.tunnelToken,
      aliasToResource,
      remoteClient: this.remoteClient,
      signal,
    };
    const env = await getEnvVars(envCtx, dotenvSource, baseRequest, task.kind === 'builtin');
    throwIfAborted(signal);

    this.runs.transition(config.runID, 'Active');
    log.info(`running ${prepared.command} ${prepared.args.join(' ')}`);

    const child = spawn(prepared.command, prepared.args, {
      cwd: prepared.cwd,
      env: envListToRecord(env),
      stdio: ['ignore', 'pipe', 'pipe'],
      detached: true,
    });
    const exited = waitForExit(child);
    const stopKillOnAbort = this.killOnAbort(child, signal, log);

    try {
      const chunks: ChunkBuffers = new Map();
      const mutex = new Mutex();
      const scanner = new ErrorSignatureScanner(log);
      let insertID = 0;

      const handleLine = (line: string, stream: 'stdout' | 'stderr'): void => {
        scanner.scan(line);
        try {
          const parsed = parseOutputLine(chunks, line, { outputLineMaxBytes: this.outputLineMaxBytes });
          if (parsed) applyOutputCommand(parsed, doc);
        } catch (err) {
          log.warn({ stream }, `[outputs] ${errorMessage(err)}`);
          broker.record(logItem(insertID++, `[outputs] ${errorMessage(err)}`, 'error', task.slug));
        }
        log.debug({ stream }, line);
        broker.record(logItem(insertID++, line, 'info', task.slug));
      };

      const scan = async (stream: Readable | null, name: 'stdout' | 'stderr'): Promise<void> => {
        if (!stream) return;
        const rl = readline.createInterface({ input: stream, crlfDelay: Infinity });
        try {
          for await (const line of rl) {
            await mutex.run(() => handleLine(line, name));
          }
        } catch (err) {
          throw new ProcessError(`scanning ${name}`, { cause: err });
        }
      };

      const scans = await Promise.allSettled([scan(child.stdout, 'stdout'), scan(child.stderr, 'stderr')]);
      const exit = await exited;

      if (exit.kind === 'error') {
        throw new ProcessError(`starting ${prepared.command}: ${exit.error.message}`, { cause: exit.error });
      }
      if (signal?.aborted) {
        return { status: 'Cancelled', outputs: doc.value };
      }
      for (const s of scans) {
        if (s.status === 'rejected') throw s.reason;
      }
      if (exit.code !== 0) {
        const reason = exit.signal ? `signal ${exit.signal}` : `exit code ${exit.code}`;
        throw new ProcessError(`waiting for process: ${reason}`, { exitCode: exit.code, signal: exit.signal });
      }
      log.info('run succeeded');
      return { status: 'Succeeded', outputs: doc.value };
    } finally {
      stopKillOnAbort();
    }
  }

  private async interpolateKindOptions(
    baseRequest: EvaluateTemplateRequest,
    kindOptions: KindOptions,
    signal?: AbortSignal
  ): Promise<KindOptions> {
    const value = await interpolate(this.remoteClient, baseRequest, true, kindOptions, signal);
    if (!isKindOptions(value)) {
      throw new DevServerError('expected kind options to be an object after interpolation');
    }
    return value;
  }

  /** SIGTERM to the process group on abort, SIGKILL after the grace period. Returns a disposer. */
  private killOnAbort(child: ChildProcess, signal: AbortSignal | undefined, log: Logger): () => void {
    if (!signal) return () => undefined;
    let timer: NodeJS.Timeout | undefined;

    const onAbort = (): void => {
      log.info('cancelling run: sending SIGTERM');
      killGroup(child, 'SIGTERM', log);
      timer = setTimeout(() => {
        if (child.exitCode === null && child.signalCode === null) {
          log.warn(`process still running after ${this.killGracePeriodMs}ms: sending SIGKILL`);
          killGroup(child, 'SIGKILL', log);
        }
      }, this.killGracePeriodMs);
      timer.unref();
    };

    if (signal.aborted) onAbort();
    else signal.addEventListener('abort', onAbort, { once: true });

    return () => {
      signal.removeEventListener('abort', onAbort);
      if (timer) clearTimeout(timer);
    };
  }
}

function killGroup(child: ChildProcess, sig: NodeJS.Signals, log: Logger): void {
  if (child.pid === undefined) return;
  try {
    process.kill(-child.pid, sig);
  } catch (err) {
    // ESRCH: the group already exited
    if (isErrnoException(err) && err.code === 'ESRCH') return;
    log.warn(`failed to send ${sig} to process group ${child.pid}: ${errorMessage(err)}`);
  }
}

function waitForExit(child: ChildProcess): Promise<ExitResult> {
  return new Promise((resolve) => {
    child.once('error', (error) => resolve({ kind: 'error', error }));
    child.once('close', (code, signal) => resolve({ kind: 'exit', code, signal }));
  });
}

function skipped(err: UnsupportedKindError, log: Logger): ExecuteResult {
  log.warn(err.message);
  return { status: 'Succeeded', outputs: null, warning: err.message };
}

function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) throw new DevServerError('run cancelled before start');
}

function logItem(insertID: number, text: string, level: LogLevel, taskSlug: string): LogItem {
  return { timestamp: new Date().toISOString(), insertID, text, level, taskSlug };
}

function isKindOptions(value: unknown): value is KindOptions {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}
