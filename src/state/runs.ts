/**
 * Run registry: run state by id and per-task history (most recent first).
 */
import { DevServerError, RunNotFoundError } from '../errors.js';
import { LogBroker } from '../logs/broker.js';
import { createLogger } from '../logger.js';
import { TERMINAL_RUN_STATUSES, type LocalRunRecord, type RunStatus } from '../types.js';
import { Store } from './store.js';

const log = createLogger('runs');

/** A run plus the server-side handles that never go over the wire. */
export interface LocalRun extends LocalRunRecord {
  logBroker: LogBroker;
  /** Aborts the in-flight execution, if any. */
  abortController: AbortController | null;
}

export function generateID(prefix: string): string {
  return `${prefix}-${Date.now()}-${Math.random().toString(36).slice(2, 10)}`;
}

export function generateRunID(): string {
  return generateID('devrun');
}

export function newLocalRun(id: string = generateRunID()): LocalRun {
  return {
    id,
    runID: id,
    taskID: '',
    taskName: '',
    kind: '',
    status: 'Queued',
    outputs: null,
    createdAt: new Date().toISOString(),
    creatorID: '',
    succeededAt: null,
    failedAt: null,
    cancelledAt: null,
    cancelledBy: '',
    paramValues: {},
    parameters: [],
    parentID: '',
    envSlug: '',
    resources: {},
    isStdAPI: false,
    stdAPIRequest: null,
    displays: [],
    prompts: [],
    sleeps: [],
    isWaitingForUser: false,
    logBroker: new LogBroker(id),
    abortController: null,
  };
}

/** The serializable view of a run. */
export function toRunRecord(run: LocalRun): LocalRunRecord {
  const { logBroker: _broker, abortController: _abort, ...record } = run;
  return record;
}

export function isTerminal(status: RunStatus): boolean {
  return TERMINAL_RUN_STATUSES.includes(status);
}

const ORDER: Record<RunStatus, number> = {
  Queued: 0,
  Active: 1,
  Succeeded: 2,
  Failed: 2,
  Cancelled: 2,
};

export class RunStore {
  private readonly runs = new Store<string, LocalRun>();
  private readonly runHistory = new Store<string, string[]>();

  /** Registers a run; it joins `taskKey`'s history only when a key is given. */
  add(taskKey: string | undefined, runID: string, run: LocalRun): void {
    this.runs.add(runID, run);
    if (!taskKey) return;

    const history = this.runHistory.get(taskKey) ?? [];
    if (!history.includes(runID)) {
      this.runHistory.add(taskKey, [runID, ...history]);
    }
  }

  get(runID: string): LocalRun | undefined {
    return this.runs.get(runID);
  }

  update(runID: string, mutate: (run: LocalRun) => void): LocalRun {
    const run = this.runs.update(runID, mutate);
    if (!run) throw new RunNotFoundError(runID);
    return run;
  }

  /**
   * Moves a run to `status`, stamping the terminal timestamp.
   * Terminal states are final; staying put or going backwards is an error.
   */
  transition(runID: string, status: RunStatus, opts: { cancelledBy?: string } = {}): LocalRun {
    return this.update(runID, (run) => {
      if (isTerminal(run.status)) {
        throw new DevServerError(`run ${runID} is already ${run.status}; cannot move to ${status}`);
      }
      if (status === run.status) {
        throw new DevServerError(`run ${runID} is already ${status}`);
      }
      if (ORDER[status] < ORDER[run.status]) {
        throw new DevServerError(`run ${runID} cannot move from ${run.status} back to ${status}`);
      }
      const now = new Date().toISOString();
      run.status = status;
      if (status === 'Succeeded') run.succeededAt = now;
      if (status === 'Failed') run.failedAt = now;
      if (status === 'Cancelled') {
        run.cancelledAt = now;
        run.cancelledBy = opts.cancelledBy ?? run.cancelledBy;
      }
      log.debug({ runID, status }, 'run transitioned');
    });
  }

  /** Runs for a task, most recently added first. */
  history(taskKey: string): LocalRun[] {
    const ids = this.runHistory.get(taskKey) ?? [];
    const out: LocalRun[] = [];
    for (const id of ids) {
      const run = this.runs.get(id);
      if (run) out.push(run);
    }
    return out;
  }

  /** Every run nested under `runID`: children first, then grandchildren, and so on. */
  descendants(runID: string): LocalRun[] {
    const all = this.all();
    const out: LocalRun[] = [];
    const parents = new Set([runID]);
    let found = true;
    while (found) {
      found = false;
      for (const run of all) {
        if (run.parentID && parents.has(run.parentID) && !parents.has(run.id)) {
          parents.add(run.id);
          out.push(run);
          found = true;
        }
      }
    }
    return out;
  }

  /** All runs, in the order they were first added. */
  all(): LocalRun[] {
    return [...this.runs.items().values()];
  }

  len(): number {
    return this.runs.len();
  }
}
