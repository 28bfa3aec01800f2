import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import { LocalExecutor, type ExecutionEnvironment, type LocalRunConfig } from '../src/executor/executor.js';
import { RunStore, newLocalRun } from '../src/state/runs.js';
import type { LogItem, TaskConfig } from '../src/types.js';
import { FakeRemoteClient } from './helpers/fake-remote-client.js';

const env: ExecutionEnvironment = {
  devConfigEnvVars: {},
  configVars: { greeting: { name: 'greeting', value: 'hello', isSecret: false, remote: false } },
  authInfo: {},
  apiHost: 'http://127.0.0.1:4000',
  studioURL: 'http://127.0.0.1:4000',
};

let dir: string;
let counter = 0;

function script(source: string): string {
  const file = path.join(dir, `task-${counter++}.js`);
  fs.writeFileSync(file, source);
  return file;
}

function task(entrypoint: string, overrides: Partial<TaskConfig> = {}): TaskConfig {
  return {
    slug: 'hello',
    name: 'Hello',
    kind: 'node',
    kindOptions: {},
    entrypoint,
    parameters: [],
    envVars: {},
    resources: {},
    ...overrides,
  };
}

function setup(opts: { outputLineMaxBytes?: number } = {}) {
  const runs = new RunStore();
  const executor = new LocalExecutor({
    runs,
    remoteClient: new FakeRemoteClient(),
    killGracePeriodMs: 500,
    outputLineMaxBytes: opts.outputLineMaxBytes,
  });
  const run = newLocalRun();
  runs.add('hello', run.id, run);
  const config = (t: TaskConfig, extra: Partial<LocalRunConfig> = {}): LocalRunConfig => ({
    runID: run.id,
    task: t,
    paramValues: {},
    aliasToResource: {},
    env,
    ...extra,
  });
  return { runs, executor, run, config };
}

async function collect(logs: AsyncIterable<LogItem>): Promise<LogItem[]> {
  const items: LogItem[] = [];
  for await (const item of logs) items.push(item);
  return items;
}

beforeAll(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), 'executor-'));
  fs.writeFileSync(path.join(dir, 'package.json'), '{}');
  fs.writeFileSync(path.join(dir, '.env'), 'FROM_FILE=dotenv\n');
});

afterAll(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

describe('LocalExecutor', () => {
  it('runs a task to success, collecting outputs and logs', async () => {
    const { runs, executor, run, config } = setup();
    const entrypoint = script(
      [
        "console.log('starting');",
        "console.log('airplane_output_set:a.b \"c\"');",
        "console.log('airplane_output_append:a.list 1');",
        "console.error('note on stderr');",
      ].join('\n')
    );

    const result = await executor.execute(config(task(entrypoint)));

    expect(result).toEqual({ status: 'Succeeded', outputs: { a: { b: 'c', list: [1] } } });
    const stored = runs.get(run.id);
    expect(stored?.status).toBe('Succeeded');
    expect(stored?.outputs).toEqual({ a: { b: 'c', list: [1] } });
    expect(stored?.succeededAt).not.toBeNull();
    expect(run.logBroker.isClosed).toBe(true);

    // A watcher attached after the run still sees every line once.
    const items = await collect(run.logBroker.newWatcher().logs);
    expect(items.map((i) => i.insertID).sort((a, b) => a - b)).toEqual([0, 1, 2, 3]);
    expect(items.filter((i) => i.text !== 'note on stderr').map((i) => i.text)).toEqual([
      'starting',
      'airplane_output_set:a.b "c"',
      'airplane_output_append:a.list 1',
    ]);
    expect(items.every((i) => i.level === 'info' && i.taskSlug === 'hello')).toBe(true);
  });

  it('passes params and resolved env vars to the process', async () => {
    const { executor, run, config } = setup();
    const entrypoint = script(
      [
        'const params = JSON.parse(process.argv[2]);',
        'const out = {',
        '  name: params.name,',
        '  greeting: process.env.GREETING,',
        '  fromFile: process.env.FROM_FILE,',
        '  runID: process.env.AIRPLANE_RUN_ID,',
        '  envSlug: process.env.AIRPLANE_ENV_SLUG,',
        '};',
        "console.log('airplane_output_set ' + JSON.stringify(out));",
      ].join('\n')
    );

    const result = await executor.execute(
      config(task(entrypoint, { envVars: { GREETING: { config: 'greeting' } } }), { paramValues: { name: 'bob' } })
    );

    expect(result.outputs).toEqual({
      name: 'bob',
      greeting: 'hello',
      fromFile: 'dotenv',
      runID: run.id,
      envSlug: 'studio',
    });
  });

  it('fails on a non-zero exit code and keeps partial outputs', async () => {
    const { runs, executor, run, config } = setup();
    const entrypoint = script(`console.log('airplane_output_set {"partial":1}');\nprocess.exit(3);`);

    const result = await executor.execute(config(task(entrypoint)));

    expect(result).toEqual({ status: 'Failed', outputs: { partial: 1 }, error: 'waiting for process: exit code 3' });
    expect(runs.get(run.id)?.outputs).toEqual({ partial: 1 });
    expect(runs.get(run.id)?.failedAt).not.toBeNull();
    expect(run.logBroker.isClosed).toBe(true);
  });

  it('records the error as outputs when a failed run wrote none', async () => {
    const { runs, executor, run, config } = setup();

    const result = await executor.execute(config(task(script('process.exit(2);'))));

    expect(result).toEqual({
      status: 'Failed',
      outputs: { error: 'waiting for process: exit code 2' },
      error: 'waiting for process: exit code 2',
    });
    expect(runs.get(run.id)?.outputs).toEqual({ error: 'waiting for process: exit code 2' });
  });

  it('logs malformed output commands and keeps running', async () => {
    const { executor, run, config } = setup();
    const entrypoint = script("console.log('airplane_output_set:a {bad');\nconsole.log('airplane_output_set 1');");

    const result = await executor.execute(config(task(entrypoint)));

    expect(result).toEqual({ status: 'Succeeded', outputs: 1 });
    expect(run.logBroker.getHistory().map((i) => [i.insertID, i.level, i.text])).toEqual([
      [0, 'error', '[outputs] invalid airplane_output_set value: {bad'],
      [1, 'info', 'airplane_output_set:a {bad'],
      [2, 'info', 'airplane_output_set 1'],
    ]);
  });

  it('rejects output lines over the size limit', async () => {
    const { executor, run, config } = setup({ outputLineMaxBytes: 20 });
    const entrypoint = script("console.log('airplane_output_set \"abcdefghijklmnopqrstuvwxyz\"');");

    const result = await executor.execute(config(task(entrypoint)));

    expect(result).toEqual({ status: 'Succeeded', outputs: null });
    expect(run.logBroker.getHistory()[0]).toMatchObject({ level: 'error', text: '[outputs] output line too long' });
  });

  it('reassembles chunked output lines', async () => {
    const { executor, config } = setup();
    const entrypoint = script(
      [
        "console.log('airplane_chunk:k airplane_output_set:big ');",
        "console.log('airplane_chunk:k \"part one');",
        "console.log('airplane_chunk:k , part two\"');",
        "console.log('airplane_chunk_end:k');",
      ].join('\n')
    );

    const result = await executor.execute(config(task(entrypoint)));

    expect(result.outputs).toEqual({ big: 'part one, part two' });
  });

  it('cancels a running task by signalling its process group', async () => {
    const { runs, executor, run, config } = setup();
    const entrypoint = script("console.log('ready');\nsetInterval(() => {}, 1000);");
    const abort = new AbortController();

    const watched = (async () => {
      for await (const item of run.logBroker.newWatcher().logs) {
        if (item.text === 'ready') abort.abort();
      }
    })();
    const result = await executor.execute(config(task(entrypoint), { signal: abort.signal }));
    await watched;

    expect(result.status).toBe('Cancelled');
    expect(runs.get(run.id)?.status).toBe('Cancelled');
    expect(runs.get(run.id)?.cancelledAt).not.toBeNull();
  });

  it('cancels before start when the signal is already aborted', async () => {
    const { executor, config } = setup();
    const abort = new AbortController();
    abort.abort();

    const result = await executor.execute(config(task(script('')), { signal: abort.signal }));

    expect(result).toEqual({ status: 'Cancelled', outputs: null, error: 'run cancelled before start' });
  });

  it('skips kinds that cannot run locally', async () => {
    const { runs, executor, run, config } = setup();

    const result = await executor.execute(config(task(path.join(dir, 'query.sql'), { kind: 'sql' })));

    expect(result).toEqual({
      status: 'Succeeded',
      outputs: null,
      warning: 'Local execution is not supported for this task (kind=sql)',
    });
    expect(runs.get(run.id)?.status).toBe('Succeeded');
    expect(run.logBroker.isClosed).toBe(true);
  });

  it('skips entrypoints of an unsupported file type', async () => {
    const { executor, config } = setup();

    const result = await executor.execute(config(task(path.join(dir, 'hello.rb'))));

    expect(result.warning).toBe('Unsupported file type for node task: hello.rb');
  });

  it('fails when a config reference cannot be resolved', async () => {
    const { executor, config } = setup();

    const result = await executor.execute(config(task(script(''), { envVars: { X: { config: 'missing' } } })));

    expect(result.status).toBe('Failed');
    expect(result.error).toBe('Config var missing not defined in the dev config (referenced by env var X).');
  });

  it('requires the run to be registered', async () => {
    const { executor, config } = setup();

    await expect(executor.execute(config(task(script('')), { runID: 'unknown' }))).rejects.toThrow(
      'run unknown is not registered'
    );
  });
});
