import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { dirsFromRoot, getDotEnvEnvVars } from '../src/env/dotenv.js';
import {
  applyEnvVarFileOverrides,
  envListToRecord,
  filteredSystemEnvVars,
  getBuiltInTaskEnvVars,
  getEnvVars,
  getEnvVarsForView,
  materializeEnvVars,
  type TaskEnvContext,
} from '../src/env/envvars.js';
import { baseEvaluateTemplateRequest, interpolate, interpolateResources, needsInterpolation } from '../src/env/expressions.js';
import { parseLocalRunIdentifier } from '../src/env/token.js';
import { EnvResolutionError, RemoteApiError } from '../src/errors.js';
import type { ConfigVar } from '../src/types.js';
import { FakeRemoteClient } from './helpers/fake-remote-client.js';

function localConfig(name: string, value: string): ConfigVar {
  return { name, value, isSecret: false, remote: false };
}

function taskContext(client: FakeRemoteClient, overrides: Partial<TaskEnvContext> = {}): TaskEnvContext {
  return {
    runID: 'run-1',
    slug: 'hello',
    name: 'Hello',
    taskEnvVars: {},
    devConfigEnvVars: {},
    configVars: {},
    authInfo: { user: { id: 'user-1', email: 'dev@example.com', name: 'Dev' }, team: { id: 'team-1' } },
    apiHost: 'http://127.0.0.1:4000',
    studioURL: 'http://localhost:4000/',
    aliasToResource: {},
    remoteClient: client,
    ...overrides,
  };
}

const baseRequest = baseEvaluateTemplateRequest({
  runID: 'run-1',
  taskSlug: 'hello',
  paramValues: { name: 'bob' },
  configs: {},
});

describe('dotenv files', () => {
  let root: string;

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), 'dotenv-'));
    fs.mkdirSync(path.join(root, 'sub'));
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  it('lists directories from the root down to the entrypoint', () => {
    expect(dirsFromRoot(root, path.join(root, 'sub', 'task.js'))).toEqual([root, path.join(root, 'sub')]);
    expect(dirsFromRoot(root, path.join(root, 'task.js'))).toEqual([root]);
  });

  it('reads .env files top-down, then airplane.env files', () => {
    fs.writeFileSync(path.join(root, '.env'), 'A=1\nB=1\n');
    fs.writeFileSync(path.join(root, 'sub', '.env'), 'B=2\n');
    fs.writeFileSync(path.join(root, 'airplane.env'), 'A=3\n');
    expect(getDotEnvEnvVars(root, path.join(root, 'sub', 'task.js'))).toEqual({ A: '3', B: '2' });
  });

  it('layers dev config over dotenv over declared values', () => {
    fs.writeFileSync(path.join(root, '.env'), 'X=dotenv\nY=dotenv\n');
    const entries = applyEnvVarFileOverrides(
      { X: { value: 'declared' }, Y: { value: 'declared' }, Z: { config: 'z' } },
      { X: 'devconfig' },
      { runtimeRoot: root, entrypoint: path.join(root, 'task.js') }
    );
    expect(entries).toEqual({ X: { value: 'devconfig' }, Y: { value: 'dotenv' }, Z: { config: 'z' } });
  });
});

describe('materializeEnvVars', () => {
  it('lets the dev config override a declared value and resolves config references', async () => {
    const client = new FakeRemoteClient();
    const entries = applyEnvVarFileOverrides(
      { ENV_VAR_FROM_VALUE: { value: 'foo' }, ENV_VAR_FROM_CONFIG: { config: 'cfg' } },
      { ENV_VAR_FROM_VALUE: 'baz' }
    );
    const env = await materializeEnvVars(client, entries, { cfg: localConfig('cfg', 'bar') });
    expect(env).toEqual({ ENV_VAR_FROM_VALUE: 'baz', ENV_VAR_FROM_CONFIG: 'bar' });
    expect(client.configCalls).toEqual([]);
  });

  it('names the missing config and the env var that referenced it', async () => {
    const client = new FakeRemoteClient();
    await expect(materializeEnvVars(client, { K: { config: 'missing' } }, {})).rejects.toThrow(
      'Config var missing not defined in the dev config (referenced by env var K).'
    );
    await expect(materializeEnvVars(client, { K: { config: 'missing' } }, {}, 'prod')).rejects.toThrow(
      'Config var missing not defined in the dev config or remotely in env prod (referenced by env var K).'
    );
  });

  it('does not resolve inherited object properties as configs', async () => {
    const client = new FakeRemoteClient();
    await expect(materializeEnvVars(client, { K: { config: 'toString' } }, {})).rejects.toThrow(EnvResolutionError);
  });

  it('decrypts remote secrets', async () => {
    const client = new FakeRemoteClient();
    client.secrets = { db_password: 'test-secret' };
    const configVars = {
      db_password: { name: 'db_password', value: '', isSecret: true, remote: true, envSlug: 'prod' },
    };
    const env = await materializeEnvVars(client, { DB_PASSWORD: { config: 'db_password' } }, configVars);
    expect(env).toEqual({ DB_PASSWORD: 'test-secret' });
    expect(client.configCalls).toEqual([{ name: 'db_password', envSlug: 'prod', decrypt: true }]);
  });

  it('wraps decryption failures', async () => {
    const client = new FakeRemoteClient();
    const configVars = { nope: { name: 'nope', value: '', isSecret: true, remote: true } };
    await expect(materializeEnvVars(client, { K: { config: 'nope' } }, configVars)).rejects.toThrow(
      'decrypting config nope (referenced by env var K): config nope not found'
    );
  });
});

describe('getEnvVars', () => {
  it('skips interpolation when no value holds a template', async () => {
    const client = new FakeRemoteClient();
    const env = envListToRecord(
      await getEnvVars(taskContext(client, { taskEnvVars: { PLAIN: { value: 'x' } } }), undefined, baseRequest)
    );
    expect(env.PLAIN).toBe('x');
    expect(client.evaluateCalls).toEqual([]);
  });

  it('interpolates templates in strict mode with the run context', async () => {
    const client = new FakeRemoteClient();
    client.evaluate = () => ({ GREETING: 'hi bob', COUNT: 3 });
    const ctx = taskContext(client, { taskEnvVars: { GREETING: { value: 'hi {{params.name}}' } } });
    const env = envListToRecord(await getEnvVars(ctx, undefined, baseRequest));
    expect(env.GREETING).toBe('hi bob');
    expect(env.COUNT).toBe('3');
    expect(client.evaluateCalls).toHaveLength(1);
    expect(client.evaluateCalls[0]).toMatchObject({
      value: { GREETING: 'hi {{params.name}}' },
      runID: 'run-1',
      paramValues: { name: 'bob' },
      disableStrictMode: false,
    });
  });

  it('rejects interpolation results that are not a map', async () => {
    const client = new FakeRemoteClient();
    client.evaluate = () => 'nope';
    const ctx = taskContext(client, { taskEnvVars: { A: { value: '{{1}}' } } });
    await expect(getEnvVars(ctx, undefined, baseRequest)).rejects.toThrow(
      'expected map of env vars (key=value pairs) after interpolation'
    );
  });

  it('gives builtins only system and built-in variables', async () => {
    const client = new FakeRemoteClient();
    const ctx = taskContext(client, { taskEnvVars: { MISSING: { config: 'missing' } } });
    const env = envListToRecord(await getEnvVars(ctx, undefined, baseRequest, true));
    expect(env.MISSING).toBeUndefined();
    expect(env.AIRPLANE_RUN_ID).toBe('run-1');
  });

  it('lets built-in variables win over declared ones', async () => {
    const client = new FakeRemoteClient();
    const ctx = taskContext(client, { taskEnvVars: { AIRPLANE_RUN_ID: { value: 'spoofed' } } });
    const env = envListToRecord(await getEnvVars(ctx, undefined, baseRequest));
    expect(env.AIRPLANE_RUN_ID).toBe('run-1');
  });
});

describe('built-in variables', () => {
  it('describes the run, task and runner', () => {
    const client = new FakeRemoteClient();
    const env = envListToRecord(
      getBuiltInTaskEnvVars(
        taskContext(client, {
          parentRunID: 'run-0',
          aliasToResource: { db: { id: 'res-db', slug: 'db', kind: 'postgres', name: 'DB' } },
        })
      )
    );
    expect(env).toMatchObject({
      AIRPLANE_API_HOST: 'http://127.0.0.1:4000',
      AIRPLANE_RUN_ID: 'run-1',
      AIRPLANE_PARENT_RUN_ID: 'run-0',
      AIRPLANE_RUNNER_EMAIL: 'dev@example.com',
      AIRPLANE_RUNNER_ID: 'user-1',
      AIRPLANE_RUNNER_NAME: 'Dev',
      AIRPLANE_TASK_ID: 'hello',
      AIRPLANE_TASK_SLUG: 'hello',
      AIRPLANE_TASK_NAME: 'Hello',
      AIRPLANE_TEAM_ID: 'team-1',
      AIRPLANE_TASK_URL: 'http://localhost:4000/task/hello',
      AIRPLANE_RUN_URL: 'http://localhost:4000/runs/run-1',
      AIRPLANE_ENV_SLUG: 'studio',
      AIRPLANE_ENV_IS_DEFAULT: 'true',
      AIRPLANE_RESOURCES: '{"db":{"id":"res-db","slug":"db","kind":"postgres","name":"DB"}}',
    });
    expect(env.AIRPLANE_TUNNEL_TOKEN).toBeUndefined();
    expect(parseLocalRunIdentifier(env.AIRPLANE_TOKEN)).toEqual({ runID: 'run-1' });
  });

  it('adds the tunnel token when one is configured', () => {
    const env = envListToRecord(getBuiltInTaskEnvVars(taskContext(new FakeRemoteClient(), { tunnelToken: 'test-token' })));
    expect(env.AIRPLANE_TUNNEL_TOKEN).toBe('test-token');
  });

  it('passes through only allowed system variables', () => {
    expect(filteredSystemEnvVars({ HOME: '/home/dev', PATH: '/bin', SECRET: 'x' })).toEqual(['HOME=/home/dev', 'PATH=/bin']);
  });

  it('converts KEY=VALUE lists, later entries winning', () => {
    expect(envListToRecord(['A=1', 'B=x=y', 'bad', '=empty', 'A=2'])).toEqual({ A: '2', B: 'x=y' });
  });
});

describe('view env', () => {
  it('resolves declared entries and adds view variables', async () => {
    const client = new FakeRemoteClient();
    const env = await getEnvVarsForView(client, {
      viewEnvVars: { API: { config: 'api' }, MODE: { value: 'a' } },
      devConfigEnvVars: { MODE: 'b' },
      configVars: { api: localConfig('api', 'http://localhost:8080') },
      authInfo: {},
      slug: 'dash',
      name: 'Dashboard',
      viewURL: 'http://localhost:4000/view/dash',
    });
    expect(env).toMatchObject({
      API: 'http://localhost:8080',
      MODE: 'b',
      AIRPLANE_VIEW_SLUG: 'dash',
      AIRPLANE_VIEW_NAME: 'Dashboard',
      AIRPLANE_VIEW_URL: 'http://localhost:4000/view/dash',
      AIRPLANE_ENV_ID: 'studio',
    });
    expect(env.AIRPLANE_API_HEADERS).toBeUndefined();
  });
});

describe('template interpolation', () => {
  it('detects templates anywhere in a value', () => {
    expect(needsInterpolation('plain')).toBe(false);
    expect(needsInterpolation({ a: ['x', { b: '{{c}}' }] })).toBe(true);
    expect(needsInterpolation(42)).toBe(false);
  });

  it('surfaces remote errors as resolution errors', async () => {
    const client = new FakeRemoteClient();
    client.evaluate = () => {
      throw new RemoteApiError(400, 'unknown variable params.nope');
    };
    const err = await interpolate(client, baseRequest, true, '{{params.nope}}').catch((e: unknown) => e);
    expect(err).toBeInstanceOf(EnvResolutionError);
    expect(err).toHaveProperty('message', 'unknown variable params.nope');
  });

  it('interpolates resources non-strictly', async () => {
    const client = new FakeRemoteClient();
    client.evaluate = () => ({ db: { id: 'res-db', slug: 'db', kind: 'postgres', name: 'DB', host: 'localhost' } });
    const out = await interpolateResources(client, baseRequest, {
      db: { id: 'res-db', slug: 'db', kind: 'postgres', name: 'DB', host: '{{configs.host}}' },
    });
    expect(out).toEqual({ db: { id: 'res-db', slug: 'db', kind: 'postgres', name: 'DB', host: 'localhost' } });
    expect(client.evaluateCalls[0].disableStrictMode).toBe(true);
  });

  it('rejects resource results of the wrong shape', async () => {
    const client = new FakeRemoteClient();
    client.evaluate = () => ['not', 'a', 'map'];
    await expect(
      interpolateResources(client, baseRequest, { db: { id: 'r', slug: 'db', kind: 'pg', name: 'DB' } })
    ).rejects.toThrow('expected a map of resources after interpolation');
  });
});
