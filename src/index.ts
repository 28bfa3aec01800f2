import './preload-dotenv.js';
import http from 'node:http';
import { HttpRemoteClient } from './api/remote-client.js';
import { createApp } from './app.js';
import { loadConfig } from './config.js';
import { loadDevConfig } from './devconf.js';
import { ManifestDiscoverer } from './discovery.js';
import { BinaryBuiltinClient } from './executor/builtins.js';
import { LocalExecutor } from './executor/executor.js';
import { createLogger } from './logger.js';
import { RunStore } from './state/runs.js';
import type { DevServerState } from './state/server-state.js';

const log = createLogger('server');

const config = loadConfig();
const apiHost = `http://${config.host}:${config.port}`;
const remoteClient = new HttpRemoteClient(config.remote);
const runs = new RunStore();

const state: DevServerState = {
  runs,
  executor: new LocalExecutor({
    runs,
    remoteClient,
    builtins: new BinaryBuiltinClient(config.builtinsBinary),
    killGracePeriodMs: config.killGracePeriodMs,
    outputLineMaxBytes: config.outputLineMaxBytes,
  }),
  discoverer: new ManifestDiscoverer(config.tasksManifestPath).load(),
  devConfig: loadDevConfig(config.devConfigPath),
  remoteClient,
  authInfo: config.remote.teamID ? { team: { id: config.remote.teamID } } : {},
  apiHost,
  studioURL: config.studioURL ?? apiHost,
  envSlug: config.envSlug,
  tunnelToken: config.tunnelToken,
};

const server = http.createServer(createApp(state));

server.listen(config.port, config.host, () => {
  log.info(`dev server listening on ${apiHost}`);
  log.info(`  POST /v0/tasks/execute, GET /v0/runs/get|getOutputs|list|getDescendants, POST /v0/runs/cancel`);
  log.info(`  POST /dev/runs/create, GET /dev/logs/:runID (SSE), GET /dev/views/env`);
  log.info(`  POST /v0/prompts/create, GET /v0/prompts/get, POST /v0/displays/create, POST /v0/sleeps/create, GET /v0/sleeps/get|list`);
  for (const task of state.discoverer.listTasks()) {
    log.info(`  task ${task.slug} (${task.kind}) ${task.entrypoint}`);
  }
  if (config.envSlug && config.remote.apiKey) {
    remoteClient.getEnv(config.envSlug).then(
      (env) => log.info(`remote configs fall back to env ${env.name} (${env.slug})`),
      (err: unknown) => log.warn(`could not look up remote env ${config.envSlug}`, err)
    );
  }
});

function shutdown(signal: NodeJS.Signals): void {
  log.info(`received ${signal}, shutting down`);
  for (const run of runs.all()) run.abortController?.abort();
  server.close((err) => {
    if (err) log.error('error closing server', err);
    process.exit(err ? 1 : 0);
  });
}

process.once('SIGINT', shutdown);
process.once('SIGTERM', shutdown);
