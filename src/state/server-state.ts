/**
 * Everything a dev server instance owns. Built once at startup and handed to the
 * routes; nothing here is a module global.
 */
import type { RemoteClient } from '../api/remote-client.js';
import type { DevConfig } from '../devconf.js';
import type { Discoverer } from '../discovery.js';
import type { ExecutionEnvironment, LocalExecutor } from '../executor/executor.js';
import type { AuthInfo } from '../types.js';
import type { RunStore } from './runs.js';

export interface DevServerState {
  runs: RunStore;
  executor: LocalExecutor;
  discoverer: Discoverer;
  devConfig: DevConfig;
  remoteClient: RemoteClient;
  authInfo: AuthInfo;
  /** Base URL tasks use to call back into this server. */
  apiHost: string;
  studioURL: string;
  envSlug?: string;
  tunnelToken?: string;
}

export function executionEnvironment(state: DevServerState): ExecutionEnvironment {
  return {
    devConfigEnvVars: state.devConfig.envVars,
    configVars: state.devConfig.configVars,
    fallbackEnvSlug: state.envSlug,
    authInfo: state.authInfo,
    apiHost: state.apiHost,
    studioURL: state.studioURL,
    tunnelToken: state.tunnelToken,
  };
}
