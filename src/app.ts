/**
 * Express app for the dev server. Routes are served under /v0 (what the task SDKs
 * call) and at the root (what the studio UI calls).
 */
import cors from 'cors';
import express, { type ErrorRequestHandler } from 'express';
import helmet from 'helmet';
import { DevServerError, errorMessage } from './errors.js';
import { createLogger } from './logger.js';
import { createDevRouter } from './routes/dev.js';
import { createDisplaysRouter } from './routes/displays.js';
import { createPromptsRouter } from './routes/prompts.js';
import { createRunsRouter } from './routes/runs.js';
import { createSleepsRouter } from './routes/sleeps.js';
import { createTasksRouter } from './routes/tasks.js';
import type { DevServerState } from './state/server-state.js';

const log = createLogger('app');

// Loopback origins only: this server runs tasks on the developer's machine.
const LOCAL_ORIGIN = /^https?:\/\/(localhost|127\.0\.0\.1|\[::1\])(:\d+)?$/;

export function createApp(state: DevServerState): express.Express {
  const app = express();

  app.use(cors({
    origin: (origin, callback) => {
      // Requests without an origin come from tasks and the CLI.
      if (!origin) return callback(null, true);
      return callback(null, LOCAL_ORIGIN.test(origin));
    },
    credentials: true,
  }));
  app.use(helmet());
  app.use(express.json({ limit: '10mb' }));

  app.get('/healthz', (_req, res) => {
    res.json({ ok: true });
  });

  for (const prefix of ['/v0', '/']) {
    app.use(prefix, createTasksRouter(state));
    app.use(prefix, createRunsRouter(state));
    app.use(prefix, createDevRouter(state));
    app.use(prefix, createPromptsRouter(state));
    app.use(prefix, createDisplaysRouter(state));
    app.use(prefix, createSleepsRouter(state));
  }

  app.use((req, res) => {
    res.status(404).json({ error: `no route for ${req.method} ${req.path}` });
  });

  const errorHandler: ErrorRequestHandler = (err: unknown, req, res, _next) => {
    const status = statusOf(err);
    if (status >= 500) {
      log.error({ err, path: req.path }, 'request failed');
    } else {
      log.debug({ path: req.path, status }, errorMessage(err));
    }
    if (res.headersSent) {
      res.end();
      return;
    }
    res.status(status).json({ error: errorMessage(err) });
  };
  app.use(errorHandler);

  return app;
}

/** DevServerError carries its status; body-parser errors carry `status`. */
function statusOf(err: unknown): number {
  if (err instanceof DevServerError) return err.statusCode;
  if (typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number') {
    return err.status >= 400 && err.status < 600 ? err.status : 500;
  }
  return 500;
}
