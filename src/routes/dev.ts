/**
 * Dev-only routes
 * POST /dev/runs/create     - pre-allocate a queued run so log subscribers can attach before it starts
 * GET  /dev/logs/:runID     - server-sent events, one LogItem per `data:` line
 * GET  /dev/views/env?slug= - resolved env vars for a view's dev server
 */

import { Router } from 'express';
import { getEnvVarsForView } from '../env/envvars.js';
import { RunNotFoundError, ViewNotFoundError } from '../errors.js';
import { createLogger } from '../logger.js';
import { validateBody, validateParams, validateQuery } from '../middlewares/validate.js';
import { newLocalRun } from '../state/runs.js';
import type { DevServerState } from '../state/server-state.js';
import type { LogItem } from '../types.js';
import { createRunSchema, logsParamsSchema, viewEnvQuerySchema } from '../validation/schemas.js';

const log = createLogger('routes:dev');

export function formatSSE(item: LogItem): string {
  return `data: ${JSON.stringify(item)}\n\n`;
}

export function createDevRouter(state: DevServerState): Router {
  const router = Router();

  router.post(
    '/dev/runs/create',
    validateBody(createRunSchema, ({ taskSlug }, _req, res) => {
      const run = newLocalRun();
      if (taskSlug) {
        run.taskID = taskSlug;
        run.taskName = state.discoverer.getTask(taskSlug)?.name ?? taskSlug;
      }
      state.runs.add(taskSlug, run.id, run);
      res.json({ runID: run.id });
    })
  );

  router.get(
    '/dev/logs/:runID',
    validateParams(logsParamsSchema, async ({ runID }, req, res) => {
      const run = state.runs.get(runID);
      if (!run) throw new RunNotFoundError(runID);

      res.writeHead(200, {
        'Content-Type': 'text/event-stream',
        'Cache-Control': 'no-cache',
        Connection: 'keep-alive',
      });
      res.flushHeaders();

      const watcher = run.logBroker.newWatcher();
      req.on('close', () => watcher.close());

      let sent = 0;
      for await (const item of watcher.logs) {
        res.write(formatSSE(item));
        sent++;
      }
      log.debug(`log stream for ${runID} ended after ${sent} item(s)`);
      res.end();
    })
  );

  router.get(
    '/dev/views/env',
    validateQuery(viewEnvQuerySchema, async ({ slug }, _req, res) => {
      const view = state.discoverer.getView(slug);
      if (!view) throw new ViewNotFoundError(slug);
      const envVars = await getEnvVarsForView(state.remoteClient, {
        viewEnvVars: view.envVars,
        devConfigEnvVars: state.devConfig.envVars,
        configVars: state.devConfig.configVars,
        fallbackEnvSlug: state.envSlug,
        authInfo: state.authInfo,
        slug: view.slug,
        name: view.name,
        viewURL: `${state.studioURL.replace(/\/$/, '')}/view/${view.slug}`,
      });
      res.json({ envVars });
    })
  );

  return router;
}
