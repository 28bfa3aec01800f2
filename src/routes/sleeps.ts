/**
 * Sleep routes
 * POST /sleeps/create            - the calling run starts waiting until a time
 * GET  /sleeps/get?id=           - a sleep of the calling run
 * GET  /sleeps/list?runID=       - { sleeps } of a run
 * POST /dev/sleeps/skip          - end a sleep early
 */

import { Router } from 'express';
import { NotFoundError, RunNotFoundError } from '../errors.js';
import { createLogger } from '../logger.js';
import { requireRunIDFromRequest } from '../middlewares/run-token.js';
import { validateBody, validateQuery } from '../middlewares/validate.js';
import { generateID } from '../state/runs.js';
import type { DevServerState } from '../state/server-state.js';
import type { Sleep } from '../types.js';
import { createSleepSchema, idQuerySchema, runIDQuerySchema, skipSleepSchema } from '../validation/schemas.js';

const log = createLogger('routes:sleeps');

export function createSleepsRouter(state: DevServerState): Router {
  const router = Router();

  router.post(
    '/sleeps/create',
    validateBody(createSleepSchema, ({ durationMs, until }, req, res) => {
      const runID = requireRunIDFromRequest(req);
      const sleep: Sleep = {
        id: generateID('slp'),
        runID,
        durationMs,
        createdAt: new Date().toISOString(),
        until: new Date(until).toISOString(),
        skippedAt: null,
        skippedBy: null,
      };
      state.runs.update(runID, (run) => {
        run.sleeps.push(sleep);
      });
      log.debug(`run ${runID} sleeping until ${sleep.until}`);
      res.json({ id: sleep.id });
    })
  );

  router.get(
    '/sleeps/get',
    validateQuery(idQuerySchema, ({ id }, req, res) => {
      const runID = requireRunIDFromRequest(req);
      const run = state.runs.get(runID);
      if (!run) throw new RunNotFoundError(runID);
      const sleep = run.sleeps.find((s) => s.id === id);
      if (!sleep) throw new NotFoundError(`sleep with id "${id}" not found`);
      res.json(sleep);
    })
  );

  router.get(
    '/sleeps/list',
    validateQuery(runIDQuerySchema, ({ runID }, _req, res) => {
      const run = state.runs.get(runID);
      if (!run) throw new RunNotFoundError(runID);
      res.json({ sleeps: run.sleeps });
    })
  );

  router.post(
    '/dev/sleeps/skip',
    validateBody(skipSleepSchema, ({ sleepID, runID }, _req, res) => {
      state.runs.update(runID, (run) => {
        const sleep = run.sleeps.find((s) => s.id === sleepID);
        if (!sleep) throw new NotFoundError(`sleep with id "${sleepID}" not found`);
        sleep.skippedAt = new Date().toISOString();
        sleep.skippedBy = run.creatorID;
      });
      res.json({ id: sleepID });
    })
  );

  return router;
}
