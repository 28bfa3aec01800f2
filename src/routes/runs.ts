/**
 * Run routes
 * GET  /runs/get?id=              - a run, in flight or finished
 * GET  /runs/getOutputs?id=       - { output }
 * GET  /runs/list?taskSlug=       - { runs }, most recent first
 * GET  /runs/getDescendants?runID= - { descendants }
 * POST /runs/cancel               - cancel a queued or active run
 */

import { Router } from 'express';
import { BadRequestError, RunNotFoundError } from '../errors.js';
import { createLogger } from '../logger.js';
import { validateBody, validateQuery } from '../middlewares/validate.js';
import { isTerminal, toRunRecord } from '../state/runs.js';
import type { DevServerState } from '../state/server-state.js';
import {
  cancelRunSchema,
  idQuerySchema,
  listRunsQuerySchema,
  runIDQuerySchema,
} from '../validation/schemas.js';

const log = createLogger('routes:runs');

export function createRunsRouter(state: DevServerState): Router {
  const router = Router();

  const mustGet = (runID: string) => {
    const run = state.runs.get(runID);
    if (!run) throw new RunNotFoundError(runID);
    return run;
  };

  router.get(
    '/runs/get',
    validateQuery(idQuerySchema, ({ id }, _req, res) => {
      res.json(toRunRecord(mustGet(id)));
    })
  );

  router.get(
    '/runs/getOutputs',
    validateQuery(idQuerySchema, ({ id }, _req, res) => {
      res.json({ output: mustGet(id).outputs });
    })
  );

  router.get(
    '/runs/list',
    validateQuery(listRunsQuerySchema, ({ taskSlug }, _req, res) => {
      res.json({ runs: state.runs.history(taskSlug).map(toRunRecord) });
    })
  );

  router.get(
    '/runs/getDescendants',
    validateQuery(runIDQuerySchema, ({ runID }, _req, res) => {
      mustGet(runID);
      res.json({ descendants: state.runs.descendants(runID).map(toRunRecord) });
    })
  );

  router.post(
    '/runs/cancel',
    validateBody(cancelRunSchema, ({ runID }, _req, res) => {
      const run = mustGet(runID);
      if (isTerminal(run.status)) {
        throw new BadRequestError(`run ${runID} has already finished (${run.status})`);
      }
      const cancelledBy = state.authInfo.user?.id ?? '';

      if (run.abortController) {
        // The executor observes the abort and finalizes the run.
        run.cancelledBy = cancelledBy;
        run.abortController.abort();
      } else {
        // Pre-allocated and never started.
        state.runs.transition(runID, 'Cancelled', { cancelledBy });
        run.logBroker.close();
      }
      log.info(`cancel requested for run ${runID}`);
      res.json(toRunRecord(run));
    })
  );

  return router;
}
