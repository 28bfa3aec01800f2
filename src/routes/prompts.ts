/**
 * Prompt routes
 * POST /prompts/create            - a task asks for input; its run waits on the prompt
 * GET  /prompts/get?id=           - a prompt of the calling run
 * GET  /dev/prompts/list?runID=   - { prompts } of a run
 * POST /dev/prompts/submit        - answer a prompt
 */

import { Router } from 'express';
import { NotFoundError, RunNotFoundError } from '../errors.js';
import { createLogger } from '../logger.js';
import { requireRunIDFromRequest } from '../middlewares/run-token.js';
import { validateBody, validateQuery } from '../middlewares/validate.js';
import { generateID } from '../state/runs.js';
import type { DevServerState } from '../state/server-state.js';
import type { Prompt } from '../types.js';
import { createPromptSchema, idQuerySchema, runIDQuerySchema, submitPromptSchema } from '../validation/schemas.js';

const log = createLogger('routes:prompts');

export function createPromptsRouter(state: DevServerState): Router {
  const router = Router();

  router.post(
    '/prompts/create',
    validateBody(createPromptSchema, (body, req, res) => {
      const runID = requireRunIDFromRequest(req);
      const prompt: Prompt = {
        id: generateID('pmt'),
        runID,
        schema: body.schema,
        values: body.values,
        createdAt: new Date().toISOString(),
        submittedAt: null,
        submittedBy: null,
        reviewers: body.reviewers,
        confirmText: body.confirmText,
        cancelText: body.cancelText,
        description: body.description,
      };
      state.runs.update(runID, (run) => {
        run.prompts.push(prompt);
        run.isWaitingForUser = true;
      });
      log.info(`run ${runID} is waiting on prompt ${prompt.id}`);
      res.json({ id: prompt.id });
    })
  );

  router.get(
    '/prompts/get',
    validateQuery(idQuerySchema, ({ id }, req, res) => {
      const runID = requireRunIDFromRequest(req);
      const run = state.runs.get(runID);
      if (!run) throw new RunNotFoundError(runID);
      const prompt = run.prompts.find((p) => p.id === id);
      if (!prompt) throw new NotFoundError(`prompt with id "${id}" not found`);
      res.json({ prompt });
    })
  );

  router.get(
    '/dev/prompts/list',
    validateQuery(runIDQuerySchema, ({ runID }, _req, res) => {
      const run = state.runs.get(runID);
      if (!run) throw new RunNotFoundError(runID);
      res.json({ prompts: run.prompts });
    })
  );

  router.post(
    '/dev/prompts/submit',
    validateBody(submitPromptSchema, ({ id, runID, values }, _req, res) => {
      const submittedBy = state.authInfo.user?.id ?? '';
      state.runs.update(runID, (run) => {
        const prompt = run.prompts.find((p) => p.id === id);
        if (!prompt) throw new NotFoundError(`prompt with id "${id}" not found`);
        prompt.submittedAt = new Date().toISOString();
        prompt.submittedBy = submittedBy;
        prompt.values = values;
        run.isWaitingForUser = run.prompts.some((p) => p.submittedAt === null);
      });
      log.info(`prompt ${id} of run ${runID} submitted`);
      res.json({ id });
    })
  );

  return router;
}
