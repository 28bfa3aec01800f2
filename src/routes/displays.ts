/**
 * Display routes
 * POST /displays/create - attach markdown, a table or a JSON value to the calling run
 */

import { Router } from 'express';
import { BadRequestError } from '../errors.js';
import { createLogger } from '../logger.js';
import { requireRunIDFromRequest } from '../middlewares/run-token.js';
import { validateBody } from '../middlewares/validate.js';
import { generateID } from '../state/runs.js';
import type { DevServerState } from '../state/server-state.js';
import type { Display } from '../types.js';
import { createDisplaySchema, type CreateDisplayInput } from '../validation/schemas.js';

const log = createLogger('routes:displays');

export const MAX_MARKDOWN_LENGTH = 100_000;
export const MAX_TABLE_ROWS = 10_000;
export const MAX_TABLE_COLUMNS = 100;

function buildDisplay(runID: string, input: CreateDisplayInput['display']): Display {
  const now = new Date().toISOString();
  const display: Display = {
    id: generateID('dsp'),
    runID,
    kind: input.kind,
    createdAt: now,
    updatedAt: now,
    content: '',
    rows: [],
    columns: [],
    value: null,
  };

  switch (input.kind) {
    case 'markdown':
      if (input.content.length > MAX_MARKDOWN_LENGTH) {
        throw new BadRequestError(
          `content too long: expected at most ${MAX_MARKDOWN_LENGTH} characters, got ${input.content.length}`
        );
      }
      display.content = input.content;
      break;
    case 'table':
      if (input.rows.length > MAX_TABLE_ROWS) {
        throw new BadRequestError(`too many table rows: expected at most ${MAX_TABLE_ROWS}, got ${input.rows.length}`);
      }
      if (input.columns.length > MAX_TABLE_COLUMNS) {
        throw new BadRequestError(
          `too many table columns: expected at most ${MAX_TABLE_COLUMNS}, got ${input.columns.length}`
        );
      }
      display.rows = input.rows;
      display.columns = input.columns;
      break;
    case 'json':
      display.value = input.value ?? null;
      break;
  }
  return display;
}

export function createDisplaysRouter(state: DevServerState): Router {
  const router = Router();

  router.post(
    '/displays/create',
    validateBody(createDisplaySchema, ({ display: input }, req, res) => {
      const runID = requireRunIDFromRequest(req);
      const display = buildDisplay(runID, input);
      const run = state.runs.update(runID, (r) => {
        r.displays.push(display);
      });
      const body =
        display.kind === 'markdown' ? display.content : JSON.stringify(display.kind === 'table' ? display.rows : display.value);
      log.info({ runID, kind: display.kind }, `[${run.taskID} display] ${body}`);
      res.json({ id: display.id });
    })
  );

  return router;
}
