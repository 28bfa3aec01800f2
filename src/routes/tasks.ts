/**
 * Task routes
 * POST /tasks/execute - run a task locally and wait for it to finish
 */

import { Router } from 'express';
import { STUDIO_ENV_ID } from '../env/expressions.js';
import { BadRequestError, NotFoundError, TaskNotFoundError } from '../errors.js';
import { builtinRequest, isBuiltinSlug } from '../executor/builtins.js';
import { createLogger } from '../logger.js';
import { readRunIDFromRequest } from '../middlewares/run-token.js';
import { validateBody } from '../middlewares/validate.js';
import { newLocalRun, toRunRecord } from '../state/runs.js';
import { executionEnvironment, type DevServerState } from '../state/server-state.js';
import type { Parameter, ParamValues, Resource, StdAPIRequest, TaskConfig } from '../types.js';
import { executeTaskSchema, type ExecuteTaskInput } from '../validation/schemas.js';

const log = createLogger('routes:tasks');

function builtinTask(slug: string, resources: Record<string, string>): TaskConfig {
  return {
    slug,
    name: slug,
    kind: 'builtin',
    kindOptions: {},
    entrypoint: '',
    parameters: [],
    envVars: {},
    resources,
  };
}

/** Fills in declared defaults for parameters the caller left out. */
export function applyParameterDefaults(parameters: Parameter[], values: ParamValues): ParamValues {
  const out: ParamValues = { ...values };
  for (const p of parameters) {
    if (out[p.slug] === undefined && p.default !== undefined) out[p.slug] = p.default;
  }
  return out;
}

/** alias -> resource, looked up by slug in the dev config. */
function resolveResources(state: DevServerState, aliasToSlug: Record<string, string>): Record<string, Resource> {
  const out: Record<string, Resource> = {};
  for (const [alias, slug] of Object.entries(aliasToSlug)) {
    const res = state.devConfig.resources[slug];
    if (!res) {
      throw new BadRequestError(`resource with slug "${slug}" (alias "${alias}") is not defined in the dev config`);
    }
    out[alias] = res;
  }
  return out;
}

export function createTasksRouter(state: DevServerState): Router {
  const router = Router();

  router.post(
    '/tasks/execute',
    validateBody(executeTaskSchema, async (body: ExecuteTaskInput, req, res) => {
      // Set when a task calls back into the server.
      const parentRunID = readRunIDFromRequest(req);
      if (parentRunID && !state.runs.get(parentRunID)) {
        throw new NotFoundError(`run with parent id "${parentRunID}" not found`);
      }

      let task: TaskConfig;
      let stdAPIRequest: StdAPIRequest | undefined;
      if (isBuiltinSlug(body.slug)) {
        stdAPIRequest = builtinRequest(body.slug, body.paramValues);
        task = builtinTask(body.slug, body.resources);
      } else {
        const found = state.discoverer.getTask(body.slug);
        if (!found) throw new TaskNotFoundError(body.slug);
        task = found;
      }

      const aliasToResource = resolveResources(state, { ...task.resources, ...body.resources });
      const paramValues = applyParameterDefaults(task.parameters, body.paramValues);

      // Claimed synchronously below: a second execute of the same id sees the controller.
      let run = body.runID ? state.runs.get(body.runID) : undefined;
      if (run && (run.status !== 'Queued' || run.abortController)) {
        throw new BadRequestError(`run ${run.id} has already started`);
      }
      run ??= newLocalRun(body.runID);

      const abortController = new AbortController();
      run.taskID = task.slug;
      run.taskName = task.name;
      run.kind = task.kind;
      run.paramValues = paramValues;
      run.parameters = task.parameters;
      run.parentID = parentRunID ?? '';
      run.envSlug = STUDIO_ENV_ID;
      run.creatorID = state.authInfo.user?.id ?? '';
      run.resources = Object.fromEntries(Object.entries(aliasToResource).map(([alias, r]) => [alias, r.id]));
      run.isStdAPI = stdAPIRequest !== undefined;
      run.stdAPIRequest = stdAPIRequest ?? null;
      run.abortController = abortController;
      state.runs.add(task.slug, run.id, run);

      const result = await state.executor.execute({
        runID: run.id,
        parentRunID,
        task,
        paramValues,
        aliasToResource,
        stdAPIRequest,
        env: executionEnvironment(state),
        signal: abortController.signal,
      });
      if (result.warning) {
        log.warn(`task ${task.slug}: ${result.warning}`);
      }

      const finished = state.runs.get(run.id) ?? run;
      res.json(toRunRecord(finished));
    })
  );

  return router;
}
