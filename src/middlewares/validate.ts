/**
 * Request validation.
 * Wraps a route handler: the request part named by `source` is parsed with a zod
 * schema and the handler receives the typed result. Anything the handler throws goes to next().
 */

import type { NextFunction, Request, RequestHandler, Response } from 'express';
import { z, ZodError } from 'zod';
import { createLogger } from '../logger.js';

const log = createLogger('validate');

export type RequestSource = 'body' | 'query' | 'params';

export type ValidatedHandler<T> = (data: T, req: Request, res: Response) => Promise<void> | void;

export function validate<T extends z.ZodTypeAny>(
  schema: T,
  source: RequestSource,
  handler: ValidatedHandler<z.infer<T>>
): RequestHandler {
  return async (req: Request, res: Response, next: NextFunction) => {
    let data: z.infer<T>;
    try {
      data = await schema.parseAsync(req[source]);
    } catch (error) {
      if (error instanceof ZodError) {
        const details = error.issues.map((issue) => ({
          field: issue.path.join('.'),
          message: issue.message,
          code: issue.code,
        }));
        log.debug({ path: req.path, details }, 'validation failed');
        res.status(400).json({ error: 'Validation failed', details });
        return;
      }
      next(error);
      return;
    }

    try {
      await handler(data, req, res);
    } catch (err) {
      next(err);
    }
  };
}

export const validateBody = <T extends z.ZodTypeAny>(schema: T, handler: ValidatedHandler<z.infer<T>>) =>
  validate(schema, 'body', handler);

export const validateQuery = <T extends z.ZodTypeAny>(schema: T, handler: ValidatedHandler<z.infer<T>>) =>
  validate(schema, 'query', handler);

export const validateParams = <T extends z.ZodTypeAny>(schema: T, handler: ValidatedHandler<z.infer<T>>) =>
  validate(schema, 'params', handler);
