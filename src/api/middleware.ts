import type { NextFunction, Request, RequestHandler, Response } from 'express';
import { z } from 'zod';
import type { AccessChecker } from '../services/access-store.js';
import { AuthorizationError, ValidationError, httpStatusFor, toErrorBody } from '../utils/error-handler.js';
import { logger } from '../utils/logger.js';

export const ACTOR_HEADER = 'x-user-handle';

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

/** Forwards rejections to the error middleware (express 4 does not). */
export function asyncHandler(handler: AsyncHandler): RequestHandler {
  return (req, res, next) => {
    handler(req, res).catch(next);
  };
}

export function actorOf(req: Request): string | undefined {
  const handle = req.header(ACTOR_HEADER)?.trim();
  return handle || undefined;
}

export function requireActor(req: Request): string {
  const actor = actorOf(req);
  if (!actor) throw new AuthorizationError(undefined, 'act without an identity');
  return actor;
}

export function requireAdmin(access: AccessChecker, action: string): RequestHandler {
  return (req, _res, next) => {
    const actor = actorOf(req);
    if (!access.isAdmin(actor)) {
      next(new AuthorizationError(actor, action));
      return;
    }
    next();
  };
}

export function parseId(raw: string | undefined, entity: string): number {
  const id = Number(raw);
  if (!Number.isInteger(id) || id <= 0) {
    throw new ValidationError(`Invalid ${entity} id "${raw}"`);
  }
  return id;
}

export function parseBody<T extends z.ZodTypeAny>(schema: T, body: unknown): z.infer<T> {
  const result = schema.safeParse(body);
  if (!result.success) {
    const message = result.error.issues.map((issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`).join('; ');
    throw new ValidationError(message);
  }
  return result.data;
}

// Express recognizes error middleware by its four parameters
export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction): void {
  // express.json() reports unparseable bodies as SyntaxError
  const error = err instanceof SyntaxError ? new ValidationError('Malformed JSON body') : err;
  const status = httpStatusFor(error);
  if (status >= 500) {
    logger.error({ err: error, method: req.method, path: req.path }, 'API request failed');
  } else {
    logger.debug({ status, method: req.method, path: req.path }, 'API request rejected');
  }
  res.status(status).json(toErrorBody(error));
}
