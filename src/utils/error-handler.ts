import { logger } from './logger.js';

export type ErrorCode = 'not_found' | 'validation' | 'unauthorized' | 'internal';

export class BotError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly recoverable: boolean = true,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'BotError';
  }
}

export class NotFoundError extends BotError {
  constructor(entity: string, id: string | number) {
    super(`${entity} ${id} does not exist`, 'not_found', true, { entity, id });
    this.name = 'NotFoundError';
  }
}

export class ValidationError extends BotError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'validation', true, context);
    this.name = 'ValidationError';
  }
}

export class AuthorizationError extends BotError {
  constructor(handle: string | undefined, action: string) {
    super(`${handle ?? 'anonymous'} is not allowed to ${action}`, 'unauthorized', true, { handle, action });
    this.name = 'AuthorizationError';
  }
}

const STATUS_BY_CODE: Record<ErrorCode, number> = {
  not_found: 404,
  validation: 400,
  unauthorized: 403,
  internal: 500,
};

export function httpStatusFor(error: unknown): number {
  return error instanceof BotError ? STATUS_BY_CODE[error.code] : 500;
}

export function toErrorBody(error: unknown): { error: { code: ErrorCode; message: string } } {
  if (error instanceof BotError) {
    return { error: { code: error.code, message: error.message } };
  }
  return { error: { code: 'internal', message: 'Internal server error' } };
}

/** Postgres unique/foreign-key violations surface as validation errors. */
export function fromDatabaseError(error: unknown): unknown {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const { code } = error;
    if (code === '23505') return new ValidationError('Duplicate key', { pgCode: code });
    if (code === '23503') return new ValidationError('Referenced record does not exist', { pgCode: code });
  }
  return error;
}

export function handleError(error: unknown, context?: string): string {
  if (error instanceof BotError) {
    logger.warn({ code: error.code, context: error.context }, `[${context}] ${error.message}`);
    if (error.code === 'unauthorized') return 'Only admins can do that.';
    return error.recoverable
      ? `Something went wrong: ${error.message}.`
      : `I ran into an issue: ${error.message}. Let me flag this for review.`;
  }

  if (error instanceof Error) {
    logger.error({ stack: error.stack }, `[${context}] Unexpected error: ${error.message}`);
    return 'Something went wrong processing your request. I\'ve logged the error for review.';
  }

  logger.error({ error }, `[${context}] Unknown error`);
  return 'An unexpected error occurred. I\'ve logged it for review.';
}
