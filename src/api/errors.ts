import { Request, Response } from 'express';
import { ConnectionError, ValidationError } from '../utils/errors/errors';
import { err } from '../utils/log';

/**
 * An error meant for the client, with the HTTP status to answer with.
 */
export class ApiError extends Error {
  statusCode: number;
  constructor(message: string, statusCode: number) {
    super(message);
    this.name = 'ApiError';
    this.statusCode = statusCode;
  }
}

export function statusForError(error: unknown): number {
  if (error instanceof ApiError) {
    return error.statusCode;
  }
  if (error instanceof ValidationError) {
    return 400;
  }
  if (error instanceof ConnectionError) {
    return 503;
  }
  return 500;
}

/**
 * Answers a failed request. Validation failures also list every problem found.
 */
export function sendError(res: Response, error: unknown) {
  const status = statusForError(error);
  const message = error instanceof Error ? error.message : 'Unknown error';
  if (status >= 500) {
    err(message, { status });
  }
  if (error instanceof ValidationError) {
    res.status(status).json({ error: message, errors: error.errors });
    return;
  }
  res.status(status).json({ error: message });
}

/**
 * Wraps an API function as an Express handler that answers with its result as JSON.
 */
export function handle(fn: (request: Request) => unknown) {
  return async (req: Request, res: Response) => {
    try {
      res.json(await fn(req));
    } catch (error) {
      sendError(res, error);
    }
  };
}
