import type { ErrorRequestHandler, NextFunction, Request, RequestHandler, Response } from 'express';
import type { ZodIssue } from 'zod';
import { createLogger } from './logger';

const log = createLogger('http');

export class HttpError extends Error {
  constructor(
    public readonly status: number,
    message: string,
  ) {
    super(message);
    this.name = 'HttpError';
  }
}

export class EspnFantasyError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'EspnFantasyError';
  }
}

export class ValidationError extends Error {
  constructor(
    public readonly entity: string,
    public readonly issues: ZodIssue[],
  ) {
    super(`Invalid ${entity}: ${issues.map((issue) => issue.message).join('; ')}`);
    this.name = 'ValidationError';
  }
}

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : 'Unknown error';

export const handleError = (res: Response, error: unknown) => {
  if (error instanceof HttpError) {
    res.status(error.status).json({ error: error.message });
    return;
  }

  log.error(`Request failed: ${errorMessage(error)}`);
  res.status(500).json({ error: errorMessage(error) });
};

type AsyncHandler = (req: Request, res: Response) => Promise<unknown>;

export const asyncRoute =
  (handler: AsyncHandler): RequestHandler =>
  (req: Request, res: Response, _next: NextFunction) => {
    handler(req, res).catch((error: unknown) => handleError(res, error));
  };

const statusOf = (error: unknown): number | undefined =>
  typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number'
    ? error.status
    : undefined;

const isParseFailure = (error: unknown): boolean =>
  typeof error === 'object' && error !== null && 'type' in error && error.type === 'entity.parse.failed';

/** Client errors raised by middleware (body-parser) keep their status. */
export function toHttpError(error: unknown): unknown {
  if (error instanceof HttpError) {
    return error;
  }
  if (isParseFailure(error)) {
    return new HttpError(400, 'Malformed JSON body');
  }
  const status = statusOf(error);
  if (status !== undefined && status >= 400 && status < 500) {
    return new HttpError(status, errorMessage(error));
  }
  return error;
}

export const notFound: RequestHandler = (_req, _res, next) => {
  next(new HttpError(404, 'Not found'));
};

export const errorHandler: ErrorRequestHandler = (error: unknown, _req: Request, res: Response, next: NextFunction) => {
  if (res.headersSent) {
    next(error);
    return;
  }
  handleError(res, toHttpError(error));
};
