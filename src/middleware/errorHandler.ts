import { NextFunction, Request, Response } from 'express';
import { HttpError } from '../utils/errors';

interface ExposedError {
  status: number;
  message: string;
  expose: true;
}

// body-parser and friends raise http-errors with `expose` set for client faults.
const isExposedClientError = (error: unknown): error is ExposedError =>
  typeof error === 'object' &&
  error !== null &&
  'expose' in error &&
  error.expose === true &&
  'status' in error &&
  typeof error.status === 'number' &&
  error.status >= 400 &&
  error.status < 500 &&
  'message' in error &&
  typeof error.message === 'string';

export const notFound = (_req: Request, res: Response): void => {
  res.status(404).type('text/plain').send('Not found');
};

export const errorHandler = (
  error: unknown,
  _req: Request,
  res: Response,
  next: NextFunction
): void => {
  if (res.headersSent) {
    next(error);
    return;
  }

  if (error instanceof HttpError) {
    res.status(error.status).type('text/plain').send(error.message);
    return;
  }

  if (isExposedClientError(error)) {
    res.status(error.status).type('text/plain').send(error.message);
    return;
  }

  console.error('Unhandled request error:', error);
  res.status(500).type('text/plain').send('Internal Server Error');
};
