import type { ErrorRequestHandler } from 'express';
import { ZodError } from 'zod';
import { HttpError, InvalidParameterError } from '../errors.js';

function postgresCode(err: unknown): string | null {
  if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return null;
}

export const errorHandler: ErrorRequestHandler = (err, _req, res, _next) => {
  if (err instanceof ZodError) {
    return res.status(400).json({
      message: 'validation_failed',
      issues: err.issues,
    });
  }

  if (err instanceof InvalidParameterError) {
    return res.status(err.statusCode).json({
      message: err.message,
      parameter: err.parameter,
      details: err.details,
    });
  }

  if (err instanceof HttpError) {
    return res.status(err.statusCode).json({
      message: err.message,
      details: err.details,
    });
  }

  if (postgresCode(err) === '23505') {
    return res.status(409).json({
      message: 'conflict',
    });
  }

  if (err instanceof Error) {
    console.error(`[api] ${err.stack ?? err.message}`);
    return res.status(500).json({
      message: err.message,
    });
  }

  return res.status(500).json({
    message: 'internal_error',
  });
};
