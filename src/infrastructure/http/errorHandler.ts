import type { ErrorRequestHandler } from 'express';
import type { Logger } from 'pino';
import { ZodError } from 'zod';
import { AppError, ValidationError } from '../../domain/errors/AppError.js';
import { toIssues } from '../../application/services/ProfileValidator.js';

const isBodyParseError = (err: unknown): boolean =>
  err instanceof SyntaxError && 'type' in err && err.type === 'entity.parse.failed';

export const errorHandler =
  (logger: Logger): ErrorRequestHandler =>
  (err: unknown, req, res, _next) => {
    if (isBodyParseError(err)) {
      return res.status(400).json({ error: 'invalid_json', message: 'Request body is not valid JSON' });
    }

    if (err instanceof ZodError) {
      const validation = new ValidationError('Invalid request', toIssues(err));
      return res.status(validation.statusCode).json(validation.toResponse());
    }

    if (err instanceof AppError) {
      if (err.statusCode >= 500) {
        logger.error({ err, method: req.method, path: req.path }, 'Request failed');
      }
      return res.status(err.statusCode).json(err.toResponse());
    }

    logger.error({ err, method: req.method, path: req.path }, 'Unhandled error');
    return res.status(500).json({ error: 'internal_error', message: 'An unexpected error occurred' });
  };
