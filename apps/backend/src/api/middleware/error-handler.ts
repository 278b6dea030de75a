import { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import logger from '../../utils/logger';
import { AppError, NotFoundError, errorMessage } from '../../utils/errors';
import { formatZodError } from '../../middleware/validation';

export const notFoundHandler = (req: Request, res: Response, next: NextFunction) => {
  next(new NotFoundError(`Can't find ${req.originalUrl} on this server`));
};

export const errorHandler = (err: unknown, req: Request, res: Response, next: NextFunction) => {
  const { method, originalUrl } = req;

  if (res.headersSent) {
    next(err);
    return;
  }

  if (err instanceof AppError) {
    const line = `${err.name}: ${err.message}, Route: ${method} ${originalUrl}`;
    if (err.statusCode >= 500) {
      logger.error(line, { code: err.code, details: err.details });
    } else {
      logger.warn(line);
    }

    res.status(err.statusCode).json({
      status: 'error',
      code: err.code,
      message: err.message
    });
    return;
  }

  if (err instanceof ZodError) {
    const message = formatZodError(err);
    logger.warn(`Validation Error: ${message}, Route: ${method} ${originalUrl}`);
    res.status(400).json({ status: 'error', code: 'INVALID_INPUT', message });
    return;
  }

  // body-parser rejects malformed JSON with a 400 status of its own
  if (err instanceof SyntaxError && 'status' in err && err.status === 400) {
    logger.warn(`Malformed JSON body, Route: ${method} ${originalUrl}`);
    res.status(400).json({ status: 'error', code: 'INVALID_INPUT', message: 'Invalid JSON payload' });
    return;
  }

  logger.error(`Unhandled Error: ${errorMessage(err)}, Route: ${method} ${originalUrl}`, {
    stack: err instanceof Error ? err.stack : undefined
  });
  res.status(500).json({
    status: 'error',
    code: 'INTERNAL_ERROR',
    message: 'An unexpected error occurred'
  });
};

export default errorHandler;
