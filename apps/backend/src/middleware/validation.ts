import { z } from 'zod';
import { InvalidInputError } from '../utils/errors';
import logger from '../utils/logger';
import { Result, createError, createSuccess } from '../utils/result';

export function formatZodError(error: z.ZodError): string {
  return error.errors.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join(', ');
}

export function validateRequest<T>(data: unknown, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Result<T, string> {
  const parsed = schema.safeParse(data);

  if (parsed.success) {
    return createSuccess(parsed.data);
  }

  const formattedError = formatZodError(parsed.error);
  logger.debug(`Validation error: ${formattedError}`);
  return createError(formattedError);
}

/** Like validateRequest, but throws InvalidInputError for the error handler. */
export function parseRequest<T>(data: unknown, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T {
  const result = validateRequest(data, schema);

  if (!result.success) {
    throw new InvalidInputError(result.error);
  }

  return result.data;
}
