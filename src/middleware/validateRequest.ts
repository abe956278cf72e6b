import { Request } from 'express';
import { z } from 'zod';
import { errors } from '../utils/errors.js';

/**
 * Parses `req.query` against a zod schema. Failures surface as a 422 whose
 * detail lists each offending field as `["query", <field>]`.
 */
export function validateQuery<T extends z.ZodTypeAny>(schema: T, req: Request): z.infer<T> {
  const result = schema.safeParse(req.query);

  if (!result.success) {
    throw errors.unprocessable(result.error.issues.map(issue => ({
      loc: ['query', ...issue.path],
      msg: issue.message
    })));
  }

  return result.data;
}
