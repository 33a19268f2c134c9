import { Request, Response, NextFunction } from 'express';
import { ZodTypeAny } from 'zod';

export interface ValidationSchemas {
  body?: ZodTypeAny;
  params?: ZodTypeAny;
  query?: ZodTypeAny;
}

/**
 * Zod validation middleware. Rejects the request before the handler runs;
 * the ZodError goes to errorHandler, which answers 400 VALIDATION_ERROR.
 * Handlers parse again with the same schema to get typed values.
 */
export function validate(schemas: ValidationSchemas) {
  return (req: Request, _res: Response, next: NextFunction): void => {
    const parts: Array<[ZodTypeAny | undefined, unknown]> = [
      [schemas.params, req.params],
      [schemas.query, req.query],
      [schemas.body, req.body],
    ];

    for (const [schema, value] of parts) {
      if (!schema) {
        continue;
      }
      const result = schema.safeParse(value);
      if (!result.success) {
        next(result.error);
        return;
      }
    }
    next();
  };
}
