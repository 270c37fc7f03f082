import type { NextFunction, Request, RequestHandler, Response } from 'express';
import { Ajv } from 'ajv';
import type { AnySchemaObject } from 'ajv';

const ajv = new Ajv({ allErrors: true });

/**
 * Express middleware that validates `req.body` against a JSON Schema.
 *
 * Invalid bodies are answered with `400` and Ajv's error list; valid ones
 * continue to the next handler unchanged. A missing body counts as `{}`.
 */
export function validateBody(schema: AnySchemaObject): RequestHandler {
  const validate = ajv.compile(schema);
  return (req: Request, res: Response, next: NextFunction): void => {
    const body: unknown = req.body ?? {};
    if (!validate(body)) {
      res.status(400).json({
        error: 'Invalid request body',
        details: (validate.errors ?? []).map((e) => `${e.instancePath || '/'} ${e.message ?? 'is invalid'}`),
      });
      return;
    }
    next();
  };
}
