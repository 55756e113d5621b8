import type { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';

function isBodyParseError(err: unknown) {
  return err instanceof SyntaxError && 'type' in err && err.type === 'entity.parse.failed';
}

export function errorHandler(
  err: unknown,
  _req: Request,
  res: Response,
  _next: NextFunction
) {
  if (err instanceof ZodError) {
    return res.status(400).json({ error: 'ValidationError', issues: err.flatten() });
  }
  if (isBodyParseError(err)) {
    return res.status(400).json({ error: 'BadRequest' });
  }
  // eslint-disable-next-line no-console
  console.error(err);
  return res.status(500).json({ error: 'InternalServerError' });
}
