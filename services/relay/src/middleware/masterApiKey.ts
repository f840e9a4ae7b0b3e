import { timingSafeEqual } from 'crypto';
import type { NextFunction, Request, Response } from 'express';

function sameKey(incoming: string, expected: string): boolean {
  const a = Buffer.from(incoming, 'utf8');
  const b = Buffer.from(expected, 'utf8');
  return a.length === b.length && timingSafeEqual(a, b);
}

/** An empty key leaves the routes open, for local runs. */
export function createMasterApiKeyMiddleware(masterApiKey: string) {
  return (req: Request, res: Response, next: NextFunction) => {
    if (!masterApiKey) {
      next();
      return;
    }

    if (!sameKey(req.header('x-api-key') || '', masterApiKey)) {
      res.status(401).json({
        error: {
          code: 'UNAUTHORIZED',
          message: 'Missing or invalid x-api-key',
        },
      });
      return;
    }

    next();
  };
}
