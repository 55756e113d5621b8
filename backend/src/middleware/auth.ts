import type { Request, Response, NextFunction } from 'express';

// No token configured means the API is open.
export function auth(expected?: string) {
  return (req: Request, res: Response, next: NextFunction) => {
    if (!expected) return next();
    const authHeader = req.header('authorization') || '';
    const token = authHeader.startsWith('Bearer ') ? authHeader.slice(7) : '';
    if (token && token === expected) return next();
    return res.status(401).json({ error: 'Unauthorized' });
  };
}
