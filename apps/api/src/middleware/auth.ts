import { timingSafeEqual } from 'node:crypto';
import type { Request, Response, NextFunction } from 'express';

function matches(given: string, expected: string): boolean {
  const a = Buffer.from(given);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
}

/** Guards endpoints that change runtime state (cooldown resets). */
export function requireAdmin(req: Request, res: Response, next: NextFunction): void {
  const adminPassword = process.env.ADMIN_PASSWORD;
  if (!adminPassword) {
    res.status(503).json({ error: 'Admin endpoints are disabled: ADMIN_PASSWORD not configured' });
    return;
  }

  const [scheme, token] = (req.headers.authorization ?? '').split(' ');
  if (scheme !== 'Bearer' || !token) {
    res.status(401).json({ error: 'Expected Authorization: Bearer <password>' });
    return;
  }

  if (!matches(token, adminPassword)) {
    res.status(403).json({ error: 'Invalid admin password' });
    return;
  }

  next();
}
