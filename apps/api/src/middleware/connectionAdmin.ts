import crypto from 'crypto';
import type { Request, Response, NextFunction } from 'express';
import { env } from '../config/env.js';
import { logger } from '../utils/logger.js';

export const ADMIN_TOKEN_HEADER = 'x-admin-token';

function digest(value: string): Buffer {
  return crypto.createHash('sha256').update(value).digest();
}

/** Guards routes that repoint or test the Odoo connection. */
export function requireConnectionAdmin(req: Request, res: Response, next: NextFunction): void {
  const expected = env.CONNECTION_ADMIN_TOKEN;
  if (!expected) {
    res.status(403).json({ success: false, error: 'Connection changes are disabled on this server' });
    return;
  }

  const provided = req.get(ADMIN_TOKEN_HEADER);
  if (!provided || !crypto.timingSafeEqual(digest(provided), digest(expected))) {
    logger.warn({ ip: req.ip, path: req.path }, 'Connection change rejected');
    res.status(401).json({ success: false, error: 'Admin token required' });
    return;
  }

  next();
}
