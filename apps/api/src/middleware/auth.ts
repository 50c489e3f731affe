import type { Request, Response, NextFunction } from 'express';
import { verifyAccessToken } from '../utils/jwt.js';
import { decryptText } from '../utils/secureText.js';
import type { OdooCredentials } from '../services/odooRpc.service.js';

export interface OdooSession extends OdooCredentials {
  login: string;
  employeeId: number;
  employeeName: string;
}

declare global {
  namespace Express {
    interface Request {
      odoo?: OdooSession;
    }
  }
}

export function authenticate(req: Request, res: Response, next: NextFunction): void {
  const authHeader = req.headers.authorization;
  if (!authHeader?.startsWith('Bearer ')) {
    res.status(401).json({ success: false, error: 'No token provided' });
    return;
  }

  const token = authHeader.slice(7);
  try {
    const payload = verifyAccessToken(token);
    req.odoo = {
      uid: Number(payload.sub),
      login: payload.login,
      password: decryptText(payload.secret),
      baseUrl: payload.baseUrl,
      database: payload.database,
      employeeId: payload.employeeId,
      employeeName: payload.employeeName,
    };
    next();
  } catch {
    res.status(401).json({ success: false, error: 'Invalid or expired token' });
  }
}
