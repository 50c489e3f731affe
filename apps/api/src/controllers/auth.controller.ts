import type { Request, Response, NextFunction } from 'express';
import { loginSchema } from '@punchcard/shared';
import type { ApiResponse, LoginResponse, OdooConnection, SessionUser } from '@punchcard/shared';
import { AppError } from '../middleware/errorHandler.js';
import * as authService from '../services/auth.service.js';

export async function login(req: Request, res: Response<ApiResponse<LoginResponse>>, next: NextFunction) {
  try {
    const { login, password } = loginSchema.parse(req.body);
    const result = await authService.login(login, password);
    res.json({ success: true, data: result });
  } catch (err) {
    next(err);
  }
}

export function me(
  req: Request,
  res: Response<ApiResponse<{ user: SessionUser; connection: OdooConnection }>>,
  next: NextFunction,
) {
  if (!req.odoo) {
    next(new AppError(401, 'not authenticated'));
    return;
  }
  res.json({
    success: true,
    data: {
      user: authService.toSessionUser(req.odoo),
      connection: { baseUrl: req.odoo.baseUrl, database: req.odoo.database },
    },
  });
}
