import { z } from 'zod';
import type { LoginResponse, SessionUser } from '@punchcard/shared';
import { env } from '../config/env.js';
import { AppError } from '../middleware/errorHandler.js';
import type { OdooSession } from '../middleware/auth.js';
import { logger } from '../utils/logger.js';
import { signAccessToken } from '../utils/jwt.js';
import { encryptText } from '../utils/secureText.js';
import { getConnection } from './connection.service.js';
import { authenticateOdooUser, createOdooClient, OdooRpcError } from './odooRpc.service.js';

const employeeRowSchema = z.object({
  id: z.number().int(),
  name: z.string(),
});

function toAppError(err: unknown): unknown {
  if (err instanceof OdooRpcError) {
    return err.kind === 'transport'
      ? new AppError(502, `Could not reach Odoo: ${err.message}`)
      : new AppError(401, err.message);
  }
  return err;
}

export async function login(loginName: string, password: string): Promise<LoginResponse> {
  const connection = getConnection();

  let uid: number | null;
  try {
    uid = await authenticateOdooUser(connection, loginName, password);
  } catch (err) {
    throw toAppError(err);
  }

  if (uid === null) {
    logger.info({ login: loginName, database: connection.database }, 'Odoo rejected login');
    throw new AppError(401, 'Invalid login or password');
  }

  const client = createOdooClient({ ...connection, uid, password });
  let rows: unknown[];
  try {
    rows = await client.searchRead('hr.employee', [['user_id', '=', uid]], ['id', 'name'], { limit: 1 });
  } catch (err) {
    throw toAppError(err);
  }

  if (rows.length === 0) {
    throw new AppError(403, 'No employee record is linked to this user');
  }
  const employee = employeeRowSchema.parse(rows[0]);

  const accessToken = signAccessToken({
    sub: String(uid),
    login: loginName,
    baseUrl: connection.baseUrl,
    database: connection.database,
    employeeId: employee.id,
    employeeName: employee.name,
    secret: encryptText(password),
  });

  logger.info({ uid, employeeId: employee.id, database: connection.database }, 'User logged in');

  return {
    accessToken,
    expiresIn: env.JWT_EXPIRES_IN,
    user: {
      uid,
      login: loginName,
      employeeId: employee.id,
      employeeName: employee.name,
    },
    connection,
  };
}

export function toSessionUser(session: OdooSession): SessionUser {
  return {
    uid: session.uid,
    login: session.login,
    employeeId: session.employeeId,
    employeeName: session.employeeName,
  };
}
