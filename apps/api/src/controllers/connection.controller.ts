import type { Request, Response, NextFunction } from 'express';
import { odooConnectionSchema } from '@punchcard/shared';
import type { ApiResponse, ConnectionTestResult, OdooConnection } from '@punchcard/shared';
import * as connectionService from '../services/connection.service.js';

type ConnectionSettings = { current: OdooConnection; defaults: OdooConnection };

export function get(_req: Request, res: Response<ApiResponse<ConnectionSettings>>) {
  res.json({
    success: true,
    data: {
      current: connectionService.getConnection(),
      defaults: connectionService.getDefaultConnection(),
    },
  });
}

export function update(req: Request, res: Response<ApiResponse<OdooConnection>>, next: NextFunction) {
  try {
    const input = odooConnectionSchema.parse(req.body);
    const connection = connectionService.updateConnection(input);
    res.json({ success: true, data: connection, message: 'Configuration saved successfully.' });
  } catch (err) {
    next(err);
  }
}

export async function test(req: Request, res: Response<ApiResponse<ConnectionTestResult>>, next: NextFunction) {
  try {
    const input = odooConnectionSchema.parse(req.body);
    const result = await connectionService.testConnection(input);
    res.json({
      success: result.reachable,
      data: result,
      ...(result.reachable
        ? { message: `Successfully reached Odoo server at ${input.baseUrl}.` }
        : { error: result.error }),
    });
  } catch (err) {
    next(err);
  }
}

export function reset(_req: Request, res: Response<ApiResponse<OdooConnection>>) {
  res.json({ success: true, data: connectionService.resetConnection() });
}
