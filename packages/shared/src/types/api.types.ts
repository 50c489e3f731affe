import type { OdooConnection } from './connection.types.js';

export interface ApiResponse<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
  message?: string;
  details?: Record<string, string[] | undefined>;
}

export interface SessionUser {
  uid: number;
  login: string;
  employeeId: number;
  employeeName: string;
}

export interface LoginResponse {
  accessToken: string;
  expiresIn: number;
  user: SessionUser;
  connection: OdooConnection;
}
