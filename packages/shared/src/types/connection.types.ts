export interface OdooConnection {
  baseUrl: string;
  database: string;
}

export interface ConnectionTestResult {
  reachable: boolean;
  serverVersion?: string;
  error?: string;
}
