import { z } from 'zod';

export const odooConnectionSchema = z.object({
  baseUrl: z
    .string()
    .trim()
    .min(1, 'Server URL is required')
    .url('Server URL must include http:// or https://')
    .transform((value) => value.replace(/\/+$/, '')),
  database: z.string().trim().min(1, 'Database is required'),
});

export type OdooConnectionInput = z.infer<typeof odooConnectionSchema>;
