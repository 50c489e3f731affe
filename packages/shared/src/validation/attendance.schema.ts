import { z } from 'zod';

const latitude = z.number().min(-90).max(90);
const longitude = z.number().min(-180).max(180);

// Clients may send the photo as a data URL; only the base64 body is kept.
const photo = z
  .string()
  .trim()
  .transform((value) => value.replace(/^data:image\/[a-z+]+;base64,/i, ''))
  .pipe(z.string().min(1, 'Photo is required'));

export const checkInSchema = z.object({
  photo,
  latitude,
  longitude,
});

export const checkOutSchema = z.object({
  latitude,
  longitude,
});

export const faceSubmissionSchema = z.object({
  photo,
  latitude: latitude.optional(),
  longitude: longitude.optional(),
});

export const attendanceHistoryQuerySchema = z.object({
  from: z.string().datetime({ offset: true }).optional(),
  to: z.string().datetime({ offset: true }).optional(),
  limit: z.coerce.number().int().min(1).max(200).default(50),
});

export type CheckInInput = z.infer<typeof checkInSchema>;
export type CheckOutInput = z.infer<typeof checkOutSchema>;
export type FaceSubmissionInput = z.infer<typeof faceSubmissionSchema>;
export type AttendanceHistoryQuery = z.infer<typeof attendanceHistoryQuerySchema>;
