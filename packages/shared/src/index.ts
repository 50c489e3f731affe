// Types
export type * from './types/api.types.js';
export type * from './types/attendance.types.js';
export type * from './types/connection.types.js';

// Validation schemas
export { loginSchema } from './validation/auth.schema.js';
export type { LoginInput } from './validation/auth.schema.js';

export { odooConnectionSchema } from './validation/connection.schema.js';
export type { OdooConnectionInput } from './validation/connection.schema.js';

export {
  checkInSchema,
  checkOutSchema,
  faceSubmissionSchema,
  attendanceHistoryQuerySchema,
} from './validation/attendance.schema.js';
export type {
  CheckInInput,
  CheckOutInput,
  FaceSubmissionInput,
  AttendanceHistoryQuery,
} from './validation/attendance.schema.js';

// Utils
export {
  formatOdooDatetime,
  parseOdooDatetime,
  elapsedSecondsSince,
  formatDuration,
} from './utils/odooDatetime.js';
