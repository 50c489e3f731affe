import { z } from 'zod';
import {
  elapsedSecondsSince,
  formatDuration,
  formatOdooDatetime,
  parseOdooDatetime,
} from '@punchcard/shared';
import type {
  AttendanceHistoryQuery,
  AttendanceRecord,
  AttendanceSummary,
  GeoCapabilityState,
  GeoPoint,
} from '@punchcard/shared';
import { ATTENDANCE_MODEL } from './attendanceReconciler.service.js';
import type { OdooModelClient } from './odooRpc.service.js';

const BASE_FIELDS = ['id', 'check_in', 'check_out', 'worked_hours'];
const GEO_FIELDS = ['in_latitude', 'in_longitude', 'out_latitude', 'out_longitude'];

// Odoo sends `false` for empty fields.
const optionalNumber = z.union([z.number(), z.literal(false)]).optional();

const attendanceRowSchema = z.object({
  id: z.number().int(),
  check_in: z.string(),
  check_out: z.union([z.string(), z.literal(false)]),
  worked_hours: optionalNumber,
  in_latitude: optionalNumber,
  in_longitude: optionalNumber,
  out_latitude: optionalNumber,
  out_longitude: optionalNumber,
});

type AttendanceRow = z.infer<typeof attendanceRowSchema>;

function toGeoPoint(
  latitude: number | false | undefined,
  longitude: number | false | undefined,
): GeoPoint | undefined {
  if (typeof latitude !== 'number' || typeof longitude !== 'number') return undefined;
  // Odoo stores unset float fields as 0.0
  if (latitude === 0 && longitude === 0) return undefined;
  return { latitude, longitude };
}

export function toAttendanceRecord(row: AttendanceRow): AttendanceRecord {
  const record: AttendanceRecord = {
    id: row.id,
    checkIn: row.check_in,
    checkOut: row.check_out === false ? null : row.check_out,
  };
  if (typeof row.worked_hours === 'number') {
    record.workedHours = row.worked_hours;
  }
  const checkInLocation = toGeoPoint(row.in_latitude, row.in_longitude);
  if (checkInLocation) record.checkInLocation = checkInLocation;
  const checkOutLocation = toGeoPoint(row.out_latitude, row.out_longitude);
  if (checkOutLocation) record.checkOutLocation = checkOutLocation;
  return record;
}

/**
 * Lists an employee's attendance, newest first. Location fields are only
 * requested once the server is known to have them; asking for a missing
 * field fails the whole read.
 */
export async function listAttendance(
  client: OdooModelClient,
  employeeId: number,
  query: AttendanceHistoryQuery,
  geoState: GeoCapabilityState,
): Promise<AttendanceRecord[]> {
  const domain: unknown[] = [['employee_id', '=', employeeId]];
  if (query.from) {
    domain.push(['check_in', '>=', formatOdooDatetime(new Date(query.from))]);
  }
  if (query.to) {
    domain.push(['check_in', '<', formatOdooDatetime(new Date(query.to))]);
  }

  const fields = geoState === 'supported' ? [...BASE_FIELDS, ...GEO_FIELDS] : BASE_FIELDS;
  const rows = await client.searchRead(ATTENDANCE_MODEL, domain, fields, {
    order: 'check_in desc',
    limit: query.limit,
  });

  return rows.map((row) => toAttendanceRecord(attendanceRowSchema.parse(row)));
}

function sessionSeconds(record: AttendanceRecord, now: Date): number {
  if (record.checkOut === null) {
    return elapsedSecondsSince(record.checkIn, now);
  }
  const start = parseOdooDatetime(record.checkIn);
  const end = parseOdooDatetime(record.checkOut);
  if (!start || !end) return 0;
  return Math.max(0, Math.floor((end.getTime() - start.getTime()) / 1000));
}

export function summarizeAttendance(records: AttendanceRecord[], now: Date = new Date()): AttendanceSummary {
  const openRecord = records.find((record) => record.checkOut === null) ?? null;
  const totalWorkedSeconds = records.reduce((total, record) => total + sessionSeconds(record, now), 0);

  return {
    records,
    openRecord,
    elapsedSeconds: openRecord ? elapsedSecondsSince(openRecord.checkIn, now) : 0,
    totalWorkedSeconds,
    totalWorked: formatDuration(totalWorkedSeconds),
  };
}
