export type AttendanceAction = 'check_in' | 'check_out';

export type GeoCapabilityState = 'unknown' | 'supported' | 'unsupported';

export interface GeoPoint {
  latitude: number;
  longitude: number;
}

export interface AttendanceRecord {
  id: number;
  /** Odoo UTC datetime, `YYYY-MM-DD HH:MM:SS`. */
  checkIn: string;
  checkOut: string | null;
  workedHours?: number;
  checkInLocation?: GeoPoint;
  checkOutLocation?: GeoPoint;
}

export type AttendanceStatus =
  | { isCheckedIn: false }
  | { isCheckedIn: true; recordId: number; checkInTime: string };

export type AttendanceFailureKind =
  | 'not_authenticated'
  | 'transport'
  | 'remote'
  | 'state_conflict';

export interface AttendanceActionSuccess {
  success: true;
  action: AttendanceAction;
  recordId: number;
  message: string;
  geoRecorded: boolean;
}

export interface AttendanceActionFailure {
  success: false;
  action?: AttendanceAction;
  error: string;
  failure: AttendanceFailureKind;
}

export type AttendanceActionResult = AttendanceActionSuccess | AttendanceActionFailure;

export interface AttendanceStatusResponse {
  status: AttendanceStatus;
  elapsedSeconds: number;
  elapsed: string;
  geoCapability: GeoCapabilityState;
}

export interface AttendanceSummary {
  records: AttendanceRecord[];
  openRecord: AttendanceRecord | null;
  elapsedSeconds: number;
  totalWorkedSeconds: number;
  totalWorked: string;
}

export interface FaceVerificationResult {
  success: boolean;
  message?: string;
  error?: string;
}
