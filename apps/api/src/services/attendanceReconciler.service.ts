import { z } from 'zod';
import { formatOdooDatetime } from '@punchcard/shared';
import type {
  AttendanceAction,
  AttendanceActionFailure,
  AttendanceActionResult,
  AttendanceFailureKind,
  AttendanceStatus,
} from '@punchcard/shared';
import { logger } from '../utils/logger.js';
import { KeyedLock } from '../utils/keyedLock.js';
import { OdooRpcError } from './odooRpc.service.js';
import type { OdooModelClient } from './odooRpc.service.js';
import {
  CHECK_IN_GEO_FIELDS,
  CHECK_OUT_GEO_FIELDS,
  GeoCapability,
  isGeoFieldRejection,
} from './geoCapability.service.js';

export const ATTENDANCE_MODEL = 'hr.attendance';
export const NOT_AUTHENTICATED_ERROR = 'not authenticated';

export interface AttendanceContext {
  employeeId: number;
  client: OdooModelClient;
}

export interface AttendanceCapture {
  /** Base64 face photo, without a data URL prefix. Check-out does not need one. */
  photo?: string;
  latitude: number;
  longitude: number;
}

export interface AttendanceReconcilerOptions {
  /** null when there is no authenticated Odoo session. */
  context: AttendanceContext | null;
  geo: GeoCapability;
  /** Writes sharing a key never overlap. Defaults to the employee id. */
  lockKey?: string;
  lock?: KeyedLock;
  now?: () => Date;
}

const openAttendanceRowSchema = z.object({
  id: z.number().int(),
  check_in: z.string(),
});

const defaultLock = new KeyedLock();

type WriteOutcome = { ok: true; recordId: number } | { ok: false; error: unknown };

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Decides and performs check-in/check-out against hr.attendance.
 *
 * The open record on the server (check_out = false) is the only source of
 * truth for which action applies. Geo fields are sent while the connection's
 * capability allows them; a rejection naming one of them downgrades the
 * capability and the write is retried once without them.
 */
export class AttendanceReconciler {
  private readonly context: AttendanceContext | null;
  private readonly geo: GeoCapability;
  private readonly lock: KeyedLock;
  private readonly lockKey: string;
  private readonly now: () => Date;

  constructor(options: AttendanceReconcilerOptions) {
    this.context = options.context;
    this.geo = options.geo;
    this.lock = options.lock ?? defaultLock;
    this.lockKey = options.lockKey ?? `employee:${options.context?.employeeId ?? 'anonymous'}`;
    this.now = options.now ?? (() => new Date());
  }

  get geoCapability(): GeoCapability {
    return this.geo;
  }

  /** Reads the open record. Any failure reads as checked out. */
  async getCurrentStatus(): Promise<AttendanceStatus> {
    const context = this.context;
    if (!context) {
      return { isCheckedIn: false };
    }

    try {
      return await this.readOpenRecord(context);
    } catch (err) {
      logger.warn(
        { employeeId: context.employeeId, err: describeError(err) },
        'Could not read current attendance status',
      );
      return { isCheckedIn: false };
    }
  }

  async checkIn(capture: AttendanceCapture): Promise<AttendanceActionResult> {
    const context = this.context;
    if (!context) return this.notAuthenticated('check_in');
    return this.lock.runExclusive(this.lockKey, () => this.createCheckIn(context, capture));
  }

  async checkOut(recordId: number, latitude: number, longitude: number): Promise<AttendanceActionResult> {
    const context = this.context;
    if (!context) return this.notAuthenticated('check_out');
    return this.lock.runExclusive(this.lockKey, () =>
      this.writeCheckOut(context, recordId, latitude, longitude),
    );
  }

  /**
   * Performs the requested action after re-reading server state, refusing
   * when the server disagrees with the caller about the session.
   */
  async perform(action: AttendanceAction, capture: AttendanceCapture): Promise<AttendanceActionResult> {
    const context = this.context;
    if (!context) return this.notAuthenticated(action);

    return this.lock.runExclusive(this.lockKey, async () => {
      let status: AttendanceStatus;
      try {
        status = await this.readOpenRecord(context);
      } catch (err) {
        return this.failedFrom(action, err);
      }

      if (action === 'check_in') {
        if (status.isCheckedIn) {
          return this.failed('check_in', 'state_conflict', 'You are already checked in.');
        }
        return this.createCheckIn(context, capture);
      }

      if (!status.isCheckedIn) {
        return this.failed('check_out', 'state_conflict', 'You need to check in before checking out.');
      }
      return this.writeCheckOut(context, status.recordId, capture.latitude, capture.longitude);
    });
  }

  /** Toggles: checks out when a session is open, otherwise checks in. */
  async submit(capture: AttendanceCapture): Promise<AttendanceActionResult> {
    const context = this.context;
    if (!context) return this.notAuthenticated();

    return this.lock.runExclusive(this.lockKey, async () => {
      let status: AttendanceStatus;
      try {
        status = await this.readOpenRecord(context);
      } catch (err) {
        return this.failedFrom(undefined, err);
      }
      logger.debug(
        { employeeId: context.employeeId, isCheckedIn: status.isCheckedIn },
        'Resolved attendance action from server state',
      );

      return status.isCheckedIn
        ? this.writeCheckOut(context, status.recordId, capture.latitude, capture.longitude)
        : this.createCheckIn(context, capture);
    });
  }

  private async readOpenRecord(context: AttendanceContext): Promise<AttendanceStatus> {
    const rows = await context.client.searchRead(
      ATTENDANCE_MODEL,
      [
        ['employee_id', '=', context.employeeId],
        ['check_out', '=', false],
      ],
      ['id', 'check_in', 'check_out'],
      { limit: 1 },
    );
    if (rows.length === 0) {
      return { isCheckedIn: false };
    }

    const row = openAttendanceRowSchema.parse(rows[0]);
    return { isCheckedIn: true, recordId: row.id, checkInTime: row.check_in };
  }

  private async createCheckIn(
    context: AttendanceContext,
    capture: AttendanceCapture,
  ): Promise<AttendanceActionResult> {
    logger.info(
      { employeeId: context.employeeId, photoLength: capture.photo?.length ?? 0 },
      'Performing check-in',
    );

    return this.writeWithGeoFallback('check_in', CHECK_IN_GEO_FIELDS, async (includeGeo) => {
      const values: Record<string, unknown> = {
        employee_id: context.employeeId,
        check_in: formatOdooDatetime(this.now()),
      };
      if (includeGeo) {
        values.in_latitude = capture.latitude;
        values.in_longitude = capture.longitude;
      }
      return context.client.create(ATTENDANCE_MODEL, values);
    });
  }

  private async writeCheckOut(
    context: AttendanceContext,
    recordId: number,
    latitude: number,
    longitude: number,
  ): Promise<AttendanceActionResult> {
    logger.info({ employeeId: context.employeeId, recordId }, 'Performing check-out');

    return this.writeWithGeoFallback('check_out', CHECK_OUT_GEO_FIELDS, async (includeGeo) => {
      const values: Record<string, unknown> = {
        check_out: formatOdooDatetime(this.now()),
      };
      if (includeGeo) {
        values.out_latitude = latitude;
        values.out_longitude = longitude;
      }
      const written = await context.client.write(ATTENDANCE_MODEL, [recordId], values);
      if (!written) {
        throw new OdooRpcError('remote', 'Failed to check out');
      }
      return recordId;
    });
  }

  private async writeWithGeoFallback(
    action: AttendanceAction,
    geoFields: readonly string[],
    write: (includeGeo: boolean) => Promise<number>,
  ): Promise<AttendanceActionResult> {
    const includeGeo = this.geo.allowsGeo();
    const first = await this.attempt(write, includeGeo);
    if (first.ok) {
      if (includeGeo) this.geo.markSupported();
      return this.succeeded(action, first.recordId, includeGeo);
    }

    const rejectedGeo =
      includeGeo
      && first.error instanceof OdooRpcError
      && first.error.kind === 'remote'
      && isGeoFieldRejection(first.error.message, geoFields);
    if (!rejectedGeo) {
      return this.failedFrom(action, first.error);
    }

    if (this.geo.markUnsupported()) {
      logger.warn({ action, fields: geoFields }, 'Odoo rejected geo fields; sending attendance without location');
    }

    const retry = await this.attempt(write, false);
    return retry.ok
      ? this.succeeded(action, retry.recordId, false)
      : this.failedFrom(action, retry.error);
  }

  private async attempt(
    write: (includeGeo: boolean) => Promise<number>,
    includeGeo: boolean,
  ): Promise<WriteOutcome> {
    try {
      return { ok: true, recordId: await write(includeGeo) };
    } catch (error) {
      return { ok: false, error };
    }
  }

  private succeeded(action: AttendanceAction, recordId: number, geoRecorded: boolean): AttendanceActionResult {
    const verb = action === 'check_in' ? 'Checked in' : 'Checked out';
    logger.info({ action, recordId, geoRecorded }, 'Attendance recorded');
    return {
      success: true,
      action,
      recordId,
      geoRecorded,
      message: geoRecorded ? `${verb} with location.` : `${verb}.`,
    };
  }

  private failedFrom(action: AttendanceAction | undefined, error: unknown): AttendanceActionFailure {
    if (error instanceof OdooRpcError) {
      return this.failed(action, error.kind, error.message);
    }
    const label = action === undefined ? 'status read' : action === 'check_in' ? 'check-in' : 'check-out';
    return this.failed(action, 'remote', `Exception during ${label}: ${describeError(error)}`);
  }

  private failed(
    action: AttendanceAction | undefined,
    failure: AttendanceFailureKind,
    error: string,
  ): AttendanceActionFailure {
    if (failure !== 'state_conflict') {
      logger.warn({ action, failure, error }, 'Attendance action failed');
    }
    return action ? { success: false, action, failure, error } : { success: false, failure, error };
  }

  private notAuthenticated(action?: AttendanceAction): AttendanceActionFailure {
    return this.failed(action, 'not_authenticated', NOT_AUTHENTICATED_ERROR);
  }
}
