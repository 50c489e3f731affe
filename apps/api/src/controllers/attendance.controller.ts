import type { Request, Response, NextFunction } from 'express';
import {
  attendanceHistoryQuerySchema,
  checkInSchema,
  checkOutSchema,
  elapsedSecondsSince,
  faceSubmissionSchema,
  formatDuration,
} from '@punchcard/shared';
import type {
  ApiResponse,
  AttendanceActionResult,
  AttendanceActionSuccess,
  AttendanceFailureKind,
  AttendanceStatus,
  AttendanceStatusResponse,
  AttendanceSummary,
  FaceVerificationResult,
} from '@punchcard/shared';
import { AppError } from '../middleware/errorHandler.js';
import type { OdooSession } from '../middleware/auth.js';
import { AttendanceReconciler } from '../services/attendanceReconciler.service.js';
import { listAttendance, summarizeAttendance } from '../services/attendance.service.js';
import { connectionKey } from '../services/connection.service.js';
import { submitFaceViaController } from '../services/faceVerification.service.js';
import { geoCapabilities } from '../services/geoCapability.service.js';
import { createOdooClient } from '../services/odooRpc.service.js';

const FAILURE_STATUS: Record<AttendanceFailureKind, number> = {
  not_authenticated: 401,
  state_conflict: 409,
  transport: 502,
  remote: 422,
};

function requireSession(req: Request): OdooSession {
  if (!req.odoo) {
    throw new AppError(401, 'not authenticated');
  }
  return req.odoo;
}

function reconcilerFor(session: OdooSession): AttendanceReconciler {
  const key = connectionKey(session);
  return new AttendanceReconciler({
    context: { employeeId: session.employeeId, client: createOdooClient(session) },
    geo: geoCapabilities.forConnection(key),
    lockKey: `${key}:${session.employeeId}`,
  });
}

type ActionResponse = Response<ApiResponse<AttendanceActionSuccess>>;

function sendActionResult(res: ActionResponse, result: AttendanceActionResult): void {
  if (!result.success) {
    throw new AppError(FAILURE_STATUS[result.failure], result.error);
  }
  res.json({ success: true, data: result, message: result.message });
}

export async function status(
  req: Request,
  res: Response<ApiResponse<AttendanceStatusResponse>>,
  next: NextFunction,
) {
  try {
    const reconciler = reconcilerFor(requireSession(req));
    const current = await reconciler.getCurrentStatus();
    const elapsedSeconds = current.isCheckedIn ? elapsedSecondsSince(current.checkInTime) : 0;

    const data: AttendanceStatusResponse = {
      status: current,
      elapsedSeconds,
      elapsed: formatDuration(elapsedSeconds),
      geoCapability: reconciler.geoCapability.state,
    };
    res.json({ success: true, data });
  } catch (err) {
    next(err);
  }
}

export async function checkIn(req: Request, res: ActionResponse, next: NextFunction) {
  try {
    const session = requireSession(req);
    const input = checkInSchema.parse(req.body);
    sendActionResult(res, await reconcilerFor(session).perform('check_in', input));
  } catch (err) {
    next(err);
  }
}

export async function checkOut(req: Request, res: ActionResponse, next: NextFunction) {
  try {
    const session = requireSession(req);
    const { latitude, longitude } = checkOutSchema.parse(req.body);
    // The record to close always comes from the server, never from the client.
    sendActionResult(
      res,
      await reconcilerFor(session).perform('check_out', { latitude, longitude }),
    );
  } catch (err) {
    next(err);
  }
}

export async function submit(req: Request, res: ActionResponse, next: NextFunction) {
  try {
    const session = requireSession(req);
    const input = checkInSchema.parse(req.body);
    sendActionResult(res, await reconcilerFor(session).submit(input));
  } catch (err) {
    next(err);
  }
}

export async function submitFace(
  req: Request,
  res: Response<ApiResponse<FaceVerificationResult & { status: AttendanceStatus }>>,
  next: NextFunction,
) {
  try {
    const session = requireSession(req);
    const input = faceSubmissionSchema.parse(req.body);
    const result = await submitFaceViaController(session, input);
    if (!result.success) {
      throw new AppError(422, result.error ?? 'Attendance action failed.');
    }

    const current = await reconcilerFor(session).getCurrentStatus();
    res.json({ success: true, data: { ...result, status: current }, message: result.message });
  } catch (err) {
    next(err);
  }
}

export async function history(req: Request, res: Response<ApiResponse<AttendanceSummary>>, next: NextFunction) {
  try {
    const session = requireSession(req);
    const query = attendanceHistoryQuerySchema.parse(req.query);
    const geo = geoCapabilities.forConnection(connectionKey(session));

    const records = await listAttendance(createOdooClient(session), session.employeeId, query, geo.state);
    res.json({ success: true, data: summarizeAttendance(records) });
  } catch (err) {
    next(err);
  }
}
