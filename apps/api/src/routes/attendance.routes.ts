import { Router } from 'express';
import { authenticate } from '../middleware/auth.js';
import * as attendanceController from '../controllers/attendance.controller.js';

const router = Router();

router.use(authenticate);

router.get('/status', attendanceController.status);
router.get('/history', attendanceController.history);
router.post('/check-in', attendanceController.checkIn);
router.post('/check-out', attendanceController.checkOut);
router.post('/submit', attendanceController.submit);
router.post('/face', attendanceController.submitFace);

export default router;
