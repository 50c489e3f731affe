import { Router } from 'express';
import { requireConnectionAdmin } from '../middleware/connectionAdmin.js';
import * as connectionController from '../controllers/connection.controller.js';

const router = Router();

router.get('/', connectionController.get);
router.put('/', requireConnectionAdmin, connectionController.update);
router.post('/test', requireConnectionAdmin, connectionController.test);
router.post('/reset', requireConnectionAdmin, connectionController.reset);

export default router;
