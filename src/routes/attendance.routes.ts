import { Router } from 'express';
import { asyncHandler } from '../middleware/asyncHandler';
import { attendanceController } from '../controllers/attendance.controller';
import { WorkflowContext } from '../services/context';

export function attendanceRoutes(ctx: WorkflowContext): Router {
  const router = Router();
  const controller = attendanceController(ctx);

  router.post('/', asyncHandler(controller.record));
  router.post('/:id/review', asyncHandler(controller.review));

  return router;
}
