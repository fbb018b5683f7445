import { Router } from 'express';
import { asyncHandler } from '../middleware/asyncHandler';
import { salaryController } from '../controllers/salary.controller';
import { WorkflowContext } from '../services/context';

export function salaryRoutes(ctx: WorkflowContext): Router {
  const router = Router();
  const controller = salaryController(ctx);

  router.post('/score', asyncHandler(controller.score));
  router.post('/', asyncHandler(controller.record));

  return router;
}
