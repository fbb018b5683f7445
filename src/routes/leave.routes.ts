import { Router } from 'express';
import { asyncHandler } from '../middleware/asyncHandler';
import { leaveController } from '../controllers/leave.controller';
import { WorkflowContext } from '../services/context';

export function leaveRoutes(ctx: WorkflowContext): Router {
  const router = Router();
  const controller = leaveController(ctx);

  router.post('/', asyncHandler(controller.submit));

  // Approval / Rejection, then HR-only revocation
  router.post('/:id/decision', asyncHandler(controller.decide));
  router.post('/:id/revoke', asyncHandler(controller.revoke));

  return router;
}
