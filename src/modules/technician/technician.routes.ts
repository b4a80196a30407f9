/**
 * =============================================================================
 * TECHNICIAN MODULE - ROUTES
 * =============================================================================
 */

import { Router } from 'express';
import { DISPATCH_ROLES, UserRole } from '../../core/constants';
import { authMiddleware, roleGuard } from '../../shared/middleware/auth.middleware';
import { TechnicianController } from './technician.controller';

export function createTechnicianRouter(controller: TechnicianController): Router {
  const router = Router();

  router.use(authMiddleware);

  /**
   * @route   GET /technicians/me/tasks?status=assigned|in_progress|completed|all
   * @access  Technician
   */
  router.get('/me/tasks', roleGuard([UserRole.TECHNICIAN]), controller.getMyTasks);

  /**
   * @route   GET /technicians/:technicianId/workload
   * @access  Admin, Dispatcher
   */
  router.get('/:technicianId/workload', roleGuard(DISPATCH_ROLES), controller.getWorkload);

  return router;
}
