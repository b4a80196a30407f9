/**
 * =============================================================================
 * TASK MODULE - ROUTES
 * =============================================================================
 *
 * Dispatchers create, assign and reassign tasks.
 * Technicians start and complete the tasks they hold.
 * =============================================================================
 */

import { Router } from 'express';
import { DISPATCH_ROLES, UserRole } from '../../core/constants';
import { authMiddleware, roleGuard } from '../../shared/middleware/auth.middleware';
import { validateRequest } from '../../shared/utils/validation.utils';
import { TaskController } from './task.controller';
import {
  assignTaskSchema,
  completeTaskSchema,
  reassignTaskSchema,
  updateTaskStatusSchema
} from './task.schema';

export function createTaskRouter(controller: TaskController): Router {
  const router = Router();

  router.use(authMiddleware);

  /**
   * @route   GET /tasks
   * @desc    List tasks (filter, search, sort, page) with status counts
   * @access  Any authenticated role
   */
  router.get('/', controller.listTasks);

  /**
   * @route   POST /tasks
   * @desc    Create a task
   * @access  Admin, Dispatcher
   */
  router.post('/', roleGuard(DISPATCH_ROLES), controller.createTask);

  /**
   * @route   GET /tasks/:taskId
   * @access  Admin, Dispatcher
   */
  router.get('/:taskId', roleGuard(DISPATCH_ROLES), controller.getTask);

  /**
   * @route   GET /tasks/:taskId/history
   * @desc    Assignment audit trail, newest first
   * @access  Admin, Dispatcher
   */
  router.get('/:taskId/history', roleGuard(DISPATCH_ROLES), controller.getTaskHistory);

  /**
   * @route   POST /tasks/:taskId/assign
   * @access  Admin, Dispatcher
   */
  router.post(
    '/:taskId/assign',
    roleGuard(DISPATCH_ROLES),
    validateRequest(assignTaskSchema),
    controller.assignTask
  );

  /**
   * @route   POST /tasks/:taskId/reassign
   * @access  Admin, Dispatcher
   */
  router.post(
    '/:taskId/reassign',
    roleGuard(DISPATCH_ROLES),
    validateRequest(reassignTaskSchema),
    controller.reassignTask
  );

  /**
   * @route   PATCH /tasks/:taskId/status
   * @access  Technician holding the task
   */
  router.patch(
    '/:taskId/status',
    roleGuard([UserRole.TECHNICIAN]),
    validateRequest(updateTaskStatusSchema),
    controller.updateStatus
  );

  /**
   * @route   POST /tasks/:taskId/complete
   * @access  Technician holding the task
   */
  router.post(
    '/:taskId/complete',
    roleGuard([UserRole.TECHNICIAN]),
    validateRequest(completeTaskSchema),
    controller.completeTask
  );

  return router;
}
