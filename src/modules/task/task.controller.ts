/**
 * =============================================================================
 * TASK MODULE - CONTROLLER
 * =============================================================================
 */

import { Request, Response } from 'express';
import { ApiResponse } from '../../core/responses/ApiResponse';
import { asyncHandler } from '../../shared/middleware/error.middleware';
import { currentTechnicianId, currentUser } from '../../shared/middleware/auth.middleware';
import { validateSchema } from '../../shared/utils/validation.utils';
import { TaskService } from './task.service';
import {
  AssignTaskInput,
  CompleteTaskInput,
  ReassignTaskInput,
  UpdateTaskStatusInput,
  listTasksQuerySchema
} from './task.schema';

export class TaskController {
  constructor(private readonly taskService: TaskService) {}

  /**
   * List tasks with filters, paging and status counts
   */
  listTasks = asyncHandler(async (req: Request, res: Response) => {
    const query = validateSchema(listTasksQuerySchema, req.query);
    const result = await this.taskService.listTasks(query);

    ApiResponse.success(res, result);
  });

  createTask = asyncHandler(async (req: Request, res: Response) => {
    const task = await this.taskService.createTask(req.body, currentUser(req).username);

    ApiResponse.created(res, task, 'Task created');
  });

  getTask = asyncHandler(async (req: Request, res: Response) => {
    const task = await this.taskService.getTask(req.params.taskId);

    ApiResponse.success(res, task);
  });

  getTaskHistory = asyncHandler(async (req: Request, res: Response) => {
    const history = await this.taskService.getTaskHistory(req.params.taskId);

    ApiResponse.list(res, history);
  });

  assignTask = asyncHandler(async (req: Request, res: Response) => {
    const body: AssignTaskInput = req.body;
    const result = await this.taskService.assignTask(
      req.params.taskId,
      body.technicianId,
      currentUser(req).username
    );

    ApiResponse.success(res, result, 'Task assigned');
  });

  reassignTask = asyncHandler(async (req: Request, res: Response) => {
    const body: ReassignTaskInput = req.body;
    const result = await this.taskService.reassignTask(
      req.params.taskId,
      body.newTechnicianId,
      body.reason,
      currentUser(req).username
    );

    ApiResponse.success(res, result, 'Task reassigned');
  });

  /**
   * Technician moves their task forward (ASSIGNED -> IN_PROGRESS)
   */
  updateStatus = asyncHandler(async (req: Request, res: Response) => {
    const body: UpdateTaskStatusInput = req.body;
    const task = await this.taskService.updateTaskStatus(
      req.params.taskId,
      body.status,
      currentTechnicianId(req)
    );

    ApiResponse.success(res, task, 'Task status updated');
  });

  completeTask = asyncHandler(async (req: Request, res: Response) => {
    const body: CompleteTaskInput = req.body;
    const task = await this.taskService.completeTask(
      req.params.taskId,
      body.workSummary,
      currentTechnicianId(req)
    );

    ApiResponse.success(res, task, 'Task completed');
  });
}
