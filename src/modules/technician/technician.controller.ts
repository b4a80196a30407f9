/**
 * =============================================================================
 * TECHNICIAN MODULE - CONTROLLER
 * =============================================================================
 */

import { Request, Response } from 'express';
import { ApiResponse } from '../../core/responses/ApiResponse';
import { asyncHandler } from '../../shared/middleware/error.middleware';
import { currentTechnicianId } from '../../shared/middleware/auth.middleware';
import { technicianIdSchema, validateSchema } from '../../shared/utils/validation.utils';
import { TaskService } from '../task/task.service';
import { technicianTasksQuerySchema } from '../task/task.schema';
import { TechnicianDirectory } from './technician-directory.service';

export class TechnicianController {
  constructor(
    private readonly taskService: TaskService,
    private readonly directory: TechnicianDirectory
  ) {}

  /**
   * The calling technician's current tasks
   */
  getMyTasks = asyncHandler(async (req: Request, res: Response) => {
    const query = validateSchema(technicianTasksQuerySchema, req.query);
    const result = await this.taskService.getTechnicianTasks(currentTechnicianId(req), query.status);

    ApiResponse.success(res, result);
  });

  /**
   * Active assignment count plus whatever the directory knows
   */
  getWorkload = asyncHandler(async (req: Request, res: Response) => {
    const technicianId = validateSchema(technicianIdSchema, req.params.technicianId);

    const [workload, technician] = await Promise.all([
      this.taskService.getTechnicianWorkload(technicianId),
      this.directory.getInfo(technicianId)
    ]);

    ApiResponse.success(res, { ...workload, technician });
  });
}
