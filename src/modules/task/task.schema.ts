/**
 * =============================================================================
 * TASK MODULE - VALIDATION SCHEMAS
 * =============================================================================
 */

import { z } from 'zod';
import { PAGINATION, TASK_LIMITS, TaskPriority, TaskStatus } from '../../core/constants';
import { lenientIntParam } from '../../shared/utils/validation.utils';

const upperCased = (value: unknown) => typeof value === 'string' ? value.trim().toUpperCase() : value;

export const taskPrioritySchema = z.preprocess(upperCased, z.nativeEnum(TaskPriority));
export const taskStatusSchema = z.preprocess(upperCased, z.nativeEnum(TaskStatus));

const positiveTechnicianId = z.number({
  required_error: 'Technician ID is required',
  invalid_type_error: 'Technician ID must be a number'
}).int().positive('Technician ID must be positive');

/**
 * Create Task Schema (dispatcher creates a service task)
 */
export const createTaskSchema = z.object({
  title: z.string({ required_error: 'Title is required' })
    .trim()
    .min(TASK_LIMITS.TITLE_MIN, `Title must be between ${TASK_LIMITS.TITLE_MIN} and ${TASK_LIMITS.TITLE_MAX} characters`)
    .max(TASK_LIMITS.TITLE_MAX, `Title must be between ${TASK_LIMITS.TITLE_MIN} and ${TASK_LIMITS.TITLE_MAX} characters`),
  description: z.string()
    .trim()
    .max(TASK_LIMITS.DESCRIPTION_MAX, `Description must not exceed ${TASK_LIMITS.DESCRIPTION_MAX} characters`)
    .nullish(),
  clientAddress: z.string({ required_error: 'Client address is required' })
    .trim()
    .min(1, 'Client address is required')
    .max(TASK_LIMITS.ADDRESS_MAX, `Client address must not exceed ${TASK_LIMITS.ADDRESS_MAX} characters`),
  priority: taskPrioritySchema,
  estimatedDuration: z.number()
    .int('Estimated duration must be whole minutes')
    .positive('Estimated duration must be positive')
    .nullish()
}).strict();

/**
 * Assign Task Schema
 */
export const assignTaskSchema = z.object({
  technicianId: positiveTechnicianId
}).strict();

/**
 * Reassign Task Schema
 */
export const reassignTaskSchema = z.object({
  newTechnicianId: positiveTechnicianId,
  reason: z.string()
    .max(TASK_LIMITS.REASON_MAX, `Reason must not exceed ${TASK_LIMITS.REASON_MAX} characters`)
    .nullish()
}).strict();

/**
 * Update Status Schema (technician).
 * Any status name passes here; the dispatch service decides which moves are allowed.
 */
export const updateTaskStatusSchema = z.object({
  status: z.string({ required_error: 'Status is required' })
    .trim()
    .min(1, 'Status is required')
    .transform(value => value.toUpperCase())
}).strict();

/**
 * Complete Task Schema (technician)
 */
export const completeTaskSchema = z.object({
  workSummary: z.string({ required_error: 'Work summary is required' })
    .trim()
    .min(TASK_LIMITS.WORK_SUMMARY_MIN, `Work summary must be at least ${TASK_LIMITS.WORK_SUMMARY_MIN} characters`)
    .max(TASK_LIMITS.WORK_SUMMARY_MAX, `Work summary must not exceed ${TASK_LIMITS.WORK_SUMMARY_MAX} characters`)
}).strict();

/**
 * Listing filter as the dispatch service accepts it.
 * Out-of-range paging is an error here.
 */
export const taskFilterSchema = z.object({
  status: taskStatusSchema.optional(),
  priority: taskPrioritySchema.optional(),
  search: z.string().optional(),
  sortBy: z.enum(['priority', 'createdAt', 'status']).default('priority'),
  sortOrder: z.enum(['asc', 'desc']).default('desc'),
  page: z.number().int().min(0, 'Page must be >= 0').default(PAGINATION.DEFAULT_PAGE),
  pageSize: z.number()
    .int()
    .min(1, `Page size must be between 1 and ${PAGINATION.MAX_PAGE_SIZE}`)
    .max(PAGINATION.MAX_PAGE_SIZE, `Page size must be between 1 and ${PAGINATION.MAX_PAGE_SIZE}`)
    .default(PAGINATION.DEFAULT_PAGE_SIZE)
});

/**
 * GET /api/tasks query. Paging is clamped into range rather than rejected.
 */
export const listTasksQuerySchema = z.object({
  status: taskStatusSchema.optional(),
  priority: taskPrioritySchema.optional(),
  search: z.string().optional(),
  sortBy: z.enum(['priority', 'createdAt', 'status']).default('priority'),
  sortOrder: z.preprocess(
    value => typeof value === 'string' ? value.trim().toLowerCase() : value,
    z.enum(['asc', 'desc'])
  ).default('desc'),
  page: lenientIntParam(PAGINATION.DEFAULT_PAGE)
    .transform(page => page < 0 ? PAGINATION.DEFAULT_PAGE : page),
  pageSize: lenientIntParam(PAGINATION.DEFAULT_PAGE_SIZE)
    .transform(size => {
      if (size > PAGINATION.MAX_PAGE_SIZE) return PAGINATION.MAX_PAGE_SIZE;
      if (size < 1) return PAGINATION.DEFAULT_PAGE_SIZE;
      return size;
    })
});

/**
 * GET /api/technicians/me/tasks query
 */
export const technicianTasksQuerySchema = z.object({
  status: z.string().optional()
});

// Type exports
export type CreateTaskInput = z.input<typeof createTaskSchema>;
export type AssignTaskInput = z.infer<typeof assignTaskSchema>;
export type ReassignTaskInput = z.infer<typeof reassignTaskSchema>;
export type UpdateTaskStatusInput = z.infer<typeof updateTaskStatusSchema>;
export type CompleteTaskInput = z.infer<typeof completeTaskSchema>;
export type TaskFilterInput = z.input<typeof taskFilterSchema>;
