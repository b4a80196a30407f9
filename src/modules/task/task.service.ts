/**
 * =============================================================================
 * TASK MODULE - SERVICE (Dispatch Engine)
 * =============================================================================
 *
 * Business logic for service tasks:
 * - Dispatchers create, assign and reassign tasks
 * - Technicians start and complete the tasks they hold
 * - Every dispatch action leaves exactly one audit row
 *
 * CONSISTENCY:
 * - Cheap checks and the directory call run before the unit of work
 * - Inside the unit the task is re-read and re-checked, so a request that
 *   lost a race fails instead of writing over the winner
 * - Task, assignment and history writes of one action commit together
 * =============================================================================
 */

import { v4 as uuid } from 'uuid';
import {
  ALL_TASK_STATUSES,
  ASSIGNABLE_STATUSES,
  AssignmentStatus,
  HistoryAction,
  PRIORITY_RANK,
  TECHNICIAN_STATUS_TRANSITIONS,
  TaskStatus
} from '../../core/constants';
import {
  InvalidAssignmentError,
  InvalidStatusTransitionError,
  TaskNotFoundError,
  ValidationError
} from '../../core/errors/AppError';
import { config } from '../../config/environment';
import {
  AssignmentEntity,
  AssignmentHistoryEntity,
  DispatchRepositories,
  IDispatchStore,
  ITaskRepository,
  TaskEntity
} from '../../shared/database/repository.interface';
import { Clock, systemClock, utcDay } from '../../shared/utils/clock';
import { logger } from '../../shared/services/logger.service';
import { validateSchema } from '../../shared/utils/validation.utils';
import { TechnicianDirectory } from '../technician/technician-directory.service';
import {
  CreateTaskInput,
  TaskFilterInput,
  completeTaskSchema,
  createTaskSchema,
  taskFilterSchema
} from './task.schema';

// =============================================================================
// TYPES
// =============================================================================

export interface DispatchSettings {
  /** Workload above this produces an advisory warning */
  workloadWarningThreshold: number;
  /** Reassigning an IN_PROGRESS task needs a non-blank reason */
  requireReasonForInProgressReassignment: boolean;
}

export type StatusCounts = Record<TaskStatus, number>;

export interface TaskListResult {
  tasks: TaskEntity[];
  page: number;
  pageSize: number;
  totalElements: number;
  totalPages: number;
  first: boolean;
  last: boolean;
  /** Over all tasks, not just the filtered ones */
  statusCounts: StatusCounts;
}

export interface AssignmentResult {
  assignmentId: string;
  taskId: string;
  technicianId: number;
  assignedAt: string;
  assignedBy: string;
  taskStatus: TaskStatus;
  technicianWorkload: number;
  workloadWarning: string | null;
}

export interface ReassignmentResult extends AssignmentResult {
  previousTechnicianId: number;
  reason: string;
  reassignedAt: string;
  /** Newest first */
  history: AssignmentHistoryEntity[];
}

/**
 * A task as its technician sees it
 */
export interface TechnicianTask extends TaskEntity {
  assignedAt: string;
}

export interface CompletedTask extends TechnicianTask {
  actualDurationMinutes: number | null;
}

export interface TechnicianTasksResult {
  tasks: TechnicianTask[];
  totalTasks: number;
}

export interface TechnicianWorkload {
  technicianId: number;
  activeAssignments: number;
  threshold: number;
  overThreshold: boolean;
}

const TECHNICIAN_STATUS_FILTERS: Record<string, TaskStatus> = {
  assigned: TaskStatus.ASSIGNED,
  in_progress: TaskStatus.IN_PROGRESS,
  completed: TaskStatus.COMPLETED
};

/**
 * Map the technician view's status filter. Unknown values, "all" and
 * empty mean no filter.
 */
export function parseTechnicianStatusFilter(value: string | null | undefined): TaskStatus | null {
  if (!value) return null;
  return TECHNICIAN_STATUS_FILTERS[value.trim().toLowerCase()] ?? null;
}

// =============================================================================
// SERVICE
// =============================================================================

export class TaskService {
  constructor(
    private readonly store: IDispatchStore,
    private readonly directory: TechnicianDirectory,
    private readonly settings: DispatchSettings,
    private readonly clock: Clock = systemClock
  ) {}

  // ==========================================================================
  // CREATE
  // ==========================================================================

  async createTask(input: CreateTaskInput, createdBy: string): Promise<TaskEntity> {
    const data = validateSchema(createTaskSchema, input);
    const now = this.timestamp();

    const task: TaskEntity = {
      id: uuid(),
      title: data.title,
      description: data.description ? data.description : null,
      clientAddress: data.clientAddress,
      priority: data.priority,
      estimatedDuration: data.estimatedDuration ?? null,
      status: TaskStatus.UNASSIGNED,
      assignedTechnicianId: null,
      createdBy,
      createdAt: now,
      updatedAt: now,
      startedAt: null,
      completedAt: null,
      workSummary: null
    };

    const saved = await this.store.transaction(repos => repos.tasks.saveTask(task));

    logger.info('Task created', { taskId: saved.id, priority: saved.priority, createdBy });
    return saved;
  }

  // ==========================================================================
  // LIST
  // ==========================================================================

  async listTasks(filterInput: TaskFilterInput = {}): Promise<TaskListResult> {
    const filter = validateSchema(taskFilterSchema, filterInput);

    const result = await this.store.findTasksByFilter(
      {
        status: filter.status,
        priority: filter.priority,
        search: filter.search,
        sortBy: filter.sortBy,
        sortOrder: filter.sortOrder
      },
      { page: filter.page, pageSize: filter.pageSize }
    );
    const statusCounts = await this.countTasksByStatus();
    const totalPages = Math.ceil(result.total / filter.pageSize);

    return {
      tasks: result.data,
      page: filter.page,
      pageSize: filter.pageSize,
      totalElements: result.total,
      totalPages,
      first: filter.page === 0,
      last: filter.page >= totalPages - 1,
      statusCounts
    };
  }

  async getTask(taskId: string): Promise<TaskEntity> {
    return this.requireTask(this.store, taskId);
  }

  async getTaskHistory(taskId: string): Promise<AssignmentHistoryEntity[]> {
    await this.requireTask(this.store, taskId);
    return this.store.findHistoryByTask(taskId);
  }

  // ==========================================================================
  // ASSIGN
  // ==========================================================================

  async assignTask(taskId: string, technicianId: number, assignedBy: string): Promise<AssignmentResult> {
    this.assertTechnicianId(technicianId, 'technicianId');

    const task = await this.requireTask(this.store, taskId);
    this.assertAssignable(task);
    await this.directory.validate(technicianId);

    const { assignment, workload } = await this.store.transaction(async repos => {
      const current = await this.requireTask(repos.tasks, taskId);
      this.assertAssignable(current);

      const now = this.timestamp();
      const previous = await repos.assignments.findActiveAssignmentForTask(taskId);

      if (previous) {
        await repos.assignments.saveAssignment({
          ...previous,
          status: AssignmentStatus.REASSIGNED,
          reason: `Reassigned to technician ${technicianId}`
        });
      }

      const created = await repos.assignments.saveAssignment({
        id: uuid(),
        taskId,
        technicianId,
        assignedAt: now,
        assignedBy,
        status: AssignmentStatus.ACTIVE,
        reason: null
      });

      await repos.history.saveAssignmentHistory({
        id: uuid(),
        assignmentId: created.id,
        taskId,
        technicianId,
        previousTechnicianId: previous ? previous.technicianId : null,
        action: previous ? HistoryAction.REASSIGNED : HistoryAction.CREATED,
        actionBy: assignedBy,
        actionAt: now,
        reason: previous
          ? `Reassigned from technician ${previous.technicianId} to ${technicianId}`
          : null
      });

      await repos.tasks.saveTask({
        ...current,
        assignedTechnicianId: technicianId,
        status: TaskStatus.ASSIGNED,
        updatedAt: now
      });

      return {
        assignment: created,
        workload: await repos.assignments.countActiveAssignmentsForTechnician(technicianId)
      };
    });

    const workloadWarning = this.workloadWarning('Technician', technicianId, workload);

    logger.info('Task assigned', { taskId, technicianId, assignedBy, workload });

    return {
      assignmentId: assignment.id,
      taskId,
      technicianId,
      assignedAt: assignment.assignedAt,
      assignedBy,
      taskStatus: TaskStatus.ASSIGNED,
      technicianWorkload: workload,
      workloadWarning
    };
  }

  // ==========================================================================
  // REASSIGN
  // ==========================================================================

  async reassignTask(
    taskId: string,
    newTechnicianId: number,
    reason: string | null | undefined,
    reassignedBy: string
  ): Promise<ReassignmentResult> {
    this.assertTechnicianId(newTechnicianId, 'newTechnicianId');
    const givenReason = reason && reason.trim() !== '' ? reason.trim() : null;

    const task = await this.requireTask(this.store, taskId);
    this.assertReassignable(task, givenReason);
    await this.directory.validate(newTechnicianId);

    const outcome = await this.store.transaction(async repos => {
      const current = await this.requireTask(repos.tasks, taskId);
      const previousTechnicianId = this.assertReassignable(current, givenReason);

      const now = this.timestamp();
      const prior = await repos.assignments.findActiveAssignmentForTask(taskId);

      if (prior) {
        await repos.assignments.saveAssignment({
          ...prior,
          status: AssignmentStatus.REASSIGNED,
          reason: givenReason ?? `Reassigned to technician ${newTechnicianId}`
        });
      }

      const created = await repos.assignments.saveAssignment({
        id: uuid(),
        taskId,
        technicianId: newTechnicianId,
        assignedAt: now,
        assignedBy: reassignedBy,
        status: AssignmentStatus.ACTIVE,
        reason: givenReason
      });

      const historyReason = givenReason
        ?? `Reassigned from technician ${previousTechnicianId} to ${newTechnicianId}`;

      await repos.history.saveAssignmentHistory({
        id: uuid(),
        assignmentId: created.id,
        taskId,
        technicianId: newTechnicianId,
        previousTechnicianId,
        action: HistoryAction.REASSIGNED,
        actionBy: reassignedBy,
        actionAt: now,
        reason: historyReason
      });

      // Work restarts with the new technician
      await repos.tasks.saveTask({
        ...current,
        assignedTechnicianId: newTechnicianId,
        status: TaskStatus.ASSIGNED,
        startedAt: null,
        updatedAt: now
      });

      return {
        assignment: created,
        previousTechnicianId,
        historyReason,
        workload: await repos.assignments.countActiveAssignmentsForTechnician(newTechnicianId),
        history: await repos.history.findHistoryByTask(taskId)
      };
    });

    const workloadWarning = this.workloadWarning('New technician', newTechnicianId, outcome.workload);

    logger.info('Task reassigned', {
      taskId,
      from: outcome.previousTechnicianId,
      to: newTechnicianId,
      reassignedBy
    });

    return {
      assignmentId: outcome.assignment.id,
      taskId,
      technicianId: newTechnicianId,
      assignedAt: outcome.assignment.assignedAt,
      assignedBy: reassignedBy,
      taskStatus: TaskStatus.ASSIGNED,
      technicianWorkload: outcome.workload,
      workloadWarning,
      previousTechnicianId: outcome.previousTechnicianId,
      reason: outcome.historyReason,
      reassignedAt: outcome.assignment.assignedAt,
      history: outcome.history
    };
  }

  // ==========================================================================
  // TECHNICIAN STATUS PROGRESSION
  // ==========================================================================

  /**
   * newStatus is taken as given; any value outside the transition table,
   * known status or not, is an InvalidStatusTransitionError.
   */
  async updateTaskStatus(taskId: string, newStatus: string, technicianId: number): Promise<TechnicianTask> {
    const updated = await this.store.transaction(async repos => {
      const task = await this.requireTask(repos.tasks, taskId);
      const active = await this.requireHolder(repos, task, technicianId, newStatus);

      const next = TECHNICIAN_STATUS_TRANSITIONS[task.status].find(status => status === newStatus);
      if (!next) {
        throw new InvalidStatusTransitionError(task.status, newStatus);
      }

      const now = this.timestamp();
      const saved = await repos.tasks.saveTask({
        ...task,
        status: next,
        startedAt: next === TaskStatus.IN_PROGRESS ? now : task.startedAt,
        updatedAt: now
      });

      await repos.history.saveAssignmentHistory({
        id: uuid(),
        assignmentId: active.id,
        taskId,
        technicianId,
        previousTechnicianId: null,
        action: HistoryAction.STATUS_CHANGED,
        actionBy: String(technicianId),
        actionAt: now,
        reason: `Status changed from ${task.status} to ${next}`
      });

      return { ...saved, assignedAt: active.assignedAt };
    });

    logger.info('Task status updated', { taskId, technicianId, status: updated.status });
    return updated;
  }

  async completeTask(taskId: string, workSummary: string, technicianId: number): Promise<CompletedTask> {
    const input = validateSchema(completeTaskSchema, { workSummary });

    const completed = await this.store.transaction(async repos => {
      const task = await this.requireTask(repos.tasks, taskId);
      const active = await this.requireHolder(repos, task, technicianId, TaskStatus.COMPLETED);

      if (task.status !== TaskStatus.IN_PROGRESS) {
        throw new InvalidStatusTransitionError(
          task.status,
          TaskStatus.COMPLETED,
          `Only a task in progress can be completed (current status: ${task.status})`
        );
      }

      const completedAt = this.clock.now();
      const now = completedAt.toISOString();

      const saved = await repos.tasks.saveTask({
        ...task,
        status: TaskStatus.COMPLETED,
        completedAt: now,
        workSummary: input.workSummary,
        updatedAt: now
      });

      await repos.assignments.saveAssignment({ ...active, status: AssignmentStatus.COMPLETED });

      await repos.history.saveAssignmentHistory({
        id: uuid(),
        assignmentId: active.id,
        taskId,
        technicianId,
        previousTechnicianId: null,
        action: HistoryAction.COMPLETED,
        actionBy: String(technicianId),
        actionAt: now,
        reason: null
      });

      const actualDurationMinutes = task.startedAt
        ? Math.floor((completedAt.getTime() - new Date(task.startedAt).getTime()) / 60000)
        : null;

      return { ...saved, assignedAt: active.assignedAt, actualDurationMinutes };
    });

    logger.info('Task completed', {
      taskId,
      technicianId,
      actualDurationMinutes: completed.actualDurationMinutes
    });
    return completed;
  }

  // ==========================================================================
  // TECHNICIAN VIEW & WORKLOAD
  // ==========================================================================

  /**
   * Tasks held (ACTIVE) or finished (COMPLETED) by the technician.
   * Completed tasks only show on the UTC day they were completed.
   */
  async getTechnicianTasks(technicianId: number, statusFilter?: string | null): Promise<TechnicianTasksResult> {
    const wanted = parseTechnicianStatusFilter(statusFilter);
    const today = utcDay(this.clock.now());

    const assignments = (await this.store.findAssignmentsByTechnician(technicianId)).filter(
      a => a.status === AssignmentStatus.ACTIVE || a.status === AssignmentStatus.COMPLETED
    );

    const tasks: TechnicianTask[] = [];
    for (const assignment of assignments) {
      const task = await this.store.findTaskById(assignment.taskId);
      if (!task) continue;
      if (wanted && task.status !== wanted) continue;
      if (task.status === TaskStatus.COMPLETED && task.completedAt && utcDay(task.completedAt) < today) continue;

      tasks.push({ ...task, assignedAt: assignment.assignedAt });
    }

    tasks.sort((a, b) =>
      PRIORITY_RANK[b.priority] - PRIORITY_RANK[a.priority]
      || a.assignedAt.localeCompare(b.assignedAt)
      || a.id.localeCompare(b.id)
    );

    return { tasks, totalTasks: tasks.length };
  }

  async getTechnicianWorkload(technicianId: number): Promise<TechnicianWorkload> {
    this.assertTechnicianId(technicianId, 'technicianId');
    const activeAssignments = await this.store.countActiveAssignmentsForTechnician(technicianId);
    const threshold = this.settings.workloadWarningThreshold;

    return {
      technicianId,
      activeAssignments,
      threshold,
      overThreshold: activeAssignments > threshold
    };
  }

  // ==========================================================================
  // HELPERS
  // ==========================================================================

  private timestamp(): string {
    return this.clock.now().toISOString();
  }

  private async countTasksByStatus(): Promise<StatusCounts> {
    const counts: StatusCounts = {
      [TaskStatus.UNASSIGNED]: 0,
      [TaskStatus.ASSIGNED]: 0,
      [TaskStatus.IN_PROGRESS]: 0,
      [TaskStatus.COMPLETED]: 0
    };
    for (const status of ALL_TASK_STATUSES) {
      counts[status] = await this.store.countTasksByStatus(status);
    }
    return counts;
  }

  private async requireTask(tasks: ITaskRepository, taskId: string): Promise<TaskEntity> {
    const task = await tasks.findTaskById(taskId);
    if (!task) {
      throw new TaskNotFoundError(taskId);
    }
    return task;
  }

  private assertTechnicianId(technicianId: number, field: string): void {
    if (!Number.isInteger(technicianId) || technicianId <= 0) {
      throw new ValidationError('Invalid technician ID', [
        { field, message: 'Technician ID must be a positive integer' }
      ]);
    }
  }

  private assertAssignable(task: TaskEntity): void {
    if (ASSIGNABLE_STATUSES.includes(task.status)) return;

    if (task.status === TaskStatus.COMPLETED) {
      throw new InvalidAssignmentError('Cannot assign a completed task', { taskId: task.id, status: task.status });
    }
    throw new InvalidAssignmentError(
      'Cannot assign a task that is in progress; use reassign instead',
      { taskId: task.id, status: task.status }
    );
  }

  /**
   * @returns the technician the task is being taken from
   */
  private assertReassignable(task: TaskEntity, reason: string | null): number {
    if (task.status === TaskStatus.COMPLETED) {
      throw new InvalidAssignmentError('Cannot reassign a completed task', { taskId: task.id, status: task.status });
    }
    if (task.status === TaskStatus.UNASSIGNED || task.assignedTechnicianId === null) {
      throw new InvalidAssignmentError(
        'Task is not currently assigned; use assign instead',
        { taskId: task.id, status: task.status }
      );
    }
    if (
      task.status === TaskStatus.IN_PROGRESS
      && this.settings.requireReasonForInProgressReassignment
      && reason === null
    ) {
      throw new ValidationError('A reason is required to reassign a task that is in progress', [
        { field: 'reason', message: 'Reason is required for tasks in progress' }
      ]);
    }
    return task.assignedTechnicianId;
  }

  private async requireHolder(
    repos: DispatchRepositories,
    task: TaskEntity,
    technicianId: number,
    requestedStatus: string
  ): Promise<AssignmentEntity> {
    const active = await repos.assignments.findActiveAssignmentForTask(task.id);
    if (!active || active.technicianId !== technicianId) {
      throw new InvalidStatusTransitionError(
        task.status,
        requestedStatus,
        `Task ${task.id} is not assigned to technician ${technicianId}`
      );
    }
    return active;
  }

  private workloadWarning(subject: string, technicianId: number, workload: number): string | null {
    const threshold = this.settings.workloadWarningThreshold;
    if (workload <= threshold) return null;

    logger.warn('Technician workload above threshold', { technicianId, workload, threshold });
    return `Warning: ${subject} has ${workload} active tasks, which exceeds the recommended threshold of ${threshold}`;
  }
}

/**
 * Service wired from application config
 */
export function createTaskService(
  store: IDispatchStore,
  directory: TechnicianDirectory,
  clock: Clock = systemClock
): TaskService {
  return new TaskService(store, directory, {
    workloadWarningThreshold: config.dispatch.workloadWarningThreshold,
    requireReasonForInProgressReassignment: config.dispatch.requireReasonForInProgressReassignment
  }, clock);
}
