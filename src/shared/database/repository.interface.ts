/**
 * =============================================================================
 * REPOSITORY INTERFACE - Database Abstraction Layer
 * =============================================================================
 *
 * Contract for all dispatch data access. Implementations:
 *   - JsonDispatchStore (in-memory, optionally persisted to a JSON file)
 *
 * Repositories hold no business rules. The dispatch service decides what
 * is allowed and uses these methods only to read and write records.
 * =============================================================================
 */

import { AssignmentStatus, HistoryAction, TaskPriority, TaskStatus } from '../../core/constants';

// =============================================================================
// ENTITY DEFINITIONS
// =============================================================================

/**
 * Base entity interface - all records have an id
 */
export interface BaseEntity {
  id: string;
}

export interface TaskEntity extends BaseEntity {
  title: string;
  description: string | null;
  clientAddress: string;
  priority: TaskPriority;
  estimatedDuration: number | null;   // minutes
  status: TaskStatus;
  assignedTechnicianId: number | null;
  createdBy: string;
  createdAt: string;
  updatedAt: string;
  startedAt: string | null;
  completedAt: string | null;
  workSummary: string | null;
}

export interface AssignmentEntity extends BaseEntity {
  taskId: string;
  technicianId: number;
  assignedAt: string;
  assignedBy: string;
  status: AssignmentStatus;
  reason: string | null;
}

/**
 * Audit row - insert only
 */
export interface AssignmentHistoryEntity extends BaseEntity {
  assignmentId: string | null;
  taskId: string;
  technicianId: number;
  previousTechnicianId: number | null;
  action: HistoryAction;
  actionBy: string;
  actionAt: string;
  reason: string | null;
}

// =============================================================================
// QUERY TYPES
// =============================================================================

export type TaskSortField = 'priority' | 'createdAt' | 'status';
export type SortOrder = 'asc' | 'desc';

export interface TaskFilter {
  status?: TaskStatus;
  priority?: TaskPriority;
  /** Case-insensitive substring of title/clientAddress, or an exact task id */
  search?: string;
  sortBy: TaskSortField;
  sortOrder: SortOrder;
}

export interface PageRequest {
  page: number;       // zero-based
  pageSize: number;
}

/**
 * Pagination result wrapper
 */
export interface PaginatedResult<T> {
  data: T[];
  total: number;
}

// =============================================================================
// REPOSITORIES
// =============================================================================

export interface ITaskRepository {
  findTaskById(id: string): Promise<TaskEntity | null>;
  saveTask(task: TaskEntity): Promise<TaskEntity>;
  findTasksByFilter(filter: TaskFilter, page: PageRequest): Promise<PaginatedResult<TaskEntity>>;
  countTasksByStatus(status: TaskStatus): Promise<number>;
}

export interface IAssignmentRepository {
  findAssignmentsByTask(taskId: string): Promise<AssignmentEntity[]>;
  findAssignmentsByTechnician(technicianId: number): Promise<AssignmentEntity[]>;
  findAssignmentsByStatus(status: AssignmentStatus): Promise<AssignmentEntity[]>;
  findActiveAssignmentForTask(taskId: string): Promise<AssignmentEntity | null>;
  countActiveAssignmentsForTechnician(technicianId: number): Promise<number>;
  saveAssignment(assignment: AssignmentEntity): Promise<AssignmentEntity>;
}

export interface IAssignmentHistoryRepository {
  /** Insert only; an existing id is rejected */
  saveAssignmentHistory(entry: AssignmentHistoryEntity): Promise<AssignmentHistoryEntity>;
  /** Newest first */
  findHistoryByTask(taskId: string): Promise<AssignmentHistoryEntity[]>;
}

/**
 * Repositories visible inside a unit of work
 */
export interface DispatchRepositories {
  tasks: ITaskRepository;
  assignments: IAssignmentRepository;
  history: IAssignmentHistoryRepository;
}

/**
 * Store entry point. Reads may run outside a transaction; every
 * mutation runs inside one.
 */
export interface IDispatchStore
  extends ITaskRepository, IAssignmentRepository, IAssignmentHistoryRepository {
  /**
   * Run work as one serialized unit. Every write made through the
   * given repositories is rolled back if work throws.
   */
  transaction<T>(work: (repos: DispatchRepositories) => Promise<T>): Promise<T>;
}
