/**
 * =============================================================================
 * CORE CONSTANTS - Single Source of Truth
 * =============================================================================
 *
 * All application-wide enums and constants in one place.
 *
 * BENEFITS:
 * - No magic strings/numbers scattered in code
 * - Type safety with enums
 * =============================================================================
 */

// =============================================================================
// USER ROLES
// =============================================================================

/**
 * Roles carried in the identity service's tokens
 */
export enum UserRole {
  ADMIN = 'ADMIN',
  DISPATCHER = 'DISPATCHER',
  TECHNICIAN = 'TECHNICIAN'
}

/** Roles allowed to create and dispatch tasks */
export const DISPATCH_ROLES: readonly UserRole[] = [UserRole.ADMIN, UserRole.DISPATCHER];

// =============================================================================
// TASK PRIORITY
// =============================================================================

export enum TaskPriority {
  LOW = 'LOW',
  MEDIUM = 'MEDIUM',
  HIGH = 'HIGH',
  URGENT = 'URGENT'
}

/**
 * Sort rank - higher is more urgent
 */
export const PRIORITY_RANK: Record<TaskPriority, number> = {
  [TaskPriority.LOW]: 1,
  [TaskPriority.MEDIUM]: 2,
  [TaskPriority.HIGH]: 3,
  [TaskPriority.URGENT]: 4
};

// =============================================================================
// TASK STATUS
// =============================================================================

/**
 * Service task lifecycle states
 */
export enum TaskStatus {
  UNASSIGNED = 'UNASSIGNED',     // Created, waiting for dispatch
  ASSIGNED = 'ASSIGNED',         // Technician holds the task
  IN_PROGRESS = 'IN_PROGRESS',   // Technician started work
  COMPLETED = 'COMPLETED'        // Work summary submitted
}

export const ALL_TASK_STATUSES: readonly TaskStatus[] = [
  TaskStatus.UNASSIGNED,
  TaskStatus.ASSIGNED,
  TaskStatus.IN_PROGRESS,
  TaskStatus.COMPLETED
];

/**
 * Lifecycle order, used when sorting by status
 */
export const STATUS_RANK: Record<TaskStatus, number> = {
  [TaskStatus.UNASSIGNED]: 1,
  [TaskStatus.ASSIGNED]: 2,
  [TaskStatus.IN_PROGRESS]: 3,
  [TaskStatus.COMPLETED]: 4
};

/**
 * Transitions a technician may request through updateTaskStatus.
 * Completion has its own operation because it needs a work summary.
 */
export const TECHNICIAN_STATUS_TRANSITIONS: Record<TaskStatus, TaskStatus[]> = {
  [TaskStatus.UNASSIGNED]: [],
  [TaskStatus.ASSIGNED]: [TaskStatus.IN_PROGRESS],
  [TaskStatus.IN_PROGRESS]: [],
  [TaskStatus.COMPLETED]: []
};

/** Statuses from which assignTask may (re)assign */
export const ASSIGNABLE_STATUSES: readonly TaskStatus[] = [TaskStatus.UNASSIGNED, TaskStatus.ASSIGNED];

// =============================================================================
// ASSIGNMENT STATUS & HISTORY
// =============================================================================

export enum AssignmentStatus {
  ACTIVE = 'ACTIVE',
  COMPLETED = 'COMPLETED',
  REASSIGNED = 'REASSIGNED',
  CANCELLED = 'CANCELLED'
}

export enum HistoryAction {
  CREATED = 'CREATED',
  REASSIGNED = 'REASSIGNED',
  CANCELLED = 'CANCELLED',
  COMPLETED = 'COMPLETED',
  STATUS_CHANGED = 'STATUS_CHANGED'
}

// =============================================================================
// DIRECTORY
// =============================================================================

/** Exact values the identity service reports */
export const DIRECTORY_ACTIVE_STATUS = 'ACTIVE';
export const DIRECTORY_TECHNICIAN_ROLE = 'TECHNICIAN';

// =============================================================================
// LIMITS
// =============================================================================

export const TASK_LIMITS = {
  TITLE_MIN: 3,
  TITLE_MAX: 200,
  ADDRESS_MAX: 500,
  DESCRIPTION_MAX: 2000,
  WORK_SUMMARY_MIN: 10,
  WORK_SUMMARY_MAX: 5000,
  REASON_MAX: 500
} as const;

export const PAGINATION = {
  DEFAULT_PAGE: 0,
  DEFAULT_PAGE_SIZE: 50,
  MAX_PAGE_SIZE: 100
} as const;

export const DISPATCH_DEFAULTS = {
  WORKLOAD_WARNING_THRESHOLD: 10,
  REQUIRE_REASON_FOR_IN_PROGRESS_REASSIGNMENT: true
} as const;

// =============================================================================
// HTTP STATUS CODES
// =============================================================================

export const HTTP_STATUS = {
  OK: 200,
  CREATED: 201,
  BAD_REQUEST: 400,
  UNAUTHORIZED: 401,
  FORBIDDEN: 403,
  NOT_FOUND: 404,
  INTERNAL_ERROR: 500,
  SERVICE_UNAVAILABLE: 503
} as const;

// =============================================================================
// ERROR CODES
// =============================================================================

export enum ErrorCode {
  // Boundary
  UNAUTHORIZED = 'UNAUTHORIZED',
  TOKEN_EXPIRED = 'TOKEN_EXPIRED',
  INVALID_TOKEN = 'INVALID_TOKEN',
  FORBIDDEN = 'FORBIDDEN',
  NOT_FOUND = 'NOT_FOUND',

  // Input
  VALIDATION_ERROR = 'VALIDATION_ERROR',

  // Dispatch
  TASK_NOT_FOUND = 'TASK_NOT_FOUND',
  TECHNICIAN_NOT_FOUND = 'TECHNICIAN_NOT_FOUND',
  INVALID_ASSIGNMENT = 'INVALID_ASSIGNMENT',
  INVALID_STATUS_TRANSITION = 'INVALID_STATUS_TRANSITION',

  // System
  INTERNAL_ERROR = 'INTERNAL_ERROR',
  SERVICE_UNAVAILABLE = 'SERVICE_UNAVAILABLE'
}
