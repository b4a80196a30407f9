/**
 * =============================================================================
 * DATABASE SERVICE - Dispatch Store
 * =============================================================================
 *
 * In-memory store for tasks, assignments and assignment history, optionally
 * persisted to a JSON file (DISPATCH_DB_FILE). The file is loaded once at
 * start and rewritten after every committed unit of work.
 *
 * TRANSACTIONS:
 * - Units of work run one at a time, in arrival order
 * - A unit that throws is rolled back to the snapshot taken when it started
 * - transaction() is not re-entrant; work must not open another unit
 * =============================================================================
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { logger } from '../services/logger.service';
import {
  AssignmentStatus,
  HistoryAction,
  PRIORITY_RANK,
  STATUS_RANK,
  TaskPriority,
  TaskStatus
} from '../../core/constants';
import { InternalError } from '../../core/errors/AppError';
import {
  AssignmentEntity,
  AssignmentHistoryEntity,
  DispatchRepositories,
  IDispatchStore,
  PageRequest,
  PaginatedResult,
  TaskEntity,
  TaskFilter
} from './repository.interface';

const DB_VERSION = '1.0.0';

// =============================================================================
// FILE SCHEMA
// =============================================================================

const taskRecordSchema = z.object({
  id: z.string(),
  title: z.string(),
  description: z.string().nullable(),
  clientAddress: z.string(),
  priority: z.nativeEnum(TaskPriority),
  estimatedDuration: z.number().int().nullable(),
  status: z.nativeEnum(TaskStatus),
  assignedTechnicianId: z.number().int().nullable(),
  createdBy: z.string(),
  createdAt: z.string(),
  updatedAt: z.string(),
  startedAt: z.string().nullable(),
  completedAt: z.string().nullable(),
  workSummary: z.string().nullable()
});

const assignmentRecordSchema = z.object({
  id: z.string(),
  taskId: z.string(),
  technicianId: z.number().int(),
  assignedAt: z.string(),
  assignedBy: z.string(),
  status: z.nativeEnum(AssignmentStatus),
  reason: z.string().nullable()
});

const historyRecordSchema = z.object({
  id: z.string(),
  assignmentId: z.string().nullable(),
  taskId: z.string(),
  technicianId: z.number().int(),
  previousTechnicianId: z.number().int().nullable(),
  action: z.nativeEnum(HistoryAction),
  actionBy: z.string(),
  actionAt: z.string(),
  reason: z.string().nullable()
});

const databaseSchema = z.object({
  tasks: z.array(taskRecordSchema),
  assignments: z.array(assignmentRecordSchema),
  history: z.array(historyRecordSchema),
  _meta: z.object({
    version: z.string(),
    lastUpdated: z.string()
  })
});

export type DispatchDatabase = z.infer<typeof databaseSchema>;

function emptyDatabase(): DispatchDatabase {
  return {
    tasks: [],
    assignments: [],
    history: [],
    _meta: {
      version: DB_VERSION,
      lastUpdated: new Date().toISOString()
    }
  };
}

function cloneDatabase(data: DispatchDatabase): DispatchDatabase {
  return {
    tasks: data.tasks.map(t => ({ ...t })),
    assignments: data.assignments.map(a => ({ ...a })),
    history: data.history.map(h => ({ ...h })),
    _meta: { ...data._meta }
  };
}

// =============================================================================
// SORTING
// =============================================================================

function compareTasks(a: TaskEntity, b: TaskEntity, filter: TaskFilter): number {
  const direction = filter.sortOrder === 'asc' ? 1 : -1;
  let primary = 0;

  switch (filter.sortBy) {
    case 'priority':
      primary = PRIORITY_RANK[a.priority] - PRIORITY_RANK[b.priority];
      break;
    case 'status':
      primary = STATUS_RANK[a.status] - STATUS_RANK[b.status];
      break;
    case 'createdAt':
      primary = a.createdAt.localeCompare(b.createdAt);
      break;
  }

  if (primary !== 0) return primary * direction;

  // Newest first within the same rank
  if (filter.sortBy !== 'createdAt') {
    const byCreated = b.createdAt.localeCompare(a.createdAt);
    if (byCreated !== 0) return byCreated;
  }

  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

function matchesFilter(task: TaskEntity, filter: TaskFilter): boolean {
  if (filter.status && task.status !== filter.status) return false;
  if (filter.priority && task.priority !== filter.priority) return false;

  const search = filter.search?.trim();
  if (search) {
    const needle = search.toLowerCase();
    return task.id.toLowerCase() === needle
      || task.title.toLowerCase().includes(needle)
      || task.clientAddress.toLowerCase().includes(needle);
  }

  return true;
}

// =============================================================================
// STORE
// =============================================================================

export class JsonDispatchStore implements IDispatchStore {
  private data: DispatchDatabase;
  private queue: Promise<unknown> = Promise.resolve();
  private readonly repositories: DispatchRepositories = {
    tasks: this,
    assignments: this,
    history: this
  };

  /**
   * @param filePath - JSON file to load from and flush to; empty keeps data in memory only
   */
  constructor(private readonly filePath: string = '') {
    this.data = this.load();
    logger.info(`Dispatch store ready (${filePath ? filePath : 'in-memory'})`, {
      tasks: this.data.tasks.length,
      assignments: this.data.assignments.length,
      history: this.data.history.length
    });
  }

  // ==========================================================================
  // TRANSACTIONS
  // ==========================================================================

  transaction<T>(work: (repos: DispatchRepositories) => Promise<T>): Promise<T> {
    const run = async (): Promise<T> => {
      const snapshot = cloneDatabase(this.data);
      try {
        const result = await work(this.repositories);
        this.persist();
        return result;
      } catch (error) {
        this.data = snapshot;
        throw error;
      }
    };

    const next = this.queue.then(run, run);
    // Keep the chain alive whatever this unit's outcome
    this.queue = next.then(() => undefined, () => undefined);
    return next;
  }

  // ==========================================================================
  // TASKS
  // ==========================================================================

  async findTaskById(id: string): Promise<TaskEntity | null> {
    const task = this.data.tasks.find(t => t.id === id);
    return task ? { ...task } : null;
  }

  async saveTask(task: TaskEntity): Promise<TaskEntity> {
    const index = this.data.tasks.findIndex(t => t.id === task.id);
    if (index === -1) {
      this.data.tasks.push({ ...task });
    } else {
      this.data.tasks[index] = { ...task };
    }
    return { ...task };
  }

  async findTasksByFilter(filter: TaskFilter, page: PageRequest): Promise<PaginatedResult<TaskEntity>> {
    const matching = this.data.tasks
      .filter(t => matchesFilter(t, filter))
      .sort((a, b) => compareTasks(a, b, filter));

    const offset = page.page * page.pageSize;
    return {
      data: matching.slice(offset, offset + page.pageSize).map(t => ({ ...t })),
      total: matching.length
    };
  }

  async countTasksByStatus(status: TaskStatus): Promise<number> {
    return this.data.tasks.filter(t => t.status === status).length;
  }

  // ==========================================================================
  // ASSIGNMENTS
  // ==========================================================================

  async findAssignmentsByTask(taskId: string): Promise<AssignmentEntity[]> {
    return this.data.assignments.filter(a => a.taskId === taskId).map(a => ({ ...a }));
  }

  async findAssignmentsByTechnician(technicianId: number): Promise<AssignmentEntity[]> {
    return this.data.assignments.filter(a => a.technicianId === technicianId).map(a => ({ ...a }));
  }

  async findAssignmentsByStatus(status: AssignmentStatus): Promise<AssignmentEntity[]> {
    return this.data.assignments.filter(a => a.status === status).map(a => ({ ...a }));
  }

  async findActiveAssignmentForTask(taskId: string): Promise<AssignmentEntity | null> {
    const active = this.data.assignments.find(
      a => a.taskId === taskId && a.status === AssignmentStatus.ACTIVE
    );
    return active ? { ...active } : null;
  }

  async countActiveAssignmentsForTechnician(technicianId: number): Promise<number> {
    return this.data.assignments.filter(
      a => a.technicianId === technicianId && a.status === AssignmentStatus.ACTIVE
    ).length;
  }

  async saveAssignment(assignment: AssignmentEntity): Promise<AssignmentEntity> {
    const index = this.data.assignments.findIndex(a => a.id === assignment.id);
    if (index === -1) {
      this.data.assignments.push({ ...assignment });
    } else {
      this.data.assignments[index] = { ...assignment };
    }
    return { ...assignment };
  }

  // ==========================================================================
  // HISTORY
  // ==========================================================================

  async saveAssignmentHistory(entry: AssignmentHistoryEntity): Promise<AssignmentHistoryEntity> {
    if (this.data.history.some(h => h.id === entry.id)) {
      throw new InternalError('Assignment history is append-only', { historyId: entry.id });
    }
    this.data.history.push({ ...entry });
    return { ...entry };
  }

  async findHistoryByTask(taskId: string): Promise<AssignmentHistoryEntity[]> {
    // Rows are appended in action order, so reversing breaks actionAt ties newest-first
    return this.data.history
      .map((entry, index) => ({ entry, index }))
      .filter(({ entry }) => entry.taskId === taskId)
      .sort((a, b) => b.entry.actionAt.localeCompare(a.entry.actionAt) || b.index - a.index)
      .map(({ entry }) => ({ ...entry }));
  }

  // ==========================================================================
  // FILE PERSISTENCE
  // ==========================================================================

  private load(): DispatchDatabase {
    if (!this.filePath || !fs.existsSync(this.filePath)) {
      return emptyDatabase();
    }

    const raw = fs.readFileSync(this.filePath, 'utf-8');
    const parsed = databaseSchema.safeParse(JSON.parse(raw));
    if (!parsed.success) {
      throw new InternalError(`Dispatch database file is corrupt: ${this.filePath}`, {
        issues: parsed.error.errors.map(e => `${e.path.join('.')}: ${e.message}`)
      });
    }
    return parsed.data;
  }

  private persist(): void {
    if (!this.filePath) return;

    this.data._meta.lastUpdated = new Date().toISOString();
    const dir = path.dirname(this.filePath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
    fs.writeFileSync(this.filePath, JSON.stringify(this.data, null, 2));
  }
}
