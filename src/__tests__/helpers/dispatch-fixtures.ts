/**
 * Shared fixtures for dispatch tests: an in-process directory stand-in
 * and a service wired to an in-memory store with a fixed clock.
 */

import { TaskPriority } from '../../core/constants';
import { TechnicianNotFoundError } from '../../core/errors/AppError';
import { JsonDispatchStore } from '../../shared/database/db';
import { FixedClock } from '../../shared/utils/clock';
import { DispatchSettings, TaskService } from '../../modules/task/task.service';
import { TechnicianDirectory, TechnicianInfo } from '../../modules/technician/technician-directory.service';
import { CreateTaskInput } from '../../modules/task/task.schema';

export const NOW = '2026-03-10T09:00:00.000Z';
export const DISPATCHER = 'dispatcher@x';

/**
 * Directory that accepts every id except the ones told to reject
 */
export class FakeDirectory implements TechnicianDirectory {
  readonly validateCalls: number[] = [];
  private readonly rejections = new Map<number, string>();

  reject(technicianId: number, reason: string): void {
    this.rejections.set(technicianId, reason);
  }

  async validate(technicianId: number): Promise<void> {
    this.validateCalls.push(technicianId);
    const reason = this.rejections.get(technicianId);
    if (reason) {
      throw new TechnicianNotFoundError(technicianId, reason);
    }
  }

  async getInfo(technicianId: number): Promise<TechnicianInfo | null> {
    if (this.rejections.has(technicianId)) return null;
    return { id: technicianId, name: `Technician ${technicianId}`, status: 'ACTIVE', role: 'TECHNICIAN' };
  }
}

export interface DispatchFixture {
  store: JsonDispatchStore;
  directory: FakeDirectory;
  clock: FixedClock;
  service: TaskService;
}

export function createDispatchFixture(settings: Partial<DispatchSettings> = {}): DispatchFixture {
  const store = new JsonDispatchStore();
  const directory = new FakeDirectory();
  const clock = new FixedClock(NOW);
  const service = new TaskService(store, directory, {
    workloadWarningThreshold: 10,
    requireReasonForInProgressReassignment: true,
    ...settings
  }, clock);

  return { store, directory, clock, service };
}

export function taskInput(overrides: Partial<CreateTaskInput> = {}): CreateTaskInput {
  return {
    title: 'Replace boiler valve',
    clientAddress: '12 Harbour Road',
    priority: TaskPriority.MEDIUM,
    ...overrides
  };
}
