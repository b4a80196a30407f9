/**
 * =============================================================================
 * DISPATCH API - HTTP Integration Tests
 * =============================================================================
 *
 * Runs the Express app on an ephemeral local port with an in-memory store
 * and an in-process directory.
 * =============================================================================
 */

import { Server } from 'http';
import jwt from 'jsonwebtoken';
import { z } from 'zod';
import { createApp } from '../app';
import { config } from '../config/environment';
import { UserRole } from '../core/constants';
import { DispatchFixture, createDispatchFixture } from './helpers/dispatch-fixtures';

jest.mock('../shared/services/logger.service', () => ({
  logger: {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
  },
}));

const envelopeSchema = z.object({
  success: z.boolean(),
  data: z.unknown(),
  error: z.object({
    code: z.string(),
    message: z.string(),
    details: z.object({
      errors: z.array(z.object({ field: z.string() })).optional()
    }).passthrough().optional()
  }).optional()
});

type Envelope = z.infer<typeof envelopeSchema>;

const idSchema = z.object({ id: z.string() });
const statusSchema = z.object({ status: z.string() });
const listSchema = z.object({
  page: z.number(),
  pageSize: z.number(),
  statusCounts: z.record(z.number())
});

function dataOf<S extends z.ZodTypeAny>(body: Envelope, schema: S): z.infer<S> {
  return schema.parse(body.data);
}

function token(claims: Record<string, unknown>): string {
  return jwt.sign(claims, config.jwt.secret, { expiresIn: '1h' });
}

const dispatcherToken = token({ sub: 'dispatcher@x', role: UserRole.DISPATCHER });
const technicianToken = token({ sub: 'tech-101', role: UserRole.TECHNICIAN, technicianId: 101 });

let fx: DispatchFixture;
let server: Server;
let baseUrl: string;

beforeAll(async () => {
  fx = createDispatchFixture();
  const app = createApp({ taskService: fx.service, directory: fx.directory });

  server = await new Promise<Server>(resolve => {
    const listening = app.listen(0, '127.0.0.1', () => resolve(listening));
  });
  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('Test server has no TCP address');
  }
  baseUrl = `http://127.0.0.1:${address.port}`;
});

afterAll(async () => {
  server.closeAllConnections();
  await new Promise<void>((resolve, reject) => server.close(err => (err ? reject(err) : resolve())));
});

async function call(
  method: string,
  path: string,
  options: { auth?: string; body?: unknown } = {}
): Promise<{ status: number; body: Envelope }> {
  const headers: Record<string, string> = { 'Content-Type': 'application/json' };
  if (options.auth) headers.Authorization = `Bearer ${options.auth}`;

  const response = await fetch(`${baseUrl}${path}`, {
    method,
    headers,
    body: options.body === undefined ? undefined : JSON.stringify(options.body)
  });
  return { status: response.status, body: envelopeSchema.parse(await response.json()) };
}

async function createTask(title: string = 'Repair walk-in freezer'): Promise<string> {
  const { body } = await call('POST', '/api/tasks', {
    auth: dispatcherToken,
    body: { title, clientAddress: '4 Quay Street', priority: 'HIGH' }
  });
  return dataOf(body, idSchema).id;
}

describe('GET /health', () => {
  it('reports healthy without authentication', async () => {
    const response = await fetch(`${baseUrl}/health`);
    const body = statusSchema.parse(await response.json());

    expect(response.status).toBe(200);
    expect(body.status).toBe('healthy');
  });
});

describe('authentication', () => {
  it('rejects requests without a bearer token', async () => {
    const { status, body } = await call('GET', '/api/tasks');

    expect(status).toBe(401);
    expect(body.error?.code).toBe('UNAUTHORIZED');
  });

  it('rejects a token signed with another secret', async () => {
    const forged = jwt.sign({ sub: 'x', role: UserRole.ADMIN }, 'test-secret-other');
    const { status, body } = await call('GET', '/api/tasks', { auth: forged });

    expect(status).toBe(401);
    expect(body.error?.code).toBe('INVALID_TOKEN');
  });

  it('rejects a token with an unknown role', async () => {
    const { status } = await call('GET', '/api/tasks', { auth: token({ sub: 'x', role: 'CUSTOMER' }) });
    expect(status).toBe(401);
  });

  it('keeps dispatch actions from technicians', async () => {
    const { status, body } = await call('POST', '/api/tasks', {
      auth: technicianToken,
      body: { title: 'Sneaky task', clientAddress: 'Somewhere', priority: 'LOW' }
    });

    expect(status).toBe(403);
    expect(body.error?.code).toBe('FORBIDDEN');
  });

  it('needs a technician id claim for the technician view', async () => {
    const noId = token({ sub: 'tech-x', role: UserRole.TECHNICIAN });
    const { status } = await call('GET', '/api/technicians/me/tasks', { auth: noId });

    expect(status).toBe(403);
  });
});

describe('task endpoints', () => {
  it('creates a task as the token subject', async () => {
    const { status, body } = await call('POST', '/api/tasks', {
      auth: dispatcherToken,
      body: { title: 'Check smoke alarms', clientAddress: '9 Elm Row', priority: 'low', estimatedDuration: 45 }
    });

    expect(status).toBe(201);
    expect(body.data).toMatchObject({
      title: 'Check smoke alarms',
      priority: 'LOW',
      status: 'UNASSIGNED',
      createdBy: 'dispatcher@x',
      estimatedDuration: 45
    });
  });

  it('answers invalid input with field details', async () => {
    const { status, body } = await call('POST', '/api/tasks', {
      auth: dispatcherToken,
      body: { title: 'ab', clientAddress: '9 Elm Row', priority: 'LOW' }
    });

    expect(status).toBe(400);
    expect(body.error?.code).toBe('VALIDATION_ERROR');
    expect(body.error?.details?.errors?.[0].field).toBe('title');
  });

  it('answers malformed JSON with 400', async () => {
    const response = await fetch(`${baseUrl}/api/tasks`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', Authorization: `Bearer ${dispatcherToken}` },
      body: '{"title":'
    });

    expect(response.status).toBe(400);
  });

  it('returns 404 for an unknown task', async () => {
    const { status, body } = await call('GET', '/api/tasks/00000000-0000-4000-8000-000000000000', {
      auth: dispatcherToken
    });

    expect(status).toBe(404);
    expect(body.error?.code).toBe('TASK_NOT_FOUND');
  });

  it('clamps out-of-range paging instead of failing', async () => {
    const { status, body } = await call('GET', '/api/tasks?page=-3&pageSize=500', { auth: technicianToken });
    const list = dataOf(body, listSchema);

    expect(status).toBe(200);
    expect(list.page).toBe(0);
    expect(list.pageSize).toBe(100);
    expect(Object.keys(list.statusCounts)).toEqual(['UNASSIGNED', 'ASSIGNED', 'IN_PROGRESS', 'COMPLETED']);
  });

  it('falls back to the default page size for a page size below 1', async () => {
    const { body } = await call('GET', '/api/tasks?pageSize=0', { auth: dispatcherToken });
    expect(dataOf(body, listSchema).pageSize).toBe(50);
  });

  it('runs a task from assignment to completion', async () => {
    const taskId = await createTask();

    const assigned = await call('POST', `/api/tasks/${taskId}/assign`, {
      auth: dispatcherToken,
      body: { technicianId: 101 }
    });
    expect(assigned.status).toBe(200);
    expect(assigned.body.data).toMatchObject({ taskId, technicianId: 101, assignedBy: 'dispatcher@x', workloadWarning: null });

    const started = await call('PATCH', `/api/tasks/${taskId}/status`, {
      auth: technicianToken,
      body: { status: 'IN_PROGRESS' }
    });
    expect(started.status).toBe(200);
    expect(dataOf(started.body, statusSchema).status).toBe('IN_PROGRESS');

    const mine = await call('GET', '/api/technicians/me/tasks?status=in_progress', { auth: technicianToken });
    const mineData = dataOf(mine.body, z.object({ tasks: z.array(idSchema) }));
    expect(mineData.tasks.map(t => t.id)).toContain(taskId);

    const completed = await call('POST', `/api/tasks/${taskId}/complete`, {
      auth: technicianToken,
      body: { workSummary: 'Compressor replaced and tested' }
    });
    expect(completed.status).toBe(200);
    expect(completed.body.data).toMatchObject({ status: 'COMPLETED', actualDurationMinutes: 0 });

    const history = await call('GET', `/api/tasks/${taskId}/history`, { auth: dispatcherToken });
    const actions = dataOf(history.body, z.array(z.object({ action: z.string() }))).map(h => h.action);
    expect(actions).toEqual(['COMPLETED', 'STATUS_CHANGED', 'CREATED']);
  });

  it('reassigns with a reason and reports the previous technician', async () => {
    const taskId = await createTask();
    await call('POST', `/api/tasks/${taskId}/assign`, { auth: dispatcherToken, body: { technicianId: 101 } });

    const { status, body } = await call('POST', `/api/tasks/${taskId}/reassign`, {
      auth: dispatcherToken,
      body: { newTechnicianId: 102, reason: '101 on leave' }
    });

    expect(status).toBe(200);
    expect(body.data).toMatchObject({ previousTechnicianId: 101, technicianId: 102, reason: '101 on leave' });
    expect(dataOf(body, z.object({ history: z.array(z.unknown()) })).history).toHaveLength(2);
  });

  it('maps a directory rejection to 404', async () => {
    const taskId = await createTask();
    fx.directory.reject(404404, 'not found');

    const { status, body } = await call('POST', `/api/tasks/${taskId}/assign`, {
      auth: dispatcherToken,
      body: { technicianId: 404404 }
    });

    expect(status).toBe(404);
    expect(body.error).toMatchObject({ code: 'TECHNICIAN_NOT_FOUND', message: 'Technician 404404 not found' });
  });

  it('maps a refused transition to 400', async () => {
    const taskId = await createTask();

    const { status, body } = await call('PATCH', `/api/tasks/${taskId}/status`, {
      auth: technicianToken,
      body: { status: 'IN_PROGRESS' }
    });

    expect(status).toBe(400);
    expect(body.error?.code).toBe('INVALID_STATUS_TRANSITION');
  });

  it('answers an unknown status name with a refused transition', async () => {
    const taskId = await createTask();
    await call('POST', `/api/tasks/${taskId}/assign`, { auth: dispatcherToken, body: { technicianId: 101 } });

    const { status, body } = await call('PATCH', `/api/tasks/${taskId}/status`, {
      auth: technicianToken,
      body: { status: 'done' }
    });

    expect(status).toBe(400);
    expect(body.error).toMatchObject({
      code: 'INVALID_STATUS_TRANSITION',
      message: 'Cannot transition task from ASSIGNED to DONE'
    });
  });

  it('rejects unknown body fields', async () => {
    const taskId = await createTask();

    const { status } = await call('POST', `/api/tasks/${taskId}/assign`, {
      auth: dispatcherToken,
      body: { technicianId: 101, priority: 'URGENT' }
    });

    expect(status).toBe(400);
  });
});

describe('technician endpoints', () => {
  it('reports workload with the directory record', async () => {
    const { status, body } = await call('GET', '/api/technicians/303/workload', { auth: dispatcherToken });

    expect(status).toBe(200);
    expect(body.data).toEqual({
      technicianId: 303,
      activeAssignments: 0,
      threshold: 10,
      overThreshold: false,
      technician: { id: 303, name: 'Technician 303', status: 'ACTIVE', role: 'TECHNICIAN' }
    });
  });

  it('rejects a non-numeric technician id', async () => {
    const { status } = await call('GET', '/api/technicians/abc/workload', { auth: dispatcherToken });
    expect(status).toBe(400);
  });
});

describe('unknown routes', () => {
  it('answers 404 NOT_FOUND', async () => {
    const { status, body } = await call('GET', '/api/nowhere', { auth: dispatcherToken });

    expect(status).toBe(404);
    expect(body.error?.code).toBe('NOT_FOUND');
  });
});
