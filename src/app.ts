/**
 * =============================================================================
 * EXPRESS APPLICATION
 * =============================================================================
 *
 * Builds the HTTP app around an already-wired dispatch service.
 * server.ts wires the real store and directory; tests pass their own.
 *
 * MODULES:
 * ┌────────────┬───────────────────────────────────────────────────────────┐
 * │ TASK       │ Create, list, assign, reassign, start, complete tasks     │
 * │ TECHNICIAN │ Technician's own task view, workload per technician       │
 * └────────────┴───────────────────────────────────────────────────────────┘
 * =============================================================================
 */

import express, { Express } from 'express';
import cors from 'cors';
import compression from 'compression';
import helmet from 'helmet';
import { config } from './config/environment';
import { errorHandler, notFoundHandler } from './shared/middleware/error.middleware';
import { requestLogger } from './shared/middleware/request-logger.middleware';
import { healthRoutes } from './shared/routes/health.routes';
import { TaskService } from './modules/task/task.service';
import { TaskController } from './modules/task/task.controller';
import { createTaskRouter } from './modules/task/task.routes';
import { TechnicianDirectory } from './modules/technician/technician-directory.service';
import { TechnicianController } from './modules/technician/technician.controller';
import { createTechnicianRouter } from './modules/technician/technician.routes';

export const API_PREFIX = '/api';

export interface AppDependencies {
  taskService: TaskService;
  directory: TechnicianDirectory;
}

export function createApp({ taskService, directory }: AppDependencies): Express {
  const app = express();

  // '1' = trust the first proxy (load balancer) for req.ip
  app.set('trust proxy', 1);

  // ===========================================================================
  // MIDDLEWARE - Security & Performance
  // ===========================================================================

  app.use(compression({ threshold: 1024 }));
  app.use(helmet());
  app.use(cors({
    origin: config.cors.origin,
    methods: ['GET', 'POST', 'PATCH'],
    allowedHeaders: ['Content-Type', 'Authorization'],
    maxAge: 86400 // 24 hours preflight cache
  }));
  app.use(express.json({ limit: '100kb' }));
  app.use(requestLogger);

  // ===========================================================================
  // ROUTES
  // ===========================================================================

  app.use('/', healthRoutes);
  app.use(`${API_PREFIX}/tasks`, createTaskRouter(new TaskController(taskService)));
  app.use(`${API_PREFIX}/technicians`, createTechnicianRouter(new TechnicianController(taskService, directory)));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
