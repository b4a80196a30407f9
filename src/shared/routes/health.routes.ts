/**
 * =============================================================================
 * HEALTH CHECK ROUTES
 * =============================================================================
 *
 * ENDPOINTS:
 * - GET /health       - Quick health check (for load balancers)
 * - GET /health/live  - Liveness probe (is the process running?)
 * =============================================================================
 */

import { Router, Request, Response } from 'express';
import { config } from '../../config/environment';

const startTime = Date.now();

export const healthRoutes = Router();

healthRoutes.get('/health', (_req: Request, res: Response) => {
  res.status(200).json({
    status: 'healthy',
    timestamp: new Date().toISOString(),
    environment: config.nodeEnv
  });
});

healthRoutes.get('/health/live', (_req: Request, res: Response) => {
  res.status(200).json({
    status: 'alive',
    pid: process.pid,
    uptime: Math.floor((Date.now() - startTime) / 1000)
  });
});
