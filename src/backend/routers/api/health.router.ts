import { Router } from 'express';
import type { AppContext } from '@/backend/app-context';
import { HTTP_STATUS } from '@/backend/constants';
import { toError } from '@/backend/lib/error-utils';

// ============================================================================
// Health Check Routes
// ============================================================================

export function createHealthRouter(appContext: AppContext): Router {
  const router = Router();
  const { configService, createLogger, healthAccessor } = appContext.services;
  const logger = createLogger('api:health');

  /**
   * GET /health
   * Basic health check - returns service status and metadata
   */
  router.get('/', (_req, res) => {
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      service: 'crewline-backend',
      version: configService.getAppVersion(),
      environment: configService.getEnvironment(),
    });
  });

  /**
   * GET /health/database
   * Database connectivity health check
   */
  router.get('/database', async (_req, res) => {
    try {
      await healthAccessor.checkDatabaseConnection();
      res.json({
        status: 'ok',
        timestamp: new Date().toISOString(),
        database: 'connected',
      });
    } catch (error) {
      const err = toError(error);
      logger.error('Database health check failed', err);
      res.status(HTTP_STATUS.SERVICE_UNAVAILABLE).json({
        status: 'error',
        timestamp: new Date().toISOString(),
        database: 'disconnected',
        error: err.message,
      });
    }
  });

  return router;
}
