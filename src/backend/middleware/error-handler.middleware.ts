import type { NextFunction, Request, Response } from 'express';
import type { AppContext } from '@/backend/app-context';
import { HTTP_STATUS } from '@/backend/constants';
import { toError } from '@/backend/lib/error-utils';

/**
 * Final Express error handler.
 * Logs the failure and answers 500 JSON; the message is only shown in development.
 */
export function createErrorHandlerMiddleware(appContext: AppContext) {
  const logger = appContext.services.createLogger('server');

  return (err: unknown, req: Request, res: Response, _next: NextFunction): void => {
    const error = toError(err);
    logger.error('Unhandled request error', error, { method: req.method, path: req.path });

    if (res.headersSent) {
      res.end();
      return;
    }
    res.status(HTTP_STATUS.INTERNAL_ERROR).json({
      error: 'Internal server error',
      message: appContext.services.configService.isDevelopment() ? error.message : undefined,
    });
  };
}
