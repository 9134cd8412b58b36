export { createCorsMiddleware } from './cors.middleware';
export { createErrorHandlerMiddleware } from './error-handler.middleware';
export { createRequestLoggerMiddleware } from './request-logger.middleware';
export { securityMiddleware } from './security.middleware';
