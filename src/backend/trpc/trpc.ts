import { initTRPC, TRPCError } from '@trpc/server';
import type { Request } from 'express';
import superjson from 'superjson';
import type { AppContext } from '@/backend/app-context';
import { type DomainErrorCode, isDomainError } from '@/backend/lib/errors';
import { createLogger } from '@/backend/services/logger.service';
import type { Caller } from '@/shared/core';

const logger = createLogger('trpc');

/**
 * Context for tRPC procedures.
 * Carries the application services and the caller resolved from request headers.
 */
export type Context = {
  appContext: AppContext;
  /** Null when the request carries no usable identity */
  caller: Caller | null;
};

/**
 * Creates the tRPC context factory for an Express request.
 */
export const createContextFactory =
  (appContext: AppContext) =>
  async ({ req }: { req: Request }): Promise<Context> => ({
    appContext,
    caller: await appContext.services.identityResolver.resolve(req.headers),
  });

const DOMAIN_TO_TRPC_CODE: Record<DomainErrorCode, TRPCError['code']> = {
  NOT_FOUND: 'NOT_FOUND',
  FORBIDDEN: 'FORBIDDEN',
  THREAD_CLOSED: 'CONFLICT',
  INVALID_STATE: 'CONFLICT',
  INVALID_ARGUMENT: 'BAD_REQUEST',
  UNAUTHENTICATED: 'UNAUTHORIZED',
};

const t = initTRPC.context<Context>().create({
  transformer: superjson,
  errorFormatter({ shape, error }) {
    return {
      ...shape,
      data: {
        ...shape.data,
        domainCode: isDomainError(error.cause) ? error.cause.code : null,
      },
    };
  },
});

export const router = t.router;
export const middleware = t.middleware;

/**
 * Converts domain errors raised anywhere below into tRPC errors with the
 * matching status; anything else is logged and surfaces as an internal error.
 */
const mapDomainErrors = middleware(async ({ path, type, next }) => {
  const result = await next();
  if (result.ok) {
    return result;
  }

  const { error } = result;
  if (isDomainError(error.cause)) {
    throw new TRPCError({
      code: DOMAIN_TO_TRPC_CODE[error.cause.code],
      message: error.cause.message,
      cause: error.cause,
    });
  }
  if (error.code === 'INTERNAL_SERVER_ERROR') {
    logger.error('Procedure failed', error, { path, type });
  }
  return result;
});

export const publicProcedure = t.procedure.use(mapDomainErrors);
