import { ForbiddenError, UnauthenticatedError } from '@/backend/lib/errors';
import { middleware, publicProcedure } from '@/backend/trpc/trpc';
import type { UserRole } from '@/shared/core';

/**
 * Middleware that requires a resolved caller.
 * The caller comes from the X-User-Id (or Bearer) header via the identity resolver.
 */
const requiresCaller = middleware(({ ctx, next }) => {
  if (!ctx.caller) {
    throw new UnauthenticatedError();
  }

  return next({
    ctx: {
      ...ctx,
      caller: ctx.caller,
    },
  });
});

/**
 * Procedure that requires an authenticated caller of any role.
 */
export const authedProcedure = publicProcedure.use(requiresCaller);

/**
 * Procedure restricted to the listed roles.
 */
export function roleProcedure(...roles: UserRole[]) {
  return authedProcedure.use(({ ctx, next }) => {
    if (!roles.includes(ctx.caller.role)) {
      throw new ForbiddenError('Your role cannot perform this operation.');
    }
    return next();
  });
}
