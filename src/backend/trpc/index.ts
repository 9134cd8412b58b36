import { jobsRouter } from './jobs.trpc';
import { messagingRouter } from './messaging.trpc';
import { router } from './trpc';

export const appRouter = router({
  messaging: messagingRouter,
  jobs: jobsRouter,
});

// Export type for use in clients
export type AppRouter = typeof appRouter;

export { authedProcedure, roleProcedure } from './procedures';
// Re-export context and procedure helpers
export { type Context, createContextFactory, publicProcedure } from './trpc';
