import { z } from 'zod';
import { authedProcedure } from './procedures';
import { pageInputSchema, toPageRequest } from './pagination.schema';
import { router } from './trpc';

const contentSchema = z.string();

export const messagingRouter = router({
  // Open a new conversation with a service's worker (or, for admins, any user)
  initiate: authedProcedure
    .input(
      z.object({
        content: contentSchema,
        serviceId: z.string().min(1).nullish(),
        receiverId: z.string().min(1).nullish(),
      })
    )
    .mutation(({ ctx, input }) => {
      return ctx.appContext.services.dispatchService.send(ctx.caller, {
        type: 'initiate',
        content: input.content,
        serviceId: input.serviceId,
        receiverId: input.receiverId,
      });
    }),

  reply: authedProcedure
    .input(z.object({ threadId: z.string().min(1), content: contentSchema }))
    .mutation(({ ctx, input }) => {
      return ctx.appContext.services.dispatchService.send(ctx.caller, {
        type: 'reply',
        threadId: input.threadId,
        content: input.content,
      });
    }),

  // Threads the caller participates in, most recent activity first
  listMine: authedProcedure.input(pageInputSchema).query(({ ctx, input }) => {
    const { configService, threadAccessor } = ctx.appContext.services;
    return threadAccessor.listThreadsForUser(
      ctx.caller.userId,
      toPageRequest(input, configService.getMaxPageSize())
    );
  }),

  get: authedProcedure
    .input(z.object({ threadId: z.string().min(1) }))
    .query(({ ctx, input }) => {
      return ctx.appContext.services.threadAccessor.getThreadForUser(
        input.threadId,
        ctx.caller.userId
      );
    }),
});
