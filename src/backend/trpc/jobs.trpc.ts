import { z } from 'zod';
import { UserRole } from '@/shared/core';
import { roleProcedure } from './procedures';
import { pageInputSchema, toPageRequest } from './pagination.schema';
import { router } from './trpc';

const partyProcedure = roleProcedure(UserRole.CLIENT, UserRole.WORKER);

const jobIdInput = z.object({ jobId: z.string().min(1) });

export const jobsRouter = router({
  // Client turns a conversation into a negotiating job
  create: partyProcedure
    .input(z.object({ serviceId: z.string().min(1), threadId: z.string().min(1) }))
    .mutation(({ ctx, input }) => {
      return ctx.appContext.services.jobStateMachine.createJob(ctx.caller, input);
    }),

  accept: partyProcedure.input(jobIdInput).mutation(({ ctx, input }) => {
    return ctx.appContext.services.jobStateMachine.accept(ctx.caller, input.jobId);
  }),

  reject: partyProcedure
    .input(jobIdInput.extend({ reason: z.string().trim().min(1).nullish() }))
    .mutation(({ ctx, input }) => {
      return ctx.appContext.services.jobStateMachine.reject(ctx.caller, input.jobId, input.reason);
    }),

  complete: partyProcedure.input(jobIdInput).mutation(({ ctx, input }) => {
    return ctx.appContext.services.jobStateMachine.complete(ctx.caller, input.jobId);
  }),

  cancel: partyProcedure
    .input(jobIdInput.extend({ reason: z.string().trim().min(1) }))
    .mutation(({ ctx, input }) => {
      return ctx.appContext.services.jobStateMachine.cancel(ctx.caller, input.jobId, input.reason);
    }),

  listMine: partyProcedure.input(pageInputSchema).query(({ ctx, input }) => {
    const { configService, jobStateMachine } = ctx.appContext.services;
    return jobStateMachine.listJobsForUser(
      ctx.caller,
      toPageRequest(input, configService.getMaxPageSize())
    );
  }),

  get: partyProcedure.input(jobIdInput).query(({ ctx, input }) => {
    return ctx.appContext.services.jobStateMachine.getJobForUser(ctx.caller, input.jobId);
  }),
});
