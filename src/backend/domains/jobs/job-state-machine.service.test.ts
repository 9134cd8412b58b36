import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { SqliteDatabase } from '@/backend/db';
import {
  ForbiddenError,
  InvalidArgumentError,
  InvalidStateError,
  NotFoundError,
  ThreadClosedError,
} from '@/backend/lib/errors';
import { SqliteJobAccessor } from '@/backend/resource_accessors/job.accessor';
import { SqliteServiceListingAccessor } from '@/backend/resource_accessors/service-listing.accessor';
import { SqliteThreadAccessor } from '@/backend/resource_accessors/thread.accessor';
import { type SeededUser, seedJob, seedMarketplace, seedUser } from '@/backend/testing/factories';
import { createTestDatabase } from '@/backend/testing/test-db';
import { type Caller, JobStatus, type UserRole } from '@/shared/core';
import {
  JOB_STATE_CHANGED,
  type JobStateChangedEvent,
  JobStateMachineService,
} from './job-state-machine.service';

const asCaller = (user: { id: string; role: UserRole }): Caller => ({
  userId: user.id,
  role: user.role,
});

describe('JobStateMachineService', () => {
  let db: SqliteDatabase;
  let threads: SqliteThreadAccessor;
  let jobs: SqliteJobAccessor;
  let machine: JobStateMachineService;
  let client: SeededUser;
  let worker: SeededUser;
  let admin: SeededUser;
  let serviceId: string;
  const now = new Date('2026-04-10T08:30:00.000Z');

  beforeEach(() => {
    db = createTestDatabase();
    threads = new SqliteThreadAccessor(() => db);
    jobs = new SqliteJobAccessor(() => db);
    machine = new JobStateMachineService({
      jobAccessor: jobs,
      threadAccessor: threads,
      serviceListingAccessor: new SqliteServiceListingAccessor(() => db),
      now: () => now,
    });
    const seeded = seedMarketplace(db);
    client = seeded.client;
    worker = seeded.worker;
    admin = seeded.admin;
    serviceId = seeded.service.id;
  });

  afterEach(() => {
    db.close();
  });

  async function negotiatingJobWithThread(): Promise<{ jobId: string; threadId: string }> {
    const thread = await threads.createThread([client.id, worker.id]);
    const job = await machine.createJob(asCaller(client), { serviceId, threadId: thread.id });
    return { jobId: job.id, threadId: thread.id };
  }

  describe('isValidTransition', () => {
    it('allows only the documented edges', () => {
      expect(machine.isValidTransition('NEGOTIATING', 'ACCEPTED')).toBe(true);
      expect(machine.isValidTransition('ACCEPTED', 'CANCELLED')).toBe(true);
      expect(machine.isValidTransition('COMPLETED', 'FINALIZED')).toBe(true);
      expect(machine.isValidTransition('COMPLETED', 'CANCELLED')).toBe(false);
      expect(machine.isValidTransition('REJECTED', 'NEGOTIATING')).toBe(false);
      expect(machine.isValidTransition('FINALIZED', 'CANCELLED')).toBe(false);
    });
  });

  describe('createJob', () => {
    it('links a new negotiating job to the conversation', async () => {
      const { jobId, threadId } = await negotiatingJobWithThread();

      const job = await machine.getJobForUser(asCaller(worker), jobId);
      expect(job.status).toBe(JobStatus.NEGOTIATING);
      expect(job.clientId).toBe(client.id);
      expect(job.workerId).toBe(worker.id);
      expect(job.threadId).toBe(threadId);
    });

    it('refuses workers', async () => {
      const thread = await threads.createThread([client.id, worker.id]);

      await expect(
        machine.createJob(asCaller(worker), { serviceId, threadId: thread.id })
      ).rejects.toThrow(new ForbiddenError('Only clients can create jobs.'));
    });

    it('requires an existing service', async () => {
      const thread = await threads.createThread([client.id, worker.id]);

      await expect(
        machine.createJob(asCaller(client), { serviceId: 'missing', threadId: thread.id })
      ).rejects.toBeInstanceOf(InvalidArgumentError);
    });

    it('hides threads the client is not part of', async () => {
      const other = seedUser(db);
      const thread = await threads.createThread([other.id, worker.id]);

      await expect(
        machine.createJob(asCaller(client), { serviceId, threadId: thread.id })
      ).rejects.toBeInstanceOf(NotFoundError);
    });

    it('refuses closed threads and threads that already have a job', async () => {
      const { threadId } = await negotiatingJobWithThread();
      await expect(
        machine.createJob(asCaller(client), { serviceId, threadId })
      ).rejects.toBeInstanceOf(InvalidStateError);

      const closed = await threads.createThread([client.id, worker.id]);
      await threads.closeThread(closed.id);
      await expect(
        machine.createJob(asCaller(client), { serviceId, threadId: closed.id })
      ).rejects.toBeInstanceOf(ThreadClosedError);
    });
  });

  describe('accept / complete', () => {
    it('walks a job to COMPLETED and records timestamps', async () => {
      const { jobId } = await negotiatingJobWithThread();

      const accepted = await machine.accept(asCaller(worker), jobId);
      const completed = await machine.complete(asCaller(worker), jobId);

      expect(accepted.status).toBe(JobStatus.ACCEPTED);
      expect(accepted.startedAt?.toISOString()).toBe(now.toISOString());
      expect(completed.status).toBe(JobStatus.COMPLETED);
      expect(completed.completedAt?.toISOString()).toBe(now.toISOString());
    });

    it('checks role, existence, assignment and state in that order', async () => {
      const { jobId } = await negotiatingJobWithThread();
      const otherWorker = seedUser(db, { role: 'WORKER' });

      await expect(machine.accept(asCaller(client), 'missing')).rejects.toThrow(
        'Only workers can accept jobs.'
      );
      await expect(machine.accept(asCaller(admin), jobId)).rejects.toBeInstanceOf(ForbiddenError);
      await expect(machine.accept(asCaller(worker), 'missing')).rejects.toThrow('Job not found.');
      await expect(machine.accept(asCaller(otherWorker), jobId)).rejects.toThrow(
        'Unauthorized to accept this job.'
      );
      await expect(machine.complete(asCaller(worker), jobId)).rejects.toThrow(
        'Only accepted jobs can be completed.'
      );
    });

    it('lets exactly one of two concurrent accepts win', async () => {
      const { jobId } = await negotiatingJobWithThread();

      const results = await Promise.allSettled([
        machine.accept(asCaller(worker), jobId),
        machine.accept(asCaller(worker), jobId),
      ]);

      expect(results.filter((r) => r.status === 'fulfilled')).toHaveLength(1);
      const failure = results.find((r) => r.status === 'rejected');
      expect(failure?.status === 'rejected' ? failure.reason : null).toBeInstanceOf(
        InvalidStateError
      );
    });
  });

  describe('reject', () => {
    it('closes the linked thread with the status change', async () => {
      const { jobId, threadId } = await negotiatingJobWithThread();
      const events: JobStateChangedEvent[] = [];
      machine.on(JOB_STATE_CHANGED, (event: JobStateChangedEvent) => events.push(event));

      const rejected = await machine.reject(asCaller(worker), jobId, 'too far');

      expect(rejected.status).toBe(JobStatus.REJECTED);
      expect(rejected.cancelReason).toBe('too far');
      expect((await threads.findById(threadId))?.isClosed).toBe(true);
      await expect(threads.appendMessage(threadId, client.id, 'still there?')).rejects.toBeInstanceOf(
        ThreadClosedError
      );
      expect(events).toEqual([
        {
          jobId,
          fromStatus: 'NEGOTIATING',
          toStatus: 'REJECTED',
          threadId,
          threadClosed: true,
        },
      ]);
    });

    it('leaves job and thread untouched when the job is no longer negotiating', async () => {
      const { jobId, threadId } = await negotiatingJobWithThread();
      await machine.accept(asCaller(worker), jobId);

      await expect(machine.reject(asCaller(worker), jobId, 'nope')).rejects.toBeInstanceOf(
        InvalidStateError
      );
      expect((await threads.findById(threadId))?.isClosed).toBe(false);
    });
  });

  describe('cancel', () => {
    it.each([
      JobStatus.COMPLETED,
      JobStatus.FINALIZED,
      JobStatus.CANCELLED,
      JobStatus.REJECTED,
    ])('fails InvalidState from %s', async (status) => {
      const { id } = seedJob(db, client.id, worker.id, { status });

      await expect(machine.cancel(asCaller(client), id, 'changed plans')).rejects.toThrow(
        new InvalidStateError('Cannot cancel job in its current state.')
      );
    });

    it('cancels accepted jobs for the requesting client only', async () => {
      const { id } = seedJob(db, client.id, worker.id, { status: JobStatus.ACCEPTED });

      await expect(machine.cancel(asCaller(worker), id, 'x')).rejects.toThrow(
        'Only clients can cancel jobs.'
      );
      const cancelled = await machine.cancel(asCaller(client), id, 'changed plans');

      expect(cancelled.status).toBe(JobStatus.CANCELLED);
      expect(cancelled.cancelReason).toBe('changed plans');
      expect(cancelled.cancelledAt?.toISOString()).toBe(now.toISOString());
    });
  });

  describe('finalize', () => {
    it('applies only to completed jobs', async () => {
      const completed = seedJob(db, client.id, worker.id, { status: JobStatus.COMPLETED });
      const accepted = seedJob(db, client.id, worker.id, { status: JobStatus.ACCEPTED });

      expect((await machine.finalize(completed.id)).status).toBe(JobStatus.FINALIZED);
      await expect(machine.finalize(accepted.id)).rejects.toThrow(
        'Only completed jobs can be finalized.'
      );
    });
  });

  describe('getJobForUser / listJobsForUser', () => {
    it('hides jobs from non-parties', async () => {
      const { jobId } = await negotiatingJobWithThread();

      await expect(machine.getJobForUser(asCaller(admin), jobId)).rejects.toBeInstanceOf(
        NotFoundError
      );
      const page = await machine.listJobsForUser(asCaller(client), { skip: 0, limit: 10 });
      expect(page.items.map((job) => job.id)).toEqual([jobId]);
    });
  });

  it('emits nothing when a transition is refused', async () => {
    const listener = vi.fn();
    machine.on(JOB_STATE_CHANGED, listener);

    await expect(machine.complete(asCaller(worker), 'missing')).rejects.toBeInstanceOf(
      NotFoundError
    );
    expect(listener).not.toHaveBeenCalled();
  });
});
