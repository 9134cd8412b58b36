/**
 * Job State Machine Service
 *
 * Owns job status transitions and their side effects on the linked thread.
 *
 * State Diagram:
 *   NEGOTIATING → ACCEPTED (fulfiller accepts)
 *   NEGOTIATING → REJECTED (fulfiller rejects, linked thread closes)
 *   NEGOTIATING → CANCELLED (requester cancels)
 *   ACCEPTED → COMPLETED (fulfiller completes)
 *   ACCEPTED → CANCELLED (requester cancels)
 *   COMPLETED → FINALIZED (review flow, service-level only)
 */

import { EventEmitter } from 'node:events';
import {
  ForbiddenError,
  InvalidArgumentError,
  InvalidStateError,
  NotFoundError,
  ThreadClosedError,
} from '@/backend/lib/errors';
import {
  type JobAccessor,
  type JobRecord,
  type JobTransitionData,
  jobAccessor as defaultJobAccessor,
} from '@/backend/resource_accessors/job.accessor';
import type { Page, PageRequest } from '@/backend/resource_accessors/pagination';
import {
  type ServiceListingAccessor,
  serviceListingAccessor as defaultServiceListingAccessor,
} from '@/backend/resource_accessors/service-listing.accessor';
import {
  type ThreadAccessor,
  threadAccessor as defaultThreadAccessor,
} from '@/backend/resource_accessors/thread.accessor';
import { createLogger } from '@/backend/services/logger.service';
import { actingPartyForRole, type Caller, type JobParty, JobStatus } from '@/shared/core';

const logger = createLogger('job-state-machine');

/**
 * Valid state transitions for job status.
 */
const VALID_TRANSITIONS: Record<JobStatus, JobStatus[]> = {
  NEGOTIATING: ['ACCEPTED', 'REJECTED', 'CANCELLED'],
  ACCEPTED: ['COMPLETED', 'CANCELLED'],
  COMPLETED: ['FINALIZED'],
  FINALIZED: [],
  CANCELLED: [],
  REJECTED: [],
};

type JobAction = 'accept' | 'reject' | 'complete' | 'cancel';

interface ActionRule {
  party: JobParty;
  target: JobStatus;
  wrongRole: string;
  notAssigned: string;
  wrongState: string;
}

const ACTION_RULES: Record<JobAction, ActionRule> = {
  accept: {
    party: 'fulfiller',
    target: JobStatus.ACCEPTED,
    wrongRole: 'Only workers can accept jobs.',
    notAssigned: 'Unauthorized to accept this job.',
    wrongState: 'Only negotiating jobs can be accepted.',
  },
  reject: {
    party: 'fulfiller',
    target: JobStatus.REJECTED,
    wrongRole: 'Only workers can reject jobs.',
    notAssigned: 'Unauthorized to reject this job.',
    wrongState: 'Only jobs in NEGOTIATING status can be rejected.',
  },
  complete: {
    party: 'fulfiller',
    target: JobStatus.COMPLETED,
    wrongRole: 'Only workers can complete jobs.',
    notAssigned: 'Unauthorized to complete this job.',
    wrongState: 'Only accepted jobs can be completed.',
  },
  cancel: {
    party: 'requester',
    target: JobStatus.CANCELLED,
    wrongRole: 'Only clients can cancel jobs.',
    notAssigned: 'Unauthorized to cancel this job.',
    wrongState: 'Cannot cancel job in its current state.',
  },
};

export const JOB_STATE_CHANGED = 'job_state_changed' as const;

export interface JobStateChangedEvent {
  jobId: string;
  fromStatus: JobStatus;
  toStatus: JobStatus;
  threadId: string | null;
  threadClosed: boolean;
}

export interface CreateJobInput {
  serviceId: string;
  threadId: string;
}

export interface JobStateMachineDeps {
  jobAccessor?: JobAccessor;
  threadAccessor?: ThreadAccessor;
  serviceListingAccessor?: ServiceListingAccessor;
  now?: () => Date;
}

function assignedPartyId(job: JobRecord, party: JobParty): string {
  return party === 'fulfiller' ? job.workerId : job.clientId;
}

export class JobStateMachineService extends EventEmitter {
  private readonly jobs: JobAccessor;
  private readonly threads: ThreadAccessor;
  private readonly services: ServiceListingAccessor;
  private readonly now: () => Date;

  constructor(deps: JobStateMachineDeps = {}) {
    super();
    this.jobs = deps.jobAccessor ?? defaultJobAccessor;
    this.threads = deps.threadAccessor ?? defaultThreadAccessor;
    this.services = deps.serviceListingAccessor ?? defaultServiceListingAccessor;
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Check if a state transition is valid.
   */
  isValidTransition(from: JobStatus, to: JobStatus): boolean {
    return VALID_TRANSITIONS[from].includes(to);
  }

  /**
   * Open a negotiation: a NEGOTIATING job for the service's worker, linked to
   * an existing conversation between the client and that worker.
   */
  async createJob(caller: Caller, input: CreateJobInput): Promise<JobRecord> {
    if (actingPartyForRole(caller.role) !== 'requester') {
      throw new ForbiddenError('Only clients can create jobs.');
    }

    const service = await this.services.findById(input.serviceId);
    if (!service) {
      throw new InvalidArgumentError('Service not found.');
    }

    const thread = await this.threads.findThreadForUser(input.threadId, caller.userId);
    if (!thread) {
      throw new NotFoundError('Thread not found or access denied.');
    }
    if (thread.isClosed) {
      throw new ThreadClosedError();
    }
    if (thread.jobId !== null) {
      throw new InvalidStateError('A job is already linked to this thread.');
    }
    if (!(await this.threads.isParticipant(thread.id, service.workerId))) {
      throw new InvalidArgumentError('The service provider is not part of this conversation.');
    }

    const job = await this.jobs.createLinkedToThread({
      clientId: caller.userId,
      workerId: service.workerId,
      serviceId: service.id,
      threadId: thread.id,
    });

    logger.jobEvent('created', job.id, { threadId: thread.id, serviceId: service.id });
    return job;
  }

  async accept(caller: Caller, jobId: string): Promise<JobRecord> {
    return this.transition(caller, jobId, 'accept', { startedAt: this.now() });
  }

  /**
   * Reject a negotiation. The linked thread is closed in the same write.
   */
  async reject(caller: Caller, jobId: string, reason?: string | null): Promise<JobRecord> {
    return this.transition(
      caller,
      jobId,
      'reject',
      { cancelledAt: this.now(), cancelReason: reason ?? undefined },
      true
    );
  }

  async complete(caller: Caller, jobId: string): Promise<JobRecord> {
    return this.transition(caller, jobId, 'complete', { completedAt: this.now() });
  }

  async cancel(caller: Caller, jobId: string, reason: string): Promise<JobRecord> {
    return this.transition(caller, jobId, 'cancel', {
      cancelledAt: this.now(),
      cancelReason: reason,
    });
  }

  /**
   * Hook for the review flow once both parties are done with a completed job.
   * Not exposed to callers directly.
   */
  async finalize(jobId: string): Promise<JobRecord> {
    const job = await this.jobs.findById(jobId);
    if (!job) {
      throw new NotFoundError('Job not found.');
    }
    if (!this.isValidTransition(job.status, JobStatus.FINALIZED)) {
      throw new InvalidStateError('Only completed jobs can be finalized.');
    }
    return this.applyTransition(job, JobStatus.FINALIZED, {}, false);
  }

  async getJobForUser(caller: Caller, jobId: string): Promise<JobRecord> {
    const job = await this.jobs.findById(jobId);
    if (!job || (job.clientId !== caller.userId && job.workerId !== caller.userId)) {
      throw new NotFoundError('Job not found.');
    }
    return job;
  }

  async listJobsForUser(caller: Caller, page: PageRequest): Promise<Page<JobRecord>> {
    return this.jobs.listForUser(caller.userId, page);
  }

  private async transition(
    caller: Caller,
    jobId: string,
    action: JobAction,
    data: Omit<JobTransitionData, 'status'>,
    closeLinkedThread = false
  ): Promise<JobRecord> {
    const rule = ACTION_RULES[action];

    if (actingPartyForRole(caller.role) !== rule.party) {
      throw new ForbiddenError(rule.wrongRole);
    }

    const job = await this.jobs.findById(jobId);
    if (!job) {
      throw new NotFoundError('Job not found.');
    }
    if (assignedPartyId(job, rule.party) !== caller.userId) {
      throw new ForbiddenError(rule.notAssigned);
    }
    if (!this.isValidTransition(job.status, rule.target)) {
      throw new InvalidStateError(rule.wrongState);
    }

    return this.applyTransition(job, rule.target, data, closeLinkedThread);
  }

  private async applyTransition(
    job: JobRecord,
    targetStatus: JobStatus,
    data: Omit<JobTransitionData, 'status'>,
    closeLinkedThread: boolean
  ): Promise<JobRecord> {
    const result = await this.jobs.transitionWithCas(
      job.id,
      job.status,
      { ...data, status: targetStatus },
      { closeLinkedThread }
    );

    if (result.count === 0) {
      throw new InvalidStateError('Job status changed by another request.');
    }

    const updated = await this.jobs.findById(job.id);
    if (!updated) {
      throw new NotFoundError('Job not found.');
    }

    const threadClosed = closeLinkedThread && updated.threadId !== null;
    this.emit(JOB_STATE_CHANGED, {
      jobId: job.id,
      fromStatus: job.status,
      toStatus: targetStatus,
      threadId: updated.threadId,
      threadClosed,
    } satisfies JobStateChangedEvent);

    logger.jobEvent('transitioned', job.id, {
      from: job.status,
      to: targetStatus,
      threadClosed,
    });

    return updated;
  }
}

export function createJobStateMachineService(deps: JobStateMachineDeps = {}): JobStateMachineService {
  return new JobStateMachineService(deps);
}

export const jobStateMachine = new JobStateMachineService();
