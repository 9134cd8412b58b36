// Domain: jobs
// Public API for the job lifecycle domain module.
// Consumers should import from '@/backend/domains/jobs' only.

export {
  type CreateJobInput,
  createJobStateMachineService,
  JOB_STATE_CHANGED,
  type JobStateChangedEvent,
  type JobStateMachineDeps,
  JobStateMachineService,
  jobStateMachine,
} from './job-state-machine.service';
