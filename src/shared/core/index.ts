export { isJobStatus, isUserRole, JOB_STATUSES, JobStatus, USER_ROLES, UserRole } from './enums';
export {
  actingPartyForRole,
  type Caller,
  isPrivilegedRole,
  type JobParty,
} from './roles';
