export const UserRole = {
  CLIENT: 'CLIENT',
  WORKER: 'WORKER',
  ADMIN: 'ADMIN',
} as const;
export type UserRole = (typeof UserRole)[keyof typeof UserRole];

export const JobStatus = {
  NEGOTIATING: 'NEGOTIATING',
  ACCEPTED: 'ACCEPTED',
  COMPLETED: 'COMPLETED',
  FINALIZED: 'FINALIZED',
  CANCELLED: 'CANCELLED',
  REJECTED: 'REJECTED',
} as const;
export type JobStatus = (typeof JobStatus)[keyof typeof JobStatus];

export const USER_ROLES = Object.values(UserRole);
export const JOB_STATUSES = Object.values(JobStatus);

export function isUserRole(value: string): value is UserRole {
  return USER_ROLES.some((role) => role === value);
}

export function isJobStatus(value: string): value is JobStatus {
  return JOB_STATUSES.some((status) => status === value);
}
