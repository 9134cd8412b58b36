import type { UserRole } from './enums';

/** An authenticated user as resolved by the identity collaborator. */
export interface Caller {
  userId: string;
  role: UserRole;
}

/**
 * Which side of a job a role acts for. Administrators moderate, they never
 * act as a party to a job.
 */
export type JobParty = 'requester' | 'fulfiller';

export function actingPartyForRole(role: UserRole): JobParty | null {
  switch (role) {
    case 'CLIENT':
      return 'requester';
    case 'WORKER':
      return 'fulfiller';
    case 'ADMIN':
      return null;
    default: {
      const exhaustive: never = role;
      throw new Error(`Unhandled role: ${String(exhaustive)}`);
    }
  }
}

/**
 * Privileged roles may open a conversation with any user directly instead of
 * going through a service listing.
 */
export function isPrivilegedRole(role: UserRole): boolean {
  switch (role) {
    case 'ADMIN':
      return true;
    case 'CLIENT':
    case 'WORKER':
      return false;
    default: {
      const exhaustive: never = role;
      throw new Error(`Unhandled role: ${String(exhaustive)}`);
    }
  }
}
