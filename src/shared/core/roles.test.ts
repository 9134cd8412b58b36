import { describe, expect, it } from 'vitest';
import { actingPartyForRole, isPrivilegedRole } from './roles';

describe('actingPartyForRole', () => {
  it('maps clients to the requesting side and workers to the fulfilling side', () => {
    expect(actingPartyForRole('CLIENT')).toBe('requester');
    expect(actingPartyForRole('WORKER')).toBe('fulfiller');
  });

  it('gives administrators no party', () => {
    expect(actingPartyForRole('ADMIN')).toBeNull();
  });
});

describe('isPrivilegedRole', () => {
  it('only treats administrators as privileged', () => {
    expect(isPrivilegedRole('ADMIN')).toBe(true);
    expect(isPrivilegedRole('CLIENT')).toBe(false);
    expect(isPrivilegedRole('WORKER')).toBe(false);
  });
});
