/**
 * Identity Service
 *
 * Resolves the calling user from request headers. Token issuance and
 * verification happen upstream; this service trusts the user id forwarded by
 * the authenticating proxy and looks the user up for their role.
 */

import type { IncomingHttpHeaders } from 'node:http';
import {
  type UserAccessor,
  userAccessor as defaultUserAccessor,
} from '@/backend/resource_accessors/user.accessor';
import type { Caller } from '@/shared/core';
import { createLogger } from './logger.service';

const logger = createLogger('identity');

export const USER_ID_HEADER = 'x-user-id';

export interface IdentityResolver {
  /** @returns the caller, or null when the request carries no usable identity */
  resolve(headers: IncomingHttpHeaders): Promise<Caller | null>;
}

function firstHeaderValue(value: string | string[] | undefined): string | undefined {
  const raw = Array.isArray(value) ? value[0] : value;
  const trimmed = raw?.trim();
  return trimmed ? trimmed : undefined;
}

export function extractUserId(headers: IncomingHttpHeaders): string | null {
  const direct = firstHeaderValue(headers[USER_ID_HEADER]);
  if (direct) {
    return direct;
  }

  const authorization = firstHeaderValue(headers.authorization);
  const match = authorization?.match(/^Bearer\s+(\S+)$/i);
  return match?.[1] ?? null;
}

export class HeaderIdentityResolver implements IdentityResolver {
  constructor(private readonly users: UserAccessor = defaultUserAccessor) {}

  async resolve(headers: IncomingHttpHeaders): Promise<Caller | null> {
    const userId = extractUserId(headers);
    if (!userId) {
      return null;
    }

    const user = await this.users.findById(userId);
    if (!user) {
      logger.debug('Unknown user in identity header', { userId });
      return null;
    }
    if (user.isBanned) {
      logger.warn('Banned user attempted access', { userId });
      return null;
    }
    return { userId: user.id, role: user.role };
  }
}

export const identityResolver: IdentityResolver = new HeaderIdentityResolver();
