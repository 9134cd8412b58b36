/**
 * Thread WebSocket Handler
 *
 * Real-time channel for one negotiation thread. The upgrade is admitted only
 * for an identified participant of the thread; afterwards every inbound
 * `{ content }` frame is dispatched as a reply, and persisted messages reach
 * the socket through the connection registry.
 */

import type { IncomingMessage } from 'node:http';
import type { Duplex } from 'node:stream';
import type { RawData, WebSocket, WebSocketServer } from 'ws';
import { z } from 'zod';
import type { AppContext } from '@/backend/app-context';
import { toError } from '@/backend/lib/error-utils';
import { isDomainError } from '@/backend/lib/errors';
import type { Caller } from '@/shared/core';
import { sendErrorFrame, toMessageString } from './message-utils';
import { markWebSocketAlive, rejectUpgrade, type UpgradeRefusalStatus } from './upgrade-utils';

// ============================================================================
// Types
// ============================================================================

const THREAD_PATH_PATTERN = /^\/ws\/threads\/([^/]+)\/?$/;

const InboundFrameSchema = z.object({
  content: z.string(),
});

type Admission = { ok: true; caller: Caller } | { ok: false; status: UpgradeRefusalStatus };

// ============================================================================
// Helper Functions
// ============================================================================

export function isThreadSocketPath(pathname: string): boolean {
  return pathname === '/ws/threads' || THREAD_PATH_PATTERN.test(pathname);
}

/**
 * Thread id from `/ws/threads/:threadId`, or from `?threadId=` on `/ws/threads`.
 */
export function extractThreadId(url: URL): string | null {
  const match = THREAD_PATH_PATTERN.exec(url.pathname);
  const raw = match?.[1] ? decodePathSegment(match[1]) : url.searchParams.get('threadId');
  const trimmed = raw?.trim();
  return trimmed ? trimmed : null;
}

/** Null for a malformed percent-escape. */
function decodePathSegment(segment: string): string | null {
  try {
    return decodeURIComponent(segment);
  } catch {
    return null;
  }
}

// ============================================================================
// Upgrade Handler
// ============================================================================

export function createThreadUpgradeHandler(appContext: AppContext) {
  const logger = appContext.services.createLogger('thread-handler');
  const { connectionRegistry, dispatchService, identityResolver, threadAccessor } =
    appContext.services;

  async function admit(request: IncomingMessage, threadId: string): Promise<Admission> {
    const caller = await identityResolver.resolve(request.headers);
    if (!caller) {
      return { ok: false, status: 401 };
    }
    if (!(await threadAccessor.isParticipant(threadId, caller.userId))) {
      return { ok: false, status: 404 };
    }
    return { ok: true, caller };
  }

  async function handleFrame(
    ws: WebSocket,
    caller: Caller,
    threadId: string,
    data: RawData
  ): Promise<void> {
    let payload: unknown;
    try {
      payload = JSON.parse(toMessageString(data));
    } catch {
      sendErrorFrame(ws, 'Invalid JSON format', 'INVALID_ARGUMENT');
      return;
    }

    const frame = InboundFrameSchema.safeParse(payload);
    if (!frame.success || frame.data.content.trim().length === 0) {
      sendErrorFrame(ws, 'Missing message content', 'INVALID_ARGUMENT');
      return;
    }

    logger.debug('Inbound frame', { threadId, userId: caller.userId });
    try {
      await dispatchService.send(caller, {
        type: 'reply',
        threadId,
        content: frame.data.content,
      });
    } catch (error) {
      if (isDomainError(error)) {
        sendErrorFrame(ws, error.message, error.code);
        return;
      }
      logger.error('Failed to dispatch inbound frame', toError(error), { threadId });
      sendErrorFrame(ws, 'Internal server error', 'INTERNAL');
    }
  }

  function onConnection(
    ws: WebSocket,
    caller: Caller,
    threadId: string,
    wsAliveMap: WeakMap<WebSocket, boolean>
  ): void {
    logger.info('Thread WebSocket connection established', { threadId, userId: caller.userId });

    markWebSocketAlive(ws, wsAliveMap);
    connectionRegistry.bind(threadId, ws);

    // Frames from one socket are dispatched one at a time, in arrival order.
    let pending: Promise<void> = Promise.resolve();

    ws.on('message', (data) => {
      pending = pending.then(() => handleFrame(ws, caller, threadId, data));
    });

    ws.on('close', () => {
      logger.info('Thread WebSocket connection closed', { threadId, userId: caller.userId });
      connectionRegistry.unbind(threadId, ws);
    });

    ws.on('error', (error) => {
      logger.error('Thread WebSocket error', error, { threadId });
      connectionRegistry.unbind(threadId, ws);
    });
  }

  return function handleThreadUpgrade(
    request: IncomingMessage,
    socket: Duplex,
    head: Buffer,
    url: URL,
    wss: WebSocketServer,
    wsAliveMap: WeakMap<WebSocket, boolean>
  ): void {
    const threadId = extractThreadId(url);

    if (!threadId) {
      logger.warn('Thread WebSocket missing threadId');
      rejectUpgrade(socket, 400, 'Missing thread id');
      return;
    }

    admit(request, threadId).then(
      (admission) => {
        if (!admission.ok) {
          logger.info('Thread WebSocket refused', { threadId, status: admission.status });
          rejectUpgrade(socket, admission.status);
          return;
        }
        if (socket.destroyed) {
          return;
        }
        wss.handleUpgrade(request, socket, head, (ws) => {
          onConnection(ws, admission.caller, threadId, wsAliveMap);
        });
      },
      (error: unknown) => {
        logger.error('Thread WebSocket admission failed', toError(error), { threadId });
        rejectUpgrade(socket, 500);
      }
    );
  };
}
