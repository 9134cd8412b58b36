/**
 * Dispatch Service
 *
 * Validates an inbound message, persists it (opening a new thread on first
 * contact) and hands the stored message to the delivery bridge. Replies to
 * the same thread are serialized; replies to different threads never wait on
 * each other.
 */

import { toErrorMessage } from '@/backend/lib/error-utils';
import { InvalidArgumentError, NotFoundError, ThreadClosedError } from '@/backend/lib/errors';
import { KeyedLock } from '@/backend/lib/keyed-lock';
import {
  type ServiceListingAccessor,
  serviceListingAccessor as defaultServiceListingAccessor,
} from '@/backend/resource_accessors/service-listing.accessor';
import {
  type MessageView,
  type ThreadAccessor,
  threadAccessor as defaultThreadAccessor,
} from '@/backend/resource_accessors/thread.accessor';
import {
  type UserAccessor,
  userAccessor as defaultUserAccessor,
} from '@/backend/resource_accessors/user.accessor';
import { createLogger } from '@/backend/services/logger.service';
import { type Caller, isPrivilegedRole } from '@/shared/core';
import type { MessageDeliveryBridge } from './bridges';

const logger = createLogger('dispatch');

export const MAX_MESSAGE_LENGTH = 5000;

export type SendPayload =
  | { type: 'reply'; threadId: string; content: string }
  | {
      type: 'initiate';
      content: string;
      serviceId?: string | null;
      receiverId?: string | null;
    };

export interface DispatchServiceDeps {
  threadAccessor?: ThreadAccessor;
  serviceListingAccessor?: ServiceListingAccessor;
  userAccessor?: UserAccessor;
}

export function normalizeContent(content: string): string {
  const trimmed = content.trim();
  if (trimmed.length === 0) {
    throw new InvalidArgumentError('Message content cannot be empty.');
  }
  if (trimmed.length > MAX_MESSAGE_LENGTH) {
    throw new InvalidArgumentError(
      `Message content cannot exceed ${MAX_MESSAGE_LENGTH} characters.`
    );
  }
  return trimmed;
}

export class DispatchService {
  private readonly threads: ThreadAccessor;
  private readonly services: ServiceListingAccessor;
  private readonly users: UserAccessor;
  private readonly threadLocks = new KeyedLock();
  private deliveryBridge: MessageDeliveryBridge | null = null;

  constructor(deps: DispatchServiceDeps = {}) {
    this.threads = deps.threadAccessor ?? defaultThreadAccessor;
    this.services = deps.serviceListingAccessor ?? defaultServiceListingAccessor;
    this.users = deps.userAccessor ?? defaultUserAccessor;
  }

  configure(bridges: { delivery: MessageDeliveryBridge }): void {
    this.deliveryBridge = bridges.delivery;
  }

  private get delivery(): MessageDeliveryBridge {
    if (!this.deliveryBridge) {
      throw new Error(
        'DispatchService not configured: delivery bridge missing. Call configure() first.'
      );
    }
    return this.deliveryBridge;
  }

  /**
   * Persist a message and start its delivery.
   * @returns the stored message, with its sender's identity
   */
  async send(caller: Caller, payload: SendPayload): Promise<MessageView> {
    const delivery = this.delivery;
    const content = normalizeContent(payload.content);

    switch (payload.type) {
      case 'reply':
        return this.reply(caller, payload.threadId, content, delivery);
      case 'initiate':
        return this.initiate(caller, payload, content, delivery);
      default: {
        const exhaustive: never = payload;
        throw new Error(`Unhandled payload: ${JSON.stringify(exhaustive)}`);
      }
    }
  }

  private async reply(
    caller: Caller,
    threadId: string,
    content: string,
    delivery: MessageDeliveryBridge
  ): Promise<MessageView> {
    const { message, delivered } = await this.threadLocks.run(threadId, async () => {
      const thread = await this.threads.findThreadForUser(threadId, caller.userId);
      if (!thread) {
        throw new NotFoundError('Thread not found or access denied.');
      }
      if (thread.isClosed) {
        throw new ThreadClosedError();
      }

      const stored = await this.threads.appendMessage(threadId, caller.userId, content);
      // Delivery starts before the lock is released so fan-out order matches append order.
      return { message: stored, delivered: this.startDelivery(delivery, stored) };
    });

    logger.threadEvent('message_persisted', threadId, {
      messageId: message.id,
      senderId: caller.userId,
    });
    await delivered;
    return message;
  }

  private async initiate(
    caller: Caller,
    payload: Extract<SendPayload, { type: 'initiate' }>,
    content: string,
    delivery: MessageDeliveryBridge
  ): Promise<MessageView> {
    const receiverId = await this.resolveReceiver(caller, payload);
    if (receiverId === caller.userId) {
      throw new InvalidArgumentError('Cannot start conversation with yourself.');
    }
    const receiver = await this.users.findById(receiverId);
    if (!receiver) {
      throw new InvalidArgumentError('Could not determine receiver for new thread.');
    }

    const { thread, message } = await this.threads.createThreadWithFirstMessage(
      [caller.userId, receiverId],
      caller.userId,
      content
    );

    logger.threadEvent('created', thread.id, {
      initiatorId: caller.userId,
      receiverId,
      serviceId: payload.serviceId ?? null,
    });
    await this.startDelivery(delivery, message);
    return message;
  }

  /**
   * Non-privileged callers reach a worker only through one of their service
   * listings; privileged callers may name the receiver directly.
   */
  private async resolveReceiver(
    caller: Caller,
    payload: Extract<SendPayload, { type: 'initiate' }>
  ): Promise<string> {
    if (isPrivilegedRole(caller.role)) {
      if (payload.receiverId) {
        return payload.receiverId;
      }
      if (payload.serviceId) {
        return this.resolveServiceWorker(payload.serviceId);
      }
      throw new InvalidArgumentError('Could not determine receiver for new thread.');
    }

    if (!payload.serviceId) {
      throw new InvalidArgumentError('Service ID is required to initiate a new conversation.');
    }
    return this.resolveServiceWorker(payload.serviceId);
  }

  private async resolveServiceWorker(serviceId: string): Promise<string> {
    const service = await this.services.findById(serviceId);
    if (!service) {
      throw new InvalidArgumentError('Invalid service ID.');
    }
    return service.workerId;
  }

  /**
   * The message is already durable here, so delivery problems are logged and
   * never reach the sender.
   */
  private startDelivery(delivery: MessageDeliveryBridge, message: MessageView): Promise<void> {
    const onError = (error: unknown) => {
      logger.warn('Delivery failed after persisting message', {
        threadId: message.threadId,
        messageId: message.id,
        error: toErrorMessage(error),
      });
    };

    try {
      return delivery.deliver(message).then(() => undefined, onError);
    } catch (error) {
      onError(error);
      return Promise.resolve();
    }
  }
}

export function createDispatchService(deps: DispatchServiceDeps = {}): DispatchService {
  return new DispatchService(deps);
}

export const dispatchService = new DispatchService();
