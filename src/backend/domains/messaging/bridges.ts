/**
 * Bridge interfaces for messaging domain cross-cutting dependencies.
 * These are injected by the orchestration layer at startup.
 */

import type { MessageView } from '@/backend/resource_accessors/thread.accessor';

/** Fan-out of persisted messages to live real-time connections */
export interface MessageDeliveryBridge {
  /**
   * Start delivering a persisted message. Must enqueue synchronously so that
   * delivery order follows call order; the promise settles once every write
   * finished or was abandoned.
   */
  deliver(message: MessageView): Promise<unknown>;
}
