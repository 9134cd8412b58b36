import type { MessageView } from '@/backend/resource_accessors/thread.accessor';

/** Outbound real-time frame for a persisted message. */
export interface MessageFrame {
  sender_id: string;
  content: string;
  timestamp: string;
  thread_id: string;
}

export function toMessageFrame(message: MessageView): MessageFrame {
  return {
    sender_id: message.sender.id,
    content: message.content,
    timestamp: message.timestamp.toISOString(),
    thread_id: message.threadId,
  };
}

export function serializeMessageFrame(message: MessageView): string {
  return JSON.stringify(toMessageFrame(message));
}
