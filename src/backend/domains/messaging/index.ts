// Domain: messaging
// Public API for the negotiation messaging domain module.
// Consumers should import from '@/backend/domains/messaging' only.

export type { MessageDeliveryBridge } from './bridges';
export {
  type BroadcastResult,
  ConnectionRegistry,
  type ConnectionRegistryOptions,
  connectionRegistry,
  type ThreadConnection,
} from './connection-registry.service';
export {
  createDispatchService,
  DispatchService,
  type DispatchServiceDeps,
  dispatchService,
  MAX_MESSAGE_LENGTH,
  normalizeContent,
  type SendPayload,
} from './dispatch.service';
export { type MessageFrame, serializeMessageFrame, toMessageFrame } from './message-frame';
