/**
 * WebSocket Handlers
 *
 * Exports the WebSocket upgrade handler for negotiation thread connections.
 */

export {
  createThreadUpgradeHandler,
  extractThreadId,
  isThreadSocketPath,
} from './thread.handler';
