/**
 * Domain Bridge Wiring
 *
 * Single entry point that configures all cross-domain bridges at application startup.
 * Must be called BEFORE any domain service is used.
 *
 * Import graph: orchestration -> jobs, messaging barrels
 * Domain services never import each other; they receive capabilities via bridges.
 */

import {
  JOB_STATE_CHANGED,
  type JobStateChangedEvent,
  type JobStateMachineService,
  jobStateMachine,
} from '@/backend/domains/jobs';
import {
  type ConnectionRegistry,
  connectionRegistry,
  type DispatchService,
  dispatchService,
  serializeMessageFrame,
} from '@/backend/domains/messaging';
import { createLogger } from '@/backend/services/logger.service';

const logger = createLogger('domain-bridges');

export interface DomainBridgeServices {
  connectionRegistry: ConnectionRegistry;
  dispatchService: DispatchService;
  jobStateMachine: JobStateMachineService;
}

const defaultServices: DomainBridgeServices = {
  connectionRegistry,
  dispatchService,
  jobStateMachine,
};

/**
 * @returns a function that detaches the listeners registered here
 */
export function configureDomainBridges(services: DomainBridgeServices = defaultServices): () => void {
  // === Messaging domain bridges ===
  services.dispatchService.configure({
    delivery: {
      deliver: (message) =>
        services.connectionRegistry.broadcast(message.threadId, serializeMessageFrame(message)),
    },
  });

  // === Jobs domain events ===
  // Peers stay bound to a closed thread; their next frame is refused with THREAD_CLOSED.
  const onJobStateChanged = (event: JobStateChangedEvent) => {
    if (!(event.threadClosed && event.threadId)) {
      return;
    }
    logger.info('Thread closed by job transition', {
      jobId: event.jobId,
      threadId: event.threadId,
      toStatus: event.toStatus,
      liveConnections: services.connectionRegistry.connectionCount(event.threadId),
    });
  };
  services.jobStateMachine.on(JOB_STATE_CHANGED, onJobStateChanged);

  return () => {
    services.jobStateMachine.off(JOB_STATE_CHANGED, onJobStateChanged);
  };
}
