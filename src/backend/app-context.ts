// Domain imports (from barrel files)
import { type JobStateMachineService, jobStateMachine } from './domains/jobs';
import {
  type ConnectionRegistry,
  connectionRegistry,
  type DispatchService,
  dispatchService,
} from './domains/messaging';
// Resource accessors
import { type HealthAccessor, healthAccessor } from './resource_accessors/health.accessor';
import { type JobAccessor, jobAccessor } from './resource_accessors/job.accessor';
import { type ThreadAccessor, threadAccessor } from './resource_accessors/thread.accessor';
import { type UserAccessor, userAccessor } from './resource_accessors/user.accessor';
// Infrastructure imports
import { type AppSystemConfig, configService } from './services/config.service';
import { type IdentityResolver, identityResolver } from './services/identity.service';
import { createLogger } from './services/logger.service';
import { findAvailablePort } from './services/port.service';

export type AppServices = {
  configService: typeof configService;
  connectionRegistry: ConnectionRegistry;
  createLogger: typeof createLogger;
  dispatchService: DispatchService;
  findAvailablePort: typeof findAvailablePort;
  healthAccessor: HealthAccessor;
  identityResolver: IdentityResolver;
  jobAccessor: JobAccessor;
  jobStateMachine: JobStateMachineService;
  threadAccessor: ThreadAccessor;
  userAccessor: UserAccessor;
};

export type AppConfig = AppSystemConfig;

export type AppContext = {
  services: AppServices;
  config: AppConfig;
};

export function createServices(overrides: Partial<AppServices> = {}): AppServices {
  const resolvedConfigService = overrides.configService ?? configService;
  const resolvedConnectionRegistry = overrides.connectionRegistry ?? connectionRegistry;
  resolvedConnectionRegistry.setWriteTimeout(
    resolvedConfigService.getRealtimeConfig().writeTimeoutMs
  );

  const services: AppServices = {
    configService: resolvedConfigService,
    connectionRegistry: resolvedConnectionRegistry,
    createLogger,
    dispatchService,
    findAvailablePort,
    healthAccessor,
    identityResolver,
    jobAccessor,
    jobStateMachine,
    threadAccessor,
    userAccessor,
  };

  return {
    ...services,
    ...overrides,
  };
}

export function createAppContext(
  options: { services?: Partial<AppServices>; config?: AppConfig } = {}
): AppContext {
  const services = createServices(options.services);
  const config = options.config ?? services.configService.getSystemConfig();

  return {
    services,
    config,
  };
}
