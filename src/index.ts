/**
 * modhost - module lifecycle and service orchestration engine.
 */

// Host
export { ModuleHost } from './host.js';
export type { ModuleHostOptions } from './host.js';

// Descriptors
export {
  defineModule,
  isModuleDefinition,
  validateModuleId,
  ModuleCatalog,
  DEFAULT_PRIORITY,
  DEFAULT_VERSION,
  MODULE_ID_PATTERN,
  SERVICE_NAME_PATTERN,
  MAX_MODULE_ID_LENGTH,
} from './descriptor.js';
export type {
  DefineModuleOptions,
  DescriptorSource,
  ForcedShutdownSpec,
  GracefulShutdownSpec,
  HealthCheckSpec,
  HttpMethod,
  ModuleDefinition,
  ModuleDescriptor,
  RouteSpec,
  ServiceClass,
  ServiceExample,
  ServiceMethod,
  ServiceMethodInput,
  ServiceParam,
  ServiceReturn,
} from './descriptor.js';

// Contexts
export { ModuleContext, Phase1Context, moduleSettingsOverrides } from './context.js';
export type { ModuleContextInit } from './context.js';

// Config
export { Config, EngineSettingsSchema, resolveEngineSettings } from './config.js';
export type { EngineSettings } from './config.js';
export { SettingsRegistry } from './settings.js';
export type { SettingsEntry } from './settings.js';

// Errors
export {
  EngineError,
  ErrorCodes,
  ConfigNotFoundError,
  ConfigError,
  InvalidInputError,
  StorageBootstrapError,
  DescriptorParseError,
  CyclicDependencyError,
  MissingRequiredServiceError,
  Phase2TimeoutError,
  StartupDeadlineError,
  ShutdownHookTimeoutError,
  ShutdownHookError,
  DuplicateServiceRegistrationError,
  ModuleLifecycleError,
  PhaseViolationError,
  HookCancelledError,
} from './errors.js';
export type { ErrorCode, ErrorOptions } from './errors.js';

// Cancellation
export { CancelToken } from './cancel.js';

// Registry and discovery
export * from './registry/index.js';

// Storage
export * from './storage/index.js';

// Lifecycle
export * from './lifecycle/index.js';

// Shutdown
export * from './shutdown/index.js';

// Health and routes
export { HealthMonitor, interpretHealth } from './health.js';
export type { HealthResult } from './health.js';
export { RouteTable, bindRoutes, joinRoutePath, moduleBasePath } from './routes.js';
export type { RouteEntry } from './routes.js';

// Observability
export * from './observability/index.js';

// Utils
export { matchPattern } from './utils/pattern.js';

export const VERSION = '0.1.0';
