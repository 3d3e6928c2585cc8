export { ServiceRegistry, REGISTRY_EVENTS } from './registry.js';
export type {
  CapabilityMatch,
  RegistryEvent,
  RegistryPhase,
  ServiceDirectory,
  ServiceLookup,
  ServiceMetadata,
  ServiceRecord,
  ServiceSnapshot,
} from './registry.js';
export type { DependencyEdge, DependencyPlan, DiscoveryFailure, DiscoveryResult, ModuleDirectory } from './types.js';
export { buildDependencyPlan } from './dependencies.js';
export { scanModuleTree, toModuleId, EXPLICIT_ENTRY_FILES, LEGACY_DECLARATION_FILE, STORAGE_MODEL_FILES, DISABLED_MARKER } from './scanner.js';
export { resolveEntryPoint, resolveServiceClass, isServiceClass } from './entry-point.js';
export { loadLegacyDeclaration, legacyToOptions, parseEntryPoint, LegacyDeclarationSchema } from './metadata.js';
export type { EntryPointRef, LegacyDeclaration } from './metadata.js';
export { discoverModules } from './discovery.js';
export type { DiscoverOptions } from './discovery.js';
