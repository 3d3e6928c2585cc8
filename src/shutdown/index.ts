export { buildShutdownTasks } from './tasks.js';
export type { ShutdownDefaults, ShutdownHook, ShutdownPhase, ShutdownTask } from './tasks.js';
export { ShutdownCoordinator } from './coordinator.js';
export type { HookOutcome, ModuleShutdownResult, ShutdownCoordinatorOptions, ShutdownHandler, ShutdownReport } from './coordinator.js';
