export { ModuleState, ModuleStateMachine, canTransition } from './states.js';
export type { StateChange } from './states.js';
export { LifecycleOrchestrator } from './orchestrator.js';
export type { FailedModule, ModuleRuntime, OrchestratorOptions, StartInput, StartupReport } from './orchestrator.js';
