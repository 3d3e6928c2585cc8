/**
 * Discovery and dependency-graph types.
 */

import type { ModuleDefinition } from '../descriptor.js';
import type { EngineError } from '../errors.js';

export interface ModuleDirectory {
  moduleId: string;
  dirPath: string;
  entryPath: string | null;
  metaPath: string | null;
  modelsPath: string | null;
  disabled: boolean;
}

export interface DiscoveryFailure {
  moduleId: string;
  error: EngineError;
}

export interface DiscoveryResult {
  definitions: ModuleDefinition[];
  skipped: string[];
  failures: DiscoveryFailure[];
}

/** Provider must finish Phase 2 before the dependent starts it. */
export interface DependencyEdge {
  readonly from: string;
  readonly to: string;
  readonly service: string;
}

export interface DependencyPlan {
  /** Phase 2 order: providers before dependents, then depth, priority, id. */
  readonly order: readonly string[];
  /** Modules grouped by dependency depth, each wave sorted like `order`. */
  readonly waves: readonly (readonly string[])[];
  readonly depth: ReadonlyMap<string, number>;
  readonly edges: readonly DependencyEdge[];
  /** Service name to the modules declaring it, in declaration order. */
  readonly providers: ReadonlyMap<string, readonly string[]>;
  /** Requirements no descriptor provides, per module. */
  readonly unresolved: ReadonlyMap<string, readonly string[]>;
  dependenciesOf(moduleId: string): string[];
  dependentsOf(moduleId: string, transitive?: boolean): string[];
}
