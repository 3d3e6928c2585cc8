/**
 * Module descriptors: the static, data-only declaration each module attaches
 * to itself, and the builder that produces them.
 */

import type { ModuleContext } from './context.js';
import { DescriptorParseError, InvalidInputError } from './errors.js';
import { cloneData, deepFreeze, MAX_TIMER_MS } from './utils/index.js';

export const DEFAULT_PRIORITY = 100;
export const DEFAULT_VERSION = '1.0.0';

/**
 * Valid module ID pattern: lowercase dotted segments.
 */
export const MODULE_ID_PATTERN = /^[a-z][a-z0-9_]*(\.[a-z][a-z0-9_]*)*$/;
export const SERVICE_NAME_PATTERN = /^[a-z][a-z0-9_-]*(\.[a-z][a-z0-9_-]*)*$/;
export const MAX_MODULE_ID_LENGTH = 128;

const IDENTIFIER_PATTERN = /^[A-Za-z_$][A-Za-z0-9_$]*$/;
const HTTP_METHODS = new Set(['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'HEAD', 'OPTIONS']);

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE' | 'HEAD' | 'OPTIONS';
export type DescriptorSource = 'explicit' | 'legacy';

export interface ServiceParam {
  readonly name: string;
  readonly type: string;
  readonly required: boolean;
  readonly default?: unknown;
  readonly description: string;
}

export interface ServiceReturn {
  readonly type: string;
  readonly description: string;
}

export interface ServiceExample {
  readonly call: string;
  readonly result: string;
  readonly description: string;
}

/** Introspection metadata for one public service method. Not enforced at call time. */
export interface ServiceMethod {
  readonly name: string;
  readonly description: string;
  readonly params: readonly ServiceParam[];
  readonly returns: ServiceReturn;
  readonly examples: readonly ServiceExample[];
  readonly isAsync: boolean;
  readonly tags: readonly string[];
}

export interface HealthCheckSpec {
  readonly method: string;
  /** Null means the engine-wide default interval. */
  readonly intervalMs: number | null;
}

export interface GracefulShutdownSpec {
  readonly method: string;
  readonly timeoutMs: number | null;
  readonly priority: number;
  /** Modules that must shut down after this one. */
  readonly dependencies: readonly string[];
}

export interface ForcedShutdownSpec {
  readonly method: string;
  readonly timeoutMs: number | null;
}

export interface RouteSpec {
  readonly method: HttpMethod;
  readonly path: string;
  /** Name of the service method handling the route. */
  readonly handler: string;
}

export interface ModuleDescriptor {
  readonly moduleId: string;
  readonly version: string;
  readonly description: string;
  readonly services: readonly string[];
  readonly requires: readonly string[];
  readonly storage: string | null;
  readonly priority: number;
  /** Static method on the service class, run in Phase 1. */
  readonly phase1: string | null;
  /** Instance method, run in Phase 2. */
  readonly phase2: string | null;
  readonly phase2TimeoutMs: number | null;
  readonly healthCheck: HealthCheckSpec | null;
  readonly shutdown: {
    readonly graceful: GracefulShutdownSpec | null;
    readonly forced: ForcedShutdownSpec | null;
  };
  readonly methods: readonly ServiceMethod[];
  readonly routes: readonly RouteSpec[];
  readonly disabled: boolean;
  readonly source: DescriptorSource;
}

/** Constructor of a module's service. One instance is built per run. */
export interface ServiceClass {
  new (context: ModuleContext): object;
  readonly name: string;
}

export const DEFINITION_BRAND: unique symbol = Symbol.for('modhost.module-definition');

export interface ModuleDefinition {
  readonly [DEFINITION_BRAND]: true;
  readonly descriptor: ModuleDescriptor;
  readonly serviceClass: ServiceClass | null;
}

export interface ServiceMethodInput {
  name: string;
  description?: string;
  params?: Array<{ name: string; type?: string; required?: boolean; default?: unknown; description?: string }>;
  returns?: { type?: string; description?: string };
  examples?: Array<{ call: string; result: string; description?: string }>;
  isAsync?: boolean;
  tags?: string[];
}

export interface DefineModuleOptions {
  id: string;
  version?: string;
  description?: string;
  service?: string | string[] | null;
  requires?: string[];
  storage?: string | null;
  priority?: number;
  serviceClass?: ServiceClass | null;
  /** Static method on the service class, called with a Phase1Context. */
  phase1?: string | null;
  /** Instance method, called with a CancelToken. */
  phase2?: string | null;
  phase2TimeoutMs?: number | null;
  healthCheck?: string | { method: string; intervalMs?: number | null } | null;
  shutdown?: {
    /** Instance method, called with a CancelToken. */
    graceful?: string | { method: string; timeoutMs?: number | null; priority?: number; dependencies?: string[] } | null;
    forced?: string | { method: string; timeoutMs?: number | null } | null;
    /** Shorthand for graceful.dependencies. */
    dependencies?: string[];
  };
  methods?: ServiceMethodInput[];
  routes?: Array<{ method?: string; path: string; handler: string }>;
  disabled?: boolean;
  source?: DescriptorSource;
}

export function isModuleDefinition(value: unknown): value is ModuleDefinition {
  return (
    value !== null &&
    typeof value === 'object' &&
    Reflect.get(value, DEFINITION_BRAND) === true &&
    typeof Reflect.get(value, 'descriptor') === 'object'
  );
}

export function validateModuleId(moduleId: string): void {
  if (!moduleId || typeof moduleId !== 'string') {
    throw new InvalidInputError('Module ID must be a non-empty string');
  }
  if (moduleId.length > MAX_MODULE_ID_LENGTH) {
    throw new InvalidInputError(`Module ID exceeds maximum length of ${MAX_MODULE_ID_LENGTH}: ${moduleId.length}`);
  }
  if (!MODULE_ID_PATTERN.test(moduleId)) {
    throw new InvalidInputError(
      `Invalid module ID: "${moduleId}". Must match pattern: ${MODULE_ID_PATTERN}`,
    );
  }
}

function checkTimeout(moduleId: string, label: string, value: number | null | undefined): number | null {
  if (value == null) return null;
  if (!Number.isInteger(value) || value < 0) {
    throw new DescriptorParseError(moduleId, `${label} must be a non-negative integer (ms), got ${value}`);
  }
  if (value > MAX_TIMER_MS) {
    throw new DescriptorParseError(moduleId, `${label} must not exceed ${MAX_TIMER_MS}ms, got ${value}`);
  }
  return value;
}

function checkMethodName(moduleId: string, label: string, name: string): string {
  if (!IDENTIFIER_PATTERN.test(name)) {
    throw new DescriptorParseError(moduleId, `${label} '${name}' is not a valid method name`);
  }
  return name;
}

function uniqueInOrder(values: readonly string[]): string[] {
  return [...new Set(values)];
}

function buildMethods(moduleId: string, inputs: ServiceMethodInput[]): ServiceMethod[] {
  const seen = new Set<string>();
  return inputs.map((m) => {
    checkMethodName(moduleId, 'Service method', m.name);
    if (seen.has(m.name)) {
      throw new DescriptorParseError(moduleId, `Service method '${m.name}' documented twice`);
    }
    seen.add(m.name);
    const params: ServiceParam[] = (m.params ?? []).map((p) => {
      checkMethodName(moduleId, `Parameter of ${m.name}`, p.name);
      const param: ServiceParam = {
        name: p.name,
        type: p.type ?? 'unknown',
        required: p.required ?? true,
        description: p.description ?? '',
      };
      return p.default !== undefined ? { ...param, default: cloneData(p.default) } : param;
    });
    return {
      name: m.name,
      description: m.description ?? '',
      params,
      returns: { type: m.returns?.type ?? 'void', description: m.returns?.description ?? '' },
      examples: (m.examples ?? []).map((e) => ({ call: e.call, result: e.result, description: e.description ?? '' })),
      isAsync: m.isAsync ?? true,
      tags: [...(m.tags ?? [])],
    };
  });
}

function buildRoutes(moduleId: string, inputs: NonNullable<DefineModuleOptions['routes']>): RouteSpec[] {
  return inputs.map((r) => {
    const method = (r.method ?? 'GET').toUpperCase();
    if (!isHttpMethod(method)) {
      throw new DescriptorParseError(moduleId, `Unsupported HTTP method '${r.method}'`);
    }
    if (!r.path.startsWith('/')) {
      throw new DescriptorParseError(moduleId, `Route path '${r.path}' must start with '/'`);
    }
    return { method, path: r.path, handler: checkMethodName(moduleId, 'Route handler', r.handler) };
  });
}

function isHttpMethod(value: string): value is HttpMethod {
  return HTTP_METHODS.has(value);
}

/**
 * Build an immutable module definition.
 *
 * Throws DescriptorParseError for declarations that could never run, such
 * as a declared service without a service class.
 */
export function defineModule(options: DefineModuleOptions): ModuleDefinition {
  validateModuleId(options.id);
  const moduleId = options.id;
  const serviceClass = options.serviceClass ?? null;

  const services = uniqueInOrder(
    options.service == null ? [] : Array.isArray(options.service) ? options.service : [options.service],
  );
  for (const name of services) {
    if (!SERVICE_NAME_PATTERN.test(name)) {
      throw new DescriptorParseError(moduleId, `Invalid service name '${name}'`);
    }
  }
  const requires = uniqueInOrder(options.requires ?? []);
  for (const name of requires) {
    if (services.includes(name)) {
      throw new DescriptorParseError(moduleId, `Module requires its own service '${name}'`);
    }
  }

  const priority = options.priority ?? DEFAULT_PRIORITY;
  if (!Number.isInteger(priority)) {
    throw new DescriptorParseError(moduleId, `priority must be an integer, got ${priority}`);
  }
  if (options.storage != null && !MODULE_ID_PATTERN.test(options.storage)) {
    throw new DescriptorParseError(moduleId, `Invalid storage database name '${options.storage}'`);
  }

  const health = typeof options.healthCheck === 'string' ? { method: options.healthCheck } : options.healthCheck;
  const gracefulRaw = typeof options.shutdown?.graceful === 'string'
    ? { method: options.shutdown.graceful }
    : options.shutdown?.graceful;
  const forcedRaw = typeof options.shutdown?.forced === 'string'
    ? { method: options.shutdown.forced }
    : options.shutdown?.forced;
  const extraShutdownDeps = options.shutdown?.dependencies ?? [];

  if (extraShutdownDeps.length > 0 && gracefulRaw == null) {
    throw new DescriptorParseError(moduleId, 'Shutdown dependencies need a graceful shutdown hook');
  }

  const descriptor: ModuleDescriptor = {
    moduleId,
    version: options.version ?? DEFAULT_VERSION,
    description: options.description ?? '',
    services,
    requires,
    storage: options.storage ?? null,
    priority,
    phase1: options.phase1 != null ? checkMethodName(moduleId, 'Phase 1 hook', options.phase1) : null,
    phase2: options.phase2 != null ? checkMethodName(moduleId, 'Phase 2 hook', options.phase2) : null,
    phase2TimeoutMs: checkTimeout(moduleId, 'phase2TimeoutMs', options.phase2TimeoutMs),
    healthCheck: health != null
      ? {
          method: checkMethodName(moduleId, 'Health check', health.method),
          intervalMs: checkTimeout(moduleId, 'healthCheck.intervalMs', health.intervalMs),
        }
      : null,
    shutdown: {
      graceful: gracefulRaw != null
        ? {
            method: checkMethodName(moduleId, 'Graceful shutdown hook', gracefulRaw.method),
            timeoutMs: checkTimeout(moduleId, 'graceful timeoutMs', gracefulRaw.timeoutMs),
            priority: gracefulRaw.priority ?? DEFAULT_PRIORITY,
            dependencies: uniqueInOrder([...(gracefulRaw.dependencies ?? []), ...extraShutdownDeps]),
          }
        : null,
      forced: forcedRaw != null
        ? {
            method: checkMethodName(moduleId, 'Forced shutdown hook', forcedRaw.method),
            timeoutMs: checkTimeout(moduleId, 'forced timeoutMs', forcedRaw.timeoutMs),
          }
        : null,
    },
    methods: buildMethods(moduleId, options.methods ?? []),
    routes: buildRoutes(moduleId, options.routes ?? []),
    disabled: options.disabled ?? false,
    source: options.source ?? 'explicit',
  };

  if (serviceClass === null) {
    const needsClass: string[] = [];
    if (descriptor.services.length > 0) needsClass.push('a declared service');
    if (descriptor.phase1 !== null || descriptor.phase2 !== null) needsClass.push('phase hooks');
    if (descriptor.healthCheck !== null) needsClass.push('a health check');
    if (descriptor.shutdown.graceful !== null || descriptor.shutdown.forced !== null) needsClass.push('shutdown hooks');
    if (descriptor.routes.length > 0) needsClass.push('routes');
    if (needsClass.length > 0) {
      throw new DescriptorParseError(moduleId, `${needsClass.join(', ')} require a service class`);
    }
  } else if (typeof serviceClass !== 'function') {
    throw new DescriptorParseError(moduleId, 'serviceClass must be a constructor');
  }

  return Object.freeze({
    [DEFINITION_BRAND]: true as const,
    descriptor: deepFreeze(descriptor),
    serviceClass,
  });
}

/**
 * Program-initialization list of module definitions, for hosts that link
 * their modules in rather than scanning a module tree.
 */
export class ModuleCatalog {
  private readonly _definitions: Map<string, ModuleDefinition> = new Map();

  constructor(definitions?: Iterable<ModuleDefinition>) {
    for (const def of definitions ?? []) {
      this.add(def);
    }
  }

  add(definition: ModuleDefinition): this {
    const id = definition.descriptor.moduleId;
    if (this._definitions.has(id)) {
      throw new InvalidInputError(`Module already in catalog: ${id}`);
    }
    this._definitions.set(id, definition);
    return this;
  }

  get(moduleId: string): ModuleDefinition | null {
    return this._definitions.get(moduleId) ?? null;
  }

  definitions(): ModuleDefinition[] {
    return [...this._definitions.values()];
  }

  get size(): number {
    return this._definitions.size;
  }
}
