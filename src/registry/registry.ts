/**
 * Process-wide directory of live, fully initialized services.
 */

import type { ServiceMethod } from '../descriptor.js';
import { SERVICE_NAME_PATTERN } from '../descriptor.js';
import { DuplicateServiceRegistrationError, InvalidInputError, PhaseViolationError } from '../errors.js';
import { matchPattern } from '../utils/pattern.js';

export const REGISTRY_EVENTS = Object.freeze({
  REGISTER: 'register',
  UNREGISTER: 'unregister',
} as const);

export type RegistryEvent = (typeof REGISTRY_EVENTS)[keyof typeof REGISTRY_EVENTS];

/**
 * `sealed` until Phase 2 begins, `open` while modules register, `draining`
 * once shutdown starts.
 */
export type RegistryPhase = 'sealed' | 'open' | 'draining';

export interface ServiceRecord {
  readonly name: string;
  readonly moduleId: string;
  readonly handle: unknown;
  readonly methods: readonly ServiceMethod[];
  readonly priority: number;
  readonly registeredAt: string;
}

/** Dashboard view of a service: everything but the live handle. */
export type ServiceSnapshot = Omit<ServiceRecord, 'handle'>;

export interface ServiceMetadata {
  moduleId: string;
  methods?: readonly ServiceMethod[];
  priority?: number;
}

export type ServiceLookup =
  | { readonly found: true; readonly record: ServiceRecord }
  | { readonly found: false; readonly name: string };

export interface CapabilityMatch {
  service: string;
  moduleId: string;
  matchType: 'name' | 'method';
  method: string | null;
}

/** Read-only face of the registry handed to modules and outer layers. */
export interface ServiceDirectory {
  lookup(name: string): ServiceLookup;
  get(name: string): unknown | null;
  has(name: string): boolean;
  listServices(options?: { pattern?: string }): Iterable<ServiceSnapshot>;
  readonly count: number;
}

type EventCallback = (record: ServiceRecord) => void;

export class ServiceRegistry implements ServiceDirectory {
  private _records: Map<string, ServiceRecord> = new Map();
  private _phase: RegistryPhase = 'sealed';
  private _callbacks: Map<RegistryEvent, EventCallback[]> = new Map([
    [REGISTRY_EVENTS.REGISTER, []],
    [REGISTRY_EVENTS.UNREGISTER, []],
  ]);
  private _onCallbackError: ((event: RegistryEvent, name: string, error: unknown) => void) | null;

  constructor(options?: { onCallbackError?: (event: RegistryEvent, name: string, error: unknown) => void }) {
    this._onCallbackError = options?.onCallbackError ?? null;
  }

  get phase(): RegistryPhase {
    return this._phase;
  }

  get count(): number {
    return this._records.size;
  }

  /** Start accepting registrations. Called once, when Phase 2 begins. */
  open(): void {
    if (this._phase !== 'sealed') {
      throw new PhaseViolationError(`Registry cannot be opened from phase '${this._phase}'`);
    }
    this._phase = 'open';
  }

  /**
   * Stop accepting registrations; from here on services may only be removed.
   * Happens once, at shutdown.
   */
  beginDraining(): void {
    if (this._phase === 'draining') {
      throw new PhaseViolationError('Registry is already draining');
    }
    this._phase = 'draining';
  }

  register(name: string, handle: unknown, metadata: ServiceMetadata): ServiceRecord {
    if (this._phase !== 'open') {
      throw new PhaseViolationError(
        `Cannot register service '${name}' while registry is ${this._phase}`,
        { moduleId: metadata.moduleId },
      );
    }
    if (!name || !SERVICE_NAME_PATTERN.test(name)) {
      throw new InvalidInputError(`Invalid service name: "${name}"`);
    }
    if (handle === null || handle === undefined) {
      throw new InvalidInputError(`Service '${name}' has no handle`);
    }
    const existing = this._records.get(name);
    if (existing !== undefined) {
      throw new DuplicateServiceRegistrationError(name, existing.moduleId, metadata.moduleId);
    }

    const record: ServiceRecord = Object.freeze({
      name,
      moduleId: metadata.moduleId,
      handle,
      methods: metadata.methods ?? [],
      priority: metadata.priority ?? 100,
      registeredAt: new Date().toISOString(),
    });
    this._records.set(name, record);
    this._triggerEvent(REGISTRY_EVENTS.REGISTER, record);
    return record;
  }

  lookup(name: string): ServiceLookup {
    const record = this._records.get(name);
    return record !== undefined ? { found: true, record } : { found: false, name };
  }

  get(name: string): unknown | null {
    return this._records.get(name)?.handle ?? null;
  }

  has(name: string): boolean {
    return this._records.has(name);
  }

  servicesOf(moduleId: string): string[] {
    return [...this._records.values()].filter((r) => r.moduleId === moduleId).map((r) => r.name).sort();
  }

  /**
   * Remove every service a module registered. Only legal during shutdown.
   */
  unregisterModule(moduleId: string): string[] {
    if (this._phase !== 'draining') {
      throw new PhaseViolationError(`Services of ${moduleId} can only be removed during shutdown`, { moduleId });
    }
    const removed: string[] = [];
    for (const record of [...this._records.values()]) {
      if (record.moduleId !== moduleId) continue;
      this._records.delete(record.name);
      removed.push(record.name);
      this._triggerEvent(REGISTRY_EVENTS.UNREGISTER, record);
    }
    return removed;
  }

  /**
   * Lazy, restartable listing. Each iteration walks the live table, so it
   * only ever yields services that are registered at that moment.
   */
  listServices(options?: { pattern?: string }): Iterable<ServiceSnapshot> {
    const records = this._records;
    const pattern = options?.pattern ?? null;
    return {
      *[Symbol.iterator](): Iterator<ServiceSnapshot> {
        for (const record of records.values()) {
          if (pattern !== null && !matchPattern(pattern, record.name)) continue;
          yield Object.freeze({
            name: record.name,
            moduleId: record.moduleId,
            methods: record.methods,
            priority: record.priority,
            registeredAt: record.registeredAt,
          });
        }
      },
    };
  }

  /** Read-only facade; the registry itself stays with the orchestrator. */
  directory(): ServiceDirectory {
    return new RegistryView(this);
  }

  describe(name: string): string {
    const record = this._records.get(name);
    if (record === undefined) {
      return `Service '${name}' not found.`;
    }
    const lines: string[] = [`# ${record.name}`, '', `**Module:** ${record.moduleId}`, `**Priority:** ${record.priority}`];
    if (record.methods.length === 0) {
      lines.push('', '## Methods', '', 'No documented methods.');
      return lines.join('\n');
    }
    lines.push('', '## Methods');
    for (const method of record.methods) {
      lines.push('', `### ${method.name}()`, '', method.description || 'No description available.');
      if (method.params.length > 0) {
        lines.push('', '**Parameters:**');
        for (const p of method.params) {
          lines.push(`- \`${p.name}\` (${p.type}, ${p.required ? 'required' : 'optional'}): ${p.description}`);
        }
      }
      lines.push('', `**Returns:** ${method.returns.type}${method.returns.description ? ` - ${method.returns.description}` : ''}`);
      for (const example of method.examples) {
        lines.push('', '```ts', example.call, `// => ${example.result}`, '```');
      }
    }
    return lines.join('\n');
  }

  /** Search service names and method names/descriptions for a term. */
  findByCapability(term: string): CapabilityMatch[] {
    const needle = term.toLowerCase();
    const matches: CapabilityMatch[] = [];
    for (const record of this._records.values()) {
      if (record.name.toLowerCase().includes(needle)) {
        matches.push({ service: record.name, moduleId: record.moduleId, matchType: 'name', method: null });
      }
      for (const method of record.methods) {
        if (method.name.toLowerCase().includes(needle) || method.description.toLowerCase().includes(needle)) {
          matches.push({ service: record.name, moduleId: record.moduleId, matchType: 'method', method: method.name });
        }
      }
    }
    return matches;
  }

  on(event: RegistryEvent, callback: EventCallback): void {
    const callbacks = this._callbacks.get(event);
    if (callbacks === undefined) {
      throw new InvalidInputError(`Invalid event: ${String(event)}`);
    }
    callbacks.push(callback);
  }

  private _triggerEvent(event: RegistryEvent, record: ServiceRecord): void {
    for (const cb of this._callbacks.get(event) ?? []) {
      try {
        cb(record);
      } catch (e) {
        this._onCallbackError?.(event, record.name, e);
      }
    }
  }
}

class RegistryView implements ServiceDirectory {
  private readonly _registry: ServiceRegistry;

  constructor(registry: ServiceRegistry) {
    this._registry = registry;
    Object.freeze(this);
  }

  lookup(name: string): ServiceLookup {
    return this._registry.lookup(name);
  }

  get(name: string): unknown | null {
    return this._registry.get(name);
  }

  has(name: string): boolean {
    return this._registry.has(name);
  }

  listServices(options?: { pattern?: string }): Iterable<ServiceSnapshot> {
    return this._registry.listServices(options);
  }

  get count(): number {
    return this._registry.count;
  }
}
