/**
 * Legacy `module.yaml` declarations.
 */

import { readFileSync } from 'node:fs';
import { Type, type Static } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import yaml from 'js-yaml';
import type { DefineModuleOptions } from '../descriptor.js';
import { DescriptorParseError } from '../errors.js';
import { MAX_TIMER_MS } from '../utils/timeout.js';

const Timeout = Type.Union([Type.Integer({ minimum: 0, maximum: MAX_TIMER_MS }), Type.Null()]);

const HookRef = Type.Union([
  Type.String(),
  Type.Object({
    method: Type.String(),
    timeout_ms: Type.Optional(Timeout),
  }),
]);

export const LegacyDeclarationSchema = Type.Object({
  id: Type.Optional(Type.String()),
  version: Type.Optional(Type.String()),
  description: Type.Optional(Type.String()),
  entry_point: Type.Optional(Type.String({ pattern: '^[^:]+:[A-Za-z_$][A-Za-z0-9_$]*$' })),
  service: Type.Optional(Type.Union([Type.String(), Type.Array(Type.String())])),
  requires: Type.Optional(Type.Array(Type.String())),
  storage: Type.Optional(Type.Union([Type.String(), Type.Null()])),
  priority: Type.Optional(Type.Integer()),
  phase1: Type.Optional(Type.String()),
  phase2: Type.Optional(Type.String()),
  phase2_timeout_ms: Type.Optional(Timeout),
  health_check: Type.Optional(Type.Union([
    Type.String(),
    Type.Object({ method: Type.String(), interval_ms: Type.Optional(Timeout) }),
  ])),
  shutdown: Type.Optional(Type.Object({
    graceful: Type.Optional(Type.Union([
      Type.String(),
      Type.Object({
        method: Type.String(),
        timeout_ms: Type.Optional(Timeout),
        priority: Type.Optional(Type.Integer()),
        dependencies: Type.Optional(Type.Array(Type.String())),
      }),
    ])),
    forced: Type.Optional(HookRef),
    dependencies: Type.Optional(Type.Array(Type.String())),
  })),
  methods: Type.Optional(Type.Array(Type.Object({
    name: Type.String(),
    description: Type.Optional(Type.String()),
    params: Type.Optional(Type.Array(Type.Object({
      name: Type.String(),
      type: Type.Optional(Type.String()),
      required: Type.Optional(Type.Boolean()),
      default: Type.Optional(Type.Unknown()),
      description: Type.Optional(Type.String()),
    }))),
    returns: Type.Optional(Type.Object({
      type: Type.Optional(Type.String()),
      description: Type.Optional(Type.String()),
    })),
    examples: Type.Optional(Type.Array(Type.Object({
      call: Type.String(),
      result: Type.String(),
      description: Type.Optional(Type.String()),
    }))),
    async: Type.Optional(Type.Boolean()),
    tags: Type.Optional(Type.Array(Type.String())),
  }))),
  routes: Type.Optional(Type.Array(Type.Object({
    method: Type.Optional(Type.String()),
    path: Type.String(),
    handler: Type.String(),
  }))),
  disabled: Type.Optional(Type.Boolean()),
});

export type LegacyDeclaration = Static<typeof LegacyDeclarationSchema>;

export interface EntryPointRef {
  file: string;
  exportName: string;
}

export function parseEntryPoint(value: string): EntryPointRef {
  const idx = value.lastIndexOf(':');
  return { file: value.slice(0, idx), exportName: value.slice(idx + 1) };
}

/** Read and validate a `module.yaml`. An empty file is an empty declaration. */
export function loadLegacyDeclaration(metaPath: string, moduleId: string): LegacyDeclaration {
  let parsed: unknown;
  try {
    parsed = yaml.load(readFileSync(metaPath, 'utf-8'));
  } catch (e) {
    throw new DescriptorParseError(moduleId, `Invalid YAML: ${e instanceof Error ? e.message : String(e)}`, metaPath);
  }
  if (parsed === null || parsed === undefined) return {};
  if (!Value.Check(LegacyDeclarationSchema, parsed)) {
    const errors = [...Value.Errors(LegacyDeclarationSchema, parsed)]
      .map((e) => `${e.path || '/'} ${e.message}`);
    throw new DescriptorParseError(moduleId, errors.join('; '), metaPath);
  }
  if (parsed.id !== undefined && parsed.id !== moduleId) {
    throw new DescriptorParseError(
      moduleId,
      `declared id '${parsed.id}' does not match its location`,
      metaPath,
    );
  }
  return parsed;
}

function hookWithTimeout(ref: Static<typeof HookRef> | undefined): { method: string; timeoutMs?: number | null } | undefined {
  if (ref === undefined) return undefined;
  if (typeof ref === 'string') return { method: ref };
  return { method: ref.method, timeoutMs: ref.timeout_ms };
}

/** Translate a legacy declaration into builder options (minus the service class). */
export function legacyToOptions(moduleId: string, decl: LegacyDeclaration): DefineModuleOptions {
  const health = decl.health_check;
  const graceful = decl.shutdown?.graceful;
  return {
    id: moduleId,
    version: decl.version,
    description: decl.description,
    service: decl.service ?? null,
    requires: decl.requires,
    storage: decl.storage ?? null,
    priority: decl.priority,
    phase1: decl.phase1 ?? null,
    phase2: decl.phase2 ?? null,
    phase2TimeoutMs: decl.phase2_timeout_ms ?? null,
    healthCheck: health === undefined
      ? null
      : typeof health === 'string'
        ? health
        : { method: health.method, intervalMs: health.interval_ms },
    shutdown: {
      graceful: graceful === undefined
        ? null
        : typeof graceful === 'string'
          ? graceful
          : {
              method: graceful.method,
              timeoutMs: graceful.timeout_ms,
              priority: graceful.priority,
              dependencies: graceful.dependencies,
            },
      forced: hookWithTimeout(decl.shutdown?.forced) ?? null,
      dependencies: decl.shutdown?.dependencies,
    },
    methods: decl.methods?.map((m) => ({
      name: m.name,
      description: m.description,
      params: m.params,
      returns: m.returns,
      examples: m.examples,
      isAsync: m.async,
      tags: m.tags,
    })),
    routes: decl.routes,
    disabled: decl.disabled,
    source: 'legacy',
  };
}
