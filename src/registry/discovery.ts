/**
 * Module discovery: turn a module tree and/or a static catalog into
 * validated definitions. Problems with one module never stop the others.
 */

import type { ModuleCatalog, ModuleDefinition } from '../descriptor.js';
import { defineModule } from '../descriptor.js';
import { DescriptorParseError, EngineError } from '../errors.js';
import type { ContextLogger } from '../observability/context-logger.js';
import { errorExtra } from '../observability/context-logger.js';
import { resolveEntryPoint, resolveServiceClass } from './entry-point.js';
import { legacyToOptions, loadLegacyDeclaration, parseEntryPoint } from './metadata.js';
import { scanModuleTree } from './scanner.js';
import type { DiscoveryFailure, DiscoveryResult, ModuleDirectory } from './types.js';

export interface DiscoverOptions {
  root?: string | null;
  catalog?: ModuleCatalog | null;
  maxDepth?: number;
  logger?: ContextLogger | null;
}

function asParseError(moduleId: string, err: unknown, source: string | null): EngineError {
  if (err instanceof DescriptorParseError) return err;
  const message = err instanceof Error ? err.message : String(err);
  return new DescriptorParseError(moduleId, message, source, { cause: err instanceof Error ? err : undefined });
}

async function loadFromDirectory(dir: ModuleDirectory): Promise<ModuleDefinition | null> {
  if (dir.entryPath !== null) {
    return resolveEntryPoint(dir.entryPath, dir.moduleId);
  }
  if (dir.metaPath === null) {
    return null;
  }
  const decl = loadLegacyDeclaration(dir.metaPath, dir.moduleId);
  const serviceClass = decl.entry_point !== undefined
    ? await resolveServiceClass(dir.dirPath, parseEntryPoint(decl.entry_point), dir.moduleId)
    : null;
  return defineModule({ ...legacyToOptions(dir.moduleId, decl), serviceClass });
}

export async function discoverModules(options: DiscoverOptions): Promise<DiscoveryResult> {
  const logger = options.logger ?? null;
  const found = new Map<string, ModuleDefinition>();
  const skipped: string[] = [];
  const failures: DiscoveryFailure[] = [];

  const accept = (definition: ModuleDefinition, origin: string): void => {
    const id = definition.descriptor.moduleId;
    if (found.has(id)) {
      failures.push({ moduleId: id, error: new DescriptorParseError(id, 'module declared twice', origin) });
      return;
    }
    if (definition.descriptor.disabled) {
      logger?.info('Module disabled, skipping', { module_id: id });
      skipped.push(id);
      return;
    }
    found.set(id, definition);
  };

  if (options.root != null) {
    for (const dir of scanModuleTree(options.root, options.maxDepth ?? 4, logger)) {
      if (dir.disabled) {
        logger?.info('Module disabled by marker, skipping', { module_id: dir.moduleId });
        skipped.push(dir.moduleId);
        continue;
      }
      try {
        const definition = await loadFromDirectory(dir);
        if (definition === null) {
          logger?.debug('Storage-only directory, no module declared', { module_id: dir.moduleId });
          continue;
        }
        accept(definition, dir.dirPath);
      } catch (e) {
        const error = asParseError(dir.moduleId, e, dir.entryPath ?? dir.metaPath);
        logger?.error('Module discovery failed', { module_id: dir.moduleId, ...errorExtra(error) });
        failures.push({ moduleId: dir.moduleId, error });
      }
    }
  }

  for (const definition of options.catalog?.definitions() ?? []) {
    accept(definition, 'catalog');
  }

  const definitions = [...found.values()].sort((a, b) =>
    a.descriptor.moduleId < b.descriptor.moduleId ? -1 : a.descriptor.moduleId > b.descriptor.moduleId ? 1 : 0,
  );
  logger?.info('Discovery complete', {
    modules: definitions.length,
    skipped: skipped.length,
    failed: failures.length,
  });
  return { definitions, skipped: skipped.sort(), failures };
}
