/**
 * Entry point resolution for discovered module files.
 */

import { resolve } from 'node:path';
import { pathToFileURL } from 'node:url';
import type { ModuleDefinition, ServiceClass } from '../descriptor.js';
import { isModuleDefinition } from '../descriptor.js';
import { DescriptorParseError } from '../errors.js';
import type { EntryPointRef } from './metadata.js';

export function isServiceClass(value: unknown): value is ServiceClass {
  return typeof value === 'function' && value.prototype !== undefined;
}

async function importFile(filePath: string, moduleId: string): Promise<object> {
  let loaded: unknown;
  try {
    loaded = await import(pathToFileURL(filePath).href);
  } catch (e) {
    throw new DescriptorParseError(
      moduleId,
      `Failed to import module: ${e instanceof Error ? e.message : String(e)}`,
      filePath,
      { cause: e instanceof Error ? e : undefined },
    );
  }
  if (loaded === null || typeof loaded !== 'object') {
    throw new DescriptorParseError(moduleId, 'Import produced no module namespace', filePath);
  }
  return loaded;
}

/**
 * Import an explicit module file and pick its definition: the default
 * export when it is one, otherwise the single named export that is.
 */
export async function resolveEntryPoint(filePath: string, moduleId: string): Promise<ModuleDefinition> {
  const loaded = await importFile(filePath, moduleId);

  let definition: ModuleDefinition;
  const fallback: unknown = Reflect.get(loaded, 'default');
  if (isModuleDefinition(fallback)) {
    definition = fallback;
  } else {
    const candidates = Object.entries(loaded)
      .map(([, value]: [string, unknown]) => value)
      .filter(isModuleDefinition);
    if (candidates.length === 0) {
      throw new DescriptorParseError(moduleId, 'No module definition exported', filePath);
    }
    if (candidates.length > 1) {
      throw new DescriptorParseError(moduleId, 'Ambiguous entry point: multiple module definitions exported', filePath);
    }
    definition = candidates[0];
  }

  if (definition.descriptor.moduleId !== moduleId) {
    throw new DescriptorParseError(
      moduleId,
      `definition declares id '${definition.descriptor.moduleId}' but lives at '${moduleId}'`,
      filePath,
    );
  }
  return definition;
}

/** Load the service class a legacy declaration names by `file:Export`. */
export async function resolveServiceClass(dirPath: string, ref: EntryPointRef, moduleId: string): Promise<ServiceClass> {
  const filePath = resolve(dirPath, ref.file);
  const loaded = await importFile(filePath, moduleId);
  const cls: unknown = Reflect.get(loaded, ref.exportName);
  if (cls === undefined) {
    throw new DescriptorParseError(moduleId, `Entry point export '${ref.exportName}' not found`, filePath);
  }
  if (!isServiceClass(cls)) {
    throw new DescriptorParseError(moduleId, `Entry point export '${ref.exportName}' is not a class`, filePath);
  }
  return cls;
}
