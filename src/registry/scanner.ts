/**
 * Module tree scanner. Locates module directories without importing them.
 */

import { readdirSync, statSync } from 'node:fs';
import { join, relative, resolve, sep } from 'node:path';
import { ConfigNotFoundError } from '../errors.js';
import type { ContextLogger } from '../observability/context-logger.js';
import type { ModuleDirectory } from './types.js';

const SKIP_DIR_NAMES = new Set(['node_modules', 'dist', 'coverage']);

export const EXPLICIT_ENTRY_FILES = ['module.ts', 'module.mjs', 'module.js'] as const;
export const LEGACY_DECLARATION_FILE = 'module.yaml';
export const STORAGE_MODEL_FILES = ['db-models.ts', 'db-models.mjs', 'db-models.js'] as const;
export const DISABLED_MARKER = '.disabled';

function existsAndIsDir(p: string): boolean {
  try {
    return statSync(p).isDirectory();
  } catch {
    return false;
  }
}

function firstFile(dirPath: string, names: readonly string[], present: ReadonlySet<string>): string | null {
  for (const name of names) {
    if (!present.has(name)) continue;
    const full = join(dirPath, name);
    try {
      if (statSync(full).isFile()) return full;
    } catch {
      continue;
    }
  }
  return null;
}

/** Directory path relative to the root, as a dotted module id. */
export function toModuleId(relPath: string): string {
  return relPath
    .split(sep)
    .map((segment) => {
      const cleaned = segment.toLowerCase().replace(/[^a-z0-9_]/g, '_');
      return /^[0-9]/.test(cleaned) ? `_${cleaned}` : cleaned;
    })
    .join('.');
}

/**
 * Walk `root` and return every directory that declares a module (an explicit
 * entry file or a legacy declaration) or storage models. A module directory
 * is a leaf: the walk does not descend into it.
 */
export function scanModuleTree(root: string, maxDepth: number = 4, logger?: ContextLogger | null): ModuleDirectory[] {
  const rootResolved = resolve(root);
  if (!existsAndIsDir(rootResolved)) {
    throw new ConfigNotFoundError(rootResolved);
  }

  const results: ModuleDirectory[] = [];
  const seenIds = new Map<string, string>();

  function scanDir(dirPath: string, depth: number): void {
    let entries: string[];
    try {
      entries = readdirSync(dirPath).sort();
    } catch {
      logger?.warn('Cannot read directory', { path: dirPath });
      return;
    }
    const present = new Set(entries);

    if (dirPath !== rootResolved) {
      const entryPath = firstFile(dirPath, EXPLICIT_ENTRY_FILES, present);
      const metaPath = firstFile(dirPath, [LEGACY_DECLARATION_FILE], present);
      const modelsPath = firstFile(dirPath, STORAGE_MODEL_FILES, present);
      if (entryPath !== null || metaPath !== null || modelsPath !== null) {
        const moduleId = toModuleId(relative(rootResolved, dirPath));
        const previous = seenIds.get(moduleId);
        if (previous !== undefined) {
          logger?.warn('Duplicate module ID, skipping', { module_id: moduleId, path: dirPath, first: previous });
          return;
        }
        seenIds.set(moduleId, dirPath);
        results.push({
          moduleId,
          dirPath,
          entryPath,
          metaPath,
          modelsPath,
          disabled: present.has(DISABLED_MARKER),
        });
        return;
      }
    }

    if (depth >= maxDepth) {
      logger?.debug('Max depth reached', { path: dirPath, max_depth: maxDepth });
      return;
    }

    for (const name of entries) {
      if (name.startsWith('.') || name.startsWith('_')) continue;
      if (SKIP_DIR_NAMES.has(name)) continue;
      const entryPath = join(dirPath, name);
      if (existsAndIsDir(entryPath)) {
        scanDir(entryPath, depth + 1);
      }
    }
  }

  scanDir(rootResolved, 0);
  return results;
}
