/**
 * Text-only discovery of declared databases and tables.
 *
 * Model files are read as text and never imported, so storage can be created
 * before any module code runs.
 */

import { readFileSync } from 'node:fs';
import { StorageBootstrapError } from '../errors.js';
import type { ContextLogger } from '../observability/context-logger.js';
import { scanModuleTree } from '../registry/scanner.js';

export const DATABASE_NAME_PATTERN = /^[a-z][a-z0-9_]*$/;

const DATABASE_DECLARATION = /\bDATABASE_NAME\s*(?::\s*[A-Za-z]+\s*)?=\s*(['"`])([^'"`]+)\1/;
const TABLE_DECLARATION = /\btableName\s*[:=]\s*(['"`])([^'"`]+)\1/g;

function stripCommentLines(content: string): string {
  return content
    .split('\n')
    .filter((line) => {
      const trimmed = line.trimStart();
      return !(trimmed.startsWith('//') || trimmed.startsWith('/*') || trimmed.startsWith('*'));
    })
    .join('\n');
}

export interface DeclaredStorage {
  databaseName: string;
  tables: string[];
}

/** Database name and table names declared by one model file's source. */
export function parseModelSource(content: string): DeclaredStorage | null {
  const source = stripCommentLines(content);
  const db = DATABASE_DECLARATION.exec(source);
  if (db === null) return null;
  const tables: string[] = [];
  for (const match of source.matchAll(TABLE_DECLARATION)) {
    tables.push(match[2]);
  }
  return { databaseName: db[2], tables };
}

/**
 * Walk the module tree and merge every enabled module's declared tables,
 * keyed by database name.
 */
export function scanDeclaredTables(
  root: string,
  maxDepth: number = 4,
  logger?: ContextLogger | null,
): Map<string, Set<string>> {
  const result = new Map<string, Set<string>>();

  for (const dir of scanModuleTree(root, maxDepth, logger)) {
    if (dir.modelsPath === null) continue;
    if (dir.disabled) {
      logger?.debug('Skipping storage of disabled module', { module_id: dir.moduleId });
      continue;
    }

    const declared = parseModelSource(readFileSync(dir.modelsPath, 'utf-8'));
    if (declared === null) {
      logger?.warn('Model file declares no DATABASE_NAME, ignoring', { module_id: dir.moduleId, path: dir.modelsPath });
      continue;
    }
    if (!DATABASE_NAME_PATTERN.test(declared.databaseName)) {
      throw new StorageBootstrapError(
        `invalid database name '${declared.databaseName}' in ${dir.modelsPath}`,
        declared.databaseName,
      );
    }

    const tables = result.get(declared.databaseName) ?? new Set<string>();
    for (const table of declared.tables) {
      tables.add(table);
    }
    result.set(declared.databaseName, tables);
    logger?.debug('Declared storage found', {
      module_id: dir.moduleId,
      database: declared.databaseName,
      tables: declared.tables.length,
    });
  }

  return result;
}
