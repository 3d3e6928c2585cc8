/**
 * File-backed storage collaborator. Keeps one JSON catalog per database
 * listing its tables; enough for hosts without a relational engine and for
 * tests.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { Type, type Static } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import { StorageBootstrapError } from '../errors.js';
import type { ContextLogger } from '../observability/context-logger.js';
import { DATABASE_NAME_PATTERN, scanDeclaredTables } from './scanner.js';
import type { BaseHandle, StorageCollaborator, TableSet } from './types.js';

export const CATALOG_FORMAT = 'modhost.catalog/1';
export const CATALOG_SUFFIX = '.catalog.json';

export const CatalogFileSchema = Type.Object({
  format: Type.Literal(CATALOG_FORMAT),
  database: Type.String({ minLength: 1 }),
  tables: Type.Array(Type.String()),
  createdAt: Type.String(),
});

export type CatalogFile = Static<typeof CatalogFileSchema>;

export interface FileCatalogStorageOptions {
  dataDir: string;
  maxDepth?: number;
  /** Read table declarations from the module tree. When false, only databases declared elsewhere are created. */
  scanTree?: boolean;
  logger?: ContextLogger | null;
}

export class FileCatalogStorage implements StorageCollaborator {
  readonly dataDir: string;
  private readonly _maxDepth: number;
  private readonly _scanTree: boolean;
  private readonly _logger: ContextLogger | null;

  constructor(options: FileCatalogStorageOptions) {
    this.dataDir = resolve(options.dataDir);
    this._maxDepth = options.maxDepth ?? 4;
    this._scanTree = options.scanTree ?? true;
    this._logger = options.logger ?? null;
  }

  catalogPath(name: string): string {
    return join(this.dataDir, `${name}${CATALOG_SUFFIX}`);
  }

  discoverDeclaredTables(moduleTreeRoot: string): Map<string, TableSet> {
    if (!this._scanTree) return new Map();
    return scanDeclaredTables(moduleTreeRoot, this._maxDepth, this._logger);
  }

  /**
   * Create the catalog, or merge new tables into an existing one. The file
   * is only rewritten when its table set changes.
   */
  createDatabase(name: string, tables: TableSet): BaseHandle {
    if (!DATABASE_NAME_PATTERN.test(name)) {
      throw new StorageBootstrapError(`invalid database name '${name}'`, name);
    }
    mkdirSync(this.dataDir, { recursive: true });
    const path = this.catalogPath(name);

    const existing = existsSync(path) ? this.readCatalog(name, path) : null;
    const merged = [...new Set([...(existing?.tables ?? []), ...tables])].sort();
    const unchanged = existing !== null
      && existing.tables.length === merged.length
      && existing.tables.every((t, i) => t === merged[i]);

    if (!unchanged) {
      const catalog: CatalogFile = {
        format: CATALOG_FORMAT,
        database: name,
        tables: merged,
        createdAt: existing?.createdAt ?? new Date().toISOString(),
      };
      writeFileSync(path, JSON.stringify(catalog, null, 2) + '\n', 'utf-8');
      this._logger?.info('Database catalog written', { database: name, tables: merged.length, path });
    } else {
      this._logger?.debug('Database catalog up to date', { database: name, path });
    }

    return Object.freeze({
      databaseName: name,
      location: path,
      tables: Object.freeze(merged),
    });
  }

  readCatalog(name: string, path: string = this.catalogPath(name)): CatalogFile {
    let parsed: unknown;
    try {
      parsed = JSON.parse(readFileSync(path, 'utf-8'));
    } catch (e) {
      throw new StorageBootstrapError(`cannot read catalog ${path}`, name, {
        cause: e instanceof Error ? e : undefined,
      });
    }
    if (!Value.Check(CatalogFileSchema, parsed)) {
      const first = [...Value.Errors(CatalogFileSchema, parsed)][0];
      throw new StorageBootstrapError(
        `malformed catalog ${path}: ${first ? `${first.path || '/'} ${first.message}` : 'unknown error'}`,
        name,
      );
    }
    if (parsed.database !== name) {
      throw new StorageBootstrapError(`catalog ${path} belongs to database '${parsed.database}'`, name);
    }
    return parsed;
  }
}
