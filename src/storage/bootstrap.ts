/**
 * Storage pre-bootstrap: create every declared database before any module
 * object is constructed.
 */

import { StorageBootstrapError, toError } from '../errors.js';
import type { ContextLogger } from '../observability/context-logger.js';
import { errorExtra } from '../observability/context-logger.js';
import type { DatabaseGroup, StorageCollaborator, TableSet } from './types.js';
import { DatabaseGroups } from './types.js';

function asBootstrapError(err: unknown, databaseName: string | null): StorageBootstrapError {
  if (err instanceof StorageBootstrapError) return err;
  const cause = toError(err);
  return new StorageBootstrapError(cause.message, databaseName, { cause });
}

/**
 * One discovery call, then one `createDatabase` per database in name order.
 * `alsoDeclared` names databases known from module descriptors; they are
 * created with whatever tables discovery found for them, possibly none.
 * Any failure aborts with StorageBootstrapError.
 */
export async function runStorageBootstrap(
  collaborator: StorageCollaborator,
  moduleTreeRoot: string,
  logger: ContextLogger,
  alsoDeclared: Iterable<string> = [],
): Promise<DatabaseGroups> {
  let declared: Map<string, TableSet>;
  try {
    declared = new Map(await collaborator.discoverDeclaredTables(moduleTreeRoot));
  } catch (e) {
    const err = asBootstrapError(e, null);
    logger.error('Storage discovery failed', errorExtra(err));
    throw err;
  }

  for (const name of alsoDeclared) {
    if (!declared.has(name)) declared.set(name, new Set<string>());
  }

  const groups: DatabaseGroup[] = [];
  for (const name of [...declared.keys()].sort()) {
    const tables = declared.get(name) ?? new Set<string>();
    try {
      const handle = await collaborator.createDatabase(name, tables);
      groups.push({ name, tables: [...tables].sort(), handle });
    } catch (e) {
      const err = asBootstrapError(e, name);
      logger.error('Database creation failed', { database: name, ...errorExtra(err) });
      throw err;
    }
  }

  logger.info('Storage bootstrap complete', { databases: groups.map((g) => g.name) });
  return new DatabaseGroups(groups);
}
