export { DatabaseGroups } from './types.js';
export type { BaseHandle, DatabaseGroup, StorageCollaborator, TableSet } from './types.js';
export { scanDeclaredTables, parseModelSource, DATABASE_NAME_PATTERN } from './scanner.js';
export type { DeclaredStorage } from './scanner.js';
export { FileCatalogStorage, CatalogFileSchema, CATALOG_FORMAT, CATALOG_SUFFIX } from './file-catalog.js';
export type { CatalogFile, FileCatalogStorageOptions } from './file-catalog.js';
export { runStorageBootstrap } from './bootstrap.js';
