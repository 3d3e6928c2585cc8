/**
 * Storage collaborator contract and the groups produced by storage bootstrap.
 */

export type TableSet = ReadonlySet<string>;

/** Shared, never-mutated handle to one bootstrapped database. */
export interface BaseHandle {
  readonly databaseName: string;
  readonly location: string;
  readonly tables: readonly string[];
}

/**
 * What the engine needs from the storage engine. Both calls happen once per
 * start, before any module object exists.
 */
export interface StorageCollaborator {
  discoverDeclaredTables(moduleTreeRoot: string): Map<string, TableSet> | Promise<Map<string, TableSet>>;
  createDatabase(name: string, tables: TableSet): BaseHandle | Promise<BaseHandle>;
}

export interface DatabaseGroup {
  readonly name: string;
  readonly tables: readonly string[];
  readonly handle: BaseHandle;
}

export class DatabaseGroups {
  private readonly _groups: ReadonlyMap<string, DatabaseGroup>;

  constructor(groups: Iterable<DatabaseGroup>) {
    const map = new Map<string, DatabaseGroup>();
    for (const group of groups) {
      map.set(group.name, Object.freeze({ ...group, tables: Object.freeze([...group.tables]) }));
    }
    this._groups = map;
    Object.freeze(this);
  }

  static empty(): DatabaseGroups {
    return new DatabaseGroups([]);
  }

  get(name: string): BaseHandle | null {
    return this._groups.get(name)?.handle ?? null;
  }

  group(name: string): DatabaseGroup | null {
    return this._groups.get(name) ?? null;
  }

  has(name: string): boolean {
    return this._groups.has(name);
  }

  names(): string[] {
    return [...this._groups.keys()].sort();
  }

  entries(): DatabaseGroup[] {
    return this.names().flatMap((n) => {
      const g = this._groups.get(n);
      return g !== undefined ? [g] : [];
    });
  }

  get size(): number {
    return this._groups.size;
  }
}
