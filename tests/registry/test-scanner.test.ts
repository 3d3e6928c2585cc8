import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { rmSync } from 'node:fs';
import { join } from 'node:path';
import { ConfigNotFoundError } from '../../src/errors.js';
import { ContextLogger } from '../../src/observability/context-logger.js';
import { scanModuleTree, toModuleId } from '../../src/registry/scanner.js';
import { makeTempDir, touch } from '../helpers.js';

let tempDir: string;

beforeEach(() => {
  tempDir = makeTempDir('scanner');
});

afterEach(() => {
  rmSync(tempDir, { recursive: true, force: true });
});

describe('scanModuleTree', () => {
  it('finds modules under category directories', () => {
    touch(tempDir, 'core/database/module.mjs');
    touch(tempDir, 'standard/reports/module.yaml');
    touch(tempDir, 'extensions/tools/search/module.js');

    const results = scanModuleTree(tempDir);
    expect(results.map((r) => r.moduleId)).toEqual(['core.database', 'extensions.tools.search', 'standard.reports']);
    const db = results[0];
    expect(db.dirPath).toBe(join(tempDir, 'core', 'database'));
    expect(db.entryPath).toBe(join(tempDir, 'core', 'database', 'module.mjs'));
    expect(db.metaPath).toBeNull();
    expect(db.modelsPath).toBeNull();
    expect(db.disabled).toBe(false);
  });

  it('prefers module.ts over module.mjs and module.js', () => {
    touch(tempDir, 'core/a/module.js');
    touch(tempDir, 'core/a/module.ts');
    expect(scanModuleTree(tempDir)[0].entryPath).toBe(join(tempDir, 'core', 'a', 'module.ts'));
  });

  it('reports both declaration files and storage models', () => {
    touch(tempDir, 'core/a/module.mjs');
    touch(tempDir, 'core/a/module.yaml');
    touch(tempDir, 'core/a/db-models.mjs');
    const [dir] = scanModuleTree(tempDir);
    expect(dir.metaPath).toBe(join(tempDir, 'core', 'a', 'module.yaml'));
    expect(dir.modelsPath).toBe(join(tempDir, 'core', 'a', 'db-models.mjs'));
  });

  it('treats a storage-only directory as a module directory', () => {
    touch(tempDir, 'core/store/db-models.js');
    const [dir] = scanModuleTree(tempDir);
    expect(dir.moduleId).toBe('core.store');
    expect(dir.entryPath).toBeNull();
  });

  it('flags the disabled marker', () => {
    touch(tempDir, 'standard/old/module.mjs');
    touch(tempDir, 'standard/old/.disabled');
    expect(scanModuleTree(tempDir)[0].disabled).toBe(true);
  });

  it('does not descend into module directories', () => {
    touch(tempDir, 'core/a/module.mjs');
    touch(tempDir, 'core/a/nested/module.mjs');
    expect(scanModuleTree(tempDir).map((r) => r.moduleId)).toEqual(['core.a']);
  });

  it('skips hidden, underscore and build directories', () => {
    touch(tempDir, '.git/x/module.mjs');
    touch(tempDir, '_drafts/x/module.mjs');
    touch(tempDir, 'core/node_modules/x/module.mjs');
    touch(tempDir, 'core/real/module.mjs');
    expect(scanModuleTree(tempDir).map((r) => r.moduleId)).toEqual(['core.real']);
  });

  it('stops at the depth limit', () => {
    touch(tempDir, 'a/b/c/module.mjs');
    expect(scanModuleTree(tempDir, 2)).toEqual([]);
    expect(scanModuleTree(tempDir, 3).map((r) => r.moduleId)).toEqual(['a.b.c']);
  });

  it('warns about directories that map to the same id', () => {
    touch(tempDir, 'core/my-mod/module.mjs');
    touch(tempDir, 'core/my_mod/module.mjs');
    const logger = new ContextLogger({ output: { write: () => undefined } });
    const warn = vi.spyOn(logger, 'warn');
    const results = scanModuleTree(tempDir, 4, logger);
    expect(results.map((r) => r.dirPath)).toEqual([join(tempDir, 'core', 'my-mod')]);
    expect(warn).toHaveBeenCalledWith('Duplicate module ID, skipping', expect.objectContaining({ module_id: 'core.my_mod' }));
  });

  it('throws when the root is missing', () => {
    expect(() => scanModuleTree(join(tempDir, 'nope'))).toThrow(ConfigNotFoundError);
  });
});

describe('toModuleId', () => {
  it('normalizes path segments', () => {
    expect(toModuleId(join('Core', 'My-Module'))).toBe('core.my_module');
    expect(toModuleId(join('ext', '2fa'))).toBe('ext._2fa');
  });
});
