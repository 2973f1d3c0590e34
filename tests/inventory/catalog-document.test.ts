import { describe, it, expect, afterEach } from 'vitest';
import path from 'path';
import { InvalidArgumentError, NotFoundError } from '@atlas/core';
import { catalogFromDocument, loadCatalog, toCatalogDocument } from '@atlas/inventory';
import { BASE, catalogOf, component, makeTree, removeTree } from '../helpers/fixtures.js';

const catalog = catalogOf(
  [
    { ...component('alpha:build'), description: 'Builds things' },
    component('alpha:build:run'),
    component('alpha:commands:ship'),
    component('beta:deploy'),
  ],
  [path.join(BASE, 'alpha', 'skills', 'build', 'references', 'guide.md')],
);

describe('toCatalogDocument', () => {
  it('groups entries per bundle with paths relative to cwd', () => {
    const doc = toCatalogDocument(catalog, { cwd: '/repo', includeFiles: true });
    expect(doc.roots).toEqual(['bundles']);
    expect(doc.bundles['alpha']?.skills).toEqual([
      { name: 'build', notation: 'alpha:build', path: 'bundles/alpha/skills/build/SKILL.md', description: 'Builds things' },
    ]);
    expect(doc.bundles['alpha']?.scripts).toEqual([
      { name: 'run', notation: 'alpha:build:run', path: 'bundles/alpha/skills/build/scripts/run.py', skill: 'build' },
    ]);
    expect(doc.bundles['alpha']?.files).toEqual([
      'commands/ship.md',
      'skills/build/SKILL.md',
      'skills/build/references/guide.md',
      'skills/build/scripts/run.py',
    ]);
  });

  it('omits the file list unless asked', () => {
    const doc = toCatalogDocument(catalog, { cwd: '/repo' });
    expect(doc.bundles['beta']?.files).toEqual([]);
  });
});

describe('catalogFromDocument', () => {
  it('rebuilds the same components and files', () => {
    const doc = toCatalogDocument(catalog, { cwd: '/repo', includeFiles: true });
    const reloaded = catalogFromDocument(doc, '/repo');
    expect(reloaded.components.map((c) => c.notation)).toEqual([
      'alpha:build',
      'alpha:commands:ship',
      'alpha:build:run',
      'beta:deploy',
    ]);
    expect(reloaded.get('alpha:build')?.root).toBe(path.join(BASE, 'alpha', 'skills', 'build'));
    expect(reloaded.get('alpha:build')?.description).toBe('Builds things');
    expect(reloaded.hasFile(path.join(BASE, 'alpha', 'skills', 'build', 'references', 'guide.md'))).toBe(true);
  });

  it('rejects an entry whose notation disagrees with its position', () => {
    const doc = toCatalogDocument(catalog, { cwd: '/repo' });
    const entry = doc.bundles['beta']?.skills[0];
    if (entry) entry.notation = 'alpha:deploy';
    expect(() => catalogFromDocument(doc, '/repo')).toThrow(InvalidArgumentError);
  });
});

describe('loadCatalog', () => {
  let root = '';

  afterEach(async () => {
    if (root) await removeTree(root);
    root = '';
  });

  it('reads a saved document', async () => {
    const doc = toCatalogDocument(catalog, { cwd: '/repo', includeFiles: true });
    root = await makeTree({ 'catalog.json': JSON.stringify(doc) });
    const loaded = await loadCatalog('catalog.json', root);
    expect(loaded.has('alpha:build:run')).toBe(true);
    expect(loaded.get('beta:deploy')?.path).toBe(path.join(root, 'bundles', 'beta', 'skills', 'deploy', 'SKILL.md'));
  });

  it('reports a missing file as NotFound', async () => {
    root = await makeTree({});
    await expect(loadCatalog('missing.json', root)).rejects.toBeInstanceOf(NotFoundError);
  });

  it('reports bad JSON and bad shape as InvalidArgument', async () => {
    root = await makeTree({ 'broken.json': '{ nope', 'shape.json': '{"roots": [], "bundles": {}}' });
    await expect(loadCatalog('broken.json', root)).rejects.toBeInstanceOf(InvalidArgumentError);
    await expect(loadCatalog('shape.json', root)).rejects.toThrow(/at version/);
  });
});
