import { describe, it, expect, afterEach } from 'vitest';
import path from 'path';
import { InvalidArgumentError, NotFoundError } from '@atlas/core';
import { InventoryIndexer } from '@atlas/inventory';
import type { ScanOptions } from '@atlas/inventory';
import { makeTree, removeTree } from '../helpers/fixtures.js';

const TREE: Record<string, string> = {
  'bundles/alpha/.claude-plugin/plugin.json': '{"name":"alpha"}\n',
  'bundles/alpha/skills/build/SKILL.md': '---\nname: build\ndescription: Builds things\n---\n# Build\n',
  'bundles/alpha/skills/build/scripts/run.py': 'print("run")\n',
  'bundles/alpha/skills/build/scripts/_helpers.py': 'X = 1\n',
  'bundles/alpha/skills/build/scripts/__pycache__/run.cpython-311.py': '',
  'bundles/alpha/skills/build/tests/test_build.py': 'def test_ok():\n    pass\n',
  'bundles/alpha/skills/lint/SKILL.md': '---\ndescription: [broken\n---\nLint\n',
  'bundles/alpha/commands/ship.md': '---\ndescription: Ship it\n---\nShip\n',
  'bundles/alpha/agents/reviewer.md': 'Reviews\n',
  'bundles/beta/skills/deploy/SKILL.md': 'Deploy\n',
  'test/alpha/test_run.py': 'def test_run():\n    pass\n',
};

describe('InventoryIndexer.scan', () => {
  let root = '';

  afterEach(async () => {
    if (root) await removeTree(root);
    root = '';
  });

  async function scan(extra: Record<string, string> = {}, options: Partial<ScanOptions> = {}) {
    root = await makeTree({ ...TREE, ...extra });
    return new InventoryIndexer(root).scan({ roots: ['bundles'], ...options });
  }

  it('finds every component type grouped by bundle', async () => {
    const catalog = await scan();
    expect(catalog.components.map((c) => c.notation)).toEqual([
      'alpha:build',
      'alpha:lint',
      'alpha:commands:ship',
      'alpha:agents:reviewer',
      'alpha:build:run',
      'beta:deploy',
    ]);
    expect(catalog.bundles.map((b) => b.name)).toEqual(['alpha', 'beta']);
    expect(catalog.get('alpha:build')?.root).toBe(path.join(root, 'bundles/alpha/skills/build'));
    expect(catalog.get('alpha:build:run')?.skill).toBe('build');
  });

  it('indexes every bundle file for path lookups', async () => {
    const catalog = await scan();
    expect(catalog.hasFile(path.join(root, 'bundles/alpha/skills/lint/SKILL.md'))).toBe(true);
    expect(catalog.hasFile(path.join(root, 'bundles/alpha/skills/build/scripts/_helpers.py'))).toBe(true);
    expect(catalog.hasFile(path.join(root, 'bundles/alpha/skills/build/scripts/__pycache__/run.cpython-311.py'))).toBe(
      false,
    );
  });

  it('adds tests from the test root and from skill test directories', async () => {
    const catalog = await scan({}, { includeTests: true });
    expect(catalog.ofType('test').map((c) => c.notation)).toEqual([
      'alpha:tests:test_run',
      'alpha:tests:build/tests/test_build',
    ]);
  });

  it('limits the scan to the requested types and bundles', async () => {
    const agents = await scan({}, { resourceTypes: ['agent', 'command'] });
    expect(agents.components.map((c) => c.notation)).toEqual(['alpha:commands:ship', 'alpha:agents:reviewer']);
    await removeTree(root);

    const beta = await scan({}, { bundles: ['beta'] });
    expect(beta.components.map((c) => c.notation)).toEqual(['beta:deploy']);
    expect(beta.bundles.map((b) => b.name)).toEqual(['beta']);
  });

  it('filters names with a glob alternation', async () => {
    const catalog = await scan({}, { namePattern: 'b*|dep*' });
    expect(catalog.components.map((c) => c.notation)).toEqual(['alpha:build', 'beta:deploy']);
  });

  it('filters by content and reports the counts', async () => {
    const catalog = await scan({}, { contentPattern: '^Deploy' });
    expect(catalog.components.map((c) => c.notation)).toEqual(['beta:deploy']);
    expect(catalog.contentFilter).toEqual({ inputCount: 6, matchedCount: 1, excludedCount: 5 });
  });

  it('reads descriptions and records malformed frontmatter as a warning', async () => {
    const catalog = await scan({}, { includeDescriptions: true });
    expect(catalog.get('alpha:build')?.description).toBe('Builds things');
    expect(catalog.get('alpha:commands:ship')?.description).toBe('Ship it');
    expect(catalog.get('alpha:lint')?.description).toBeUndefined();
    expect(catalog.size).toBe(6);
    expect(catalog.warnings.map((w) => [w.kind, w.path])).toEqual([
      ['ParseWarning', path.join(root, 'bundles/alpha/skills/lint/SKILL.md')],
    ]);
  });

  it('uses the highest version directory of an installed bundle', async () => {
    const catalog = await scan({
      'bundles/gamma/1.2.0/skills/old/SKILL.md': 'old\n',
      'bundles/gamma/1.10.0/skills/new/SKILL.md': 'new\n',
    });
    expect(catalog.getBundle('gamma')?.path).toBe(path.join(root, 'bundles/gamma/1.10.0'));
    expect(catalog.inBundle('gamma').map((c) => c.notation)).toEqual(['gamma:new']);
  });

  it('treats a root that is itself a bundle as the only bundle', async () => {
    root = await makeTree(TREE);
    const catalog = await new InventoryIndexer(root).scan({ roots: ['bundles/beta'] });
    expect(catalog.components.map((c) => c.notation)).toEqual(['beta:deploy']);
  });

  it('appends the project scope as a secondary bundle', async () => {
    const catalog = await scan(
      { '.claude/skills/local/SKILL.md': 'local\n' },
      { includeSecondaryScope: true },
    );
    expect(catalog.bundles.map((b) => [b.name, b.scope])).toEqual([
      ['alpha', 'primary'],
      ['beta', 'primary'],
      ['project-skills', 'secondary'],
    ]);
    expect(catalog.has('project-skills:local')).toBe(true);
  });

  it('fails with NotFound for a missing root', async () => {
    root = await makeTree(TREE);
    await expect(new InventoryIndexer(root).scan({ roots: ['nope'] })).rejects.toBeInstanceOf(NotFoundError);
  });

  it('rejects an invalid content pattern before scanning', async () => {
    const indexer = new InventoryIndexer('/nonexistent-atlas-root');
    await expect(indexer.scan({ roots: ['bundles'], contentPattern: '(' })).rejects.toBeInstanceOf(
      InvalidArgumentError,
    );
  });
});
