import { describe, it, expect } from 'vitest';
import { parseToon, serializeToon } from '@atlas/core';
import type { DepsResult, TreeNode, ValidateResult } from '@atlas/graph';
import {
  depsDocument,
  errorDocument,
  renderTree,
  treeEdges,
  validateDocument,
  warningFields,
} from '../../packages/atlas-cli/src/lib/documents.js';

const DEPS: DepsResult = {
  status: 'success',
  component: 'a:s',
  componentType: 'skill',
  dependencies: [
    { notation: 'a:s:build', componentType: 'script', distance: 1, types: ['script'], via: 'a:s' },
    { notation: 'b:t', componentType: 'skill', distance: 1, types: ['skill'], via: 'a:s' },
    { notation: 'b:t:lint', componentType: 'script', distance: 2, types: ['skill', 'script'], via: 'b:t' },
  ],
  unresolved: [
    { source: 'a:s', type: 'skill', mention: 'ghost', status: 'unresolved', provenance: { line: 4 } },
  ],
};

describe('depsDocument', () => {
  it('counts direct and transitive dependencies', () => {
    const doc = depsDocument(DEPS, { types: [], maxDepth: 10 });
    expect(doc['dep_types']).toBe('all');
    expect(doc['primary_count']).toBe(2);
    expect(doc['transitive_count']).toBe(1);
    expect(doc['unresolved']).toEqual([{ type: 'skill', mention: 'ghost', status: 'unresolved', locator: 'line:4' }]);
  });

  it('keeps every (via, ref_type, target) row through a TOON round trip', () => {
    const doc = depsDocument(DEPS, { types: ['script', 'skill'], maxDepth: 3 });
    const parsed = parseToon(serializeToon(doc));
    const rows = parsed['dependencies'];
    if (!Array.isArray(rows)) throw new Error('dependencies should be a table');

    expect(parsed['dep_types']).toBe('script,skill');
    expect(
      rows.map((row) =>
        row !== null && typeof row === 'object' && !Array.isArray(row) ? [row['via'], row['ref_type'], row['target']] : [],
      ),
    ).toEqual([
      ['a:s', 'script', 'a:s:build'],
      ['a:s', 'skill', 'b:t'],
      ['b:t', 'script', 'b:t:lint'],
    ]);
  });
});

describe('tree rendering', () => {
  const root: TreeNode = {
    notation: 'a',
    depth: 0,
    children: [
      {
        notation: 'b',
        edgeType: 'skill',
        depth: 1,
        children: [{ notation: 'd', edgeType: 'script', depth: 2, children: [] }],
      },
      { notation: 'c', edgeType: 'path', depth: 1, marker: 'cycle', children: [] },
    ],
  };

  it('draws box lines with edge types and markers', () => {
    expect(renderTree(root)).toBe(['a', '├── b (skill)', '│   └── d (script)', '└── c (path) [cycle]'].join('\n'));
  });

  it('lists parent to child edges', () => {
    expect(treeEdges(root)).toEqual([
      { from: 'a', to: 'b', type: 'skill', depth: 1, marker: '' },
      { from: 'a', to: 'c', type: 'path', depth: 1, marker: 'cycle' },
      { from: 'b', to: 'd', type: 'script', depth: 2, marker: '' },
    ]);
  });
});

describe('validateDocument', () => {
  it('renders cycles as closed chains and candidates as a list', () => {
    const result: ValidateResult = {
      status: 'success',
      result: 'issues_found',
      totals: { components: 2, references: 3, resolved: 2, unresolved: 0, ambiguous: 1, external: 0 },
      broken: [
        {
          source: 'm:x',
          type: 'skill',
          mention: 'helper',
          status: 'ambiguous',
          locator: 'line:2',
          candidates: ['a:helper', 'b:helper'],
        },
      ],
      cycles: [{ members: ['m:x', 'm:y'], types: ['skill', 'script'] }],
    };
    const doc = validateDocument(result, ['skill', 'script'], 'm');

    expect(doc['broken']).toEqual([
      {
        source: 'm:x',
        type: 'skill',
        mention: 'helper',
        status: 'ambiguous',
        locator: 'line:2',
        candidates: 'a:helper b:helper',
      },
    ]);
    expect(doc['cycles']).toEqual([{ length: 2, chain: 'm:x -> m:y -> m:x', types: 'skill>script' }]);
    expect(doc['validation_result']).toBe('issues_found');
  });
});

describe('errorDocument', () => {
  it('serializes to a two-level TOON document', () => {
    expect(serializeToon(errorDocument({ kind: 'NotFound', message: 'Component not found: a:x' }))).toBe(
      'status: error\nerror:\n  kind: NotFound\n  message: "Component not found: a:x"',
    );
  });
});

describe('warningFields', () => {
  it('counts warnings and shows paths relative to the working directory', () => {
    const warnings = [{ kind: 'IOError' as const, path: '/work/bundles/a/skills/s/SKILL.md', message: 'gone' }];
    expect(warningFields(warnings, '/work')).toEqual({
      warning_count: 1,
      warnings: [{ kind: 'IOError', path: 'bundles/a/skills/s/SKILL.md', message: 'gone' }],
    });
  });
});
