import { describe, it, expect } from 'vitest';
import { collectReferences } from '@atlas/graph';
import { catalogOf, component } from '../helpers/fixtures.js';

describe('collectReferences', () => {
  it('turns unreadable components into warnings and keeps the rest', async () => {
    const readable = component('a:s', 'Skill: b:t\n');
    const unreadable = component('a:broken');
    const catalog = catalogOf([readable, unreadable, component('b:t')]);

    const result = await collectReferences(catalog, {
      loader: async (c) => {
        if (c.notation === 'a:broken') throw new Error('permission denied');
        return c.content ?? '';
      },
    });

    expect(result.references.map((r) => [r.source, r.target])).toEqual([['a:s', 'b:t']]);
    expect(result.warnings).toEqual([{ kind: 'IOError', path: unreadable.path, message: 'permission denied' }]);
  });

  it('records a malformed header as a warning and keeps its references', async () => {
    const agent = component('a:agents:impl', '---\ndescription: Use when: reviewing code\nimplements: missing/contract.md\n---\n');
    const result = await collectReferences(catalogOf([agent]));

    expect(result.references.map((r) => [r.type, r.status])).toEqual([['implements', 'unresolved']]);
    expect(result.warnings.map((w) => [w.kind, w.path])).toEqual([['ParseWarning', agent.path]]);
    expect(result.warnings[0]?.message).toMatch(/^malformed metadata header: /);
  });

  it('passes module mappings through to extraction', async () => {
    const script = component('a:s:main', 'import cfg\n');
    const catalog = catalogOf([script, component('b:x:settings')]);
    const { references } = await collectReferences(catalog, { moduleMappings: { cfg: 'b:x:settings' } });
    expect(references.map((r) => [r.type, r.status, r.target])).toEqual([['import', 'resolved', 'b:x:settings']]);
  });
});
