import { describe, it, expect } from 'vitest';
import { ToonParseError, parseToon, serializeToon } from '@atlas/core';

describe('serializeToon', () => {
  it('writes scalars, tables, lists, nested objects and blocks', () => {
    const text = serializeToon({
      status: 'success',
      count: 2,
      items: [
        { a: 'x', b: 1 },
        { a: 'y:z', b: 2 },
      ],
      tags: ['one', 'two'],
      nested: { k: 'v' },
      text: 'l1\nl2',
    });
    expect(text).toBe(
      [
        'status: success',
        'count: 2',
        'items[2]{a,b}:',
        '  x,1',
        '  "y:z",2',
        'tags[2]:',
        '  - one',
        '  - two',
        'nested:',
        '  k: v',
        'text: |',
        '  l1',
        '  l2',
      ].join('\n'),
    );
  });

  it('quotes strings that would read back as something else', () => {
    expect(serializeToon({ a: 'true', b: '12', c: '', d: 'say "hi"', e: 'a,b' })).toBe(
      ['a: "true"', 'b: "12"', 'c: ""', 'd: "say \\"hi\\""', 'e: "a,b"'].join('\n'),
    );
  });

  it('quotes multi-line text that ends in a newline so it reads back exactly', () => {
    const text = serializeToon({ body: 'l1\nl2\n' });
    expect(text).toBe('body: "l1\\nl2\\n"');
    expect(parseToon(text)).toEqual({ body: 'l1\nl2\n' });
  });

  it('writes empty arrays as zero-length lists', () => {
    expect(serializeToon({ rows: [] })).toBe('rows[0]:');
  });
});

describe('parseToon', () => {
  it('reads back what serializeToon writes', () => {
    const doc = {
      status: 'success',
      count: 2,
      ratio: 0.5,
      flag: false,
      none: null,
      items: [
        { target: 'alpha:build', distance: 1 },
        { target: 'beta:lint', distance: 2 },
      ],
      tags: ['one', 'two words'],
      nested: { deeper: { k: 'v' }, quoted: 'a: b' },
      tree: 'root\n└── child',
      empty: [],
    };
    expect(parseToon(serializeToon(doc))).toEqual(doc);
  });

  it('leaves missing table cells out of the row', () => {
    expect(parseToon('rows[2]{a,b}:\n  x,1\n  y,')).toEqual({ rows: [{ a: 'x', b: 1 }, { a: 'y' }] });
  });

  it('skips comments and blank lines', () => {
    expect(parseToon('# header\n\na: 1\n')).toEqual({ a: 1 });
  });

  it('rejects a table with fewer rows than declared', () => {
    expect(() => parseToon('rows[2]{a}:\n  x')).toThrow(ToonParseError);
  });

  it('rejects unexpected indentation', () => {
    expect(() => parseToon('a: 1\n   b: 2')).toThrow(/unexpected indentation/);
  });
});
