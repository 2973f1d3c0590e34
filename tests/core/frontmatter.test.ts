import { describe, it, expect } from 'vitest';
import { frontmatterList, frontmatterString, headerLineOf, parseFrontmatter } from '@atlas/core';

const DOC = ['---', 'name: demo', 'description: Does a thing', 'skills:', '  - alpha:build', '  - lint', '---', '# Body', ''].join('\n');

describe('parseFrontmatter', () => {
  it('splits header and body', () => {
    const result = parseFrontmatter(DOC);
    expect(result.data).toEqual({ name: 'demo', description: 'Does a thing', skills: ['alpha:build', 'lint'] });
    expect(result.body).toBe('# Body\n');
    expect(result.bodyStartLine).toBe(8);
    expect(result.warning).toBeUndefined();
  });

  it('treats a document without a header as all body', () => {
    const result = parseFrontmatter('plain text\n');
    expect(result.data).toEqual({});
    expect(result.bodyStartLine).toBe(1);
    expect(result.warning).toBeUndefined();
  });

  it('warns on an unterminated header', () => {
    const result = parseFrontmatter('---\nname: x\n');
    expect(result.data).toEqual({});
    expect(result.warning).toBe('metadata header has no closing delimiter');
  });

  it('warns on malformed YAML without throwing', () => {
    const result = parseFrontmatter('---\ndescription: [broken\n---\nbody\n');
    expect(result.data).toEqual({});
    expect(result.warning).toMatch(/^malformed metadata header: /);
    expect(result.body).toBe('body\n');
  });

  it('reads a header YAML rejects line by line and skips unreadable fields', () => {
    const header = [
      '---',
      'name: review',
      'description: Use when: reviewing code',
      'skills:',
      '  - alpha:build',
      '  - "lint"',
      'tags: [a, b',
      '---',
      'body',
    ].join('\n');
    const result = parseFrontmatter(header);

    expect(result.data).toEqual({
      name: 'review',
      description: 'Use when: reviewing code',
      skills: ['alpha:build', 'lint'],
    });
    expect(result.warning).toMatch(/^malformed metadata header: /);
    expect(result.bodyStartLine).toBe(9);
  });

  it('warns when the header is not a mapping', () => {
    const result = parseFrontmatter('---\n- a\n- b\n---\n');
    expect(result.warning).toBe('metadata header is not a key: value mapping');
  });
});

describe('header field helpers', () => {
  it('collapses whitespace in scalar fields', () => {
    expect(frontmatterString({ description: '  multi\n line  ' }, 'description')).toBe('multi line');
    expect(frontmatterString({ version: 2 }, 'version')).toBe('2');
    expect(frontmatterString({ skills: ['a'] }, 'skills')).toBeUndefined();
  });

  it('reads lists from YAML sequences or comma-separated strings', () => {
    expect(frontmatterList({ skills: ['a', ' b '] }, 'skills')).toEqual(['a', 'b']);
    expect(frontmatterList({ skills: 'a, b,,c' }, 'skills')).toEqual(['a', 'b', 'c']);
    expect(frontmatterList({}, 'skills')).toEqual([]);
  });

  it('locates the document line of a header value', () => {
    const { headerLines } = parseFrontmatter(DOC);
    expect(headerLineOf(headerLines, 'description')).toBe(3);
    expect(headerLineOf(headerLines, 'skills', 'lint')).toBe(6);
    expect(headerLineOf(headerLines, 'implements')).toBeUndefined();
  });
});
