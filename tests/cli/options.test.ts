import { describe, it, expect } from 'vitest';
import { InvalidArgumentError } from '@atlas/core';
import {
  parseCsv,
  parseDepTypes,
  parseDepth,
  parseFormat,
  parseResourceTypes,
  requireComponent,
} from '../../packages/atlas-cli/src/lib/options.js';
import { defaultOutputFile } from '../../packages/atlas-cli/src/lib/paths.js';

describe('flag parsing', () => {
  it('splits comma lists and drops blanks', () => {
    expect(parseCsv(' a, ,b ')).toEqual(['a', 'b']);
    expect(parseCsv(undefined)).toEqual([]);
  });

  it('validates and dedupes type lists', () => {
    expect(parseDepTypes('skill,script,skill')).toEqual(['skill', 'script']);
    expect(parseResourceTypes('agent')).toEqual(['agent']);
    expect(() => parseDepTypes('skill,bogus')).toThrow(InvalidArgumentError);
    expect(() => parseResourceTypes('skills')).toThrow("Invalid --resource-types value 'skills'");
  });

  it('accepts only positive integer depths', () => {
    expect(parseDepth(undefined, 10)).toBe(10);
    expect(parseDepth('3', 10)).toBe(3);
    expect(() => parseDepth('0', 10)).toThrow(InvalidArgumentError);
    expect(() => parseDepth('2.5', 10)).toThrow(InvalidArgumentError);
  });

  it('checks the output format', () => {
    expect(parseFormat(undefined, 'toon')).toBe('toon');
    expect(parseFormat('json', 'toon')).toBe('json');
    expect(() => parseFormat('xml', 'toon')).toThrow(InvalidArgumentError);
  });

  it('requires a component', () => {
    expect(requireComponent(' a:s ')).toBe('a:s');
    expect(() => requireComponent('  ')).toThrow('Missing required option --component <notation>');
  });
});

describe('defaultOutputFile', () => {
  it('names the file after the operation and a filename-safe timestamp', () => {
    const now = new Date('2026-01-02T03:04:05.678Z');
    expect(defaultOutputFile('.atlas/temp', 'deps', 'json', now, '/work')).toBe(
      '/work/.atlas/temp/deps-2026-01-02T03-04-05-678Z.json',
    );
  });
});
