import { minimatch } from 'minimatch';
import { InvalidArgumentError, describeCause } from '@atlas/core';

export type NamePredicate = (name: string) => boolean;

/**
 * Compile a `glob|glob` alternation into a predicate over component names.
 * Empty alternatives are ignored; an all-empty pattern matches nothing.
 */
export function compileNamePattern(pattern: string): NamePredicate {
  const alternatives = pattern
    .split('|')
    .map((p) => p.trim())
    .filter(Boolean);
  return (name) => alternatives.some((glob) => minimatch(name, glob, { dot: true }));
}

/** Content patterns are multiline regular expressions over the full text */
export function compileContentPattern(pattern: string): RegExp {
  try {
    return new RegExp(pattern, 'm');
  } catch (err) {
    throw new InvalidArgumentError(`Invalid content pattern '${pattern}': ${describeCause(err)}`, err);
  }
}
