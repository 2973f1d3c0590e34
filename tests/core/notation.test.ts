import { describe, it, expect } from 'vitest';
import { bundleOf, formatNotation, isScriptNotation, parseNotation } from '@atlas/core';

describe('formatNotation', () => {
  it('renders each component type', () => {
    expect(formatNotation({ bundle: 'alpha', type: 'skill', name: 'build' })).toBe('alpha:build');
    expect(formatNotation({ bundle: 'alpha', type: 'script', name: 'run', skill: 'build' })).toBe('alpha:build:run');
    expect(formatNotation({ bundle: 'alpha', type: 'agent', name: 'reviewer' })).toBe('alpha:agents:reviewer');
    expect(formatNotation({ bundle: 'alpha', type: 'command', name: 'ship' })).toBe('alpha:commands:ship');
    expect(formatNotation({ bundle: 'alpha', type: 'test', name: 'unit/test_run' })).toBe('alpha:tests:unit/test_run');
  });
});

describe('parseNotation', () => {
  it('reads two segments as a skill', () => {
    expect(parseNotation('alpha:build')).toEqual({ bundle: 'alpha', type: 'skill', name: 'build' });
  });

  it('reads three segments as a script unless the middle names a group', () => {
    expect(parseNotation('alpha:build:run')).toEqual({ bundle: 'alpha', type: 'script', name: 'run', skill: 'build' });
    expect(parseNotation('alpha:agents:reviewer')).toEqual({ bundle: 'alpha', type: 'agent', name: 'reviewer' });
    expect(parseNotation('alpha:commands:ship')).toEqual({ bundle: 'alpha', type: 'command', name: 'ship' });
  });

  it('allows slashes in test names only', () => {
    expect(parseNotation('alpha:tests:unit/test_run')).toEqual({ bundle: 'alpha', type: 'test', name: 'unit/test_run' });
    expect(parseNotation('alpha:build:sub/run')).toBeNull();
  });

  it('rejects malformed input', () => {
    expect(parseNotation('')).toBeNull();
    expect(parseNotation('alpha')).toBeNull();
    expect(parseNotation('alpha:agents')).toBeNull();
    expect(parseNotation('a:b:c:d')).toBeNull();
    expect(parseNotation('alpha::run')).toBeNull();
    expect(isScriptNotation('alpha:build:run')).toBe(true);
    expect(isScriptNotation('alpha:build')).toBe(false);
    expect(isScriptNotation('alpha:agents:review')).toBe(false);
    expect(isScriptNotation('not a notation')).toBe(false);
  });

  it('round-trips through formatNotation', () => {
    for (const notation of ['alpha:build', 'alpha:build:run', 'alpha:agents:reviewer', 'alpha:commands:ship']) {
      const id = parseNotation(notation);
      expect(id).not.toBeNull();
      if (id) expect(formatNotation(id)).toBe(notation);
    }
  });
});

describe('bundleOf', () => {
  it('returns the first segment', () => {
    expect(bundleOf('alpha:build:run')).toBe('alpha');
    expect(bundleOf('alpha')).toBe('alpha');
  });
});
