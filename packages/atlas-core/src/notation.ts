import type { ComponentId } from './types.js';

const SEGMENT = /^[\w.-]+$/;

/**
 * Render a component identifier as its canonical notation.
 *
 *   skill   → bundle:name
 *   script  → bundle:skill:name
 *   agent   → bundle:agents:name
 *   command → bundle:commands:name
 *   test    → bundle:tests:relative/path
 */
export function formatNotation(id: ComponentId): string {
  switch (id.type) {
    case 'skill':
      return `${id.bundle}:${id.name}`;
    case 'script':
      return id.skill ? `${id.bundle}:${id.skill}:${id.name}` : `${id.bundle}:${id.name}`;
    case 'agent':
      return `${id.bundle}:agents:${id.name}`;
    case 'command':
      return `${id.bundle}:commands:${id.name}`;
    case 'test':
      return `${id.bundle}:tests:${id.name}`;
  }
}

/**
 * Parse a notation back into an identifier. Returns null for anything that is
 * not two or three well-formed segments.
 */
export function parseNotation(notation: string): ComponentId | null {
  const parts = notation.trim().split(':');
  if (parts.length === 2) {
    const [bundle, name] = parts;
    if (!bundle || !name || !SEGMENT.test(bundle) || !SEGMENT.test(name)) return null;
    if (name === 'agents' || name === 'commands' || name === 'tests') return null;
    return { bundle, type: 'skill', name };
  }
  if (parts.length === 3) {
    const [bundle, middle, name] = parts;
    if (!bundle || !middle || !name || !SEGMENT.test(bundle) || !SEGMENT.test(middle)) return null;
    if (middle === 'tests') return { bundle, type: 'test', name };
    if (!SEGMENT.test(name)) return null;
    if (middle === 'agents') return { bundle, type: 'agent', name };
    if (middle === 'commands') return { bundle, type: 'command', name };
    return { bundle, type: 'script', name, skill: middle };
  }
  return null;
}

export function isScriptNotation(value: string): boolean {
  return parseNotation(value)?.type === 'script';
}

export function bundleOf(notation: string): string {
  const idx = notation.indexOf(':');
  return idx === -1 ? notation : notation.slice(0, idx);
}
