import path from 'path';
import { glob } from 'glob';
import {
  BUNDLE_LAYOUT,
  IGNORE_DIRS,
  TEST_FILE_PATTERNS,
  formatNotation,
} from '@atlas/core';
import type { BundleInfo, Component, ComponentId } from '@atlas/core';
import { isDirectory } from './fs-utils.js';

const IGNORE = IGNORE_DIRS.map((d) => `**/${d}/**`);

export interface DiscoveryContext {
  scriptExtensions: readonly string[];
  /** Absolute directory holding `<bundle>/` test trees */
  testRoot?: string;
}

// ─── Per-type discovery ──────────────────────────────────────────────────────

export async function discoverSkills(bundle: BundleInfo): Promise<Component[]> {
  const base = path.join(bundle.path, BUNDLE_LAYOUT.SKILLS);
  const entries = await find(`*/${BUNDLE_LAYOUT.SKILL_ENTRY}`, base);
  return entries.map((rel) => {
    const name = firstSegment(rel);
    return makeComponent({ bundle: bundle.name, type: 'skill', name }, path.join(base, rel), path.join(base, name));
  });
}

export async function discoverCommands(bundle: BundleInfo): Promise<Component[]> {
  return discoverMarkdown(bundle, 'command', BUNDLE_LAYOUT.COMMANDS);
}

export async function discoverAgents(bundle: BundleInfo): Promise<Component[]> {
  return discoverMarkdown(bundle, 'agent', BUNDLE_LAYOUT.AGENTS);
}

/**
 * Scripts live in `skills/<skill>/scripts/`, at any depth. Files starting with
 * `_` are private modules of a public script and are not components.
 */
export async function discoverScripts(bundle: BundleInfo, ctx: DiscoveryContext): Promise<Component[]> {
  if (ctx.scriptExtensions.length === 0) return [];
  const base = path.join(bundle.path, BUNDLE_LAYOUT.SKILLS);
  const exts = ctx.scriptExtensions.map((e) => e.replace(/^\./, ''));
  const pattern = `*/${BUNDLE_LAYOUT.SCRIPTS}/**/*.${exts.length === 1 ? exts[0] : `{${exts.join(',')}}`}`;
  const entries = await find(pattern, base, [...TEST_FILE_PATTERNS, '**/*.d.ts']);

  return entries
    .filter((rel) => !path.basename(rel).startsWith('_'))
    .map((rel) => {
      const skill = firstSegment(rel);
      const file = path.join(base, rel);
      return makeComponent({ bundle: bundle.name, type: 'script', name: stem(rel), skill }, file, file);
    });
}

/**
 * Tests come from two places: `<testRoot>/<bundle>/**` and
 * `skills/<skill>/tests/**`. The name is the path relative to the test base,
 * without extension.
 */
export async function discoverTests(bundle: BundleInfo, ctx: DiscoveryContext): Promise<Component[]> {
  const found: Component[] = [];

  if (ctx.testRoot) {
    const base = path.join(ctx.testRoot, bundle.name);
    for (const rel of await find([...TEST_FILE_PATTERNS], base)) {
      const file = path.join(base, rel);
      found.push(makeComponent({ bundle: bundle.name, type: 'test', name: withoutExt(rel) }, file, file));
    }
  }

  const skillsBase = path.join(bundle.path, BUNDLE_LAYOUT.SKILLS);
  const nested = TEST_FILE_PATTERNS.map((p) => `*/${BUNDLE_LAYOUT.SKILL_TESTS}/${p}`);
  for (const rel of await find(nested, skillsBase)) {
    const file = path.join(skillsBase, rel);
    found.push(makeComponent({ bundle: bundle.name, type: 'test', name: withoutExt(rel) }, file, file));
  }

  return found;
}

/** Every regular file under the bundle, for path-reference resolution */
export async function listBundleFiles(bundle: BundleInfo): Promise<string[]> {
  const entries = await find('**/*', bundle.path);
  return entries.map((rel) => path.join(bundle.path, rel));
}

// ─── Helpers ─────────────────────────────────────────────────────────────────

async function discoverMarkdown(
  bundle: BundleInfo,
  type: 'command' | 'agent',
  dir: string,
): Promise<Component[]> {
  const base = path.join(bundle.path, dir);
  const entries = await find('*.md', base);
  return entries.map((rel) => {
    const file = path.join(base, rel);
    return makeComponent({ bundle: bundle.name, type, name: stem(rel) }, file, file);
  });
}

async function find(pattern: string | string[], cwd: string, extraIgnore: string[] = []): Promise<string[]> {
  if (!(await isDirectory(cwd))) return [];
  const files = await glob(pattern, {
    cwd,
    nodir: true,
    ignore: [...IGNORE, ...extraIgnore],
    absolute: false,
    posix: true,
  });
  // glob returns in walk order; sort for deterministic catalogs
  return files.map(toPosix).sort();
}

function makeComponent(id: ComponentId, file: string, root: string): Component {
  return { ...id, notation: formatNotation(id), path: file, root };
}

function firstSegment(rel: string): string {
  return toPosix(rel).split('/')[0] ?? rel;
}

function stem(rel: string): string {
  return path.basename(rel, path.extname(rel));
}

function withoutExt(rel: string): string {
  const posix = toPosix(rel);
  return posix.slice(0, posix.length - path.extname(posix).length);
}

function toPosix(p: string): string {
  return p.split(path.sep).join('/');
}
