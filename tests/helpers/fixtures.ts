import { mkdtemp, mkdir, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import path from 'path';
import { Catalog, parseNotation } from '@atlas/core';
import type { BundleInfo, Component } from '@atlas/core';

// ─── Filesystem trees ────────────────────────────────────────────────────────

/** Write a throw-away tree under the OS temp dir; keys are relative paths */
export async function makeTree(files: Record<string, string>): Promise<string> {
  const root = await mkdtemp(path.join(tmpdir(), 'atlas-test-'));
  for (const [rel, content] of Object.entries(files)) {
    const file = path.join(root, rel);
    await mkdir(path.dirname(file), { recursive: true });
    await writeFile(file, content, 'utf-8');
  }
  return root;
}

export async function removeTree(root: string): Promise<void> {
  await rm(root, { recursive: true, force: true });
}

// ─── In-memory catalogs ──────────────────────────────────────────────────────

export const BASE = '/repo/bundles';

/**
 * A component laid out the way discovery would find it under BASE, with its
 * text preloaded so no file is read.
 */
export function component(notation: string, content = ''): Component {
  const id = parseNotation(notation);
  if (!id) throw new Error(`bad notation in fixture: ${notation}`);
  const bundleDir = path.join(BASE, id.bundle);

  switch (id.type) {
    case 'skill': {
      const root = path.join(bundleDir, 'skills', id.name);
      return { ...id, notation, root, path: path.join(root, 'SKILL.md'), content };
    }
    case 'script': {
      const file = path.join(bundleDir, 'skills', id.skill ?? '', 'scripts', `${id.name}.py`);
      return { ...id, notation, root: file, path: file, content };
    }
    case 'agent':
    case 'command': {
      const file = path.join(bundleDir, `${id.type}s`, `${id.name}.md`);
      return { ...id, notation, root: file, path: file, content };
    }
    case 'test': {
      const file = path.join('/repo/test', id.bundle, `${id.name}.py`);
      return { ...id, notation, root: file, path: file, content };
    }
  }
}

export function catalogOf(components: Component[], extraFiles: string[] = []): Catalog {
  const names = [...new Set(components.map((c) => c.bundle))].sort();
  const bundles: BundleInfo[] = names.map((name) => ({ name, path: path.join(BASE, name), scope: 'primary' }));
  return new Catalog({ roots: [BASE], bundles, components, files: extraFiles });
}
