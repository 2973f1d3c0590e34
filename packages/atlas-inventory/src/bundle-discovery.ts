import { readdir } from 'fs/promises';
import path from 'path';
import { BUNDLE_LAYOUT, ScanIOError, VERSION_DIR_PATTERN } from '@atlas/core';
import type { BundleInfo } from '@atlas/core';
import { isDirectory, isFile } from './fs-utils.js';

/**
 * A bundle directory holds a plugin manifest or at least one of the
 * per-type component directories.
 */
export async function isBundleDir(dir: string): Promise<boolean> {
  if (await isFile(path.join(dir, BUNDLE_LAYOUT.MANIFEST))) return true;
  for (const sub of [BUNDLE_LAYOUT.SKILLS, BUNDLE_LAYOUT.COMMANDS, BUNDLE_LAYOUT.AGENTS]) {
    if (await isDirectory(path.join(dir, sub))) return true;
  }
  return false;
}

/**
 * Find the bundles directly under a root, sorted by name. A root that is
 * itself a bundle yields just that bundle. Installed caches keep one
 * directory per version (`<bundle>/1.2.0/`); the highest version is used and
 * named after its parent.
 */
export async function findBundles(root: string, scope: BundleInfo['scope'] = 'primary'): Promise<BundleInfo[]> {
  if (await isBundleDir(root)) {
    return [{ name: bundleNameFor(root), path: root, scope }];
  }

  const entries = await listDirectories(root);
  const bundles: BundleInfo[] = [];

  for (const name of entries) {
    const dir = path.join(root, name);
    if (await isBundleDir(dir)) {
      bundles.push({ name, path: dir, scope });
      continue;
    }
    const versioned = await latestVersionDir(dir);
    if (versioned) bundles.push({ name, path: versioned, scope });
  }

  return bundles.sort((a, b) => a.name.localeCompare(b.name));
}

async function latestVersionDir(dir: string): Promise<string | null> {
  let entries: string[];
  try {
    entries = await listDirectories(dir);
  } catch {
    return null;
  }
  const candidates: string[] = [];
  for (const name of entries.filter((e) => VERSION_DIR_PATTERN.test(e))) {
    if (await isBundleDir(path.join(dir, name))) candidates.push(name);
  }
  const latest = candidates.sort(compareVersions).pop();
  return latest ? path.join(dir, latest) : null;
}

async function listDirectories(dir: string): Promise<string[]> {
  try {
    const entries = await readdir(dir, { withFileTypes: true });
    return entries
      .filter((e) => e.isDirectory() && !e.name.startsWith('.'))
      .map((e) => e.name)
      .sort();
  } catch (err) {
    throw new ScanIOError(dir, err);
  }
}

export function bundleNameFor(dir: string): string {
  const name = path.basename(dir);
  return VERSION_DIR_PATTERN.test(name) ? path.basename(path.dirname(dir)) : name;
}

export function compareVersions(a: string, b: string): number {
  const pa = a.split(/[^\d]+/).filter(Boolean).map(Number);
  const pb = b.split(/[^\d]+/).filter(Boolean).map(Number);
  for (let i = 0; i < Math.max(pa.length, pb.length); i++) {
    const diff = (pa[i] ?? 0) - (pb[i] ?? 0);
    if (diff !== 0) return diff;
  }
  return a.localeCompare(b);
}
