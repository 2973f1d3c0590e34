import { stat } from 'fs/promises';

export async function isDirectory(p: string): Promise<boolean> {
  try {
    return (await stat(p)).isDirectory();
  } catch {
    return false;
  }
}

export async function isFile(p: string): Promise<boolean> {
  try {
    return (await stat(p)).isFile();
  } catch {
    return false;
  }
}

/** Render a path relative to cwd when it lives below it, else keep it absolute */
export function displayPath(p: string, cwd: string): string {
  const rel = p.startsWith(cwd + '/') ? p.slice(cwd.length + 1) : p;
  return rel.split('\\').join('/');
}
