import path from 'path';
import {
  frontmatterList,
  frontmatterString,
  headerLineOf,
  parseFrontmatter,
  parseNotation,
} from '@atlas/core';
import type {
  Catalog,
  Component,
  FrontmatterResult,
  Reference,
  ReferenceType,
  ResolutionStatus,
  ScanWarning,
} from '@atlas/core';

export interface ExtractOptions {
  /** Component text; defaults to the component's preloaded content */
  text?: string;
  /** Module name → script notation, for imports named differently from their script */
  moduleMappings?: Readonly<Record<string, string>>;
  /** Receives a ParseWarning when the metadata header is malformed */
  onWarning?: (warning: ScanWarning) => void;
}

interface ExtractionContext {
  component: Component;
  catalog: Catalog;
  header: FrontmatterResult;
  /** Every line of the document, index 0 is line 1 */
  lines: string[];
  moduleMappings: Readonly<Record<string, string>>;
}

interface Resolution {
  status: ResolutionStatus;
  target?: string;
  file?: string;
  candidates?: string[];
}

type Extractor = (ctx: ExtractionContext) => Reference[];

// ─── Patterns ────────────────────────────────────────────────────────────────

// bundle:skill:script, not part of a longer colon chain
const SCRIPT_NOTATION = /(?<![\w:-])([\w-]+):([\w-]+):([\w-]+)(?![\w-]|:[\w-])/g;
const URL_LINE = /https?:\/\//;
const NON_SCRIPT_GROUPS = new Set(['agents', 'commands', 'tests']);
const URL_SCHEMES = new Set(['http', 'https', 'file', 'mailto', 'ftp']);

const SKILL_DIRECTIVE = /\bSkill:\s*([\w-]+(?::[\w-]+)?)(?![\w-]|:[\w-])/g;

const MARKDOWN_LINK = /\[[^\]]*\]\(\s*([^)\s]+)(?:\s+"[^"]*")?\s*\)/g;
const SCHEME = /^[a-z][a-z0-9+.-]*:/i;

const PY_FROM_IMPORT = /^\s*from\s+(\.*[\w.]*)\s+import\b/;
const PY_IMPORT = /^\s*import\s+([\w.]+(?:\s*,\s*[\w.]+)*)/;
const JS_IMPORTS = [
  /^\s*(?:import|export)\s+(?:type\s+)?(?:[\w\s{},*]+\s+from\s+)?['"]([^'"]+)['"]/,
  /\bimport\s*\(\s*['"]([^'"]+)['"]\s*\)/g,
  /\brequire\s*\(\s*['"]([^'"]+)['"]\s*\)/g,
];
const SHELL_SOURCE = /^\s*(?:source|\.)\s+["']?([^\s"';]+)/;

const IMPLEMENTS_IN_SKILL = /^([\w-]+):([\w-]+)\/(.+)$/;

// ─── Extractors ──────────────────────────────────────────────────────────────

const extractScriptReferences: Extractor = (ctx) => {
  const refs: Reference[] = [];
  const code = isCode(ctx.component);

  forEachBodyLine(ctx, (line, lineNo) => {
    const trimmed = line.trim();
    if (code && (trimmed.startsWith('#') || trimmed.startsWith('//'))) return;
    if (URL_LINE.test(line)) return;

    for (const match of line.matchAll(SCRIPT_NOTATION)) {
      const [mention, bundle = '', skill = ''] = match;
      if (URL_SCHEMES.has(bundle) || /^\d/.test(bundle) || /^\d+$/.test(skill)) continue;
      if (NON_SCRIPT_GROUPS.has(skill)) continue;
      const hit = ctx.catalog.get(mention);
      const resolution: Resolution =
        hit?.type === 'script' ? { status: 'resolved', target: hit.notation } : { status: 'unresolved' };
      refs.push(makeReference(ctx, 'script', mention, resolution, { line: lineNo }));
    }
  });
  return refs;
};

const extractSkillReferences: Extractor = (ctx) => {
  const refs: Reference[] = [];

  for (const mention of frontmatterList(ctx.header.data, 'skills')) {
    const line = headerLineOf(ctx.header.headerLines, 'skills', mention);
    refs.push(
      makeReference(ctx, 'skill', mention, resolveSkill(mention, ctx), {
        ...(line !== undefined ? { line } : {}),
        section: 'frontmatter:skills',
      }),
    );
  }

  forEachBodyLine(ctx, (line, lineNo) => {
    for (const match of line.matchAll(SKILL_DIRECTIVE)) {
      const mention = match[1] ?? '';
      refs.push(makeReference(ctx, 'skill', mention, resolveSkill(mention, ctx), { line: lineNo }));
    }
  });
  return refs;
};

const extractImportReferences: Extractor = (ctx) => {
  if (ctx.component.type !== 'script') return [];
  const refs: Reference[] = [];
  const ext = path.extname(ctx.component.path).toLowerCase();

  ctx.lines.forEach((line, idx) => {
    for (const mention of importsOnLine(line, ext)) {
      const moduleName = moduleNameOf(mention, ext);
      if (!moduleName) continue;
      const resolution = resolveImport(mention, moduleName, ctx);
      refs.push(makeReference(ctx, 'import', mention, resolution, { line: idx + 1 }));
    }
  });
  return refs;
};

const extractPathReferences: Extractor = (ctx) => {
  const refs: Reference[] = [];
  const baseDir = path.dirname(ctx.component.path);

  forEachBodyLine(ctx, (line, lineNo) => {
    for (const match of line.matchAll(MARKDOWN_LINK)) {
      const mention = match[1] ?? '';
      if (!isRelativeLink(mention)) continue;
      const file = path.resolve(baseDir, stripFragment(mention));
      // Only paths that point into an indexed bundle count
      if (!ctx.catalog.bundleContaining(file)) continue;
      refs.push(makeReference(ctx, 'path', mention, resolveFile(file, ctx), { line: lineNo }));
    }
  });
  return refs;
};

const extractImplementsReference: Extractor = (ctx) => {
  const mention = frontmatterString(ctx.header.data, 'implements');
  if (!mention) return [];
  const line = headerLineOf(ctx.header.headerLines, 'implements');
  const provenance = { ...(line !== undefined ? { line } : {}), section: 'frontmatter:implements' };
  return [makeReference(ctx, 'implements', mention, resolveContract(mention, ctx), provenance)];
};

/** Fixed extraction pipeline; a new reference type is one more entry here */
const PIPELINE: ReadonlyArray<readonly [ReferenceType, Extractor]> = [
  ['script', extractScriptReferences],
  ['skill', extractSkillReferences],
  ['import', extractImportReferences],
  ['path', extractPathReferences],
  ['implements', extractImplementsReference],
];

/**
 * Extract every typed reference a component makes. Never throws: missing
 * patterns yield nothing, and resolution failures are carried per reference.
 * References come back in order of appearance; self-references are dropped.
 */
export function extract(component: Component, catalog: Catalog, options: ExtractOptions = {}): Reference[] {
  const text = options.text ?? component.content ?? '';
  const header = isCode(component) ? emptyHeader(text) : parseFrontmatter(text);
  if (header.warning) {
    options.onWarning?.({ kind: 'ParseWarning', path: component.path, message: header.warning });
  }
  const ctx: ExtractionContext = {
    component,
    catalog,
    header,
    lines: text.split(/\r?\n/),
    moduleMappings: options.moduleMappings ?? {},
  };

  const ranked: Array<{ ref: Reference; stage: number; seq: number }> = [];
  PIPELINE.forEach(([, run], stage) => {
    for (const ref of run(ctx)) {
      if (ref.target === component.notation) continue;
      ranked.push({ ref, stage, seq: ranked.length });
    }
  });

  return ranked
    .sort((a, b) => (a.ref.provenance.line ?? 0) - (b.ref.provenance.line ?? 0) || a.stage - b.stage || a.seq - b.seq)
    .map((r) => r.ref);
}

// ─── Resolution ──────────────────────────────────────────────────────────────

/** Qualified names must exist; bare names prefer the source's own bundle, then a unique global match */
function resolveSkill(mention: string, ctx: ExtractionContext): Resolution {
  if (mention.includes(':')) {
    const id = parseNotation(mention);
    const hit = id?.type === 'skill' ? ctx.catalog.get(mention) : undefined;
    return hit ? { status: 'resolved', target: hit.notation } : { status: 'unresolved' };
  }

  const local = ctx.catalog.get(`${ctx.component.bundle}:${mention}`);
  if (local?.type === 'skill') return { status: 'resolved', target: local.notation };

  return pickUnique(ctx.catalog.named('skill', mention).map((c) => c.notation)) ?? { status: 'unresolved' };
}

/** An explicit module mapping wins; then the same skill, the same bundle, a unique global match */
function resolveImport(mention: string, moduleName: string, ctx: ExtractionContext): Resolution {
  const key = normalizeModule(moduleName);
  const { component, catalog } = ctx;

  const mapped = Object.entries(ctx.moduleMappings).find(
    ([name]) => normalizeModule(name) === key || name === mention,
  );
  if (mapped) {
    const hit = catalog.get(mapped[1]);
    return hit ? { status: 'resolved', target: hit.notation } : { status: 'unresolved' };
  }

  const scripts = catalog.ofType('script').filter((s) => normalizeModule(s.name) === key);

  const sameSkill = scripts.find((s) => s.bundle === component.bundle && s.skill === component.skill);
  if (sameSkill) return { status: 'resolved', target: sameSkill.notation };

  const sameBundle = pickUnique(scripts.filter((s) => s.bundle === component.bundle).map((s) => s.notation));
  if (sameBundle) return sameBundle;

  return pickUnique(scripts.map((s) => s.notation)) ?? { status: 'external' };
}

/** A catalog file, or a component's own directory such as a skill root */
function resolveFile(file: string, ctx: ExtractionContext): Resolution {
  if (!ctx.catalog.hasFile(file)) {
    const dirOwner = ctx.catalog.ownerOf(file);
    if (dirOwner && dirOwner.root === path.resolve(file)) {
      return { status: 'resolved', target: dirOwner.notation, file };
    }
    return { status: 'unresolved', file };
  }
  const owner = ctx.catalog.ownerOf(file);
  return owner ? { status: 'resolved', target: owner.notation, file } : { status: 'resolved', file };
}

/**
 * A contract is `bundle:skill/relative/path`, a skill notation, or a plain
 * path tried against the component's directory, its bundle, then each root.
 */
function resolveContract(mention: string, ctx: ExtractionContext): Resolution {
  const { catalog, component } = ctx;

  const inSkill = IMPLEMENTS_IN_SKILL.exec(mention);
  if (inSkill) {
    const [, bundleName = '', skill = '', rel = ''] = inSkill;
    const bundle = catalog.getBundle(bundleName);
    if (!bundle) return { status: 'unresolved' };
    return resolveFile(path.join(bundle.path, 'skills', skill, rel), ctx);
  }

  if (parseNotation(mention)) {
    const hit = catalog.get(mention);
    return hit ? { status: 'resolved', target: hit.notation } : { status: 'unresolved' };
  }

  const bases = [path.dirname(component.path), catalog.getBundle(component.bundle)?.path, ...catalog.roots];
  for (const base of bases) {
    if (!base) continue;
    const file = path.resolve(base, mention);
    if (catalog.hasFile(file)) return resolveFile(file, ctx);
  }
  return { status: 'unresolved', file: path.resolve(path.dirname(component.path), mention) };
}

function pickUnique(notations: string[]): Resolution | null {
  if (notations.length === 1 && notations[0]) return { status: 'resolved', target: notations[0] };
  if (notations.length > 1) return { status: 'ambiguous', candidates: notations };
  return null;
}

// ─── Helpers ─────────────────────────────────────────────────────────────────

function makeReference(
  ctx: ExtractionContext,
  type: ReferenceType,
  mention: string,
  resolution: Resolution,
  provenance: Reference['provenance'],
): Reference {
  const ref: Reference = { source: ctx.component.notation, type, mention, status: resolution.status, provenance };
  if (resolution.target) ref.target = resolution.target;
  if (resolution.file) ref.file = resolution.file;
  if (resolution.candidates) ref.candidates = resolution.candidates;
  return ref;
}

function forEachBodyLine(ctx: ExtractionContext, visit: (line: string, lineNo: number) => void): void {
  for (let i = ctx.header.bodyStartLine - 1; i < ctx.lines.length; i++) {
    visit(ctx.lines[i] ?? '', i + 1);
  }
}

function importsOnLine(line: string, ext: string): string[] {
  if (ext === '.py') {
    const from = PY_FROM_IMPORT.exec(line);
    if (from?.[1]) return [from[1]];
    const plain = PY_IMPORT.exec(line);
    return plain?.[1] ? plain[1].split(',').map((m) => m.trim()) : [];
  }
  if (ext === '.sh') {
    const sourced = SHELL_SOURCE.exec(line);
    return sourced?.[1] ? [sourced[1]] : [];
  }
  const found: string[] = [];
  for (const pattern of JS_IMPORTS) {
    if (pattern.global) {
      for (const m of line.matchAll(pattern)) if (m[1]) found.push(m[1]);
    } else {
      const m = pattern.exec(line);
      if (m?.[1]) found.push(m[1]);
    }
  }
  return found;
}

/** The name an import is matched on: last dotted segment, or file stem for paths */
function moduleNameOf(mention: string, ext: string): string {
  if (ext === '.py') {
    const segments = mention.split('.').filter(Boolean);
    return segments[segments.length - 1] ?? '';
  }
  const base = path.posix.basename(mention.replace(/\\/g, '/'));
  return base.replace(/\.[cm]?[jt]s$|\.sh$/, '');
}

function normalizeModule(name: string): string {
  return name.toLowerCase().replace(/-/g, '_');
}

function isRelativeLink(target: string): boolean {
  return !SCHEME.test(target) && !target.startsWith('#') && !target.startsWith('/') && !target.startsWith('~');
}

function stripFragment(target: string): string {
  return decodeLink(target.replace(/[#?].*$/, ''));
}

function decodeLink(target: string): string {
  try {
    return decodeURIComponent(target);
  } catch {
    return target;
  }
}

function isCode(component: Component): boolean {
  return component.type === 'script' || component.type === 'test';
}

function emptyHeader(text: string): FrontmatterResult {
  return { data: {}, body: text, headerLines: [], bodyStartLine: 1 };
}
