import yaml from 'js-yaml';

export interface FrontmatterResult {
  data: Record<string, unknown>;
  body: string;
  /** Raw header lines, without the delimiters */
  headerLines: string[];
  /** 1-based line number of the first body line */
  bodyStartLine: number;
  /** Set when a header was present but could not be read */
  warning?: string;
}

const DELIMITER = '---';
const HEADER_FIELD = /^([\w-]+):(?:\s+(.*))?$/;
const HEADER_ITEM = /^\s+-\s+(.*)$/;
const FLOW_VALUE = /^[[{"']/;

/**
 * Split a leading `---` metadata block off a document. A malformed block never
 * throws: when YAML rejects it, the header is read line by line as `key: value`
 * fields and `  - item` lists, skipping fields that still cannot be read, and
 * the result carries a warning.
 */
export function parseFrontmatter(content: string): FrontmatterResult {
  const lines = content.split(/\r?\n/);
  if (lines[0]?.trim() !== DELIMITER) {
    return { data: {}, body: content, headerLines: [], bodyStartLine: 1 };
  }

  const closing = lines.findIndex((line, idx) => idx > 0 && line.trim() === DELIMITER);
  if (closing === -1) {
    return {
      data: {},
      body: content,
      headerLines: [],
      bodyStartLine: 1,
      warning: 'metadata header has no closing delimiter',
    };
  }

  const headerLines = lines.slice(1, closing);
  const body = lines.slice(closing + 1).join('\n');
  const bodyStartLine = closing + 2;

  if (headerLines.every((line) => !line.trim())) {
    return { data: {}, body, headerLines, bodyStartLine };
  }

  let parsed: unknown;
  try {
    parsed = yaml.load(headerLines.join('\n'));
  } catch (err) {
    const reason = err instanceof yaml.YAMLException ? err.reason : String(err);
    return {
      data: parseHeaderLines(headerLines),
      body,
      headerLines,
      bodyStartLine,
      warning: `malformed metadata header: ${reason}`,
    };
  }

  if (!isRecord(parsed)) {
    return { data: {}, body, headerLines, bodyStartLine, warning: 'metadata header is not a key: value mapping' };
  }

  return { data: parsed, body, headerLines, bodyStartLine };
}

/** Read a scalar header field as a trimmed single-line string */
export function frontmatterString(data: Record<string, unknown>, key: string): string | undefined {
  const value = data[key];
  if (typeof value === 'string') {
    const trimmed = value.replace(/\s+/g, ' ').trim();
    return trimmed || undefined;
  }
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return undefined;
}

/** Read a header field that may be a YAML list or a comma-separated string */
export function frontmatterList(data: Record<string, unknown>, key: string): string[] {
  const value = data[key];
  if (Array.isArray(value)) {
    return value.filter((v): v is string => typeof v === 'string').map((v) => v.trim()).filter(Boolean);
  }
  if (typeof value === 'string') {
    return value.split(',').map((v) => v.trim()).filter(Boolean);
  }
  return [];
}

/**
 * Locate the header line a value was declared on, as a line number in the
 * whole document (the opening delimiter is line 1).
 */
export function headerLineOf(headerLines: string[], key: string, value?: string): number | undefined {
  const keyIdx = headerLines.findIndex((line) => line.startsWith(`${key}:`));
  if (keyIdx === -1) return undefined;
  if (value !== undefined) {
    for (let i = keyIdx; i < headerLines.length; i++) {
      const line = headerLines[i] ?? '';
      if (i > keyIdx && /^\S/.test(line)) break;
      if (line.includes(value)) return i + 2;
    }
  }
  return keyIdx + 2;
}

/** Lenient reading of a header YAML rejected, e.g. `description: Use when: x` */
function parseHeaderLines(headerLines: string[]): Record<string, unknown> {
  const data: Record<string, unknown> = {};
  let list: string[] | undefined;

  for (const line of headerLines) {
    const item = HEADER_ITEM.exec(line);
    if (item && list) {
      const value = unquote(item[1]?.trim() ?? '');
      if (value) list.push(value);
      continue;
    }
    list = undefined;

    const field = HEADER_FIELD.exec(line);
    if (!field) continue;
    const [, key = '', raw = ''] = field;
    const value = raw.trim();
    if (!value) {
      list = [];
      data[key] = list;
      continue;
    }
    const parsed = readHeaderValue(value);
    if (parsed !== undefined) data[key] = parsed;
  }
  return data;
}

/** Plain text is taken as is; flow values (`[a, b]`, quoted) must parse or the field is skipped */
function readHeaderValue(value: string): unknown {
  if (!FLOW_VALUE.test(value)) return value;
  try {
    return yaml.load(value) ?? undefined;
  } catch (err) {
    if (err instanceof yaml.YAMLException) return undefined;
    throw err;
  }
}

function unquote(value: string): string {
  const quoted = /^(["'])(.*)\1$/.exec(value);
  return quoted ? (quoted[2] ?? '') : value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
