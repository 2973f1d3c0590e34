/**
 * TOON: a compact, indentation-based notation for result documents.
 *
 *   status: success
 *   statistics:
 *     total: 3
 *   rows[2]{target,distance}:
 *     "alpha:build",1
 *     "beta:lint",2
 *   tags[2]:
 *     - one
 *     - two
 *   tree: |
 *     alpha:build
 *     └── beta:lint
 */

export type ToonScalar = string | number | boolean | null;
export type ToonValue = ToonScalar | ToonValue[] | ToonObject;
export interface ToonObject {
  [key: string]: ToonValue;
}

export class ToonParseError extends Error {
  constructor(
    message: string,
    public readonly line: number,
    public readonly lineContent: string,
  ) {
    super(`Line ${line}: ${message}\n  > ${lineContent}`);
    this.name = 'ToonParseError';
  }
}

const INDENT = '  ';

// ─── Serialization ───────────────────────────────────────────────────────────

export function serializeToon(data: ToonObject): string {
  const lines: string[] = [];
  writeObject(data, 0, lines);
  return lines.join('\n');
}

function writeObject(data: ToonObject, depth: number, lines: string[]): void {
  const prefix = INDENT.repeat(depth);
  for (const [key, value] of Object.entries(data)) {
    if (Array.isArray(value)) {
      const fields = tableFields(value);
      if (fields) {
        lines.push(`${prefix}${key}[${value.length}]{${fields.join(',')}}:`);
        for (const row of value) {
          if (!isObject(row)) continue;
          lines.push(`${prefix}${INDENT}${fields.map((f) => formatCell(row[f])).join(',')}`);
        }
      } else {
        lines.push(`${prefix}${key}[${value.length}]:`);
        for (const item of value) {
          lines.push(`${prefix}${INDENT}- ${formatCell(item)}`);
        }
      }
    } else if (isObject(value)) {
      lines.push(`${prefix}${key}:`);
      writeObject(value, depth + 1, lines);
    } else if (typeof value === 'string' && value.includes('\n') && !value.endsWith('\n')) {
      lines.push(`${prefix}${key}: |`);
      for (const textLine of value.split('\n')) {
        lines.push(textLine ? `${prefix}${INDENT}${textLine}` : '');
      }
    } else {
      lines.push(`${prefix}${key}: ${formatScalar(value)}`);
    }
  }
}

/** Field union (first-seen order) when every item is an object, else null */
function tableFields(items: ToonValue[]): string[] | null {
  if (items.length === 0 || !items.every(isObject)) return null;
  const fields: string[] = [];
  const seen = new Set<string>();
  for (const item of items) {
    if (!isObject(item)) continue;
    for (const key of Object.keys(item)) {
      if (!seen.has(key)) {
        seen.add(key);
        fields.push(key);
      }
    }
  }
  return fields.length > 0 ? fields : null;
}

function formatCell(value: ToonValue | undefined): string {
  if (value === undefined) return '';
  if (Array.isArray(value) || isObject(value)) return quote(JSON.stringify(value));
  return formatScalar(value);
}

function formatScalar(value: ToonScalar): string {
  if (value === null) return 'null';
  if (typeof value === 'boolean' || typeof value === 'number') return String(value);
  return needsQuotes(value) ? quote(value) : value;
}

function needsQuotes(value: string): boolean {
  if (value === '') return true;
  if (value !== value.trim()) return true;
  if (/[,:"\\\n]/.test(value)) return true;
  if (value.startsWith('- ') || value.startsWith('#') || value === '|') return true;
  // Keep strings that look like other scalars as strings
  return parseScalar(value) !== value;
}

function quote(value: string): string {
  return `"${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"').replace(/\n/g, '\\n')}"`;
}

// ─── Parsing ─────────────────────────────────────────────────────────────────

const TABLE_HEADER = /^([\w.-]+)\[(\d+)\]\{([^}]*)\}:$/;
const LIST_HEADER = /^([\w.-]+)\[(\d+)\]:$/;
const KEY_VALUE = /^([\w.-]+):(?:\s+(.*))?$/;

export function parseToon(text: string): ToonObject {
  const cursor = new Cursor(text.split(/\r?\n/));
  const result = readObject(cursor, 0);
  cursor.skipBlank();
  if (!cursor.done()) {
    throw new ToonParseError('unexpected indentation', cursor.lineNumber(), cursor.peek());
  }
  return result;
}

class Cursor {
  index = 0;
  constructor(readonly lines: string[]) {}

  done(): boolean {
    return this.index >= this.lines.length;
  }

  peek(): string {
    return this.lines[this.index] ?? '';
  }

  lineNumber(): number {
    return this.index + 1;
  }

  skipBlank(): void {
    while (!this.done() && isSkippable(this.peek())) this.index++;
  }
}

function isSkippable(line: string): boolean {
  const trimmed = line.trim();
  return trimmed === '' || trimmed.startsWith('#');
}

function indentOf(line: string): number {
  return line.length - line.trimStart().length;
}

function readObject(cursor: Cursor, indent: number): ToonObject {
  const result: ToonObject = {};

  for (;;) {
    cursor.skipBlank();
    if (cursor.done()) break;

    const line = cursor.peek();
    const lineIndent = indentOf(line);
    if (lineIndent < indent) break;
    if (lineIndent > indent) {
      throw new ToonParseError('unexpected indentation', cursor.lineNumber(), line);
    }

    const content = line.trim();
    const table = TABLE_HEADER.exec(content);
    if (table) {
      const [, key = '', count = '0', fieldList = ''] = table;
      cursor.index++;
      const fields = fieldList.split(',').map((f) => f.trim());
      result[key] = readTable(cursor, indent, Number(count), fields);
      continue;
    }

    const list = LIST_HEADER.exec(content);
    if (list) {
      const [, key = '', count = '0'] = list;
      cursor.index++;
      result[key] = readList(cursor, indent, Number(count));
      continue;
    }

    const pair = KEY_VALUE.exec(content);
    if (!pair) {
      throw new ToonParseError('expected "key: value"', cursor.lineNumber(), line);
    }
    const [, key = '', rawValue] = pair;
    cursor.index++;

    if (rawValue === '|') {
      result[key] = readBlock(cursor, indent);
    } else if (rawValue === undefined || rawValue === '') {
      cursor.skipBlank();
      if (!cursor.done() && indentOf(cursor.peek()) > indent) {
        result[key] = readObject(cursor, indentOf(cursor.peek()));
      } else {
        result[key] = {};
      }
    } else {
      result[key] = parseScalar(rawValue);
    }
  }

  return result;
}

function readTable(cursor: Cursor, indent: number, count: number, fields: string[]): ToonObject[] {
  const rows: ToonObject[] = [];
  while (rows.length < count) {
    cursor.skipBlank();
    if (cursor.done() || indentOf(cursor.peek()) <= indent) {
      throw new ToonParseError(`expected ${count} rows, found ${rows.length}`, cursor.lineNumber(), cursor.peek());
    }
    const cells = splitRow(cursor.peek().trim());
    const row: ToonObject = {};
    fields.forEach((field, i) => {
      const cell = cells[i];
      if (cell !== undefined && cell !== '') row[field] = parseScalar(cell);
    });
    rows.push(row);
    cursor.index++;
  }
  return rows;
}

function readList(cursor: Cursor, indent: number, count: number): ToonValue[] {
  const items: ToonValue[] = [];
  while (items.length < count) {
    cursor.skipBlank();
    const line = cursor.peek();
    const content = line.trim();
    if (cursor.done() || indentOf(line) <= indent || !content.startsWith('-')) {
      throw new ToonParseError(`expected ${count} items, found ${items.length}`, cursor.lineNumber(), line);
    }
    items.push(parseScalar(content.slice(1).trim()));
    cursor.index++;
  }
  return items;
}

/** Trailing blank lines end a block; strings ending in a newline are written quoted */
function readBlock(cursor: Cursor, indent: number): string {
  const blockIndent = indent + INDENT.length;
  const collected: string[] = [];
  while (!cursor.done()) {
    const line = cursor.peek();
    if (line.trim() !== '' && indentOf(line) < blockIndent) break;
    collected.push(line.slice(blockIndent));
    cursor.index++;
  }
  while (collected.length > 0 && collected[collected.length - 1] === '') collected.pop();
  return collected.join('\n');
}

function splitRow(row: string): string[] {
  const cells: string[] = [];
  let current = '';
  let inQuotes = false;
  for (let i = 0; i < row.length; i++) {
    const ch = row[i];
    if (inQuotes && ch === '\\' && i + 1 < row.length) {
      current += ch + row[i + 1];
      i++;
    } else if (ch === '"') {
      inQuotes = !inQuotes;
      current += ch;
    } else if (ch === ',' && !inQuotes) {
      cells.push(current.trim());
      current = '';
    } else {
      current += ch;
    }
  }
  cells.push(current.trim());
  return cells;
}

export function parseScalar(raw: string): ToonScalar {
  const value = raw.trim();
  if (value === 'null') return null;
  if (value === 'true') return true;
  if (value === 'false') return false;
  if (/^-?\d+$/.test(value)) return Number.parseInt(value, 10);
  if (/^-?\d+\.\d+$/.test(value)) return Number.parseFloat(value);
  if (value.length >= 2 && value.startsWith('"') && value.endsWith('"')) {
    return unquote(value.slice(1, -1));
  }
  return value;
}

function unquote(inner: string): string {
  return inner.replace(/\\(["\\n])/g, (_, ch: string) => (ch === 'n' ? '\n' : ch));
}

function isObject(value: ToonValue | undefined): value is ToonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
