import type { z } from 'zod';
import {
  InvalidArgumentError,
  OutputFormatSchema,
  ReferenceTypeSchema,
  ResourceTypeSchema,
} from '@atlas/core';
import type { OutputFormat, ReferenceType, ResourceType } from '@atlas/core';

// Flags arrive from commander as raw strings; they are validated here so a
// bad value becomes an InvalidArgumentError with exit code 1.

export function parseCsv(value: string | undefined): string[] {
  if (!value) return [];
  return value
    .split(',')
    .map((v) => v.trim())
    .filter(Boolean);
}

function parseEnumCsv<T extends string>(
  value: string | undefined,
  schema: z.ZodType<T>,
  flag: string,
  allowed: readonly string[],
): T[] {
  const result: T[] = [];
  for (const item of parseCsv(value)) {
    const parsed = schema.safeParse(item);
    if (!parsed.success) {
      throw new InvalidArgumentError(`Invalid ${flag} value '${item}' (expected one of: ${allowed.join(', ')})`);
    }
    if (!result.includes(parsed.data)) result.push(parsed.data);
  }
  return result;
}

export function parseResourceTypes(value: string | undefined): ResourceType[] {
  return parseEnumCsv(value, ResourceTypeSchema, '--resource-types', ResourceTypeSchema.options);
}

export function parseDepTypes(value: string | undefined): ReferenceType[] {
  return parseEnumCsv(value, ReferenceTypeSchema, '--dep-types', ReferenceTypeSchema.options);
}

export function parseDepth(value: string | undefined, fallback: number): number {
  if (value === undefined) return fallback;
  if (!/^\d+$/.test(value.trim()) || Number(value) < 1) {
    throw new InvalidArgumentError(`Invalid --depth '${value}' (expected a positive integer)`);
  }
  return Number(value);
}

export function parseFormat(value: string | undefined, fallback: OutputFormat): OutputFormat {
  if (value === undefined) return fallback;
  const parsed = OutputFormatSchema.safeParse(value);
  if (!parsed.success) {
    const allowed = OutputFormatSchema.options.join(', ');
    throw new InvalidArgumentError(`Invalid --format '${value}' (expected one of: ${allowed})`);
  }
  return parsed.data;
}

export function requireComponent(value: string | undefined): string {
  const component = value?.trim();
  if (!component) throw new InvalidArgumentError('Missing required option --component <notation>');
  return component;
}
