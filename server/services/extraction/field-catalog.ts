import { z } from 'zod';
import catalogJson from '../../../config/field-catalog.json';
import { ConfigurationError } from '../../errors';
import type { FieldCatalog, FieldSpec } from './types';

export const EXPECTED_FIELD_COUNT = 21;

const sectionSchema = z.enum(['assets', 'liabilities', 'fund-capital']);

const fieldSpecSchema = z.object({
  identifier: z.string().regex(/^[A-Z][A-Z0-9_]*$/, 'identifier must be upper-case'),
  ordinal: z.number().int().positive(),
  seriesCode: z.string().min(1),
  description: z.string().min(1),
  kind: z.enum(['period', 'value']),
  statement: z.enum(['balance-sheet', 'key-ratios']).nullable(),
  section: sectionSchema.nullable(),
  unit: z.enum(['SEK million', 'SEK billion']).nullable(),
  hints: z.array(z.string().min(1)),
  expectedRange: z.object({
    min: z.number().optional(),
    max: z.number().optional(),
  }).optional(),
});

const catalogSchema = z.object({
  version: z.number().int().positive(),
  defaultSection: sectionSchema.nullable(),
  sectionMarkers: z.object({
    assets: z.array(z.string().min(1)),
    liabilities: z.array(z.string().min(1)),
    'fund-capital': z.array(z.string().min(1)),
  }),
  fields: z.array(fieldSpecSchema).min(1),
}).superRefine((catalog, ctx) => {
  const identifiers = new Set<string>();
  catalog.fields.forEach((field, index) => {
    if (identifiers.has(field.identifier)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['fields', index, 'identifier'], message: `duplicate identifier ${field.identifier}` });
    }
    identifiers.add(field.identifier);
    if (field.ordinal !== index + 1) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['fields', index, 'ordinal'], message: `ordinal ${field.ordinal} out of sequence, expected ${index + 1}` });
    }
    if (field.kind === 'value' && field.hints.length === 0) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['fields', index, 'hints'], message: 'value fields need at least one hint' });
    }
  });
  if (catalog.fields.filter(f => f.kind === 'period').length > 1) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['fields'], message: 'at most one period field is allowed' });
  }
});

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

export function loadFieldCatalog(raw: unknown, expectedFieldCount?: number): FieldCatalog {
  const parsed = catalogSchema.safeParse(raw);
  if (!parsed.success) {
    throw ConfigurationError.fromZodError(parsed.error, 'Field catalog');
  }
  if (expectedFieldCount !== undefined && parsed.data.fields.length !== expectedFieldCount) {
    throw new ConfigurationError(
      `Field catalog must contain ${expectedFieldCount} fields, found ${parsed.data.fields.length}`
    );
  }
  return deepFreeze(parsed.data);
}

let defaultCatalog: FieldCatalog | null = null;

export function getFieldCatalog(): FieldCatalog {
  if (!defaultCatalog) {
    defaultCatalog = loadFieldCatalog(catalogJson, EXPECTED_FIELD_COUNT);
  }
  return defaultCatalog;
}

export function valueFields(catalog: FieldCatalog): FieldSpec[] {
  return catalog.fields.filter(field => field.kind === 'value');
}

export function findField(catalog: FieldCatalog, identifier: string): FieldSpec | undefined {
  return catalog.fields.find(field => field.identifier === identifier);
}

export function isWithinExpectedRange(field: FieldSpec, value: number): boolean {
  const range = field.expectedRange;
  if (!range) return true;
  if (range.min !== undefined && value < range.min) return false;
  if (range.max !== undefined && value > range.max) return false;
  return true;
}
