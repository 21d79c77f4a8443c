/**
 * Conversion of raw source records into typed entities
 *
 * Records without an id (taken from `id`, else the JSON-LD `@id`) or without a
 * name are skipped with a warning. Records whose fields have the wrong shape
 * are dropped and reported. The builder only ever sees what survives here.
 */

import type { z } from 'zod';
import type { Dimension, Indicator, Tool } from '../core/types.js';
import {
  describeIssues,
  rawDimensionSchema,
  rawIndicatorSchema,
  rawRecordSchema,
  rawToolSchema,
  type RawRecord
} from './schemas.js';

/**
 * Outcome of parsing one batch of raw records
 */
export interface ParseReport<T> {
  entities: T[];
  /** One message per dropped malformed record */
  errors: string[];
  /** Records skipped for lacking an id or a name */
  skipped: number;
}

type EntityLabel = 'indicator' | 'tool' | 'dimension';

export function parseIndicators(records: unknown[]): ParseReport<Indicator> {
  return parseRecords(records, 'indicator', rawIndicatorSchema, (parsed, raw) => ({
    id: parsed.id,
    name: parsed.name,
    description: parsed.description,
    dimension: parsed.dimension,
    category: parsed.category,
    rationale: parsed.rationale,
    url: parsed.url,
    relatedTools: parsed.related_tools,
    metadata: raw
  }));
}

export function parseTools(records: unknown[]): ParseReport<Tool> {
  return parseRecords(records, 'tool', rawToolSchema, (parsed, raw) => ({
    id: parsed.id,
    name: parsed.name,
    description: parsed.description,
    url: parsed.url,
    ring: parsed.ring,
    quadrant: parsed.quadrant,
    relatedIndicators: parsed.related_indicators,
    metadata: raw
  }));
}

export function parseDimensions(records: unknown[]): ParseReport<Dimension> {
  return parseRecords(records, 'dimension', rawDimensionSchema, (parsed, raw) => ({
    id: parsed.id,
    name: parsed.name,
    description: parsed.description,
    indicators: parsed.indicators,
    metadata: raw
  }));
}

function parseRecords<O, T>(
  records: unknown[],
  label: EntityLabel,
  schema: z.ZodType<O, z.ZodTypeDef, unknown>,
  toEntity: (parsed: O, raw: RawRecord) => T
): ParseReport<T> {
  console.log(`🔎 Validating ${records.length} ${label}s...`);

  const report: ParseReport<T> = { entities: [], errors: [], skipped: 0 };

  for (const record of records) {
    const raw = rawRecordSchema.safeParse(record);
    if (!raw.success) {
      report.errors.push(`Validation error for ${label} unknown: record is not a JSON object`);
      continue;
    }

    const id = raw.data.id || raw.data['@id'];
    const name = raw.data.name;
    if (!id || !name) {
      console.warn(`⚠️ Skipping ${label} without id or name: ${JSON.stringify(raw.data)}`);
      report.skipped++;
      continue;
    }

    const parsed = schema.safeParse({ ...raw.data, id });
    if (!parsed.success) {
      const message = `Validation error for ${label} ${String(id)}: ${describeIssues(parsed.error)}`;
      console.error(`❌ ${message}`);
      report.errors.push(message);
      continue;
    }

    report.entities.push(toEntity(parsed.data, raw.data));
  }

  if (report.errors.length > 0) {
    console.warn(`⚠️ Found ${report.errors.length} ${label} validation errors`);
  }
  console.log(`✅ Successfully validated ${report.entities.length} ${label}s`);

  return report;
}
