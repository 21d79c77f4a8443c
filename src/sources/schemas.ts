/**
 * Schemas for raw source records and cached collections
 *
 * Raw records are the per-file JSON documents of the source repositories.
 * Optional fields accept null; relation lists default to empty.
 */

import { z } from 'zod';

const optionalText = z.string().nullish().transform(value => value ?? undefined);
const optionalUrl = z.string().url().nullish().transform(value => value ?? undefined);
const idList = z.array(z.string()).nullish().transform(value => value ?? []);

export const rawRecordSchema = z.record(z.unknown());
export type RawRecord = z.infer<typeof rawRecordSchema>;

export const rawIndicatorSchema = z.object({
  id: z.string(),
  name: z.string(),
  description: optionalText,
  dimension: optionalText,
  category: optionalText,
  rationale: optionalText,
  url: optionalUrl,
  related_tools: idList
});

export const rawToolSchema = z.object({
  id: z.string(),
  name: z.string(),
  description: optionalText,
  url: optionalUrl,
  ring: optionalText,
  quadrant: optionalText,
  related_indicators: idList
});

export const rawDimensionSchema = z.object({
  id: z.string(),
  name: z.string(),
  description: optionalText,
  indicators: idList
});

const nullableText = z.string().nullable();

export const indicatorRecordSchema = z.object({
  id: z.string(),
  name: z.string(),
  description: nullableText,
  dimension: nullableText,
  category: nullableText,
  rationale: nullableText,
  url: nullableText,
  related_tools: z.array(z.string()),
  metadata: rawRecordSchema
});

export const toolRecordSchema = z.object({
  id: z.string(),
  name: z.string(),
  description: nullableText,
  url: nullableText,
  ring: nullableText,
  quadrant: nullableText,
  related_indicators: z.array(z.string()),
  metadata: rawRecordSchema
});

export const dimensionRecordSchema = z.object({
  id: z.string(),
  name: z.string(),
  description: nullableText,
  indicators: z.array(z.string()),
  metadata: rawRecordSchema
});

export const indicatorCollectionSchema = z.object({
  type: z.literal('IndicatorCollection'),
  items: z.array(indicatorRecordSchema),
  count: z.number().int().nonnegative()
});

export const toolCollectionSchema = z.object({
  type: z.literal('ToolCollection'),
  items: z.array(toolRecordSchema),
  count: z.number().int().nonnegative()
});

export const dimensionCollectionSchema = z.object({
  type: z.literal('DimensionCollection'),
  items: z.array(dimensionRecordSchema),
  count: z.number().int().nonnegative()
});

const entityTypeSchema = z.enum(['Indicator', 'Tool', 'Dimension']);

export const relationshipEdgeRecordSchema = z.object({
  source_id: z.string(),
  source_type: entityTypeSchema,
  target_id: z.string(),
  target_type: entityTypeSchema,
  relationship_type: z.enum(['measures', 'measured_by', 'contains', 'part_of'])
});

export const relationshipSnapshotSchema = z.object({
  type: z.literal('RelationshipGraph'),
  edges: z.array(relationshipEdgeRecordSchema),
  node_counts: z.object({
    indicators: z.number().int().nonnegative(),
    tools: z.number().int().nonnegative(),
    dimensions: z.number().int().nonnegative()
  }),
  edge_count: z.number().int().nonnegative()
});

/**
 * Entry of a GitHub contents API directory listing
 */
export const githubContentEntrySchema = z.object({
  name: z.string(),
  path: z.string(),
  type: z.string().optional()
});

export const githubDirectoryListingSchema = z.array(githubContentEntrySchema);
export type GitHubContentEntry = z.infer<typeof githubContentEntrySchema>;

/**
 * Flatten zod issues into one readable line
 */
export function describeIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => `${issue.path.length > 0 ? issue.path.join('.') : 'record'}: ${issue.message}`)
    .join('; ');
}
