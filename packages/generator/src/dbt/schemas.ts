// Zod schemas for the parts of dbt's manifest.json and catalog.json we read

import { z } from 'zod';

// ── manifest.json ───────────────────────────────────────────────────

export const lookerColumnMetaSchema = z.object({
  label: z.string().optional(),
  group_label: z.string().optional(),
  hidden: z.boolean().optional(),
  value_format_name: z.string().optional(),
  primary_key: z.boolean().optional(),
});

export const constraintSchema = z.object({
  type: z.string(),
});

export const manifestColumnSchema = z.object({
  name: z.string().min(1),
  description: z.string().nullish(),
  data_type: z.string().nullish(),
  meta: z
    .object({
      looker: lookerColumnMetaSchema.optional(),
    })
    .optional(),
  constraints: z.array(constraintSchema).optional(),
});

export const manifestNodeSchema = z.object({
  unique_id: z.string().min(1),
  name: z.string().min(1),
  resource_type: z.string(),
  path: z.string().default(''),
  relation_name: z.string().nullish(),
  description: z.string().nullish(),
  tags: z.array(z.string()).default([]),
  version: z.union([z.string(), z.number()]).nullish(),
  columns: z.record(z.string(), manifestColumnSchema).default({}),
  constraints: z
    .array(
      z.object({
        type: z.string(),
        columns: z.array(z.string()).optional(),
      }),
    )
    .optional(),
});

export const manifestSchema = z.object({
  nodes: z.record(z.string(), manifestNodeSchema),
});

// ── catalog.json ────────────────────────────────────────────────────

export const catalogColumnSchema = z.object({
  name: z.string().min(1),
  type: z.string().nullish(),
  comment: z.string().nullish(),
  index: z.number().optional(),
});

export const catalogNodeSchema = z.object({
  unique_id: z.string().optional(),
  columns: z.record(z.string(), catalogColumnSchema).default({}),
});

export const catalogSchema = z.object({
  nodes: z.record(z.string(), catalogNodeSchema),
});

// ── Types ───────────────────────────────────────────────────────────

export type LookerColumnMeta = z.infer<typeof lookerColumnMetaSchema>;
export type ManifestColumn = z.infer<typeof manifestColumnSchema>;
export type ManifestNode = z.infer<typeof manifestNodeSchema>;
export type Manifest = z.infer<typeof manifestSchema>;
export type CatalogColumn = z.infer<typeof catalogColumnSchema>;
export type CatalogNode = z.infer<typeof catalogNodeSchema>;
export type Catalog = z.infer<typeof catalogSchema>;
