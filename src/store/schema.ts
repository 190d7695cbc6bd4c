/**
 * 数据字典文件结构校验（zod）
 */

import { z } from "zod";

export const fieldRecordSchema = z.object({
  id: z.number().int().positive(),
  name: z.string().min(1),
  description: z.string(),
  category: z.string().min(1),
  encodingRef: z.number().int().positive().optional(),
  valueType: z.string().optional(),
  units: z.string().optional(),
  participants: z.number().int().nonnegative().optional(),
  notes: z.string().optional(),
});

export const encodingEntrySchema = z.object({
  code: z.union([z.number().int(), z.string().trim().min(1)]),
  label: z.string(),
});

export const encodingTableSchema = z.object({
  ref: z.number().int().positive(),
  title: z.string(),
  entries: z.array(encodingEntrySchema),
});

export const recommendedFieldSchema = z.object({
  fieldId: z.number().int().positive(),
  reason: z.string().optional(),
});

export const catalogueSchema = z.object({
  fields: z.array(fieldRecordSchema),
  encodings: z.array(encodingTableSchema).default([]),
  recommended: z.array(recommendedFieldSchema).default([]),
});

export type CatalogueInput = z.input<typeof catalogueSchema>;
