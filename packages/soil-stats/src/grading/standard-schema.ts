/**
 * Grading Standard File Schema
 *
 * Zod schema for standard files (JSON or YAML):
 *
 * ```yaml
 * id: jiangsu
 * name: 江苏分级
 * description: ...
 * attributes:
 *   OM:
 *     name: 有机质
 *     unit: g/kg
 *     reverse_display: true
 *     land_filter: none
 *     levels:
 *       - [10, 5级, 低]
 *       - [inf, 1级, 高]
 * ```
 *
 * A threshold may be a number or one of the strings "inf", "+inf",
 * "Infinity". The legacy land filter spelling `cultivated_garden` is accepted.
 */

import { z } from 'zod';
import type { LandFilter } from '../core/types/grading.js';

const INFINITY_SPELLINGS = ['inf', '+inf', 'Infinity', '+Infinity'] as const;

export const thresholdSchema = z
  .union([z.number(), z.enum(INFINITY_SPELLINGS)])
  .transform((value) => (typeof value === 'number' ? value : Number.POSITIVE_INFINITY));

export const levelSchema = z.tuple([thresholdSchema, z.string().min(1), z.string()]);

export const landFilterSchema = z
  .enum(['none', 'cultivated_and_garden', 'paddy_only', 'cultivated_only', 'cultivated_garden'])
  .default('none')
  .transform((value): LandFilter => (value === 'cultivated_garden' ? 'cultivated_and_garden' : value));

export const attributeConfigSchema = z.object({
  name: z.string().min(1),
  unit: z.string().default(''),
  reverse_display: z.boolean().default(false),
  land_filter: landFilterSchema,
  levels: z.array(levelSchema).min(1, 'at least one level is required'),
});

export const gradingStandardFileSchema = z.object({
  id: z.string().regex(/^[A-Za-z0-9_-]+$/, 'id may only contain letters, digits, "_" and "-"'),
  name: z.string().min(1),
  description: z.string().default(''),
  attributes: z
    .record(attributeConfigSchema)
    .refine((attributes) => Object.keys(attributes).length > 0, 'at least one attribute is required'),
});

export type GradingStandardFile = z.infer<typeof gradingStandardFileSchema>;
export type AttributeConfigFile = z.infer<typeof attributeConfigSchema>;
