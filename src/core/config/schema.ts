/**
 * Schema for the settings of one comparison.
 */
import { z } from 'zod';

/** Distance metric used by the similarity oracle. */
export const DistanceMetricSchema = z.enum(['euclidean', 'cosine']);

/** Settings consumed by the core. Supplied by the caller, never read from the environment. */
export const DiffConfigSchema = z.object({
  /** Ancestor context size of each gram */
  p: z.number().int().positive().default(2),
  /** Sibling context size of each gram (the node's own label included) */
  q: z.number().int().positive().default(3),
  /** Feature vector dimension, identical for both trees */
  dimension: z.number().int().positive().default(15),
  /** Largest distance at which two nodes may still be matched */
  threshold: z.number().min(0).default(0.5),
  metric: DistanceMetricSchema.default('euclidean'),
  /** Ranked candidates inspected per old node in the top-down pass */
  maxCandidates: z.number().int().positive().default(64),
  /** Largest subtree the exact-content recovery pass will match */
  maxRecoverySize: z.number().int().min(0).default(1),
});

export type DiffConfig = z.infer<typeof DiffConfigSchema>;
export type DiffConfigInput = z.input<typeof DiffConfigSchema>;
