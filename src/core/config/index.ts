/**
 * Configuration exports.
 */
export { DiffConfigSchema, DistanceMetricSchema } from './schema.js';
export type { DiffConfig, DiffConfigInput } from './schema.js';
export { getDefaultDiffConfig, resolveDiffConfig } from './loader.js';
