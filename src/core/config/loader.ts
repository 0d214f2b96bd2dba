/**
 * Resolve caller-supplied settings against the schema defaults.
 */
import { DiffConfigSchema, type DiffConfig, type DiffConfigInput } from './schema.js';
import { ConfigError, ErrorCodes } from '../../utils/errors.js';

/**
 * Default configuration values.
 */
export function getDefaultDiffConfig(): DiffConfig {
  return DiffConfigSchema.parse({});
}

/**
 * Merge partial settings with defaults. Invalid settings fail fast.
 */
export function resolveDiffConfig(partial: DiffConfigInput = {}): DiffConfig {
  const result = DiffConfigSchema.safeParse(partial);
  if (result.success) {
    return result.data;
  }

  const issues = result.error.issues.map((issue) => ({
    path: issue.path.map(String).join('.'),
    message: issue.message,
  }));
  const summary = issues.map((issue) => `${issue.path || '(root)'}: ${issue.message}`).join('; ');

  throw new ConfigError(ErrorCodes.INVALID_CONFIG, `Invalid diff configuration: ${summary}`, {
    issues,
  });
}
