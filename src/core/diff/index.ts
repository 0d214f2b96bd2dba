/**
 * Edit script and comparison exports.
 */
export { diffTerms } from './differ.js';
export { buildEditScript, summarizeEditScript } from './edit-script.js';
export type {
  EditOperation,
  EditOperationType,
  EditSummary,
  DiffOptions,
  DiffResult,
} from './types.js';
