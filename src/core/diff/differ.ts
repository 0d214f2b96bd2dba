/**
 * Compare two terms end to end: index, fingerprint, match, build the script.
 */
import type { Term } from '../term/types.js';
import { IndexedTree } from '../term/indexed-tree.js';
import { defaultLeafKey } from '../term/term.js';
import { pqGrams } from '../gram/pq-grams.js';
import { subtreeVectors } from '../gram/feature-vector.js';
import { matchTrees } from '../matcher/matcher.js';
import { resolveDiffConfig } from '../config/loader.js';
import { DiffAbortedError } from '../../utils/errors.js';
import { logger as rootLogger } from '../../utils/logger.js';
import { buildEditScript, summarizeEditScript } from './edit-script.js';
import type { DiffOptions, DiffResult } from './types.js';

const logger = rootLogger.child('diff');

function checkAborted(signal: AbortSignal | undefined, phase: string): void {
  if (signal?.aborted) {
    throw new DiffAbortedError(`Comparison aborted during ${phase}`, { phase });
  }
}

/**
 * Compute the edit script that turns `oldTerm` into `newTerm`.
 * Both terms must use the same category vocabulary.
 */
export function diffTerms<L>(
  oldTerm: Term<L>,
  newTerm: Term<L>,
  options: DiffOptions<L> = {}
): DiffResult<L> {
  const config = resolveDiffConfig(options.config);
  const leafKey = options.leafKey ?? defaultLeafKey;
  const { signal } = options;

  checkAborted(signal, 'indexing');
  const oldTree = new IndexedTree(oldTerm);
  const newTree = new IndexedTree(newTerm);

  checkAborted(signal, 'fingerprinting');
  const gramOptions = { p: config.p, q: config.q };
  const oldVectors = subtreeVectors(oldTree, pqGrams(oldTree, gramOptions), config.dimension);
  const newVectors = subtreeVectors(newTree, pqGrams(newTree, gramOptions), config.dimension);

  const { mapping, stats } = matchTrees(
    { oldTree, newTree, oldVectors, newVectors },
    {
      threshold: config.threshold,
      metric: config.metric,
      maxCandidates: config.maxCandidates,
      maxRecoverySize: config.maxRecoverySize,
      leafKey,
      signal,
    }
  );

  checkAborted(signal, 'edit script construction');
  const editScript = buildEditScript(oldTree, newTree, mapping, leafKey);
  const summary = summarizeEditScript(editScript);

  if (logger.isLevelEnabled('debug')) {
    logger.debug('Compared trees', {
      oldNodes: oldTree.size,
      newNodes: newTree.size,
      mapped: mapping.size,
      ...stats,
      ...summary,
    });
  }

  return {
    oldTree,
    newTree,
    editScript,
    summary,
    stats,
    ...(options.includeMapping ? { mapping: mapping.pairs() } : {}),
  };
}
