/**
 * Sample Pipeline — Per-sample tree building and cross-sample merge.
 * ----------------------------------------------------------------------------
 * Every sample follows the same three steps:
 *   Grow → Shape → Prune
 *
 * Samples share nothing but the read-only taxonomy, so they can be built
 * independently; merging is the single fan-in step once all are done.
 *
 * @module pipeline/buildTrees
 */

import type { Sample, Abundances, Scores, TaxId, Score, TaxonomyGraph } from '../core/types';
import { TaxTree } from '../tree/TaxTree';
import { MultiTree } from '../tree/MultiTree';
import type { PruneOptions } from '../tree/types';

/**
 * Reads assigned to one sample.
 */
export interface SampleInput {
  abundances?: Abundances;
  scores?: Scores;
}

export interface SampleTreeOptions extends PruneOptions {
  /** Skip pruning and keep the shaped tree as is (default: false) */
  skipPrune?: boolean;
}

/**
 * Grow, shape and prune the tree of one sample.
 *
 * Pruning runs unless `skipPrune` is set; with the defaults it only drops
 * leaves without direct counts.
 */
export function buildSampleTree(
  taxonomy: TaxonomyGraph,
  input: SampleInput,
  options?: SampleTreeOptions,
): TaxTree {
  const tree = TaxTree.grow(taxonomy, input.abundances, input.scores);
  tree.shape();
  if (!options?.skipPrune) {
    tree.prune(options);
  }
  return tree;
}

/**
 * Merge shaped sample trees into one cross-sample tree.
 *
 * The sample order of the result is the iteration order of `trees`.
 */
export function mergeSampleTrees(taxonomy: TaxonomyGraph, trees: ReadonlyMap<Sample, TaxTree>): MultiTree {
  const abundances = new Map<Sample, Map<TaxId, number>>();
  const accs = new Map<Sample, Map<TaxId, number>>();
  const scores = new Map<Sample, Map<TaxId, Score>>();

  for (const [sample, tree] of trees) {
    const query = {
      counts: new Map<TaxId, number>(),
      accs: new Map<TaxId, number>(),
      scores: new Map<TaxId, Score>(),
    };
    tree.getTaxa(query);
    abundances.set(sample, query.counts);
    accs.set(sample, query.accs);
    scores.set(sample, query.scores);
  }

  return MultiTree.grow(taxonomy, Array.from(trees.keys()), { abundances, accs, scores });
}
