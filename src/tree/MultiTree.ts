/**
 * MultiTree — Cross-sample abundance tree.
 * ----------------------------------------------------------------------------
 * Merges the shaped trees of several samples into one tree whose nodes
 * hold a vector per attribute, one slot per sample. A taxon is present if
 * any sample accumulated reads in it: the tree is the union of the
 * per-sample trees, never their intersection.
 *
 * The inputs are the outputs of shaped (and possibly pruned) TaxTrees, so
 * growth here only merges; nothing is re-accumulated.
 *
 * @module tree/MultiTree
 */

import { NO_SCORE } from '../core/types';
import type { TaxId, Sample, Score, TaxonomyGraph } from '../core/types';
import { resolveFilter, rootInBranch, nodeInBranch, withinDepth, descendsBelow } from './filter';
import type { ResolvedFilter } from './filter';
import type { MultiTaxonNode, MultiTreeInput, TaxaFilter, TaxonItem, TreeVisitor } from './types';

type PerSample<V> = ReadonlyMap<Sample, ReadonlyMap<TaxId, V>>;

/**
 * @example
 * ```typescript
 * const multi = MultiTree.grow(taxonomy, ['gut', 'soil'], { abundances, accs, scores });
 * const items = multi.toItems(taxonomy);
 * ```
 */
export class MultiTree {
  /** Sample order shared by every node vector */
  readonly samples: readonly Sample[];
  /** Absent when no sample has accumulated reads at the taxonomy root */
  readonly root: MultiTaxonNode | undefined;

  private constructor(samples: readonly Sample[], root: MultiTaxonNode | undefined) {
    this.samples = samples;
    this.root = root;
  }

  // ==========================================================================
  // Growth
  // ==========================================================================

  /**
   * Build the merged tree from per-sample counts, accumulated counts and
   * scores.
   *
   * A whole input left out defaults per sample to a single read at the
   * root (counts, accs) or to no scores. A sample missing from a supplied
   * input is read as empty. Callers must key every input by the same
   * samples as `samples`; a mismatch is not detected.
   */
  static grow(taxonomy: TaxonomyGraph, samples: readonly Sample[], input?: MultiTreeInput): MultiTree {
    const single: ReadonlyMap<TaxId, number> = new Map([[taxonomy.root, 1]]);
    const fallback = new Map(samples.map((sample): [Sample, ReadonlyMap<TaxId, number>] => [sample, single]));

    const context: GrowContext = {
      taxonomy,
      samples,
      abundances: input?.abundances ?? fallback,
      accs: input?.accs ?? fallback,
      scores: input?.scores ?? new Map(),
    };

    return new MultiTree(samples, growNode(context, taxonomy.root, []));
  }

  // ==========================================================================
  // Export
  // ==========================================================================

  /**
   * Pre-order traversal for exporters, bounded like TaxTree.getTaxa.
   */
  walk<T>(taxonomy: TaxonomyGraph, visit: TreeVisitor<T>, filter?: TaxaFilter): void {
    if (this.root) {
      const resolved = resolveFilter(filter);
      walkNode(this.root, 0, rootInBranch(resolved), undefined, taxonomy, visit, resolved);
    }
  }

  /**
   * One row per node, in pre-order.
   *
   * Without `sampleIndexes` a row holds acc, count and score for every
   * sample, then rank and name. With them, it holds only the counts of
   * those samples, in the order given.
   */
  toItems(taxonomy: TaxonomyGraph, sampleIndexes?: readonly number[]): TaxonItem[] {
    const items: TaxonItem[] = [];
    const indexes = sampleIndexes ?? [];

    this.walk<undefined>(taxonomy, (node) => {
      const row: Array<number | string> = [];
      if (indexes.length > 0) {
        for (const index of indexes) {
          row.push(node.counts[index]);
        }
      } else {
        for (let i = 0; i < this.samples.length; i++) {
          row.push(node.accs[i], node.counts[i], node.scores[i]);
        }
        row.push(node.rank, node.name);
      }
      items.push({ taxid: node.taxid, row });
      return undefined;
    });

    return items;
  }

  /** Number of nodes */
  size(): number {
    return this.root ? countNodes(this.root) : 0;
  }

  /**
   * Compact text form, e.g. `1[5,0]->(2[3,1],)`. Nodes whose counts are
   * all below `minCounts` are not printed but still frame the structure.
   */
  render(minCounts = 1): string {
    return this.root ? renderNode(this.root, minCounts) : '';
  }
}

// ============================================================================
// Recursive helpers
// ============================================================================

interface GrowContext {
  taxonomy: TaxonomyGraph;
  samples: readonly Sample[];
  abundances: PerSample<number>;
  accs: PerSample<number>;
  scores: PerSample<Score>;
}

function growNode(context: GrowContext, taxid: TaxId, path: readonly TaxId[]): MultiTaxonNode | undefined {
  const { taxonomy, samples } = context;

  const accs = samples.map((sample) => context.accs.get(sample)?.get(taxid) ?? 0);
  if (!accs.some((acc) => acc !== 0)) return undefined;

  const node: MultiTaxonNode = {
    taxid,
    rank: taxonomy.rankOf(taxid),
    counts: samples.map((sample) => context.abundances.get(sample)?.get(taxid) ?? 0),
    accs,
    scores: samples.map((sample) => context.scores.get(sample)?.get(taxid) ?? NO_SCORE),
    children: new Map(),
  };

  const childPath = [...path, taxid];
  for (const child of taxonomy.childrenOf(taxid)) {
    if (childPath.includes(child)) continue;
    const grown = growNode(context, child, childPath);
    if (grown) {
      node.children.set(child, grown);
    }
  }
  return node;
}

function walkNode<T>(
  node: MultiTaxonNode,
  depth: number,
  parentInBranch: boolean,
  parent: T | undefined,
  taxonomy: TaxonomyGraph,
  visit: TreeVisitor<T>,
  filter: ResolvedFilter,
): void {
  const inBranch = nodeInBranch(filter, node.taxid, parentInBranch);

  let current = parent;
  if (inBranch && withinDepth(filter, depth)) {
    current = visit(
      {
        taxid: node.taxid,
        name: taxonomy.nameOf(node.taxid),
        rank: node.rank,
        depth,
        counts: node.counts,
        accs: node.accs,
        scores: node.scores,
        hasChildren: node.children.size > 0,
      },
      parent,
    );
  }

  if (!descendsBelow(filter, depth)) return;
  for (const child of node.children.values()) {
    walkNode(child, depth + 1, inBranch, current, taxonomy, visit, filter);
  }
}

function countNodes(node: MultiTaxonNode): number {
  let count = 1;
  for (const child of node.children.values()) {
    count += countNodes(child);
  }
  return count;
}

function renderNode(node: MultiTaxonNode, minCounts: number): string {
  const head = Math.max(...node.counts) >= minCounts
    ? node.taxid + '[' + node.counts.join(',') + ']'
    : '';
  if (node.children.size === 0) return head + ',';

  const children = Array.from(node.children.values(), (child) => renderNode(child, minCounts));
  return head + '->(' + children.join('') + ')';
}
