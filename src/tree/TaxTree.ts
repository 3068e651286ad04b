/**
 * TaxTree — Abundance tree of a single sample.
 * ----------------------------------------------------------------------------
 * Mirrors the taxonomy below the root and carries, for every taxon, the
 * reads assigned to it directly. The lifecycle is:
 *
 *   1. grow   → one node per reachable taxon, counts and scores looked up
 *   2. shape  → accumulate counts bottom-up, drop empty branches, score
 *               internal nodes from their children
 *   3. prune  → remove or collapse leaves under the thresholds
 *   4. query  → getTaxa, getLineage, walk (read-only from here on)
 *
 * Every operation is a single synchronous depth-first pass over the tree.
 *
 * @module tree/TaxTree
 */

import { NO_SCORE, isScored } from '../core/types';
import type { TaxId, Abundances, Scores, Parents, TaxonomyGraph } from '../core/types';
import { isFiner, isAtOrFiner } from '../rank/Rank';
import { weightedScore } from '../scoring/weightedScore';
import {
  resolveFilter,
  rootInBranch,
  nodeInBranch,
  withinDepth,
  descendsBelow,
} from './filter';
import type { ResolvedFilter } from './filter';
import type {
  TaxonNode,
  PruneOptions,
  TaxaFilter,
  TaxaQuery,
  LineageOptions,
  LineageResult,
  LineageWarning,
  TreeVisitor,
} from './types';

/**
 * Abundance tree of one sample.
 *
 * @example
 * ```typescript
 * const tree = TaxTree.grow(taxonomy, abundances, scores);
 * tree.shape();
 * tree.prune({ minTaxa: 10, minRank: 'genus' });
 *
 * const accs = new Map<TaxId, number>();
 * tree.getTaxa({ accs });
 * ```
 */
export class TaxTree {
  readonly root: TaxonNode;

  private constructor(root: TaxonNode) {
    this.root = root;
  }

  // ==========================================================================
  // Growth
  // ==========================================================================

  /**
   * Build the tree from the taxonomy root down.
   *
   * A taxid already on the path from the root is not grown again, so
   * self-references and back-edges in the taxonomy end that branch.
   * Without abundances the tree holds a single read at the root.
   */
  static grow(taxonomy: TaxonomyGraph, abundances?: Abundances, scores?: Scores): TaxTree {
    const counts: Abundances = abundances && abundances.size > 0
      ? abundances
      : new Map([[taxonomy.root, 1]]);
    const scoreOf: Scores = scores ?? new Map();

    return new TaxTree(growNode(taxonomy, counts, scoreOf, taxonomy.root, []));
  }

  // ==========================================================================
  // Shape & Prune
  // ==========================================================================

  /**
   * Accumulate counts bottom-up and drop branches that hold no reads.
   *
   * A node with no direct counts gets the acc-weighted average score of its
   * children; one with direct counts keeps its own. Running it again leaves
   * the tree unchanged.
   */
  shape(): void {
    shapeNode(this.root);
  }

  /**
   * Remove low-abundance or too-fine leaves, bottom-up.
   *
   * With `collapse` the pruned counts move into the parent, whose score
   * becomes the count-weighted average of both; without it the parent's
   * acc loses them. Only leaves are removed: a node keeps its place as long
   * as any child survives.
   *
   * @returns Whether the root still has children
   */
  prune(options?: PruneOptions): boolean {
    return pruneNode(this.root, {
      minTaxa: options?.minTaxa ?? 1,
      minRank: options?.minRank,
      collapse: options?.collapse ?? true,
      log: options?.debug ? (options.logger ?? console.log) : undefined,
    });
  }

  // ==========================================================================
  // Queries
  // ==========================================================================

  /**
   * Record the taxa within the query bounds into the supplied output maps.
   */
  getTaxa(query: TaxaQuery): void {
    const filter = resolveFilter(query);
    collectTaxa(this.root, 0, rootInBranch(filter), filter, query);
  }

  /**
   * Depth-first search for `target`, appending the path to it to `path`.
   *
   * Only nodes with children are pushed while searching; the target is
   * pushed once found as a child. Failed branches are popped back off.
   * The root itself is never found: callers handle it.
   */
  trace(target: TaxId, path: TaxId[]): boolean {
    return traceNode(this.root, target, path);
  }

  /**
   * Root-to-taxon lineage of every requested taxid.
   *
   * Taxids absent from `parents`, or present there but not in this tree,
   * are reported as warnings and left out of the result.
   */
  getLineage(parents: Parents, taxids: Iterable<TaxId>, options?: LineageOptions): LineageResult {
    const warn = options?.logger ?? console.warn;
    const lineages = new Map<TaxId, TaxId[]>();
    const warnings: LineageWarning[] = [];

    const report = (warning: LineageWarning): void => {
      warnings.push(warning);
      warn('[WARNING] ' + warning.message);
    };

    for (const taxid of taxids) {
      if (taxid === this.root.taxid) {
        lineages.set(taxid, [taxid]);
      } else if (!parents.has(taxid)) {
        report({
          taxid,
          reason: 'unknown',
          message: 'Discarded unknown taxid ' + taxid + ': missing in parents',
        });
      } else {
        const path: TaxId[] = [];
        if (this.trace(taxid, path)) {
          lineages.set(taxid, path);
        } else {
          report({
            taxid,
            reason: 'untraceable',
            message: 'Failed tracing of taxid ' + taxid + ': missing in tree',
          });
        }
      }
    }

    return { lineages, warnings };
  }

  /**
   * Pre-order traversal for exporters, bounded like getTaxa.
   */
  walk<T>(taxonomy: TaxonomyGraph, visit: TreeVisitor<T>, filter?: TaxaFilter): void {
    const resolved = resolveFilter(filter);
    walkNode(this.root, 0, rootInBranch(resolved), undefined, taxonomy, visit, resolved);
  }

  /** Sum of direct counts over all nodes */
  totalCounts(): number {
    let total = 0;
    forEachNode(this.root, (node) => {
      total += node.counts;
    });
    return total;
  }

  /** Number of nodes */
  size(): number {
    let size = 0;
    forEachNode(this.root, () => {
      size++;
    });
    return size;
  }

  /**
   * Compact text form, e.g. `1[5]->(2[3],562[1],)`. Counts below
   * `minCounts` are not printed, but their taxa still frame the structure.
   */
  render(minCounts = 1): string {
    return renderNode(this.root, minCounts);
  }
}

// ============================================================================
// Recursive helpers
// ============================================================================

function growNode(
  taxonomy: TaxonomyGraph,
  abundances: Abundances,
  scores: Scores,
  taxid: TaxId,
  path: readonly TaxId[],
): TaxonNode {
  const node: TaxonNode = {
    taxid,
    counts: abundances.get(taxid) ?? 0,
    rank: taxonomy.rankOf(taxid),
    score: scores.get(taxid) ?? NO_SCORE,
    acc: 0,
    children: new Map(),
  };

  const childPath = [...path, taxid];
  for (const child of taxonomy.childrenOf(taxid)) {
    if (childPath.includes(child)) continue;
    node.children.set(child, growNode(taxonomy, abundances, scores, child, childPath));
  }
  return node;
}

function shapeNode(node: TaxonNode): void {
  node.acc = node.counts;
  for (const [taxid, child] of node.children) {
    shapeNode(child);
    if (child.acc === 0) {
      node.children.delete(taxid);
    } else {
      node.acc += child.acc;
    }
  }

  // Empty branches keep NO_SCORE
  if (node.counts === 0 && node.acc > 0) {
    node.score = weightedScore(
      Array.from(node.children.values(), (child) => ({ score: child.score, weight: child.acc })),
    );
  }
}

interface PruneSettings {
  minTaxa: number;
  minRank: PruneOptions['minRank'];
  collapse: boolean;
  log?: (message: string) => void;
}

function pruneNode(node: TaxonNode, settings: PruneSettings): boolean {
  const { minTaxa, minRank, collapse, log } = settings;

  for (const [taxid, child] of node.children) {
    if (child.children.size > 0 && pruneNode(child, settings)) {
      log?.('Keeping branch ' + taxid + ', counts=' + child.counts);
      continue;
    }

    const candidate = child.counts < minTaxa
      || (minRank !== undefined && (isFiner(child.rank, minRank) || isAtOrFiner(node.rank, minRank)));
    if (!candidate) {
      log?.('Keeping leaf ' + taxid + ', counts=' + child.counts);
      continue;
    }

    if (collapse) {
      const collapsed = node.counts + child.counts;
      if (collapsed > 0) {
        node.score = weightedScore([
          { score: node.score, weight: node.counts },
          { score: child.score, weight: child.counts },
        ]);
        node.counts = collapsed;
      }
    } else {
      node.acc = node.acc > child.counts ? node.acc - child.counts : 0;
    }

    if (child.counts > 0) {
      log?.('Pruning leaf ' + taxid + ', counts=' + child.counts);
    }
    node.children.delete(taxid);
  }

  return node.children.size > 0;
}

function collectTaxa(
  node: TaxonNode,
  depth: number,
  parentInBranch: boolean,
  filter: ResolvedFilter,
  query: TaxaQuery,
): void {
  const inBranch = nodeInBranch(filter, node.taxid, parentInBranch);

  if (inBranch
      && withinDepth(filter, depth)
      && (query.justLevel === undefined || node.rank === query.justLevel)) {
    query.counts?.set(node.taxid, node.counts);
    query.accs?.set(node.taxid, node.acc);
    if (isScored(node.score)) {
      query.scores?.set(node.taxid, node.score);
    }
    query.ranks?.set(node.taxid, node.rank);
  }

  if (!descendsBelow(filter, depth)) return;
  for (const child of node.children.values()) {
    collectTaxa(child, depth + 1, inBranch, filter, query);
  }
}

function traceNode(node: TaxonNode, target: TaxId, path: TaxId[]): boolean {
  if (node.children.size === 0) return false;

  path.push(node.taxid);
  if (node.children.has(target)) {
    path.push(target);
    return true;
  }
  for (const child of node.children.values()) {
    if (traceNode(child, target, path)) return true;
  }
  path.pop();
  return false;
}

function walkNode<T>(
  node: TaxonNode,
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
        counts: [node.counts],
        accs: [node.acc],
        scores: [node.score],
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

function forEachNode(node: TaxonNode, fn: (node: TaxonNode) => void): void {
  fn(node);
  for (const child of node.children.values()) {
    forEachNode(child, fn);
  }
}

function renderNode(node: TaxonNode, minCounts: number): string {
  const head = node.counts >= minCounts ? node.taxid + '[' + node.counts + ']' : '';
  if (node.children.size === 0) return head + ',';

  const children = Array.from(node.children.values(), (child) => renderNode(child, minCounts));
  return head + '->(' + children.join('') + ')';
}
