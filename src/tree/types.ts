/**
 * Tree Types — Node records, options and traversal contracts.
 * ----------------------------------------------------------------------------
 * Both tree kinds share one shape: a node keyed by taxid owning a Map of
 * child nodes. Single-sample nodes carry scalar counts; multi-sample nodes
 * carry one slot per sample, in the sample order of their tree.
 *
 * @module tree/types
 */

import type { TaxId, Score, Sample, Logger } from '../core/types';
import type { Rank } from '../rank/Rank';

// ============================================================================
// Nodes
// ============================================================================

/**
 * Node of a single-sample tree.
 */
export interface TaxonNode {
  readonly taxid: TaxId;
  /** Reads assigned directly to this taxon (not to any descendant) */
  counts: number;
  readonly rank: Rank;
  /** NO_SCORE when no score is available */
  score: Score;
  /** Own counts plus the accumulated counts of all children; 0 until shape() */
  acc: number;
  readonly children: Map<TaxId, TaxonNode>;
}

/**
 * Node of a multi-sample tree. Every array has one slot per sample.
 */
export interface MultiTaxonNode {
  readonly taxid: TaxId;
  readonly rank: Rank;
  readonly counts: readonly number[];
  readonly accs: readonly number[];
  readonly scores: readonly Score[];
  readonly children: Map<TaxId, MultiTaxonNode>;
}

// ============================================================================
// Pruning
// ============================================================================

export interface PruneOptions {
  /** Leaves with fewer direct counts are pruned (default: 1) */
  minTaxa?: number;
  /** Finest rank kept in the tree (default: no rank floor) */
  minRank?: Rank;
  /** Fold pruned counts into the parent instead of dropping them (default: true) */
  collapse?: boolean;
  /** Log every leaf decision (default: false) */
  debug?: boolean;
  /** Sink for debug lines (default: console.log) */
  logger?: Logger;
}

// ============================================================================
// Extraction
// ============================================================================

/**
 * Depth and subtree bounds shared by extraction and export traversal.
 *
 * Depth counts the root as 0. Both bounds are inclusive; 0 disables a bound.
 */
export interface TaxaFilter {
  /** Shallowest depth recorded (default: 0, no bound) */
  mindepth?: number;
  /** Deepest depth recorded and visited (default: 0, no bound) */
  maxdepth?: number;
  /**
   * Roots of the subtrees to include. Empty (default) includes everything
   * not excluded.
   */
  include?: ReadonlySet<TaxId>;
  /** Roots of the subtrees to exclude; wins over include for the same taxid */
  exclude?: ReadonlySet<TaxId>;
}

/**
 * Bounds plus an optional single rank: which taxa a query selects.
 */
export interface TaxaSelection extends TaxaFilter {
  /** Record only taxa at this rank */
  justLevel?: Rank;
}

/**
 * Extraction request. Each output map is optional: only the ones supplied
 * are filled in.
 */
export interface TaxaQuery extends TaxaSelection {
  counts?: Map<TaxId, number>;
  accs?: Map<TaxId, number>;
  /** Only scored taxa are recorded */
  scores?: Map<TaxId, Score>;
  ranks?: Map<TaxId, Rank>;
}

// ============================================================================
// Lineage
// ============================================================================

export interface LineageWarning {
  taxid: TaxId;
  /** 'unknown': absent from the parents map; 'untraceable': absent from the tree */
  reason: 'unknown' | 'untraceable';
  message: string;
}

export interface LineageResult {
  /** Root-to-taxon path for every taxid located */
  lineages: Map<TaxId, TaxId[]>;
  warnings: LineageWarning[];
}

export interface LineageOptions {
  /** Sink for warnings (default: console.warn) */
  logger?: Logger;
}

// ============================================================================
// Traversal
// ============================================================================

/**
 * What a pre-order traversal reports for each node. Single-sample trees
 * report one-slot arrays.
 */
export interface NodeVisit {
  taxid: TaxId;
  name: string;
  rank: Rank;
  /** Depth below the root (root = 0) */
  depth: number;
  counts: readonly number[];
  accs: readonly number[];
  scores: readonly Score[];
  hasChildren: boolean;
}

/**
 * Called once per visited node, parents before children. The value it
 * returns is handed to the node's children as their `parent`; nodes
 * filtered out of a traversal pass their own parent through.
 */
export type TreeVisitor<T> = (node: NodeVisit, parent: T | undefined) => T;

// ============================================================================
// Tabular export
// ============================================================================

/**
 * One row of tabular export.
 *
 * Full rows hold (acc, count, score) per sample followed by rank and name.
 * Restricted rows hold only the count of each requested sample.
 */
export interface TaxonItem {
  taxid: TaxId;
  row: Array<number | string>;
}

/**
 * Per-sample inputs of a multi-sample tree, keyed by sample name.
 */
export interface MultiTreeInput {
  abundances?: ReadonlyMap<Sample, ReadonlyMap<TaxId, number>>;
  accs?: ReadonlyMap<Sample, ReadonlyMap<TaxId, number>>;
  scores?: ReadonlyMap<Sample, ReadonlyMap<TaxId, Score>>;
}
