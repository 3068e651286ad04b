/**
 * TreeExporter — Generic hierarchical export of abundance trees.
 * ----------------------------------------------------------------------------
 * Turns either tree kind into plain nested records with per-sample
 * attributes, ready to be serialized by a visualization or table writer.
 * The concrete output format is the writer's business; this module only
 * fixes the attributes and how absent values are represented.
 *
 * Exported attributes per node:
 *   count       accumulated reads, per sample
 *   unassigned  reads assigned directly to the taxon, per sample
 *   tid, rank   taxid and rank name
 *   score       per-sample score, labelled after the scoring scheme
 *
 * @module export/TreeExporter
 */

import { isScored } from '../core/types';
import type { TaxId, Sample, Score, TaxonomyGraph } from '../core/types';
import type { Rank } from '../rank/Rank';
import { scoringDisplay } from '../scoring/Scoring';
import type { TaxaFilter, TreeVisitor } from '../tree/types';

// ============================================================================
// Display metadata
// ============================================================================

export type AttributeKey = 'count' | 'unassigned' | 'tid' | 'rank' | 'score';

export interface AttributeDescriptor {
  key: AttributeKey;
  /** Label shown to the reader */
  display: string;
  /** 'all' aggregates over descendants, 'node' is the node's own value */
  members?: 'all' | 'node';
  /** Single value shared by all samples */
  mono?: boolean;
  /** Link prefix completed with the attribute value */
  hrefBase?: string;
}

export interface DisplayMetadata {
  /** Attribute that sizes the nodes */
  magnitude: 'count';
  attributes: AttributeDescriptor[];
  datasets: Sample[];
  /** Samples that are raw inputs rather than derived from cross-analysis */
  rawSamples: number;
  color: {
    attribute: 'score';
    hueStart: number;
    hueEnd: number;
    valueStart: number;
    valueEnd: number;
  };
}

export interface DisplayMetadataOptions {
  samples: readonly Sample[];
  /** Number of raw samples (default: all samples) */
  rawSamples?: number;
  /** Scoring scheme; validated here */
  scoring: string;
  /** Lowest expected score (default: 0) */
  minScore?: number;
  /** Highest expected score (default: 1) */
  maxScore?: number;
}

const TAXONOMY_BROWSER = 'https://www.ncbi.nlm.nih.gov/Taxonomy/Browser/wwwtax.cgi?mode=Info&id=';

/**
 * Describe the attributes and datasets of an export.
 *
 * @throws ConfigurationError when the scoring scheme is unknown
 */
export function createDisplayMetadata(options: DisplayMetadataOptions): DisplayMetadata {
  const scoreLabel = scoringDisplay(options.scoring);

  return {
    magnitude: 'count',
    attributes: [
      { key: 'count', display: 'Count', members: 'all' },
      { key: 'unassigned', display: 'Unassigned', members: 'node' },
      { key: 'tid', display: 'TaxID', mono: true, hrefBase: TAXONOMY_BROWSER },
      { key: 'rank', display: 'Rank', mono: true },
      { key: 'score', display: scoreLabel },
    ],
    datasets: [...options.samples],
    rawSamples: options.rawSamples ?? options.samples.length,
    color: {
      attribute: 'score',
      hueStart: 0,
      hueEnd: 300,
      valueStart: options.minScore ?? 0,
      valueEnd: options.maxScore ?? 1,
    },
  };
}

// ============================================================================
// Node export
// ============================================================================

export interface ExportNode {
  name: string;
  taxid: TaxId;
  rank: Rank;
  /** Accumulated reads per sample */
  count: Array<number | undefined>;
  /** Direct reads per sample; absent when every sample has none */
  unassigned?: Array<number | undefined>;
  /** Undefined for unscored samples */
  score: Array<number | undefined>;
  children: ExportNode[];
}

export interface ExportOptions extends TaxaFilter {
  /** Represent zero counts as undefined (default: true) */
  omitZeros?: boolean;
  /**
   * Round scores to this many decimals (default: no rounding). Values
   * outside 0..100 are clamped to that range.
   */
  scoreDigits?: number;
}

/**
 * Anything offering the pre-order traversal contract of the trees.
 */
export interface ExportableTree {
  walk<T>(taxonomy: TaxonomyGraph, visit: TreeVisitor<T>, filter?: TaxaFilter): void;
}

// Range accepted by Number.prototype.toFixed
const MAX_SCORE_DIGITS = 100;

/**
 * Export a tree as nested records.
 *
 * Returns a list because depth or subtree filters may leave several
 * top-level nodes.
 *
 * @example
 * ```typescript
 * const [root] = exportTree(tree, taxonomy, { maxdepth: 3 });
 * ```
 */
export function exportTree(
  tree: ExportableTree,
  taxonomy: TaxonomyGraph,
  options?: ExportOptions,
): ExportNode[] {
  const omitZeros = options?.omitZeros ?? true;
  const scoreDigits = options?.scoreDigits;
  const digits = scoreDigits === undefined
    ? undefined
    : Math.min(MAX_SCORE_DIGITS, Math.max(0, Math.trunc(scoreDigits)));
  const roots: ExportNode[] = [];

  const countValue = (value: number): number | undefined => (omitZeros && value === 0 ? undefined : value);
  const scoreValue = (score: Score): number | undefined => {
    if (!isScored(score)) return undefined;
    return digits === undefined ? score : Number(score.toFixed(digits));
  };

  tree.walk<ExportNode>(
    taxonomy,
    (node, parent) => {
      const exported: ExportNode = {
        name: node.name,
        taxid: node.taxid,
        rank: node.rank,
        count: node.accs.map(countValue),
        score: node.scores.map(scoreValue),
        children: [],
      };
      if (node.counts.some((count) => count !== 0)) {
        exported.unassigned = node.counts.map(countValue);
      }

      (parent ? parent.children : roots).push(exported);
      return exported;
    },
    options,
  );

  return roots;
}
