/**
 * taxotree — Taxonomic abundance trees for per-read classification results.
 *
 * FOUR SYSTEMS:
 *
 * 1. RANKS & SCORING — Ordered taxonomic levels and score helpers
 *    - Rank ordering, parsing of dump spellings, rank grouping
 *    - Scoring schemes and the weighted score average
 *
 * 2. TREES — Built once from a read-only TaxonomyGraph
 *    - TaxTree: grow → shape → prune → getTaxa / getLineage / walk
 *    - MultiTree: union merge of shaped sample trees, tabular items
 *
 * 3. PIPELINE — buildSampleTree per sample, mergeSampleTrees as the fan-in
 *
 * 4. EXPORT & REPORT — Generic nested export with display metadata, and
 *    a console reporter
 *
 * @module taxotree
 */

export { ROOT, NO_SCORE, isScored, ConfigurationError } from './core';
export type {
  TaxId,
  Sample,
  Score,
  Abundances,
  Scores,
  Parents,
  Logger,
  TaxonomyGraph,
} from './core';

export {
  RANKS,
  MAIN_RANKS,
  compareRanks,
  isCoarser,
  isFiner,
  isAtOrFiner,
  parseRank,
  ranksToTaxLevels,
  type Rank,
} from './rank';

export {
  SCORINGS,
  SCORING_DISPLAY,
  parseScoring,
  scoringDisplay,
  weightedScore,
  type Scoring,
  type ScoreTerm,
} from './scoring';

export { InMemoryTaxonomy, type TaxonRecord, type InMemoryTaxonomyOptions } from './taxonomy';

export { TaxTree, MultiTree } from './tree';
export type {
  TaxonNode,
  MultiTaxonNode,
  PruneOptions,
  TaxaFilter,
  TaxaSelection,
  TaxaQuery,
  LineageWarning,
  LineageResult,
  LineageOptions,
  NodeVisit,
  TreeVisitor,
  TaxonItem,
  MultiTreeInput,
} from './tree';

export { buildSampleTree, mergeSampleTrees, type SampleInput, type SampleTreeOptions } from './pipeline';

export {
  createDisplayMetadata,
  exportTree,
  type AttributeKey,
  type AttributeDescriptor,
  type DisplayMetadata,
  type DisplayMetadataOptions,
  type ExportNode,
  type ExportOptions,
  type ExportableTree,
} from './export';

export {
  ConsoleTaxaReporter,
  type ConsoleTaxaReporterOptions,
  type SelectionSummary,
} from './report';
