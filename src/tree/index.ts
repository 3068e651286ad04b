/**
 * Abundance Trees — Barrel Export
 * @module tree
 */

export { TaxTree } from './TaxTree';
export { MultiTree } from './MultiTree';
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
} from './types';
