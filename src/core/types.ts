/**
 * Core Types — Shared vocabulary of the abundance tree engine.
 * ----------------------------------------------------------------------------
 * Taxids, samples and scores are plain values; the taxonomy itself is an
 * external collaborator reached only through the TaxonomyGraph interface.
 *
 * @module core/types
 */

import type { Rank } from '../rank/Rank';

/** Identifier of a node in the reference taxonomy */
export type TaxId = string;

/** Name of a sample (one input dataset of per-read assignments) */
export type Sample = string;

/** Confidence/quality metric attached to a taxon */
export type Score = number;

/** The universal ancestor of every taxon. */
export const ROOT: TaxId = '1';

/**
 * Score given to taxa with no score available.
 *
 * NaN never compares equal to itself: test with isScored(), not ===.
 */
export const NO_SCORE: Score = Number.NaN;

/**
 * Whether a score carries a value (is not the NO_SCORE sentinel).
 */
export function isScored(score: Score): boolean {
  return !Number.isNaN(score);
}

/** Reads directly assigned to each taxid */
export type Abundances = ReadonlyMap<TaxId, number>;

/** Score for each taxid */
export type Scores = ReadonlyMap<TaxId, Score>;

/** Parent of each taxid */
export type Parents = ReadonlyMap<TaxId, TaxId>;

/** Sink for human-readable log lines */
export type Logger = (message: string) => void;

/**
 * Read-only view of the reference taxonomy consumed by the trees.
 *
 * Implementations must not change while a tree is being grown from them.
 */
export interface TaxonomyGraph {
  /** Universal ancestor used as the starting point of growth */
  readonly root: TaxId;
  /** Taxonomic level of a taxid */
  rankOf(taxid: TaxId): Rank;
  /** Display name of a taxid */
  nameOf(taxid: TaxId): string;
  /** Ordered children of a taxid; empty when the taxid has none */
  childrenOf(taxid: TaxId): readonly TaxId[];
}
