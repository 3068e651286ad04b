/**
 * Rank — Totally ordered taxonomic levels.
 * ----------------------------------------------------------------------------
 * Ranks run from coarse (root) to fine (forma). Two sentinels close the
 * order: 'no_rank' for taxa the taxonomy leaves unranked and
 * 'unclassified' for anything that could not be placed at all. Both sort
 * below every named level.
 *
 * @module rank/Rank
 */

import type { TaxId } from '../core/types';

/**
 * All ranks, in order from coarsest to finest.
 */
export const RANKS = [
  'root',
  'domain',
  'superkingdom',
  'kingdom',
  'subkingdom',
  'superphylum',
  'phylum',
  'subphylum',
  'superclass',
  'class',
  'subclass',
  'infraclass',
  'cohort',
  'superorder',
  'order',
  'suborder',
  'infraorder',
  'parvorder',
  'superfamily',
  'family',
  'subfamily',
  'tribe',
  'subtribe',
  'genus',
  'subgenus',
  'species_group',
  'species_subgroup',
  'species',
  'subspecies',
  'varietas',
  'forma',
  'no_rank',
  'unclassified',
] as const;

export type Rank = (typeof RANKS)[number];

/**
 * Levels conventionally shown in summaries and reports.
 */
export const MAIN_RANKS: readonly Rank[] = [
  'domain',
  'kingdom',
  'phylum',
  'class',
  'order',
  'family',
  'genus',
  'species',
];

const RANK_INDEX: ReadonlyMap<string, number> = new Map(
  RANKS.map((rank, index): [string, number] => [rank, index]),
);

function isRank(name: string): name is Rank {
  return RANK_INDEX.has(name);
}

function indexOf(rank: Rank): number {
  return RANK_INDEX.get(rank) ?? RANKS.length;
}

/**
 * Compare two ranks.
 *
 * @returns A negative number when `a` is coarser than `b`, positive when
 *   finer, 0 when equal
 */
export function compareRanks(a: Rank, b: Rank): number {
  return indexOf(a) - indexOf(b);
}

/** Whether `a` sits above `b` in the hierarchy. */
export function isCoarser(a: Rank, b: Rank): boolean {
  return compareRanks(a, b) < 0;
}

/** Whether `a` sits below `b` in the hierarchy. */
export function isFiner(a: Rank, b: Rank): boolean {
  return compareRanks(a, b) > 0;
}

/** Whether `a` is `b` or sits below it. */
export function isAtOrFiner(a: Rank, b: Rank): boolean {
  return compareRanks(a, b) >= 0;
}

/**
 * Map a rank name as found in taxonomy dumps ("species group", "No Rank")
 * to a Rank. Names outside the known levels become 'no_rank'.
 */
export function parseRank(name: string): Rank {
  const normalized = name.trim().toLowerCase().replace(/[\s-]+/g, '_');
  return isRank(normalized) ? normalized : 'no_rank';
}

/**
 * Invert a taxid → rank map into rank → taxids.
 *
 * Ranks with no taxa are absent from the result; insertion follows the
 * order in which each rank is first seen.
 */
export function ranksToTaxLevels(ranks: ReadonlyMap<TaxId, Rank>): Map<Rank, Set<TaxId>> {
  const levels = new Map<Rank, Set<TaxId>>();
  for (const [taxid, rank] of ranks) {
    const existing = levels.get(rank) ?? new Set<TaxId>();
    existing.add(taxid);
    levels.set(rank, existing);
  }
  return levels;
}
