/**
 * Rank Ordering — Barrel Export
 * @module rank
 */

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
} from './Rank';
