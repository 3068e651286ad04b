/**
 * Core — Barrel Export
 * @module core
 */

export { ROOT, NO_SCORE, isScored } from './types';
export type {
  TaxId,
  Sample,
  Score,
  Abundances,
  Scores,
  Parents,
  Logger,
  TaxonomyGraph,
} from './types';
export { ConfigurationError } from './errors';
