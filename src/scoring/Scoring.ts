/**
 * Scoring Schemes — What the per-taxon score measures.
 * ----------------------------------------------------------------------------
 * The engine treats scores as opaque numbers; the scheme only decides how
 * they are labelled when a tree is exported for display.
 *
 * @module scoring/Scoring
 */

import { ConfigurationError } from '../core/errors';

export const SCORINGS = ['shel', 'length', 'logLength', 'norma', 'lmat'] as const;

/**
 * Built-in scoring schemes.
 *   - shel: single hit equivalent length, the classifier confidence
 *   - length: read length
 *   - logLength: log10 of the read length
 *   - norma: confidence normalized by read length, as a percentage
 *   - lmat: score reported by LMAT-style classifiers
 */
export type Scoring = (typeof SCORINGS)[number];

/**
 * Display label of the score attribute for each scheme.
 */
export const SCORING_DISPLAY: Readonly<Record<Scoring, string>> = {
  shel: 'Confidence (avg)',
  length: 'Read length (avg)',
  logLength: 'Read length (avg, log10)',
  norma: 'Confidence/Length (%)',
  lmat: 'LMAT score (avg)',
};

const KNOWN_SCORINGS: ReadonlySet<string> = new Set(SCORINGS);

function isScoring(value: string): value is Scoring {
  return KNOWN_SCORINGS.has(value);
}

/**
 * Validate a scoring scheme coming from untyped input.
 *
 * @throws ConfigurationError when the scheme is unknown
 */
export function parseScoring(value: string): Scoring {
  if (!isScoring(value)) {
    throw new ConfigurationError(
      'Unknown scoring "' + value + '" (expected one of: ' + SCORINGS.join(', ') + ')',
    );
  }
  return value;
}

/**
 * Label of the score attribute for a scheme.
 *
 * @throws ConfigurationError when the scheme is unknown
 */
export function scoringDisplay(scoring: string): string {
  return SCORING_DISPLAY[parseScoring(scoring)];
}
