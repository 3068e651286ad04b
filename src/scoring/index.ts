/**
 * Scoring — Barrel Export
 * @module scoring
 */

export { SCORINGS, SCORING_DISPLAY, parseScoring, scoringDisplay, type Scoring } from './Scoring';
export { weightedScore, type ScoreTerm } from './weightedScore';
