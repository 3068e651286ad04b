/**
 * Reporting — Barrel Export
 * @module report
 */

export {
  ConsoleTaxaReporter,
  type ConsoleTaxaReporterOptions,
  type SelectionSummary,
} from './ConsoleTaxaReporter';
