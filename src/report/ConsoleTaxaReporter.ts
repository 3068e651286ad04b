/**
 * ConsoleTaxaReporter — Logs formatted tree summaries.
 * ----------------------------------------------------------------------------
 * Development/reporting helper. Summarizes a shaped tree and the taxa a
 * query selects, with a per-rank breakdown.
 *
 * @module report/ConsoleTaxaReporter
 *
 * @example
 * ```typescript
 * const reporter = new ConsoleTaxaReporter({ prefix: '[TAXA]' });
 * reporter.reportSelection(tree, { include: new Set(['2']) });
 *
 * // [TAXA] 3 taxa selected in 2 taxonomic levels
 * // [TAXA]   phylum: 1
 * // [TAXA]   genus: 2
 * ```
 */

import type { TaxId, Logger } from '../core/types';
import { compareRanks, ranksToTaxLevels } from '../rank/Rank';
import type { Rank } from '../rank/Rank';
import type { TaxTree } from '../tree/TaxTree';
import type { TaxaSelection } from '../tree/types';

export interface ConsoleTaxaReporterOptions {
  /** Prefix of every line (default: '[TAXA]') */
  prefix?: string;
  /** Sink for lines (default: console.log) */
  logger?: Logger;
  /** Minimum counts printed by the tree render (default: 1) */
  minCounts?: number;
}

/**
 * Taxa selected by a query, grouped by rank (coarse to fine).
 */
export interface SelectionSummary {
  taxa: number;
  levels: Array<{ rank: Rank; taxa: number }>;
}

export class ConsoleTaxaReporter {
  private readonly prefix: string;
  private readonly log: Logger;
  private readonly minCounts: number;

  constructor(options?: ConsoleTaxaReporterOptions) {
    this.prefix = options?.prefix ?? '[TAXA]';
    this.log = options?.logger ?? console.log;
    this.minCounts = options?.minCounts ?? 1;
  }

  /**
   * Log how many taxa the selection holds, per rank.
   */
  reportSelection(tree: TaxTree, selection?: TaxaSelection): SelectionSummary {
    const ranks = new Map<TaxId, Rank>();
    tree.getTaxa({ ...selection, ranks });

    const levels = Array.from(ranksToTaxLevels(ranks), ([rank, taxids]) => ({ rank, taxa: taxids.size }))
      .sort((a, b) => compareRanks(a.rank, b.rank));

    this.log(this.prefix + ' ' + ranks.size + ' taxa selected in ' + levels.length + ' taxonomic levels');
    for (const level of levels) {
      this.log(this.prefix + '   ' + level.rank + ': ' + level.taxa);
    }

    return { taxa: ranks.size, levels };
  }

  /**
   * Log the root accumulation, node count and compact render of a tree.
   */
  reportTree(tree: TaxTree): void {
    this.log(this.prefix + ' Root ' + tree.root.taxid + ': acc=' + tree.root.acc + ' counts=' + tree.root.counts);
    this.log(this.prefix + ' Nodes: ' + tree.size());
    this.log(this.prefix + ' ' + tree.render(this.minCounts));
  }
}
