/**
 * Small taxonomies shared by the test suites.
 * @module testing/fixtures
 */

import { InMemoryTaxonomy } from '../taxonomy/InMemoryTaxonomy';
import type { TaxonRecord } from '../taxonomy/InMemoryTaxonomy';

/**
 *   1 root
 *   ├── 2 Bacteria
 *   │   ├── 1224 Proteobacteria
 *   │   │   └── 561 Escherichia
 *   │   │       ├── 562 Escherichia coli
 *   │   │       └── 564 Escherichia fergusonii
 *   │   └── 1239 Firmicutes
 *   │       └── 1386 Bacillus
 *   │           └── 1423 Bacillus subtilis
 *   └── 10239 Viruses
 */
export const BACTERIA: TaxonRecord[] = [
  { taxid: '1', parent: '1', rank: 'no rank', name: 'root' },
  { taxid: '2', parent: '1', rank: 'superkingdom', name: 'Bacteria' },
  { taxid: '10239', parent: '1', rank: 'superkingdom', name: 'Viruses' },
  { taxid: '1224', parent: '2', rank: 'phylum', name: 'Proteobacteria' },
  { taxid: '1239', parent: '2', rank: 'phylum', name: 'Firmicutes' },
  { taxid: '561', parent: '1224', rank: 'genus', name: 'Escherichia' },
  { taxid: '562', parent: '561', rank: 'species', name: 'Escherichia coli' },
  { taxid: '564', parent: '561', rank: 'species', name: 'Escherichia fergusonii' },
  { taxid: '1386', parent: '1239', rank: 'genus', name: 'Bacillus' },
  { taxid: '1423', parent: '1386', rank: 'species', name: 'Bacillus subtilis' },
];

export function bacteriaTaxonomy(): InMemoryTaxonomy {
  return new InMemoryTaxonomy(BACTERIA);
}

/** Direct counts: 19 reads in total, none on 561 */
export function bacteriaCounts(): Map<string, number> {
  return new Map([
    ['562', 10],
    ['564', 5],
    ['1423', 3],
    ['2', 1],
  ]);
}

export function bacteriaScores(): Map<string, number> {
  return new Map([
    ['562', 90],
    ['564', 60],
    ['1423', 20],
    ['2', 40],
  ]);
}

/** root (1) → A (100) → B (200) → C (300) */
export function chainTaxonomy(): InMemoryTaxonomy {
  return new InMemoryTaxonomy([
    { taxid: '1', parent: '1', name: 'root' },
    { taxid: '100', parent: '1', rank: 'phylum', name: 'A' },
    { taxid: '200', parent: '100', rank: 'genus', name: 'B' },
    { taxid: '300', parent: '200', rank: 'species', name: 'C' },
  ]);
}

/** Collects log lines for assertions. */
export function captureLogger(): { lines: string[]; log: (message: string) => void } {
  const lines: string[] = [];
  return { lines, log: (message: string) => lines.push(message) };
}
