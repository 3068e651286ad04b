/**
 * InMemoryTaxonomy — TaxonomyGraph over already-parsed taxon records.
 * ----------------------------------------------------------------------------
 * Reading taxonomy dumps is left to the caller. Once the records are
 * parsed, this class indexes them into the parent, children, rank and name
 * lookups the trees need.
 *
 * Children keep record order. A record whose parent is itself (the usual
 * shape of a root entry) is kept as a self-child: growth cuts it with its
 * path guard. The root is always ranked 'root', whatever its record says.
 *
 * @module taxonomy/InMemoryTaxonomy
 */

import { ROOT } from '../core/types';
import type { TaxId, TaxonomyGraph, Parents } from '../core/types';
import { parseRank } from '../rank/Rank';
import type { Rank } from '../rank/Rank';

/**
 * One parsed taxonomy entry.
 */
export interface TaxonRecord {
  taxid: TaxId;
  /** Parent taxid (the root points to itself) */
  parent: TaxId;
  /** Rank, either already typed or as spelled in the dump */
  rank?: Rank | string;
  /** Scientific name */
  name?: string;
}

export interface InMemoryTaxonomyOptions {
  /** Universal ancestor (default: ROOT) */
  root?: TaxId;
  /** Name returned for taxids without one (default: 'Unnamed') */
  unnamed?: string;
}

/**
 * @example
 * ```typescript
 * const taxonomy = new InMemoryTaxonomy([
 *   { taxid: '1', parent: '1', rank: 'no rank', name: 'root' },
 *   { taxid: '2', parent: '1', rank: 'superkingdom', name: 'Bacteria' },
 * ]);
 * taxonomy.childrenOf('1'); // ['1', '2']
 * ```
 */
export class InMemoryTaxonomy implements TaxonomyGraph {
  readonly root: TaxId;

  private readonly parentOf: Map<TaxId, TaxId> = new Map();
  private readonly children: Map<TaxId, TaxId[]> = new Map();
  private readonly ranks: Map<TaxId, Rank> = new Map();
  private readonly names: Map<TaxId, string> = new Map();
  private readonly unnamed: string;

  constructor(records: Iterable<TaxonRecord>, options?: InMemoryTaxonomyOptions) {
    this.root = options?.root ?? ROOT;
    this.unnamed = options?.unnamed ?? 'Unnamed';

    for (const record of records) {
      this.parentOf.set(record.taxid, record.parent);

      const siblings = this.children.get(record.parent) ?? [];
      siblings.push(record.taxid);
      this.children.set(record.parent, siblings);

      if (record.rank !== undefined) {
        this.ranks.set(record.taxid, parseRank(record.rank));
      }
      if (record.name !== undefined) {
        this.names.set(record.taxid, record.name);
      }
    }

    this.ranks.set(this.root, 'root');
  }

  /** Parent lookup, as consumed by lineage tracing */
  get parents(): Parents {
    return this.parentOf;
  }

  rankOf(taxid: TaxId): Rank {
    return this.ranks.get(taxid) ?? 'unclassified';
  }

  nameOf(taxid: TaxId): string {
    return this.names.get(taxid) ?? this.unnamed;
  }

  childrenOf(taxid: TaxId): readonly TaxId[] {
    return this.children.get(taxid) ?? [];
  }

  /** Whether the taxid is known (has a record) */
  has(taxid: TaxId): boolean {
    return this.parentOf.has(taxid);
  }

  /** Number of records indexed */
  get size(): number {
    return this.parentOf.size;
  }
}
