/**
 * Depth and subtree filtering shared by extraction and export traversal.
 * @module tree/filter
 */

import type { TaxId } from '../core/types';
import type { TaxaFilter } from './types';

const EMPTY: ReadonlySet<TaxId> = new Set();

export interface ResolvedFilter {
  mindepth: number;
  maxdepth: number;
  include: ReadonlySet<TaxId>;
  exclude: ReadonlySet<TaxId>;
}

export function resolveFilter(filter?: TaxaFilter): ResolvedFilter {
  return {
    mindepth: filter?.mindepth ?? 0,
    maxdepth: filter?.maxdepth ?? 0,
    include: filter?.include ?? EMPTY,
    exclude: filter?.exclude ?? EMPTY,
  };
}

/**
 * In-branch flag handed to the root: with nothing to include explicitly,
 * everything starts in branch.
 */
export function rootInBranch(filter: ResolvedFilter): boolean {
  return filter.include.size === 0;
}

/**
 * A node is in branch when its parent was, or it is included explicitly,
 * and it is not excluded. Children inherit the flag, so exclusion drops
 * the whole subtree unless a descendant is included again.
 */
export function nodeInBranch(filter: ResolvedFilter, taxid: TaxId, parentInBranch: boolean): boolean {
  return (parentInBranch || filter.include.has(taxid)) && !filter.exclude.has(taxid);
}

export function withinDepth(filter: ResolvedFilter, depth: number): boolean {
  return (filter.mindepth === 0 || depth >= filter.mindepth)
    && (filter.maxdepth === 0 || depth <= filter.maxdepth);
}

/** Whether the children of a node at this depth are visited at all */
export function descendsBelow(filter: ResolvedFilter, depth: number): boolean {
  return filter.maxdepth === 0 || depth < filter.maxdepth;
}
