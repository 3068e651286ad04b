/**
 * Taxonomy — Barrel Export
 * @module taxonomy
 */

export {
  InMemoryTaxonomy,
  type TaxonRecord,
  type InMemoryTaxonomyOptions,
} from './InMemoryTaxonomy';
