/**
 * Sample Pipeline — Barrel Export
 * @module pipeline
 */

export {
  buildSampleTree,
  mergeSampleTrees,
  type SampleInput,
  type SampleTreeOptions,
} from './buildTrees';
