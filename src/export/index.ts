/**
 * Tree Export — Barrel Export
 * @module export
 */

export {
  createDisplayMetadata,
  exportTree,
  type AttributeKey,
  type AttributeDescriptor,
  type DisplayMetadata,
  type DisplayMetadataOptions,
  type ExportNode,
  type ExportOptions,
  type ExportableTree,
} from './TreeExporter';
