export * from './types/hierarchy';
export type * from './types/serializedHierarchy';
export {
  DEFAULT_EXPECTED_COLLECTION_DIRS,
  FLAT_SITE_NAME,
  compareNames,
  isLetteredCollection,
} from './common/collectionNames';
export {
  HierarchyDeserializationError,
  TripReportError,
  TripRootNotDirectoryError,
  TripRootNotFoundError,
} from './common/errors';
export { buildHierarchy, resolveTripRoot } from './main/hierarchyBuilder';
export type { BuildHierarchyOptions, ProgressSink } from './main/hierarchyBuilder';
export { collectCameraMetadata } from './main/scanner';
export { collectProcessingMetadata, locateSummaryDocument } from './main/processingSummary';
export { extractReferencedImagePaths } from './main/summaryScraper';
export {
  deserializeHierarchy,
  loadHierarchyJson,
  serializeHierarchy,
  writeHierarchyJson,
} from './main/hierarchySerializer';
export { resolveReportConfig } from './main/config';
export type { ReportConfig } from './main/config';
export { printHierarchy, renderHierarchyTree } from './renderer/console/hierarchyTree';
export type { RenderTreeOptions } from './renderer/console/hierarchyTree';
export { flattenCollections } from './renderer/report/flattenCollections';
export type { CollectionRow } from './renderer/report/flattenCollections';
export { renderHtmlReport, writeHtmlReport } from './renderer/report/renderReport';
export type { HtmlReportOptions } from './renderer/report/renderReport';
export { runCli } from './cli/program';
