import path from 'path';
import { compareNames } from '../../common/collectionNames';
import type {
  DirectoryMetadata,
  HierarchyResult,
  PinStatus,
  PuckStatus,
  SiteStatus,
} from '../../types/hierarchy';
import { iterCollections, missingExpectedNames, statusLabel } from '../../types/hierarchy';
import { embedFirst, embedImages, type ImagePreview } from './embedImages';
import {
  CAMERA_ANGLE_COLUMNS,
  CAMERA_PREVIEW_COLUMNS,
  PROCESSING_PREVIEW_COLUMNS,
  RASTER_COLUMNS,
  RASTER_NAME_PATTERN,
} from './previewColumns';

export interface ExpectedStatusCell {
  present: boolean;
  status: 'OK' | 'missing';
  path: string | null;
  metadata: DirectoryMetadata;
}

export type PreviewCells = Record<string, ImagePreview | null>;

export interface CollectionRow {
  trip: string;
  tripPath: string;
  site: string;
  sitePath: string;
  puck: string;
  puckPath: string;
  pin: string;
  pinPath: string;
  collection: string;
  collectionPath: string;
  expected: Record<string, ExpectedStatusCell>;
  extras: string[];
  missingExpected: boolean;
  missingExpectedNames: string[];
  pinMissingCollections: boolean;
  issues: string[];
  cameraPreviewCells: PreviewCells;
  cameraPreviewMissing: string[];
  processingPreviewCells: PreviewCells;
  processingPreviewMissing: string[];
}

export interface PinIssueRow {
  site: string;
  puck: string;
  pin: string;
  pinPath: string;
}

const metadataFor = (expected: Record<string, ExpectedStatusCell>, name: string) =>
  expected[name]?.metadata;

const cameraImages = (metadata: DirectoryMetadata | undefined): string[] =>
  metadata?.kind === 'camera' ? metadata.imageFiles : [];

const summaryImages = (metadata: DirectoryMetadata | undefined): string[] =>
  metadata?.kind === 'processing' ? metadata.summaryImages : [];

const missingFor = (columns: { key: string; missing: string }[], cells: PreviewCells) =>
  columns.filter((column) => !cells[column.key]).map((column) => column.missing);

/**
 * Camera images named `raster_<angle>`, ordered by ascending numeric angle
 * and then by path.
 */
export const rankRasterImages = (imageFiles: string[]): string[] =>
  imageFiles
    .map((imagePath) => {
      const match = RASTER_NAME_PATTERN.exec(path.basename(imagePath));
      return match ? { imagePath, angle: Number.parseInt(match[1], 10) } : null;
    })
    .filter((item): item is { imagePath: string; angle: number } => item !== null)
    .sort((a, b) => a.angle - b.angle || compareNames(a.imagePath, b.imagePath))
    .map((item) => item.imagePath);

export const selectCameraPreviews = async (imageFiles: string[]): Promise<PreviewCells> => {
  const used = new Set<string>();
  const cells: PreviewCells = {};

  for (const column of CAMERA_ANGLE_COLUMNS) {
    const candidates = imageFiles.filter((imagePath) =>
      path.basename(imagePath).includes(column.search),
    );
    cells[column.key] = await embedFirst(candidates, used);
  }

  const rasters = rankRasterImages(imageFiles);
  for (const column of RASTER_COLUMNS) {
    cells[column.key] = await embedFirst(rasters, used);
  }
  return cells;
};

export const selectProcessingPreviews = async (images: string[]): Promise<PreviewCells> => {
  const previews = await embedImages(images);
  const cells: PreviewCells = {};
  for (const column of PROCESSING_PREVIEW_COLUMNS) {
    const marker = column.search.toLowerCase();
    cells[column.key] =
      previews.find((preview) => preview.basename.toLowerCase().includes(marker)) ?? null;
  }
  return cells;
};

const buildIssues = (
  pinMissingCollections: boolean,
  missingNames: string[],
  extras: string[],
): string[] => {
  const issues: string[] = [];
  if (pinMissingCollections) {
    issues.push('Pin missing lettered collections');
  }
  if (missingNames.length > 0) {
    issues.push(`Missing: ${missingNames.join(', ')}`);
  }
  if (extras.length > 0) {
    issues.push(`Extras: ${extras.join(', ')}`);
  }
  return issues;
};

/**
 * Flattens the hierarchy into one row per collection, embedding the preview
 * images each row shows.
 */
export const flattenCollections = async (result: HierarchyResult): Promise<CollectionRow[]> => {
  const rows: CollectionRow[] = [];

  for (const { site, puck, pin, collection } of iterCollections(result.trip)) {
    const expected: Record<string, ExpectedStatusCell> = {};
    for (const entry of collection.expected) {
      expected[entry.name] = {
        present: entry.present,
        status: statusLabel(entry),
        path: entry.path ?? null,
        metadata: entry.metadata,
      };
    }
    const missingNames = missingExpectedNames(collection);

    const cameraPreviewCells = await selectCameraPreviews(
      cameraImages(metadataFor(expected, 'camera')),
    );
    const processingPreviewCells = await selectProcessingPreviews(
      summaryImages(metadataFor(expected, 'processing')),
    );

    rows.push({
      trip: result.trip.name,
      tripPath: result.trip.path,
      site: site.name,
      sitePath: site.path,
      puck: puck.name,
      puckPath: puck.path,
      pin: pin.name,
      pinPath: pin.path,
      collection: collection.name,
      collectionPath: collection.path,
      expected,
      extras: collection.extras,
      missingExpected: missingNames.length > 0,
      missingExpectedNames: missingNames,
      pinMissingCollections: pin.missingCollections,
      issues: buildIssues(pin.missingCollections, missingNames, collection.extras),
      cameraPreviewCells,
      cameraPreviewMissing: missingFor(CAMERA_PREVIEW_COLUMNS, cameraPreviewCells),
      processingPreviewCells,
      processingPreviewMissing: missingFor(PROCESSING_PREVIEW_COLUMNS, processingPreviewCells),
    });
  }

  return rows;
};

/** Pins that have no lettered collection and therefore no table row. */
export const pinsMissingCollections = (result: HierarchyResult): PinIssueRow[] => {
  const rows: PinIssueRow[] = [];
  const visit = (site: SiteStatus, puck: PuckStatus, pin: PinStatus) => {
    if (pin.missingCollections) {
      rows.push({ site: site.name, puck: puck.name, pin: pin.name, pinPath: pin.path });
    }
  };
  for (const site of result.trip.sites) {
    for (const puck of site.pucks) {
      puck.pins.forEach((pin) => visit(site, puck, pin));
    }
  }
  return rows;
};
