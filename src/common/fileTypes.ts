import path from 'path';

export type CameraFileKind = 'image' | 'csv';

export const IMAGE_EXTENSIONS = new Set(['.jpg', '.jpeg', '.png', '.tif', '.tiff', '.bmp']);
export const CSV_EXTENSIONS = new Set(['.csv']);

export const SUMMARY_DOCUMENT_NAME = '00_summary.html';

export interface SummaryMarker {
  label: string;
  /** Regular expression fragment matched case-insensitively inside scraped `src` values */
  referencePattern: string;
  /** Glob used when scraping found nothing */
  fallbackGlob: string;
}

export const SUMMARY_MARKERS: SummaryMarker[] = [
  {
    label: 'spots per image',
    referencePattern: String.raw`SPOT\.XDS[^"']*SpotsPerImage`,
    fallbackGlob: 'SPOT.XDS*SpotsPerImage*.png',
  },
  {
    label: 'fitness batch',
    referencePattern: String.raw`INTEGRATE_select2\.mrfana\.fitness_batch_select2`,
    fallbackGlob: 'INTEGRATE_select2.mrfana.fitness_batch_select2.png',
  },
];

export const classifyCameraFile = (filePath: string): CameraFileKind | null => {
  const extension = path.extname(filePath).toLowerCase();
  if (IMAGE_EXTENSIONS.has(extension)) {
    return 'image';
  }
  if (CSV_EXTENSIONS.has(extension)) {
    return 'csv';
  }
  return null;
};
