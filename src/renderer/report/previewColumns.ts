export interface PreviewColumn {
  key: string;
  header: string;
  /** File name reported when the slot cannot be filled */
  missing: string;
}

export interface SearchPreviewColumn extends PreviewColumn {
  /** Substring looked for in the image base name */
  search: string;
}

/** Fixed loop-centring shots, matched by name in camera image order. */
export const CAMERA_ANGLE_COLUMNS: SearchPreviewColumn[] = [
  {
    key: 'loop_inter_4_000',
    search: 'loop-inter_4_000',
    header: 'Loop Inter 4 (0°)',
    missing: 'loop-inter_4_000.jpeg',
  },
  {
    key: 'loop_inter_4_045',
    search: 'loop-inter_4_045',
    header: 'Loop Inter 4 (45°)',
    missing: 'loop-inter_4_045.jpeg',
  },
  {
    key: 'loop_inter_4_090',
    search: 'loop-inter_4_090',
    header: 'Loop Inter 4 (90°)',
    missing: 'loop-inter_4_090.jpeg',
  },
];

/**
 * Raster slots are ranked: the camera images named `raster_<angle>` are
 * ordered by ascending numeric angle and fill the slots in turn.
 */
export const RASTER_COLUMNS: PreviewColumn[] = [
  { key: 'raster_1', header: 'Raster (first angle)', missing: 'raster_090.jpeg' },
  { key: 'raster_2', header: 'Raster (second angle)', missing: 'raster_180.jpeg' },
];

export const RASTER_NAME_PATTERN = /raster_(\d+)/i;

export const CAMERA_PREVIEW_COLUMNS: PreviewColumn[] = [...CAMERA_ANGLE_COLUMNS, ...RASTER_COLUMNS];

/** Summary plots, matched case-insensitively by marker in the base name. */
export const PROCESSING_PREVIEW_COLUMNS: SearchPreviewColumn[] = [
  {
    key: 'spots_per_image',
    search: 'SpotsPerImage',
    header: 'Spots Per Image',
    missing: 'SPOT.XDS.SpotsPerImage.png',
  },
  {
    key: 'integrate_fitness',
    search: 'INTEGRATE_select2.mrfana.fitness_batch_select2',
    header: 'Fitness Batch',
    missing: 'INTEGRATE_select2.mrfana.fitness_batch_select2.png',
  },
];
