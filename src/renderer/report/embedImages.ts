import fs from 'fs/promises';
import path from 'path';
import mime from 'mime-types';
import { createScopedLogger } from '../../utils/logger';

export interface ImagePreview {
  path: string;
  basename: string;
  dataUri: string;
}

const logger = createScopedLogger('report-images');

const FALLBACK_MIME_TYPE = 'image/jpeg';

/**
 * Reads an image and returns it as a base64 data URI, or `null` when the file
 * cannot be read.
 */
export const embedImage = async (imagePath: string): Promise<ImagePreview | null> => {
  const basename = path.basename(imagePath);
  let data: Buffer;
  try {
    data = await fs.readFile(imagePath);
  } catch (error) {
    logger.debug(`Skipping unreadable image ${imagePath}`, error);
    return null;
  }
  const mimeType = mime.lookup(basename) || FALLBACK_MIME_TYPE;
  return {
    path: imagePath,
    basename,
    dataUri: `data:${mimeType};base64,${data.toString('base64')}`,
  };
};

/** Embeds each readable image, preserving input order. */
export const embedImages = async (imagePaths: string[]): Promise<ImagePreview[]> => {
  const previews: ImagePreview[] = [];
  for (const imagePath of imagePaths) {
    const preview = await embedImage(imagePath);
    if (preview) {
      previews.push(preview);
    }
  }
  return previews;
};

/**
 * Embeds the first readable candidate, skipping paths in `used`. The chosen
 * path is added to `used`.
 */
export const embedFirst = async (
  candidates: string[],
  used: Set<string>,
): Promise<ImagePreview | null> => {
  for (const candidate of candidates) {
    if (used.has(candidate)) {
      continue;
    }
    const preview = await embedImage(candidate);
    if (preview) {
      used.add(candidate);
      return preview;
    }
  }
  return null;
};
