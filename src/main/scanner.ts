import path from 'path';
import { classifyCameraFile } from '../common/fileTypes';
import {
  isDirectory,
  isFile,
  readDirectoryEntries,
  resolveRealPath,
} from '../common/directoryEntries';
import { compareNames } from '../common/collectionNames';
import type { CameraMetadata, NoMetadata } from '../types/hierarchy';
import { NO_METADATA } from '../types/hierarchy';
import { createScopedLogger } from '../utils/logger';

const logger = createScopedLogger('camera-scanner');

interface WalkOptions {
  /** Discovered files by kind, filled in as the walk progresses */
  imageFiles: string[];
  csvFiles: string[];
}

const walkDirectory = async (currentPath: string, options: WalkOptions): Promise<void> => {
  const entries = await readDirectoryEntries(currentPath);

  for (const entry of entries) {
    const entryPath = path.join(currentPath, entry.name);

    if (entry.isDirectory()) {
      await walkDirectory(entryPath, options);
      continue;
    }

    const kind = classifyCameraFile(entry.name);
    if (!kind) {
      continue;
    }

    if (!entry.isFile() && !(entry.isSymbolicLink() && (await isFile(entryPath)))) {
      continue;
    }

    const resolved = await resolveRealPath(entryPath);
    if (kind === 'image') {
      options.imageFiles.push(resolved);
    } else {
      options.csvFiles.push(resolved);
    }
  }
};

/**
 * Enumerates image and CSV files at any depth beneath a `camera` directory.
 */
export const collectCameraMetadata = async (
  cameraDir: string,
): Promise<CameraMetadata | NoMetadata> => {
  if (!(await isDirectory(cameraDir))) {
    logger.debug(`Camera directory not found: ${cameraDir}`);
    return NO_METADATA;
  }

  const options: WalkOptions = { imageFiles: [], csvFiles: [] };
  await walkDirectory(path.resolve(cameraDir), options);

  return {
    kind: 'camera',
    imageFiles: options.imageFiles.sort(compareNames),
    csvFiles: options.csvFiles.sort(compareNames),
  };
};
