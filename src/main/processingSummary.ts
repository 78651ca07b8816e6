import fs from 'fs/promises';
import path from 'path';
import { SUMMARY_DOCUMENT_NAME, SUMMARY_MARKERS } from '../common/fileTypes';
import {
  findFiles,
  globToRegExp,
  isDirectory,
  isFile,
  resolveRealPath,
} from '../common/directoryEntries';
import { compareNames } from '../common/collectionNames';
import type { NoMetadata, ProcessingMetadata } from '../types/hierarchy';
import { NO_METADATA } from '../types/hierarchy';
import { createScopedLogger } from '../utils/logger';
import { extractReferencedImagePaths, resolveSummaryReference } from './summaryScraper';

const logger = createScopedLogger('processing-summary');

export const locateSummaryDocument = async (processingDir: string): Promise<string | null> => {
  const direct = [
    path.join(processingDir, SUMMARY_DOCUMENT_NAME),
    path.join(processingDir, '00_summary', SUMMARY_DOCUMENT_NAME),
  ];
  for (const candidate of direct) {
    if (await isFile(candidate)) {
      return candidate;
    }
  }

  const nested = await findFiles(processingDir, (name) => name === SUMMARY_DOCUMENT_NAME);
  return nested.sort(compareNames)[0] ?? null;
};

const readSummaryDocument = async (summaryFile: string): Promise<string | null> => {
  try {
    return await fs.readFile(summaryFile, 'utf8');
  } catch (error) {
    logger.debug(`Unable to read summary document ${summaryFile}`, error);
    return null;
  }
};

const scrapeSummaryImages = async (
  summaryFile: string,
  processingDir: string,
): Promise<string[]> => {
  const content = await readSummaryDocument(summaryFile);
  if (content === null) {
    return [];
  }

  const images: string[] = [];
  const seen = new Set<string>();
  for (const reference of extractReferencedImagePaths(content)) {
    const resolved = await resolveSummaryReference(reference, processingDir, summaryFile);
    if (!resolved) {
      logger.debug(`Summary reference not found on disk: ${reference}`);
      continue;
    }
    if (!seen.has(resolved)) {
      seen.add(resolved);
      images.push(resolved);
    }
  }
  return images;
};

/**
 * Brute-force search used when the summary yields nothing: the first file per
 * marker glob, stopping at the first marker that produces an image.
 */
const searchSummaryImages = async (processingDir: string): Promise<string[]> => {
  for (const marker of SUMMARY_MARKERS) {
    const matcher = globToRegExp(marker.fallbackGlob);
    const matches = await findFiles(processingDir, (name) => matcher.test(name));
    const first = matches.sort(compareNames)[0];
    if (first) {
      logger.debug(`Fallback search found ${marker.label} plot: ${first}`);
      return [await resolveRealPath(first)];
    }
  }
  return [];
};

/**
 * Locates the summary plots referenced by `00_summary.html` inside a
 * `processing` directory.
 */
export const collectProcessingMetadata = async (
  processingDir: string,
): Promise<ProcessingMetadata | NoMetadata> => {
  if (!(await isDirectory(processingDir))) {
    return NO_METADATA;
  }

  const summaryFile = await locateSummaryDocument(processingDir);
  const scraped = summaryFile ? await scrapeSummaryImages(summaryFile, processingDir) : [];

  if (summaryFile && scraped.length > 0) {
    return {
      kind: 'processing',
      summarySource: await resolveRealPath(summaryFile),
      summaryImages: scraped,
    };
  }

  const fallback = await searchSummaryImages(processingDir);
  if (fallback.length === 0) {
    return NO_METADATA;
  }
  return { kind: 'processing', summaryImages: fallback };
};
