import path from 'path';
import { SUMMARY_MARKERS, type SummaryMarker } from '../common/fileTypes';
import { pathExists, resolveRealPath } from '../common/directoryEntries';

const buildReferencePattern = (markers: SummaryMarker[]) =>
  new RegExp(
    String.raw`src=["']([^"']*(?:${markers.map((marker) => marker.referencePattern).join('|')})[^"']*)["']`,
    'gi',
  );

const SUMMARY_REFERENCE_PATTERN = buildReferencePattern(SUMMARY_MARKERS);

/**
 * Returns the raw `src` attribute values in `htmlText` that point at a summary
 * plot, in document order. Only this function knows how references are matched.
 */
export const extractReferencedImagePaths = (htmlText: string): string[] =>
  Array.from(htmlText.matchAll(SUMMARY_REFERENCE_PATTERN), (match) => match[1]);

/**
 * Strips query string, fragment and `file://` scheme, and converts
 * backslashes to forward slashes.
 */
export const normaliseReference = (rawReference: string): string => {
  let reference = rawReference.split('?')[0].split('#')[0];
  if (reference.startsWith('file://')) {
    reference = reference.slice('file://'.length);
  }
  return reference.replace(/\\/g, '/');
};

export const referenceCandidates = (
  reference: string,
  processingDir: string,
  summaryFile: string,
): string[] => {
  if (path.isAbsolute(reference)) {
    return [reference];
  }
  return [
    path.join(path.dirname(summaryFile), reference),
    path.join(processingDir, path.posix.basename(reference)),
  ];
};

/**
 * Resolves a scraped reference to a file on disk: absolute paths as given,
 * otherwise relative to the summary document, otherwise by base name directly
 * under the processing directory. Returns `null` when no candidate exists.
 */
export const resolveSummaryReference = async (
  rawReference: string,
  processingDir: string,
  summaryFile: string,
): Promise<string | null> => {
  const reference = normaliseReference(rawReference);
  if (!reference) {
    return null;
  }

  for (const candidate of referenceCandidates(reference, processingDir, summaryFile)) {
    const resolved = await resolveRealPath(candidate);
    if (await pathExists(resolved)) {
      return resolved;
    }
  }
  return null;
};
