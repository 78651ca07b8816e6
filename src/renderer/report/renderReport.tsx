import fs from 'fs/promises';
import path from 'path';
import { renderToStaticMarkup } from 'react-dom/server';
import { DEFAULT_EXPECTED_COLLECTION_DIRS } from '../../common/collectionNames';
import { resolveUserPath } from '../../common/directoryEntries';
import type { HierarchyResult } from '../../types/hierarchy';
import { countHierarchy } from '../../types/hierarchy';
import { flattenCollections, pinsMissingCollections } from './flattenCollections';
import { ReportDocument } from './ReportDocument';

export interface HtmlReportOptions {
  expectedDirs?: readonly string[];
  title?: string;
  generatedAt?: Date;
}

const pad = (value: number) => String(value).padStart(2, '0');

/** Local time as `YYYY-MM-DD HH:MM:SS`. */
export const formatGeneratedAt = (date: Date) =>
  `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
  `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;

export const defaultReportTitle = (tripName: string) => `Trip Report - ${tripName}`;

/**
 * Renders a standalone HTML document with the hierarchy summary and every
 * preview image inlined as a data URI.
 */
export const renderHtmlReport = async (
  result: HierarchyResult,
  {
    expectedDirs = DEFAULT_EXPECTED_COLLECTION_DIRS,
    title,
    generatedAt = new Date(),
  }: HtmlReportOptions = {},
): Promise<string> => {
  const rows = await flattenCollections(result);
  const markup = renderToStaticMarkup(
    <ReportDocument
      title={title ?? defaultReportTitle(result.trip.name)}
      tripName={result.trip.name}
      tripPath={result.trip.path}
      generatedAt={formatGeneratedAt(generatedAt)}
      counts={countHierarchy(result.trip)}
      allExpectedPresent={result.allExpectedPresent}
      expectedDirs={expectedDirs}
      rows={rows}
      pinsWithoutCollections={pinsMissingCollections(result)}
    />,
  );
  return `<!DOCTYPE html>\n${markup}`;
};

/** Writes the report, creating parent directories, and returns the resolved path (`~` expanded). */
export const writeHtmlReport = async (outputPath: string, html: string): Promise<string> => {
  const resolved = resolveUserPath(outputPath);
  await fs.mkdir(path.dirname(resolved), { recursive: true });
  await fs.writeFile(resolved, html, 'utf8');
  return resolved;
};
