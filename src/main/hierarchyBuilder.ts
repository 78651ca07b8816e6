import fs from 'fs/promises';
import path from 'path';
import {
  CAMERA_DIR,
  DEFAULT_EXPECTED_COLLECTION_DIRS,
  FLAT_SITE_NAME,
  PROCESSING_DIR,
  isLetteredCollection,
  sortNames,
} from '../common/collectionNames';
import {
  isDirectory,
  isMissingPathError,
  listChildDirectories,
  resolveRealPath,
  resolveUserPath,
} from '../common/directoryEntries';
import { TripRootNotDirectoryError, TripRootNotFoundError } from '../common/errors';
import type {
  CollectionStatus,
  DirectoryMetadata,
  ExpectedDirectoryStatus,
  HierarchyResult,
  PinStatus,
  PuckStatus,
  SiteGrouping,
  SiteStatus,
} from '../types/hierarchy';
import { NO_METADATA } from '../types/hierarchy';
import { collectCameraMetadata } from './scanner';
import { collectProcessingMetadata } from './processingSummary';

export type ProgressSink = (message: string) => void;

export interface BuildHierarchyOptions {
  /** Subdirectories every collection should contain, in report order */
  expectedDirs?: readonly string[];
  grouping?: SiteGrouping;
  onProgress?: ProgressSink;
}

/** A built node together with whether everything beneath it is complete. */
interface Built<T> {
  node: T;
  complete: boolean;
}

interface BuildContext {
  expectedDirs: readonly string[];
  progress: ProgressSink;
}

const allComplete = <T>(items: Built<T>[]) => items.every((item) => item.complete);

export const resolveTripRoot = async (root: string): Promise<string> => {
  const absolute = resolveUserPath(root);
  let resolved: string;
  try {
    resolved = await fs.realpath(absolute);
  } catch (error) {
    if (isMissingPathError(error)) {
      throw new TripRootNotFoundError(absolute);
    }
    throw error;
  }
  if (!(await isDirectory(resolved))) {
    throw new TripRootNotDirectoryError(resolved);
  }
  return resolved;
};

const collectMetadata = async (name: string, dirPath: string): Promise<DirectoryMetadata> => {
  if (name === CAMERA_DIR) {
    return collectCameraMetadata(dirPath);
  }
  if (name === PROCESSING_DIR) {
    return collectProcessingMetadata(dirPath);
  }
  return NO_METADATA;
};

const buildCollection = async (
  collectionDir: string,
  context: BuildContext,
): Promise<Built<CollectionStatus>> => {
  const name = path.basename(collectionDir);
  context.progress(`    Collection ${name}: analysing expected folders`);

  const present = new Set(await listChildDirectories(collectionDir));
  const expected: ExpectedDirectoryStatus[] = [];
  for (const expectedName of context.expectedDirs) {
    const expectedPath = path.join(collectionDir, expectedName);
    if (!(await isDirectory(expectedPath))) {
      expected.push({ name: expectedName, present: false, metadata: NO_METADATA });
      continue;
    }
    expected.push({
      name: expectedName,
      present: true,
      path: await resolveRealPath(expectedPath),
      metadata: await collectMetadata(expectedName, expectedPath),
    });
  }

  const missing = expected.filter((entry) => !entry.present).map((entry) => entry.name);
  if (missing.length > 0) {
    context.progress(`     ⚠️  Missing expected directories: ${missing.join(', ')}`);
  }

  const expectedNames = new Set(context.expectedDirs);
  const extras = sortNames([...present].filter((dirName) => !expectedNames.has(dirName)));
  if (extras.length > 0) {
    context.progress(`     ℹ️  Extra directories detected: ${extras.join(', ')}`);
  }

  return {
    node: { name, path: collectionDir, expected, extras },
    complete: missing.length === 0,
  };
};

const buildPin = async (pinDir: string, context: BuildContext): Promise<Built<PinStatus>> => {
  const name = path.basename(pinDir);
  context.progress(`   Inspecting pin: ${name}`);

  const collectionNames = (await listChildDirectories(pinDir)).filter(isLetteredCollection);
  if (collectionNames.length === 0) {
    context.progress(`    ⚠️  No collection directory found under pin ${name}`);
    return {
      node: { name, path: pinDir, collections: [], missingCollections: true },
      complete: false,
    };
  }

  const collections: Built<CollectionStatus>[] = [];
  for (const collectionName of collectionNames) {
    collections.push(await buildCollection(path.join(pinDir, collectionName), context));
  }

  return {
    node: {
      name,
      path: pinDir,
      collections: collections.map((item) => item.node),
      missingCollections: false,
    },
    complete: allComplete(collections),
  };
};

const buildPuck = async (puckDir: string, context: BuildContext): Promise<Built<PuckStatus>> => {
  const name = path.basename(puckDir);
  context.progress(`  Processing puck: ${name}`);

  const pins: Built<PinStatus>[] = [];
  for (const pinName of await listChildDirectories(puckDir)) {
    pins.push(await buildPin(path.join(puckDir, pinName), context));
  }

  return {
    node: { name, path: puckDir, pins: pins.map((item) => item.node) },
    complete: allComplete(pins),
  };
};

const buildSite = async (
  name: string,
  siteDir: string,
  context: BuildContext,
): Promise<Built<SiteStatus>> => {
  const pucks: Built<PuckStatus>[] = [];
  for (const puckName of await listChildDirectories(siteDir)) {
    pucks.push(await buildPuck(path.join(siteDir, puckName), context));
  }

  return {
    node: { name, path: siteDir, pucks: pucks.map((item) => item.node) },
    complete: allComplete(pucks),
  };
};

/**
 * Walks a trip directory (site → puck → pin → lettered collection) and reports
 * which expected collection subdirectories exist.
 *
 * Directories are visited one at a time in ordinal name order at every level,
 * so the result does not depend on filesystem enumeration order.
 */
export const buildHierarchy = async (
  root: string,
  options: BuildHierarchyOptions = {},
): Promise<HierarchyResult> => {
  const rootPath = await resolveTripRoot(root);
  const context: BuildContext = {
    expectedDirs: options.expectedDirs ?? DEFAULT_EXPECTED_COLLECTION_DIRS,
    progress: options.onProgress ?? (() => undefined),
  };

  context.progress(`Scanning trip directory: ${rootPath}`);

  const sites: Built<SiteStatus>[] = [];
  if (options.grouping === 'flat') {
    context.progress('No site level detected; grouping pucks directly under trip.');
    sites.push(await buildSite(FLAT_SITE_NAME, rootPath, context));
  } else {
    for (const siteName of await listChildDirectories(rootPath)) {
      context.progress(` Found site: ${siteName}`);
      sites.push(await buildSite(siteName, path.join(rootPath, siteName), context));
    }
  }

  return {
    trip: {
      name: path.basename(rootPath),
      path: rootPath,
      sites: sites.map((item) => item.node),
    },
    allExpectedPresent: allComplete(sites),
  };
};
