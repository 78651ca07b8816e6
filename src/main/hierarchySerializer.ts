import fs from 'fs/promises';
import path from 'path';
import { CAMERA_DIR, PROCESSING_DIR } from '../common/collectionNames';
import { resolveUserPath } from '../common/directoryEntries';
import { HierarchyDeserializationError } from '../common/errors';
import type {
  CollectionStatus,
  DirectoryMetadata,
  ExpectedDirectoryStatus,
  HierarchyResult,
  JsonObject,
  JsonValue,
  PinStatus,
  PuckStatus,
  SiteStatus,
  TripHierarchy,
} from '../types/hierarchy';
import { NO_METADATA, summaryImage } from '../types/hierarchy';
import type {
  SerializedCollection,
  SerializedExpectedDirectory,
  SerializedHierarchy,
  SerializedPin,
  SerializedPuck,
  SerializedSite,
} from '../types/serializedHierarchy';

const isObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const isJsonValue = (value: unknown): value is JsonValue => {
  if (value === null || ['string', 'number', 'boolean'].includes(typeof value)) {
    return true;
  }
  if (Array.isArray(value)) {
    return value.every(isJsonValue);
  }
  return isObject(value) && Object.values(value).every(isJsonValue);
};

const isJsonObject = (value: unknown): value is JsonObject =>
  isObject(value) && Object.values(value).every(isJsonValue);

const isStringArray = (value: unknown): value is string[] =>
  Array.isArray(value) && value.every((item) => typeof item === 'string');

/* ------------------------------------------------------------------ */
/* Serialisation                                                       */
/* ------------------------------------------------------------------ */

export const serializeMetadata = (metadata: DirectoryMetadata): JsonObject => {
  switch (metadata.kind) {
    case 'none':
      return {};
    case 'camera':
      return { image_files: [...metadata.imageFiles], csv_files: [...metadata.csvFiles] };
    case 'processing': {
      const first = summaryImage(metadata);
      return {
        ...(metadata.summarySource ? { summary_source: metadata.summarySource } : {}),
        summary_images: [...metadata.summaryImages],
        ...(first ? { summary_image: first } : {}),
      };
    }
    case 'raw':
      return { ...metadata.values };
    default: {
      const exhaustive: never = metadata;
      throw new Error(`Unsupported metadata: ${JSON.stringify(exhaustive)}`);
    }
  }
};

const serializeExpected = (entry: ExpectedDirectoryStatus): SerializedExpectedDirectory => ({
  name: entry.name,
  present: entry.present,
  path: entry.path ?? null,
  metadata: serializeMetadata(entry.metadata),
});

const serializeCollection = (collection: CollectionStatus): SerializedCollection => ({
  name: collection.name,
  path: collection.path,
  expected: collection.expected.map(serializeExpected),
  extras: [...collection.extras],
});

const serializePin = (pin: PinStatus): SerializedPin => ({
  name: pin.name,
  path: pin.path,
  missing_collections: pin.missingCollections,
  collections: pin.collections.map(serializeCollection),
});

const serializePuck = (puck: PuckStatus): SerializedPuck => ({
  name: puck.name,
  path: puck.path,
  pins: puck.pins.map(serializePin),
});

const serializeSite = (site: SiteStatus): SerializedSite => ({
  name: site.name,
  path: site.path,
  pucks: site.pucks.map(serializePuck),
});

export const serializeHierarchy = (result: HierarchyResult): SerializedHierarchy => ({
  trip: {
    name: result.trip.name,
    path: result.trip.path,
    sites: result.trip.sites.map(serializeSite),
  },
  all_expected_present: result.allExpectedPresent,
});

/* ------------------------------------------------------------------ */
/* Deserialisation                                                     */
/* ------------------------------------------------------------------ */

const requireObject = (value: unknown, at: string): Record<string, unknown> => {
  if (!isObject(value)) {
    throw new HierarchyDeserializationError(at, 'expected an object');
  }
  return value;
};

const requireString = (record: Record<string, unknown>, key: string, at: string): string => {
  const value = record[key];
  if (value === undefined) {
    throw new HierarchyDeserializationError(`${at}.${key}`, 'missing required key');
  }
  if (typeof value !== 'string') {
    throw new HierarchyDeserializationError(`${at}.${key}`, 'expected a string');
  }
  return value;
};

const optionalBoolean = (record: Record<string, unknown>, key: string, at: string): boolean => {
  const value = record[key];
  if (value === undefined || value === null) {
    return false;
  }
  if (typeof value !== 'boolean') {
    throw new HierarchyDeserializationError(`${at}.${key}`, 'expected a boolean');
  }
  return value;
};

const optionalList = (record: Record<string, unknown>, key: string, at: string): unknown[] => {
  const value = record[key];
  if (value === undefined || value === null) {
    return [];
  }
  if (!Array.isArray(value)) {
    throw new HierarchyDeserializationError(`${at}.${key}`, 'expected a list');
  }
  return value;
};

const optionalStringList = (record: Record<string, unknown>, key: string, at: string): string[] => {
  const list = optionalList(record, key, at);
  if (!isStringArray(list)) {
    throw new HierarchyDeserializationError(`${at}.${key}`, 'expected a list of strings');
  }
  return list;
};

/**
 * Picks the metadata variant from the expected-directory name and the keys
 * present. Mappings that fit neither known shape are kept verbatim.
 */
export const deserializeMetadata = (name: string, value: unknown, at: string): DirectoryMetadata => {
  if (value === undefined || value === null) {
    return NO_METADATA;
  }
  const record = requireObject(value, at);
  if (Object.keys(record).length === 0) {
    return NO_METADATA;
  }

  if (
    name === CAMERA_DIR &&
    (isStringArray(record.image_files) || isStringArray(record.csv_files))
  ) {
    return {
      kind: 'camera',
      imageFiles: optionalStringList(record, 'image_files', at),
      csvFiles: optionalStringList(record, 'csv_files', at),
    };
  }

  if (
    name === PROCESSING_DIR &&
    (isStringArray(record.summary_images) || typeof record.summary_image === 'string')
  ) {
    const images = optionalStringList(record, 'summary_images', at);
    const single = typeof record.summary_image === 'string' ? record.summary_image : undefined;
    return {
      kind: 'processing',
      ...(typeof record.summary_source === 'string' ? { summarySource: record.summary_source } : {}),
      summaryImages: images.length === 0 && single ? [single] : images,
    };
  }

  if (!isJsonObject(value)) {
    throw new HierarchyDeserializationError(at, 'metadata is not JSON-safe');
  }
  return { kind: 'raw', values: value };
};

const deserializeExpected = (value: unknown, at: string): ExpectedDirectoryStatus => {
  const record = requireObject(value, at);
  const name = requireString(record, 'name', at);
  const rawPath = record.path;
  if (rawPath !== undefined && rawPath !== null && typeof rawPath !== 'string') {
    throw new HierarchyDeserializationError(`${at}.path`, 'expected a string or null');
  }
  return {
    name,
    present: optionalBoolean(record, 'present', at),
    ...(rawPath ? { path: rawPath } : {}),
    metadata: deserializeMetadata(name, record.metadata, `${at}.metadata`),
  };
};

const deserializeCollection = (value: unknown, at: string): CollectionStatus => {
  const record = requireObject(value, at);
  return {
    name: requireString(record, 'name', at),
    path: requireString(record, 'path', at),
    expected: optionalList(record, 'expected', at).map((item, index) =>
      deserializeExpected(item, `${at}.expected[${index}]`),
    ),
    extras: optionalStringList(record, 'extras', at),
  };
};

const deserializePin = (value: unknown, at: string): PinStatus => {
  const record = requireObject(value, at);
  return {
    name: requireString(record, 'name', at),
    path: requireString(record, 'path', at),
    collections: optionalList(record, 'collections', at).map((item, index) =>
      deserializeCollection(item, `${at}.collections[${index}]`),
    ),
    missingCollections: optionalBoolean(record, 'missing_collections', at),
  };
};

const deserializePuck = (value: unknown, at: string): PuckStatus => {
  const record = requireObject(value, at);
  return {
    name: requireString(record, 'name', at),
    path: requireString(record, 'path', at),
    pins: optionalList(record, 'pins', at).map((item, index) =>
      deserializePin(item, `${at}.pins[${index}]`),
    ),
  };
};

const deserializeSite = (value: unknown, at: string): SiteStatus => {
  const record = requireObject(value, at);
  return {
    name: requireString(record, 'name', at),
    path: requireString(record, 'path', at),
    pucks: optionalList(record, 'pucks', at).map((item, index) =>
      deserializePuck(item, `${at}.pucks[${index}]`),
    ),
  };
};

const deserializeTrip = (value: unknown, at: string): TripHierarchy => {
  if (value === undefined) {
    throw new HierarchyDeserializationError(at, 'missing required key');
  }
  const record = requireObject(value, at);
  return {
    name: requireString(record, 'name', at),
    path: requireString(record, 'path', at),
    sites: optionalList(record, 'sites', at).map((item, index) =>
      deserializeSite(item, `${at}.sites[${index}]`),
    ),
  };
};

/**
 * Rebuilds a hierarchy result from its JSON form. Missing lists default to
 * empty and missing flags to `false`; missing names or paths are errors.
 */
export const deserializeHierarchy = (payload: unknown): HierarchyResult => {
  const record = requireObject(payload, '$');
  return {
    trip: deserializeTrip(record.trip, 'trip'),
    allExpectedPresent: optionalBoolean(record, 'all_expected_present', '$'),
  };
};

/* ------------------------------------------------------------------ */
/* Persistence                                                         */
/* ------------------------------------------------------------------ */

export const writeHierarchyJson = async (
  outputPath: string,
  result: HierarchyResult,
): Promise<string> => {
  const resolved = resolveUserPath(outputPath);
  await fs.mkdir(path.dirname(resolved), { recursive: true });
  await fs.writeFile(resolved, JSON.stringify(serializeHierarchy(result), null, 2), 'utf8');
  return resolved;
};

export const loadHierarchyJson = async (inputPath: string): Promise<HierarchyResult> => {
  const resolved = resolveUserPath(inputPath);
  const raw = await fs.readFile(resolved, 'utf8');
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new HierarchyDeserializationError('$', `not valid JSON (${detail})`);
  }
  return deserializeHierarchy(parsed);
};
