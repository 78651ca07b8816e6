export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

export type SiteGrouping = 'sites' | 'flat';

export interface NoMetadata {
  kind: 'none';
}

export interface CameraMetadata {
  kind: 'camera';
  /** Absolute, resolved image paths sorted ordinally */
  imageFiles: string[];
  /** Absolute, resolved CSV paths sorted ordinally */
  csvFiles: string[];
}

export interface ProcessingMetadata {
  kind: 'processing';
  /**
   * Summary document the images were scraped from. Absent whenever the images
   * came from the fallback search, even if a summary document exists.
   */
  summarySource?: string;
  /** Summary plot images in discovery order */
  summaryImages: string[];
}

/** Metadata loaded from a dump that matches neither camera nor processing shapes. */
export interface RawMetadata {
  kind: 'raw';
  values: JsonObject;
}

export type DirectoryMetadata =
  | NoMetadata
  | CameraMetadata
  | ProcessingMetadata
  | RawMetadata;

export interface ExpectedDirectoryStatus {
  name: string;
  present: boolean;
  path?: string;
  metadata: DirectoryMetadata;
}

export interface CollectionStatus {
  name: string;
  path: string;
  expected: ExpectedDirectoryStatus[];
  extras: string[];
}

export interface PinStatus {
  name: string;
  path: string;
  collections: CollectionStatus[];
  missingCollections: boolean;
}

export interface PuckStatus {
  name: string;
  path: string;
  pins: PinStatus[];
}

export interface SiteStatus {
  name: string;
  path: string;
  pucks: PuckStatus[];
}

export interface TripHierarchy {
  name: string;
  path: string;
  sites: SiteStatus[];
}

export interface HierarchyResult {
  trip: TripHierarchy;
  allExpectedPresent: boolean;
}

export interface CollectionContext {
  site: SiteStatus;
  puck: PuckStatus;
  pin: PinStatus;
  collection: CollectionStatus;
}

export interface HierarchyCounts {
  sites: number;
  pucks: number;
  pins: number;
  collections: number;
  pinsWithIssues: number;
}

export const NO_METADATA: NoMetadata = { kind: 'none' };

export const statusLabel = (entry: ExpectedDirectoryStatus) =>
  entry.present ? 'OK' : 'missing';

export const missingExpectedNames = (collection: CollectionStatus): string[] =>
  collection.expected.filter((entry) => !entry.present).map((entry) => entry.name);

export const collectionMissingExpected = (collection: CollectionStatus) =>
  collection.expected.some((entry) => !entry.present);

export const pinHasIssues = (pin: PinStatus) =>
  pin.missingCollections || pin.collections.some(collectionMissingExpected);

export const summaryImage = (metadata: ProcessingMetadata): string | undefined =>
  metadata.summaryImages[0];

export function* iterPins(trip: TripHierarchy): Generator<PinStatus> {
  for (const site of trip.sites) {
    for (const puck of site.pucks) {
      yield* puck.pins;
    }
  }
}

export function* iterCollections(trip: TripHierarchy): Generator<CollectionContext> {
  for (const site of trip.sites) {
    for (const puck of site.pucks) {
      for (const pin of puck.pins) {
        for (const collection of pin.collections) {
          yield { site, puck, pin, collection };
        }
      }
    }
  }
}

export const countHierarchy = (trip: TripHierarchy): HierarchyCounts => {
  const pins = [...iterPins(trip)];
  return {
    sites: trip.sites.length,
    pucks: trip.sites.reduce((sum, site) => sum + site.pucks.length, 0),
    pins: pins.length,
    collections: pins.reduce((sum, pin) => sum + pin.collections.length, 0),
    pinsWithIssues: pins.filter(pinHasIssues).length,
  };
};
