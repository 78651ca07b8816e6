/*
 * Persisted JSON layout of a hierarchy result. Keys are snake_case on disk;
 * the in-memory model in ./hierarchy is camelCase.
 */
import type { JsonObject } from './hierarchy';

export interface SerializedExpectedDirectory {
  name: string;
  present: boolean;
  path: string | null;
  metadata: JsonObject;
}

export interface SerializedCollection {
  name: string;
  path: string;
  expected: SerializedExpectedDirectory[];
  extras: string[];
}

export interface SerializedPin {
  name: string;
  path: string;
  missing_collections: boolean;
  collections: SerializedCollection[];
}

export interface SerializedPuck {
  name: string;
  path: string;
  pins: SerializedPin[];
}

export interface SerializedSite {
  name: string;
  path: string;
  pucks: SerializedPuck[];
}

export interface SerializedTrip {
  name: string;
  path: string;
  sites: SerializedSite[];
}

export interface SerializedHierarchy {
  trip: SerializedTrip;
  all_expected_present: boolean;
}
