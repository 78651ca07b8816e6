export const DEFAULT_EXPECTED_COLLECTION_DIRS: readonly string[] = [
  'camera',
  'diff-center',
  'images',
  'processing',
];

export const CAMERA_DIR = 'camera';
export const PROCESSING_DIR = 'processing';

/** Name of the synthetic site that holds pucks when the trip has no site level. */
export const FLAT_SITE_NAME = 'root';

const singleUppercaseLetter = /^\p{Lu}$/u;

/**
 * A lettered collection is a directory named by exactly one uppercase letter.
 * Lowercase letters are not folded: `a` is not a collection.
 */
export const isLetteredCollection = (name: string) => singleUppercaseLetter.test(name);

/** Ordinal comparison on UTF-8 bytes (code point order, `C` before `b`). */
export const compareNames = (a: string, b: string) =>
  Buffer.compare(Buffer.from(a, 'utf8'), Buffer.from(b, 'utf8'));

export const sortNames = (names: Iterable<string>): string[] => [...names].sort(compareNames);
