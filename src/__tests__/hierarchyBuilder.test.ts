import fs from 'fs/promises';
import path from 'path';
import { TripRootNotDirectoryError, TripRootNotFoundError } from '../common/errors';
import { buildHierarchy } from '../main/hierarchyBuilder';
import { countHierarchy, iterCollections } from '../types/hierarchy';
import {
  cleanupTempDir,
  makeCollection,
  makeDirs,
  makeTempDir,
  writeFile,
} from './helpers/tripFixture';

describe('buildHierarchy', () => {
  let trip: string | null = null;

  const makeTrip = async () => {
    trip = await makeTempDir('hierarchy-builder-');
    return trip;
  };

  afterEach(async () => {
    await cleanupTempDir(trip);
    trip = null;
  });

  it('reports a complete trip when every collection has every expected folder', async () => {
    const root = await makeTrip();
    await makeCollection(root, 'siteA/puck1/pin1/A');

    const result = await buildHierarchy(root);

    expect(result.allExpectedPresent).toBe(true);
    expect(result.trip.name).toBe(path.basename(root));
    expect(result.trip.path).toBe(root);
    const [context] = [...iterCollections(result.trip)];
    expect(context.site.name).toBe('siteA');
    expect(context.puck.name).toBe('puck1');
    expect(context.pin.name).toBe('pin1');
    expect(context.collection.path).toBe(path.join(root, 'siteA', 'puck1', 'pin1', 'A'));
    expect(context.collection.expected.map((entry) => [entry.name, entry.present])).toEqual([
      ['camera', true],
      ['diff-center', true],
      ['images', true],
      ['processing', true],
    ]);
    expect(context.collection.extras).toEqual([]);
  });

  it('flags a collection missing an expected folder and lists extras', async () => {
    const root = await makeTrip();
    await makeCollection(root, 'siteA/puck1/pin1/A', ['camera', 'images', 'processing', 'zz', 'notes']);

    const result = await buildHierarchy(root);

    expect(result.allExpectedPresent).toBe(false);
    const [{ collection }] = [...iterCollections(result.trip)];
    const diffCenter = collection.expected.find((entry) => entry.name === 'diff-center');
    expect(diffCenter).toEqual({ name: 'diff-center', present: false, metadata: { kind: 'none' } });
    expect(collection.extras).toEqual(['notes', 'zz']);
  });

  it('keeps a trip with only extra folders valid', async () => {
    const root = await makeTrip();
    await makeCollection(root, 'siteA/puck1/pin1/A', ['camera', 'diff-center', 'images', 'processing', 'logs']);

    const result = await buildHierarchy(root);

    expect(result.allExpectedPresent).toBe(true);
  });

  it('only treats single uppercase letters as collections', async () => {
    const root = await makeTrip();
    await makeDirs(root, 'siteA/puck1/pin1/a', 'siteA/puck1/pin1/AB', 'siteA/puck1/pin1/1');

    const result = await buildHierarchy(root);

    const [pin] = result.trip.sites[0].pucks[0].pins;
    expect(pin.missingCollections).toBe(true);
    expect(pin.collections).toEqual([]);
    expect(result.allExpectedPresent).toBe(false);
  });

  it('orders every level by name regardless of creation order', async () => {
    const root = await makeTrip();
    await makeCollection(root, 'siteB/puck2/pin9/C');
    await makeCollection(root, 'siteB/puck2/pin9/A');
    await makeCollection(root, 'siteB/puck1/pin1/B');
    await makeCollection(root, 'siteA/puck3/pin2/A');
    await makeDirs(root, 'siteA/puck3/pin10');

    const result = await buildHierarchy(root);

    expect(result.trip.sites.map((site) => site.name)).toEqual(['siteA', 'siteB']);
    expect(result.trip.sites[1].pucks.map((puck) => puck.name)).toEqual(['puck1', 'puck2']);
    expect(result.trip.sites[0].pucks[0].pins.map((pin) => pin.name)).toEqual(['pin10', 'pin2']);
    expect(result.trip.sites[1].pucks[1].pins[0].collections.map((c) => c.name)).toEqual(['A', 'C']);
    expect(countHierarchy(result.trip)).toEqual({
      sites: 2,
      pucks: 3,
      pins: 4,
      collections: 4,
      pinsWithIssues: 1,
    });
  });

  it('ignores files at the directory levels', async () => {
    const root = await makeTrip();
    await makeCollection(root, 'siteA/puck1/pin1/A');
    await writeFile(root, 'notes.txt', 'trip notes');
    await writeFile(root, 'siteA/puck1/pin1/B', 'not a directory');

    const result = await buildHierarchy(root);

    expect(result.trip.sites).toHaveLength(1);
    expect(result.trip.sites[0].pucks[0].pins[0].collections.map((c) => c.name)).toEqual(['A']);
  });

  it('groups pucks under a synthetic root site in flat mode', async () => {
    const root = await makeTrip();
    await makeCollection(root, 'puckA/pin1/A');

    const result = await buildHierarchy(root, { grouping: 'flat' });

    expect(result.trip.sites).toHaveLength(1);
    expect(result.trip.sites[0]).toMatchObject({ name: 'root', path: root });
    expect(result.trip.sites[0].pucks.map((puck) => puck.name)).toEqual(['puckA']);
    expect(result.allExpectedPresent).toBe(true);
  });

  it('honours a custom expected folder list', async () => {
    const root = await makeTrip();
    await makeCollection(root, 'siteA/puck1/pin1/A', ['camera', 'images']);

    const result = await buildHierarchy(root, { expectedDirs: ['images', 'camera'] });

    const [{ collection }] = [...iterCollections(result.trip)];
    expect(collection.expected.map((entry) => entry.name)).toEqual(['images', 'camera']);
    expect(result.allExpectedPresent).toBe(true);
  });

  it('attaches camera metadata to present camera folders', async () => {
    const root = await makeTrip();
    await makeCollection(root, 'siteA/puck1/pin1/A');
    const image = await writeFile(root, 'siteA/puck1/pin1/A/camera/loop-inter_4_000.jpeg');

    const result = await buildHierarchy(root);

    const [{ collection }] = [...iterCollections(result.trip)];
    expect(collection.expected[0].metadata).toEqual({
      kind: 'camera',
      imageFiles: [image],
      csvFiles: [],
    });
    expect(collection.expected[1].metadata).toEqual({ kind: 'none' });
  });

  it('reports an empty trip as valid', async () => {
    const root = await makeTrip();

    const result = await buildHierarchy(root);

    expect(result.trip.sites).toEqual([]);
    expect(result.allExpectedPresent).toBe(true);
  });

  it('reports progress while scanning', async () => {
    const root = await makeTrip();
    await makeCollection(root, 'siteA/puck1/pin1/A', ['camera']);
    await makeDirs(root, 'siteA/puck1/pin2');
    const messages: string[] = [];

    await buildHierarchy(root, { onProgress: (message) => messages.push(message) });

    expect(messages).toEqual([
      `Scanning trip directory: ${root}`,
      ' Found site: siteA',
      '  Processing puck: puck1',
      '   Inspecting pin: pin1',
      '    Collection A: analysing expected folders',
      '     ⚠️  Missing expected directories: diff-center, images, processing',
      '   Inspecting pin: pin2',
      '    ⚠️  No collection directory found under pin pin2',
    ]);
  });

  it('rejects a missing root', async () => {
    const root = await makeTrip();
    const missing = path.join(root, 'does-not-exist');

    await expect(buildHierarchy(missing)).rejects.toThrow(TripRootNotFoundError);
    await expect(buildHierarchy(missing)).rejects.toMatchObject({ rootPath: missing });
  });

  it('passes through resolution failures other than a missing path', async () => {
    const root = await makeTrip();
    const loop = path.join(root, 'loop');
    await fs.symlink(loop, loop);

    await expect(buildHierarchy(loop)).rejects.toMatchObject({ code: 'ELOOP' });
    await expect(buildHierarchy(loop)).rejects.not.toBeInstanceOf(TripRootNotFoundError);
  });

  it('rejects a root that is a file', async () => {
    const root = await makeTrip();
    const file = path.join(root, 'trip.txt');
    await fs.writeFile(file, 'not a trip');

    await expect(buildHierarchy(file)).rejects.toThrow(TripRootNotDirectoryError);
  });
});
