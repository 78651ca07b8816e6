import { printHierarchy, renderHierarchyTree } from '../renderer/console/hierarchyTree';
import type { HierarchyResult } from '../types/hierarchy';

const result: HierarchyResult = {
  trip: {
    name: 'trip-01',
    path: '/data/trip-01',
    sites: [
      {
        name: 'siteA',
        path: '/data/trip-01/siteA',
        pucks: [
          {
            name: 'puck1',
            path: '/data/trip-01/siteA/puck1',
            pins: [
              {
                name: 'pin1',
                path: '/data/trip-01/siteA/puck1/pin1',
                missingCollections: false,
                collections: [
                  {
                    name: 'A',
                    path: '/data/trip-01/siteA/puck1/pin1/A',
                    expected: [
                      {
                        name: 'camera',
                        present: true,
                        path: '/data/trip-01/siteA/puck1/pin1/A/camera',
                        metadata: { kind: 'none' },
                      },
                      { name: 'diff-center', present: false, metadata: { kind: 'none' } },
                    ],
                    extras: ['logs'],
                  },
                ],
              },
              {
                name: 'pin2',
                path: '/data/trip-01/siteA/puck1/pin2',
                missingCollections: true,
                collections: [],
              },
            ],
          },
        ],
      },
    ],
  },
  allExpectedPresent: false,
};

describe('renderHierarchyTree', () => {
  it('draws the trip as a tree with a verdict line', () => {
    expect(
      renderHierarchyTree(result, { expectedDirs: ['camera', 'diff-center'], colors: false }),
    ).toEqual([
      'Trip: trip-01',
      '└── Site: siteA',
      '    └── Puck: puck1',
      '        ├── Pin: pin1',
      '        │   └── Collection A',
      '        │       ├── - camera (OK)',
      '        │       ├── - diff-center (missing)',
      '        │       └── - logs (extra)',
      '        └── Pin: pin2 (missing collections)',
      '            └── - No lettered collection directories found.',
      'Missing collection directories detected.',
    ]);
  });

  it('reports expected names without an entry as missing', () => {
    const lines = renderHierarchyTree(result, { expectedDirs: ['camera', 'images'], colors: false });

    expect(lines[6]).toBe('        │       ├── - images (missing)');
  });

  it('prints a single line for a trip without sites', () => {
    const empty: HierarchyResult = {
      trip: { name: 'empty', path: '/data/empty', sites: [] },
      allExpectedPresent: true,
    };

    expect(renderHierarchyTree(empty, { colors: false })).toEqual([
      'No sites found under the provided trip directory.',
    ]);
  });

  it('ends complete trips with the success verdict', () => {
    const complete: HierarchyResult = {
      trip: {
        name: 'ok',
        path: '/data/ok',
        sites: [{ name: 'root', path: '/data/ok', pucks: [] }],
      },
      allExpectedPresent: true,
    };

    expect(renderHierarchyTree(complete, { colors: false })).toEqual([
      'Trip: ok',
      '└── Site: root',
      'All expected collection directories found.',
    ]);
  });
});

describe('printHierarchy', () => {
  it('writes every line through the given writer', () => {
    const lines: string[] = [];

    printHierarchy(result, { expectedDirs: ['camera'], colors: false }, (line) => lines.push(line));

    expect(lines[0]).toBe('Trip: trip-01');
    expect(lines[lines.length - 1]).toBe('Missing collection directories detected.');
    expect(lines).toHaveLength(10);
  });
});
