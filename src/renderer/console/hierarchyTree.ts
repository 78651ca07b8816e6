import { createColors, isColorSupported } from 'colorette';
import { DEFAULT_EXPECTED_COLLECTION_DIRS } from '../../common/collectionNames';
import type {
  CollectionStatus,
  HierarchyResult,
  PinStatus,
  TripHierarchy,
} from '../../types/hierarchy';
import { statusLabel } from '../../types/hierarchy';

type Colors = ReturnType<typeof createColors>;

interface TreeNode {
  label: string;
  children: TreeNode[];
}

export interface RenderTreeOptions {
  expectedDirs?: readonly string[];
  colors?: boolean;
}

const node = (label: string, children: TreeNode[] = []): TreeNode => ({ label, children });

const collectionNode = (
  collection: CollectionStatus,
  expectedDirs: readonly string[],
  c: Colors,
): TreeNode => {
  const lookup = new Map(collection.expected.map((entry) => [entry.name, entry]));
  const children = expectedDirs.map((expectedName) => {
    const entry = lookup.get(expectedName);
    const line = `- ${expectedName} (${entry ? statusLabel(entry) : 'missing'})`;
    return node(entry?.present ? c.green(line) : c.bold(c.red(line)));
  });
  for (const extra of collection.extras) {
    children.push(node(c.yellow(`- ${extra} (extra)`)));
  }
  return node(`${c.green('Collection ')}${c.bold(c.green(collection.name))}`, children);
};

const pinNode = (pin: PinStatus, expectedDirs: readonly string[], c: Colors): TreeNode => {
  let label = `${c.bold(c.magenta('Pin: '))}${pin.name}`;
  const children: TreeNode[] = [];
  if (pin.missingCollections) {
    label += c.bold(c.red(' (missing collections)'));
    children.push(node(c.bold(c.red('- No lettered collection directories found.'))));
  }
  for (const collection of pin.collections) {
    children.push(collectionNode(collection, expectedDirs, c));
  }
  return node(label, children);
};

const tripNode = (trip: TripHierarchy, expectedDirs: readonly string[], c: Colors): TreeNode =>
  node(
    `${c.bold('Trip: ')}${c.bold(c.cyan(trip.name))}`,
    trip.sites.map((site) =>
      node(
        `${c.cyan('Site: ')}${site.name}`,
        site.pucks.map((puck) =>
          node(
            `${c.magenta('Puck: ')}${puck.name}`,
            puck.pins.map((pin) => pinNode(pin, expectedDirs, c)),
          ),
        ),
      ),
    ),
  );

const drawTree = (root: TreeNode, guide: (text: string) => string): string[] => {
  const lines = [root.label];
  const walk = (current: TreeNode, prefix: string) => {
    current.children.forEach((child, index) => {
      const isLast = index === current.children.length - 1;
      lines.push(`${guide(prefix + (isLast ? '└── ' : '├── '))}${child.label}`);
      walk(child, prefix + (isLast ? '    ' : '│   '));
    });
  };
  walk(root, '');
  return lines;
};

/**
 * Renders the hierarchy as box-drawing tree lines followed by a verdict line.
 */
export const renderHierarchyTree = (
  result: HierarchyResult,
  { expectedDirs = DEFAULT_EXPECTED_COLLECTION_DIRS, colors = isColorSupported }: RenderTreeOptions = {},
): string[] => {
  const c = createColors({ useColor: colors });

  if (result.trip.sites.length === 0) {
    return [c.yellow('No sites found under the provided trip directory.')];
  }

  const lines = drawTree(tripNode(result.trip, expectedDirs, c), (text) => c.gray(text));
  lines.push(
    result.allExpectedPresent
      ? c.green('All expected collection directories found.')
      : c.bold(c.red('Missing collection directories detected.')),
  );
  return lines;
};

export const printHierarchy = (
  result: HierarchyResult,
  options: RenderTreeOptions = {},
  write: (line: string) => void = (line) => console.log(line),
) => {
  renderHierarchyTree(result, options).forEach((line) => write(line));
};
