import type { HierarchyCounts } from '../../types/hierarchy';
import type { CollectionRow, PinIssueRow, PreviewCells } from './flattenCollections';
import type { PreviewColumn } from './previewColumns';
import { CAMERA_PREVIEW_COLUMNS, PROCESSING_PREVIEW_COLUMNS } from './previewColumns';
import { REPORT_STYLES } from './reportStyles';

export interface ReportDocumentProps {
  title: string;
  tripName: string;
  tripPath: string;
  generatedAt: string;
  counts: HierarchyCounts;
  allExpectedPresent: boolean;
  expectedDirs: readonly string[];
  rows: CollectionRow[];
  pinsWithoutCollections: PinIssueRow[];
}

const STAT_LABELS: [keyof HierarchyCounts, string][] = [
  ['sites', 'Sites'],
  ['pucks', 'Pucks'],
  ['pins', 'Pins'],
  ['collections', 'Collections'],
  ['pinsWithIssues', 'Pins with issues'],
];

const PreviewCell = ({ column, cells }: { column: PreviewColumn; cells: PreviewCells }) => {
  const preview = cells[column.key];
  if (!preview) {
    return (
      <td className="preview">
        <span className="placeholder">{`Missing ${column.missing}`}</span>
      </td>
    );
  }
  return (
    <td className="preview">
      <img src={preview.dataUri} alt={preview.basename} title={preview.path} />
      <span className="caption">{preview.basename}</span>
    </td>
  );
};

const CollectionTableRow = ({
  row,
  expectedDirs,
}: {
  row: CollectionRow;
  expectedDirs: readonly string[];
}) => (
  <tr className={row.issues.length > 0 ? 'has-issues' : undefined}>
    <td>{row.site}</td>
    <td>{row.puck}</td>
    <td>{row.pin}</td>
    <td>
      <code title={row.collectionPath}>{row.collection}</code>
    </td>
    {expectedDirs.map((name) => {
      const cell = row.expected[name];
      const status = cell?.status ?? 'missing';
      return (
        <td key={name} className={`status-${status.toLowerCase()}`} title={cell?.path ?? undefined}>
          {status}
        </td>
      );
    })}
    {CAMERA_PREVIEW_COLUMNS.map((column) => (
      <PreviewCell key={column.key} column={column} cells={row.cameraPreviewCells} />
    ))}
    {PROCESSING_PREVIEW_COLUMNS.map((column) => (
      <PreviewCell key={column.key} column={column} cells={row.processingPreviewCells} />
    ))}
    <td>
      {row.issues.length > 0 ? (
        <ul className="issues">
          {row.issues.map((issue) => (
            <li key={issue}>{issue}</li>
          ))}
        </ul>
      ) : (
        <span className="status-ok">None</span>
      )}
    </td>
  </tr>
);

export function ReportDocument({
  title,
  tripName,
  tripPath,
  generatedAt,
  counts,
  allExpectedPresent,
  expectedDirs,
  rows,
  pinsWithoutCollections,
}: ReportDocumentProps) {
  return (
    <html lang="en">
      <head>
        <meta charSet="utf-8" />
        <title>{title}</title>
        <style dangerouslySetInnerHTML={{ __html: REPORT_STYLES }} />
      </head>
      <body>
        <h1>{title}</h1>
        <p className="meta">
          Trip <strong>{tripName}</strong> at <code>{tripPath}</code>
        </p>
        <p className="meta">{`Generated ${generatedAt}`}</p>

        <ul className="stats">
          {STAT_LABELS.map(([key, label]) => (
            <li key={key}>
              <strong>{counts[key]}</strong>
              {label}
            </li>
          ))}
        </ul>

        <p className={`verdict ${allExpectedPresent ? 'ok' : 'bad'}`}>
          {allExpectedPresent
            ? 'All expected collection directories found.'
            : 'Missing collection directories detected.'}
        </p>

        {rows.length === 0 ? (
          <p className="placeholder">No lettered collections found.</p>
        ) : (
          <table>
            <thead>
              <tr>
                <th>Site</th>
                <th>Puck</th>
                <th>Pin</th>
                <th>Collection</th>
                {expectedDirs.map((name) => (
                  <th key={name}>{name}</th>
                ))}
                {[...CAMERA_PREVIEW_COLUMNS, ...PROCESSING_PREVIEW_COLUMNS].map((column) => (
                  <th key={column.key}>{column.header}</th>
                ))}
                <th>Issues</th>
              </tr>
            </thead>
            <tbody>
              {rows.map((row) => (
                <CollectionTableRow key={row.collectionPath} row={row} expectedDirs={expectedDirs} />
              ))}
            </tbody>
          </table>
        )}

        {pinsWithoutCollections.length > 0 && (
          <section>
            <h2>Pins without lettered collections</h2>
            <ul className="issues">
              {pinsWithoutCollections.map((pin) => (
                <li key={pin.pinPath}>{`${pin.site} / ${pin.puck} / ${pin.pin}`}</li>
              ))}
            </ul>
          </section>
        )}
      </body>
    </html>
  );
}
