import { Command, CommanderError } from 'commander';
import { resolveReportConfig, type ReportConfig } from '../main/config';
import { buildHierarchy } from '../main/hierarchyBuilder';
import { loadHierarchyJson, writeHierarchyJson } from '../main/hierarchySerializer';
import { printHierarchy } from '../renderer/console/hierarchyTree';
import { renderHtmlReport, writeHtmlReport } from '../renderer/report/renderReport';
import type { HierarchyResult } from '../types/hierarchy';
import { countHierarchy } from '../types/hierarchy';
import log from '../utils/logger';
import { createReportLogger, type ReportLogger } from '../utils/reportLogger';
import { VERSION } from '../version';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

export interface CliOptions {
  strict?: boolean;
  outputHtml?: string;
  outputJson?: string;
  inputJson?: string;
  title?: string;
  /** `--no-console` sets this to false */
  console: boolean;
  /** `--no-site-level` sets this to false */
  siteLevel: boolean;
  quiet?: boolean;
  verbose?: boolean;
  color: boolean;
}

const stripTrailingNewline = (text: string) => text.replace(/\n$/, '');

export const createProgram = () =>
  new Command()
    .name('trip-report')
    .description('Inspect a trip directory and report missing collection subfolders')
    .version(VERSION)
    .argument('[root]', 'trip root directory to traverse')
    .option('--input-json <path>', 'load a previously written hierarchy instead of traversing')
    .option('--output-json <path>', 'write the hierarchy as JSON')
    .option('--output-html <path>', 'write a standalone HTML report')
    .option('--title <title>', 'HTML report title')
    .option('--no-site-level', 'treat children of the trip as pucks (no site level)')
    .option('--strict', 'exit with status 1 when expected directories are missing', false)
    .option('--no-console', 'do not print the hierarchy tree')
    .option('--quiet', 'suppress progress logging', false)
    .option('--verbose', 'print extraction detail and stack traces', false)
    .option('--no-color', 'disable coloured output')
    .exitOverride()
    .configureOutput({
      writeOut: (text) => console.log(stripTrailingNewline(text)),
      writeErr: (text) => console.error(stripTrailingNewline(text)),
    });

type HierarchySource = { kind: 'json'; inputPath: string } | { kind: 'trip'; root: string };

const loadResult = async (
  source: HierarchySource,
  config: ReportConfig,
  logger: ReportLogger,
): Promise<{ result: HierarchyResult; label: string }> => {
  if (source.kind === 'json') {
    logger.progress(`Loading hierarchy from ${source.inputPath}`);
    return { result: await loadHierarchyJson(source.inputPath), label: source.inputPath };
  }
  const result = await buildHierarchy(source.root, {
    expectedDirs: config.expectedDirs,
    grouping: config.grouping,
    onProgress: logger.progress,
  });
  return { result, label: result.trip.path };
};

const writeOutputs = async (
  result: HierarchyResult,
  options: CliOptions,
  config: ReportConfig,
  logger: ReportLogger,
) => {
  if (options.outputHtml) {
    const html = await renderHtmlReport(result, {
      expectedDirs: config.expectedDirs,
      title: config.title,
    });
    const written = await writeHtmlReport(options.outputHtml, html);
    logger.success(`HTML report written to ${written}`);
  }
  if (options.outputJson) {
    const written = await writeHierarchyJson(options.outputJson, result);
    logger.success(`Hierarchy JSON written to ${written}`);
  }
};

/**
 * Runs the command line against `argv` (user arguments only, without the
 * node and script paths) and resolves to the process exit code.
 */
export const runCli = async (argv: string[]): Promise<number> => {
  const program = createProgram();
  try {
    await program.parseAsync(argv, { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    throw error;
  }

  const options = program.opts<CliOptions>();
  const root = program.args.at(0);
  const colors = options.color ? undefined : false;
  const config = resolveReportConfig({
    grouping: options.siteLevel ? undefined : 'flat',
    title: options.title,
    verbose: options.verbose || undefined,
  });
  const logger = createReportLogger({ quiet: options.quiet, verbose: config.verbose, colors });

  let source: HierarchySource;
  if (options.inputJson) {
    source = { kind: 'json', inputPath: options.inputJson };
  } else if (root) {
    source = { kind: 'trip', root };
  } else {
    logger.logError('Provide a trip root directory or --input-json <path>.');
    program.outputHelp({ error: true });
    return EXIT_USAGE;
  }

  if (config.verbose && !options.quiet) {
    log.transports.console.level = 'debug';
  }

  let loaded: { result: HierarchyResult; label: string };
  try {
    loaded = await loadResult(source, config, logger);
  } catch (error) {
    logger.logError(error, 'Failed to load hierarchy');
    return EXIT_FAILURE;
  }
  const { result, label } = loaded;

  const counts = countHierarchy(result.trip);
  logger.info(
    `Hierarchy ready from ${label}: ${counts.sites} sites, ${counts.pucks} pucks, ${counts.pins} pins.`,
  );

  if (options.console) {
    printHierarchy(result, { expectedDirs: config.expectedDirs, colors });
  }

  try {
    await writeOutputs(result, options, config, logger);
  } catch (error) {
    logger.logError(error, 'Failed to write output');
    return EXIT_FAILURE;
  }

  if (options.strict && !result.allExpectedPresent) {
    logger.logError('Strict mode enabled and missing directories detected; exiting with status 1.');
    return EXIT_FAILURE;
  }
  return EXIT_OK;
};
