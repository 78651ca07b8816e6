import { DEFAULT_EXPECTED_COLLECTION_DIRS } from '../common/collectionNames';
import type { SiteGrouping } from '../types/hierarchy';
import { createScopedLogger } from '../utils/logger';

export interface ReportConfig {
  expectedDirs: readonly string[];
  grouping: SiteGrouping;
  /** HTML report title; the renderer derives one from the trip name when absent */
  title?: string;
  verbose: boolean;
}

const logger = createScopedLogger('report-config');

const GROUPINGS: readonly SiteGrouping[] = ['sites', 'flat'];

const coerceBoolean = (value: string | undefined): boolean => {
  if (!value) return false;
  return ['1', 'true', 't', 'yes', 'y', 'on'].includes(value.trim().toLowerCase());
};

const parseExpectedDirs = (value: string | undefined): readonly string[] | undefined => {
  if (!value) return undefined;
  const names = value
    .split(',')
    .map((name) => name.trim())
    .filter(Boolean);
  const unique = [...new Set(names)];
  if (unique.length === 0) {
    logger.warn('TRIP_REPORT_EXPECTED_DIRS is empty; using the default expected directories.');
    return undefined;
  }
  return unique;
};

const parseGrouping = (value: string | undefined): SiteGrouping | undefined => {
  if (!value) return undefined;
  const normalised = value.trim().toLowerCase();
  const match = GROUPINGS.find((grouping) => grouping === normalised);
  if (!match) {
    logger.warn(`Unknown TRIP_REPORT_GROUPING "${value}"; falling back to "sites".`);
  }
  return match;
};

const DEFAULT_CONFIG: ReportConfig = {
  expectedDirs: DEFAULT_EXPECTED_COLLECTION_DIRS,
  grouping: 'sites',
  verbose: false,
};

/**
 * Merges defaults, `TRIP_REPORT_*` environment variables and explicit
 * overrides, in that order of precedence (overrides win).
 */
export const resolveReportConfig = (
  overrides: Partial<ReportConfig> = {},
  env: NodeJS.ProcessEnv = process.env,
): ReportConfig => {
  const verboseEnv = env.TRIP_REPORT_LOG_VERBOSE;
  return {
    expectedDirs:
      overrides.expectedDirs ??
      parseExpectedDirs(env.TRIP_REPORT_EXPECTED_DIRS) ??
      DEFAULT_CONFIG.expectedDirs,
    grouping: overrides.grouping ?? parseGrouping(env.TRIP_REPORT_GROUPING) ?? DEFAULT_CONFIG.grouping,
    title: overrides.title ?? (env.TRIP_REPORT_TITLE || undefined),
    verbose:
      overrides.verbose ??
      (verboseEnv === undefined ? DEFAULT_CONFIG.verbose : coerceBoolean(verboseEnv)),
  };
};
