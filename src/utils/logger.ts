import log from 'electron-log/node';

const LEVELS = ['error', 'warn', 'info', 'verbose', 'debug', 'silly'] as const;

type LevelOption = (typeof LEVELS)[number] | false;

export type ScopedLogger = ReturnType<typeof log.scope>;

const parseLevel = (value: string | undefined, fallback: LevelOption): LevelOption => {
  if (!value) return fallback;
  const normalised = value.trim().toLowerCase();
  if (['off', 'false', 'none', '0'].includes(normalised)) return false;
  const match = LEVELS.find((level) => level === normalised);
  return match ?? fallback;
};

const configureTransports = () => {
  log.transports.console.level = parseLevel(process.env.TRIP_REPORT_LOG_LEVEL, 'warn');
  const logFile = process.env.TRIP_REPORT_LOG_FILE;
  if (logFile) {
    log.transports.file.level = parseLevel(process.env.TRIP_REPORT_LOG_FILE_LEVEL, 'debug');
    log.transports.file.resolvePathFn = () => logFile;
  } else {
    log.transports.file.level = false;
  }
};

configureTransports();

export const createScopedLogger = (scope: string): ScopedLogger => log.scope?.(scope) ?? log;

export default log;
