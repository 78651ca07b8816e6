import { TripRootNotFoundError } from '../common/errors';
import { createReportLogger } from '../utils/reportLogger';

const NOW = '2024-05-01T10:00:00.000Z';

describe('reportLogger', () => {
  beforeEach(() => {
    jest.useFakeTimers().setSystemTime(new Date(NOW));
  });

  afterEach(() => {
    jest.useRealTimers();
    jest.restoreAllMocks();
  });

  it('prefixes progress and info lines with a timestamp', () => {
    const logSpy = jest.spyOn(console, 'log').mockImplementation(() => {});
    const logger = createReportLogger({ colors: false });

    logger.progress('Scanning trip directory: /data/trip');
    logger.info('Hierarchy ready');

    expect(logSpy.mock.calls).toEqual([
      [`${NOW} Scanning trip directory: /data/trip`],
      [`${NOW} Hierarchy ready`],
    ]);
  });

  it('stays silent when quiet but still reports errors', () => {
    const logSpy = jest.spyOn(console, 'log').mockImplementation(() => {});
    const errorSpy = jest.spyOn(console, 'error').mockImplementation(() => {});
    const logger = createReportLogger({ quiet: true, colors: false });

    logger.progress('Scanning');
    logger.success('done');
    logger.logError(new Error('boom'), 'Failed to load hierarchy');

    expect(logSpy).not.toHaveBeenCalled();
    expect(errorSpy.mock.calls).toEqual([[`${NOW} error: Failed to load hierarchy: boom`]]);
  });

  it('accepts plain string errors', () => {
    const errorSpy = jest.spyOn(console, 'error').mockImplementation(() => {});
    const logger = createReportLogger({ colors: false });

    logger.logError('Strict mode failed');

    expect(errorSpy.mock.calls).toEqual([[`${NOW} error: Strict mode failed`]]);
  });

  it('prints error fields and the stack when verbose', () => {
    const errorSpy = jest.spyOn(console, 'error').mockImplementation(() => {});
    const logger = createReportLogger({ verbose: true, colors: false });

    logger.logError(new TripRootNotFoundError('/data/missing'));

    const lines = errorSpy.mock.calls.map((call) => String(call[0]));
    expect(lines[0]).toBe(`${NOW} error: Trip directory does not exist: /data/missing`);
    expect(lines[1]).toBe("   { rootPath: '/data/missing' }");
    expect(lines[2]).toMatch(/^ {3}\w+: Trip directory does not exist: \/data\/missing\n {3} {4}at /);
  });
});
