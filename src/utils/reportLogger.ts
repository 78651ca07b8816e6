import util from 'util';
import { createColors, isColorSupported } from 'colorette';
import type { ProgressSink } from '../main/hierarchyBuilder';

export interface ReportLoggerOptions {
  /** Suppress progress and info lines; errors are still printed */
  quiet?: boolean;
  /** Print stack traces and error context */
  verbose?: boolean;
  colors?: boolean;
}

export interface ReportLogger {
  progress: ProgressSink;
  info: (message: string) => void;
  success: (message: string) => void;
  warn: (message: string) => void;
  logError: (error: unknown, context?: string) => void;
}

const indentBlock = (value: string, indent = '   ') =>
  value
    .split('\n')
    .map((line) => `${indent}${line}`)
    .join('\n');

export const createReportLogger = ({
  quiet = false,
  verbose = false,
  colors = isColorSupported,
}: ReportLoggerOptions = {}): ReportLogger => {
  const { bold, cyan, dim, green, red, yellow } = createColors({ useColor: colors });

  const timestamp = () => dim(new Date().toISOString());

  const emit = (line: string) => {
    if (quiet) return;
    console.log(`${timestamp()} ${line}`);
  };

  const styleProgress = (message: string) => {
    if (message.includes('⚠️')) return yellow(message);
    if (message.includes('ℹ️')) return cyan(message);
    if (message.startsWith('Scanning')) return bold(message);
    return message;
  };

  const logError = (error: unknown, context?: string) => {
    const err = error instanceof Error ? error : new Error(typeof error === 'string' ? error : 'Unknown error');
    const header = `${timestamp()} ${bold(red('error:'))} ${context ? `${context}: ` : ''}${err.message}`;
    console.error(header);
    if (verbose) {
      const details = Object.fromEntries(
        Object.entries(err).filter(([key]) => !['name', 'message', 'stack'].includes(key)),
      );
      if (Object.keys(details).length > 0) {
        console.error(indentBlock(util.inspect(details, { colors, depth: 4 })));
      }
      if (err.stack) {
        console.error(indentBlock(err.stack));
      }
    }
  };

  return {
    progress: (message) => emit(styleProgress(message)),
    info: (message) => emit(message),
    success: (message) => emit(green(message)),
    warn: (message) => emit(yellow(message)),
    logError,
  };
};
