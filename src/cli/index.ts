#!/usr/bin/env node
import chalk from 'chalk';
import { runCli } from './program';

async function main() {
  process.exitCode = await runCli(process.argv.slice(2));
}

main().catch((error) => {
  const message = error instanceof Error ? error.message : String(error);
  console.error(chalk.whiteBright.bgRed.bold(`trip-report failed unexpectedly: ${message}`));
  process.exitCode = 1;
});
