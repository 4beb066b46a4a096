import { loadEnvFile, logger } from '@jellyfzf/core';
import { getErrorMessage, wrapError } from '@jellyfzf/shared';
import { runCli } from './cli/main.js';

const COMPONENT = 'Main';

function fatal(label: string, error: unknown): never {
  const appError = wrapError(error);
  logger.error(COMPONENT, label, appError);
  process.stderr.write(`${label}: ${getErrorMessage(error)}\n`);
  process.exit(1);
}

async function main(): Promise<void> {
  loadEnvFile();

  process.on('uncaughtException', error => fatal('Uncaught Exception', error));
  process.on('unhandledRejection', reason => fatal('Unhandled Rejection', reason));

  const exitCode = await runCli(process.argv.slice(2));
  process.exit(exitCode);
}

main().catch((error: unknown) => fatal('Fatal error in main()', error));
