#!/usr/bin/env node

import { CommanderError } from 'commander';
import { ignoreCommand } from './commands';
import { handleIgnoreError } from './commands/ignore/ignore.display';
import { ExitCode, GitIgnoreException, InterruptedException, exitCodeFor } from './core/exceptions';
import { AtomicFileWriter } from './utils/io/atomic-writer';
import { displayError, formatHelp, logger, readPackageInfo } from './utils/cli';
import { ConfigManager } from './utils/config';

const pkg = readPackageInfo();

const program = ignoreCommand
  .version(pkg.version, '-v, --version', 'Display version information')
  .helpOption('-h, --help', 'Display help')
  .configureHelp({
    formatHelp: (cmd, helper) => formatHelp(cmd, helper),
  })
  .hook('preAction', (thisCommand) => {
    const options = thisCommand.opts();

    if (options['quiet']) {
      logger.level = 'silent';
    } else if (options['verbose']) {
      logger.level = 'debug';
    }

    if (typeof options['config'] === 'string') {
      ConfigManager.setConfigPath(options['config']);
    }
  })
  .exitOverride();

const isPlain = (): boolean => program.opts()['quiet'] === true;

/**
 * Report a failure and return the exit code for it
 */
const report = (error: unknown): ExitCode => {
  const code = exitCodeFor(error);

  if (error instanceof GitIgnoreException) {
    handleIgnoreError(error, isPlain());
  } else if (error instanceof Error) {
    if (isPlain()) console.error(`Unexpected error: ${error.message}`);
    else displayError(error);
  } else {
    console.error(`Unexpected error: ${String(error)}`);
  }

  return code;
};

/**
 * Parse `argv`, run the command and return the process exit code
 */
export const run = async (argv: string[] = process.argv): Promise<number> => {
  if (argv.slice(2).length === 0) {
    program.outputHelp();
    return ExitCode.VALIDATION_FAILED;
  }

  try {
    await program.parseAsync(argv);
    return ExitCode.SUCCESS;
  } catch (error) {
    // help, version and usage errors; commander has already printed them
    if (error instanceof CommanderError) return error.exitCode;
    return report(error);
  }
};

if (require.main === module) {
  process.once('SIGINT', () => {
    AtomicFileWriter.removePendingSync();
    process.exit(report(new InterruptedException()));
  });

  run().then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      process.exitCode = report(error);
    }
  );
}
