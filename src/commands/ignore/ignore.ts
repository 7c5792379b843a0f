import { Command, Option } from 'commander';
import chalk from 'chalk';
import { ProcessGitRunner, TargetKind } from '@/core/git';
import type { ValidationLevel } from '@/core/ignore';
import { ConfigManager } from '@/utils/config';
import { createIgnoreServices, runIgnoreOperation } from './ignore.handler';
import type { IgnoreRequest } from './ignore.handler';
import { displayAppendReport, displayValidationFindings } from './ignore.display';

export interface IgnoreOptions {
  local?: boolean;
  global?: boolean;
  validate: boolean;
  strict?: boolean;
  allowDuplicates?: boolean;
  verbose?: boolean;
  quiet?: boolean;
  config?: string;
}

/**
 * Turn parsed command-line options into a request. `--no-validate` wins over
 * `--strict`; without either, the configured level applies.
 */
export const buildIgnoreRequest = (
  patterns: string[],
  options: IgnoreOptions,
  configuredLevel: ValidationLevel
): IgnoreRequest => {
  let target = TargetKind.REPOSITORY;
  if (options.global) target = TargetKind.GLOBAL;
  else if (options.local) target = TargetKind.LOCAL;

  let validation = configuredLevel;
  if (!options.validate) validation = 'none';
  else if (options.strict) validation = 'strict';

  return {
    patterns,
    target,
    validation,
    allowDuplicates: options.allowDuplicates === true,
  };
};

export const ignoreCommand = new Command('git-ignore')
  .description('Add patterns to git ignore files')
  .argument('<patterns...>', 'Patterns to add to the ignore file')
  .addOption(new Option('-l, --local', 'Add patterns to .git/info/exclude instead of .gitignore'))
  .addOption(
    new Option('-g, --global', 'Add patterns to the global gitignore file').conflicts('local')
  )
  .option('--no-validate', 'Skip pattern validation')
  .option('--strict', 'Treat validation warnings as errors')
  .option('--allow-duplicates', 'Allow duplicate patterns to be added')
  .option('-V, --verbose', 'Enable verbose logging')
  .option('-q, --quiet', 'Plain output without boxes or colours')
  .option('--config <path>', 'Path to the configuration file')
  .action(async (patterns: string[], options: IgnoreOptions) => {
    const config = await ConfigManager.load(options.config);
    if (!config.get('ui').colorOutput) {
      chalk.level = 0;
    }

    const { level, broadPatterns, protectedPatterns } = config.get('validation');
    const services = createIgnoreServices({
      runner: new ProcessGitRunner({ timeoutMs: config.get('git').timeoutMs }),
      policy: { broadPatterns, protectedPatterns },
    });

    const plain = options.quiet === true;
    const result = await runIgnoreOperation(
      buildIgnoreRequest(patterns, options, level),
      services,
      { onFindings: (findings) => displayValidationFindings(findings, plain) }
    );

    displayAppendReport(result, plain);
  });
