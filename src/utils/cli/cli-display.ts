import chalk from 'chalk';
import type { Command, Help } from 'commander';
import { display } from './display';

const EXAMPLES: Array<[string, string]> = [
  ["'*.pyc' '__pycache__/'", 'Add to the repository .gitignore'],
  ['--local build/', 'Add to .git/info/exclude'],
  ["--global '*.log'", 'Add to the global gitignore'],
  ["--no-validate '*'", 'Add without pattern validation'],
];

const EXIT_CODES: Array<[number, string]> = [
  [0, 'Success, including nothing new to add'],
  [1, 'A pattern was rejected by validation'],
  [2, 'Not inside a git working tree'],
  [3, 'No global gitignore configured'],
  [4, 'Reading or writing the ignore file failed'],
  [130, 'Interrupted'],
  [255, 'Unexpected error'],
];

/**
 * Help text with coloured sections, arguments and options aligned
 */
export const formatHelp = (cmd: Command, helper: Help): string => {
  const commandName = chalk.cyan.bold(cmd.name());
  const terms = [
    ...helper.visibleArguments(cmd).map((argument) => helper.argumentTerm(argument)),
    ...helper.visibleOptions(cmd).map((option) => helper.optionTerm(option)),
  ];
  const width = Math.max(...terms.map((term) => term.length));
  const row = (term: string, description: string) =>
    `  ${chalk.green(term.padEnd(width))}  ${chalk.gray(description)}\n`;

  let help = `${commandName} - ${chalk.gray(cmd.description())}\n\n`;

  help += `${chalk.yellow.bold('📋 Usage:')}\n`;
  help += `  ${chalk.green('$')} ${commandName} ${chalk.gray(helper.commandUsage(cmd).replace(`${cmd.name()} `, ''))}\n\n`;

  const args = helper.visibleArguments(cmd);
  if (args.length > 0) {
    help += `${chalk.yellow.bold('📝 Arguments:')}\n`;
    args.forEach((argument) => {
      help += row(helper.argumentTerm(argument), helper.argumentDescription(argument));
    });
    help += '\n';
  }

  const options = helper.visibleOptions(cmd);
  if (options.length > 0) {
    help += `${chalk.yellow.bold('⚙️  Options:')}\n`;
    options.forEach((option) => {
      help += row(helper.optionTerm(option), helper.optionDescription(option));
    });
    help += '\n';
  }

  help += `${chalk.yellow.bold('💡 Examples:')}\n`;
  EXAMPLES.forEach(([example, comment]) => {
    help += `  ${chalk.green('$')} ${cmd.name()} ${example} ${chalk.gray(`# ${comment}`)}\n`;
  });
  help += '\n';

  help += `${chalk.yellow.bold('🚦 Exit codes:')}\n`;
  EXIT_CODES.forEach(([code, meaning]) => {
    help += `  ${chalk.green(String(code).padEnd(3))}  ${chalk.gray(meaning)}\n`;
  });

  return help;
};

/**
 * Error box for failures that have no dedicated message
 */
export const displayError = (error: Error): void => {
  const errorContent = [
    `${chalk.red.bold('❌ An unexpected error occurred:')}`,
    '',
    `${chalk.gray('Error Type:')} ${chalk.red(error.name || 'Unknown Error')}`,
    `${chalk.gray('Message:')} ${chalk.red(error.message)}`,
    '',
    chalk.yellow.bold('🔧 Troubleshooting:'),
    `  ${chalk.blue('💡 Tip:')} Use ${chalk.green('--verbose')} for detailed logs`,
  ].join('\n');

  display.error(errorContent, '🚨 Error');
};
