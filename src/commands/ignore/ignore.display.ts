import chalk from 'chalk';
import { ConfigurationException, PatternValidationException } from '@/core/exceptions';
import { Severity } from '@/core/ignore';
import type { ValidationFinding } from '@/core/ignore';
import { display } from '@/utils';
import type { IgnoreOperationResult } from './ignore.handler';

const plural = (count: number, word: string): string => `${count} ${word}${count === 1 ? '' : 's'}`;

const SEVERITY_HEADINGS: Record<Severity, string> = {
  [Severity.ERROR]: 'ERROR: Found problematic patterns:',
  [Severity.WARNING]: 'WARNING: Potentially problematic patterns:',
  [Severity.INFO]: 'INFO:',
};

/**
 * Group findings by severity, most severe first, as plain text lines
 */
export const formatFindings = (findings: readonly ValidationFinding[]): string[] => {
  const lines: string[] = [];

  for (const severity of [Severity.ERROR, Severity.WARNING, Severity.INFO]) {
    const group = findings.filter((finding) => finding.severity === severity);
    if (group.length === 0) continue;

    lines.push(SEVERITY_HEADINGS[severity]);
    group.forEach((finding) => {
      lines.push(`  ${JSON.stringify(finding.pattern)}: ${finding.message}`);
    });
  }

  return lines;
};

export const displayValidationFindings = (
  findings: readonly ValidationFinding[],
  plain: boolean
): void => {
  if (findings.length === 0) return;

  const lines = formatFindings(findings);
  if (plain) {
    lines.forEach((line) => console.error(line));
    return;
  }

  const hasErrors = findings.some((finding) => finding.severity === Severity.ERROR);
  const coloured = lines.map((line) => {
    if (line.startsWith('ERROR')) return chalk.red.bold(line);
    if (line.startsWith('WARNING')) return chalk.yellow.bold(line);
    if (line.startsWith('INFO')) return chalk.blue.bold(line);
    return line;
  });

  if (hasErrors) {
    display.error(coloured.join('\n'), '🚫 Pattern Validation');
  } else {
    display.warning(coloured.join('\n'), '🔎 Pattern Validation');
  }
};

/**
 * Lines describing what happened to the target file
 */
export const formatAppendReport = ({ report, target }: IgnoreOperationResult): string[] => {
  const where = `${target.description} (${report.targetPath})`;
  const lines: string[] = [];

  if (report.addedPatterns.length === 0) {
    const reason = report.skippedDuplicates.length > 0 ? ' (all patterns already exist)' : '';
    lines.push(`No new patterns added to ${where}${reason}`);
  } else {
    const verb = report.created ? 'Created' : 'Updated';
    lines.push(`${verb} ${where}`);
    lines.push(`Added ${plural(report.addedPatterns.length, 'pattern')}:`);
    report.addedPatterns.forEach((pattern) => lines.push(`  ${pattern}`));
  }

  if (report.skippedDuplicates.length > 0) {
    lines.push(`Skipped ${plural(report.skippedDuplicates.length, 'duplicate pattern')}:`);
    report.skippedDuplicates.forEach((pattern) => lines.push(`  ${pattern}`));
  }

  return lines;
};

export const displayAppendReport = (result: IgnoreOperationResult, plain: boolean): void => {
  const lines = formatAppendReport(result);
  if (plain) {
    lines.forEach((line) => console.log(line));
    return;
  }

  const styled = lines.map((line) => (line.startsWith('  ') ? chalk.cyan(line) : line));
  if (result.report.addedPatterns.length === 0) {
    display.info(styled.join('\n'), '📋 Nothing To Add');
  } else {
    display.success(styled.join('\n'), '✨ Ignore Patterns Added');
  }
};

/**
 * Message lines for a failed operation, including a hint where one exists
 */
export const formatIgnoreError = (error: Error): string[] => {
  if (error instanceof PatternValidationException) {
    return [`Error: ${error.message}; nothing was written`];
  }

  const lines = [`Error: ${error.message}`];
  if (error instanceof ConfigurationException && error.hint) {
    lines.push(error.hint);
  }
  return lines;
};

export const handleIgnoreError = (error: Error, plain: boolean): void => {
  const lines = formatIgnoreError(error);
  if (plain) {
    lines.forEach((line) => console.error(line));
    return;
  }

  const [first = '', ...rest] = lines;
  const content = [chalk.red(first), ...rest.map((line) => chalk.gray(line))].join('\n');
  display.error(content, '❌ Ignore Operation Failed');
};
