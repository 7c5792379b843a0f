import chalk from 'chalk';

import {
  displayAppendReport,
  displayValidationFindings,
  formatAppendReport,
  formatFindings,
  formatIgnoreError,
  handleIgnoreError,
} from '../../../commands/ignore/ignore.display';
import type { IgnoreOperationResult } from '../../../commands/ignore/ignore.handler';
import { TargetKind } from '../../../core/git';
import {
  ConfigurationException,
  NotAGitRepositoryException,
  PatternValidationException,
} from '../../../core/exceptions';
import { Severity } from '../../../core/ignore';
import type { AppendReport, ValidationFinding } from '../../../core/ignore';
import { display } from '../../../utils/cli/display';

const result = (report: Partial<AppendReport>): IgnoreOperationResult => ({
  findings: [],
  target: {
    kind: TargetKind.REPOSITORY,
    path: '/repo/.gitignore',
    description: 'repository gitignore',
  },
  report: {
    addedPatterns: [],
    skippedDuplicates: [],
    targetPath: '/repo/.gitignore',
    created: false,
    ...report,
  },
});

const findings: ValidationFinding[] = [
  { pattern: './a', severity: Severity.INFO, message: "Pattern starts with './' which is redundant" },
  {
    pattern: '*',
    severity: Severity.WARNING,
    message: 'Pattern is very broad and may ignore more than intended',
  },
  { pattern: '', severity: Severity.ERROR, message: 'Pattern is empty' },
];

describe('ignore display', () => {
  let previousLevel: typeof chalk.level;

  beforeEach(() => {
    previousLevel = chalk.level;
    chalk.level = 0;
  });

  afterEach(() => {
    chalk.level = previousLevel;
    jest.restoreAllMocks();
  });

  describe('formatFindings', () => {
    test('groups by severity, most severe first', () => {
      expect(formatFindings(findings)).toEqual([
        'ERROR: Found problematic patterns:',
        '  "": Pattern is empty',
        'WARNING: Potentially problematic patterns:',
        '  "*": Pattern is very broad and may ignore more than intended',
        'INFO:',
        `  "./a": Pattern starts with './' which is redundant`,
      ]);
    });

    test('quotes control characters in patterns', () => {
      const lines = formatFindings([
        { pattern: 'a\nb', severity: Severity.ERROR, message: 'bad' },
      ]);

      expect(lines).toEqual(['ERROR: Found problematic patterns:', '  "a\\nb": bad']);
    });

    test('empty input gives no lines', () => {
      expect(formatFindings([])).toEqual([]);
    });
  });

  describe('formatAppendReport', () => {
    test('new file', () => {
      expect(formatAppendReport(result({ addedPatterns: ['*.pyc', 'build/'], created: true }))).toEqual([
        'Created repository gitignore (/repo/.gitignore)',
        'Added 2 patterns:',
        '  *.pyc',
        '  build/',
      ]);
    });

    test('updated file with skipped duplicates', () => {
      expect(
        formatAppendReport(result({ addedPatterns: ['dist/'], skippedDuplicates: ['node_modules/'] }))
      ).toEqual([
        'Updated repository gitignore (/repo/.gitignore)',
        'Added 1 pattern:',
        '  dist/',
        'Skipped 1 duplicate pattern:',
        '  node_modules/',
      ]);
    });

    test('nothing added', () => {
      expect(formatAppendReport(result({ skippedDuplicates: ['a', 'b'] }))).toEqual([
        'No new patterns added to repository gitignore (/repo/.gitignore) (all patterns already exist)',
        'Skipped 2 duplicate patterns:',
        '  a',
        '  b',
      ]);
    });
  });

  test('nothing added and nothing skipped has no duplicate note', () => {
    expect(formatAppendReport(result({}))).toEqual([
      'No new patterns added to repository gitignore (/repo/.gitignore)',
    ]);
  });

  describe('formatIgnoreError', () => {
    test('validation failure says nothing was written', () => {
      const blocking = findings.slice(2);

      expect(formatIgnoreError(new PatternValidationException(findings, blocking))).toEqual([
        'Error: 1 pattern rejected by validation; nothing was written',
      ]);
    });

    test('configuration failure carries its hint', () => {
      expect(formatIgnoreError(new ConfigurationException('no file', 'set it'))).toEqual([
        'Error: no file',
        'set it',
      ]);
    });

    test('other failures show their message', () => {
      expect(formatIgnoreError(new NotAGitRepositoryException('/w', ''))).toEqual([
        'Error: not a git working tree (cwd: /w)',
      ]);
    });
  });

  describe('plain output', () => {
    test('report lines go to stdout', () => {
      const log = jest.spyOn(console, 'log').mockImplementation(() => undefined);

      displayAppendReport(result({ addedPatterns: ['x'], created: true }), true);

      expect(log.mock.calls).toEqual([
        ['Created repository gitignore (/repo/.gitignore)'],
        ['Added 1 pattern:'],
        ['  x'],
      ]);
    });

    test('findings go to stderr', () => {
      const error = jest.spyOn(console, 'error').mockImplementation(() => undefined);

      displayValidationFindings(findings.slice(1, 2), true);

      expect(error.mock.calls).toEqual([
        ['WARNING: Potentially problematic patterns:'],
        ['  "*": Pattern is very broad and may ignore more than intended'],
      ]);
    });

    test('errors go to stderr', () => {
      const error = jest.spyOn(console, 'error').mockImplementation(() => undefined);

      handleIgnoreError(new ConfigurationException('no file', 'set it'), true);

      expect(error.mock.calls).toEqual([['Error: no file'], ['set it']]);
    });
  });

  describe('boxed output', () => {
    test('successful append uses a success box', () => {
      const success = jest.spyOn(display, 'success').mockImplementation(() => undefined);

      displayAppendReport(result({ addedPatterns: ['x'], created: true }), false);

      expect(success).toHaveBeenCalledWith(
        'Created repository gitignore (/repo/.gitignore)\nAdded 1 pattern:\n  x',
        '✨ Ignore Patterns Added'
      );
    });

    test('no additions use an info box', () => {
      const info = jest.spyOn(display, 'info').mockImplementation(() => undefined);

      displayAppendReport(result({ skippedDuplicates: ['x'] }), false);

      expect(info).toHaveBeenCalledTimes(1);
      expect(info.mock.calls[0]?.[1]).toBe('📋 Nothing To Add');
    });

    test('findings with errors use an error box', () => {
      const error = jest.spyOn(display, 'error').mockImplementation(() => undefined);

      displayValidationFindings(findings, false);

      expect(error.mock.calls[0]?.[1]).toBe('🚫 Pattern Validation');
    });

    test('warnings alone use a warning box', () => {
      const warning = jest.spyOn(display, 'warning').mockImplementation(() => undefined);

      displayValidationFindings(findings.slice(0, 2), false);

      expect(warning.mock.calls[0]?.[1]).toBe('🔎 Pattern Validation');
    });

    test('no findings display nothing', () => {
      const warning = jest.spyOn(display, 'warning').mockImplementation(() => undefined);
      const error = jest.spyOn(display, 'error').mockImplementation(() => undefined);

      displayValidationFindings([], false);

      expect(warning).not.toHaveBeenCalled();
      expect(error).not.toHaveBeenCalled();
    });
  });
});
