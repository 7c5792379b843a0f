import { Severity } from './types';
import type { ValidationFinding, ValidationLevel, ValidationPolicy } from './types';
import { DEFAULT_VALIDATION_POLICY } from './validation-policy';

const LINE_BREAK = /[\r\n]/;

/**
 * PatternValidator inspects raw ignore patterns and reports problems without
 * touching the filesystem or rewriting anything.
 *
 * Rules are applied in order of severity:
 * 1. Error: the pattern is blank, or it contains a line break. Either would be
 *    dropped or would split into several lines of the ignore file. When a
 *    pattern has an error, no other rule is evaluated for it.
 * 2. Warning: the pattern is overly broad (`*`, `**` and the like), repeats
 *    `**`, or would hide a file every project keeps under version control.
 * 3. Info: the pattern starts with a redundant `./`, or is wrapped in
 *    slashes on both sides.
 */
export class PatternValidator {
  private readonly broad: ReadonlySet<string>;
  private readonly protectedNames: ReadonlySet<string>;

  constructor(policy: ValidationPolicy = DEFAULT_VALIDATION_POLICY) {
    this.broad = new Set(policy.broadPatterns);
    this.protectedNames = new Set(policy.protectedPatterns);
  }

  public validate(pattern: string): ValidationFinding[] {
    const errors = this.checkErrors(pattern);
    if (errors.length > 0) return errors;

    const trimmed = pattern.trim();
    return [...this.checkWarnings(trimmed), ...this.checkInfo(trimmed)];
  }

  /**
   * Validate every pattern, keeping input order
   */
  public validateAll(patterns: readonly string[]): ValidationFinding[] {
    return patterns.flatMap((pattern) => this.validate(pattern));
  }

  /**
   * Findings that stop the add at the given level
   */
  public static blockingFindings(
    findings: readonly ValidationFinding[],
    level: ValidationLevel
  ): ValidationFinding[] {
    switch (level) {
      case 'none':
        return [];
      case 'warn':
        return findings.filter((finding) => finding.severity === Severity.ERROR);
      case 'strict':
        return findings.filter((finding) => finding.severity !== Severity.INFO);
    }
  }

  public static isBlocking(
    findings: readonly ValidationFinding[],
    level: ValidationLevel
  ): boolean {
    return PatternValidator.blockingFindings(findings, level).length > 0;
  }

  private checkErrors(pattern: string): ValidationFinding[] {
    if (LINE_BREAK.test(pattern)) {
      return [
        finding(
          pattern,
          Severity.ERROR,
          'Pattern contains newline characters which would corrupt the ignore file'
        ),
      ];
    }

    if (pattern.trim().length === 0) {
      return [finding(pattern, Severity.ERROR, 'Pattern is empty')];
    }

    return [];
  }

  private checkWarnings(pattern: string): ValidationFinding[] {
    const findings: ValidationFinding[] = [];

    if (this.broad.has(pattern)) {
      findings.push(
        finding(pattern, Severity.WARNING, 'Pattern is very broad and may ignore more than intended')
      );
    }

    if (countOccurrences(pattern, '**') > 1) {
      findings.push(
        finding(pattern, Severity.WARNING, "Pattern contains multiple '**' which may not work as expected")
      );
    }

    if (this.protectedNames.has(pattern)) {
      findings.push(
        finding(pattern, Severity.WARNING, 'Pattern might ignore important project files')
      );
    }

    return findings;
  }

  private checkInfo(pattern: string): ValidationFinding[] {
    const findings: ValidationFinding[] = [];

    if (pattern.startsWith('./')) {
      findings.push(finding(pattern, Severity.INFO, "Pattern starts with './' which is redundant"));
    }

    if (pattern.length > 2 && pattern.startsWith('/') && pattern.endsWith('/')) {
      findings.push(
        finding(
          pattern,
          Severity.INFO,
          'Pattern has leading and trailing slashes and might be too restrictive'
        )
      );
    }

    return findings;
  }
}

const finding = (pattern: string, severity: Severity, message: string): ValidationFinding => ({
  pattern,
  severity,
  message,
});

const countOccurrences = (text: string, needle: string): number => {
  let count = 0;
  let index = text.indexOf(needle);
  while (index !== -1) {
    count++;
    index = text.indexOf(needle, index + needle.length);
  }
  return count;
};
