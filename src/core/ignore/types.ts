export enum Severity {
  ERROR = 'error',
  WARNING = 'warning',
  INFO = 'info',
}

/**
 * One advisory result produced for one pattern
 */
export interface ValidationFinding {
  pattern: string;
  severity: Severity;
  message: string;
}

/**
 * How strictly findings are enforced:
 * - `none`: the validator is not run at all
 * - `warn`: only error findings block the add
 * - `strict`: error and warning findings block the add
 */
export type ValidationLevel = 'none' | 'warn' | 'strict';

export const VALIDATION_LEVELS: readonly ValidationLevel[] = ['none', 'warn', 'strict'];

/**
 * Configurable trigger lists for the warning rules. Both lists are compared
 * against the trimmed pattern text exactly.
 */
export interface ValidationPolicy {
  broadPatterns: string[];
  protectedPatterns: string[];
}

export interface AppendReport {
  /** Patterns written, in input order */
  addedPatterns: string[];
  /** Candidates skipped because the file or the batch already had them */
  skippedDuplicates: string[];
  targetPath: string;
  /** The file did not exist before and was written by this call */
  created: boolean;
}

export interface AppendOptions {
  /** Text written ahead of the patterns when the file is created */
  header?: string;
}
