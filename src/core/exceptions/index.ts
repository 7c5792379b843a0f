import type { ValidationFinding } from '@/core/ignore/types';

/**
 * Process exit codes, one per failure class
 */
export enum ExitCode {
  SUCCESS = 0,
  VALIDATION_FAILED = 1,
  NOT_A_REPOSITORY = 2,
  CONFIGURATION = 3,
  FILE_SYSTEM = 4,
  INTERRUPTED = 130,
  UNEXPECTED = 255,
}

export class GitIgnoreException extends Error {
  constructor(message: string, cause?: unknown) {
    super(message);
    this.name = 'GitIgnoreException';
    if (cause !== undefined) this.cause = cause;
  }
}

/**
 * The git executable could not be run, or did not finish in time
 */
export class GitCommandException extends GitIgnoreException {
  constructor(
    message: string,
    readonly args: readonly string[],
    cause?: unknown
  ) {
    super(message, cause);
    this.name = 'GitCommandException';
  }
}

export class NotAGitRepositoryException extends GitIgnoreException {
  constructor(
    readonly startDir: string,
    readonly detail: string,
    cause?: unknown
  ) {
    super(
      detail
        ? `not a git working tree (cwd: ${startDir}): ${detail}`
        : `not a git working tree (cwd: ${startDir})`,
      cause
    );
    this.name = 'NotAGitRepositoryException';
  }
}

/**
 * The global excludes file is neither configured nor present at its default location
 */
export class ConfigurationException extends GitIgnoreException {
  constructor(message: string, readonly hint?: string) {
    super(message);
    this.name = 'ConfigurationException';
  }
}

export class PatternValidationException extends GitIgnoreException {
  constructor(
    readonly findings: readonly ValidationFinding[],
    readonly blocking: readonly ValidationFinding[]
  ) {
    super(summarizeRejected(blocking));
    this.name = 'PatternValidationException';
  }
}

export class IgnoreFileIOException extends GitIgnoreException {
  constructor(
    readonly filePath: string,
    readonly operation: string,
    cause: unknown
  ) {
    super(`failed to ${operation} ${filePath}: ${describeCause(cause)}`, cause);
    this.name = 'IgnoreFileIOException';
  }
}

export class InterruptedException extends GitIgnoreException {
  constructor() {
    super('Interrupted');
    this.name = 'InterruptedException';
  }
}

/**
 * Maps any thrown value to the exit code the CLI reports for it
 */
export const exitCodeFor = (error: unknown): ExitCode => {
  if (error instanceof PatternValidationException) return ExitCode.VALIDATION_FAILED;
  if (error instanceof NotAGitRepositoryException) return ExitCode.NOT_A_REPOSITORY;
  if (error instanceof GitCommandException) return ExitCode.NOT_A_REPOSITORY;
  if (error instanceof ConfigurationException) return ExitCode.CONFIGURATION;
  if (error instanceof IgnoreFileIOException) return ExitCode.FILE_SYSTEM;
  if (error instanceof InterruptedException) return ExitCode.INTERRUPTED;
  return ExitCode.UNEXPECTED;
};

function summarizeRejected(findings: readonly ValidationFinding[]): string {
  const rejected = new Set(findings.map((finding) => finding.pattern)).size;
  return `${rejected} pattern${rejected === 1 ? '' : 's'} rejected by validation`;
}

const describeCause = (cause: unknown): string => {
  if (cause instanceof Error) return cause.message;
  return String(cause);
};
