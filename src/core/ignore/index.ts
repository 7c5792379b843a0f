export { PatternValidator } from './pattern-validator';
export { IgnoreFileStore } from './ignore-file-store';
export {
  DEFAULT_VALIDATION_POLICY,
  DEFAULT_BROAD_PATTERNS,
  DEFAULT_PROTECTED_PATTERNS,
} from './validation-policy';
export { Severity, VALIDATION_LEVELS } from './types';
export type {
  ValidationFinding,
  ValidationLevel,
  ValidationPolicy,
  AppendReport,
  AppendOptions,
} from './types';
