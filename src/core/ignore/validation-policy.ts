import type { ValidationPolicy } from './types';

export const DEFAULT_BROAD_PATTERNS = ['*', '**', '/', '/*', '**/*'];

export const DEFAULT_PROTECTED_PATTERNS = ['.git', '.gitignore', 'README*', 'LICENSE*'];

export const DEFAULT_VALIDATION_POLICY: ValidationPolicy = {
  broadPatterns: DEFAULT_BROAD_PATTERNS,
  protectedPatterns: DEFAULT_PROTECTED_PATTERNS,
};
