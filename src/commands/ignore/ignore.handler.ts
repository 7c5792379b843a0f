import { PatternValidationException } from '@/core/exceptions';
import {
  GitContextResolver,
  GlobalExcludesLocator,
  IgnoreTargetResolver,
  TargetKind,
} from '@/core/git';
import type { GitRunner, GlobalExcludesEnvironment, IgnoreTarget } from '@/core/git';
import { DEFAULT_VALIDATION_POLICY, IgnoreFileStore, PatternValidator } from '@/core/ignore';
import type {
  AppendReport,
  ValidationFinding,
  ValidationLevel,
  ValidationPolicy,
} from '@/core/ignore';
import { logger } from '@/utils';

/**
 * A parsed request to add patterns to one ignore file
 */
export interface IgnoreRequest {
  patterns: string[];
  target: TargetKind;
  validation: ValidationLevel;
  allowDuplicates: boolean;
}

export interface IgnoreOperationResult {
  findings: ValidationFinding[];
  target: IgnoreTarget;
  report: AppendReport;
}

/**
 * The collaborators one invocation needs. The target resolver owns the git
 * context, so it is resolved at most once per services instance.
 */
export interface IgnoreServices {
  validator: PatternValidator;
  targets: IgnoreTargetResolver;
  store: IgnoreFileStore;
}

export interface IgnoreServicesOptions {
  runner: GitRunner;
  cwd?: string;
  policy?: ValidationPolicy;
  environment?: Partial<Omit<GlobalExcludesEnvironment, 'cwd'>>;
  store?: IgnoreFileStore;
}

export const createIgnoreServices = (options: IgnoreServicesOptions): IgnoreServices => {
  const cwd = options.cwd ?? process.cwd();
  const context = new GitContextResolver(options.runner, cwd);
  const globalExcludes = new GlobalExcludesLocator(options.runner, {
    ...options.environment,
    cwd,
  });

  return {
    validator: new PatternValidator(options.policy ?? DEFAULT_VALIDATION_POLICY),
    targets: new IgnoreTargetResolver(context, globalExcludes),
    store: options.store ?? new IgnoreFileStore(),
  };
};

export interface IgnoreHooks {
  /** Called with the findings before any file is touched */
  onFindings?: (findings: ValidationFinding[]) => void;
}

/**
 * Validate, resolve the target and append.
 *
 * Blocking findings stop the operation with {@link PatternValidationException}
 * before the target is resolved, so nothing is read or written.
 */
export const runIgnoreOperation = async (
  request: IgnoreRequest,
  services: IgnoreServices,
  hooks: IgnoreHooks = {}
): Promise<IgnoreOperationResult> => {
  const findings =
    request.validation === 'none' ? [] : services.validator.validateAll(request.patterns);

  if (findings.length > 0) {
    hooks.onFindings?.(findings);
  }

  const blocking = PatternValidator.blockingFindings(findings, request.validation);
  if (blocking.length > 0) {
    throw new PatternValidationException(findings, blocking);
  }

  const target = await services.targets.resolve(request.target);
  logger.debug(`target ${target.description}: ${target.path}`);

  const options = target.header === undefined ? {} : { header: target.header };
  const report = await services.store.append(
    target.path,
    request.patterns,
    request.allowDuplicates,
    options
  );

  return { findings, target, report };
};
