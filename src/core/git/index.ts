export { ProcessGitRunner } from './git-runner';
export type { GitRunner, GitResult, ProcessGitRunnerOptions } from './git-runner';
export { GitContextResolver, REV_PARSE_ARGS } from './git-context';
export type { GitContext } from './git-context';
export {
  GlobalExcludesLocator,
  EXCLUDES_FILE_KEY,
  GLOBAL_EXCLUDES_HINT,
} from './global-excludes';
export type { GlobalExcludesEnvironment } from './global-excludes';
export {
  IgnoreTargetResolver,
  TargetKind,
  GITIGNORE_FILE,
  EXCLUDE_TEMPLATE,
} from './ignore-target';
export type { IgnoreTarget } from './ignore-target';
