import path from 'path';
import { GitCommandException, NotAGitRepositoryException } from '@/core/exceptions';
import { FileUtils } from '@/utils/io/file';
import { logger } from '@/utils/cli/logger';
import type { GitRunner } from './git-runner';

const log = logger.scoped('context');

/**
 * Locations of the repository the user is standing in.
 *
 * ┌─ <workingTreeRoot>/          ← .gitignore lives here
 * │ ├─ .git                      ← directory, or a file pointing elsewhere
 * │ └─ ...
 * <gitDataDir>/                  ← per-checkout metadata (HEAD, index)
 * <commonDir>/                   ← shared by linked worktrees (objects, info/)
 *
 * In a plain repository all three git directories are the same `.git`. In a
 * submodule, `gitDataDir` is inside the superproject's `.git/modules`. In a
 * linked worktree, `gitDataDir` is `<main>/.git/worktrees/<name>` and
 * `commonDir` is `<main>/.git`.
 */
export interface GitContext {
  workingTreeRoot: string;
  gitDataDir: string;
  commonDir: string;
}

/**
 * Git query that answers all three locations at once. Output is one path per
 * line in argument order; `--git-common-dir` may be relative to the cwd.
 */
export const REV_PARSE_ARGS = [
  'rev-parse',
  '--show-toplevel',
  '--absolute-git-dir',
  '--git-common-dir',
] as const;

/**
 * GitContextResolver finds the repository enclosing a start directory.
 *
 * It asks git instead of reading `.git` pointer files, so submodules and
 * worktrees resolve the way git itself resolves them. The first successful
 * answer is kept for the life of the resolver; failures are not cached.
 */
export class GitContextResolver {
  private context: Promise<GitContext> | null = null;

  constructor(
    private readonly runner: GitRunner,
    private readonly startDir: string = process.cwd()
  ) {}

  public resolve(): Promise<GitContext> {
    if (this.context) {
      log.debug('using cached git context');
      return this.context;
    }

    this.context = this.query().catch((error: unknown) => {
      this.context = null;
      throw error;
    });
    return this.context;
  }

  private async query(): Promise<GitContext> {
    const startDir = path.resolve(this.startDir);
    const result = await this.runner.run(REV_PARSE_ARGS, startDir);

    if (!result.success) {
      throw new NotAGitRepositoryException(startDir, result.stderr.trim());
    }

    const lines = result.stdout
      .split(/\r?\n/)
      .map((line) => line.trim())
      .filter((line) => line.length > 0);

    const [toplevel, gitDir, commonDir] = lines;
    if (toplevel === undefined || gitDir === undefined || commonDir === undefined) {
      throw new NotAGitRepositoryException(
        startDir,
        `unexpected output from git ${REV_PARSE_ARGS.join(' ')}: ${JSON.stringify(result.stdout)}`
      );
    }

    const context: GitContext = {
      workingTreeRoot: await this.canonical(toplevel, startDir),
      gitDataDir: await this.canonical(gitDir, startDir),
      commonDir: await this.canonical(commonDir, startDir),
    };

    log.debug(
      `working tree ${context.workingTreeRoot}, git dir ${context.gitDataDir}, common dir ${context.commonDir}`
    );
    return context;
  }

  private async canonical(reported: string, startDir: string): Promise<string> {
    const absolute = path.resolve(startDir, reported);
    let real: string | null;
    try {
      real = await FileUtils.realpathIfExists(absolute);
    } catch (error) {
      throw new GitCommandException(`cannot access ${absolute} reported by git`, REV_PARSE_ARGS, error);
    }

    if (real === null) {
      throw new NotAGitRepositoryException(startDir, `git reported missing path ${absolute}`);
    }
    return real;
  }
}
