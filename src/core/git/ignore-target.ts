import path from 'path';
import { GitContextResolver } from './git-context';
import { GlobalExcludesLocator } from './global-excludes';

/**
 * The three ignore files a pattern can be added to
 */
export enum TargetKind {
  REPOSITORY = 'repository',
  LOCAL = 'local',
  GLOBAL = 'global',
}

export interface IgnoreTarget {
  kind: TargetKind;
  path: string;
  /** Human-readable name, e.g. "repository gitignore" */
  description: string;
  /** Initial content for the file when it has to be created */
  header?: string;
}

export const GITIGNORE_FILE = '.gitignore';

/**
 * The comment block `git init` writes into a fresh `info/exclude`
 */
export const EXCLUDE_TEMPLATE = [
  '# git ls-files --others --exclude-from=.git/info/exclude',
  "# Lines that start with '#' are comments.",
  '# For a project mostly in C, the following would be a good set of',
  '# exclude patterns (uncomment them if you want to use them):',
  '# *.[oa]',
  '# *~',
  '',
].join('\n');

/**
 * Maps a {@link TargetKind} to the file it stands for.
 *
 * The git context is only resolved for the repository and local targets; the
 * global target works outside any repository.
 */
export class IgnoreTargetResolver {
  constructor(
    private readonly context: GitContextResolver,
    private readonly globalExcludes: GlobalExcludesLocator
  ) {}

  public resolve(kind: TargetKind): Promise<IgnoreTarget> {
    switch (kind) {
      case TargetKind.REPOSITORY:
        return this.repositoryTarget();
      case TargetKind.LOCAL:
        return this.localTarget();
      case TargetKind.GLOBAL:
        return this.globalTarget();
    }
  }

  private async repositoryTarget(): Promise<IgnoreTarget> {
    const { workingTreeRoot } = await this.context.resolve();
    return {
      kind: TargetKind.REPOSITORY,
      path: path.join(workingTreeRoot, GITIGNORE_FILE),
      description: 'repository gitignore',
    };
  }

  /**
   * git reads `info/exclude` from the common directory, so linked worktrees
   * share the main checkout's file.
   */
  private async localTarget(): Promise<IgnoreTarget> {
    const { commonDir } = await this.context.resolve();
    return {
      kind: TargetKind.LOCAL,
      path: path.join(commonDir, 'info', 'exclude'),
      description: 'local exclude file',
      header: EXCLUDE_TEMPLATE,
    };
  }

  private async globalTarget(): Promise<IgnoreTarget> {
    return {
      kind: TargetKind.GLOBAL,
      path: await this.globalExcludes.locate(),
      description: 'global gitignore',
    };
  }
}
