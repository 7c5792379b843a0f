import path from 'path';
import os from 'os';
import fs from 'fs-extra';
import { execFileSync, spawnSync } from 'child_process';

import {
  GitContextResolver,
  GlobalExcludesLocator,
  IgnoreTargetResolver,
  ProcessGitRunner,
  TargetKind,
} from '../../core/git';
import { NotAGitRepositoryException } from '../../core/exceptions';
import { logger } from '../../utils/cli/logger';

const hasGit = spawnSync('git', ['--version']).status === 0;
const describeWithGit = hasGit ? describe : describe.skip;

/**
 * Resolves real repositories created with a local git binary: a plain
 * checkout, a submodule and a linked worktree.
 */
describeWithGit('GitContextResolver with git', () => {
  let tmp: string;
  let main: string;
  const runner = new ProcessGitRunner({ timeoutMs: 20000 });

  const git = (cwd: string, ...args: string[]): void => {
    execFileSync(
      'git',
      [
        '-c',
        'user.name=Test',
        '-c',
        'user.email=test@example.com',
        '-c',
        'protocol.file.allow=always',
        '-c',
        'init.defaultBranch=main',
        ...args,
      ],
      {
        cwd,
        stdio: 'pipe',
        env: {
          ...process.env,
          GIT_CONFIG_NOSYSTEM: '1',
          GIT_CONFIG_GLOBAL: path.join(tmp, 'gitconfig'),
        },
      }
    );
  };

  const resolve = (startDir: string) => new GitContextResolver(runner, startDir).resolve();

  beforeAll(async () => {
    logger.level = 'silent';
    tmp = await fs.realpath(await fs.mkdtemp(path.join(os.tmpdir(), 'gi-real-git-')));
    await fs.outputFile(path.join(tmp, 'gitconfig'), '');

    const lib = path.join(tmp, 'lib');
    await fs.ensureDir(lib);
    git(lib, 'init', '-q');
    git(lib, 'commit', '-q', '--allow-empty', '-m', 'lib');

    main = path.join(tmp, 'main');
    await fs.ensureDir(path.join(main, 'src'));
    git(main, 'init', '-q');
    git(main, 'commit', '-q', '--allow-empty', '-m', 'init');
    git(main, 'submodule', '-q', 'add', lib, 'mod');
    git(main, 'commit', '-q', '-m', 'add submodule');
    git(main, 'worktree', 'add', '-q', path.join(tmp, 'wt'));
  }, 60000);

  afterAll(async () => {
    await fs.remove(tmp);
  });

  test('plain repository', async () => {
    expect(await resolve(path.join(main, 'src'))).toEqual({
      workingTreeRoot: main,
      gitDataDir: path.join(main, '.git'),
      commonDir: path.join(main, '.git'),
    });
  });

  test('submodule', async () => {
    const modules = path.join(main, '.git', 'modules', 'mod');

    expect(await resolve(path.join(main, 'mod'))).toEqual({
      workingTreeRoot: path.join(main, 'mod'),
      gitDataDir: modules,
      commonDir: modules,
    });
  });

  test('linked worktree', async () => {
    const worktree = path.join(tmp, 'wt');

    expect(await resolve(worktree)).toEqual({
      workingTreeRoot: worktree,
      gitDataDir: path.join(main, '.git', 'worktrees', 'wt'),
      commonDir: path.join(main, '.git'),
    });
  });

  test('local target of a linked worktree is the main exclude file', async () => {
    const worktree = path.join(tmp, 'wt');
    const targets = new IgnoreTargetResolver(
      new GitContextResolver(runner, worktree),
      new GlobalExcludesLocator(runner, { env: {}, homeDir: tmp, cwd: worktree })
    );

    const target = await targets.resolve(TargetKind.LOCAL);

    expect(target.path).toBe(path.join(main, '.git', 'info', 'exclude'));
  });

  test('inside the git directory there is no working tree', async () => {
    await expect(resolve(path.join(main, '.git'))).rejects.toBeInstanceOf(
      NotAGitRepositoryException
    );
  });

  test('outside any repository', async () => {
    await expect(resolve(tmp)).rejects.toBeInstanceOf(NotAGitRepositoryException);
  });
});
