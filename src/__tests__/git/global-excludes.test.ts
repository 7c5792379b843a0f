import path from 'path';
import os from 'os';
import fs from 'fs-extra';

import { EXCLUDES_FILE_KEY, GLOBAL_EXCLUDES_HINT, GlobalExcludesLocator } from '../../core/git';
import { ConfigurationException } from '../../core/exceptions';
import { logger } from '../../utils/cli/logger';
import { FakeGitRunner, fail, ok } from '../helpers/fake-git-runner';

describe('GlobalExcludesLocator', () => {
  let tmp: string;
  let home: string;
  let runner: FakeGitRunner;

  const locator = (env: NodeJS.ProcessEnv = {}) =>
    new GlobalExcludesLocator(runner, { env, homeDir: home, cwd: tmp });

  beforeAll(() => {
    logger.level = 'silent';
  });

  beforeEach(async () => {
    tmp = await fs.mkdtemp(path.join(os.tmpdir(), 'gi-global-'));
    home = path.join(tmp, 'home');
    await fs.ensureDir(home);
    runner = new FakeGitRunner();
  });

  afterEach(async () => {
    await fs.remove(tmp);
  });

  describe('configured core.excludesfile', () => {
    test('queries global config only', async () => {
      runner.on('config', ok('/etc/ignore\n'));

      await locator().locate();

      expect(runner.calls).toEqual([
        { args: ['config', '--global', '--get', EXCLUDES_FILE_KEY], cwd: tmp },
      ]);
    });

    test('uses an absolute path even when the file does not exist', async () => {
      const configured = path.join(tmp, 'not-yet', 'ignore');
      runner.on('config', ok(`${configured}\n`));

      expect(await locator().locate()).toBe(configured);
    });

    test('expands a leading tilde', async () => {
      runner.on('config', ok('~/.gitignore_global\n'));

      expect(await locator().locate()).toBe(path.join(home, '.gitignore_global'));
    });

    test('resolves a relative path against the home directory', async () => {
      runner.on('config', ok('ignores/global\n'));

      expect(await locator().locate()).toBe(path.join(home, 'ignores', 'global'));
    });

    test('an empty value counts as unset', async () => {
      runner.on('config', ok('\n'));

      await expect(locator().locate()).rejects.toBeInstanceOf(ConfigurationException);
    });
  });

  describe('default location', () => {
    beforeEach(() => {
      runner.on('config', fail(1));
    });

    test('uses ~/.config/git/ignore when it exists', async () => {
      const fallback = path.join(home, '.config', 'git', 'ignore');
      await fs.outputFile(fallback, '*.swp\n');

      expect(await locator().locate()).toBe(fallback);
    });

    test('honours an absolute XDG_CONFIG_HOME', async () => {
      const xdg = path.join(tmp, 'xdg');
      const fallback = path.join(xdg, 'git', 'ignore');
      await fs.outputFile(fallback, '');

      expect(await locator({ XDG_CONFIG_HOME: xdg }).locate()).toBe(fallback);
    });

    test('ignores a relative XDG_CONFIG_HOME', () => {
      expect(locator({ XDG_CONFIG_HOME: 'relative' }).defaultPath()).toBe(
        path.join(home, '.config', 'git', 'ignore')
      );
    });

    test('fails with a hint when nothing is configured or present', async () => {
      const error = await locator().locate().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ConfigurationException);
      expect(error).toMatchObject({
        message: `No global gitignore file configured. Set core.excludesfile or create ${path.join(home, '.config', 'git', 'ignore')}`,
        hint: GLOBAL_EXCLUDES_HINT,
      });
    });

    test('falls back to ~/.gitignore_global', async () => {
      const fallback = path.join(home, '.gitignore_global');
      await fs.outputFile(fallback, '*.swp\n');

      expect(await locator().locate()).toBe(fallback);
    });

    test('falls back to ~/.gitignore last', async () => {
      const fallback = path.join(home, '.gitignore');
      await fs.outputFile(fallback, '*.swp\n');

      expect(await locator().locate()).toBe(fallback);
    });

    test('prefers ~/.gitignore_global over ~/.gitignore', async () => {
      await fs.outputFile(path.join(home, '.gitignore'), '');
      await fs.outputFile(path.join(home, '.gitignore_global'), '');

      expect(await locator().locate()).toBe(path.join(home, '.gitignore_global'));
    });

    test('checks ~/.config/git/ignore when the XDG file is missing', async () => {
      const fallback = path.join(home, '.config', 'git', 'ignore');
      await fs.outputFile(fallback, '');

      expect(await locator({ XDG_CONFIG_HOME: path.join(tmp, 'xdg') }).locate()).toBe(fallback);
    });

    test('lists fallbacks in lookup order', () => {
      const xdg = path.join(tmp, 'xdg');

      expect(locator({ XDG_CONFIG_HOME: xdg }).fallbackPaths()).toEqual([
        path.join(xdg, 'git', 'ignore'),
        path.join(home, '.config', 'git', 'ignore'),
        path.join(home, '.gitignore_global'),
        path.join(home, '.gitignore'),
      ]);
      expect(locator().fallbackPaths()).toHaveLength(3);
    });

    test('a directory at the default location does not count', async () => {
      await fs.ensureDir(path.join(home, '.config', 'git', 'ignore'));

      await expect(locator().locate()).rejects.toBeInstanceOf(ConfigurationException);
    });
  });

  test('other git config failures are configuration errors', async () => {
    runner.on('config', fail(128, 'fatal: bad config line 1 in file ~/.gitconfig\n'));

    await expect(locator().locate()).rejects.toThrow(
      'Cannot read core.excludesfile: fatal: bad config line 1 in file ~/.gitconfig'
    );
  });

  test('expand leaves a bare tilde as the home directory', () => {
    expect(locator().expand('~')).toBe(home);
  });
});
