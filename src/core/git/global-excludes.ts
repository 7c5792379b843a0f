import os from 'os';
import path from 'path';
import { ConfigurationException } from '@/core/exceptions';
import { FileUtils } from '@/utils/io/file';
import { logger } from '@/utils/cli/logger';
import type { GitRunner } from './git-runner';

const log = logger.scoped('global');

export const EXCLUDES_FILE_KEY = 'core.excludesfile';

export const GLOBAL_EXCLUDES_HINT =
  "Try 'git config --global core.excludesfile ~/.gitignore_global' to set a global gitignore";

export interface GlobalExcludesEnvironment {
  env: NodeJS.ProcessEnv;
  homeDir: string;
  /** Directory git is run from; global config does not depend on it */
  cwd: string;
}

/**
 * Finds the user's global ignore file.
 *
 * A path configured in `core.excludesfile` wins, whether or not the file exists
 * yet. Without one, the first of these that already exists is used:
 * `$XDG_CONFIG_HOME/git/ignore`, `~/.config/git/ignore`, `~/.gitignore_global`,
 * `~/.gitignore`.
 */
export class GlobalExcludesLocator {
  private readonly environment: GlobalExcludesEnvironment;

  constructor(
    private readonly runner: GitRunner,
    environment: Partial<GlobalExcludesEnvironment> = {}
  ) {
    this.environment = {
      env: environment.env ?? process.env,
      homeDir: environment.homeDir ?? os.homedir(),
      cwd: environment.cwd ?? process.cwd(),
    };
  }

  public async locate(): Promise<string> {
    const configured = await this.configuredPath();
    if (configured) {
      log.debug(`${EXCLUDES_FILE_KEY} is ${configured}`);
      return configured;
    }

    for (const candidate of this.fallbackPaths()) {
      if (await FileUtils.isFile(candidate)) {
        log.debug(`using global ignore file ${candidate}`);
        return candidate;
      }
    }

    throw new ConfigurationException(
      `No global gitignore file configured. Set ${EXCLUDES_FILE_KEY} or create ${this.defaultPath()}`,
      GLOBAL_EXCLUDES_HINT
    );
  }

  /**
   * Git's default location for the global ignore file
   */
  public defaultPath(): string {
    const xdg = this.environment.env['XDG_CONFIG_HOME'];
    const configHome =
      xdg && path.isAbsolute(xdg) ? xdg : path.join(this.environment.homeDir, '.config');
    return path.join(configHome, 'git', 'ignore');
  }

  /**
   * Existing-file fallbacks, most preferred first
   */
  public fallbackPaths(): string[] {
    const { homeDir } = this.environment;
    const candidates = [
      this.defaultPath(),
      path.join(homeDir, '.config', 'git', 'ignore'),
      path.join(homeDir, '.gitignore_global'),
      path.join(homeDir, '.gitignore'),
    ];
    return [...new Set(candidates)];
  }

  /**
   * Expand `~` and make relative paths absolute against the home directory
   */
  public expand(configured: string): string {
    const { homeDir } = this.environment;
    if (configured === '~') return homeDir;
    if (configured.startsWith('~/') || configured.startsWith('~\\')) {
      return path.join(homeDir, configured.slice(2));
    }
    return path.resolve(homeDir, configured);
  }

  private async configuredPath(): Promise<string | null> {
    const result = await this.runner.run(
      ['config', '--global', '--get', EXCLUDES_FILE_KEY],
      this.environment.cwd
    );

    // git config exits with 1 when the key is not set
    if (result.exitCode === 1) return null;
    if (!result.success) {
      throw new ConfigurationException(
        `Cannot read ${EXCLUDES_FILE_KEY}: ${result.stderr.trim() || `git exited with ${result.exitCode}`}`,
        GLOBAL_EXCLUDES_HINT
      );
    }

    const value = result.stdout.trim();
    return value ? this.expand(value) : null;
  }
}
