import fs from 'fs-extra';
import path from 'path';
import os from 'os';
import { logger } from './cli/logger';
import {
  DEFAULT_BROAD_PATTERNS,
  DEFAULT_PROTECTED_PATTERNS,
  VALIDATION_LEVELS,
} from '@/core/ignore';
import type { ValidationLevel } from '@/core/ignore';
import { ProcessGitRunner } from '@/core/git/git-runner';

export interface Config {
  validation: {
    level: ValidationLevel;
    broadPatterns: string[];
    protectedPatterns: string[];
  };
  git: {
    timeoutMs: number;
  };
  ui: {
    colorOutput: boolean;
  };
}

type JsonObject = Record<string, unknown>;

/**
 * Loads the optional JSON configuration file and merges it over defaults.
 *
 * The file is read only; a missing file means defaults. Fields with the wrong
 * type are reported and replaced by their default, so a typo in one setting
 * does not discard the others.
 */
export class ConfigManager {
  private static configPath: string | null = null;
  private readonly config: Config;

  private constructor(config: Config) {
    this.config = config;
  }

  static setConfigPath(customPath: string | null): void {
    ConfigManager.configPath = customPath;
  }

  static defaultConfigPath(homeDir: string = os.homedir()): string {
    return path.join(homeDir, '.config', 'git-ignore', 'config.json');
  }

  static getDefaultConfig(): Config {
    return {
      validation: {
        level: 'warn',
        broadPatterns: [...DEFAULT_BROAD_PATTERNS],
        protectedPatterns: [...DEFAULT_PROTECTED_PATTERNS],
      },
      git: {
        timeoutMs: ProcessGitRunner.DEFAULT_TIMEOUT_MS,
      },
      ui: {
        colorOutput: true,
      },
    };
  }

  /**
   * Load configuration from `configPath`, the path set with
   * {@link ConfigManager.setConfigPath}, or the default location, in that order.
   */
  static async load(configPath?: string): Promise<ConfigManager> {
    const file = configPath ?? ConfigManager.configPath ?? ConfigManager.defaultConfigPath();
    const defaults = ConfigManager.getDefaultConfig();

    if (!(await fs.pathExists(file))) {
      logger.debug(`no config file at ${file}, using defaults`);
      return new ConfigManager(defaults);
    }

    let data: unknown;
    try {
      data = await fs.readJson(file);
    } catch (error) {
      logger.warn(`Failed to load config ${file}, using defaults:`, errorMessage(error));
      return new ConfigManager(defaults);
    }

    if (!isObject(data)) {
      logger.warn(`Config ${file} is not a JSON object, using defaults`);
      return new ConfigManager(defaults);
    }

    logger.debug(`loaded config from ${file}`);
    return new ConfigManager(ConfigManager.merge(defaults, data, file));
  }

  static fromObject(data: JsonObject, source: string = 'inline'): ConfigManager {
    return new ConfigManager(ConfigManager.merge(ConfigManager.getDefaultConfig(), data, source));
  }

  get<K extends keyof Config>(key: K): Config[K] {
    return this.config[key];
  }

  getAll(): Config {
    return structuredClone(this.config);
  }

  private static merge(defaults: Config, data: JsonObject, source: string): Config {
    const reader = new FieldReader(source);
    const validation = reader.section(data, 'validation');
    const git = reader.section(data, 'git');
    const ui = reader.section(data, 'ui');

    return {
      validation: {
        level: reader.oneOf(
          validation,
          'validation.level',
          'level',
          VALIDATION_LEVELS,
          defaults.validation.level
        ),
        broadPatterns: reader.stringList(
          validation,
          'validation.broadPatterns',
          'broadPatterns',
          defaults.validation.broadPatterns
        ),
        protectedPatterns: reader.stringList(
          validation,
          'validation.protectedPatterns',
          'protectedPatterns',
          defaults.validation.protectedPatterns
        ),
      },
      git: {
        timeoutMs: reader.positiveNumber(git, 'git.timeoutMs', 'timeoutMs', defaults.git.timeoutMs),
      },
      ui: {
        colorOutput: reader.boolean(ui, 'ui.colorOutput', 'colorOutput', defaults.ui.colorOutput),
      },
    };
  }
}

/**
 * Typed access to untrusted JSON, warning once per rejected field
 */
class FieldReader {
  constructor(private readonly source: string) {}

  section(data: JsonObject, key: string): JsonObject {
    const value = data[key];
    if (value === undefined) return {};
    if (isObject(value)) return value;
    this.reject(key, 'an object');
    return {};
  }

  oneOf<T extends string>(
    data: JsonObject,
    label: string,
    key: string,
    allowed: readonly T[],
    fallback: T
  ): T {
    const value = data[key];
    if (value === undefined) return fallback;
    const match = allowed.find((candidate) => candidate === value);
    if (match !== undefined) return match;
    this.reject(label, `one of ${allowed.join(', ')}`);
    return fallback;
  }

  stringList(data: JsonObject, label: string, key: string, fallback: string[]): string[] {
    const value = data[key];
    if (value === undefined) return fallback;
    if (Array.isArray(value) && value.every((item): item is string => typeof item === 'string')) {
      return value;
    }
    this.reject(label, 'an array of strings');
    return fallback;
  }

  positiveNumber(data: JsonObject, label: string, key: string, fallback: number): number {
    const value = data[key];
    if (value === undefined) return fallback;
    if (typeof value === 'number' && Number.isFinite(value) && value > 0) return value;
    this.reject(label, 'a positive number');
    return fallback;
  }

  boolean(data: JsonObject, label: string, key: string, fallback: boolean): boolean {
    const value = data[key];
    if (value === undefined) return fallback;
    if (typeof value === 'boolean') return value;
    this.reject(label, 'true or false');
    return fallback;
  }

  private reject(label: string, expected: string): void {
    logger.warn(`Ignoring ${label} in ${this.source}: expected ${expected}`);
  }
}

const isObject = (value: unknown): value is JsonObject =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
