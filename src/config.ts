/**
 * Configuration system with YAML and JSON support
 *
 * Precedence, lowest first: defaults, config file, environment, CLI flags.
 */

import { existsSync, readFileSync } from 'fs';
import { join } from 'path';
import YAML from 'js-yaml';
import { ConfigError, describeError } from './errors.js';
import { isLogLevel, logger, type LogLevel } from './logger.js';

export interface DescribeConfig {
  /** Directory searched for matching files */
  rootDir: string;
  /** Abort the search after visiting this many files */
  scanLimit: number;
  dryRun: boolean;
  /** Directory names skipped at any depth */
  ignoreDirs: string[];
  /** Ignore jpg/heic renders, e.g. a Capture One session's Output folder */
  ignoreWritableImages: boolean;
  continueOnError: boolean;
  overwriteDescriptions: boolean;
  overwriteOriginals: boolean;
  logLevel: LogLevel;
}

export const DEFAULT_CONFIG: DescribeConfig = {
  rootDir: '.',
  scanLimit: 30_000,
  dryRun: false,
  ignoreDirs: ['CaptureOne'],
  ignoreWritableImages: false,
  continueOnError: false,
  overwriteDescriptions: false,
  overwriteOriginals: false,
  logLevel: 'info',
};

export const DEFAULT_CONFIG_FILES = ['describe-media.yaml', 'describe-media.yml', 'describe-media.json'];

const BOOLEAN_KEYS = [
  'dryRun',
  'ignoreWritableImages',
  'continueOnError',
  'overwriteDescriptions',
  'overwriteOriginals',
] as const;

type BooleanKey = (typeof BOOLEAN_KEYS)[number];

function isBooleanKey(key: string): key is BooleanKey {
  return BOOLEAN_KEYS.some((candidate) => candidate === key);
}

function cloneConfig(config: DescribeConfig): DescribeConfig {
  return { ...config, ignoreDirs: [...config.ignoreDirs] };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Pick the known keys out of an untrusted object, collecting type errors.
 */
export function normalizeConfigInput(input: unknown, source: string): Partial<DescribeConfig> {
  if (input === null || input === undefined) {
    return {};
  }
  if (!isRecord(input)) {
    throw new ConfigError(['config must be a mapping of option names to values'], source);
  }

  const result: Partial<DescribeConfig> = {};
  const errors: string[] = [];

  for (const [key, value] of Object.entries(input)) {
    if (value === null || value === undefined) continue;

    switch (key) {
      case 'rootDir':
        if (typeof value === 'string') result.rootDir = value;
        else errors.push('rootDir must be a string');
        break;
      case 'scanLimit':
        if (typeof value === 'number') result.scanLimit = value;
        else errors.push('scanLimit must be a number');
        break;
      case 'ignoreDirs':
        if (Array.isArray(value) && value.every((dir): dir is string => typeof dir === 'string')) {
          result.ignoreDirs = value;
        } else {
          errors.push('ignoreDirs must be a list of directory names');
        }
        break;
      case 'logLevel':
        if (isLogLevel(value)) result.logLevel = value;
        else errors.push(`logLevel must be one of debug, info, warn, error`);
        break;
      default:
        if (isBooleanKey(key)) {
          if (typeof value === 'boolean') result[key] = value;
          else errors.push(`${key} must be true or false`);
        } else {
          logger.warn(`Ignoring unknown config option "${key}"`, { source }, 'ConfigManager');
        }
    }
  }

  if (errors.length > 0) {
    throw new ConfigError(errors, source);
  }
  return result;
}

/**
 * Read DESCRIBE_* variables (typically loaded from .env by the CLI).
 */
export function configFromEnv(env: NodeJS.ProcessEnv): Partial<DescribeConfig> {
  const result: Partial<DescribeConfig> = {};
  const errors: string[] = [];

  const rootDir = env.DESCRIBE_ROOT_DIR?.trim();
  if (rootDir) {
    result.rootDir = rootDir;
  }

  const scanLimit = env.DESCRIBE_SCAN_LIMIT?.trim();
  if (scanLimit) {
    const parsed = Number(scanLimit);
    if (Number.isNaN(parsed)) errors.push(`DESCRIBE_SCAN_LIMIT is not a number: ${scanLimit}`);
    else result.scanLimit = parsed;
  }

  const logLevel = env.LOG_LEVEL?.trim();
  if (logLevel) {
    if (isLogLevel(logLevel)) result.logLevel = logLevel;
    else errors.push(`LOG_LEVEL must be one of debug, info, warn, error`);
  }

  if (errors.length > 0) {
    throw new ConfigError(errors, 'environment');
  }
  return result;
}

export function validateConfig(config: DescribeConfig): { valid: boolean; errors: string[] } {
  const errors: string[] = [];

  if (!Number.isInteger(config.scanLimit) || config.scanLimit < 1) {
    errors.push('scanLimit must be an integer of at least 1');
  }

  if (config.rootDir.trim().length === 0) {
    errors.push('rootDir must not be empty');
  }

  if (config.ignoreDirs.some((dir) => dir.trim().length === 0 || /[\\/]/.test(dir))) {
    errors.push('ignoreDirs entries must be plain directory names');
  }

  return {
    valid: errors.length === 0,
    errors
  };
}

/**
 * Configuration manager
 */
export class ConfigManager {
  private config: DescribeConfig;
  private configPath: string | null;

  constructor(configPath: string | null = null) {
    this.configPath = configPath;
    this.config = this.loadConfig();
  }

  /**
   * Load configuration from file or use defaults
   */
  private loadConfig(): DescribeConfig {
    if (!this.configPath) {
      return cloneConfig(DEFAULT_CONFIG);
    }

    if (!existsSync(this.configPath)) {
      throw new ConfigError(['file not found'], this.configPath);
    }

    let parsed: unknown;
    try {
      const content = readFileSync(this.configPath, 'utf-8');
      if (this.configPath.endsWith('.json')) {
        parsed = JSON.parse(content);
      } else if (this.configPath.endsWith('.yaml') || this.configPath.endsWith('.yml')) {
        parsed = YAML.load(content);
      } else {
        throw new Error(`Unsupported config format: ${this.configPath}`);
      }
    } catch (error) {
      throw new ConfigError([describeError(error)], this.configPath);
    }

    logger.debug(`Loaded configuration from ${this.configPath}`, undefined, 'ConfigManager');
    return this.mergeConfigs(cloneConfig(DEFAULT_CONFIG), normalizeConfigInput(parsed, this.configPath));
  }

  /**
   * Merge user config with defaults (user config takes precedence)
   */
  private mergeConfigs(defaults: DescribeConfig, user: Partial<DescribeConfig>): DescribeConfig {
    return {
      ...defaults,
      ...user,
      ignoreDirs: [...(user.ignoreDirs ?? defaults.ignoreDirs)],
    };
  }

  /**
   * Layer further overrides (environment, CLI flags) over the loaded config
   */
  apply(overrides: Partial<DescribeConfig>): this {
    const defined = Object.fromEntries(
      Object.entries(overrides).filter(([, value]) => value !== undefined)
    );
    this.config = this.mergeConfigs(this.config, normalizeConfigInput(defined, 'overrides'));
    return this;
  }

  /**
   * Get complete configuration
   */
  getAll(): DescribeConfig {
    return cloneConfig(this.config);
  }

  get<K extends keyof DescribeConfig>(key: K): DescribeConfig[K] {
    return this.getAll()[key];
  }

  validate(): { valid: boolean; errors: string[] } {
    return validateConfig(this.config);
  }

  /**
   * Validated configuration, or ConfigError
   */
  resolve(): DescribeConfig {
    const { valid, errors } = this.validate();
    if (!valid) {
      throw new ConfigError(errors, this.configPath ?? undefined);
    }
    return this.getAll();
  }

  /**
   * Export configuration as YAML
   */
  toYAML(): string {
    return YAML.dump(this.config, { indent: 2 });
  }

  getPath(): string | null {
    return this.configPath;
  }
}

/**
 * First default config file present in `cwd`, if any
 */
export function findDefaultConfigFile(cwd: string, exists: (path: string) => boolean = existsSync): string | null {
  for (const name of DEFAULT_CONFIG_FILES) {
    const candidate = join(cwd, name);
    if (exists(candidate)) {
      return candidate;
    }
  }
  return null;
}
