/**
 * Configuration loading: defaults, then an optional YAML file, then
 * environment overrides.
 */

import { existsSync, readFileSync } from 'node:fs';
import { delimiter, dirname, isAbsolute, join, resolve } from 'node:path';
import YAML from 'yaml';
import { z } from 'zod';

import type { RtopsConfig } from '../types/config.js';
import { LOG_LEVELS, isLogLevel } from '../utils/logger.js';

export const DEFAULT_CONFIG_FILENAME = 'rtops.config.yaml';

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly source?: string,
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

// ---------------------------------------------------------------------------
// File schema
// ---------------------------------------------------------------------------

const ConfigFileSchema = z
  .object({
    catalog: z
      .object({
        databasePath: z.string().min(1).optional(),
        seedDefaults: z.boolean().optional(),
      })
      .strict()
      .optional(),
    sources: z
      .object({
        bundlePaths: z.array(z.string().min(1)).optional(),
        spreadsheetPaths: z.array(z.string().min(1)).optional(),
      })
      .strict()
      .optional(),
    logging: z
      .object({
        level: z.enum(LOG_LEVELS).optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

type ConfigFile = z.infer<typeof ConfigFileSchema>;

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

export interface LoadConfigOptions {
  cwd?: string;
  /** Explicit config file; must exist when given. */
  configPath?: string;
  env?: NodeJS.ProcessEnv;
}

export function defaultConfig(cwd: string): RtopsConfig {
  return {
    catalog: {
      databasePath: join(cwd, 'rtops.sqlite3'),
      seedDefaults: true,
    },
    sources: {
      bundlePaths: [
        join(cwd, 'enterprise-attack.json'),
        '/mnt/data/enterprise-attack.json',
      ],
      spreadsheetPaths: [
        join(cwd, 'enterprise-attack-v17.1.xlsx'),
        '/mnt/data/enterprise-attack-v17.1.xlsx',
      ],
    },
    logging: { level: 'info' },
  };
}

export function loadConfig(options: LoadConfigOptions = {}): RtopsConfig {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;
  const config = defaultConfig(cwd);

  const filePath = options.configPath
    ? resolve(cwd, options.configPath)
    : join(cwd, DEFAULT_CONFIG_FILENAME);

  if (existsSync(filePath)) {
    applyFile(config, readConfigFile(filePath), dirname(filePath));
  } else if (options.configPath) {
    throw new ConfigError(`Config file not found: ${filePath}`, filePath);
  }

  applyEnv(config, env, cwd);
  return config;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function readConfigFile(filePath: string): ConfigFile {
  let raw: unknown;
  try {
    raw = YAML.parse(readFileSync(filePath, 'utf-8'));
  } catch (err) {
    throw new ConfigError(
      `Could not parse ${filePath}: ${err instanceof Error ? err.message : String(err)}`,
      filePath,
    );
  }

  // An empty YAML document parses to null
  const result = ConfigFileSchema.safeParse(raw ?? {});
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid config in ${filePath}: ${issues}`, filePath);
  }
  return result.data;
}

function applyFile(config: RtopsConfig, file: ConfigFile, baseDir: string): void {
  const toAbsolute = (p: string): string => (isAbsolute(p) ? p : resolve(baseDir, p));

  if (file.catalog?.databasePath !== undefined) {
    config.catalog.databasePath = toAbsolute(file.catalog.databasePath);
  }
  if (file.catalog?.seedDefaults !== undefined) {
    config.catalog.seedDefaults = file.catalog.seedDefaults;
  }
  if (file.sources?.bundlePaths !== undefined) {
    config.sources.bundlePaths = file.sources.bundlePaths.map(toAbsolute);
  }
  if (file.sources?.spreadsheetPaths !== undefined) {
    config.sources.spreadsheetPaths = file.sources.spreadsheetPaths.map(toAbsolute);
  }
  if (file.logging?.level !== undefined) {
    config.logging.level = file.logging.level;
  }
}

/** Relative paths in the environment resolve against `cwd`. */
function applyEnv(config: RtopsConfig, env: NodeJS.ProcessEnv, cwd: string): void {
  if (env.RTOPS_DB_PATH) {
    config.catalog.databasePath = resolve(cwd, env.RTOPS_DB_PATH);
  }
  if (env.RTOPS_BUNDLE_PATHS) {
    config.sources.bundlePaths = splitPathList(env.RTOPS_BUNDLE_PATHS, cwd);
  }
  if (env.RTOPS_SPREADSHEET_PATHS) {
    config.sources.spreadsheetPaths = splitPathList(env.RTOPS_SPREADSHEET_PATHS, cwd);
  }
  if (env.RTOPS_SEED_DEFAULTS) {
    const value = env.RTOPS_SEED_DEFAULTS.trim().toLowerCase();
    if (value !== 'true' && value !== 'false') {
      throw new ConfigError(
        `RTOPS_SEED_DEFAULTS must be "true" or "false", got "${env.RTOPS_SEED_DEFAULTS}"`,
        'RTOPS_SEED_DEFAULTS',
      );
    }
    config.catalog.seedDefaults = value === 'true';
  }
  if (env.LOG_LEVEL) {
    const level = env.LOG_LEVEL.trim().toLowerCase();
    if (!isLogLevel(level)) {
      throw new ConfigError(
        `LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}, got "${env.LOG_LEVEL}"`,
        'LOG_LEVEL',
      );
    }
    config.logging.level = level;
  }
}

function splitPathList(value: string, cwd: string): string[] {
  return value
    .split(delimiter)
    .map((p) => p.trim())
    .filter(Boolean)
    .map((p) => resolve(cwd, p));
}
