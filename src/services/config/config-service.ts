/**
 * Configuration Service
 *
 * Loads optional settings from `.infra-drift.yaml` (or a file named on
 * the command line) and merges them with command-line flags and built-in
 * defaults. Precedence: flag, then settings file, then default.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import * as yaml from 'yaml';
import { ConfigurationError, errorMessage } from '../../core/errors.js';
import {
  SettingsFileSchema,
  formatZodError,
  type LogLevelName,
  type OutputFormat,
  type SettingsFile
} from '../../core/schemas.js';
import { DEFAULT_ATTRIBUTES, type AttributePath, type ListMatching } from '../../models/drift.js';
import { DEFAULT_RETRY_POLICY, type RetryPolicy } from '../live/retry.js';

export const SETTINGS_FILE_NAME = '.infra-drift.yaml';

/**
 * Live-result cache configuration
 */
export interface CacheSettings {
  ttlMs: number;
  maxEntries: number;
}

/**
 * Every setting with its effective value
 */
export interface ResolvedSettings {
  region?: string;
  attributes: readonly AttributePath[];
  concurrency: number;
  output: OutputFormat;
  logLevel: LogLevelName;
  resourceType: string;
  matchAttribute: string;
  listMatching: ListMatching;
  retry: RetryPolicy;
  cache: CacheSettings;
}

/**
 * Values given on the command line; undefined means "not given"
 */
export type SettingsOverrides = Partial<Omit<ResolvedSettings, 'retry' | 'cache'>>;

export const DEFAULT_SETTINGS: Readonly<ResolvedSettings> = Object.freeze<ResolvedSettings>({
  attributes: DEFAULT_ATTRIBUTES,
  concurrency: 5,
  output: 'text',
  logLevel: 'info',
  resourceType: 'aws_instance',
  matchAttribute: 'tags.Name',
  listMatching: 'bipartite',
  retry: { ...DEFAULT_RETRY_POLICY },
  cache: { ttlMs: 60000, maxEntries: 500 }
});

export interface ConfigServiceOptions {
  /** Explicit settings file; must exist when given */
  settingsPath?: string;
  /** Directory searched for the default settings file */
  cwd?: string;
}

/**
 * Configuration Service
 *
 * Provides settings from the settings file with defaults when the file
 * is not present.
 */
export class ConfigService {
  private settingsPath: string;
  private explicit: boolean;
  private cachedSettings: SettingsFile | null = null;

  constructor(options: ConfigServiceOptions = {}) {
    this.explicit = options.settingsPath !== undefined;
    this.settingsPath = options.settingsPath ?? path.join(options.cwd ?? process.cwd(), SETTINGS_FILE_NAME);
  }

  getSettingsPath(): string {
    return this.settingsPath;
  }

  /**
   * Load and validate the settings file, with caching.
   *
   * @throws ConfigurationError when the file is invalid, or when an
   *   explicitly named file cannot be read
   */
  async loadSettings(): Promise<SettingsFile> {
    if (this.cachedSettings !== null) {
      return this.cachedSettings;
    }

    let content: string;
    try {
      content = await fs.readFile(this.settingsPath, 'utf-8');
    } catch (error) {
      if (!this.explicit && isMissingFile(error)) {
        this.cachedSettings = {};
        return this.cachedSettings;
      }
      throw new ConfigurationError(`Cannot read settings file ${this.settingsPath}: ${errorMessage(error)}`, {
        path: this.settingsPath
      });
    }

    let parsed: unknown;
    try {
      parsed = yaml.parse(content);
    } catch (error) {
      throw new ConfigurationError(`Invalid YAML in ${this.settingsPath}: ${errorMessage(error)}`, {
        path: this.settingsPath
      });
    }

    // An empty document parses to null
    const result = SettingsFileSchema.safeParse(parsed ?? {});
    if (!result.success) {
      throw new ConfigurationError(`Invalid settings in ${this.settingsPath}: ${formatZodError(result.error)}`, {
        path: this.settingsPath
      });
    }

    this.cachedSettings = result.data;
    return this.cachedSettings;
  }

  /**
   * Clear the cached settings (useful for testing or after edits)
   */
  clearCache(): void {
    this.cachedSettings = null;
  }

  /**
   * Effective settings: command-line values over the settings file over
   * the defaults
   */
  async resolve(overrides: SettingsOverrides = {}): Promise<ResolvedSettings> {
    const file = await this.loadSettings();
    const { retry, cache, ...fileScalars } = file;

    return {
      ...DEFAULT_SETTINGS,
      ...definedOnly(fileScalars),
      ...definedOnly(overrides),
      retry: { ...DEFAULT_SETTINGS.retry, ...definedOnly(retry ?? {}) },
      cache: { ...DEFAULT_SETTINGS.cache, ...definedOnly(cache ?? {}) }
    };
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function definedOnly<T extends object>(values: T): Partial<T> {
  const result: Partial<T> = { ...values };
  for (const key in result) {
    if (result[key] === undefined) {
      delete result[key];
    }
  }
  return result;
}
