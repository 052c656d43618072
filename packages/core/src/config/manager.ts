/**
 * Configuration Manager
 *
 * YAML-based configuration with:
 * - Environment variable substitution (${VAR} and ${VAR:-default})
 * - Schema validation (zod)
 * - Default value application
 * - CLI argument overrides
 *
 * The configured scope list is decoded into a ScopeSet exactly once, here.
 */

import * as fs from 'fs';
import * as yaml from 'yaml';
import { z } from 'zod';
import { ScopeSet } from '../scope/scope-set.js';
import { isScopeError } from '../scope/errors.js';
import type { LogLevel } from '../utils/logger.js';
import { DEFAULT_CONFIG, VALID_LOG_LEVELS, type ScopeConfig } from './types.js';
import { ConfigLoadError, ConfigValidationError } from './errors.js';

export interface ConfigOverrides {
  /** Comma separated scope list, replaces the configured one */
  scopes?: string;
  logLevel?: LogLevel;
}

export interface ConfigManagerOptions {
  configPath?: string;
  /** Environment used for ${VAR} substitution (default: process.env) */
  env?: Record<string, string | undefined>;
  overrides?: ConfigOverrides;
}

// =============================================================================
// Schema
// =============================================================================

const BooleanSchema = z.union([
  z.boolean(),
  z.enum(['true', 'false']).transform((value) => value === 'true'),
]);

const RawConfigSchema = z
  .object({
    scopes: z.union([z.string(), z.array(z.string())]).optional(),
    logging: z
      .object({
        level: z.enum(VALID_LOG_LEVELS).optional(),
        pretty: BooleanSchema.optional(),
      })
      .strict()
      .optional(),
    matcher: z
      .object({
        maxCacheSize: z.coerce.number().int().nonnegative().optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

type RawConfig = z.infer<typeof RawConfigSchema>;

const ENV_VAR_PATTERN = /\$\{(\w+)(?::-([^}]*))?\}/g;

// =============================================================================
// ConfigManager
// =============================================================================

export class ConfigManager {
  private config: ScopeConfig | null = null;

  constructor(private options: ConfigManagerOptions = {}) {}

  /**
   * Load configuration from `configPath`, or defaults when no path is set.
   */
  load(): ScopeConfig {
    const { configPath } = this.options;
    if (!configPath) {
      return this.apply({});
    }
    if (!fs.existsSync(configPath)) {
      throw new ConfigLoadError(`Config file not found: ${configPath}`);
    }
    return this.loadFromString(this.loadFile(configPath));
  }

  /**
   * Load configuration from YAML text.
   */
  loadFromString(content: string): ScopeConfig {
    const parsed = this.parseYaml(content);
    const substituted = this.substituteEnvVars(parsed);
    return this.apply(this.validate(substituted));
  }

  /**
   * The last loaded configuration. Scope sets are copies.
   */
  get(): ScopeConfig {
    if (!this.config) {
      throw new ConfigLoadError('Configuration has not been loaded');
    }
    return {
      scopes: this.config.scopes.clone(),
      logging: { ...this.config.logging },
      matcher: { ...this.config.matcher },
    };
  }

  // ===========================================================================
  // Private Methods
  // ===========================================================================

  private loadFile(path: string): string {
    try {
      return fs.readFileSync(path, 'utf8');
    } catch (e) {
      throw new ConfigLoadError(
        `Failed to read config file: ${path}`,
        e instanceof Error ? e : undefined,
      );
    }
  }

  private parseYaml(content: string): unknown {
    try {
      return yaml.parse(content) ?? {};
    } catch (e) {
      throw new ConfigLoadError('Invalid YAML syntax', e instanceof Error ? e : undefined);
    }
  }

  private substituteEnvVars(obj: unknown): unknown {
    if (typeof obj === 'string') {
      const env = this.options.env ?? process.env;
      return obj.replace(ENV_VAR_PATTERN, (_match: string, name: string, defaultVal?: string) => {
        const value = env[name];

        // Empty counts as unset when a default is given
        if (value === '' && defaultVal !== undefined) {
          return defaultVal;
        }
        if (value === undefined && defaultVal === undefined) {
          throw new ConfigLoadError(`Required environment variable '${name}' not set`);
        }
        return value ?? defaultVal ?? '';
      });
    }
    if (Array.isArray(obj)) {
      return obj.map((v) => this.substituteEnvVars(v));
    }
    if (typeof obj === 'object' && obj !== null) {
      return Object.fromEntries(
        Object.entries(obj).map(([k, v]) => [k, this.substituteEnvVars(v)])
      );
    }
    return obj;
  }

  private validate(raw: unknown): RawConfig {
    const result = RawConfigSchema.safeParse(raw);
    if (result.success) {
      return result.data;
    }

    const issue = result.error.issues[0];
    const field = issue.path.join('.');
    throw new ConfigValidationError(
      field ? `Invalid config field '${field}': ${issue.message}` : `Invalid config: ${issue.message}`,
      field,
      issue.path.reduce<unknown>(
        (node, key) =>
          typeof node === 'object' && node !== null ? Reflect.get(node, key) : undefined,
        raw,
      ),
    );
  }

  private apply(raw: RawConfig): ScopeConfig {
    const { overrides = {} } = this.options;
    const scopeInput = overrides.scopes ?? raw.scopes ?? DEFAULT_CONFIG.scopes;

    this.config = {
      scopes: this.decodeScopes(scopeInput),
      logging: {
        level: overrides.logLevel ?? raw.logging?.level ?? DEFAULT_CONFIG.logging.level,
        pretty: raw.logging?.pretty ?? DEFAULT_CONFIG.logging.pretty,
      },
      matcher: {
        maxCacheSize: raw.matcher?.maxCacheSize ?? DEFAULT_CONFIG.matcher.maxCacheSize,
      },
    };
    return this.get();
  }

  private decodeScopes(input: string | string[]): ScopeSet {
    try {
      return new ScopeSet(input);
    } catch (e) {
      if (isScopeError(e)) {
        throw new ConfigValidationError(
          `Invalid config field 'scopes': ${e.message}`,
          'scopes',
          input,
          e,
        );
      }
      throw e;
    }
  }
}
