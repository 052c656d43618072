/**
 * Configuration Tests
 *
 * Tests cover:
 * - Loading configuration from YAML files
 * - Environment variable substitution (${VAR} and ${VAR:-default})
 * - Validation of field types and unknown keys
 * - Decoding the configured scope list
 * - CLI overrides
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import {
  ConfigManager,
  ConfigLoadError,
  ConfigValidationError,
} from '../../../src/config/index.js';
import { InvalidScopeTokenError } from '../../../src/scope/errors.js';

describe('ConfigManager', () => {
  let tempDir: string;

  const writeConfig = (content: string): string => {
    const file = path.join(tempDir, 'scopes.yaml');
    fs.writeFileSync(file, content, 'utf8');
    return file;
  };

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'scopeset-config-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  // ==========================================================================
  // Loading
  // ==========================================================================

  describe('load', () => {
    it('should apply defaults without a config file', () => {
      const config = new ConfigManager().load();

      expect(config.scopes.toArray()).toEqual(['default']);
      expect(config.logging).toEqual({ level: 'info', pretty: false });
      expect(config.matcher).toEqual({ maxCacheSize: 256 });
    });

    it('should load a YAML file', () => {
      const configPath = writeConfig(
        [
          'scopes: "Default, East-Wing"',
          'logging:',
          '  level: debug',
          '  pretty: true',
          'matcher:',
          '  maxCacheSize: 64',
        ].join('\n'),
      );

      const config = new ConfigManager({ configPath }).load();

      expect(config.scopes.toArray()).toEqual(['default', 'east-wing']);
      expect(config.logging).toEqual({ level: 'debug', pretty: true });
      expect(config.matcher).toEqual({ maxCacheSize: 64 });
    });

    it('should treat an empty file as defaults', () => {
      const configPath = writeConfig('');

      expect(new ConfigManager({ configPath }).load().scopes.toArray()).toEqual(['default']);
    });

    it('should fail when the file does not exist', () => {
      const configPath = path.join(tempDir, 'missing.yaml');

      expect(() => new ConfigManager({ configPath }).load()).toThrow(ConfigLoadError);
    });

    it('should fail on invalid YAML', () => {
      const configPath = writeConfig('scopes: [unclosed');

      expect(() => new ConfigManager({ configPath }).load()).toThrow(ConfigLoadError);
    });
  });

  // ==========================================================================
  // Scopes
  // ==========================================================================

  describe('scopes', () => {
    it('should accept a YAML list of scope names', () => {
      const config = new ConfigManager().loadFromString('scopes:\n  - West Wing\n  - "a,b"\n');

      expect(config.scopes.toArray()).toEqual(['a,b', 'west wing']);
    });

    it('should decode escapes in a scope list string', () => {
      const config = new ConfigManager().loadFromString("scopes: 'a\\,b,c'");

      expect(config.scopes.toArray()).toEqual(['a,b', 'c']);
    });

    it('should report an empty scope as a validation error', () => {
      try {
        new ConfigManager().loadFromString('scopes: "a,,b"');
        expect.unreachable('loadFromString should have thrown');
      } catch (error) {
        expect(error).toBeInstanceOf(ConfigValidationError);
        if (error instanceof ConfigValidationError) {
          expect(error.field).toBe('scopes');
          expect(error.value).toBe('a,,b');
          expect(error.cause).toBeInstanceOf(InvalidScopeTokenError);
        }
      }
    });
  });

  // ==========================================================================
  // Environment Variables
  // ==========================================================================

  describe('environment variable substitution', () => {
    it('should substitute ${VAR}', () => {
      const manager = new ConfigManager({ env: { SITE_SCOPES: 'lab,office' } });

      const config = manager.loadFromString('scopes: "${SITE_SCOPES}"');

      expect(config.scopes.toArray()).toEqual(['lab', 'office']);
    });

    it('should fall back to ${VAR:-default}', () => {
      const config = new ConfigManager({ env: {} }).loadFromString('scopes: "${SITE_SCOPES:-fallback}"');

      expect(config.scopes.toArray()).toEqual(['fallback']);
    });

    it('should treat an empty variable as unset when a default is given', () => {
      const manager = new ConfigManager({ env: { SITE_SCOPES: '' } });

      expect(manager.loadFromString('scopes: "${SITE_SCOPES:-lab}"').scopes.toArray()).toEqual(['lab']);
    });

    it('should fail when a required variable is missing', () => {
      const manager = new ConfigManager({ env: {} });

      expect(() => manager.loadFromString('scopes: "${SITE_SCOPES}"')).toThrow(ConfigLoadError);
    });

    it('should convert substituted numbers and booleans', () => {
      const manager = new ConfigManager({ env: { CACHE_SIZE: '32', PRETTY: 'true' } });

      const config = manager.loadFromString(
        'logging:\n  pretty: "${PRETTY}"\nmatcher:\n  maxCacheSize: "${CACHE_SIZE}"\n',
      );

      expect(config.matcher.maxCacheSize).toBe(32);
      expect(config.logging.pretty).toBe(true);
    });
  });

  // ==========================================================================
  // Validation
  // ==========================================================================

  describe('validation', () => {
    it('should reject unknown keys', () => {
      try {
        new ConfigManager().loadFromString('scopes: lab\nextra: true\n');
        expect.unreachable('loadFromString should have thrown');
      } catch (error) {
        expect(error).toBeInstanceOf(ConfigValidationError);
        if (error instanceof ConfigValidationError) {
          expect(error.field).toBe('');
        }
      }
    });

    it('should reject an invalid log level', () => {
      try {
        new ConfigManager().loadFromString('logging:\n  level: verbose\n');
        expect.unreachable('loadFromString should have thrown');
      } catch (error) {
        expect(error).toBeInstanceOf(ConfigValidationError);
        if (error instanceof ConfigValidationError) {
          expect(error.field).toBe('logging.level');
          expect(error.value).toBe('verbose');
        }
      }
    });

    it('should reject a negative cache size', () => {
      expect(() => new ConfigManager().loadFromString('matcher:\n  maxCacheSize: -1\n')).toThrow(
        ConfigValidationError,
      );
    });
  });

  // ==========================================================================
  // Overrides
  // ==========================================================================

  describe('overrides', () => {
    it('should prefer override values over the file', () => {
      const configPath = writeConfig('scopes: lab\nlogging:\n  level: warn\n');
      const manager = new ConfigManager({
        configPath,
        overrides: { scopes: 'Office,Lab', logLevel: 'debug' },
      });

      const config = manager.load();

      expect(config.scopes.toArray()).toEqual(['lab', 'office']);
      expect(config.logging.level).toBe('debug');
    });
  });

  describe('get', () => {
    it('should fail before load', () => {
      expect(() => new ConfigManager().get()).toThrow(ConfigLoadError);
    });

    it('should return copies of the configured scopes', () => {
      const manager = new ConfigManager();
      manager.load();

      const scopes = manager.get().scopes;
      scopes.differenceUpdate(scopes);

      expect(scopes.isEmpty()).toBe(true);
      expect(manager.get().scopes.toArray()).toEqual(['default']);
    });
  });
});
