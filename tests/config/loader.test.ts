/**
 * Configuration Loader Tests
 *
 * Tests for configuration file loading, merging, and validation.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import path from 'path';
import os from 'os';
import {
  loadConfigFile,
  loadEnvironmentConfig,
  deepMerge,
  validateConfigFile,
  loadConfig,
  getConfig,
  reloadConfig,
  clearConfigCache,
  type LoadConfigOptions,
} from '../../src/config/loader';
import { DEFAULT_CONFIG } from '../../src/config/defaults';

describe('Configuration Loader', () => {
  let testDir: string;
  let homeDir: string;
  let projectDir: string;

  function writeConfig(root: string, content: string): string {
    const dir = path.join(root, '.typed-event-bus');
    fs.mkdirSync(dir, { recursive: true });
    const filePath = path.join(dir, 'config.yml');
    fs.writeFileSync(filePath, content);
    return filePath;
  }

  function options(env: NodeJS.ProcessEnv = {}): LoadConfigOptions {
    return { cwd: projectDir, homeDir, env };
  }

  beforeEach(() => {
    testDir = fs.mkdtempSync(path.join(os.tmpdir(), 'config-test-'));
    homeDir = path.join(testDir, 'home');
    projectDir = path.join(testDir, 'project');
    fs.mkdirSync(homeDir);
    fs.mkdirSync(projectDir);
    clearConfigCache();
  });

  afterEach(() => {
    clearConfigCache();
    fs.rmSync(testDir, { recursive: true, force: true });
  });

  describe('loadConfigFile', () => {
    it('should load valid YAML config file', () => {
      const configPath = writeConfig(testDir, `
pools:
  maxListeners: 200
logging:
  level: "debug"
`);

      expect(loadConfigFile(configPath)).toEqual({
        pools: { maxListeners: 200 },
        logging: { level: 'debug' },
      });
    });

    it('should return null for non-existent file', () => {
      expect(loadConfigFile(path.join(testDir, 'missing.yml'))).toBeNull();
    });

    it('should return null for an empty file', () => {
      const configPath = path.join(testDir, 'empty.yml');
      fs.writeFileSync(configPath, '');

      expect(loadConfigFile(configPath)).toBeNull();
    });

    it('should throw error for invalid YAML syntax', () => {
      const configPath = path.join(testDir, 'invalid.yml');
      fs.writeFileSync(configPath, 'pools:\n  maxListeners: [unclosed array\n');

      expect(() => loadConfigFile(configPath)).toThrow(/YAML parsing error/);
    });

    it('should reject documents that are not a mapping', () => {
      const configPath = path.join(testDir, 'scalar.yml');
      fs.writeFileSync(configPath, 'just text\n');

      expect(() => loadConfigFile(configPath)).toThrow(
        `Invalid configuration file: ${configPath} - expected object`
      );
    });
  });

  describe('loadEnvironmentConfig', () => {
    it('should return null when no variable is set', () => {
      expect(loadEnvironmentConfig({ PATH: '/usr/bin' })).toBeNull();
    });

    it('should map variables onto config sections', () => {
      const result = loadEnvironmentConfig({
        TYPED_EVENT_BUS_MAX_LISTENERS: '200',
        TYPED_EVENT_BUS_VERBOSE_MEMORY_LEAK: 'true',
        TYPED_EVENT_BUS_LOG_LEVEL: 'debug',
        TYPED_EVENT_BUS_LOG_FILE: '/tmp/bus.log',
        TYPED_EVENT_BUS_CONSOLE_OUTPUT: 'false',
        TYPED_EVENT_BUS_NO_COLOR: 'true',
      });

      expect(result).toEqual({
        pools: { maxListeners: 200, verboseMemoryLeak: true },
        logging: { level: 'debug', filePath: '/tmp/bus.log', consoleOutput: false, noColor: true },
      });
    });
  });

  describe('deepMerge', () => {
    it('should merge nested objects and replace arrays', () => {
      const target = { a: { x: 1, y: 2 }, list: [1, 2] };

      const merged = deepMerge(target, { a: { y: 3 }, list: [9], skipped: undefined });

      expect(merged).toEqual({ a: { x: 1, y: 3 }, list: [9] });
      expect(Object.keys(merged)).toEqual(['a', 'list']);
      expect(target).toEqual({ a: { x: 1, y: 2 }, list: [1, 2] });
    });
  });

  describe('loadConfig', () => {
    it('should return defaults when no source is present', () => {
      expect(loadConfig(options())).toEqual(DEFAULT_CONFIG);
    });

    it('should apply user file, project file and environment in order', () => {
      writeConfig(homeDir, 'pools:\n  maxListeners: 10\nlogging:\n  level: warn\n');
      writeConfig(projectDir, 'pools:\n  maxListeners: 20\n');

      const config = loadConfig(options({ TYPED_EVENT_BUS_LOG_LEVEL: 'debug' }));

      expect(config).toEqual({
        pools: { maxListeners: 20, verboseMemoryLeak: false },
        logging: { level: 'debug', consoleOutput: true, noColor: false },
      });
    });

    it('should report validation failures by path', () => {
      writeConfig(projectDir, 'pools:\n  maxListeners: -1\n');

      expect(() => loadConfig(options())).toThrow(
        'Configuration validation failed:\n  • pools.maxListeners: maxListeners must be a non-negative integer (0 = unlimited)'
      );
    });

    it('should reject non-numeric environment values', () => {
      expect(() => loadConfig(options({ TYPED_EVENT_BUS_MAX_LISTENERS: 'lots' }))).toThrow(
        /pools\.maxListeners/
      );
    });
  });

  describe('caching', () => {
    it('should cache until reloaded', () => {
      const first = getConfig(options());

      expect(getConfig()).toBe(first);

      const reloaded = reloadConfig(options());
      expect(reloaded).not.toBe(first);
      expect(reloaded).toEqual(first);
    });

    it('should forget the cache when cleared', () => {
      const first = getConfig(options());
      clearConfigCache();

      expect(getConfig(options())).not.toBe(first);
    });
  });

  describe('validateConfigFile', () => {
    it('should accept a valid file', () => {
      const configPath = writeConfig(testDir, 'logging:\n  level: error\n');

      expect(validateConfigFile(configPath)).toEqual({ valid: true });
    });

    it('should report a missing file', () => {
      expect(validateConfigFile(path.join(testDir, 'missing.yml'))).toEqual({
        valid: false,
        errors: 'Configuration file not found',
      });
    });

    it('should report invalid values', () => {
      const configPath = writeConfig(testDir, 'logging:\n  level: loud\n');

      const result = validateConfigFile(configPath);
      expect(result.valid).toBe(false);
      expect(result.errors).toContain('logging.level');
    });
  });
});
