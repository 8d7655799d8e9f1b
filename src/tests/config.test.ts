/**
 * Configuration Tests
 *
 * Environment settings and the saved dashboard preferences.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { getConfig, validateConfig } from '../config.js';
import { loadConfig, saveConfig, setConfigValue, isConfigKey, defaultConfig } from '../tui/utils/config.js';

describe('getConfig', () => {
  it('should use defaults for an empty environment', () => {
    const config = getConfig({});

    expect(config.apiUrl).toBe('http://127.0.0.1:8000');
    expect(config.pollIntervalMs).toBe(1000);
    expect(config.requestTimeoutMs).toBe(10000);
    expect(config.queryTimeoutMs).toBe(120000);
    expect(config.debug).toBe(false);
  });

  it('should read overrides and strip trailing slashes from the url', () => {
    const config = getConfig({
      QUERYLENS_API_URL: 'https://query.example.test/api//',
      QUERYLENS_POLL_INTERVAL_MS: '500',
      QUERYLENS_EXPORT_DIR: '/tmp/exports',
      QUERYLENS_DEBUG: 'TRUE',
    });

    expect(config.apiUrl).toBe('https://query.example.test/api');
    expect(config.pollIntervalMs).toBe(500);
    expect(config.exportDir).toBe('/tmp/exports');
    expect(config.debug).toBe(true);
  });

  it('should mark non-integer numbers as invalid', () => {
    expect(getConfig({ QUERYLENS_POLL_INTERVAL_MS: 'fast' }).pollIntervalMs).toBeNaN();
  });
});

describe('validateConfig', () => {
  it('should accept the defaults', () => {
    expect(validateConfig(getConfig({}))).toEqual({ valid: true, warnings: [], errors: [] });
  });

  it('should reject a malformed url and bad numbers', () => {
    const result = validateConfig(getConfig({
      QUERYLENS_API_URL: 'not a url',
      QUERYLENS_REQUEST_TIMEOUT_MS: '-5',
    }));

    expect(result.valid).toBe(false);
    expect(result.errors).toEqual([
      'QUERYLENS_API_URL is not a valid URL: not a url',
      'QUERYLENS_REQUEST_TIMEOUT_MS must be a positive integer',
    ]);
  });

  it('should warn about plain http to a remote host and very fast polling', () => {
    const result = validateConfig(getConfig({
      QUERYLENS_API_URL: 'http://query.example.test',
      QUERYLENS_POLL_INTERVAL_MS: '100',
    }));

    expect(result.valid).toBe(true);
    expect(result.warnings).toEqual([
      'query service at query.example.test is reached over plain http',
      'poll interval below 250ms puts extra load on the query service',
    ]);
  });
});

describe('dashboard preferences', () => {
  let dir: string;
  let file: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'querylens-config-'));
    file = path.join(dir, 'config.json');
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('should fall back to defaults when no file exists', () => {
    expect(loadConfig(file)).toEqual(defaultConfig());
  });

  it('should round-trip saved preferences', () => {
    const config = { ...defaultConfig(), apiUrl: 'http://10.0.0.5:8000', showSql: false, transcriptLines: 20 };

    saveConfig(config, file);

    expect(loadConfig(file)).toEqual(config);
  });

  it('should clamp and repair invalid values', () => {
    fs.writeFileSync(file, JSON.stringify({ apiUrl: '  ', showSql: 'yes', transcriptLines: 500 }));

    const config = loadConfig(file);

    expect(config.apiUrl).toBe(defaultConfig().apiUrl);
    expect(config.showSql).toBe(true);
    expect(config.transcriptLines).toBe(50);
  });

  it('should ignore a corrupt file', () => {
    fs.writeFileSync(file, '{ not json');

    expect(loadConfig(file)).toEqual(defaultConfig());
  });

  it('should parse values from the command line', () => {
    const config = defaultConfig();

    expect(setConfigValue(config, 'showSql', 'false').showSql).toBe(false);
    expect(setConfigValue(config, 'transcriptLines', '8').transcriptLines).toBe(8);
    expect(setConfigValue(config, 'apiUrl', 'http://db-host:9000/').apiUrl).toBe('http://db-host:9000');
    expect(() => setConfigValue(config, 'transcriptLines', '2')).toThrow('transcriptLines must be between 3 and 50');
    expect(() => setConfigValue(config, 'showSql', 'maybe')).toThrow('showSql must be true or false');
  });

  it('should know its keys', () => {
    expect(isConfigKey('exportDir')).toBe(true);
    expect(isConfigKey('password')).toBe(false);
  });
});
