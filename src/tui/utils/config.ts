/**
 * Config utility for loading and saving TUI preferences
 * Preferences are stored at ~/.querylens/config.json
 */

import fs from 'fs';
import path from 'path';
import os from 'os';
import { getConfig } from '../../config.js';

export interface TuiConfig {
  apiUrl: string;
  exportDir: string;
  showSql: boolean;
  transcriptLines: number;
}

export const CONFIG_DIR = path.join(os.homedir(), '.querylens');
export const CONFIG_FILE = path.join(CONFIG_DIR, 'config.json');

export const MIN_TRANSCRIPT_LINES = 3;
export const MAX_TRANSCRIPT_LINES = 50;

export function defaultConfig(): TuiConfig {
  const service = getConfig();
  return {
    apiUrl: service.apiUrl,
    exportDir: service.exportDir,
    showSql: true,
    transcriptLines: 12,
  };
}

/**
 * Load preferences, falling back to defaults for anything missing or invalid
 */
export function loadConfig(file: string = CONFIG_FILE): TuiConfig {
  const defaults = defaultConfig();

  try {
    if (!fs.existsSync(file)) {
      return defaults;
    }

    const parsed: unknown = JSON.parse(fs.readFileSync(file, 'utf-8'));
    if (typeof parsed !== 'object' || parsed === null) {
      return defaults;
    }
    const raw: Partial<Record<keyof TuiConfig, unknown>> = parsed;

    return {
      apiUrl: typeof raw.apiUrl === 'string' && raw.apiUrl.trim()
        ? raw.apiUrl.trim().replace(/\/+$/, '')
        : defaults.apiUrl,
      exportDir: typeof raw.exportDir === 'string' && raw.exportDir.trim()
        ? raw.exportDir.trim()
        : defaults.exportDir,
      showSql: typeof raw.showSql === 'boolean' ? raw.showSql : defaults.showSql,
      transcriptLines: typeof raw.transcriptLines === 'number' && Number.isFinite(raw.transcriptLines)
        ? Math.max(MIN_TRANSCRIPT_LINES, Math.min(MAX_TRANSCRIPT_LINES, Math.round(raw.transcriptLines)))
        : defaults.transcriptLines,
    };
  } catch {
    return defaults;
  }
}

export function saveConfig(config: TuiConfig, file: string = CONFIG_FILE): void {
  try {
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, JSON.stringify(config, null, 2), 'utf-8');
  } catch (err) {
    console.error('Failed to save config:', err);
  }
}

const CONFIG_KEYS: ReadonlySet<string> = new Set<keyof TuiConfig>(['apiUrl', 'exportDir', 'showSql', 'transcriptLines']);

export function isConfigKey(key: string): key is keyof TuiConfig {
  return CONFIG_KEYS.has(key);
}

/**
 * Apply a string value from the command line to one preference
 */
export function setConfigValue(config: TuiConfig, key: keyof TuiConfig, value: string): TuiConfig {
  switch (key) {
    case 'showSql':
      if (value !== 'true' && value !== 'false') {
        throw new Error('showSql must be true or false');
      }
      return { ...config, showSql: value === 'true' };
    case 'transcriptLines': {
      const lines = parseInt(value, 10);
      if (isNaN(lines) || lines < MIN_TRANSCRIPT_LINES || lines > MAX_TRANSCRIPT_LINES) {
        throw new Error(`transcriptLines must be between ${MIN_TRANSCRIPT_LINES} and ${MAX_TRANSCRIPT_LINES}`);
      }
      return { ...config, transcriptLines: lines };
    }
    case 'apiUrl':
      return { ...config, apiUrl: value.trim().replace(/\/+$/, '') };
    case 'exportDir':
      return { ...config, exportDir: value.trim() };
  }
}
