import { readFileSync, writeFileSync, existsSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';
import { errorMessage } from './errors.js';
import log from './logger.js';

export const SETTINGS_FILE = 'config.json';

/** Key names match the documents earlier releases wrote. */
export interface Settings {
  sbstckdl_path: string;
  pandoc_path: string;
  last_url: string;
  last_output_dir: string;
  last_format: string;
  last_epub_source_dir: string;
  last_epub_output_file: string;
  last_author: string;
  window_geometry: string;
  [key: string]: unknown;
}

export function defaultSettings(platform: NodeJS.Platform = process.platform): Settings {
  return {
    sbstckdl_path: '',
    pandoc_path: platform === 'win32' ? 'C:\\Program Files\\Pandoc\\pandoc.exe' : '',
    last_url: '',
    last_output_dir: '',
    last_format: 'Markdown (.md)',
    last_epub_source_dir: '',
    last_epub_output_file: '',
    last_author: '',
    window_geometry: '1050x800',
  };
}

/** The settings document sits in the package root, next to `src/` and `dist/`. */
export function defaultSettingsPath(): string {
  const here = dirname(fileURLToPath(import.meta.url));
  return join(here, '..', SETTINGS_FILE);
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Overlays `loaded` on top of `defaults`. A known key is only taken when its
 * type matches the default; any other key is kept as written.
 */
export function mergeSettings(defaults: Settings, loaded: Record<string, unknown>): Settings {
  const merged: Settings = { ...defaults };

  for (const [key, value] of Object.entries(loaded)) {
    if (key in defaults && typeof defaults[key] !== typeof value) {
      continue;
    }
    merged[key] = value;
  }

  return merged;
}

export function loadSettings(path: string, defaults: Settings = defaultSettings()): Settings {
  if (!existsSync(path)) {
    return { ...defaults };
  }

  try {
    const content = readFileSync(path, 'utf-8');
    const parsed: unknown = JSON.parse(content);
    if (!isPlainObject(parsed)) {
      log.warn(`Settings file ${path} is not a JSON object, using defaults`);
      return { ...defaults };
    }
    return mergeSettings(defaults, parsed);
  } catch (err) {
    log.warn(`Error reading settings file ${path}: ${errorMessage(err)}`);
    return { ...defaults };
  }
}

/** Returns a message for the user when the document could not be written. */
export function saveSettings(settings: Settings, path: string): string | null {
  try {
    writeFileSync(path, JSON.stringify(settings, null, 2) + '\n', 'utf-8');
    log.info(`Settings saved to ${path}`);
    return null;
  } catch (err) {
    log.error(`Could not save settings to ${path}: ${errorMessage(err)}`);
    return `Could not save settings:\n${errorMessage(err)}`;
  }
}
