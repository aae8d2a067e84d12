import { readFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { parse as parseYaml } from 'yaml';

import type { ParserMode } from './diagnostics.js';
import { SettingsError } from './errors.js';

/** Whether URL sources may be fetched. `ask` has no interactive prompt and behaves like `deny`. */
export type AutoDownloadSetting = 'allow' | 'deny' | 'ask';

/** Process-level preferences consulted by the converter. */
export interface Settings {
  autoDownload: AutoDownloadSetting;
  /** Directory for cache artifacts; `undefined` turns caching off. */
  scratchDirectory?: string;
  parserMode: ParserMode;
  cache: boolean;
}

/** Inputs for `loadSettings`. */
export interface LoadSettingsOptions {
  /** YAML settings file; a missing file falls back to defaults. */
  path?: string;
  env?: NodeJS.ProcessEnv;
}

const ENV_PREFIX = 'SCORE_INTERCHANGE_';

/** Defaults applied when neither the settings file nor the environment say otherwise. */
export function defaultSettings(): Settings {
  return {
    autoDownload: 'deny',
    scratchDirectory: path.join(os.tmpdir(), 'score-interchange'),
    parserMode: 'lenient',
    cache: true
  };
}

/** Load settings from an optional YAML file, then apply environment overrides. */
export async function loadSettings(options: LoadSettingsOptions = {}): Promise<Settings> {
  let settings = defaultSettings();

  if (options.path) {
    const raw = await readOptionalFile(options.path);
    if (raw !== undefined) {
      settings = applySettingsObject(settings, parseYaml(raw), options.path);
    }
  }

  return applyEnvironment(settings, options.env ?? process.env);
}

/** Merge a parsed YAML document over `base`, validating every known key. */
export function applySettingsObject(base: Settings, input: unknown, origin = 'settings'): Settings {
  if (input === null || input === undefined) {
    return base;
  }

  if (!isRecord(input)) {
    throw new SettingsError(origin, 'settings must be a YAML mapping');
  }

  const next: Settings = { ...base };

  if (input.autoDownload !== undefined) {
    next.autoDownload = readAutoDownload('autoDownload', input.autoDownload);
  }
  if (input.scratchDirectory !== undefined) {
    next.scratchDirectory = readScratchDirectory('scratchDirectory', input.scratchDirectory);
  }
  if (input.parserMode !== undefined) {
    next.parserMode = readParserMode('parserMode', input.parserMode);
  }
  if (input.cache !== undefined) {
    if (typeof input.cache !== 'boolean') {
      throw new SettingsError('cache', 'expected true or false');
    }
    next.cache = input.cache;
  }

  return next;
}

/** Apply `SCORE_INTERCHANGE_*` overrides. */
function applyEnvironment(base: Settings, env: NodeJS.ProcessEnv): Settings {
  const next: Settings = { ...base };

  const autoDownload = env[`${ENV_PREFIX}AUTO_DOWNLOAD`];
  if (autoDownload !== undefined) {
    next.autoDownload = readAutoDownload(`${ENV_PREFIX}AUTO_DOWNLOAD`, autoDownload);
  }

  const scratch = env[`${ENV_PREFIX}SCRATCH_DIR`];
  if (scratch !== undefined) {
    next.scratchDirectory = readScratchDirectory(`${ENV_PREFIX}SCRATCH_DIR`, scratch);
  }

  const mode = env[`${ENV_PREFIX}PARSER_MODE`];
  if (mode !== undefined) {
    next.parserMode = readParserMode(`${ENV_PREFIX}PARSER_MODE`, mode);
  }

  const cache = env[`${ENV_PREFIX}CACHE`];
  if (cache !== undefined) {
    const normalized = cache.trim().toLowerCase();
    if (!['1', '0', 'true', 'false', 'yes', 'no'].includes(normalized)) {
      throw new SettingsError(`${ENV_PREFIX}CACHE`, `expected a boolean, got '${cache}'`);
    }
    next.cache = normalized === '1' || normalized === 'true' || normalized === 'yes';
  }

  return next;
}

function readAutoDownload(key: string, value: unknown): AutoDownloadSetting {
  if (value === 'allow' || value === 'deny' || value === 'ask') {
    return value;
  }
  throw new SettingsError(key, `expected 'allow', 'deny' or 'ask', got '${String(value)}'`);
}

function readParserMode(key: string, value: unknown): ParserMode {
  if (value === 'strict' || value === 'lenient') {
    return value;
  }
  throw new SettingsError(key, `expected 'strict' or 'lenient', got '${String(value)}'`);
}

/** An empty string disables the scratch directory and with it the cache. */
function readScratchDirectory(key: string, value: unknown): string | undefined {
  if (typeof value !== 'string') {
    throw new SettingsError(key, 'expected a directory path');
  }
  return value.trim().length > 0 ? value : undefined;
}

async function readOptionalFile(filePath: string): Promise<string | undefined> {
  try {
    return await readFile(filePath, 'utf8');
  } catch (error) {
    if (isRecord(error) && error.code === 'ENOENT') {
      return undefined;
    }
    throw error;
  }
}

/** Narrow unknown values to plain string-keyed records. */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
