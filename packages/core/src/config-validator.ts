import JSON5 from 'json5';
import { readFileSync } from 'node:fs';
import { extname } from 'node:path';
import { parse as parseYaml } from 'yaml';
import type { SettingsTree } from './config.js';
import { SETTINGS_SECTIONS } from './config.js';
import { isRecord, toConfigMapping } from './utils.js';

export type SettingsFormat = 'json5' | 'yaml';

const VALID_TOP_LEVEL_KEYS = new Set<string>(SETTINGS_SECTIONS);

export interface SettingsValidationError {
  path: string;
  message: string;
}

export interface SettingsValidationResult {
  valid: boolean;
  errors: SettingsValidationError[];
  settings?: SettingsTree;
}

/**
 * Parse and validate a settings document.
 * Rejects unknown top-level sections (strict mode) and non-object sections.
 */
export function validateSettings(text: string, format: SettingsFormat = 'json5'): SettingsValidationResult {
  const errors: SettingsValidationError[] = [];

  let parsed: unknown;
  try {
    parsed = format === 'yaml' ? parseYaml(text) : JSON5.parse(text);
  } catch (err) {
    return {
      valid: false,
      errors: [{ path: '', message: `Invalid ${format.toUpperCase()}: ${String(err)}` }],
    };
  }

  // An empty YAML document parses to null
  if (parsed === null || parsed === undefined) {
    parsed = {};
  }

  if (!isRecord(parsed)) {
    return {
      valid: false,
      errors: [{ path: '', message: 'Settings must be an object' }],
    };
  }

  for (const [key, value] of Object.entries(parsed)) {
    if (!VALID_TOP_LEVEL_KEYS.has(key)) {
      errors.push({ path: key, message: `Unknown top-level section: "${key}"` });
    } else if (!isRecord(value)) {
      errors.push({ path: key, message: `Section "${key}" must be an object` });
    }
  }

  if (errors.length > 0) {
    return { valid: false, errors };
  }

  try {
    return { valid: true, errors, settings: toConfigMapping(parsed) };
  } catch (err) {
    return {
      valid: false,
      errors: [{ path: '', message: err instanceof Error ? err.message : String(err) }],
    };
  }
}

/** Pick the parser from the file extension (`.yaml`/`.yml` → YAML, anything else → JSON5). */
export function detectFormat(filePath: string): SettingsFormat {
  const ext = extname(filePath).toLowerCase();
  return ext === '.yaml' || ext === '.yml' ? 'yaml' : 'json5';
}

/**
 * Load and validate a settings file from disk.
 */
export function loadSettings(filePath: string): SettingsValidationResult {
  let content: string;
  try {
    content = readFileSync(filePath, 'utf-8');
  } catch (err) {
    return {
      valid: false,
      errors: [{ path: '', message: `Cannot read settings file: ${String(err)}` }],
    };
  }
  return validateSettings(content, detectFormat(filePath));
}
