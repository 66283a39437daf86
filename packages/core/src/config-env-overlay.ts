import type { ConfigMapping, ConfigValue } from './config.js';
import { isConfigMapping, KNOWN_SETTINGS_KEYS } from './config.js';

const PREFIX = 'TOOLGATE_';
const SEPARATOR = '__';
const ENV_REFERENCE_SUFFIX = 'Env';

export type EnvMap = Record<string, string | undefined>;

/**
 * Coerce a string value to a number, boolean, or leave as string.
 */
function coerce(value: string): string | number | boolean {
  if (value === 'true') return true;
  if (value === 'false') return false;

  if (/^-?\d+(\.\d+)?$/.test(value)) {
    const num = Number(value);
    if (Number.isFinite(num)) return num;
  }

  return value;
}

/**
 * Return a copy of `settings` with environment variable overrides applied.
 *
 * Variables must be prefixed with `TOOLGATE_`. Nesting is expressed
 * with double-underscore (`__`). Each segment matches an existing key
 * case-insensitively, ignoring single underscores (so `DEFAULTLIMIT` and
 * `DEFAULT_LIMIT` both reach `defaultLimit`). A segment with no existing
 * key takes the spelling of a known settings key, or else is camel-cased
 * at its underscores (`CLIENT_ID` → `clientId`). Values are coerced to
 * numbers/booleans where possible.
 *
 * Example: `TOOLGATE_EXTERNAL__DATADOG__MAXLIMIT=100`
 *   → `external.datadog.maxLimit = 100`
 */
export function applyEnvOverrides(settings: ConfigMapping, env: EnvMap = process.env): ConfigMapping {
  let result = settings;

  // Sorted so the outcome does not depend on environment ordering.
  const keys = Object.keys(env).filter((k) => k.startsWith(PREFIX)).sort();
  for (const key of keys) {
    const rawValue = env[key];
    if (rawValue === undefined) continue;

    const path = key.slice(PREFIX.length).split(SEPARATOR);
    if (path.some((segment) => segment === '')) continue;

    result = setNested(result, path, coerce(rawValue));
  }

  return result;
}

function fold(key: string): string {
  return key.replace(/_/g, '').toLowerCase();
}

function camelCase(segment: string): string {
  return segment
    .toLowerCase()
    .replace(/_+([a-z0-9])/g, (_match, next: string) => next.toUpperCase());
}

function matchKey(obj: ConfigMapping, segment: string): string {
  const folded = fold(segment);
  return (
    Object.keys(obj).find((k) => fold(k) === folded) ??
    KNOWN_SETTINGS_KEYS.find((k) => fold(k) === folded) ??
    camelCase(segment)
  );
}

function setNested(obj: ConfigMapping, path: string[], value: ConfigValue): ConfigMapping {
  const [head, ...rest] = path;
  if (head === undefined) return obj;

  const key = matchKey(obj, head);
  if (rest.length === 0) {
    return { ...obj, [key]: value };
  }

  const next = obj[key];
  const child = isConfigMapping(next) ? next : {};
  return { ...obj, [key]: setNested(child, rest, value) };
}

/**
 * Replace credential references with their values.
 *
 * A key ending in `Env` whose value is a string names an environment
 * variable: `apiKeyEnv: "DD_API_KEY"` becomes `apiKey: <value of DD_API_KEY>`.
 * The reference key is dropped; an unset variable leaves the target key
 * as the document had it. Applied recursively to nested mappings.
 */
export function resolveEnvReferences(mapping: ConfigMapping, env: EnvMap = process.env): ConfigMapping {
  const out: Record<string, ConfigValue> = {};
  const references: Array<[string, string]> = [];

  for (const [key, value] of Object.entries(mapping)) {
    if (
      key.length > ENV_REFERENCE_SUFFIX.length &&
      key.endsWith(ENV_REFERENCE_SUFFIX) &&
      typeof value === 'string'
    ) {
      references.push([key.slice(0, -ENV_REFERENCE_SUFFIX.length), value]);
      continue;
    }
    out[key] = isConfigMapping(value) ? resolveEnvReferences(value, env) : value;
  }

  for (const [target, variable] of references) {
    const resolved = env[variable];
    if (resolved !== undefined && resolved !== '') {
      out[target] = resolved;
    }
  }

  return out;
}
