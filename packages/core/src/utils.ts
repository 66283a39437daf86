import type { ConfigMapping, ConfigValue } from './config.js';
import { ConfigurationError } from './errors.js';

/** Type guard: checks that a value is a non-null object. */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Convert parsed, untyped data into a frozen ConfigValue tree.
 * Rejects values a settings document cannot carry (functions, undefined, NaN).
 */
export function toConfigValue(value: unknown, path = ''): ConfigValue {
  if (value === null) return null;

  switch (typeof value) {
    case 'string':
    case 'boolean':
      return value;
    case 'number':
      if (!Number.isFinite(value)) {
        throw new ConfigurationError(`Invalid number at "${path || '<root>'}"`);
      }
      return value;
    default:
      break;
  }

  if (Array.isArray(value)) {
    return Object.freeze(value.map((item, i) => toConfigValue(item, `${path}[${i}]`)));
  }

  if (isRecord(value)) {
    return toConfigMapping(value, path);
  }

  throw new ConfigurationError(
    `Unsupported value of type ${typeof value} at "${path || '<root>'}"`,
  );
}

/** Like toConfigValue, but the input must be an object. */
export function toConfigMapping(value: unknown, path = ''): ConfigMapping {
  if (!isRecord(value)) {
    throw new ConfigurationError(`Expected an object at "${path || '<root>'}"`);
  }
  const out: Record<string, ConfigValue> = {};
  for (const [key, child] of Object.entries(value)) {
    out[key] = toConfigValue(child, path ? `${path}.${key}` : key);
  }
  return Object.freeze(out);
}

