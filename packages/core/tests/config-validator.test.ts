import { describe, it, expect } from 'vitest';
import { fileURLToPath } from 'node:url';
import { validateSettings, loadSettings, detectFormat } from '../src/index.js';

const VALID_SETTINGS = `{
  vector: { provider: "qdrant", qdrant: { url: "http://localhost:6333", collection: "docs" } },
  embedding: { provider: "openai", openai: { model: "text-embedding-3-small", apiKeyEnv: "OPENAI_API_KEY" } },
  external: { datadog: { enabled: false, defaultLimit: 50, maxLimit: 200 } },
}`;

describe('settings validator', () => {
  it('accepts a valid document', () => {
    const result = validateSettings(VALID_SETTINGS);
    expect(result.valid).toBe(true);
    expect(result.errors).toHaveLength(0);
    expect(result.settings?.['vector']).toEqual({
      provider: 'qdrant',
      qdrant: { url: 'http://localhost:6333', collection: 'docs' },
    });
  });

  it('freezes the parsed settings', () => {
    const result = validateSettings(VALID_SETTINGS);
    expect(Object.isFrozen(result.settings)).toBe(true);
    expect(Object.isFrozen(result.settings?.['external'])).toBe(true);
  });

  it('rejects malformed JSON5', () => {
    const result = validateSettings('{ this is not valid json5 !!!');
    expect(result.valid).toBe(false);
    expect(result.errors[0]?.message).toMatch(/Invalid JSON5/);
  });

  it('rejects a non-object document', () => {
    const result = validateSettings('"just a string"');
    expect(result.valid).toBe(false);
    expect(result.errors[0]?.message).toBe('Settings must be an object');
  });

  it('rejects unknown top-level sections', () => {
    const result = validateSettings('{ vector: {}, plugins: {} }');
    expect(result.valid).toBe(false);
    expect(result.errors).toEqual([
      { path: 'plugins', message: 'Unknown top-level section: "plugins"' },
    ]);
  });

  it('rejects sections that are not objects', () => {
    const result = validateSettings('{ external: [] }');
    expect(result.valid).toBe(false);
    expect(result.errors[0]?.message).toBe('Section "external" must be an object');
  });

  it('parses YAML', () => {
    const yaml = [
      'external:',
      '  jira:',
      '    enabled: true',
      '    baseUrl: https://example.atlassian.net',
      '    maxLimit: 100',
    ].join('\n');
    const result = validateSettings(yaml, 'yaml');
    expect(result.valid).toBe(true);
    expect(result.settings?.['external']).toEqual({
      jira: { enabled: true, baseUrl: 'https://example.atlassian.net', maxLimit: 100 },
    });
  });

  it('treats an empty YAML document as empty settings', () => {
    const result = validateSettings('', 'yaml');
    expect(result.valid).toBe(true);
    expect(result.settings).toEqual({});
  });

  it('picks the format from the file extension', () => {
    expect(detectFormat('settings.yaml')).toBe('yaml');
    expect(detectFormat('settings.YML')).toBe('yaml');
    expect(detectFormat('settings.json5')).toBe('json5');
    expect(detectFormat('settings.json')).toBe('json5');
  });

  it('reports an unreadable file', () => {
    const result = loadSettings('/nonexistent/settings.json5');
    expect(result.valid).toBe(false);
    expect(result.errors[0]?.message).toMatch(/Cannot read settings file/);
  });

  it('loads and validates the default.json5 file', () => {
    const settingsPath = fileURLToPath(new URL('../../../config/default.json5', import.meta.url));
    const result = loadSettings(settingsPath);
    expect(result.errors).toHaveLength(0);
    expect(result.valid).toBe(true);
  });
});
