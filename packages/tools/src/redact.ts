import type { ConfigValue, ResolvedConfig } from '@toolgate/core';
import { isConfigMapping } from '@toolgate/core';

const SECRET_KEY = /(key|token|secret|password|credential)$/i;
const AUTH_HEADER = /\b(Bearer|Basic|token)\s+[A-Za-z0-9._~+/=-]+/g;
const URL_PASSWORD = /(\/\/[^:/@\s]+:)[^@\s]+@/g;

function collectSecrets(value: ConfigValue, key: string, out: Set<string>): void {
  if (typeof value === 'string') {
    if (SECRET_KEY.test(key) && value.length >= 4) out.add(value);
    return;
  }
  if (isConfigMapping(value)) {
    for (const [childKey, child] of Object.entries(value)) {
      collectSecrets(child, childKey, out);
    }
  }
}

/**
 * Mask credentials in a message before it is logged: every secret-looking
 * value of `config`, authorization header values and URL passwords.
 */
export function redactSecrets(message: string, config?: ResolvedConfig): string {
  let out = message;
  if (config) {
    const secrets = new Set<string>();
    collectSecrets(config, '', secrets);
    for (const secret of secrets) {
      out = out.split(secret).join('***');
    }
  }
  return out.replace(AUTH_HEADER, '$1 ***').replace(URL_PASSWORD, '$1***@');
}
