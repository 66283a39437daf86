import type { GuardrailPolicy, ResolvedConfig } from '@toolgate/core';
import { ConfigurationError, getNumber } from '@toolgate/core';

export const DEFAULT_POLICY: GuardrailPolicy = Object.freeze({
  defaultLimit: 20,
  maxLimit: 100,
  timeoutMs: 10_000,
});

const POLICY_KEYS = ['defaultLimit', 'maxLimit', 'timeoutMs'] as const;

/**
 * Build a frozen policy, validating that every bound is a positive integer
 * and that `defaultLimit ≤ maxLimit`.
 */
export function createGuardrailPolicy(
  input: Partial<GuardrailPolicy>,
  base: GuardrailPolicy = DEFAULT_POLICY,
  label = 'policy',
): GuardrailPolicy {
  const policy = { ...base, ...stripUndefined(input) };

  const invalid = POLICY_KEYS.filter((key) => !Number.isInteger(policy[key]) || policy[key] < 1);
  if (invalid.length > 0) {
    throw new ConfigurationError(
      `Invalid guardrail ${label}: ${invalid.join(', ')} must be positive integers`,
    );
  }
  if (policy.defaultLimit > policy.maxLimit) {
    throw new ConfigurationError(
      `Invalid guardrail ${label}: defaultLimit (${policy.defaultLimit}) exceeds maxLimit (${policy.maxLimit})`,
    );
  }
  return Object.freeze(policy);
}

/** Read the policy keys present in a config mapping. */
export function readPolicyOverrides(config: ResolvedConfig | undefined): Partial<GuardrailPolicy> {
  if (!config) return {};
  return stripUndefined({
    defaultLimit: getNumber(config, 'defaultLimit'),
    maxLimit: getNumber(config, 'maxLimit'),
    timeoutMs: getNumber(config, 'timeoutMs'),
  });
}

/**
 * Effective limit for a request: the requested value capped at `maxLimit`
 * (at least 1), or `defaultLimit` when none was requested. Never throws.
 */
export function clampLimit(policy: GuardrailPolicy, requested: unknown): number {
  if (typeof requested !== 'number' || !Number.isFinite(requested)) {
    return policy.defaultLimit;
  }
  return Math.max(1, Math.min(Math.floor(requested), policy.maxLimit));
}

function stripUndefined(input: Partial<GuardrailPolicy>): Partial<GuardrailPolicy> {
  const out: { -readonly [K in keyof GuardrailPolicy]?: number } = {};
  for (const key of POLICY_KEYS) {
    const value = input[key];
    if (value !== undefined) out[key] = value;
  }
  return out;
}
