import type { ConfigCategory } from './config.js';

/** JSON Schema type for tool input definitions. */
export type JSONSchema = Record<string, unknown>;

/**
 * Server-enforced bounds for one tool.
 * Invariant: 1 ≤ defaultLimit ≤ maxLimit; timeoutMs > 0.
 */
export interface GuardrailPolicy {
  readonly defaultLimit: number;
  readonly maxLimit: number;
  readonly timeoutMs: number;
}

/** What the reasoning loop sees for one enabled tool. */
export interface ToolCatalogEntry {
  name: string;
  description: string;
  inputSchema: JSONSchema;
}

/** A tool as declared by its provider, before enablement is known. */
export interface ToolSpec extends ToolCatalogEntry {
  /** Input property clamped by the guardrail policy, if any. */
  limitParam?: string;
}

/** A tool as it stands in a built registry. */
export interface ToolDefinition extends ToolSpec {
  category: ConfigCategory;
  enabled: boolean;
  policy: GuardrailPolicy;
}

export type ToolInvocationStatus = 'succeeded' | 'truncated' | 'failed';

export type ToolErrorKind =
  | 'ConfigurationError'
  | 'ValidationError'
  | 'ConnectionError'
  | 'UpstreamTimeoutError'
  | 'UpstreamError'
  | 'CancelledError'
  | 'ToolNotFoundError';

export interface ToolInvocationError {
  kind: ToolErrorKind;
  /** Safe to show the reasoning loop: no credentials, stack traces or category names. */
  message: string;
}

/** Normalized outcome of one tool invocation. Never carries a raw exception. */
export type ToolInvocationResult =
  | {
      status: 'succeeded';
      payload: unknown;
      durationMs: number;
    }
  | {
      status: 'truncated';
      payload: unknown;
      /** Items removed to stay within the effective limit. */
      droppedCount: number;
      durationMs: number;
    }
  | {
      status: 'failed';
      payload: null;
      error: ToolInvocationError;
      durationMs: number;
    };

export interface InvocationOptions {
  /** Cancels the wait for the result (best effort for the outbound call). */
  signal?: AbortSignal;
}
