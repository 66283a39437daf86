import type { ToolInvocationResult } from '@toolgate/core';

function renderPayload(payload: unknown): string {
  if (typeof payload === 'string') return payload;
  if (Array.isArray(payload) && payload.length === 0) return 'No results.';
  return JSON.stringify(payload, null, 2);
}

/** Render an invocation result as text for the reasoning loop's context. */
export function formatInvocationResult(result: ToolInvocationResult): string {
  switch (result.status) {
    case 'succeeded':
      return renderPayload(result.payload);
    case 'truncated': {
      const shown = Array.isArray(result.payload) ? result.payload.length : 0;
      return `${renderPayload(result.payload)}\n\n[Showing ${shown} results; ${result.droppedCount} more were omitted. Narrow the query to see them.]`;
    }
    case 'failed':
      return `Error (${result.error.kind}): ${result.error.message}`;
  }
}
