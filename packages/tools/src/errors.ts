/** Thrown at registry build when two tools share a name. */
export class DuplicateToolNameError extends Error {
  constructor(
    public readonly toolName: string,
    public readonly firstCategory: string,
    public readonly secondCategory: string,
  ) {
    super(
      `Duplicate tool name "${toolName}" declared by "${firstCategory}" and "${secondCategory}"`,
    );
    this.name = 'DuplicateToolNameError';
  }
}

/** Thrown when a requested tool is not in the registry (unknown or disabled). */
export class ToolNotFoundError extends Error {
  constructor(public readonly toolName: string) {
    super(`Tool not found: ${toolName}`);
    this.name = 'ToolNotFoundError';
  }
}

/** Thrown when tool arguments do not match the tool's input schema. */
export class ToolValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ToolValidationError';
  }
}

/** An external service rejected or failed a request. */
export class UpstreamError extends Error {
  constructor(
    message: string,
    /** HTTP status reported by the service, when there was one. */
    public readonly status?: number,
  ) {
    super(message);
    this.name = 'UpstreamError';
  }
}

/** An external call did not complete within the tool's timeout. */
export class UpstreamTimeoutError extends Error {
  constructor(public readonly timeoutMs: number) {
    super(`Timed out after ${timeoutMs}ms`);
    this.name = 'UpstreamTimeoutError';
  }
}

/** The caller abandoned the invocation. */
export class CancelledError extends Error {
  constructor() {
    super('Invocation cancelled');
    this.name = 'CancelledError';
  }
}

/** The circuit of the tool's service is open; the call was not attempted. */
export class CircuitOpenError extends Error {
  constructor(
    public readonly category: string,
    public readonly retryAfterMs: number,
  ) {
    super(`Circuit for "${category}" is open`);
    this.name = 'CircuitOpenError';
  }
}
