/** Logger interface injected into every component that logs. */
export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

/** Console-backed logger; `scope` is added after the level tag. */
export function createConsoleLogger(scope?: string): Logger {
  const tag = scope ? ` [${scope}]` : '';
  return {
    info: (msg: string, ...args: unknown[]) => console.log(`[INFO]${tag} ${msg}`, ...args),
    warn: (msg: string, ...args: unknown[]) => console.warn(`[WARN]${tag} ${msg}`, ...args),
    error: (msg: string, ...args: unknown[]) => console.error(`[ERROR]${tag} ${msg}`, ...args),
    debug: (msg: string, ...args: unknown[]) => console.debug(`[DEBUG]${tag} ${msg}`, ...args),
  };
}
