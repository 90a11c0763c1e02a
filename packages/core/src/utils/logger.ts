/**
 * @fileoverview Debug output for the assigners and the table front end. Off
 *   unless `MARKERSPAN_DEBUG` is set in the environment or
 *   `globalThis.__MARKERSPAN_DEBUG` is truthy.
 */

/** Prints `[prefix] ...` lines while debugging is on; silent otherwise. */
export class Logger {
  private readonly enabled: boolean;
  private readonly prefix: string;

  constructor(prefix: string, forceEnable = false) {
    this.prefix = prefix;
    this.enabled = forceEnable || isDebugMode();
  }

  get isEnabled(): boolean {
    return this.enabled;
  }

  log(...args: unknown[]): void {
    if (this.enabled) {
      console.log(`[${this.prefix}]`, ...args);
    }
  }
}

export function isDebugMode(): boolean {
  return Boolean(
    Reflect.get(globalThis, '__MARKERSPAN_DEBUG') ||
    (typeof process !== 'undefined' && process?.env?.MARKERSPAN_DEBUG)
  );
}

/**
 * The flag is sampled here, once per logger. Entry points call this on every
 * invocation, so toggling the flag takes effect on the next call.
 */
export function createLogger(prefix: string, forceEnable = false): Logger {
  return new Logger(prefix, forceEnable);
}
