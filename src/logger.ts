/**
 * Tagged console logging. Every line is prefixed with `[Tag]` so a run's
 * output can be grepped per component; debug lines only appear once
 * `setDebugLogging(true)` has been called (`--debug` or ALERTS_DEBUG=true).
 */

import { config } from './config.js';

export interface Logger {
  debug: (msg: string) => void;
  info: (msg: string) => void;
  warn: (msg: string) => void;
  error: (msg: string) => void;
}

let debugEnabled = config.debug;

export function setDebugLogging(enabled: boolean): void {
  debugEnabled = enabled;
}

export function isDebugLogging(): boolean {
  return debugEnabled;
}

function stamp(): string {
  return new Date().toISOString();
}

export function createLogger(tag: string): Logger {
  const prefix = `[${tag}]`;
  return {
    debug: (msg) => {
      if (debugEnabled) console.debug(`${stamp()} DEBUG ${prefix} ${msg}`);
    },
    info: (msg) => console.log(`${stamp()} INFO ${prefix} ${msg}`),
    warn: (msg) => console.warn(`${stamp()} WARN ${prefix} ${msg}`),
    error: (msg) => console.error(`${stamp()} ERROR ${prefix} ${msg}`),
  };
}

/** Render an unknown thrown value as a log-friendly message. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
