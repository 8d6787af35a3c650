import type { DebugOption } from '../types/options.js';

export type DebugLogger = (message: string) => void;

const noop: DebugLogger = () => undefined;

/**
 * A logger writing `[typebridge] <scope>: <message>` lines. Disabled
 * loggers cost one call; build messages lazily where they are expensive.
 */
export function createDebugLogger(option: DebugOption, scope: string): DebugLogger {
  if (option === false) {
    return noop;
  }
  const sink =
    option === true
      ? (line: string): void => {
          process.stderr.write(`${line}\n`);
        }
      : option;
  return (message) => sink(`[typebridge] ${scope}: ${message}`);
}
