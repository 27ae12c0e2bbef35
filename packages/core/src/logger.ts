import { config as sharedConfig, type Config } from "./config.js";

/** Receives one formatted log line. */
export type LogWriter = (line: string) => void;

export interface LoggerOptions {
  config?: Config;
  /** Custom writer function (default: console.log, console.warn for warnings) */
  writer?: LogWriter;
}

export interface Logger {
  /** Written when `debug` is enabled. */
  debug(message: string): void;
  /** Written when `dispatch.trace` is enabled. */
  trace(message: string): void;
  warn(message: string): void;
}

/**
 * Create a console logger whose lines are prefixed `[polydispatch:<scope>]`.
 *
 * Settings are read on every call so that `config.set()` takes effect on
 * loggers that already exist.
 */
export function createLogger(scope: string, options: LoggerOptions = {}): Logger {
  const cfg = options.config ?? sharedConfig;
  const prefix = `[polydispatch:${scope}]`;
  const write = options.writer ?? ((line: string) => console.log(line));
  const writeWarning = options.writer ?? ((line: string) => console.warn(line));

  return {
    debug(message) {
      if (cfg.flag("debug", false)) write(`${prefix} ${message}`);
    },
    trace(message) {
      if (cfg.flag("dispatch.trace", false)) write(`${prefix} ${message}`);
    },
    warn(message) {
      writeWarning(`${prefix} ${message}`);
    },
  };
}
