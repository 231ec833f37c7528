/**
 * @module logger
 * @description pino logger factory shared by the daemon and the hook CLI.
 */

import { pino, destination, type Logger } from "pino";

export type { Logger };

export interface LoggerOptions {
  /** pino level; defaults to `PADLINK_LOG` or `info`. */
  readonly level?: string;
  /** Route through pino-pretty; defaults to `PADLINK_LOG_PRETTY=1`. */
  readonly pretty?: boolean;
  readonly name?: string;
  /**
   * File descriptor to write to. Defaults to stdout; the hook CLI uses
   * stderr because its stdout is read by the assistant.
   */
  readonly fd?: 1 | 2;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? process.env["PADLINK_LOG"] ?? "info";
  const pretty = options.pretty ?? process.env["PADLINK_LOG_PRETTY"] === "1";
  const name = options.name ?? "padlink";
  const fd = options.fd ?? 1;

  if (pretty) {
    return pino({
      name,
      level,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "HH:MM:ss.l",
          ignore: "pid,hostname",
          destination: fd,
        },
      },
    });
  }
  return pino({ name, level }, destination(fd));
}

/** Logger that discards everything. Default for library and test use. */
export const silentLogger: Logger = pino({ level: "silent" });
