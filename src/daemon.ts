/**
 * @module daemon
 * @description `padlinkd` bootstrap: load the config, build the hub,
 * publish the initial render and serve until signalled.
 */

import type { Logger } from "pino";
import { BroadcastHub } from "./primitives/broadcast-hub.js";
import { DeviceServer } from "./transports/websocket.js";
import {
  ConfigError,
  DEFAULT_CONFIG_PATH,
  loadConfig,
  parseListen,
} from "./config/index.js";
import { createLogger } from "./logger.js";
import { TransportError } from "./interfaces/transport.js";
import type { DaemonConfig, ListenAddress } from "./types/config.js";

export interface DaemonOptions {
  readonly configPath: string;
  /** Overrides `daemon.listen` from the config file. */
  readonly listen: ListenAddress | null;
}

export interface RunningDaemon {
  readonly hub: BroadcastHub;
  readonly server: DeviceServer;
  readonly address: ListenAddress;
  stop(): Promise<void>;
}

export const DAEMON_USAGE = "usage: padlinkd [--config PATH] [--listen HOST:PORT]";

/**
 * @throws {Error} on unknown flags or missing values.
 * @throws {ConfigError} code=INVALID_LISTEN for a malformed `--listen`.
 */
export function parseDaemonArgs(argv: readonly string[]): DaemonOptions {
  let configPath = process.env["PADLINK_CONFIG"] ?? DEFAULT_CONFIG_PATH;
  let listen: ListenAddress | null = null;

  for (let idx = 0; idx < argv.length; idx += 1) {
    const arg = argv[idx];
    if (arg === "--config" || arg === "--listen") {
      const value = argv[idx + 1];
      if (value === undefined) {
        throw new Error(`missing value for ${arg}`);
      }
      if (arg === "--config") {
        configPath = value;
      } else {
        listen = parseListen(value);
      }
      idx += 1;
      continue;
    }
    throw new Error(`unknown argument ${String(arg)}`);
  }

  return { configPath, listen };
}

/**
 * Start serving an already-validated config.
 */
export async function startDaemon(
  config: DaemonConfig,
  options: { readonly listen?: ListenAddress | null; readonly logger?: Logger } = {}
): Promise<RunningDaemon> {
  const logger = options.logger ?? createLogger();
  const hub = new BroadcastHub(config, { logger });
  hub.publishRender();

  const server = new DeviceServer(hub, { logger });
  const address = await server.listen(options.listen ?? config.listen);
  logger.info({ host: address.host, port: address.port }, "padlinkd listening");

  return {
    hub,
    server,
    address,
    stop: async () => {
      await server.close();
      hub.close();
    },
  };
}

/**
 * Process entry point.
 * @returns Process exit code.
 */
export async function main(
  argv: readonly string[],
  logger: Logger = createLogger({ name: "padlinkd" })
): Promise<number> {
  let options: DaemonOptions;
  let config: DaemonConfig;
  try {
    options = parseDaemonArgs(argv);
    config = await loadConfig(options.configPath);
  } catch (err) {
    if (err instanceof ConfigError) {
      logger.fatal({ code: err.code }, err.message);
    } else {
      logger.fatal(`${err instanceof Error ? err.message : String(err)}\n${DAEMON_USAGE}`);
    }
    return 1;
  }

  let daemon: RunningDaemon;
  try {
    daemon = await startDaemon(config, { listen: options.listen, logger });
  } catch (err) {
    if (err instanceof TransportError) {
      logger.fatal({ code: err.code }, err.message);
      return 1;
    }
    throw err;
  }

  await new Promise<void>((resolve) => {
    process.once("SIGINT", () => resolve());
    process.once("SIGTERM", () => resolve());
  });

  logger.info("shutting down");
  await daemon.stop();
  return 0;
}
