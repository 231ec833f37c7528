#!/usr/bin/env node
import { writeProtocolSchemas } from "../codec/json-schema.js";
import { createLogger } from "../logger.js";

const logger = createLogger({ name: "padlink-schema" });

try {
  const written = await writeProtocolSchemas(process.argv[2] ?? "schema");
  logger.info({ files: written }, "protocol schemas written");
} catch (error: unknown) {
  logger.fatal({ err: error }, "cannot write protocol schemas");
  process.exitCode = 1;
}
