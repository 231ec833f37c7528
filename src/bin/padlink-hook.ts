#!/usr/bin/env node
import { defaultHookCliIo, runHookCli } from "../hooks/cli.js";

try {
  process.exitCode = await runHookCli(process.argv.slice(2), defaultHookCliIo());
} catch (error: unknown) {
  process.stderr.write(
    `padlink-hook fatal error: ${error instanceof Error ? error.stack ?? error.message : String(error)}\n`
  );
  process.exitCode = 1;
}
