/**
 * @module hooks/cli
 * @description `padlink-hook`: the command the assistant runs for each
 * lifecycle hook.
 *
 * The assistant pipes one JSON payload to stdin and reads stdout. The
 * allow/deny decision for PreToolUse is made here, locally, and printed
 * before anything is sent to the daemon; the daemon notification is
 * best-effort and bounded by a short timeout.
 */

import { execFile } from "node:child_process";
import type { Logger } from "pino";
import type { HookNotification } from "../types/protocol.js";
import { extractToolCommand } from "../codec/index.js";
import { loadConfig } from "../config/index.js";
import { POLICY_BLOCK_HOOK } from "../primitives/reducer.js";
import { createLogger } from "../logger.js";
import { DEFAULT_DENY_PATTERNS, findDeniedPattern } from "./deny-list.js";

export const DEFAULT_DAEMON_URL = "http://127.0.0.1:29381";

/** Upper bound on one daemon notification. */
export const NOTIFY_TIMEOUT_MS = 250;

/** Environment variable carrying the launcher-assigned session tag. */
export const SESSION_TAG_ENV = "PADLINK_SESSION_TAG";

export class HookCliError extends Error {
  constructor(
    message: string,
    public readonly code: "USAGE" | "INVALID_PAYLOAD"
  ) {
    super(message);
    this.name = "HookCliError";
  }
}

export interface HookCliArgs {
  readonly hook: string;
  readonly matcher: string | null;
  readonly daemonUrl: string;
  readonly denyPatterns: readonly string[];
  /** Skip the deny screen entirely. */
  readonly noDeny: boolean;
  readonly configPath: string | null;
}

/** Everything the CLI touches outside its own process. */
export interface HookCliIo {
  readStdin(): Promise<string>;
  writeStdout(text: string): void;
  writeStderr(text: string): void;
  /** POST a JSON body. Failures are the caller's to ignore. */
  postJson(url: string, body: string): Promise<void>;
  /** Current git branch, or `null` outside a repository. */
  gitBranch(): Promise<string | null>;
  /** Extra deny patterns from a daemon config file. */
  configDenyPatterns(path: string): Promise<readonly string[]>;
  readonly env: Readonly<Record<string, string | undefined>>;
  readonly logger: Logger;
}

export const HOOK_USAGE =
  "usage: padlink-hook <Hook> [matcher] [--daemon URL] [--deny PATTERN]... " +
  "[--no-deny] [--config PATH]";

// ─── Arguments ──────────────────────────────────────────────────────

/**
 * @throws {HookCliError} code=USAGE
 */
export function parseHookArgs(argv: readonly string[]): HookCliArgs {
  const positional: string[] = [];
  const deny: string[] = [];
  let daemonUrl = DEFAULT_DAEMON_URL;
  let noDeny = false;
  let configPath: string | null = null;

  const valueOf = (flag: string, idx: number): string => {
    const value = argv[idx + 1];
    if (value === undefined) {
      throw new HookCliError(`missing value for ${flag}`, "USAGE");
    }
    return value;
  };

  for (let idx = 0; idx < argv.length; idx += 1) {
    const arg = argv[idx] ?? "";
    if (arg === "--daemon") {
      daemonUrl = valueOf(arg, idx);
      idx += 1;
      continue;
    }
    if (arg === "--deny") {
      deny.push(valueOf(arg, idx));
      idx += 1;
      continue;
    }
    if (arg === "--config") {
      configPath = valueOf(arg, idx);
      idx += 1;
      continue;
    }
    if (arg === "--no-deny") {
      noDeny = true;
      continue;
    }
    if (arg.startsWith("--")) {
      throw new HookCliError(`unknown option ${arg}`, "USAGE");
    }
    positional.push(arg);
  }

  const [hook, matcher, ...extra] = positional;
  if (hook === undefined || hook === "") {
    throw new HookCliError("missing hook name", "USAGE");
  }
  if (extra.length > 0) {
    throw new HookCliError(`unexpected argument ${extra[0] ?? ""}`, "USAGE");
  }

  return {
    hook,
    matcher: matcher ?? null,
    daemonUrl: daemonUrl.replace(/\/+$/, ""),
    denyPatterns: deny,
    noDeny,
    configPath,
  };
}

// ─── Payload ────────────────────────────────────────────────────────

/**
 * @throws {HookCliError} code=INVALID_PAYLOAD
 */
export function parsePayload(text: string): unknown {
  if (text.trim() === "") return null;
  try {
    return JSON.parse(text);
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    throw new HookCliError(`invalid hook payload JSON: ${detail}`, "INVALID_PAYLOAD");
  }
}

function payloadString(payload: unknown, key: string): string | null {
  if (typeof payload !== "object" || payload === null) return null;
  const value: unknown = Reflect.get(payload, key);
  return typeof value === "string" && value !== "" ? value : null;
}

export function blockDecision(command: string, pattern: string): object {
  const reason = `Blocked destructive command (matched "${pattern}"): ${command}`;
  return {
    decision: "block",
    reason,
    hookSpecificOutput: {
      hookEventName: "PreToolUse",
      permissionDecision: "deny",
      permissionDecisionReason: reason,
    },
  };
}

export function promptContext(branch: string | null): object {
  return {
    hookSpecificOutput: {
      hookEventName: "UserPromptSubmit",
      additionalContext: `padlink context: git_branch=${branch ?? "(unknown)"}`,
    },
  };
}

// ─── Run ────────────────────────────────────────────────────────────

/**
 * Run one hook invocation.
 * @returns Process exit code.
 */
export async function runHookCli(
  argv: readonly string[],
  io: HookCliIo
): Promise<number> {
  let args: HookCliArgs;
  let payload: unknown;
  try {
    args = parseHookArgs(argv);
    payload = parsePayload(await io.readStdin());
  } catch (err) {
    if (err instanceof HookCliError) {
      io.writeStderr(`padlink-hook: ${err.message}\n`);
      if (err.code === "USAGE") io.writeStderr(`${HOOK_USAGE}\n`);
      return err.code === "USAGE" ? 2 : 1;
    }
    throw err;
  }

  const base = {
    matcher: args.matcher,
    session_id: payloadString(payload, "session_id"),
    session_tag: io.env[SESSION_TAG_ENV] ?? null,
  };

  if (args.hook === "PreToolUse" && !args.noDeny) {
    const command = extractToolCommand(payload);
    if (command !== null) {
      const patterns = [
        ...DEFAULT_DENY_PATTERNS,
        ...args.denyPatterns,
        ...(await configPatterns(args, io)),
      ];
      const pattern = findDeniedPattern(command, patterns);
      if (pattern !== null) {
        // The decision goes out first; the daemon may be down.
        io.writeStdout(`${JSON.stringify(blockDecision(command, pattern))}\n`);
        await notify(args, io, {
          ...base,
          hook: POLICY_BLOCK_HOOK,
          payload: {
            tool_name: payloadString(payload, "tool_name"),
            tool_input: { command },
            pattern,
          },
        });
        return 0;
      }
    }
  }

  await notify(args, io, { ...base, hook: args.hook, payload });

  if (args.hook === "UserPromptSubmit") {
    io.writeStdout(`${JSON.stringify(promptContext(await io.gitBranch()))}\n`);
  }
  return 0;
}

async function configPatterns(
  args: HookCliArgs,
  io: HookCliIo
): Promise<readonly string[]> {
  if (args.configPath === null) return [];
  try {
    return await io.configDenyPatterns(args.configPath);
  } catch (err) {
    // The built-in list still applies without the config.
    io.logger.warn({ err, path: args.configPath }, "config deny patterns unavailable");
    return [];
  }
}

async function notify(
  args: HookCliArgs,
  io: HookCliIo,
  event: HookNotification
): Promise<void> {
  try {
    await io.postJson(`${args.daemonUrl}/hook`, JSON.stringify(event));
  } catch (err) {
    io.logger.debug({ err }, "daemon notification dropped");
  }
}

// ─── Process I/O ────────────────────────────────────────────────────

async function readAll(stream: NodeJS.ReadableStream): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(typeof chunk === "string" ? Buffer.from(chunk) : chunk);
  }
  return Buffer.concat(chunks).toString("utf8");
}

function currentGitBranch(): Promise<string | null> {
  return new Promise((resolve) => {
    execFile(
      "git",
      ["rev-parse", "--abbrev-ref", "HEAD"],
      { timeout: 1000 },
      (err, stdout) => {
        const branch = err ? "" : stdout.trim();
        resolve(branch === "" ? null : branch);
      }
    );
  });
}

/** Real process I/O for the `padlink-hook` binary. */
export function defaultHookCliIo(): HookCliIo {
  return {
    readStdin: () => readAll(process.stdin),
    writeStdout: (text) => {
      process.stdout.write(text);
    },
    writeStderr: (text) => {
      process.stderr.write(text);
    },
    postJson: async (url, body) => {
      const res = await fetch(url, {
        method: "POST",
        headers: { "content-type": "application/json" },
        body,
        signal: AbortSignal.timeout(NOTIFY_TIMEOUT_MS),
      });
      await res.body?.cancel();
    },
    gitBranch: currentGitBranch,
    configDenyPatterns: async (path) => (await loadConfig(path)).policy.denyPatterns,
    env: process.env,
    logger: createLogger({
      name: "padlink-hook",
      level: process.env["PADLINK_LOG"] ?? "warn",
      fd: 2,
    }),
  };
}
