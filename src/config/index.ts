/**
 * @module config
 * @description YAML configuration loader.
 *
 * The file is parsed with `yaml`, shape-checked with zod and then
 * structurally validated. Any failure is fatal at startup: the daemon
 * never serves with a config whose references do not resolve.
 */

import { readFile } from "node:fs/promises";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import type {
  DaemonConfig,
  GateConfig,
  ListenAddress,
  PageConfig,
  PromptConfig,
  SlotRef,
} from "../types/config.js";

/** Slots per keypad page (3×3). */
export const KEYPAD_SLOT_COUNT = 9;

export const DEFAULT_LISTEN = "127.0.0.1:29381";

export const DEFAULT_CONFIG_PATH = "padlink.yaml";

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly code:
      | "READ_FAILED"
      | "PARSE_FAILED"
      | "INVALID_SHAPE"
      | "NO_PAGES"
      | "SLOT_COUNT"
      | "DANGLING_REFERENCE"
      | "DUPLICATE_ID"
      | "INITIAL_PAGE_OUT_OF_RANGE"
      | "INVALID_LISTEN"
  ) {
    super(message);
    this.name = "ConfigError";
  }
}

// ─── Schema ─────────────────────────────────────────────────────────

const SlotSchema = z
  .object({
    prompt_id: z.string().min(1).optional(),
    gate: z.string().min(1).optional(),
  })
  .strict()
  .nullable();

const PageSchema = z.object({
  name: z.string().min(1),
  slots: z.array(SlotSchema),
});

const PromptSchema = z.object({
  label: z.string(),
  sublabel: z.string().nullable().optional(),
  native_command: z.string().nullable().optional(),
  fallback_text: z.string().nullable().optional(),
  arm_style: z.enum(["queue", "prefill"]).default("queue"),
});

const GateSchema = z.object({
  label: z.string(),
  sublabel: z.string().nullable().optional(),
  action: z.string().min(1),
});

export const ConfigFileSchema = z.object({
  daemon: z
    .object({ listen: z.string().default(DEFAULT_LISTEN) })
    .default({}),
  keypad: z.object({
    initial_page: z.number().int().nonnegative().default(0),
    pages: z.array(PageSchema),
  }),
  prompts: z.record(z.string(), PromptSchema).default({}),
  gates: z.record(z.string(), GateSchema).default({}),
  policy: z
    .object({
      native_primary: z.boolean().default(true),
      deny_patterns: z.array(z.string().min(1)).default([]),
    })
    .default({}),
});

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

// ─── Loading ────────────────────────────────────────────────────────

/**
 * Read and validate a config file.
 * @throws {ConfigError}
 */
export async function loadConfig(path: string): Promise<DaemonConfig> {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Cannot read config ${path}: ${detail}`, "READ_FAILED");
  }
  return parseConfigText(text, path);
}

/**
 * Parse and validate YAML config text.
 * @throws {ConfigError}
 */
export function parseConfigText(text: string, source = "<config>"): DaemonConfig {
  let raw: unknown;
  try {
    raw = parseYaml(text);
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`${source}: invalid YAML: ${detail}`, "PARSE_FAILED");
  }

  const result = ConfigFileSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`${source}: ${issues}`, "INVALID_SHAPE");
  }
  return buildConfig(result.data, source);
}

// ─── Validation ─────────────────────────────────────────────────────

function buildConfig(file: ConfigFile, source: string): DaemonConfig {
  const prompts = new Map<string, PromptConfig>();
  for (const [id, prompt] of Object.entries(file.prompts)) {
    prompts.set(id, {
      label: prompt.label,
      sublabel: prompt.sublabel ?? null,
      nativeCommand: prompt.native_command ?? null,
      fallbackText: prompt.fallback_text ?? null,
      armStyle: prompt.arm_style,
    });
  }

  const gates = new Map<string, GateConfig>();
  for (const [id, gate] of Object.entries(file.gates)) {
    if (prompts.has(id)) {
      throw new ConfigError(
        `${source}: id '${id}' is defined both as a prompt and as a gate`,
        "DUPLICATE_ID"
      );
    }
    gates.set(id, {
      label: gate.label,
      sublabel: gate.sublabel ?? null,
      action: gate.action,
    });
  }

  if (file.keypad.pages.length === 0) {
    throw new ConfigError(`${source}: keypad.pages must have at least 1 page`, "NO_PAGES");
  }

  const pages: PageConfig[] = file.keypad.pages.map((page, pageIndex) => {
    if (page.slots.length !== KEYPAD_SLOT_COUNT) {
      throw new ConfigError(
        `${source}: keypad.pages[${pageIndex}] '${page.name}' must have exactly ` +
          `${KEYPAD_SLOT_COUNT} slots (3x3 keypad). Got ${page.slots.length}.`,
        "SLOT_COUNT"
      );
    }
    const slots = page.slots.map((slot, slotIndex): SlotRef => {
      const where = `keypad.pages[${pageIndex}].slots[${slotIndex}]`;
      if (slot === null || (slot.prompt_id === undefined && slot.gate === undefined)) {
        return { kind: "empty" };
      }
      if (slot.prompt_id !== undefined && slot.gate !== undefined) {
        throw new ConfigError(
          `${source}: ${where} names both a prompt and a gate`,
          "INVALID_SHAPE"
        );
      }
      if (slot.prompt_id !== undefined) {
        if (!prompts.has(slot.prompt_id)) {
          throw new ConfigError(
            `${source}: ${where} references unknown prompt '${slot.prompt_id}'`,
            "DANGLING_REFERENCE"
          );
        }
        return { kind: "prompt", id: slot.prompt_id };
      }
      const gateId = slot.gate ?? "";
      if (!gates.has(gateId)) {
        throw new ConfigError(
          `${source}: ${where} references unknown gate '${gateId}'`,
          "DANGLING_REFERENCE"
        );
      }
      return { kind: "gate", id: gateId };
    });
    return { name: page.name, slots };
  });

  if (file.keypad.initial_page >= pages.length) {
    throw new ConfigError(
      `${source}: keypad.initial_page ${file.keypad.initial_page} is out of range ` +
        `(${pages.length} page(s))`,
      "INITIAL_PAGE_OUT_OF_RANGE"
    );
  }

  return {
    listen: parseListen(file.daemon.listen),
    pages,
    initialPage: file.keypad.initial_page,
    prompts,
    gates,
    policy: {
      nativePrimary: file.policy.native_primary,
      denyPatterns: file.policy.deny_patterns,
    },
  };
}

/**
 * Parse a `host:port` listen address. IPv6 hosts may be bracketed.
 * @throws {ConfigError} code=INVALID_LISTEN
 */
export function parseListen(value: string): ListenAddress {
  const colon = value.lastIndexOf(":");
  const rawHost = colon > 0 ? value.slice(0, colon) : "";
  const rawPort = colon > 0 ? value.slice(colon + 1) : "";
  const host = rawHost.replace(/^\[(.*)\]$/, "$1");
  const port = /^\d+$/.test(rawPort) ? Number(rawPort) : NaN;

  if (host === "" || !Number.isInteger(port) || port < 1 || port > 65535) {
    throw new ConfigError(
      `Invalid listen address '${value}': expected host:port with port 1-65535`,
      "INVALID_LISTEN"
    );
  }
  return { host, port };
}

// ─── Prompt Resolution ──────────────────────────────────────────────

/**
 * Text a prompt dispatches. With the native path primary the native
 * command wins and the fallback text is the last resort; otherwise only
 * the fallback text is used. `null` when nothing resolves.
 */
export function effectiveCommand(
  prompt: PromptConfig,
  nativePrimary: boolean
): string | null {
  if (nativePrimary) {
    return prompt.nativeCommand ?? prompt.fallbackText;
  }
  return prompt.fallbackText;
}
