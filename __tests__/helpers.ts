import type {
  DaemonConfig,
  GateConfig,
  PageConfig,
  PromptConfig,
  SlotRef,
} from "../src/types/config.js";

const EMPTY: SlotRef = { kind: "empty" };

function page(name: string, refs: SlotRef[]): PageConfig {
  const slots = [...refs];
  while (slots.length < 9) slots.push(EMPTY);
  return { name, slots };
}

export const PREP_PR: PromptConfig = {
  label: "PREP PR",
  sublabel: "receipts",
  nativeCommand: "/runbook:prep-pr",
  fallbackText: "Prep a PR.",
  armStyle: "queue",
};

export const REVIEW: PromptConfig = {
  label: "REVIEW",
  sublabel: null,
  nativeCommand: null,
  fallbackText: "Review the diff.",
  armStyle: "prefill",
};

export const SHIP: PromptConfig = {
  label: "SHIP",
  sublabel: null,
  nativeCommand: "/ship",
  fallbackText: null,
  armStyle: "queue",
};

export const PR_GATE: GateConfig = {
  label: "PR",
  sublabel: "jump",
  action: "https://example.test/pr/1",
};

/**
 * Three pages:
 * - core: prep_pr, pr (gate), review, then empty slots
 * - ops: ship, then empty slots
 * - misc: all empty
 */
export function makeConfig(overrides: Partial<DaemonConfig> = {}): DaemonConfig {
  return {
    listen: { host: "127.0.0.1", port: 0 },
    pages: [
      page("core", [
        { kind: "prompt", id: "prep_pr" },
        { kind: "gate", id: "pr" },
        { kind: "prompt", id: "review" },
      ]),
      page("ops", [{ kind: "prompt", id: "ship" }]),
      page("misc", []),
    ],
    initialPage: 0,
    prompts: new Map([
      ["prep_pr", PREP_PR],
      ["review", REVIEW],
      ["ship", SHIP],
    ]),
    gates: new Map([["pr", PR_GATE]]),
    policy: { nativePrimary: true, denyPatterns: [] },
    ...overrides,
  };
}
