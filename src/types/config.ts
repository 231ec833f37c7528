/**
 * @module types/config
 * @description The validated, immutable configuration model.
 *
 * Produced once at startup by the config loader and consumed read-only
 * by the reducer, the render projector and the broadcast hub. Every
 * reference in here is known to resolve.
 */

/** How a client should present an armed prompt. Presentation only. */
export type ArmStyle = "queue" | "prefill";

export interface ListenAddress {
  readonly host: string;
  readonly port: number;
}

/**
 * A named prompt that can be armed from the keypad and dispatched with Enter.
 */
export interface PromptConfig {
  readonly label: string;
  readonly sublabel: string | null;
  /** Assistant-native command, e.g. a slash command. */
  readonly nativeCommand: string | null;
  /** Plain text used when the native path is not primary or not defined. */
  readonly fallbackText: string | null;
  readonly armStyle: ArmStyle;
}

/**
 * A keypad slot bound to an immediate navigation action.
 */
export interface GateConfig {
  readonly label: string;
  readonly sublabel: string | null;
  /** URI handed to the editor's open command. */
  readonly action: string;
}

/** What one of the nine keypad slots points at. */
export type SlotRef =
  | { readonly kind: "prompt"; readonly id: string }
  | { readonly kind: "gate"; readonly id: string }
  | { readonly kind: "empty" };

export interface PageConfig {
  readonly name: string;
  /** Always exactly nine entries once validated. */
  readonly slots: readonly SlotRef[];
}

export interface PolicyConfig {
  /** True when the assistant's native command path is primary. */
  readonly nativePrimary: boolean;
  /** Extra deny patterns for the hook CLI, on top of the built-in list. */
  readonly denyPatterns: readonly string[];
}

export interface DaemonConfig {
  readonly listen: ListenAddress;
  readonly pages: readonly PageConfig[];
  readonly initialPage: number;
  readonly prompts: ReadonlyMap<string, PromptConfig>;
  readonly gates: ReadonlyMap<string, GateConfig>;
  readonly policy: PolicyConfig;
}
