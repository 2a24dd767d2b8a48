/**
 * Logging surface used throughout solstice. A pino Logger satisfies it, and so
 * does a plain object of mock functions in tests.
 */
export type Logger = Pick<
  import("pino").Logger,
  "trace" | "debug" | "info" | "warn" | "error" | "fatal"
>;

/**
 * Source of the current instant. Event listeners and the module manager take
 * one so that schedules can be evaluated at arbitrary points in time.
 */
export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

/**
 * Lifecycle phases a module can declare action blocks for.
 */
export const BLOCK_NAMES = [
  "on_setup",
  "on_startup",
  "on_event",
  "on_exit",
  "on_modified",
] as const;

export type BlockName = (typeof BLOCK_NAMES)[number];

/**
 * Action kinds in the order an action block executes them.
 */
export const ACTION_TYPES = [
  "import_context",
  "compile",
  "copy",
  "symlink",
  "stow",
  "run",
] as const;

export type ActionType = (typeof ACTION_TYPES)[number];

/**
 * Either a single action kind or every kind in execution order.
 */
export type ActionSelector = ActionType | "all";

/**
 * Options accepted by every `execute()` in the action hierarchy.
 */
export interface ExecuteOptions {
  dryRun?: boolean;
  /** Seconds a Run action waits unless it declares its own timeout. */
  defaultTimeout?: number;
}

/**
 * Content path mapped to the target paths produced from it.
 */
export type FileMapping = Map<string, string>;

/**
 * A shell command after placeholder substitution and its captured output.
 */
export type ShellResult = readonly [command: string, stdout: string];

/**
 * Plain data as produced by the YAML parser.
 */
export type ConfigValue =
  | string
  | number
  | boolean
  | null
  | ConfigValue[]
  | { [key: string]: ConfigValue };

export type ConfigObject = { [key: string]: ConfigValue };

export function isConfigObject(value: unknown): value is ConfigObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Replaces placeholders such as `{event}` in option strings.
 */
export type Replacer = (value: string) => string;
