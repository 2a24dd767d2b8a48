import chalk from "chalk";

const SECOND = 1000;
const MINUTE = 60 * SECOND;
const HOUR = 60 * MINUTE;
const DAY = 24 * HOUR;

/**
 * Compact human form of a duration in milliseconds, e.g. `2d 3h`, `4m 10s`.
 * Anything beyond a year reads `never`.
 */
export function formatDuration(milliseconds: number): string {
  if (milliseconds >= 365 * DAY) return "never";
  if (milliseconds < SECOND) return "now";

  const units: Array<[string, number]> = [
    ["d", DAY],
    ["h", HOUR],
    ["m", MINUTE],
    ["s", SECOND],
  ];
  const parts: string[] = [];
  let remaining = milliseconds;
  for (const [suffix, size] of units) {
    const count = Math.floor(remaining / size);
    remaining -= count * size;
    if (count > 0) parts.push(`${count}${suffix}`);
    if (parts.length === 2) break;
  }
  return parts.join(" ");
}

export interface ModuleStatus {
  name: string;
  event: string;
  /** Milliseconds until the event may change. */
  nextEvent: number;
  keepRunning: boolean;
}

/**
 * One line per module: name, event badge and time until the next event.
 * Names are padded to a common width.
 */
export function formatModuleStatuses(statuses: readonly ModuleStatus[]): string[] {
  const width = Math.max(0, ...statuses.map((status) => status.name.length));
  return statuses.map((status) => {
    const badge = chalk.bgBlue.white(` ${status.event.toUpperCase()} `);
    const next = status.keepRunning
      ? chalk.dim(`next event in ${formatDuration(status.nextEvent)}`)
      : chalk.dim("idle");
    return `${status.name.padEnd(width)}  ${badge}  ${next}`;
  });
}
