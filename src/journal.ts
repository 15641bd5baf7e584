import { spawnSync } from "child_process";
import { UnitabError } from "./errors";

export const PRIORITIES = [
  "emerg",
  "alert",
  "crit",
  "err",
  "warning",
  "notice",
  "info",
  "debug",
] as const;

export interface TailOptions {
  follow: boolean;
  lines: number;
  /** Lowest priority shown, by name or 0-7. */
  priority?: string;
}

export function journalArgs(unit: string, opts: TailOptions): string[] {
  const args = ["--user-unit", unit, "-n", String(opts.lines), "--no-pager"];
  if (opts.follow) args.push("-f");
  if (opts.priority !== undefined) {
    const p = opts.priority;
    if (!PRIORITIES.some((name) => name === p) && !/^[0-7]$/.test(p)) {
      throw new UnitabError(
        `priority '${p}' must be 0-7 or one of ${PRIORITIES.join(", ")}`,
        "PRIORITY_INVALID",
      );
    }
    args.push("-p", p);
  }
  return args;
}

/** Stream a unit's journal to the terminal; returns journalctl's exit code. */
export function tailLogs(unit: string, opts: TailOptions): number {
  const result = spawnSync("journalctl", journalArgs(unit, opts), { stdio: "inherit" });
  if (result.error) {
    throw new UnitabError(`failed to run journalctl: ${result.error.message}`, "JOURNAL_FAILED");
  }
  return result.status ?? 1;
}
