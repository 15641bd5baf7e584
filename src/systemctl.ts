import { spawnSync } from "child_process";
import { SystemctlError, UnitabError } from "./errors";

/**
 * What the reconciler and CLI need from the service manager. Each call is
 * synchronous and throws on failure; retrying is left to the caller.
 */
export interface ServiceControl {
  reload(): void;
  enable(unit: string): void;
  disable(unit: string): void;
  restart(unit: string): void;
  status(unit: string, property: string): string;
  removeRuntimeState(unit: string): void;
}

// ── systemctl --user ──────────────────────────────────────────────

export class Systemctl implements ServiceControl {
  constructor(private readonly bin = "systemctl") {}

  private run(args: string[]): string {
    const result = spawnSync(this.bin, ["--user", ...args], {
      encoding: "utf-8",
      stdio: ["ignore", "pipe", "pipe"],
    });
    if (result.error) throw new SystemctlError(args, result.error.message);
    if (result.status !== 0) throw new SystemctlError(args, result.stderr.trim());
    return result.stdout.trim();
  }

  reload(): void {
    this.run(["daemon-reload"]);
  }

  enable(unit: string): void {
    this.run(["enable", "--now", unit]);
  }

  disable(unit: string): void {
    this.run(["disable", "--now", unit]);
  }

  restart(unit: string): void {
    this.run(["restart", unit]);
  }

  status(unit: string, property: string): string {
    return this.run(["show", "-p", property, "--value", unit]);
  }

  removeRuntimeState(unit: string): void {
    this.run(["reset-failed", unit]);
  }
}

// ── loginctl ──────────────────────────────────────────────────────

/** Keep the user's manager running after logout so timers fire unattended. */
export function enableLinger(user: string): void {
  const result = spawnSync("loginctl", ["enable-linger", user], {
    encoding: "utf-8",
    stdio: ["ignore", "ignore", "pipe"],
  });
  if (result.error || result.status !== 0) {
    const reason = result.error?.message ?? result.stderr.trim();
    throw new UnitabError(`loginctl enable-linger ${user} failed: ${reason}`, "LINGER_FAILED");
  }
}
