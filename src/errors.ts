import type { ApplySummary } from "./types";

export class UnitabError extends Error {
  constructor(
    message: string,
    public readonly code: string,
  ) {
    super(message);
    this.name = this.constructor.name;
  }
}

// ── Schedule ────────────────────────────────────────────────────────

export type ScheduleErrorKind = "syntax" | "out-of-range";

export class ScheduleError extends UnitabError {
  constructor(
    public readonly kind: ScheduleErrorKind,
    public readonly field: string,
    detail: string,
  ) {
    super(
      `schedule ${field}: ${detail}`,
      kind === "syntax" ? "SCHEDULE_SYNTAX" : "SCHEDULE_RANGE",
    );
  }
}

// ── Metadata + scan ─────────────────────────────────────────────────

export class CodecError extends UnitabError {
  constructor(msg: string) {
    super(`metadata: ${msg}`, "METADATA_INVALID");
  }
}

export class ScanError extends UnitabError {
  constructor(dir: string, cause: unknown) {
    super(`cannot read unit directory ${dir}: ${errorMessage(cause)}`, "SCAN_FAILED");
  }
}

// ── Manifest ────────────────────────────────────────────────────────

export class ManifestError extends UnitabError {
  constructor(
    public readonly path: string,
    msg: string,
  ) {
    super(path ? `manifest ${path}: ${msg}` : `manifest: ${msg}`, "MANIFEST_INVALID");
  }
}

// ── Apply + host ────────────────────────────────────────────────────

export class ApplyError extends UnitabError {
  constructor(
    msg: string,
    public readonly summary?: ApplySummary,
  ) {
    super(msg, "APPLY_FAILED");
  }
}

export class SystemctlError extends UnitabError {
  constructor(args: string[], stderr: string) {
    super(
      `systemctl --user ${args.join(" ")} failed${stderr ? `: ${stderr}` : ""}`,
      "SYSTEMCTL_FAILED",
    );
  }
}

export class UnitNotFoundError extends UnitabError {
  constructor(name: string) {
    super(`'${name}' not found`, "UNIT_NOT_FOUND");
  }
}

export function isUnitabError(error: unknown): error is UnitabError {
  return error instanceof UnitabError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
