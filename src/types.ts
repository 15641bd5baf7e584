// ── Schedule ────────────────────────────────────────────────────────

export type FieldPart =
  | { kind: "value"; value: number }
  | { kind: "range"; start: number; end: number };

export type FieldConstraint =
  | { kind: "any" }
  | { kind: "list"; parts: FieldPart[] }
  | { kind: "step"; start: number; stride: number };

export type CalendarField = "minute" | "hour" | "dayOfMonth" | "month" | "dayOfWeek";

export interface CalendarSchedule {
  kind: "calendar";
  minute: FieldConstraint;
  hour: FieldConstraint;
  dayOfMonth: FieldConstraint;
  month: FieldConstraint;
  dayOfWeek: FieldConstraint;
}

export interface RebootSchedule {
  kind: "reboot";
}

export interface ServiceSchedule {
  kind: "service";
}

export type TimerSchedule = CalendarSchedule | RebootSchedule;
export type Schedule = TimerSchedule | ServiceSchedule;

// ── Managed units ───────────────────────────────────────────────────

export type RestartPolicy = "always" | "on-failure" | "no";

export const RESTART_POLICIES: readonly RestartPolicy[] = ["always", "on-failure", "no"];
export const DEFAULT_RESTART: RestartPolicy = "always";
export const DEFAULT_IO_WEIGHT = 100;

export interface UnitCommon {
  name: string;
  command: string[];
  workdir: string;
  description?: string;
  memoryMax?: string;
  cpuQuota?: string;
  ioWeight?: number;
  stopTimeout?: string;
  execStartPre?: string;
  execStopPost?: string;
  logLevelMax?: string;
  env: string[];
  /** Metadata keys this version does not understand, kept in order. */
  extra: [string, string][];
}

export interface TimerUnit extends UnitCommon {
  kind: "timer";
  cron: string;
  schedule: TimerSchedule;
  randomDelay?: string;
}

export interface ServiceUnit extends UnitCommon {
  kind: "service";
  restart: RestartPolicy;
  envFile?: string;
}

export type ManagedUnit = TimerUnit | ServiceUnit;
export type UnitKind = ManagedUnit["kind"];

export type DesiredManifest = Map<string, ManagedUnit>;

// ── Generated + installed files ─────────────────────────────────────

export interface UnitFiles {
  execText: string;
  triggerText?: string;
}

export interface InstalledUnit {
  unit: ManagedUnit;
  files: UnitFiles;
}

export interface CorruptUnit {
  name: string;
  reason: string;
}

export interface InstalledState {
  units: Map<string, InstalledUnit>;
  corrupt: CorruptUnit[];
}

// ── Reconciliation ──────────────────────────────────────────────────

export type DiffStatus = "added" | "changed" | "unchanged" | "removed";

export type DiffEntry =
  | { name: string; status: "added"; before?: undefined; after: ManagedUnit }
  | { name: string; status: "changed" | "unchanged"; before: ManagedUnit; after: ManagedUnit }
  | { name: string; status: "removed"; before: ManagedUnit; after?: undefined };

export interface Plan {
  entries: DiffEntry[];
  /** Installed units absent from the manifest, left alone because prune was off. */
  unmanaged: ManagedUnit[];
  corrupt: CorruptUnit[];
  prune: boolean;
}

export interface ApplyFailure {
  name: string;
  status: DiffStatus;
  error: string;
}

export interface ApplySummary {
  dryRun: boolean;
  added: string[];
  changed: string[];
  unchanged: string[];
  removed: string[];
  failures: ApplyFailure[];
  /** Steps that failed without failing their entry. */
  warnings: string[];
}
