import { formatArgv, quoteArg } from "./argv";
import { encodeMetadata } from "./metadata";
import { formatCalendar } from "./schedule";
import type { ManagedUnit, ServiceUnit, TimerUnit, UnitFiles } from "./types";

export const UNIT_PREFIX = "unitab-";
export const NAME_PATTERN = /^[A-Za-z0-9][A-Za-z0-9_.-]*$/;

export interface GenerateOptions {
  /** Shared env file every unit loads when present (`EnvironmentFile=-...`). */
  globalEnvFile?: string;
}

// ── Names ──────────────────────────────────────────────────────────

export function serviceFilename(name: string): string {
  return `${UNIT_PREFIX}${name}.service`;
}

export function timerFilename(name: string): string {
  return `${UNIT_PREFIX}${name}.timer`;
}

/** The unit systemctl enables: the timer for timers, the service otherwise. */
export function controlUnit(unit: Pick<ManagedUnit, "kind" | "name">): string {
  return unit.kind === "timer" ? timerFilename(unit.name) : serviceFilename(unit.name);
}

const RUNNERS = ["python", "python3", "uv", "node", "bash", "sh", "ruby", "perl"];

/**
 * Pick a unit name from a command: the script for interpreter invocations,
 * the program otherwise (`uv run ./report.py` -> `report`).
 */
export function deriveName(argv: string[]): string {
  const program = argv[0]?.split("/").pop() ?? "";
  let candidate = argv[0] ?? "";
  if (argv.length >= 2 && RUNNERS.includes(program)) {
    candidate = program === "uv" && argv[1] === "run" && argv.length >= 3 ? argv[2] : argv[1];
  }

  const name = (candidate.split("/").pop() ?? "")
    .replace(/\.(py|sh|rb|js|ts)$/, "")
    .replace(/^[.-]+/, "")
    .replace(/[^A-Za-z0-9_.-]/g, "-");
  return name === "" ? "task" : name;
}

// ── Text helpers ───────────────────────────────────────────────────

/** systemd expands %-specifiers in most settings; keep the text literal. */
function literal(s: string): string {
  return s.replace(/%/g, "%%");
}

function optional(key: string, value: string | number | undefined): string[] {
  return value === undefined ? [] : [`${key}=${value}`];
}

function description(unit: ManagedUnit): string {
  return literal(`[unitab] ${unit.name}: ${unit.description ?? formatArgv(unit.command)}`);
}

function execLines(unit: ManagedUnit): string[] {
  return [
    `ExecStart=${literal(formatArgv(unit.command))}`,
    `WorkingDirectory=${literal(unit.workdir)}`,
  ];
}

function environmentLines(unit: ManagedUnit, opts: GenerateOptions): string[] {
  return [
    ...optional("EnvironmentFile", opts.globalEnvFile ? `-${literal(opts.globalEnvFile)}` : undefined),
    ...optional("EnvironmentFile", unit.kind === "service" && unit.envFile !== undefined ? literal(unit.envFile) : undefined),
    ...unit.env.map((e) => `Environment=${literal(quoteArg(e))}`),
  ];
}

function limitLines(unit: ManagedUnit): string[] {
  return [
    ...optional("MemoryMax", unit.memoryMax),
    ...optional("CPUQuota", unit.cpuQuota),
    ...optional("IOWeight", unit.ioWeight),
    ...optional("TimeoutStopSec", unit.stopTimeout),
    ...optional("ExecStartPre", unit.execStartPre === undefined ? undefined : literal(unit.execStartPre)),
    ...optional("ExecStopPost", unit.execStopPost === undefined ? undefined : literal(unit.execStopPost)),
    ...optional("LogLevelMax", unit.logLevelMax),
  ];
}

function render(sections: string[][], unit: ManagedUnit): string {
  const body = sections.map((s) => s.join("\n")).join("\n\n");
  return `${body}\n\n${encodeMetadata(unit).join("\n")}\n`;
}

// ── Unit generation ────────────────────────────────────────────────

function timerService(unit: TimerUnit, opts: GenerateOptions): string {
  return render(
    [
      ["[Unit]", `Description=${description(unit)}`],
      [
        "[Service]",
        "Type=oneshot",
        ...execLines(unit),
        ...environmentLines(unit, opts),
        ...limitLines(unit),
      ],
    ],
    unit,
  );
}

function daemonService(unit: ServiceUnit, opts: GenerateOptions): string {
  return render(
    [
      ["[Unit]", `Description=${description(unit)}`, "After=network-online.target"],
      [
        "[Service]",
        "Type=simple",
        ...execLines(unit),
        `Restart=${unit.restart}`,
        "RestartSec=5",
        ...environmentLines(unit, opts),
        ...limitLines(unit),
      ],
      ["[Install]", "WantedBy=default.target"],
    ],
    unit,
  );
}

function timer(unit: TimerUnit): string {
  const trigger =
    unit.schedule.kind === "calendar"
      ? [`OnCalendar=${formatCalendar(unit.schedule)}`, "Persistent=true"]
      : ["OnBootSec=1min"];

  return [
    ["[Unit]", `Description=${literal(`[unitab] ${unit.name} timer`)}`],
    ["[Timer]", ...trigger, ...optional("RandomizedDelaySec", unit.randomDelay)],
    ["[Install]", "WantedBy=timers.target"],
  ]
    .map((s) => s.join("\n"))
    .join("\n\n")
    .concat("\n");
}

/**
 * Render the files for one unit. Output depends only on the unit and the
 * options, so equal inputs always produce byte-identical text.
 */
export function generateUnit(unit: ManagedUnit, opts: GenerateOptions = {}): UnitFiles {
  if (unit.kind === "service") {
    return { execText: daemonService(unit, opts) };
  }
  return { execText: timerService(unit, opts), triggerText: timer(unit) };
}
