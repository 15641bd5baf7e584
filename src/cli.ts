#!/usr/bin/env node
import { spawnSync } from "child_process";
import { existsSync, mkdirSync, writeFileSync } from "fs";
import { userInfo } from "os";
import { resolve } from "path";
import { parseArgs, positiveInt, usageError, type ParsedArgs } from "./args";
import { formatArgv, splitCommand } from "./argv";
import {
  ApplyError,
  SystemctlError,
  UnitNotFoundError,
  UnitabError,
  isUnitabError,
} from "./errors";
import { GLOBAL_ENV_TEMPLATE, activeGlobalEnvFile, resolvePaths, type Paths } from "./config";
import { tailLogs } from "./journal";
import { exportManifest, loadManifest } from "./manifest";
import { Reconciler, STATUS_SYMBOL } from "./reconcile";
import { SERVICE_MARKER, compileSchedule, formatCalendar } from "./schedule";
import { UnitStore } from "./store";
import { Systemctl, enableLinger, type ServiceControl } from "./systemctl";
import type {
  ApplyFailure,
  ApplySummary,
  CorruptUnit,
  DiffStatus,
  InstalledUnit,
  ManagedUnit,
  Plan,
  UnitKind,
} from "./types";
import {
  controlUnit,
  deriveName,
  generateUnit,
  serviceFilename,
  timerFilename,
  type GenerateOptions,
} from "./unit";
import { validateService, validateTimer } from "./validate";

// ── ANSI ───────────────────────────────────────────────────────────

const plain = Boolean(process.env.NO_COLOR);
const esc = (code: string) => (plain ? "" : code);

const R = esc("\x1b[0m");
const c = {
  bold: esc("\x1b[1m"), dim: esc("\x1b[2m"),
  red: esc("\x1b[31m"), green: esc("\x1b[32m"), yellow: esc("\x1b[33m"), cyan: esc("\x1b[36m"),
  bRed: esc("\x1b[1;31m"), bYellow: esc("\x1b[1;33m"),
};

const STATUS_COLOR: Record<DiffStatus, string> = {
  added: c.green,
  changed: c.yellow,
  unchanged: c.dim,
  removed: c.red,
};

// ── Context ────────────────────────────────────────────────────────

interface Context {
  paths: Paths;
  store: UnitStore;
  control: ServiceControl;
  generate: GenerateOptions;
}

function context(): Context {
  const paths = resolvePaths();
  return {
    paths,
    store: new UnitStore(paths.unitDir),
    control: new Systemctl(),
    generate: { globalEnvFile: activeGlobalEnvFile(paths) },
  };
}

function warn(msg: string) {
  console.error(`${c.bYellow}warn${R} ${msg}`);
}

function warnCorrupt(corrupt: CorruptUnit[]) {
  for (const unit of corrupt) {
    warn(`skipping ${c.bold}${unit.name}${R}: ${unit.reason}`);
  }
}

function requireArg(args: ParsedArgs, cmd: string): string {
  const [name, ...rest] = args.positional;
  if (!name || rest.length > 0) throw usageError(`usage: unitab ${cmd} <name>`);
  return name;
}

/** Look up an installed unit; a corrupt one is reported rather than guessed at. */
function requireUnit(ctx: Context, name: string): InstalledUnit {
  if (!ctx.store.has(name)) throw new UnitNotFoundError(name);
  const result = ctx.store.read(name);
  if ("reason" in result) {
    throw new UnitabError(`'${name}' cannot be read: ${result.reason}`, "UNIT_CORRUPT");
  }
  return result;
}

/** One systemctl property, or undefined when the manager cannot say. */
function probe(ctx: Context, unit: string, property: string): string | undefined {
  try {
    return ctx.control.status(unit, property) || undefined;
  } catch (e) {
    if (e instanceof SystemctlError) return undefined;
    throw e;
  }
}

// ── Formatting helpers ─────────────────────────────────────────────

function scheduleText(unit: ManagedUnit): string {
  return unit.kind === "timer" ? unit.cron : SERVICE_MARKER;
}

function triggerText(unit: ManagedUnit): string {
  if (unit.kind === "service") return `restart=${unit.restart}`;
  return unit.schedule.kind === "calendar"
    ? `OnCalendar=${formatCalendar(unit.schedule)}`
    : "OnBootSec=1min";
}

function truncate(s: string, max: number): string {
  return s.length > max ? `${s.slice(0, max - 3)}...` : s;
}

function runState(ctx: Context, unit: ManagedUnit): string {
  if (unit.kind === "timer") {
    const next = probe(ctx, timerFilename(unit.name), "NextElapseUSecRealtime");
    if (next) return `next ${next}`;
    return probe(ctx, timerFilename(unit.name), "ActiveState") ?? "unknown";
  }
  return probe(ctx, serviceFilename(unit.name), "ActiveState") ?? "unknown";
}

function printFailures(failures: ApplyFailure[]) {
  for (const f of failures) {
    console.error(`  ${c.red}x${R}  ${c.bold}${f.name}${R}  ${c.dim}${f.status}:${R} ${f.error}`);
  }
}

// ── Commands ───────────────────────────────────────────────────────

function cmdInit(ctx: Context) {
  const user = process.env.USER || userInfo().username;
  enableLinger(user);
  console.log(`  ${c.green}+${R}  linger enabled for ${c.bold}${user}${R}`);

  mkdirSync(ctx.paths.unitDir, { recursive: true });
  mkdirSync(ctx.paths.configDir, { recursive: true });
  if (!existsSync(ctx.paths.globalEnvFile)) {
    writeFileSync(ctx.paths.globalEnvFile, GLOBAL_ENV_TEMPLATE);
    console.log(`  ${c.green}+${R}  ${ctx.paths.globalEnvFile}`);
  }
  ctx.control.reload();
  console.log(`${c.green}ready${R} ${c.dim}units go to ${ctx.paths.unitDir}${R}`);
}

function cmdAdd(ctx: Context, args: ParsedArgs) {
  const [schedule, ...rest] = args.positional;
  if (!schedule || rest.length === 0) {
    throw usageError("usage: unitab add <schedule> <command>");
  }

  const command = rest.length === 1 ? splitCommand(rest[0]) : rest;
  if (!command || command.length === 0) {
    throw usageError(`cannot split command '${rest[0]}'`);
  }

  const isService = compileSchedule(schedule).kind === "service";
  const opt = (key: string) => args.values.get(key);
  if (isService && opt("--random-delay") !== undefined) {
    throw usageError("--random-delay only applies to timers");
  }
  if (!isService && (opt("--restart") !== undefined || opt("--env-file") !== undefined)) {
    throw usageError("--restart and --env-file only apply to @service units");
  }

  const name = opt("--name") ?? deriveName(command);
  if (ctx.store.has(name)) {
    throw new UnitabError(`'${name}' already exists; remove it first or pick --name`, "UNIT_EXISTS");
  }

  const raw = {
    command,
    workdir: resolve(opt("--workdir") ?? process.cwd()),
    description: opt("--description"),
  };
  const unit = isService
    ? validateService(name, { ...raw, restart: opt("--restart"), env_file: opt("--env-file") })
    : validateTimer(name, { ...raw, schedule, random_delay: opt("--random-delay") });

  ctx.store.ensureWritable();
  ctx.store.write(name, generateUnit(unit, ctx.generate));
  ctx.control.reload();
  ctx.control.enable(controlUnit(unit));

  console.log(
    `  ${c.green}+${R}  ${c.bold}${name}${R} ${c.dim}(${unit.kind}) ${triggerText(unit)}${R}`,
  );
}

function cmdList(ctx: Context) {
  const state = ctx.store.scan();
  warnCorrupt(state.corrupt);

  if (state.units.size === 0) {
    console.log(`${c.dim}no managed units in ${ctx.paths.unitDir}${R}`);
    return;
  }

  const rows = [...state.units.values()].map(({ unit }) => [
    unit.name,
    unit.kind,
    scheduleText(unit),
    truncate(formatArgv(unit.command), 40),
    runState(ctx, unit),
  ]);
  const header = ["NAME", "TYPE", "SCHEDULE", "COMMAND", "STATUS"];
  const widths = header.map((h, i) => Math.max(h.length, ...rows.map((r) => r[i].length)));
  const line = (cells: string[]) =>
    cells.map((cell, i) => (i === cells.length - 1 ? cell : cell.padEnd(widths[i]))).join("  ");

  console.log(`${c.bold}${line(header)}${R}`);
  for (const row of rows) console.log(line(row));
}

function applyPlan(reconciler: Reconciler, plan: Plan, dryRun: boolean): ApplySummary {
  try {
    return reconciler.apply(plan, { dryRun });
  } catch (e) {
    if (e instanceof ApplyError && e.summary) {
      printFailures(e.summary.failures);
      for (const w of e.summary.warnings) warn(w);
    }
    throw e;
  }
}

function cmdApply(ctx: Context, args: ParsedArgs) {
  if (args.positional.length > 1) throw usageError("usage: unitab apply [file] [--prune] [--dry-run]");
  const file = args.positional[0] ? resolve(args.positional[0]) : ctx.paths.manifest;
  const prune = args.flags.has("--prune");
  const dryRun = args.flags.has("--dry-run");

  const desired = loadManifest(file);
  const reconciler = new Reconciler(ctx.store, ctx.control, ctx.generate);
  const plan = reconciler.plan(desired, ctx.store.scan(), { prune });

  warnCorrupt(plan.corrupt);
  for (const entry of plan.entries) {
    const unit = entry.status === "removed" ? entry.before : entry.after;
    const color = STATUS_COLOR[entry.status];
    console.log(
      `  ${color}${STATUS_SYMBOL[entry.status]}${R} ${c.bold}${entry.name}${R} ${c.dim}(${unit.kind})${R}`,
    );
  }
  if (plan.unmanaged.length > 0) {
    const names = plan.unmanaged.map((u) => u.name).join(", ");
    warn(`${plan.unmanaged.length} installed unit(s) not in ${file}, left alone: ${names} (use --prune to remove)`);
  }

  const summary = applyPlan(reconciler, plan, dryRun);

  const counts = (verbs: [string, string, string, string]) =>
    [
      `${summary.added.length} ${verbs[0]}`,
      `${summary.changed.length} ${verbs[1]}`,
      `${summary.unchanged.length} ${verbs[2]}`,
      `${summary.removed.length} ${verbs[3]}`,
    ].join(", ");

  console.log("");
  if (summary.dryRun) {
    console.log(`${c.cyan}Dry run:${R} ${counts(["to add", "to change", "unchanged", "to remove"])}`);
    return;
  }
  console.log(`${c.green}Applied:${R} ${counts(["added", "changed", "unchanged", "removed"])}`);
  for (const w of summary.warnings) warn(w);
  if (summary.failures.length > 0) {
    printFailures(summary.failures);
    process.exitCode = 1;
  }
}

function cmdExport(ctx: Context, args: ParsedArgs) {
  const state = ctx.store.scan();
  warnCorrupt(state.corrupt);

  const text = exportManifest([...state.units.values()].map((u) => u.unit));
  const out = args.values.get("-o");
  if (out === undefined) {
    process.stdout.write(text);
    return;
  }
  writeFileSync(resolve(out), text);
  console.error(`${c.green}exported${R} ${state.units.size} unit(s) to ${out}`);
}

function cmdRemove(ctx: Context, name: string) {
  if (!ctx.store.has(name)) throw new UnitNotFoundError(name);
  const kind: UnitKind = existsSync(ctx.store.timerPath(name)) ? "timer" : "service";

  const warnings: string[] = [];
  const removed = new Reconciler(ctx.store, ctx.control, ctx.generate).uninstall({ kind, name }, warnings);
  for (const w of warnings) warn(w);

  console.log(`  ${c.green}-${R}  ${c.bold}${name}${R}  ${c.dim}removed ${removed.length} file(s)${R}`);
}

function cmdEnable(ctx: Context, name: string) {
  const { unit } = requireUnit(ctx, name);
  ctx.control.enable(controlUnit(unit));
  console.log(`  ${c.green}+${R}  ${c.bold}${name}${R}  ${c.dim}enabled${R}`);
}

function cmdDisable(ctx: Context, name: string) {
  const { unit } = requireUnit(ctx, name);
  ctx.control.disable(controlUnit(unit));
  console.log(`  ${c.green}-${R}  ${c.bold}${name}${R}  ${c.dim}disabled${R}`);
}

function cmdRestart(ctx: Context, name: string) {
  const { unit } = requireUnit(ctx, name);
  if (unit.kind !== "service") {
    throw new UnitabError(`'${name}' is a timer; only services can be restarted`, "NOT_A_SERVICE");
  }
  ctx.control.restart(serviceFilename(name));
  console.log(`  ${c.green}~${R}  ${c.bold}${name}${R}  ${c.dim}restarted${R}`);
}

function cmdStatus(ctx: Context, name: string) {
  const { unit } = requireUnit(ctx, name);
  const service = serviceFilename(name);
  const row = (label: string, value: string | undefined) => {
    if (value) console.log(`  ${c.dim}${label.padEnd(10)}${R} ${value}`);
  };

  console.log(`${c.bold}${name}${R}  ${c.cyan}${unit.kind}${R}`);
  row("schedule", scheduleText(unit));
  row("trigger", triggerText(unit));
  row("command", formatArgv(unit.command));
  row("workdir", unit.workdir);
  row("state", probe(ctx, controlUnit(unit), "ActiveState") ?? "unknown");
  if (unit.kind === "timer") {
    row("next run", probe(ctx, timerFilename(name), "NextElapseUSecRealtime"));
    row("last run", probe(ctx, timerFilename(name), "LastTriggerUSec"));
  } else {
    row("since", probe(ctx, service, "ActiveEnterTimestamp"));
  }
  row("result", probe(ctx, service, "Result"));
}

function cmdLogs(ctx: Context, args: ParsedArgs) {
  const name = requireArg(args, "logs");
  if (!ctx.store.has(name)) throw new UnitNotFoundError(name);

  const lines = args.values.get("-n");
  process.exitCode = tailLogs(serviceFilename(name), {
    follow: args.flags.has("-f"),
    lines: lines === undefined ? 50 : positiveInt(lines, "-n"),
    priority: args.values.get("-p"),
  });
}

function cmdEdit(ctx: Context, name: string) {
  const { unit } = requireUnit(ctx, name);
  const files = [ctx.store.servicePath(name)];
  if (unit.kind === "timer") files.push(ctx.store.timerPath(name));

  const editor = process.env.EDITOR || "vi";
  const result = spawnSync(editor, files, { stdio: "inherit" });
  if (result.error) {
    throw new UnitabError(`failed to run ${editor}: ${result.error.message}`, "EDITOR_FAILED");
  }
  ctx.control.reload();

  const after = ctx.store.read(name);
  if ("reason" in after) warn(`${c.bold}${name}${R} no longer decodes: ${after.reason}`);
  else console.log(`  ${c.green}~${R}  ${c.bold}${name}${R}  ${c.dim}reloaded${R}`);
}

// ── Main ───────────────────────────────────────────────────────────

const B = c.bold, D = c.dim, C = c.cyan;
const USAGE = `
  ${B}unitab${R} ${D}- cron-style schedules as systemd user units${R}

  ${B}unitab init${R}                     ${D}enable linger, create directories${R}
  ${B}unitab add${R} ${C}<schedule> <cmd>${R}     ${D}install one timer or @service${R}
  ${B}unitab list${R}                     ${D}show managed units${R}
  ${B}unitab apply${R} ${C}[file]${R}             ${D}reconcile units with a manifest${R}
  ${B}unitab export${R}                   ${D}print installed units as a manifest${R}

  ${B}unitab remove${R} ${C}<name>${R}            ${D}disable and delete a unit${R}
  ${B}unitab enable${R} ${C}<name>${R}            ${D}start a unit${R}
  ${B}unitab disable${R} ${C}<name>${R}           ${D}stop a unit${R}
  ${B}unitab restart${R} ${C}<name>${R}           ${D}restart a service${R}
  ${B}unitab status${R} ${C}<name>${R}            ${D}show runtime state${R}
  ${B}unitab logs${R} ${C}<name>${R}              ${D}show the journal${R}
  ${B}unitab edit${R} ${C}<name>${R}              ${D}open unit files in $EDITOR${R}

  ${D}options${R}
  ${B}add${R}     ${C}--name --workdir --description --restart --env-file --random-delay${R}
  ${B}apply${R}   ${C}--prune${R} ${D}remove undeclared units${R}, ${C}--dry-run${R} ${D}print the plan only${R}
  ${B}export${R}  ${C}-o <file>${R}
  ${B}logs${R}    ${C}-f${R} ${D}follow${R}, ${C}-n <lines>${R} ${D}[default: 50]${R}, ${C}-p <priority>${R}
`;

function main(argv: string[]) {
  const [cmd, ...rest] = argv;
  const ctx = context();

  switch (cmd) {
    case "init":    parseArgs(rest); cmdInit(ctx); break;
    case "add":
      cmdAdd(ctx, parseArgs(rest, {
        values: ["--name", "--workdir", "--description", "--restart", "--env-file", "--random-delay"],
      }));
      break;
    case "list":    parseArgs(rest); cmdList(ctx); break;
    case "apply":   cmdApply(ctx, parseArgs(rest, { flags: ["--prune", "--dry-run"] })); break;
    case "export":  cmdExport(ctx, parseArgs(rest, { values: ["-o"] })); break;
    case "remove":  cmdRemove(ctx, requireArg(parseArgs(rest), "remove")); break;
    case "enable":  cmdEnable(ctx, requireArg(parseArgs(rest), "enable")); break;
    case "disable": cmdDisable(ctx, requireArg(parseArgs(rest), "disable")); break;
    case "restart": cmdRestart(ctx, requireArg(parseArgs(rest), "restart")); break;
    case "status":  cmdStatus(ctx, requireArg(parseArgs(rest), "status")); break;
    case "logs":    cmdLogs(ctx, parseArgs(rest, { flags: ["-f"], values: ["-n", "-p"] })); break;
    case "edit":    cmdEdit(ctx, requireArg(parseArgs(rest), "edit")); break;
    default:        console.log(USAGE); break;
  }
}

try {
  main(process.argv.slice(2));
} catch (e) {
  if (!isUnitabError(e)) throw e;
  console.error(`${c.bRed}error${R} ${e.message}`);
  process.exit(1);
}
