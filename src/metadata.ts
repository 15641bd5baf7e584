import { formatArgv, splitCommand } from "./argv";
import { CodecError, ScheduleError } from "./errors";
import { compileSchedule } from "./schedule";
import {
  DEFAULT_RESTART,
  RESTART_POLICIES,
  type ManagedUnit,
  type RestartPolicy,
  type TimerUnit,
} from "./types";

export const METADATA_PREFIX = "# unitab:";
export const METADATA_VERSION = 1;

type Unnamed<T> = T extends ManagedUnit ? Omit<T, "name"> : never;

/** A unit as recorded in metadata; the name comes from the file name. */
export type UnitFields = Unnamed<ManagedUnit>;

const TIMER_ONLY = new Set(["cron", "random_delay"]);
const SERVICE_ONLY = new Set(["restart", "env_file"]);

const RECOGNIZED = new Set([
  "version",
  "type",
  "cron",
  "restart",
  "command",
  "workdir",
  "description",
  "env_file",
  "memory_max",
  "cpu_quota",
  "io_weight",
  "timeout_stop",
  "exec_start_pre",
  "exec_stop_post",
  "log_level_max",
  "random_delay",
  "env",
]);

// ── Encode ─────────────────────────────────────────────────────────

export function encodeMetadata(unit: ManagedUnit | UnitFields): string[] {
  const pairs: [string, string | number | undefined][] = [
    ["version", METADATA_VERSION],
    ["type", unit.kind],
  ];

  if (unit.kind === "timer") pairs.push(["cron", unit.cron]);
  else pairs.push(["restart", unit.restart]);

  pairs.push(
    ["command", formatArgv(unit.command)],
    ["workdir", unit.workdir],
    ["description", unit.description],
    ["env_file", unit.kind === "service" ? unit.envFile : undefined],
    ["memory_max", unit.memoryMax],
    ["cpu_quota", unit.cpuQuota],
    ["io_weight", unit.ioWeight],
    ["timeout_stop", unit.stopTimeout],
    ["exec_start_pre", unit.execStartPre],
    ["exec_stop_post", unit.execStopPost],
    ["log_level_max", unit.logLevelMax],
    ["random_delay", unit.kind === "timer" ? unit.randomDelay : undefined],
    ...unit.env.map((e): [string, string] => ["env", e]),
    ...unit.extra,
  );

  return pairs
    .filter((p): p is [string, string | number] => p[1] !== undefined)
    .map(([k, v]) => `${METADATA_PREFIX}${k}=${v}`);
}

// ── Decode ─────────────────────────────────────────────────────────

function parseIoWeight(raw: string): number {
  if (!/^\d+$/.test(raw) || Number(raw) < 1 || Number(raw) > 10000) {
    throw new CodecError(`io_weight '${raw}' must be an integer 1-10000`);
  }
  return Number(raw);
}

function parseRestart(raw: string): RestartPolicy {
  const policy = RESTART_POLICIES.find((p) => p === raw);
  if (!policy) {
    throw new CodecError(`restart '${raw}' must be one of ${RESTART_POLICIES.join(", ")}`);
  }
  return policy;
}

function compileCron(cron: string): TimerUnit["schedule"] {
  try {
    const schedule = compileSchedule(cron);
    if (schedule.kind === "service") {
      throw new CodecError("a timer cannot carry the @service schedule");
    }
    return schedule;
  } catch (e) {
    if (e instanceof ScheduleError) throw new CodecError(`cron '${cron}': ${e.message}`);
    throw e;
  }
}

/**
 * Rebuild a unit from the metadata lines of an exec file. Lines without the
 * metadata prefix are ignored and unknown keys are returned in `extra`.
 */
export function decodeMetadata(lines: string[]): UnitFields {
  const values = new Map<string, string>();
  const env: string[] = [];
  const extra: [string, string][] = [];

  for (const line of lines) {
    if (!line.startsWith(METADATA_PREFIX)) continue;
    const body = line.slice(METADATA_PREFIX.length);
    const eq = body.indexOf("=");
    if (eq <= 0) throw new CodecError(`malformed line '${line}'`);
    const key = body.slice(0, eq);
    const value = body.slice(eq + 1);

    if (key === "env") env.push(value);
    else if (!RECOGNIZED.has(key)) extra.push([key, value]);
    else if (values.has(key)) throw new CodecError(`'${key}' given twice`);
    else values.set(key, value);
  }

  const version = values.get("version");
  if (version !== undefined && !/^\d+$/.test(version)) {
    throw new CodecError(`version '${version}' must be an integer`);
  }

  const type = values.get("type");
  if (type === undefined) throw new CodecError("missing 'type'");
  if (type !== "timer" && type !== "service") {
    throw new CodecError(`type '${type}' must be timer or service`);
  }

  const forbidden = type === "timer" ? SERVICE_ONLY : TIMER_ONLY;
  for (const key of values.keys()) {
    if (forbidden.has(key)) throw new CodecError(`'${key}' is not valid on a ${type}`);
  }

  const commandLine = values.get("command");
  if (commandLine === undefined) throw new CodecError("missing 'command'");
  const command = splitCommand(commandLine);
  if (command === undefined || command.length === 0) {
    throw new CodecError(`command '${commandLine}' cannot be split into arguments`);
  }

  const workdir = values.get("workdir");
  if (workdir === undefined) throw new CodecError("missing 'workdir'");

  const ioWeight = values.get("io_weight");
  const common = {
    command,
    workdir,
    description: values.get("description"),
    memoryMax: values.get("memory_max"),
    cpuQuota: values.get("cpu_quota"),
    ioWeight: ioWeight === undefined ? undefined : parseIoWeight(ioWeight),
    stopTimeout: values.get("timeout_stop"),
    execStartPre: values.get("exec_start_pre"),
    execStopPost: values.get("exec_stop_post"),
    logLevelMax: values.get("log_level_max"),
    env,
    extra,
  };

  if (type === "timer") {
    const cron = values.get("cron");
    if (cron === undefined) throw new CodecError("timer is missing 'cron'");
    return {
      kind: "timer",
      cron,
      schedule: compileCron(cron),
      randomDelay: values.get("random_delay"),
      ...common,
    };
  }

  const restart = values.get("restart");
  return {
    kind: "service",
    restart: restart === undefined ? DEFAULT_RESTART : parseRestart(restart),
    envFile: values.get("env_file"),
    ...common,
  };
}
