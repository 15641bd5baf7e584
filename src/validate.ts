import { isAbsolute } from "path";
import { formatArgv, splitCommand } from "./argv";
import { ManifestError, ScheduleError } from "./errors";
import { compileSchedule } from "./schedule";
import {
  DEFAULT_IO_WEIGHT,
  DEFAULT_RESTART,
  RESTART_POLICIES,
  type DesiredManifest,
  type ManagedUnit,
  type RestartPolicy,
  type ServiceUnit,
  type TimerSchedule,
  type TimerUnit,
  type UnitCommon,
} from "./types";
import { NAME_PATTERN } from "./unit";

type Table = Record<string, unknown>;

const COMMON_KEYS = [
  "command",
  "workdir",
  "description",
  "memory_max",
  "cpu_quota",
  "io_weight",
  "timeout_stop",
  "exec_start_pre",
  "exec_stop_post",
  "log_level_max",
  "env",
];
const TIMER_KEYS = new Set([...COMMON_KEYS, "schedule", "random_delay"]);
const SERVICE_KEYS = new Set([...COMMON_KEYS, "restart", "env_file"]);

function isTable(val: unknown): val is Table {
  return typeof val === "object" && val !== null && !Array.isArray(val);
}

function checkText(val: string, key: string, path: string): string {
  if (/[\r\n]/.test(val)) {
    throw new ManifestError(path, `'${key}' must be a single line`);
  }
  return val;
}

function requireString(obj: Table, key: string, path: string): string {
  const val = obj[key];
  if (typeof val !== "string" || val.length === 0) {
    throw new ManifestError(path, `'${key}' must be a non-empty string`);
  }
  return checkText(val, key, path);
}

function optionalString(obj: Table, key: string, path: string): string | undefined {
  if (obj[key] === undefined) return undefined;
  return requireString(obj, key, path);
}

function intInRange(
  obj: Table,
  key: string,
  min: number,
  max: number,
  path: string,
): number | undefined {
  const val = obj[key];
  if (val === undefined) return undefined;
  if (typeof val !== "number" || !Number.isInteger(val) || val < min || val > max) {
    throw new ManifestError(path, `'${key}' must be an integer ${min}-${max}`);
  }
  return val;
}

function validateCommand(obj: Table, path: string): string[] {
  const raw = obj.command;
  if (typeof raw === "string") {
    const argv = splitCommand(checkText(raw, "command", path));
    if (argv === undefined) throw new ManifestError(path, "'command' has an unterminated quote");
    if (argv.length === 0) throw new ManifestError(path, "'command' must not be empty");
    return argv;
  }
  if (Array.isArray(raw) && raw.length > 0) {
    return raw.map((arg, i) => {
      if (typeof arg !== "string" || (i === 0 && arg.length === 0)) {
        throw new ManifestError(path, "'command' array must hold strings and start with a program");
      }
      return checkText(arg, "command", path);
    });
  }
  throw new ManifestError(path, "'command' must be a string or a non-empty array of strings");
}

function validateEnv(obj: Table, path: string): string[] {
  const raw = obj.env;
  if (raw === undefined) return [];
  if (!Array.isArray(raw)) throw new ManifestError(path, "'env' must be an array of KEY=VALUE strings");
  return raw.map((entry) => {
    if (typeof entry !== "string" || !/^[A-Za-z_][A-Za-z0-9_]*=/.test(entry)) {
      throw new ManifestError(path, `'env' entry ${JSON.stringify(entry)} must look like KEY=VALUE`);
    }
    return checkText(entry, "env", path);
  });
}

function checkKeys(obj: Table, allowed: Set<string>, other: Set<string>, kind: string, path: string) {
  for (const key of Object.keys(obj)) {
    if (allowed.has(key)) continue;
    if (other.has(key)) {
      throw new ManifestError(path, `'${key}' is not valid on a ${kind}`);
    }
    throw new ManifestError(path, `unknown key '${key}'`);
  }
}

function validateCommon(name: string, obj: Table, path: string): UnitCommon {
  if (!NAME_PATTERN.test(name)) {
    throw new ManifestError(path, "name may only use letters, digits, '.', '_' and '-'");
  }

  const command = validateCommand(obj, path);
  const workdir = requireString(obj, "workdir", path);
  if (!isAbsolute(workdir)) {
    throw new ManifestError(path, `'workdir' must be an absolute path, got '${workdir}'`);
  }

  // a description equal to the formatted command is stored as unset
  const description = optionalString(obj, "description", path);
  const ioWeight = intInRange(obj, "io_weight", 1, 10000, path);

  return {
    name,
    command,
    workdir,
    description: description === formatArgv(command) ? undefined : description,
    memoryMax: optionalString(obj, "memory_max", path),
    cpuQuota: optionalString(obj, "cpu_quota", path),
    ioWeight: ioWeight === DEFAULT_IO_WEIGHT ? undefined : ioWeight,
    stopTimeout: optionalString(obj, "timeout_stop", path),
    execStartPre: optionalString(obj, "exec_start_pre", path),
    execStopPost: optionalString(obj, "exec_stop_post", path),
    logLevelMax: optionalString(obj, "log_level_max", path),
    env: validateEnv(obj, path),
    extra: [],
  };
}

function compileTimerSchedule(cron: string, name: string, path: string): TimerSchedule {
  try {
    const schedule = compileSchedule(cron);
    if (schedule.kind !== "service") return schedule;
  } catch (e) {
    if (e instanceof ScheduleError) throw new ManifestError(path, e.message);
    throw e;
  }
  throw new ManifestError(path, `'@service' belongs under [services.${name}]`);
}

export function validateTimer(name: string, raw: unknown): TimerUnit {
  const path = `timers.${name}`;
  if (!isTable(raw)) throw new ManifestError(path, "must be a table");
  checkKeys(raw, TIMER_KEYS, SERVICE_KEYS, "timer", path);

  const cron = requireString(raw, "schedule", path);
  const schedule = compileTimerSchedule(cron, name, path);

  return {
    kind: "timer",
    ...validateCommon(name, raw, path),
    cron: cron.trim(),
    schedule,
    randomDelay: optionalString(raw, "random_delay", path),
  };
}

export function validateService(name: string, raw: unknown): ServiceUnit {
  const path = `services.${name}`;
  if (!isTable(raw)) throw new ManifestError(path, "must be a table");
  checkKeys(raw, SERVICE_KEYS, TIMER_KEYS, "service", path);

  let restart: RestartPolicy = DEFAULT_RESTART;
  if (raw.restart !== undefined) {
    const policy = RESTART_POLICIES.find((p) => p === raw.restart);
    if (!policy) {
      throw new ManifestError(path, `'restart' must be one of ${RESTART_POLICIES.join(", ")}`);
    }
    restart = policy;
  }

  return {
    kind: "service",
    ...validateCommon(name, raw, path),
    restart,
    envFile: optionalString(raw, "env_file", path),
  };
}

/** Check a parsed manifest and build the desired unit set from it. */
export function validateManifest(parsed: unknown): DesiredManifest {
  if (!isTable(parsed)) throw new ManifestError("", "manifest must be a table");

  for (const key of Object.keys(parsed)) {
    if (key !== "timers" && key !== "services") {
      throw new ManifestError(key, "only [timers] and [services] tables are allowed");
    }
  }

  const manifest: DesiredManifest = new Map<string, ManagedUnit>();
  const sections = [
    ["timers", validateTimer],
    ["services", validateService],
  ] as const;

  for (const [section, validate] of sections) {
    const table = parsed[section];
    if (table === undefined) continue;
    if (!isTable(table)) throw new ManifestError(section, "must be a table");

    for (const [name, raw] of Object.entries(table)) {
      if (manifest.has(name)) {
        throw new ManifestError(`${section}.${name}`, `'${name}' is declared more than once`);
      }
      manifest.set(name, validate(name, raw));
    }
  }

  return manifest;
}
