import { readFileSync } from "fs";
import { parse, stringify } from "smol-toml";
import { formatArgv } from "./argv";
import { ManifestError, errorMessage } from "./errors";
import { DEFAULT_RESTART, type DesiredManifest, type ManagedUnit } from "./types";
import { validateManifest } from "./validate";

export function parseManifest(text: string): DesiredManifest {
  let parsed: unknown;
  try {
    parsed = parse(text);
  } catch (e) {
    throw new ManifestError("", `failed to parse TOML: ${errorMessage(e)}`);
  }
  return validateManifest(parsed);
}

export function loadManifest(path: string): DesiredManifest {
  let text: string;
  try {
    text = readFileSync(path, "utf-8");
  } catch (e) {
    throw new ManifestError("", `cannot read ${path}: ${errorMessage(e)}`);
  }
  return parseManifest(text);
}

// ── Export ─────────────────────────────────────────────────────────

type Entry = Record<string, string | number | string[]>;

function entry(unit: ManagedUnit): Entry {
  const out: Entry = {};
  const set = (key: string, val: string | number | undefined) => {
    if (val !== undefined) out[key] = val;
  };

  if (unit.kind === "timer") set("schedule", unit.cron);
  set("command", formatArgv(unit.command));
  set("workdir", unit.workdir);
  set("description", unit.description);
  if (unit.kind === "service") {
    set("restart", unit.restart === DEFAULT_RESTART ? undefined : unit.restart);
    set("env_file", unit.envFile);
  }
  set("memory_max", unit.memoryMax);
  set("cpu_quota", unit.cpuQuota);
  set("io_weight", unit.ioWeight);
  set("timeout_stop", unit.stopTimeout);
  set("exec_start_pre", unit.execStartPre);
  set("exec_stop_post", unit.execStopPost);
  set("log_level_max", unit.logLevelMax);
  if (unit.kind === "timer") set("random_delay", unit.randomDelay);
  if (unit.env.length > 0) out.env = unit.env;
  return out;
}

/** Render units back into manifest TOML, sorted by name, empty tables left out. */
export function exportManifest(units: Iterable<ManagedUnit>): string {
  const timers: Record<string, Entry> = {};
  const services: Record<string, Entry> = {};

  for (const unit of [...units].sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))) {
    if (unit.kind === "timer") timers[unit.name] = entry(unit);
    else services[unit.name] = entry(unit);
  }

  const doc: Record<string, Record<string, Entry>> = {};
  if (Object.keys(timers).length > 0) doc.timers = timers;
  if (Object.keys(services).length > 0) doc.services = services;
  return stringify(doc);
}
