import {
  accessSync,
  constants,
  existsSync,
  mkdirSync,
  readFileSync,
  readdirSync,
  renameSync,
  rmSync,
  writeFileSync,
} from "fs";
import { basename, resolve } from "path";
import { CodecError, ScanError, errorMessage } from "./errors";
import { decodeMetadata } from "./metadata";
import type { CorruptUnit, InstalledState, InstalledUnit, UnitFiles } from "./types";
import { UNIT_PREFIX, serviceFilename, timerFilename } from "./unit";

const UNIT_FILE = new RegExp(`^${UNIT_PREFIX}(.+)\\.(service|timer)$`);

/**
 * The unit directory seen as a store of managed units. Every read goes to
 * disk; nothing is cached between calls.
 */
export class UnitStore {
  constructor(readonly dir: string) {}

  servicePath(name: string): string {
    return resolve(this.dir, serviceFilename(name));
  }

  timerPath(name: string): string {
    return resolve(this.dir, timerFilename(name));
  }

  has(name: string): boolean {
    return existsSync(this.servicePath(name)) || existsSync(this.timerPath(name));
  }

  // ── Read ─────────────────────────────────────────────────────────

  scan(): InstalledState {
    const state: InstalledState = { units: new Map(), corrupt: [] };
    if (!existsSync(this.dir)) return state;

    let entries: string[];
    try {
      entries = readdirSync(this.dir);
    } catch (e) {
      throw new ScanError(this.dir, e);
    }

    const found = new Map<string, { service: boolean; timer: boolean }>();
    for (const file of entries) {
      const m = UNIT_FILE.exec(file);
      if (!m) continue;
      const seen = found.get(m[1]) ?? { service: false, timer: false };
      if (m[2] === "service") seen.service = true;
      else seen.timer = true;
      found.set(m[1], seen);
    }

    for (const name of [...found.keys()].sort()) {
      const seen = found.get(name);
      if (!seen?.service) {
        state.corrupt.push({ name, reason: "timer has no service file" });
        continue;
      }
      const result = this.read(name, seen.timer);
      if ("reason" in result) state.corrupt.push(result);
      else state.units.set(name, result);
    }

    return state;
  }

  /** Load one unit; a unit that cannot be decoded comes back as corrupt. */
  read(name: string, withTimer = existsSync(this.timerPath(name))): InstalledUnit | CorruptUnit {
    let files: UnitFiles;
    try {
      files = {
        execText: readFileSync(this.servicePath(name), "utf-8"),
        triggerText: withTimer ? readFileSync(this.timerPath(name), "utf-8") : undefined,
      };
    } catch (e) {
      return { name, reason: errorMessage(e) };
    }

    try {
      const fields = decodeMetadata(files.execText.split("\n"));
      return { unit: { ...fields, name }, files };
    } catch (e) {
      if (e instanceof CodecError) return { name, reason: e.message };
      throw e;
    }
  }

  /** The raw files of a unit, or undefined when it has no service file. */
  snapshot(name: string): UnitFiles | undefined {
    const service = this.servicePath(name);
    if (!existsSync(service)) return undefined;
    const timer = this.timerPath(name);
    return {
      execText: readFileSync(service, "utf-8"),
      triggerText: existsSync(timer) ? readFileSync(timer, "utf-8") : undefined,
    };
  }

  // ── Write ────────────────────────────────────────────────────────

  ensureWritable(): void {
    mkdirSync(this.dir, { recursive: true });
    accessSync(this.dir, constants.W_OK);
  }

  /**
   * Write a unit's files. Each file goes to a dot-prefixed temporary name and is
   * renamed into place; the service file, which holds the metadata, goes last.
   */
  write(name: string, files: UnitFiles): void {
    if (files.triggerText !== undefined) {
      this.writeAtomic(this.timerPath(name), files.triggerText);
    }
    this.writeAtomic(this.servicePath(name), files.execText);
    if (files.triggerText === undefined) {
      rmSync(this.timerPath(name), { force: true });
    }
  }

  /** Delete a unit's files and return the paths that existed. */
  remove(name: string): string[] {
    const removed: string[] = [];
    for (const path of [this.timerPath(name), this.servicePath(name)]) {
      if (!existsSync(path)) continue;
      rmSync(path);
      removed.push(path);
    }
    return removed;
  }

  private writeAtomic(path: string, text: string): void {
    const tmp = resolve(this.dir, `.${basename(path)}.tmp-${process.pid}`);
    try {
      writeFileSync(tmp, text);
      renameSync(tmp, path);
    } catch (e) {
      rmSync(tmp, { force: true });
      throw e;
    }
  }
}
