import { ApplyError, errorMessage } from "./errors";
import type { UnitStore } from "./store";
import type { ServiceControl } from "./systemctl";
import type {
  ApplySummary,
  DesiredManifest,
  DiffEntry,
  DiffStatus,
  InstalledState,
  ManagedUnit,
  Plan,
  UnitFiles,
} from "./types";
import { controlUnit, generateUnit, serviceFilename, type GenerateOptions } from "./unit";

export const STATUS_SYMBOL: Record<DiffStatus, string> = {
  added: "+",
  changed: "~",
  unchanged: "=",
  removed: "-",
};

export interface PlanOptions {
  prune?: boolean;
}

export interface ApplyOptions {
  dryRun?: boolean;
}

function sameFiles(a: UnitFiles, b: UnitFiles): boolean {
  return a.execText === b.execText && a.triggerText === b.triggerText;
}

/** Carry metadata keys this version does not know across a rewrite. */
function inherit(desired: ManagedUnit, installed: ManagedUnit): ManagedUnit {
  return desired.extra.length > 0 ? desired : { ...desired, extra: installed.extra };
}

export class Reconciler {
  constructor(
    private readonly store: UnitStore,
    private readonly control: ServiceControl,
    private readonly generate: GenerateOptions = {},
  ) {}

  // ── Plan ─────────────────────────────────────────────────────────

  /**
   * Diff the manifest against what is on disk. Entries come back sorted by
   * name; a unit counts as unchanged only when its generated files match the
   * installed files byte for byte.
   */
  plan(desired: DesiredManifest, installed: InstalledState, opts: PlanOptions = {}): Plan {
    const prune = opts.prune ?? false;
    const names = [...new Set([...desired.keys(), ...installed.units.keys()])].sort();
    const entries: DiffEntry[] = [];
    const unmanaged: ManagedUnit[] = [];

    for (const name of names) {
      const want = desired.get(name);
      const have = installed.units.get(name);

      if (want && have) {
        const after = inherit(want, have.unit);
        const files = generateUnit(after, this.generate);
        const status = sameFiles(files, have.files) ? "unchanged" : "changed";
        entries.push({ name, status, before: have.unit, after });
      } else if (want) {
        entries.push({ name, status: "added", after: want });
      } else if (have && prune) {
        entries.push({ name, status: "removed", before: have.unit });
      } else if (have) {
        unmanaged.push(have.unit);
      }
    }

    return { entries, unmanaged, corrupt: installed.corrupt, prune };
  }

  // ── Apply ────────────────────────────────────────────────────────

  /**
   * Carry out a plan entry by entry. A failing entry is recorded and the rest
   * still run; the call throws only when nothing could be attempted or every
   * attempted entry failed.
   */
  apply(plan: Plan, opts: ApplyOptions = {}): ApplySummary {
    const dryRun = opts.dryRun ?? false;
    const summary: ApplySummary = {
      dryRun,
      added: [],
      changed: [],
      unchanged: [],
      removed: [],
      failures: [],
      warnings: [],
    };

    if (dryRun) {
      for (const entry of plan.entries) summary[entry.status].push(entry.name);
      return summary;
    }

    try {
      this.store.ensureWritable();
    } catch (e) {
      throw new ApplyError(`unit directory ${this.store.dir} is not writable: ${errorMessage(e)}`);
    }

    let attempted = 0;
    for (const entry of plan.entries) {
      if (entry.status === "unchanged") {
        summary.unchanged.push(entry.name);
        continue;
      }

      attempted++;
      try {
        if (entry.status === "removed") this.uninstall(entry.before, summary.warnings);
        else this.install(entry.after, summary.warnings, entry.before);
        summary[entry.status].push(entry.name);
      } catch (e) {
        summary.failures.push({ name: entry.name, status: entry.status, error: errorMessage(e) });
      }
    }

    if (attempted > 0 && summary.failures.length === attempted) {
      throw new ApplyError(`all ${attempted} change(s) failed`, summary);
    }
    return summary;
  }

  /**
   * Stop and delete a unit: disable, delete its files, reload, then clear the
   * manager's failed state. Failures of disable and reset-failed are warnings;
   * the files are deleted either way. Returns the deleted paths.
   */
  uninstall(unit: Pick<ManagedUnit, "kind" | "name">, warnings: string[] = []): string[] {
    const bestEffort = (step: () => void) => {
      try {
        step();
      } catch (e) {
        warnings.push(`${unit.name}: ${errorMessage(e)}`);
      }
    };

    bestEffort(() => this.control.disable(controlUnit(unit)));
    const removed = this.store.remove(unit.name);
    this.control.reload();
    bestEffort(() => this.control.removeRuntimeState(serviceFilename(unit.name)));
    return removed;
  }

  private install(after: ManagedUnit, warnings: string[], before?: ManagedUnit): void {
    const previous = this.store.snapshot(after.name);
    const replaced = before && before.kind !== after.kind ? controlUnit(before) : undefined;
    if (replaced) this.control.disable(replaced);
    this.store.write(after.name, generateUnit(after, this.generate));

    try {
      this.control.reload();
      const unit = controlUnit(after);
      this.control.enable(unit);
      if (before?.kind === "service" && after.kind === "service") {
        this.control.restart(unit);
      }
    } catch (e) {
      this.rollback(after.name, warnings, previous, replaced);
      throw e;
    }
  }

  /**
   * Put back the files an install replaced, or delete the ones it created.
   * `replaced` is the control unit the install disabled, enabled again here.
   */
  private rollback(name: string, warnings: string[], previous?: UnitFiles, replaced?: string): void {
    try {
      if (previous) this.store.write(name, previous);
      else this.store.remove(name);
      this.control.reload();
      if (previous && replaced) this.control.enable(replaced);
    } catch (e) {
      warnings.push(`${name}: rollback failed: ${errorMessage(e)}`);
    }
  }
}
