import { mkdtempSync, readdirSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { parseManifest } from "../../src/manifest";
import { UnitStore } from "../../src/store";
import type { ManagedUnit } from "../../src/types";
import { generateUnit } from "../../src/unit";

const MANIFEST = `
[timers.report]
schedule = "@daily/6"
command = "uv run ./report.py"
workdir = "/srv/app"

[services.web]
command = ["node", "dist/index.js"]
workdir = "/srv/web"
`;

function unit(name: string): ManagedUnit {
  const found = parseManifest(MANIFEST).get(name);
  if (!found) throw new Error(`no unit ${name}`);
  return found;
}

describe("UnitStore", () => {
  let dir: string;
  let store: UnitStore;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "unitab-store-"));
    store = new UnitStore(dir);
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("scans a missing directory as empty", () => {
    const state = new UnitStore(join(dir, "absent")).scan();
    expect(state.units.size).toBe(0);
    expect(state.corrupt).toEqual([]);
  });

  it("reads back written units with their files", () => {
    const report = unit("report");
    const web = unit("web");
    store.write("report", generateUnit(report));
    store.write("web", generateUnit(web));

    const state = store.scan();

    expect([...state.units.keys()]).toEqual(["report", "web"]);
    expect(state.units.get("report")).toEqual({ unit: report, files: generateUnit(report) });
    expect(state.units.get("web")?.unit).toEqual(web);
  });

  it("leaves only the final files behind", () => {
    store.write("report", generateUnit(unit("report")));
    expect(readdirSync(dir).sort()).toEqual(["unitab-report.service", "unitab-report.timer"]);
  });

  it("drops the timer file when a unit becomes a service", () => {
    store.write("job", generateUnit({ ...unit("report"), name: "job" }));
    store.write("job", generateUnit({ ...unit("web"), name: "job" }));
    expect(readdirSync(dir)).toEqual(["unitab-job.service"]);
  });

  it("ignores files without the managed prefix", () => {
    writeFileSync(join(dir, "other.service"), "[Unit]\n");
    writeFileSync(join(dir, "unitab-notes.txt"), "hello\n");
    expect(store.scan().units.size).toBe(0);
  });

  it("reports undecodable units as corrupt", () => {
    writeFileSync(join(dir, "unitab-bad.service"), "[Unit]\nDescription=hand written\n");
    writeFileSync(join(dir, "unitab-orphan.timer"), "[Timer]\n");
    store.write("web", generateUnit(unit("web")));

    const state = store.scan();

    expect([...state.units.keys()]).toEqual(["web"]);
    expect(state.corrupt).toEqual([
      { name: "bad", reason: "metadata: missing 'type'" },
      { name: "orphan", reason: "timer has no service file" },
    ]);
  });

  it("removes both files and returns their paths", () => {
    store.write("report", generateUnit(unit("report")));

    expect(store.has("report")).toBe(true);
    expect(store.remove("report")).toEqual([store.timerPath("report"), store.servicePath("report")]);
    expect(store.has("report")).toBe(false);
    expect(store.remove("report")).toEqual([]);
  });

  it("snapshots a unit's raw files", () => {
    const files = generateUnit(unit("report"));
    store.write("report", files);

    expect(store.snapshot("report")).toEqual(files);
    expect(store.snapshot("web")).toBeUndefined();
  });

  it("creates the directory when asked to write", () => {
    const nested = new UnitStore(join(dir, "systemd", "user"));
    nested.ensureWritable();
    nested.write("web", generateUnit(unit("web")));
    expect(nested.scan().units.has("web")).toBe(true);
  });
});
