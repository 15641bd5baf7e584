import { describe, expect, it } from "vitest";
import { compileSchedule } from "../../src/schedule";
import type { ServiceUnit, TimerSchedule, TimerUnit } from "../../src/types";
import { controlUnit, deriveName, generateUnit } from "../../src/unit";

function timerSchedule(expr: string): TimerSchedule {
  const schedule = compileSchedule(expr);
  if (schedule.kind === "service") throw new Error("expected a timer schedule");
  return schedule;
}

const report: TimerUnit = {
  kind: "timer",
  name: "report",
  cron: "0 9 * * 1-5",
  schedule: timerSchedule("0 9 * * 1-5"),
  command: ["uv", "run", "./report.py"],
  workdir: "/srv/app",
  memoryMax: "512M",
  env: ["PYTHONUNBUFFERED=1"],
  extra: [],
};

const web: ServiceUnit = {
  kind: "service",
  name: "web",
  restart: "on-failure",
  envFile: "/srv/web/.env",
  command: ["node", "dist/index.js"],
  workdir: "/srv/web",
  env: [],
  extra: [],
};

describe("generateUnit", () => {
  it("renders a timer's service and timer files", () => {
    const files = generateUnit(report);

    expect(files.execText).toBe(
      [
        "[Unit]",
        "Description=[unitab] report: uv run ./report.py",
        "",
        "[Service]",
        "Type=oneshot",
        "ExecStart=uv run ./report.py",
        "WorkingDirectory=/srv/app",
        "Environment=PYTHONUNBUFFERED=1",
        "MemoryMax=512M",
        "",
        "# unitab:version=1",
        "# unitab:type=timer",
        "# unitab:cron=0 9 * * 1-5",
        "# unitab:command=uv run ./report.py",
        "# unitab:workdir=/srv/app",
        "# unitab:memory_max=512M",
        "# unitab:env=PYTHONUNBUFFERED=1",
        "",
      ].join("\n"),
    );
    expect(files.triggerText).toBe(
      [
        "[Unit]",
        "Description=[unitab] report timer",
        "",
        "[Timer]",
        "OnCalendar=Mon..Fri *-*-* 09:00:00",
        "Persistent=true",
        "",
        "[Install]",
        "WantedBy=timers.target",
        "",
      ].join("\n"),
    );
  });

  it("renders a long-running service without a timer", () => {
    const files = generateUnit(web);

    expect(files.triggerText).toBeUndefined();
    expect(files.execText).toBe(
      [
        "[Unit]",
        "Description=[unitab] web: node dist/index.js",
        "After=network-online.target",
        "",
        "[Service]",
        "Type=simple",
        "ExecStart=node dist/index.js",
        "WorkingDirectory=/srv/web",
        "Restart=on-failure",
        "RestartSec=5",
        "EnvironmentFile=/srv/web/.env",
        "",
        "[Install]",
        "WantedBy=default.target",
        "",
        "# unitab:version=1",
        "# unitab:type=service",
        "# unitab:restart=on-failure",
        "# unitab:command=node dist/index.js",
        "# unitab:workdir=/srv/web",
        "# unitab:env_file=/srv/web/.env",
        "",
      ].join("\n"),
    );
  });

  it("loads the global env file ahead of unit settings", () => {
    const lines = generateUnit(web, { globalEnvFile: "/home/test/.config/unitab/env" }).execText.split("\n");
    const idx = lines.indexOf("EnvironmentFile=-/home/test/.config/unitab/env");
    expect(idx).toBe(lines.indexOf("RestartSec=5") + 1);
    expect(lines[idx + 1]).toBe("EnvironmentFile=/srv/web/.env");
  });

  it("boots @reboot timers one minute after start", () => {
    const files = generateUnit({ ...report, cron: "@reboot", schedule: { kind: "reboot" }, randomDelay: "30s" });
    const timer = files.triggerText?.split("\n") ?? [];
    expect(timer.slice(3, 6)).toEqual(["[Timer]", "OnBootSec=1min", "RandomizedDelaySec=30s"]);
  });

  it("escapes % in systemd settings but not in metadata", () => {
    const lines = generateUnit({ ...web, command: ["date", "+%F"] }).execText.split("\n");
    expect(lines).toContain("ExecStart=date +%%F");
    expect(lines).toContain("Description=[unitab] web: date +%%F");
    expect(lines).toContain("# unitab:command=date +%F");
  });

  it("escapes % in paths and environment settings", () => {
    const unit: ServiceUnit = { ...web, workdir: "/srv/100%", envFile: "/srv/%i.env", env: ["RATE=50%"] };
    const lines = generateUnit(unit, { globalEnvFile: "/home/test/%h.env" }).execText.split("\n");
    expect(lines).toContain("WorkingDirectory=/srv/100%%");
    expect(lines).toContain("EnvironmentFile=-/home/test/%%h.env");
    expect(lines).toContain("EnvironmentFile=/srv/%%i.env");
    expect(lines).toContain("Environment=RATE=50%%");
    expect(lines).toContain("# unitab:workdir=/srv/100%");
    expect(lines).toContain("# unitab:env=RATE=50%");
  });

  it("prefers the description when one is set", () => {
    const { execText } = generateUnit({ ...report, description: "weekday report" });
    expect(execText.split("\n")[1]).toBe("Description=[unitab] report: weekday report");
  });

  it("produces identical text for identical units", () => {
    expect(generateUnit({ ...report })).toEqual(generateUnit(report));
  });
});

describe("controlUnit", () => {
  it("targets the timer for timers and the service otherwise", () => {
    expect(controlUnit(report)).toBe("unitab-report.timer");
    expect(controlUnit(web)).toBe("unitab-web.service");
  });
});

describe("deriveName", () => {
  it.each([
    [["uv", "run", "./report.py"], "report"],
    [["python3", "/opt/jobs/backup.py"], "backup"],
    [["node", "server.js"], "server"],
    [["/usr/bin/rsync", "-a", "src", "dst"], "rsync"],
    [["./.hidden.sh"], "hidden"],
    [[], "task"],
  ])("names %j as %s", (argv, expected) => {
    expect(deriveName(argv)).toBe(expected);
  });
});
