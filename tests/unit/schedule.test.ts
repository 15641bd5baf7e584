import { describe, expect, it } from "vitest";
import { ScheduleError } from "../../src/errors";
import { compileSchedule, formatCalendar, parseCalendar } from "../../src/schedule";
import type { CalendarSchedule } from "../../src/types";

function calendarOf(expr: string): CalendarSchedule {
  const schedule = compileSchedule(expr);
  if (schedule.kind !== "calendar") throw new Error(`${expr} is not a calendar schedule`);
  return schedule;
}

function render(expr: string): string {
  return formatCalendar(calendarOf(expr));
}

function scheduleError(expr: string): ScheduleError {
  try {
    compileSchedule(expr);
  } catch (e) {
    if (e instanceof ScheduleError) return e;
    throw e;
  }
  throw new Error(`${expr} compiled`);
}

describe("compileSchedule", () => {
  it("compiles five-field expressions into constraints", () => {
    expect(calendarOf("0 9 * * 1-5")).toEqual({
      kind: "calendar",
      minute: { kind: "list", parts: [{ kind: "value", value: 0 }] },
      hour: { kind: "list", parts: [{ kind: "value", value: 9 }] },
      dayOfMonth: { kind: "any" },
      month: { kind: "any" },
      dayOfWeek: { kind: "list", parts: [{ kind: "range", start: 1, end: 5 }] },
    });
  });

  it("keeps */n as a repetition", () => {
    expect(calendarOf("*/5 * * * *").minute).toEqual({ kind: "step", start: 0, stride: 5 });
    expect(calendarOf("0 */2 * * *").hour).toEqual({ kind: "step", start: 0, stride: 2 });
  });

  it("recognizes @reboot and @service", () => {
    expect(compileSchedule("@reboot")).toEqual({ kind: "reboot" });
    expect(compileSchedule(" @service ")).toEqual({ kind: "service" });
  });

  it("accepts weekday names in any case", () => {
    expect(render("0 0 * * mon")).toBe("Mon *-*-* 00:00:00");
    expect(render("0 0 * * SAT")).toBe("Sat *-*-* 00:00:00");
  });
});

describe("formatCalendar", () => {
  it.each([
    ["0 9 * * 1-5", "Mon..Fri *-*-* 09:00:00"],
    ["*/5 * * * *", "*-*-* *:0/5:00"],
    ["0 0 1 1,6 *", "*-01,06-01 00:00:00"],
    ["0-30/10 * * * *", "*-*-* *:00,10,20,30:00"],
    ["30 2 * * *", "*-*-* 02:30:00"],
    ["0 0 * * 7", "Sun *-*-* 00:00:00"],
    ["0 0 * * 5-7", "Fri..Sat,Sun *-*-* 00:00:00"],
    ["0 0 * * */2", "Sun,Tue,Thu,Sat *-*-* 00:00:00"],
    ["15 8 1-7 * *", "*-*-01..07 08:15:00"],
    ["0 3-7 * * *", "*-*-* 03..07:00:00"],
    ["0-7 * * * *", "*-*-* *:00..07:00"],
    ["0 0 * 2-7 *", "*-02..07-* 00:00:00"],
    ["0-7/7 * * * *", "*-*-* *:00,07:00"],
    ["0 0 * * 1-7/2", "Mon,Wed,Fri,Sun *-*-* 00:00:00"],
    ["0 */30 * * *", "*-*-* 0/30:00:00"],
  ])("renders %s as %s", (expr, expected) => {
    expect(render(expr)).toBe(expected);
  });

  it.each([
    ["@hourly", "*-*-* *:00:00"],
    ["@daily", "*-*-* 00:00:00"],
    ["@midnight", "*-*-* 00:00:00"],
    ["@weekly", "Mon *-*-* 00:00:00"],
    ["@monthly", "*-*-01 00:00:00"],
    ["@yearly", "*-01-01 00:00:00"],
    ["@daily/9:30", "*-*-* 09:30:00"],
    ["@daily/7", "*-*-* 07:00:00"],
    ["@monday/7", "Mon *-*-* 07:00:00"],
    ["@friday/17:45", "Fri *-*-* 17:45:00"],
    ["@1st/6", "*-*-01 06:00:00"],
    ["@22nd", "*-*-22 00:00:00"],
    ["@15th/12:05", "*-*-15 12:05:00"],
  ])("renders alias %s as %s", (expr, expected) => {
    expect(render(expr)).toBe(expected);
  });
});

describe("parseCalendar", () => {
  it.each([
    "0 9 * * 1-5",
    "*/5 * * * *",
    "0 0 1 1,6 *",
    "0 0 * * 5-7",
    "0 */3 * * *",
    "@monday/7",
    "0 3-7 * * *",
    "0 0 * 2-7 *",
    "0 0 1-7 * *",
    "0 */30 * * *",
  ])(
    "reads back the rendering of %s",
    (expr) => {
      const cal = calendarOf(expr);
      expect(parseCalendar(formatCalendar(cal))).toEqual(cal);
    },
  );

  it("rejects text that is not a calendar value", () => {
    expect(() => parseCalendar("tomorrow")).toThrow(ScheduleError);
  });
});

describe("schedule errors", () => {
  it("reports out-of-range values with the field name", () => {
    const e = scheduleError("60 * * * *");
    expect(e.kind).toBe("out-of-range");
    expect(e.field).toBe("minute");
    expect(e.code).toBe("SCHEDULE_RANGE");
    expect(e.message).toBe("schedule minute: 60 is outside 0-59");
  });

  it.each(["0 0 32 * *", "* * 0 * *"])("reports %s as out of range for day-of-month", (expr) => {
    const e = scheduleError(expr);
    expect(e.kind).toBe("out-of-range");
    expect(e.field).toBe("day-of-month");
  });

  it("treats an ordinal past 31 as out of range", () => {
    const e = scheduleError("@32nd");
    expect(e.kind).toBe("out-of-range");
    expect(e.field).toBe("day-of-month");
  });

  it.each([
    ["* * * *", "expression"],
    ["", "expression"],
    ["5-1 * * * *", "minute"],
    ["a * * * *", "minute"],
    ["0 0 * * xyz", "day-of-week"],
    ["*/5/2 * * * *", "minute"],
    ["@2th", "@2th"],
    ["@daily/25", "@daily/25"],
    ["@sometimes", "@sometimes"],
  ])("rejects %j as a syntax error in %s", (expr, field) => {
    const e = scheduleError(expr);
    expect(e.kind).toBe("syntax");
    expect(e.field).toBe(field);
    expect(e.code).toBe("SCHEDULE_SYNTAX");
  });

  it("rejects a zero step", () => {
    const e = scheduleError("*/0 * * * *");
    expect(e.kind).toBe("out-of-range");
    expect(e.message).toBe("schedule minute: step must be at least 1");
  });

  it("accepts steps wider than the field", () => {
    expect(calendarOf("*/61 * * * *").minute).toEqual({ kind: "step", start: 0, stride: 61 });
    expect(calendarOf("0 */30 * * *").hour).toEqual({ kind: "step", start: 0, stride: 30 });
  });
});
