import { ScheduleError } from "./errors";
import type {
  CalendarField,
  CalendarSchedule,
  FieldConstraint,
  FieldPart,
  Schedule,
} from "./types";

// ── Field table ────────────────────────────────────────────────────

interface FieldSpec {
  key: CalendarField;
  label: string;
  min: number;
  max: number;
}

const FIELDS: FieldSpec[] = [
  { key: "minute", label: "minute", min: 0, max: 59 },
  { key: "hour", label: "hour", min: 0, max: 23 },
  { key: "dayOfMonth", label: "day-of-month", min: 1, max: 31 },
  { key: "month", label: "month", min: 1, max: 12 },
  { key: "dayOfWeek", label: "day-of-week", min: 0, max: 6 },
];

const [MINUTE, HOUR, DAY_OF_MONTH, MONTH, DAY_OF_WEEK] = FIELDS;

const DOW_NAMES = ["Sun", "Mon", "Tue", "Wed", "Thu", "Fri", "Sat"];
const WEEKDAYS = [
  "sunday",
  "monday",
  "tuesday",
  "wednesday",
  "thursday",
  "friday",
  "saturday",
];

const NAMED: Record<string, string> = {
  "@hourly": "0 * * * *",
  "@daily": "0 0 * * *",
  "@midnight": "0 0 * * *",
  "@weekly": "0 0 * * 1",
  "@monthly": "0 0 1 * *",
  "@yearly": "0 0 1 1 *",
  "@annually": "0 0 1 1 *",
};

export const SERVICE_MARKER = "@service";

// ── Constraint helpers ─────────────────────────────────────────────

function any(): FieldConstraint {
  return { kind: "any" };
}

function single(value: number): FieldConstraint {
  return { kind: "list", parts: [{ kind: "value", value }] };
}

function calendar(fields: Partial<Omit<CalendarSchedule, "kind">>): CalendarSchedule {
  return {
    kind: "calendar",
    minute: fields.minute ?? any(),
    hour: fields.hour ?? any(),
    dayOfMonth: fields.dayOfMonth ?? any(),
    month: fields.month ?? any(),
    dayOfWeek: fields.dayOfWeek ?? any(),
  };
}

function syntax(field: string, detail: string): ScheduleError {
  return new ScheduleError("syntax", field, detail);
}

function outOfRange(field: string, detail: string): ScheduleError {
  return new ScheduleError("out-of-range", field, detail);
}

function parseInteger(raw: string, spec: FieldSpec): number {
  if (!/^\d+$/.test(raw)) throw syntax(spec.label, `'${raw}' is not a number`);
  return Number(raw);
}

function checkRange(n: number, spec: FieldSpec): number {
  if (n < spec.min || n > spec.max) {
    throw outOfRange(spec.label, `${n} is outside ${spec.min}-${spec.max}`);
  }
  return n;
}

/** Cron accepts 0 and 7 for Sunday and three-letter names. */
function parseDow(raw: string): number {
  if (/^\d+$/.test(raw)) {
    const n = Number(raw);
    return n === 7 ? 0 : checkRange(n, DAY_OF_WEEK);
  }
  const idx = DOW_NAMES.findIndex((d) => d.toLowerCase() === raw.toLowerCase());
  if (idx === -1) throw syntax(DAY_OF_WEEK.label, `'${raw}' is not a weekday`);
  return idx;
}

function parseValue(raw: string, spec: FieldSpec): number {
  if (spec.key === "dayOfWeek") return parseDow(raw);
  return checkRange(parseInteger(raw, spec), spec);
}

function parseBounds(raw: string, spec: FieldSpec): [number, number] {
  const bounds = raw.split("-");
  if (bounds.length !== 2 || bounds[0] === "" || bounds[1] === "") {
    throw syntax(spec.label, `malformed range '${raw}'`);
  }
  // inside a weekday range 7 keeps its place after Saturday: `5-7` is Fri..Sun
  const bound = (b: string) =>
    spec.key === "dayOfWeek" && b === "7" ? 7 : parseValue(b, spec);
  const start = bound(bounds[0]);
  const end = bound(bounds[1]);
  if (start > end) throw syntax(spec.label, `range '${raw}' runs backwards`);
  return [start, end];
}

function parseStride(raw: string, spec: FieldSpec): number {
  const stride = parseInteger(raw, spec);
  if (stride < 1) throw outOfRange(spec.label, "step must be at least 1");
  return stride;
}

function expand(start: number, end: number, stride: number): FieldPart[] {
  const parts: FieldPart[] = [];
  for (let v = start; v <= end; v += stride) {
    parts.push({ kind: "value", value: v });
  }
  return parts;
}

function sunday(part: FieldPart, spec: FieldSpec): FieldPart {
  if (spec.key !== "dayOfWeek") return part;
  return part.kind === "value" && part.value === 7 ? { kind: "value", value: 0 } : part;
}

function parsePart(raw: string, spec: FieldSpec): FieldPart[] {
  if (raw === "") throw syntax(spec.label, "empty list element");

  if (raw.includes("/")) {
    const [base, strideRaw, ...rest] = raw.split("/");
    if (rest.length > 0 || base === "*") {
      throw syntax(spec.label, `malformed step '${raw}'`);
    }
    if (!base.includes("-")) {
      throw syntax(spec.label, `step base must be '*' or a range, got '${base}'`);
    }
    const [start, end] = parseBounds(base, spec);
    return expand(start, end, parseStride(strideRaw, spec)).map((p) => sunday(p, spec));
  }

  if (raw.includes("-")) {
    const [start, end] = parseBounds(raw, spec);
    if (spec.key === "dayOfWeek" && end === 7) {
      if (start === 7) return [{ kind: "value", value: 0 }];
      if (start === 0) return [{ kind: "range", start: 0, end: 6 }];
      return [{ kind: "range", start, end: 6 }, { kind: "value", value: 0 }];
    }
    return [{ kind: "range", start, end }];
  }

  return [{ kind: "value", value: parseValue(raw, spec) }];
}

function parseField(raw: string, spec: FieldSpec): FieldConstraint {
  if (raw === "*") return any();

  if (raw.startsWith("*/")) {
    const stride = parseStride(raw.slice(2), spec);
    // systemd has no weekday repetition, so weekday steps become a list
    if (spec.key === "dayOfWeek") {
      return { kind: "list", parts: expand(spec.min, spec.max, stride) };
    }
    return { kind: "step", start: spec.min, stride };
  }

  return { kind: "list", parts: raw.split(",").flatMap((p) => parsePart(p, spec)) };
}

function compileFields(expr: string): CalendarSchedule {
  const fields = expr.split(/\s+/);
  if (fields.length !== 5) {
    throw syntax("expression", `expected 5 fields, got ${fields.length}`);
  }
  return calendar({
    minute: parseField(fields[0], MINUTE),
    hour: parseField(fields[1], HOUR),
    dayOfMonth: parseField(fields[2], DAY_OF_MONTH),
    month: parseField(fields[3], MONTH),
    dayOfWeek: parseField(fields[4], DAY_OF_WEEK),
  });
}

// ── Aliases ────────────────────────────────────────────────────────

function ordinalSuffix(n: number): string {
  if (n >= 11 && n <= 13) return "th";
  switch (n % 10) {
    case 1: return "st";
    case 2: return "nd";
    case 3: return "rd";
    default: return "th";
  }
}

/** `H` or `H:M` after an alias; anything else is a syntax error. */
function parseAliasTime(alias: string, suffix: string | undefined): [number, number] {
  if (suffix === undefined) return [0, 0];
  const m = /^(\d{1,2})(?::(\d{1,2}))?$/.exec(suffix);
  if (!m) throw syntax(alias, `time '${suffix}' must be H or H:M`);
  const hour = Number(m[1]);
  const minute = m[2] === undefined ? 0 : Number(m[2]);
  if (hour > 23 || minute > 59) {
    throw syntax(alias, `time '${suffix}' must be within 0-23:0-59`);
  }
  return [hour, minute];
}

function compileAlias(expr: string): Schedule {
  if (expr === "@reboot") return { kind: "reboot" };
  if (expr === SERVICE_MARKER) return { kind: "service" };

  const named = NAMED[expr];
  if (named) return compileFields(named);

  const m = /^@([a-z0-9]+)(?:\/(.*))?$/.exec(expr);
  if (!m) throw syntax(expr, "unknown alias");
  const [, head, suffix] = m;

  if (head === "daily") {
    const [hour, minute] = parseAliasTime(expr, suffix);
    return calendar({ minute: single(minute), hour: single(hour) });
  }

  const weekday = WEEKDAYS.indexOf(head);
  if (weekday !== -1) {
    const [hour, minute] = parseAliasTime(expr, suffix);
    return calendar({
      minute: single(minute),
      hour: single(hour),
      dayOfWeek: single(weekday),
    });
  }

  const ordinal = /^(\d{1,2})(st|nd|rd|th)$/.exec(head);
  if (ordinal) {
    const day = Number(ordinal[1]);
    if (day < 1 || day > 31) {
      throw outOfRange(DAY_OF_MONTH.label, `${day} is outside 1-31`);
    }
    if (ordinal[2] !== ordinalSuffix(day)) {
      throw syntax(expr, `expected @${day}${ordinalSuffix(day)}`);
    }
    const [hour, minute] = parseAliasTime(expr, suffix);
    return calendar({
      minute: single(minute),
      hour: single(hour),
      dayOfMonth: single(day),
    });
  }

  throw syntax(expr, "unknown alias");
}

// ── Public API ─────────────────────────────────────────────────────

/**
 * Compile a cron expression or alias. Five-field expressions and every alias
 * except `@reboot` and `@service` produce a calendar schedule.
 */
export function compileSchedule(expr: string): Schedule {
  const trimmed = expr.trim();
  if (trimmed === "") throw syntax("expression", "schedule is empty");
  if (trimmed.startsWith("@")) return compileAlias(trimmed);
  return compileFields(trimmed);
}

// ── Calendar rendering ─────────────────────────────────────────────

function pad(n: number): string {
  return String(n).padStart(2, "0");
}

function formatField(c: FieldConstraint, name: (n: number) => string): string {
  switch (c.kind) {
    case "any":
      return "*";
    case "step":
      return `${c.start}/${c.stride}`;
    case "list":
      return c.parts
        .map((p) => (p.kind === "value" ? name(p.value) : `${name(p.start)}..${name(p.end)}`))
        .join(",");
  }
}

/** Render a calendar schedule as an `OnCalendar=` value: `[DOW ]*-MM-DD HH:MM:00`. */
export function formatCalendar(cal: CalendarSchedule): string {
  const dow =
    cal.dayOfWeek.kind === "step"
      ? formatField(
          { kind: "list", parts: expand(cal.dayOfWeek.start, DAY_OF_WEEK.max, cal.dayOfWeek.stride) },
          (n) => DOW_NAMES[n],
        )
      : formatField(cal.dayOfWeek, (n) => DOW_NAMES[n]);
  const date = `*-${formatField(cal.month, pad)}-${formatField(cal.dayOfMonth, pad)}`;
  const time = `${formatField(cal.hour, pad)}:${formatField(cal.minute, pad)}:00`;
  return cal.dayOfWeek.kind === "any" ? `${date} ${time}` : `${dow} ${date} ${time}`;
}

function parseCalendarValue(raw: string, spec: FieldSpec): number {
  if (spec.key === "dayOfWeek") {
    const idx = DOW_NAMES.indexOf(raw);
    if (idx === -1) throw syntax(spec.label, `'${raw}' is not a weekday`);
    return idx;
  }
  return checkRange(parseInteger(raw, spec), spec);
}

function parseCalendarField(raw: string, spec: FieldSpec): FieldConstraint {
  if (raw === "*") return any();

  if (raw.includes("/")) {
    const [start, stride, ...rest] = raw.split("/");
    if (rest.length > 0) throw syntax(spec.label, `malformed repetition '${raw}'`);
    return {
      kind: "step",
      start: checkRange(parseInteger(start, spec), spec),
      stride: parseStride(stride, spec),
    };
  }

  const parts = raw.split(",").map((p): FieldPart => {
    const bounds = p.split("..");
    if (bounds.length === 1) return { kind: "value", value: parseCalendarValue(p, spec) };
    if (bounds.length !== 2) throw syntax(spec.label, `malformed range '${p}'`);
    return {
      kind: "range",
      start: parseCalendarValue(bounds[0], spec),
      end: parseCalendarValue(bounds[1], spec),
    };
  });
  return { kind: "list", parts };
}

/** Inverse of {@link formatCalendar}. */
export function parseCalendar(text: string): CalendarSchedule {
  const m = /^(?:(\S+) )?\*-(\S+)-(\S+) (\S+):(\S+):00$/.exec(text.trim());
  if (!m) throw syntax("calendar", `cannot read '${text}'`);
  const [, dow, month, dom, hour, minute] = m;
  return calendar({
    minute: parseCalendarField(minute, MINUTE),
    hour: parseCalendarField(hour, HOUR),
    dayOfMonth: parseCalendarField(dom, DAY_OF_MONTH),
    month: parseCalendarField(month, MONTH),
    dayOfWeek: dow === undefined ? any() : parseCalendarField(dow, DAY_OF_WEEK),
  });
}
