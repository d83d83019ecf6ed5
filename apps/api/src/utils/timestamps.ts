import { z } from "zod";

const TIMESTAMP =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(\.\d+)?)?(Z|[+-]\d{2}(?::?\d{2})?)?)?$/i;

function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

function normalizeOffset(zone: string | undefined): string {
  if (!zone || zone.toUpperCase() === "Z") {
    return "Z";
  }
  const [, sign, hours, minutes = "00"] = /^([+-])(\d{2}):?(\d{2})?$/.exec(zone) ?? [];
  return `${sign}${hours}:${minutes}`;
}

/**
 * Normalize an ISO-8601 date or date-time to a UTC `toISOString()` value.
 * Values without an offset are read as UTC; date-only values mean midnight.
 * Returns null when unparseable or when the date does not exist on the calendar.
 */
export function normalizeTimestamp(value: string): string | null {
  const match = TIMESTAMP.exec(value.trim());
  if (!match) {
    return null;
  }

  const [, year, month, day, hour = "00", minute = "00", second = "00", fraction = "", zone] = match;
  const monthNumber = Number(month);
  if (monthNumber < 1 || monthNumber > 12 || Number(day) < 1 || Number(day) > daysInMonth(Number(year), monthNumber)) {
    return null;
  }
  // Date rolls 24:00 and 60 seconds over into the next unit
  if (Number(hour) > 23 || Number(minute) > 59 || Number(second) > 59) {
    return null;
  }

  const date = new Date(`${year}-${month}-${day}T${hour}:${minute}:${second}${fraction}${normalizeOffset(zone)}`);
  return Number.isNaN(date.getTime()) ? null : date.toISOString();
}

/**
 * Zod field accepting an ISO-8601 timestamp and producing its normalized UTC form
 */
export function timestampField() {
  return z.string({ invalid_type_error: "Expected an ISO-8601 timestamp" }).transform((value, ctx) => {
    const normalized = normalizeTimestamp(value);
    if (normalized === null) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "Datetime has wrong format. Use ISO-8601: YYYY-MM-DDThh:mm[:ss[.uuuuuu]][+HH:MM|-HH:MM|Z]",
      });
      return z.NEVER;
    }
    return normalized;
  });
}
