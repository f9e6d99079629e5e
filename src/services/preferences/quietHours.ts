import { TIME_OF_DAY_PATTERN, type UserChannelPreference } from "@/types/preference";

const SECONDS_PER_DAY = 24 * 60 * 60;

const formatters = new Map<string, Intl.DateTimeFormat>();

function formatterFor(timeZone: string): Intl.DateTimeFormat {
  let formatter = formatters.get(timeZone);
  if (!formatter) {
    formatter = new Intl.DateTimeFormat("en-GB", {
      timeZone,
      hour: "2-digit",
      minute: "2-digit",
      second: "2-digit",
      hourCycle: "h23",
    });
    formatters.set(timeZone, formatter);
  }

  return formatter;
}

/** Parses `HH:MM` or `HH:MM:SS` into seconds since midnight; null when malformed. */
export function parseTimeOfDay(value: string): number | null {
  const match = TIME_OF_DAY_PATTERN.exec(value);
  if (!match) {
    return null;
  }

  const [, hours, minutes, seconds] = match;
  return Number(hours) * 3600 + Number(minutes) * 60 + Number(seconds ?? "0");
}

export function secondsOfDay(now: Date, timeZone: string): number {
  let total = 0;

  for (const part of formatterFor(timeZone).formatToParts(now)) {
    if (part.type === "hour") {
      total += Number(part.value) * 3600;
    } else if (part.type === "minute") {
      total += Number(part.value) * 60;
    } else if (part.type === "second") {
      total += Number(part.value);
    }
  }

  return total % SECONDS_PER_DAY;
}

type QuietHoursSettings = Pick<UserChannelPreference, "quietHoursEnabled" | "quietHoursStart" | "quietHoursEnd">;

/**
 * Bounds are inclusive. A start later than the end describes a window that
 * wraps past midnight, e.g. 22:00-06:00.
 */
export function isInQuietHours(preference: QuietHoursSettings, now: Date, timeZone = "UTC"): boolean {
  if (!preference.quietHoursEnabled || !preference.quietHoursStart || !preference.quietHoursEnd) {
    return false;
  }

  const start = parseTimeOfDay(preference.quietHoursStart);
  const end = parseTimeOfDay(preference.quietHoursEnd);
  if (start === null || end === null) {
    return false;
  }

  const current = secondsOfDay(now, timeZone);

  if (start <= end) {
    return start <= current && current <= end;
  }

  return current >= start || current <= end;
}
