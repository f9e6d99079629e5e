import { describe, expect, it } from "vitest";

import { isInQuietHours, parseTimeOfDay, secondsOfDay } from "./quietHours";

const overnight = { quietHoursEnabled: true, quietHoursStart: "22:00", quietHoursEnd: "06:00" };
const daytime = { quietHoursEnabled: true, quietHoursStart: "09:00", quietHoursEnd: "17:00" };

function utc(time: string) {
  return new Date(`2024-03-10T${time}Z`);
}

describe("parseTimeOfDay", () => {
  it("should parse hours and minutes", () => {
    expect(parseTimeOfDay("07:30")).toBe(27_000);
  });

  it("should parse optional seconds", () => {
    expect(parseTimeOfDay("07:30:15")).toBe(27_015);
  });

  it("should reject out of range values", () => {
    expect(parseTimeOfDay("24:00")).toBeNull();
    expect(parseTimeOfDay("7:30")).toBeNull();
  });
});

describe("secondsOfDay", () => {
  it("should report midnight as zero", () => {
    expect(secondsOfDay(utc("00:00:00"), "UTC")).toBe(0);
  });

  it("should shift the wall clock into the requested time zone", () => {
    expect(secondsOfDay(utc("20:30:00"), "Asia/Riyadh")).toBe(23 * 3600 + 30 * 60);
  });
});

describe("isInQuietHours", () => {
  it("should be false when quiet hours are disabled", () => {
    expect(isInQuietHours({ ...overnight, quietHoursEnabled: false }, utc("23:30:00"))).toBe(false);
  });

  it("should be false when a bound is missing", () => {
    expect(isInQuietHours({ ...overnight, quietHoursEnd: null }, utc("23:30:00"))).toBe(false);
  });

  it("should suppress inside a window that wraps past midnight", () => {
    expect(isInQuietHours(overnight, utc("23:30:00"))).toBe(true);
    expect(isInQuietHours(overnight, utc("03:00:00"))).toBe(true);
    expect(isInQuietHours(overnight, utc("12:00:00"))).toBe(false);
  });

  it("should treat both bounds as inclusive", () => {
    expect(isInQuietHours(overnight, utc("22:00:00"))).toBe(true);
    expect(isInQuietHours(overnight, utc("06:00:00"))).toBe(true);
    expect(isInQuietHours(overnight, utc("06:00:01"))).toBe(false);
    expect(isInQuietHours(daytime, utc("17:00:00"))).toBe(true);
  });

  it("should suppress inside a same-day window only", () => {
    expect(isInQuietHours(daytime, utc("12:00:00"))).toBe(true);
    expect(isInQuietHours(daytime, utc("08:59:59"))).toBe(false);
    expect(isInQuietHours(daytime, utc("17:00:01"))).toBe(false);
  });

  it("should evaluate the window in the configured time zone", () => {
    expect(isInQuietHours(overnight, utc("20:30:00"), "Asia/Riyadh")).toBe(true);
    expect(isInQuietHours(overnight, utc("20:30:00"), "UTC")).toBe(false);
  });
});
