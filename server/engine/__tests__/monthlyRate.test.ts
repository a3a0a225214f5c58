import { describe, expect, it } from "vitest";
import type { AttendanceRecord } from "@shared/schema";
import {
  buildRemarkSummary,
  calculateActualDays,
  calculateMonthlyAttendance,
  calculateMonthlyStats,
  calculateRate,
  calculateRequiredDays,
  getRateTier,
  isWorkDay,
} from "@/engine/monthlyRate";
import { createStaff } from "@/engine/staffDirectory";

const alice = createStaff("Alice", "internal");
const carol = createStaff("Carol", "external");
const noHolidays: ReadonlySet<string> = new Set();

const record = (date: string, status: AttendanceRecord["status"], extra: Partial<AttendanceRecord> = {}): AttendanceRecord => ({
  date,
  checkIn: "09:00:00",
  checkOut: "18:00:00",
  status,
  remark: "",
  ...extra,
});

describe("required days", () => {
  // December 2025 starts on a Monday.
  it("counts Monday to Friday for internal staff", () => {
    expect(calculateRequiredDays(alice, 2025, 12, noHolidays)).toBe(23);
  });

  it("counts Monday, Wednesday and Friday for external staff", () => {
    expect(calculateRequiredDays(carol, 2025, 12, noHolidays)).toBe(14);
  });

  it("removes holidays that fall on a work day", () => {
    const holidays = new Set(["2025-12-25", "2025-12-26"]);
    expect(calculateRequiredDays(alice, 2025, 12, holidays)).toBe(21);
    expect(calculateRequiredDays(carol, 2025, 12, holidays)).toBe(13);
  });

  it("knows weekends and holidays are not work days", () => {
    expect(isWorkDay(alice, "2025-12-06", noHolidays)).toBe(false);
    expect(isWorkDay(alice, "2025-12-25", new Set(["2025-12-25"]))).toBe(false);
    expect(isWorkDay(carol, "2025-12-02", noHolidays)).toBe(false);
    expect(isWorkDay(carol, "2025-12-03", noHolidays)).toBe(true);
  });
});

describe("rate and tier", () => {
  it("counts attended statuses only", () => {
    const records = [
      record("2025-12-01", "normal"),
      record("2025-12-02", "late"),
      record("2025-12-03", "early_leave"),
      record("2025-12-04", "abnormal"),
      record("2025-12-05", "leave"),
      record("2025-12-08", "absent", { checkIn: null, checkOut: null }),
    ];
    expect(calculateActualDays(records)).toBe(5);
  });

  it("treats a month without required days as full attendance", () => {
    expect(calculateRate(0, 0)).toBe(100);
    expect(calculateRate(3, 4)).toBe(75);
  });

  it("splits tiers at the threshold and at 90", () => {
    expect(getRateTier(79.9, 80)).toBe("red");
    expect(getRateTier(80, 80)).toBe("yellow");
    expect(getRateTier(89.9, 80)).toBe("yellow");
    expect(getRateTier(90, 80)).toBe("green");
    expect(getRateTier(85, 95)).toBe("red");
  });

  it("assembles the monthly figures", () => {
    const monthly = calculateMonthlyAttendance({
      staff: carol,
      records: [record("2025-12-01", "normal"), record("2025-12-03", "late")],
      year: 2025,
      month: 12,
      holidays: noHolidays,
    });
    expect(monthly.requiredDays).toBe(14);
    expect(monthly.actualDays).toBe(2);
    expect(monthly.attendanceRate).toBeCloseTo(14.2857, 3);
    expect(monthly.rateTier).toBe("red");
  });
});

describe("calculateMonthlyStats", () => {
  it("counts weekdays and holidays of the month", () => {
    expect(calculateMonthlyStats(2025, 12, new Set(["2025-12-25"]), 2, 1)).toEqual({
      year: 2025,
      month: 12,
      requiredWorkDays: 22,
      holidayCount: 1,
      totalStaffCount: 3,
      internalCount: 2,
      externalCount: 1,
    });
  });
});

describe("buildRemarkSummary", () => {
  it("lists late, early and delayed checkout days in date order", () => {
    const summary = buildRemarkSummary([
      record("2025-12-03", "late"),
      record("2025-12-04", "early_leave", { checkOut: "17:00:00" }),
      record("2025-12-05", "normal", { checkOut: "19:00:00", remark: "下班延遲打卡" }),
      record("2025-12-08", "normal"),
    ]);
    expect(summary).toBe("3日遲到, 4日早退, 5日下班延遲打卡");
  });

  it("is empty for a clean month", () => {
    expect(buildRemarkSummary([record("2025-12-01", "normal")])).toBe("");
  });
});
