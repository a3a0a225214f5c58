import { z } from "zod";

export const STAFF_TYPES = ["internal", "external"] as const;
export type StaffType = (typeof STAFF_TYPES)[number];

export const ATTENDANCE_STATUSES = [
  "normal",
  "late",
  "early_leave",
  "absent",
  "abnormal",
  "leave",
  "holiday",
  "non_work_day",
] as const;
export type AttendanceStatus = (typeof ATTENDANCE_STATUSES)[number];

export const RATE_TIERS = ["red", "yellow", "green"] as const;
export type RateTier = (typeof RATE_TIERS)[number];

export const SORT_KEYS = ["attendance_rate", "name_strokes"] as const;
export type SortKey = (typeof SORT_KEYS)[number];

export const COLOR_NAMES = ["red", "orange", "yellow", "green", "blue", "purple", "pink", "black", "none"] as const;
export type ColorName = (typeof COLOR_NAMES)[number];

export const DELAYED_CHECKOUT_REMARK = "下班延遲打卡";

// YYYY-MM-DD
export type DateKey = string;
// HH:MM:SS
export type ClockTime = string;

export type RawAttendanceRow = {
  readonly employeeName: string;
  readonly date: DateKey;
  readonly checkIn: ClockTime | null;
  readonly checkOut: ClockTime | null;
};

export type Staff = {
  readonly name: string;
  readonly staffType: StaffType;
  /** ISO weekdays, 1 = Monday ... 7 = Sunday. Never empty. */
  readonly workWeekdays: readonly number[];
};

export type RosterEntry = {
  name: string;
  staffType: StaffType;
};

export type AttendanceRecord = {
  readonly date: DateKey;
  readonly checkIn: ClockTime | null;
  readonly checkOut: ClockTime | null;
  readonly status: AttendanceStatus;
  readonly remark: string;
};

export type MonthlyAttendance = {
  readonly staff: Staff;
  readonly year: number;
  readonly month: number;
  readonly records: readonly AttendanceRecord[];
  readonly requiredDays: number;
  readonly actualDays: number;
  readonly attendanceRate: number;
  readonly rateTier: RateTier;
};

export type MonthlyStats = {
  year: number;
  month: number;
  requiredWorkDays: number;
  holidayCount: number;
  totalStaffCount: number;
  internalCount: number;
  externalCount: number;
};

const timeRuleField = (fallback: string) => z.string().trim().default(fallback);

export const timeRuleSchema = z.object({
  inStart: timeRuleField("09:00"),
  inEnd: timeRuleField("09:30"),
  outStart: timeRuleField("18:00"),
  outEnd: timeRuleField("18:30"),
});
export type TimeRule = z.infer<typeof timeRuleSchema>;

export const externalTimeRuleSchema = z.object({
  inStart: timeRuleField("09:30"),
  inEnd: timeRuleField("10:00"),
  outStart: timeRuleField("10:30"),
  outEnd: timeRuleField("12:00"),
});

export const colorLogicSchema = z.object({
  normalInColor: z.enum(COLOR_NAMES).default("green"),
  normalOutColor: z.enum(COLOR_NAMES).default("green"),
  abnormalInColor: z.enum(COLOR_NAMES).default("red"),
  abnormalOutColor: z.enum(COLOR_NAMES).default("red"),
  missingPunchColor: z.enum(COLOR_NAMES).default("black"),
  missingPunchText: z.string().default("*"),
  absentColor: z.enum(COLOR_NAMES).default("none"),
  absentText: z.string().default("-"),
});
export type ColorLogic = z.infer<typeof colorLogicSchema>;

export const reportSettingsSchema = z.object({
  timeRules: z
    .object({
      internal: timeRuleSchema.default({}),
      external: externalTimeRuleSchema.default({}),
    })
    .default({}),
  // Non-string entries are dropped here; malformed date strings are dropped when resolved.
  holidays: z
    .preprocess(
      (value) => (Array.isArray(value) ? value.filter((entry): entry is string => typeof entry === "string") : value),
      z.array(z.string()),
    )
    .default([]),
  rateThreshold: z.number().int().min(0).max(100).default(80),
  sortBy: z.enum(SORT_KEYS).default("attendance_rate"),
  colorLogic: colorLogicSchema.default({}),
});
export type ReportSettings = z.infer<typeof reportSettingsSchema>;

export const rosterEntrySchema = z.object({
  name: z.string().trim().min(1, "Name is required"),
  staffType: z.enum(STAFF_TYPES),
});
