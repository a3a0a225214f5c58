import { daysOfMonth, isoWeekdayOf, splitDateKey } from "@shared/calendar";
import type {
  AttendanceRecord,
  AttendanceStatus,
  DateKey,
  MonthlyAttendance,
  MonthlyStats,
  RateTier,
  Staff,
} from "@shared/schema";
import { DELAYED_CHECKOUT_REMARK } from "@shared/schema";

export const DEFAULT_RATE_THRESHOLD = 80;
// Fixed upper tier boundary; only the lower one is configurable.
export const GREEN_TIER_RATE = 90;

const ATTENDED_STATUSES: ReadonlySet<AttendanceStatus> = new Set<AttendanceStatus>([
  "normal",
  "late",
  "early_leave",
  "abnormal",
  "leave",
]);

export const isWorkDay = (staff: Staff, date: DateKey, holidays: ReadonlySet<DateKey>) =>
  !holidays.has(date) && staff.workWeekdays.includes(isoWeekdayOf(date));

export const calculateRequiredDays = (staff: Staff, year: number, month: number, holidays: ReadonlySet<DateKey>) =>
  daysOfMonth(year, month).filter((date) => isWorkDay(staff, date, holidays)).length;

export const calculateActualDays = (records: readonly AttendanceRecord[]) =>
  records.filter((record) => ATTENDED_STATUSES.has(record.status)).length;

export const calculateRate = (actualDays: number, requiredDays: number) => {
  if (requiredDays === 0) return 100.0;
  return (100 * actualDays) / requiredDays;
};

export const getRateTier = (rate: number, threshold: number = DEFAULT_RATE_THRESHOLD): RateTier => {
  if (rate < threshold) return "red";
  if (rate < GREEN_TIER_RATE) return "yellow";
  return "green";
};

export type MonthlyAttendanceInput = {
  staff: Staff;
  records: readonly AttendanceRecord[];
  year: number;
  month: number;
  holidays: ReadonlySet<DateKey>;
  threshold?: number;
};

export const calculateMonthlyAttendance = ({
  staff,
  records,
  year,
  month,
  holidays,
  threshold = DEFAULT_RATE_THRESHOLD,
}: MonthlyAttendanceInput): MonthlyAttendance => {
  const requiredDays = calculateRequiredDays(staff, year, month, holidays);
  const actualDays = calculateActualDays(records);
  const attendanceRate = calculateRate(actualDays, requiredDays);
  return {
    staff,
    year,
    month,
    records,
    requiredDays,
    actualDays,
    attendanceRate,
    rateTier: getRateTier(attendanceRate, threshold),
  };
};

/** Month-wide figures for a Monday-to-Friday calendar. */
export const calculateMonthlyStats = (
  year: number,
  month: number,
  holidays: ReadonlySet<DateKey>,
  internalCount: number,
  externalCount: number,
): MonthlyStats => {
  let requiredWorkDays = 0;
  let holidayCount = 0;
  daysOfMonth(year, month).forEach((date) => {
    if (holidays.has(date)) {
      holidayCount += 1;
    } else if (isoWeekdayOf(date) <= 5) {
      requiredWorkDays += 1;
    }
  });
  return {
    year,
    month,
    requiredWorkDays,
    holidayCount,
    totalStaffCount: internalCount + externalCount,
    internalCount,
    externalCount,
  };
};

/** e.g. "3日遲到, 4日早退, 4日下班延遲打卡" */
export const buildRemarkSummary = (records: readonly AttendanceRecord[]) => {
  const items: string[] = [];
  records.forEach((record) => {
    const { day } = splitDateKey(record.date);
    if (record.status === "late") items.push(`${day}日遲到`);
    if (record.status === "early_leave") items.push(`${day}日早退`);
    if (record.checkOut && record.remark === DELAYED_CHECKOUT_REMARK) items.push(`${day}日${DELAYED_CHECKOUT_REMARK}`);
  });
  return items.join(", ");
};
