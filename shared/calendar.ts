import { format, getDaysInMonth, getISODay, isValid, parse } from "date-fns";
import type { DateKey } from "./schema";

const DATE_KEY_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

export const toDateKey = (year: number, month: number, day: number): DateKey =>
  `${year}-${String(month).padStart(2, "0")}-${String(day).padStart(2, "0")}`;

export const isValidDateKey = (value: string) => {
  if (!DATE_KEY_PATTERN.test(value)) return false;
  return isValid(parse(value, "yyyy-MM-dd", new Date()));
};

export const dateKeyToDate = (value: DateKey) => parse(value, "yyyy-MM-dd", new Date());

export const formatDateKey = (value: Date): DateKey | null => (isValid(value) ? format(value, "yyyy-MM-dd") : null);

export const splitDateKey = (value: DateKey) => {
  const [year = 1970, month = 1, day = 1] = value.split("-").map(Number);
  return { year, month, day };
};

/** ISO weekday of a date key: 1 = Monday ... 7 = Sunday. */
export const isoWeekdayOf = (value: DateKey) => getISODay(dateKeyToDate(value));

export const daysOfMonth = (year: number, month: number): DateKey[] => {
  const count = getDaysInMonth(new Date(year, month - 1, 1));
  return Array.from({ length: count }, (_, index) => toDateKey(year, month, index + 1));
};

export const parseHolidayDates = (values: readonly unknown[]): Set<DateKey> => {
  const holidays = new Set<DateKey>();
  values.forEach((value) => {
    const match = /^(\d{4})-(\d{1,2})-(\d{1,2})$/.exec(typeof value === "string" ? value.trim() : "");
    if (!match) return;
    const key = toDateKey(Number(match[1]), Number(match[2]), Number(match[3]));
    if (isValidDateKey(key)) holidays.add(key);
  });
  return holidays;
};
