import { parseHolidayDates, splitDateKey } from "@shared/calendar";
import { tryParseReportFilename } from "@shared/report-filename";
import type {
  ClockTime,
  DateKey,
  MonthlyAttendance,
  MonthlyStats,
  RawAttendanceRow,
  ReportSettings,
  Staff,
} from "@shared/schema";
import { resolveTimeRule, timeStringToSeconds, type ResolvedTimeRule } from "@shared/time-of-day";
import { silentLogger, type Logger } from "../log";
import { EmptyResultError, UnclassifiedStaffError } from "./errors";
import { calculateMonthlyAttendance, calculateMonthlyStats, isWorkDay } from "./monthlyRate";
import { extractWorkbookRows, type ExtractionWarning, type SheetGrid } from "./rowExtractor";
import { sortAttendanceList } from "./sorting";
import type { StaffDirectory } from "./staffDirectory";
import { classifyDay, type DayPunches } from "./statusClassifier";

export type ReportRequest = {
  sheets: readonly SheetGrid[];
  /** Only used to seed the year of short MM/DD dates. */
  sourceFileName?: string | null;
  directory: StaffDirectory;
  settings: ReportSettings;
  logger?: Logger;
  now?: Date;
};

export type AttendanceReport = {
  year: number;
  month: number;
  internal: MonthlyAttendance[];
  external: MonthlyAttendance[];
  holidays: DateKey[];
  stats: MonthlyStats;
  warnings: ExtractionWarning[];
};

export interface ReportRenderer {
  render(report: AttendanceReport, settings: ReportSettings): Promise<void> | void;
}

const earlier = (a: ClockTime | null, b: ClockTime | null) => {
  if (a === null) return b;
  if (b === null) return a;
  return timeStringToSeconds(b) < timeStringToSeconds(a) ? b : a;
};

const later = (a: ClockTime | null, b: ClockTime | null) => {
  if (a === null) return b;
  if (b === null) return a;
  return timeStringToSeconds(b) > timeStringToSeconds(a) ? b : a;
};

/** One entry per date: earliest check-in and latest check-out across duplicate rows. */
export const mergeDailyPunches = (rows: readonly RawAttendanceRow[]): DayPunches[] => {
  const byDate = new Map<DateKey, DayPunches>();
  rows.forEach((row) => {
    const existing = byDate.get(row.date);
    byDate.set(
      row.date,
      existing
        ? { date: row.date, checkIn: earlier(existing.checkIn, row.checkIn), checkOut: later(existing.checkOut, row.checkOut) }
        : { date: row.date, checkIn: row.checkIn, checkOut: row.checkOut },
    );
  });
  return Array.from(byDate.values()).sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : 0));
};

export const groupRowsByEmployee = (rows: readonly RawAttendanceRow[], year: number, month: number) => {
  const grouped = new Map<string, RawAttendanceRow[]>();
  rows.forEach((row) => {
    const period = splitDateKey(row.date);
    if (period.year !== year || period.month !== month) return;
    const list = grouped.get(row.employeeName) ?? [];
    list.push(row);
    grouped.set(row.employeeName, list);
  });
  return grouped;
};

export const buildStaffAttendance = ({
  staff,
  rows,
  year,
  month,
  holidays,
  timeRule,
  threshold,
}: {
  staff: Staff;
  rows: readonly RawAttendanceRow[];
  year: number;
  month: number;
  holidays: ReadonlySet<DateKey>;
  timeRule: ResolvedTimeRule;
  threshold: number;
}): MonthlyAttendance => {
  const records = mergeDailyPunches(rows)
    .filter((day) => isWorkDay(staff, day.date, holidays))
    .map((day) => classifyDay(staff.staffType, day, timeRule));
  return calculateMonthlyAttendance({ staff, records, year, month, holidays, threshold });
};

export const buildAttendanceReport = ({
  sheets,
  sourceFileName,
  directory,
  settings,
  logger = silentLogger,
  now,
}: ReportRequest): AttendanceReport => {
  const seededYear = tryParseReportFilename(sourceFileName)?.year ?? null;
  logger.info(`Parsing ${sheets.length} sheet(s) from ${sourceFileName || "uploaded workbook"}`);

  const { rows, warnings } = extractWorkbookRows(sheets, { year: seededYear, now });
  warnings.forEach((warning) => logger.warn(`Skipped row ${warning.row} of "${warning.sheet}": ${warning.reason}`));

  const first = rows[0];
  if (!first) throw new EmptyResultError("no_data");

  // The first parsed row decides the reporting period.
  const { year, month } = splitDateKey(first.date);
  logger.info(`Reporting period ${year}-${String(month).padStart(2, "0")}, ${rows.length} raw row(s)`);

  // Never empty: the first row is always in its own period.
  const rowsByEmployee = groupRowsByEmployee(rows, year, month);

  const holidays = parseHolidayDates(settings.holidays);
  const timeRules = {
    internal: resolveTimeRule(settings.timeRules.internal),
    external: resolveTimeRule(settings.timeRules.external),
  };

  const internal: MonthlyAttendance[] = [];
  const external: MonthlyAttendance[] = [];
  const unclassifiedNames: string[] = [];

  rowsByEmployee.forEach((employeeRows, name) => {
    const staff = directory.lookup(name);
    if (!staff) {
      unclassifiedNames.push(name);
      return;
    }
    const monthly = buildStaffAttendance({
      staff,
      rows: employeeRows,
      year,
      month,
      holidays,
      timeRule: timeRules[staff.staffType],
      threshold: settings.rateThreshold,
    });
    (staff.staffType === "internal" ? internal : external).push(monthly);
  });

  if (internal.length === 0 && external.length === 0) {
    throw unclassifiedNames.length > 0
      ? new EmptyResultError("all_unclassified", { unclassifiedNames })
      : new EmptyResultError("no_data");
  }
  const [firstUnclassified] = unclassifiedNames;
  if (firstUnclassified !== undefined) {
    throw new UnclassifiedStaffError(firstUnclassified, unclassifiedNames);
  }

  logger.info(`Processed ${internal.length} internal and ${external.length} external staff`);

  return {
    year,
    month,
    internal: sortAttendanceList(internal, settings.sortBy),
    external: sortAttendanceList(external, settings.sortBy),
    holidays: Array.from(holidays).sort(),
    stats: calculateMonthlyStats(year, month, holidays, internal.length, external.length),
    warnings,
  };
};

export const generateReport = async (request: ReportRequest, renderers: readonly ReportRenderer[] = []) => {
  const report = buildAttendanceReport(request);
  for (const renderer of renderers) {
    await renderer.render(report, request.settings);
  }
  return report;
};
