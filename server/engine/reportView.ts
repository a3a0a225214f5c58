import type { AttendanceRecord, MonthlyAttendance, ReportSettings } from "@shared/schema";
import { resolveTimeRule } from "@shared/time-of-day";
import { buildRemarkSummary } from "./monthlyRate";
import type { AttendanceReport } from "./reportOrchestrator";
import { getCellEmphasis, type CellEmphasis } from "./statusClassifier";

export type RecordView = AttendanceRecord & {
  checkInEmphasis: CellEmphasis;
  checkOutEmphasis: CellEmphasis;
};

export type StaffReportView = Omit<MonthlyAttendance, "records"> & {
  records: RecordView[];
  remarkSummary: string;
};

export type ReportView = Omit<AttendanceReport, "internal" | "external"> & {
  internal: StaffReportView[];
  external: StaffReportView[];
};

/** What a renderer needs per cell, derived without touching the report itself. */
export const buildReportView = (report: AttendanceReport, settings: ReportSettings): ReportView => {
  const timeRules = {
    internal: resolveTimeRule(settings.timeRules.internal),
    external: resolveTimeRule(settings.timeRules.external),
  };

  const toStaffView = (monthly: MonthlyAttendance): StaffReportView => ({
    ...monthly,
    records: monthly.records.map((record) => {
      const emphasis = getCellEmphasis(
        monthly.staff.staffType,
        record,
        timeRules[monthly.staff.staffType],
        settings.colorLogic,
      );
      return { ...record, checkInEmphasis: emphasis.checkIn, checkOutEmphasis: emphasis.checkOut };
    }),
    remarkSummary: buildRemarkSummary(monthly.records),
  });

  return {
    ...report,
    internal: report.internal.map(toStaffView),
    external: report.external.map(toStaffView),
  };
};
