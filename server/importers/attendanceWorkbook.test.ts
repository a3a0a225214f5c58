import * as XLSX from "xlsx";
import { describe, expect, it } from "vitest";
import { reportSettingsSchema } from "@shared/schema";
import { buildAttendanceReport } from "../engine/reportOrchestrator";
import { StaffDirectory } from "../engine/staffDirectory";
import { readAttendanceWorkbook, readSheetTitles, toCellValue } from "./attendanceWorkbook";

const buildWorkbook = (sheets: Record<string, (string | number | null)[][]>): Buffer => {
  const workbook = XLSX.utils.book_new();
  Object.entries(sheets).forEach(([name, rows]) => {
    XLSX.utils.book_append_sheet(workbook, XLSX.utils.aoa_to_sheet(rows), name);
  });
  return XLSX.write(workbook, { type: "buffer", bookType: "xlsx" });
};

describe("toCellValue", () => {
  it("keeps primitive cells and stringifies anything else", () => {
    expect(toCellValue(undefined)).toBeNull();
    expect(toCellValue("09:00")).toBe("09:00");
    expect(toCellValue(3)).toBe(3);
    expect(toCellValue({ toString: () => "obj" })).toBe("obj");
  });
});

describe("readAttendanceWorkbook", () => {
  it("returns one grid per worksheet with blank cells as null", () => {
    const data = buildWorkbook({
      Data: [
        ["姓名", "日期", "上班", "下班"],
        ["Alice", "2025-12-01", "09:00", null],
      ],
      王小明: [[null, null, null, "上班", "下班"]],
    });

    const grids = readAttendanceWorkbook(data);

    expect(grids.map((grid) => grid.title)).toEqual(["Data", "王小明"]);
    expect(grids[0]?.rows[1]).toEqual(["Alice", "2025-12-01", "09:00", null]);
    expect(readSheetTitles(data)).toEqual(["Data", "王小明"]);
  });

  it("feeds the report pipeline end to end", () => {
    const data = buildWorkbook({
      Data: [
        ["姓名", "日期", "上班", "下班"],
        ["Alice", "2025-12-01", "09:00", "18:00"],
        ["Alice", "2025-12-02", "09:45", "17:30"],
      ],
    });

    const report = buildAttendanceReport({
      sheets: readAttendanceWorkbook(data),
      sourceFileName: "MonRep251201_00000_00200.xlsx",
      directory: new StaffDirectory([{ name: "Alice", staffType: "internal" }]),
      settings: reportSettingsSchema.parse({}),
    });

    expect(report.internal[0]?.records.map((entry) => entry.status)).toEqual(["normal", "abnormal"]);
    expect(report.internal[0]?.actualDays).toBe(2);
  });
});
