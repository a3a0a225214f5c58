import * as XLSX from "xlsx";
import type { CellValue, SheetGrid } from "../engine/rowExtractor";

export const toCellValue = (value: unknown): CellValue => {
  if (value === null || value === undefined) return null;
  if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") return value;
  if (value instanceof Date) return value;
  return String(value);
};

export const worksheetToGrid = (title: string, worksheet: XLSX.WorkSheet): SheetGrid => {
  const rows = XLSX.utils.sheet_to_json<unknown[]>(worksheet, {
    header: 1,
    defval: null,
    raw: true,
    blankrows: true,
  });
  return {
    title,
    rows: rows.map((row) => (Array.isArray(row) ? row.map(toCellValue) : [])),
  };
};

export const workbookToGrids = (workbook: XLSX.WorkBook): SheetGrid[] =>
  workbook.SheetNames.flatMap((name) => {
    const worksheet = workbook.Sheets[name];
    return worksheet ? [worksheetToGrid(name, worksheet)] : [];
  });

/** Every worksheet of an .xlsx/.xls/.csv export; date-formatted cells arrive as Date values. */
export const readAttendanceWorkbook = (data: Uint8Array): SheetGrid[] =>
  workbookToGrids(XLSX.read(data, { type: "buffer", cellDates: true }));

export const readSheetTitles = (data: Uint8Array) => XLSX.read(data, { type: "buffer", bookSheets: true }).SheetNames;
