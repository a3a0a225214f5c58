import { format, isValid, parse } from "date-fns";
import { formatDateKey, isValidDateKey, toDateKey } from "@shared/calendar";
import type { ClockTime, DateKey, RawAttendanceRow } from "@shared/schema";
import { FormatError } from "./errors";

export type CellValue = string | number | boolean | Date | null;

export type SheetGrid = {
  title: string;
  rows: CellValue[][];
};

export type ExtractionWarning = {
  sheet: string;
  /** 1-based, as the spreadsheet shows it. */
  row: number;
  reason: string;
};

export type ExtractionResult = {
  rows: RawAttendanceRow[];
  warnings: ExtractionWarning[];
};

export type ExtractOptions = {
  /** Year for short `MM/DD` dates. Defaults to the current year of `now`. */
  year?: number | null;
  now?: Date;
};

export const HEADER_SEARCH_ROWS = 15;
export const HEADER_SEARCH_COLUMNS = 15;
export const NAME_HEADER_KEYWORDS = ["name", "姓名", "員工"] as const;
export const DATE_HEADER_KEYWORDS = ["date", "日期"] as const;
export const CHECK_IN_MARKER = "上班";
export const CHECK_OUT_MARKER = "下班";

// Column B / column C of the attendance export when the sheet has no name/date header.
export const FALLBACK_NAME_COLUMN = 1;
export const FALLBACK_DATE_COLUMN = 2;

const NON_PERSON_SHEET_KEYWORDS = ["sheet", "summary", "匯總", "總表", "說明", "出勤", "統計", "彙整", "工作表", "報表", "封面"];

const NAME_ANNOTATION = /\[[^\]]*\]|【[^】]*】/g;
const TITLE_FILLER = /[\s\-－—_]+$/;
const WEEKDAY_ANNOTATION = /\s*[(（][\s*]*[一二三四五六日月火水木金土][\s*]*[)）]/g;
const SHORT_DATE = /^(\d{1,2})\/(\d{1,2})$/;
// date-fns `yyyy` also takes 1-3 digit years, so each format is gated on a 4-digit year.
const FULL_DATE_FORMATS = [
  { shape: /^\d{4}-\d{1,2}-\d{1,2}$/, pattern: "yyyy-M-d" },
  { shape: /^\d{4}\/\d{1,2}\/\d{1,2}$/, pattern: "yyyy/M/d" },
  { shape: /^\d{1,2}\/\d{1,2}\/\d{4}$/, pattern: "d/M/yyyy" },
  { shape: /^\d{1,2}\/\d{1,2}\/\d{4}$/, pattern: "M/d/yyyy" },
] as const;
const TIME_FORMATS = ["HH:mm:ss", "HH:mm", "hh:mm a", "hh:mm:ss a"] as const;
const REFERENCE_DAY = new Date(2000, 0, 1);

export const cleanEmployeeName = (value: string) => value.replace(NAME_ANNOTATION, "").trim();

/** Employee name carried by a per-employee sheet title, or null for summary/system sheets. */
export const sheetTitleName = (title: string) => {
  const lower = title.toLowerCase();
  if (NON_PERSON_SHEET_KEYWORDS.some((keyword) => lower.includes(keyword))) return null;
  const cleaned = cleanEmployeeName(title.replace(TITLE_FILLER, ""));
  return cleaned || null;
};

export const listSheetEmployeeNames = (titles: readonly string[]) => {
  const names = new Set<string>();
  titles.forEach((title) => {
    const name = sheetTitleName(title);
    if (name) names.add(name);
  });
  return Array.from(names).sort();
};

export const parseAttendanceDate = (value: CellValue, year?: number | null, now: Date = new Date()): DateKey | null => {
  if (value instanceof Date) return formatDateKey(value);
  if (typeof value !== "string") return null;

  const text = value.replace(WEEKDAY_ANNOTATION, "").trim();
  if (!text) return null;

  const short = SHORT_DATE.exec(text);
  if (short) {
    const key = toDateKey(year ?? now.getFullYear(), Number(short[1]), Number(short[2]));
    return isValidDateKey(key) ? key : null;
  }

  for (const { shape, pattern } of FULL_DATE_FORMATS) {
    if (!shape.test(text)) continue;
    const parsed = parse(text, pattern, now);
    if (isValid(parsed)) return formatDateKey(parsed);
  }
  return null;
};

export const parseClockTime = (value: CellValue): ClockTime | null => {
  if (value instanceof Date) return isValid(value) ? format(value, "HH:mm:ss") : null;
  if (typeof value !== "string") return null;

  const text = value.replace(/\*/g, "").trim();
  if (!text) return null;

  for (const pattern of TIME_FORMATS) {
    const parsed = parse(text, pattern, REFERENCE_DAY);
    if (isValid(parsed)) return format(parsed, "HH:mm:ss");
  }
  return null;
};

export type ColumnLayout = {
  /** Index of the last header row; data starts below it. */
  headerRow: number;
  nameColumn: number;
  dateColumn: number;
  checkInColumn: number;
  checkOutColumn: number;
  nameFromHeader: boolean;
  dateFromHeader: boolean;
};

type HeaderHit = { row: number; column: number };

export const locateColumns = (grid: SheetGrid): ColumnLayout => {
  const nameHits: HeaderHit[] = [];
  const dateHits: HeaderHit[] = [];
  let exactCheckIn: HeaderHit | null = null;
  let exactCheckOut: HeaderHit | null = null;
  let lastCheckIn: HeaderHit | null = null;
  let lastCheckOut: HeaderHit | null = null;

  const rowLimit = Math.min(HEADER_SEARCH_ROWS, grid.rows.length);
  for (let rowIndex = 0; rowIndex < rowLimit; rowIndex += 1) {
    const row = grid.rows[rowIndex] ?? [];
    const columnLimit = Math.min(HEADER_SEARCH_COLUMNS, row.length);
    for (let columnIndex = 0; columnIndex < columnLimit; columnIndex += 1) {
      const cell = row[columnIndex];
      if (typeof cell !== "string") continue;
      const text = cell.trim();
      if (!text) continue;
      const lower = text.toLowerCase();
      const hit = { row: rowIndex, column: columnIndex };
      if (NAME_HEADER_KEYWORDS.some((keyword) => lower.includes(keyword))) nameHits.push(hit);
      if (DATE_HEADER_KEYWORDS.some((keyword) => lower.includes(keyword))) dateHits.push(hit);
      if (text.includes(CHECK_IN_MARKER)) lastCheckIn = hit;
      if (text.includes(CHECK_OUT_MARKER)) lastCheckOut = hit;
      if (!exactCheckIn && text === CHECK_IN_MARKER) exactCheckIn = hit;
      if (!exactCheckOut && text === CHECK_OUT_MARKER) exactCheckOut = hit;
    }
  }

  // A cell that is exactly the marker wins over captions that merely mention it.
  const checkIn = exactCheckIn ?? lastCheckIn;
  const checkOut = exactCheckOut ?? lastCheckOut;

  if (!checkIn || !checkOut) {
    const missingMarkers = [...(checkIn ? [] : [CHECK_IN_MARKER]), ...(checkOut ? [] : [CHECK_OUT_MARKER])];
    throw new FormatError(grid.title, missingMarkers);
  }

  // Keywords below the punch header are data, not headers.
  const markerRow = Math.max(checkIn.row, checkOut.row);
  const nameHit = nameHits.filter((hit) => hit.row <= markerRow).pop();
  const dateHit = dateHits.filter((hit) => hit.row <= markerRow).pop();

  return {
    headerRow: Math.max(markerRow, nameHit?.row ?? -1, dateHit?.row ?? -1),
    nameColumn: nameHit?.column ?? FALLBACK_NAME_COLUMN,
    dateColumn: dateHit?.column ?? FALLBACK_DATE_COLUMN,
    checkInColumn: checkIn.column,
    checkOutColumn: checkOut.column,
    nameFromHeader: Boolean(nameHit),
    dateFromHeader: Boolean(dateHit),
  };
};

export const extractSheetRows = (grid: SheetGrid, options: ExtractOptions = {}): ExtractionResult => {
  const layout = locateColumns(grid);
  const now = options.now ?? new Date();
  const rows: RawAttendanceRow[] = [];
  const warnings: ExtractionWarning[] = [];

  let currentName = layout.nameFromHeader ? null : sheetTitleName(grid.title);

  for (let rowIndex = layout.headerRow + 1; rowIndex < grid.rows.length; rowIndex += 1) {
    try {
      const row = grid.rows[rowIndex] ?? [];
      const nameCell = row[layout.nameColumn];
      if (typeof nameCell === "string") {
        const cleaned = cleanEmployeeName(nameCell);
        if (cleaned) currentName = cleaned;
      }
      if (!currentName) continue;

      // Footer and summary rows carry no date.
      const date = parseAttendanceDate(row[layout.dateColumn] ?? null, options.year, now);
      if (!date) continue;

      rows.push({
        employeeName: currentName,
        date,
        checkIn: parseClockTime(row[layout.checkInColumn] ?? null),
        checkOut: parseClockTime(row[layout.checkOutColumn] ?? null),
      });
    } catch (error) {
      warnings.push({
        sheet: grid.title,
        row: rowIndex + 1,
        reason: error instanceof Error ? error.message : String(error),
      });
    }
  }

  return { rows, warnings };
};

export const extractWorkbookRows = (sheets: readonly SheetGrid[], options: ExtractOptions = {}): ExtractionResult =>
  sheets.reduce<ExtractionResult>(
    (result, sheet) => {
      const extracted = extractSheetRows(sheet, options);
      return {
        rows: [...result.rows, ...extracted.rows],
        warnings: [...result.warnings, ...extracted.warnings],
      };
    },
    { rows: [], warnings: [] },
  );
