import type { MonthlyAttendance, SortKey } from "@shared/schema";
import surnameStrokes from "./data/surname-strokes.json";

const STROKES_BY_CHARACTER = new Map<string, number>(Object.entries(surnameStrokes));

const CJK_START = 0x4e00;
const CJK_END = 0x9fff;

/**
 * Approximate stroke count of a leading character. Common surnames come from the
 * lookup table; other CJK ideographs get a code-point based estimate that only
 * gives a stable order.
 */
export const countStrokes = (character: string) => {
  const known = STROKES_BY_CHARACTER.get(character);
  if (known !== undefined) return known;
  const code = character.codePointAt(0) ?? 0;
  if (code >= CJK_START && code <= CJK_END) return ((code - CJK_START) % 20) + 5;
  return 10;
};

export const nameStrokeKey = (name: string): [number, string] => {
  const first = Array.from(name)[0];
  if (!first) return [0, ""];
  return [countStrokes(first), name];
};

const compareText = (a: string, b: string) => (a < b ? -1 : a > b ? 1 : 0);

export type AttendanceComparator = (a: MonthlyAttendance, b: MonthlyAttendance) => number;

export const ATTENDANCE_COMPARATORS: Record<SortKey, AttendanceComparator> = {
  attendance_rate: (a, b) => b.attendanceRate - a.attendanceRate,
  name_strokes: (a, b) => {
    const [strokesA, nameA] = nameStrokeKey(a.staff.name);
    const [strokesB, nameB] = nameStrokeKey(b.staff.name);
    return strokesA - strokesB || compareText(nameA, nameB);
  },
};

/** Returns a new list; ties keep their input order. */
export const sortAttendanceList = (
  list: readonly MonthlyAttendance[],
  sortBy: SortKey = "attendance_rate",
): MonthlyAttendance[] => [...list].sort(ATTENDANCE_COMPARATORS[sortBy]);
