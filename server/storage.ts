import { appendFile, mkdir, readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import * as XLSX from "xlsx";
import type { RosterEntry } from "@shared/schema";
import { staffTypeLabel } from "@shared/staff-type";
import { parseRosterRows, type RosterStore } from "./engine/staffDirectory";
import { toCellValue } from "./importers/attendanceWorkbook";

const BOM = "\uFEFF";
const ROSTER_HEADER: [string, string] = ["Name", "Type"];

const isMissingFile = (error: unknown) => error instanceof Error && "code" in error && error.code === "ENOENT";

const readTextIfExists = async (filePath: string) => {
  try {
    return await readFile(filePath, "utf8");
  } catch (error) {
    if (isMissingFile(error)) return null;
    throw error;
  }
};

const toCsvLine = (cells: string[]) => XLSX.utils.sheet_to_csv(XLSX.utils.aoa_to_sheet([cells]));

export const parseRosterCsv = (text: string): RosterEntry[] => {
  const content = text.startsWith(BOM) ? text.slice(BOM.length) : text;
  if (!content.trim()) return [];
  const workbook = XLSX.read(content, { type: "string", raw: true });
  const sheetName = workbook.SheetNames[0];
  const worksheet = sheetName ? workbook.Sheets[sheetName] : undefined;
  if (!worksheet) return [];
  const rows = XLSX.utils.sheet_to_json<unknown[]>(worksheet, { header: 1, defval: null, raw: true });
  return parseRosterRows(rows.map((row) => (Array.isArray(row) ? row.map(toCellValue) : [])));
};

/** Roster kept as a UTF-8 CSV (`Name,Type`), the format spreadsheet tools export. */
export class CsvRosterStore implements RosterStore {
  constructor(private readonly filePath: string) {}

  async loadRoster(): Promise<RosterEntry[]> {
    const text = await readTextIfExists(this.filePath);
    return text === null ? [] : parseRosterCsv(text);
  }

  async appendRosterEntry(entry: RosterEntry): Promise<void> {
    const existing = await readTextIfExists(this.filePath);
    const line = toCsvLine([entry.name, staffTypeLabel(entry.staffType)]);

    if (existing === null || !existing.replace(BOM, "").trim()) {
      await mkdir(path.dirname(this.filePath), { recursive: true });
      await writeFile(this.filePath, `${BOM}${toCsvLine(ROSTER_HEADER)}\n${line}\n`, "utf8");
      return;
    }

    const separator = existing.endsWith("\n") ? "" : "\n";
    await appendFile(this.filePath, `${separator}${line}\n`, "utf8");
  }
}

export class MemRosterStore implements RosterStore {
  readonly entries: RosterEntry[];

  constructor(entries: RosterEntry[] = []) {
    this.entries = [...entries];
  }

  async loadRoster(): Promise<RosterEntry[]> {
    return [...this.entries];
  }

  async appendRosterEntry(entry: RosterEntry): Promise<void> {
    this.entries.push(entry);
  }
}
