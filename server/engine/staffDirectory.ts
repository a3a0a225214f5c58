import type { RosterEntry, Staff, StaffType } from "@shared/schema";
import { isRosterNameHeader, isRosterTypeHeader, normalizeStaffType } from "@shared/staff-type";
import { RosterFormatError } from "./errors";
import type { CellValue } from "./rowExtractor";

// ISO weekdays: internal staff Mon-Fri, external field staff Mon/Wed/Fri.
export const DEFAULT_WORK_WEEKDAYS: Record<StaffType, readonly number[]> = {
  internal: [1, 2, 3, 4, 5],
  external: [1, 3, 5],
};

export const createStaff = (name: string, staffType: StaffType, workWeekdays?: readonly number[]): Staff => {
  const weekdays = (workWeekdays ?? []).filter((day) => Number.isInteger(day) && day >= 1 && day <= 7);
  const unique = Array.from(new Set(weekdays)).sort((a, b) => a - b);
  return {
    name,
    staffType,
    workWeekdays: unique.length > 0 ? unique : DEFAULT_WORK_WEEKDAYS[staffType],
  };
};

const cellText = (value: CellValue | undefined) => (value === null || value === undefined ? "" : String(value).trim());

/**
 * Reads roster rows (first row is the header). Rows without a name are skipped,
 * unknown type labels count as internal.
 */
export const parseRosterRows = (rows: readonly CellValue[][]): RosterEntry[] => {
  if (rows.length === 0) return [];
  const header = rows[0] ?? [];
  const nameColumn = header.findIndex((cell) => isRosterNameHeader(cell));
  const typeColumn = header.findIndex((cell) => isRosterTypeHeader(cell));
  if (nameColumn < 0) {
    throw new RosterFormatError("Staff roster has no name column (expected Name, 姓名 or 員工姓名)");
  }

  const entries: RosterEntry[] = [];
  rows.slice(1).forEach((row) => {
    const name = cellText(row[nameColumn]);
    if (!name) return;
    entries.push({ name, staffType: normalizeStaffType(typeColumn >= 0 ? row[typeColumn] : "") });
  });
  return entries;
};

export interface RosterStore {
  loadRoster(): Promise<RosterEntry[]>;
  appendRosterEntry(entry: RosterEntry): Promise<void>;
}

export class StaffDirectory {
  private readonly staffByName = new Map<string, Staff>();

  constructor(entries: readonly RosterEntry[] = []) {
    entries.forEach((entry) => this.index(entry));
  }

  static async load(store: RosterStore) {
    return new StaffDirectory(await store.loadRoster());
  }

  lookup(name: string): Staff | null {
    return this.staffByName.get(name.trim()) ?? null;
  }

  all(): Staff[] {
    return Array.from(this.staffByName.values());
  }

  /** Persists the entry to the backing roster, then indexes it. */
  async append(store: RosterStore, entry: RosterEntry): Promise<Staff> {
    const normalized = { name: entry.name.trim(), staffType: entry.staffType };
    await store.appendRosterEntry(normalized);
    return this.index(normalized);
  }

  private index(entry: RosterEntry) {
    const name = entry.name.trim();
    const staff = createStaff(name, entry.staffType);
    // Re-inserting keeps insertion order at the latest entry for a repeated name.
    this.staffByName.delete(name);
    this.staffByName.set(name, staff);
    return staff;
  }
}
