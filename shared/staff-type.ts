import type { StaffType } from "./schema";

export const ROSTER_NAME_HEADERS = ["name", "姓名", "員工姓名"] as const;
export const ROSTER_TYPE_HEADERS = ["type", "類型", "類別"] as const;

const STAFF_TYPE_LABELS: Record<string, StaffType> = {
  "內勤": "internal",
  "内勤": "internal",
  internal: "internal",
  "外勤": "external",
  external: "external",
};

const normalizeLabel = (value: unknown) =>
  String(value ?? "")
    .replace(/\s+/g, " ")
    .trim()
    .toLowerCase();

export const normalizeStaffType = (value: unknown): StaffType => STAFF_TYPE_LABELS[normalizeLabel(value)] ?? "internal";

export const staffTypeLabel = (staffType: StaffType) => (staffType === "external" ? "外勤" : "內勤");

export const isRosterNameHeader = (value: unknown) =>
  (ROSTER_NAME_HEADERS as readonly string[]).includes(normalizeLabel(value));

export const isRosterTypeHeader = (value: unknown) =>
  (ROSTER_TYPE_HEADERS as readonly string[]).includes(normalizeLabel(value));
