import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { RosterFormatError } from "./engine/errors";
import { CsvRosterStore, parseRosterCsv } from "./storage";

let workDir: string;

beforeEach(async () => {
  workDir = await mkdtemp(path.join(os.tmpdir(), "roster-"));
});

afterEach(async () => {
  await rm(workDir, { recursive: true, force: true });
});

describe("parseRosterCsv", () => {
  it("reads a BOM-prefixed roster with Chinese headers", () => {
    expect(parseRosterCsv("\uFEFF姓名,類型\n王小明,外勤\n李四,內勤\n")).toEqual([
      { name: "王小明", staffType: "external" },
      { name: "李四", staffType: "internal" },
    ]);
  });

  it("returns no entries for an empty file", () => {
    expect(parseRosterCsv("\uFEFF")).toEqual([]);
  });

  it("rejects a file without a name column", () => {
    expect(() => parseRosterCsv("Department,Type\nSales,外勤\n")).toThrow(RosterFormatError);
  });
});

describe("CsvRosterStore", () => {
  it("treats a missing file as an empty roster", async () => {
    const store = new CsvRosterStore(path.join(workDir, "missing.csv"));
    expect(await store.loadRoster()).toEqual([]);
  });

  it("creates the file with a header on first append", async () => {
    const filePath = path.join(workDir, "nested", "staff.csv");
    const store = new CsvRosterStore(filePath);

    await store.appendRosterEntry({ name: "王小明", staffType: "external" });
    await store.appendRosterEntry({ name: "Alice", staffType: "internal" });

    const text = await readFile(filePath, "utf8");
    expect(text.startsWith("\uFEFFName,Type\n")).toBe(true);
    expect(await store.loadRoster()).toEqual([
      { name: "王小明", staffType: "external" },
      { name: "Alice", staffType: "internal" },
    ]);
  });

  it("appends after an existing line without a trailing newline", async () => {
    const filePath = path.join(workDir, "staff.csv");
    await writeFile(filePath, "Name,Type\nAlice,內勤", "utf8");
    const store = new CsvRosterStore(filePath);

    await store.appendRosterEntry({ name: "Carol", staffType: "external" });

    expect(await store.loadRoster()).toEqual([
      { name: "Alice", staffType: "internal" },
      { name: "Carol", staffType: "external" },
    ]);
  });
});
