export type ReportPeriod = {
  year: number;
  month: number;
};

// MonRep + yy + mm + dd, e.g. MonRep251201_00000_00200.xlsx
const REPORT_FILENAME_PATTERN = /^MonRep(\d{2})(\d{2})(\d{2})/;

const baseName = (value: string) => value.split(/[\\/]/).pop() ?? "";

export const parseReportFilename = (filename: string): ReportPeriod => {
  const name = baseName(filename.trim());
  const match = REPORT_FILENAME_PATTERN.exec(name);
  if (!match) {
    throw new Error(`Invalid report filename: ${name}. Expected MonRepyymmdd`);
  }
  const year = 2000 + Number(match[1]);
  const month = Number(match[2]);
  if (month < 1 || month > 12) {
    throw new Error(`Invalid month in report filename: ${month}`);
  }
  return { year, month };
};

export const tryParseReportFilename = (filename: string | null | undefined): ReportPeriod | null => {
  if (!filename) return null;
  try {
    return parseReportFilename(filename);
  } catch {
    return null;
  }
};
