/** The sheet cannot be read as an attendance export: a mandatory punch column is missing. */
export class FormatError extends Error {
  readonly sheet: string;
  readonly missingMarkers: string[];

  constructor(sheet: string, missingMarkers: string[]) {
    super(`Sheet "${sheet}" is missing the required column marker(s): ${missingMarkers.join(", ")}`);
    this.name = "FormatError";
    this.sheet = sheet;
    this.missingMarkers = missingMarkers;
  }
}

export class RosterFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RosterFormatError";
  }
}

export class UnclassifiedStaffError extends Error {
  readonly employeeName: string;
  readonly unclassifiedNames: string[];

  constructor(employeeName: string, unclassifiedNames: string[] = [employeeName]) {
    super(`Employee "${employeeName}" is not in the staff roster. Add them to the roster before generating the report.`);
    this.name = "UnclassifiedStaffError";
    this.employeeName = employeeName;
    this.unclassifiedNames = unclassifiedNames;
  }
}

export type EmptyResultReason = "no_data" | "all_unclassified";

const emptyResultMessage = (reason: EmptyResultReason, unclassifiedNames: string[]) => {
  if (reason === "all_unclassified") {
    return `All ${unclassifiedNames.length} employee(s) in the source are missing from the staff roster; nothing to report.`;
  }
  return "The source contains no attendance data to process.";
};

export class EmptyResultError extends Error {
  readonly reason: EmptyResultReason;
  readonly unclassifiedNames: string[];

  constructor(reason: EmptyResultReason, opts?: { unclassifiedNames?: string[] }) {
    const unclassifiedNames = opts?.unclassifiedNames ?? [];
    super(emptyResultMessage(reason, unclassifiedNames));
    this.name = "EmptyResultError";
    this.reason = reason;
    this.unclassifiedNames = unclassifiedNames;
  }
}
