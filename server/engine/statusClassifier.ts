import {
  DELAYED_CHECKOUT_REMARK,
  type AttendanceRecord,
  type AttendanceStatus,
  type ClockTime,
  type ColorLogic,
  type ColorName,
  type DateKey,
  type StaffType,
} from "@shared/schema";
import { timeStringToSeconds, type ResolvedTimeRule } from "@shared/time-of-day";

export type DayPunches = {
  date: DateKey;
  checkIn: ClockTime | null;
  checkOut: ClockTime | null;
};

type PunchSeconds = {
  checkIn: number | null;
  checkOut: number | null;
};

type StatusRule = {
  determineStatus: (punches: PunchSeconds, rule: ResolvedTimeRule) => AttendanceStatus;
  isLateCheckIn: (checkIn: number, rule: ResolvedTimeRule) => boolean;
  isEarlyCheckOut: (checkOut: number, rule: ResolvedTimeRule) => boolean;
};

const toSeconds = (value: ClockTime | null) => (value === null ? null : timeStringToSeconds(value));

const lateAfterInEnd = (checkIn: number, rule: ResolvedTimeRule) => checkIn > rule.inEnd;
const earlyBeforeOutStart = (checkOut: number, rule: ResolvedTimeRule) => checkOut < rule.outStart;

/** Internal staff: late after in-end, early before out-start, both at once is abnormal. */
const internalRule: StatusRule = {
  determineStatus: ({ checkIn, checkOut }, rule) => {
    const isLate = checkIn !== null && lateAfterInEnd(checkIn, rule);
    const isEarly = checkOut !== null && earlyBeforeOutStart(checkOut, rule);
    if (isLate && isEarly) return "abnormal";
    if (isLate) return "late";
    if (isEarly) return "early_leave";
    return "normal";
  },
  isLateCheckIn: lateAfterInEnd,
  isEarlyCheckOut: earlyBeforeOutStart,
};

/**
 * External field staff: only the check-in is judged. A check-out after noon is a
 * normal day (it only earns the delayed-checkout remark).
 */
const externalRule: StatusRule = {
  determineStatus: ({ checkIn }, rule) => (checkIn !== null && lateAfterInEnd(checkIn, rule) ? "late" : "normal"),
  isLateCheckIn: lateAfterInEnd,
  isEarlyCheckOut: () => false,
};

export const STATUS_RULES: Record<StaffType, StatusRule> = {
  internal: internalRule,
  external: externalRule,
};

const hasNoPunch = (punches: PunchSeconds) => punches.checkIn === null && punches.checkOut === null;

export const determineStatus = (staffType: StaffType, punches: DayPunches, rule: ResolvedTimeRule): AttendanceStatus => {
  const seconds = { checkIn: toSeconds(punches.checkIn), checkOut: toSeconds(punches.checkOut) };
  if (hasNoPunch(seconds)) return "absent";
  return STATUS_RULES[staffType].determineStatus(seconds, rule);
};

/** Same for both regimes: a check-out after out-end is a delayed checkout. */
export const getRemark = (punches: DayPunches, rule: ResolvedTimeRule) => {
  const checkOut = toSeconds(punches.checkOut);
  return checkOut !== null && checkOut > rule.outEnd ? DELAYED_CHECKOUT_REMARK : "";
};

export const classifyDay = (staffType: StaffType, punches: DayPunches, rule: ResolvedTimeRule): AttendanceRecord => ({
  date: punches.date,
  checkIn: punches.checkIn,
  checkOut: punches.checkOut,
  status: determineStatus(staffType, punches, rule),
  remark: getRemark(punches, rule),
});

export type CellEmphasis = {
  color: Exclude<ColorName, "none"> | null;
  text: string | null;
};

const toColor = (value: ColorName): CellEmphasis["color"] => (value === "none" ? null : value);

/** In/out cell colouring for renderers. Pure; the record is left as it is. */
export const getCellEmphasis = (
  staffType: StaffType,
  record: AttendanceRecord,
  rule: ResolvedTimeRule,
  colors: ColorLogic,
): { checkIn: CellEmphasis; checkOut: CellEmphasis } => {
  if (record.status === "absent") {
    const absent = { color: toColor(colors.absentColor), text: colors.absentText };
    return { checkIn: absent, checkOut: absent };
  }

  const strategy = STATUS_RULES[staffType];
  const missing = { color: toColor(colors.missingPunchColor), text: colors.missingPunchText };
  const checkIn = toSeconds(record.checkIn);
  const checkOut = toSeconds(record.checkOut);

  return {
    checkIn:
      checkIn === null
        ? missing
        : {
            color: toColor(strategy.isLateCheckIn(checkIn, rule) ? colors.abnormalInColor : colors.normalInColor),
            text: null,
          },
    checkOut:
      checkOut === null
        ? missing
        : {
            color: toColor(strategy.isEarlyCheckOut(checkOut, rule) ? colors.abnormalOutColor : colors.normalOutColor),
            text: null,
          },
  };
};
