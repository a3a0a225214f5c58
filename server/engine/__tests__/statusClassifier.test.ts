import { describe, expect, it } from "vitest";
import { colorLogicSchema, externalTimeRuleSchema, timeRuleSchema } from "@shared/schema";
import { resolveTimeRule } from "@shared/time-of-day";
import { classifyDay, determineStatus, getCellEmphasis, getRemark } from "@/engine/statusClassifier";

const internalRule = resolveTimeRule(timeRuleSchema.parse({}));
const externalRule = resolveTimeRule(externalTimeRuleSchema.parse({}));
const colors = colorLogicSchema.parse({});

const day = (checkIn: string | null, checkOut: string | null) => ({ date: "2025-12-01", checkIn, checkOut });

describe("internal staff", () => {
  it("marks a check-in after 09:30 as late", () => {
    expect(determineStatus("internal", day("09:31:00", "18:05:00"), internalRule)).toBe("late");
  });

  it("treats the in-end boundary itself as on time", () => {
    expect(determineStatus("internal", day("09:30:00", "18:00:00"), internalRule)).toBe("normal");
  });

  it("marks a check-out before 18:00 as early leave", () => {
    expect(determineStatus("internal", day("09:00:00", "17:59:00"), internalRule)).toBe("early_leave");
    expect(determineStatus("internal", day(null, "17:00:00"), internalRule)).toBe("early_leave");
  });

  it("marks late and early on the same day as abnormal", () => {
    expect(determineStatus("internal", day("09:31:00", "17:00:00"), internalRule)).toBe("abnormal");
  });

  it("does not penalize a missing check-out", () => {
    expect(determineStatus("internal", day("09:00:00", null), internalRule)).toBe("normal");
  });
});

describe("external staff", () => {
  it("judges only the check-in", () => {
    const record = classifyDay("external", day("10:05:00", "13:00:00"), externalRule);
    expect(record).toEqual({
      date: "2025-12-01",
      checkIn: "10:05:00",
      checkOut: "13:00:00",
      status: "late",
      remark: "下班延遲打卡",
    });
  });

  it("never reports an early leave", () => {
    expect(determineStatus("external", day("09:50:00", "10:00:00"), externalRule)).toBe("normal");
  });
});

describe("absence and remarks", () => {
  it("is absent without any punch under both regimes", () => {
    expect(determineStatus("internal", day(null, null), internalRule)).toBe("absent");
    expect(determineStatus("external", day(null, null), externalRule)).toBe("absent");
  });

  it("adds the delayed-checkout remark only after out-end", () => {
    expect(getRemark(day("09:00:00", "18:30:00"), internalRule)).toBe("");
    expect(getRemark(day("09:00:00", "18:31:00"), internalRule)).toBe("下班延遲打卡");
    expect(getRemark(day("09:00:00", null), internalRule)).toBe("");
  });
});

describe("getCellEmphasis", () => {
  it("colours late check-ins and marks missing punches", () => {
    const record = classifyDay("internal", day("09:45:00", null), internalRule);
    expect(getCellEmphasis("internal", record, internalRule, colors)).toEqual({
      checkIn: { color: "red", text: null },
      checkOut: { color: "black", text: "*" },
    });
  });

  it("keeps external check-outs in the normal colour", () => {
    const record = classifyDay("external", day("09:40:00", "10:00:00"), externalRule);
    expect(getCellEmphasis("external", record, externalRule, colors)).toEqual({
      checkIn: { color: "green", text: null },
      checkOut: { color: "green", text: null },
    });
  });

  it("fills both cells of an absent day with the absent text", () => {
    const record = classifyDay("internal", day(null, null), internalRule);
    expect(getCellEmphasis("internal", record, internalRule, colors)).toEqual({
      checkIn: { color: null, text: "-" },
      checkOut: { color: null, text: "-" },
    });
  });
});
