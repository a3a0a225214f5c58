import type { ClockTime, TimeRule } from "./schema";

export const normalizeTimeToHms = (value: string) => {
  const parts = value.trim().split(":");
  const [rawH = "0", rawM = "0", rawS = "0"] = parts;
  const h = String(Number(rawH)).padStart(2, "0");
  const m = String(Number(rawM)).padStart(2, "0");
  const s = String(Number(rawS)).padStart(2, "0");
  return `${h}:${m}:${s}`;
};

export const timeStringToSeconds = (value: ClockTime) => {
  const normalized = normalizeTimeToHms(value);
  const [h = 0, m = 0, s = 0] = normalized.split(":").map(Number);
  return h * 3600 + m * 60 + s;
};

/**
 * Boundary from a configured `HH:MM` string, in seconds after midnight.
 * Anything that is not a valid `HH:MM` counts as midnight.
 */
export const parseRuleTime = (value: string | null | undefined) => {
  const match = /^(\d{1,2}):(\d{2})$/.exec((value ?? "").trim());
  if (!match) return 0;
  const hours = Number(match[1]);
  const minutes = Number(match[2]);
  if (hours > 23 || minutes > 59) return 0;
  return hours * 3600 + minutes * 60;
};

export type ResolvedTimeRule = {
  inStart: number;
  inEnd: number;
  outStart: number;
  outEnd: number;
};

export const resolveTimeRule = (rule: TimeRule): ResolvedTimeRule => ({
  inStart: parseRuleTime(rule.inStart),
  inEnd: parseRuleTime(rule.inEnd),
  outStart: parseRuleTime(rule.outStart),
  outEnd: parseRuleTime(rule.outEnd),
});
