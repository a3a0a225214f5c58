import { readFile } from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { reportSettingsSchema, type ReportSettings } from "@shared/schema";
import { silentLogger, type Logger } from "./log";

export const DEFAULT_PORT = 5000;

const serverEnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(DEFAULT_PORT),
  ROSTER_PATH: z.string().min(1).default("data/staff.csv"),
  SETTINGS_PATH: z.string().min(1).default("data/settings.json"),
});

export type ServerConfig = {
  port: number;
  rosterPath: string;
  settingsPath: string;
};

export const loadServerConfig = (env: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()): ServerConfig => {
  const parsed = serverEnvSchema.parse(env);
  return {
    port: parsed.PORT,
    rosterPath: path.resolve(cwd, parsed.ROSTER_PATH),
    settingsPath: path.resolve(cwd, parsed.SETTINGS_PATH),
  };
};

export const defaultReportSettings = (): ReportSettings => reportSettingsSchema.parse({});

/** Falls back to defaults on an invalid document rather than failing the run. */
export const parseReportSettings = (input: unknown, logger: Logger = silentLogger): ReportSettings => {
  const result = reportSettingsSchema.safeParse(input ?? {});
  if (result.success) return result.data;
  const issue = result.error.errors[0];
  logger.warn(`Invalid report settings (${issue?.path.join(".") || "root"}: ${issue?.message}); using defaults`);
  return defaultReportSettings();
};

export const loadReportSettings = async (filePath: string, logger: Logger = silentLogger): Promise<ReportSettings> => {
  let text: string;
  try {
    text = await readFile(filePath, "utf8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") return defaultReportSettings();
    throw error;
  }

  try {
    return parseReportSettings(JSON.parse(text), logger);
  } catch (error) {
    if (!(error instanceof SyntaxError)) throw error;
    logger.warn(`Could not parse ${filePath}: ${error.message}; using defaults`);
    return defaultReportSettings();
  }
};
