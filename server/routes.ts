import type { Express, Response } from "express";
import type { Server } from "http";
import { z } from "zod";
import { api } from "@shared/routes";
import { loadReportSettings } from "./config";
import { EmptyResultError, FormatError, RosterFormatError, UnclassifiedStaffError } from "./engine/errors";
import { buildAttendanceReport } from "./engine/reportOrchestrator";
import { buildReportView } from "./engine/reportView";
import { listSheetEmployeeNames } from "./engine/rowExtractor";
import { StaffDirectory, type RosterStore } from "./engine/staffDirectory";
import { readAttendanceWorkbook, readSheetTitles } from "./importers/attendanceWorkbook";
import type { Logger } from "./log";

export type RouteDeps = {
  rosterStore: RosterStore;
  settingsPath: string;
  logger: Logger;
};

/** Maps domain failures onto status codes; returns false for anything it does not recognise. */
export const sendKnownError = (res: Response, err: unknown) => {
  if (err instanceof z.ZodError) {
    const issue = err.errors[0];
    res.status(400).json({
      message: issue?.message ?? "Invalid input",
      field: issue?.path.join("."),
    });
    return true;
  }
  if (err instanceof UnclassifiedStaffError) {
    res.status(409).json({
      message: err.message,
      employeeName: err.employeeName,
      unclassifiedNames: err.unclassifiedNames,
    });
    return true;
  }
  if (err instanceof FormatError) {
    res.status(422).json({ message: err.message, missingMarkers: err.missingMarkers });
    return true;
  }
  if (err instanceof EmptyResultError) {
    res.status(422).json({ message: err.message, reason: err.reason });
    return true;
  }
  if (err instanceof RosterFormatError) {
    res.status(422).json({ message: err.message });
    return true;
  }
  return false;
};

export async function registerRoutes(httpServer: Server, app: Express, deps: RouteDeps): Promise<Server> {
  const { rosterStore, settingsPath, logger } = deps;

  // Reports
  app.post(api.reports.generate.path, async (req, res, next) => {
    try {
      const input = api.reports.generate.input.parse(req.body);
      const settings = input.settings ?? (await loadReportSettings(settingsPath, logger));
      const directory = await StaffDirectory.load(rosterStore);
      const report = buildAttendanceReport({
        sheets: readAttendanceWorkbook(Buffer.from(input.contentBase64, "base64")),
        sourceFileName: input.fileName,
        directory,
        settings,
        logger,
      });
      res.json(buildReportView(report, settings));
    } catch (err) {
      if (sendKnownError(res, err)) return;
      next(err);
    }
  });

  // Employee names carried by per-person sheet titles, for seeding the roster.
  app.post(api.reports.names.path, async (req, res, next) => {
    try {
      const input = api.reports.names.input.parse(req.body);
      const titles = readSheetTitles(Buffer.from(input.contentBase64, "base64"));
      res.json({ names: listSheetEmployeeNames(titles) });
    } catch (err) {
      if (sendKnownError(res, err)) return;
      next(err);
    }
  });

  // Staff roster
  app.get(api.staff.list.path, async (_req, res, next) => {
    try {
      const directory = await StaffDirectory.load(rosterStore);
      res.json(directory.all());
    } catch (err) {
      if (sendKnownError(res, err)) return;
      next(err);
    }
  });

  app.get(api.staff.get.path, async (req, res, next) => {
    try {
      const directory = await StaffDirectory.load(rosterStore);
      const staff = directory.lookup(req.params.name ?? "");
      if (!staff) {
        res.status(404).json({ message: "Staff member not found" });
        return;
      }
      res.json(staff);
    } catch (err) {
      if (sendKnownError(res, err)) return;
      next(err);
    }
  });

  app.post(api.staff.create.path, async (req, res, next) => {
    try {
      const input = api.staff.create.input.parse(req.body);
      const directory = await StaffDirectory.load(rosterStore);
      const staff = await directory.append(rosterStore, input);
      logger.info(`Added ${staff.name} to the roster as ${staff.staffType}`);
      res.status(201).json(staff);
    } catch (err) {
      if (sendKnownError(res, err)) return;
      next(err);
    }
  });

  return httpServer;
}
