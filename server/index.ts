import express, { type NextFunction, type Request, type Response } from "express";
import { createServer } from "http";
import { loadServerConfig } from "./config";
import { createLogger, log } from "./log";
import { registerRoutes } from "./routes";
import { CsvRosterStore } from "./storage";

const app = express();
const httpServer = createServer(app);

// Workbooks arrive base64-encoded in the JSON body.
app.use(express.json({ limit: "25mb" }));
app.use(express.urlencoded({ extended: false }));

app.use((req, res, next) => {
  const start = Date.now();
  const path = req.path;

  res.on("finish", () => {
    const duration = Date.now() - start;
    if (path.startsWith("/api")) {
      log(`${req.method} ${path} ${res.statusCode} in ${duration}ms`);
    }
  });

  next();
});

async function main() {
  const config = loadServerConfig();
  const logger = createLogger("report");

  await registerRoutes(httpServer, app, {
    rosterStore: new CsvRosterStore(config.rosterPath),
    settingsPath: config.settingsPath,
    logger,
  });

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    logger.error("Unhandled request error", err);
    res.status(500).json({ message: err instanceof Error ? err.message : "Internal Server Error" });
  });

  httpServer.listen({ port: config.port, host: "0.0.0.0" }, () => {
    log(`serving on port ${config.port}`);
  });
}

main().catch((error: unknown) => {
  createLogger("express").error("Failed to start server", error);
  process.exitCode = 1;
});
