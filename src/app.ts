import express, { Express, Request, Response, NextFunction } from "express";
import cors from "cors";
import { AppConfig, loadConfig } from "./config/index.js";
import { UploadController } from "./controllers/uploadController.js";
import { ReportStore } from "./db/memoryStore.js";
import { SESSION_HEADER, sessionMiddleware } from "./middleware/sessionMiddleware.js";
import { createUploadRouter } from "./routes/upload.js";
import { pdfParser } from "./services/pdfParser.js";
import { StatementProcessor } from "./services/statementProcessor.js";
import { PageReader } from "./types/index.js";

export interface AppOptions {
  config?: AppConfig;
  reader?: PageReader;
  store?: ReportStore;
}

export function createApp(options: AppOptions = {}): Express {
  const config = options.config ?? loadConfig();
  const store = options.store ?? new ReportStore({
    maxSessions: config.maxSessions,
    sessionTtlMs: config.sessionTtlMinutes * 60 * 1000,
  });
  const processor = new StatementProcessor(options.reader ?? pdfParser);
  const controller = new UploadController(processor, store);

  const app: Express = express();

  // Middleware
  app.use(cors({
    origin: config.frontendUrl,
    credentials: true,
    optionsSuccessStatus: 200,
    exposedHeaders: ["Content-Type", "Content-Length", "Content-Disposition", SESSION_HEADER],
  }));

  app.use(express.json());
  app.use(express.urlencoded({ extended: true }));

  // Health check endpoint
  app.get("/health", (_req: Request, res: Response) => {
    res.status(200).json({ status: "ok", message: "Server is running" });
  });

  // API routes
  app.use("/api", sessionMiddleware(store), createUploadRouter(controller, config));

  // Error handling middleware
  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    console.error("Error:", err);
    res.status(500).json({
      error: err.message || "Internal server error",
    });
  });

  // 404 handler
  app.use((_req: Request, res: Response) => {
    res.status(404).json({ error: "Route not found" });
  });

  return app;
}
