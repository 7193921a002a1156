import { type Server } from "node:http";

import express, {
  type Express,
  type Request,
  type Response,
  type NextFunction,
} from "express";
import rateLimit from "express-rate-limit";

import type { Database } from "./db";
import { createError, handleAPIError, logError } from "./errors";
import { registerRoutes } from "./routes";
import type { Services } from "./services";

const apiLimiter = rateLimit({
  windowMs: 60 * 1000,
  max: 100,
  message: { message: "Too many requests, please try again later." },
  standardHeaders: true,
  legacyHeaders: false,
  validate: { xForwardedForHeader: false },
});

// Recompute and evaluation scan every fact table.
const batchLimiter = rateLimit({
  windowMs: 60 * 1000,
  max: 10,
  message: { message: "Batch request limit reached. Please wait a minute." },
  standardHeaders: true,
  legacyHeaders: false,
  validate: { xForwardedForHeader: false },
});

export function log(message: string, source = "express") {
  const formattedTime = new Date().toLocaleTimeString("en-US", {
    hour: "numeric",
    minute: "2-digit",
    second: "2-digit",
    hour12: true,
  });

  console.log(`${formattedTime} [${source}] ${message}`);
}

export async function createApp(services: Services, db: Database): Promise<{ app: Express; server: Server }> {
  const app = express();

  app.use(express.json({ limit: "10mb" }));
  app.use(express.urlencoded({ extended: false }));

  app.use("/api/metrics/recompute", batchLimiter);
  app.use("/api/alerts/evaluate", batchLimiter);
  app.use("/api/", apiLimiter);

  app.use((req, res, next) => {
    const start = Date.now();
    const path = req.path;
    let capturedJsonResponse: unknown = undefined;

    const originalResJson = res.json;
    res.json = function (bodyJson, ...args) {
      capturedJsonResponse = bodyJson;
      return originalResJson.apply(res, [bodyJson, ...args]);
    };

    res.on("finish", () => {
      const duration = Date.now() - start;
      if (path.startsWith("/api")) {
        let logLine = `${req.method} ${path} ${res.statusCode} in ${duration}ms`;
        if (capturedJsonResponse !== undefined) {
          logLine += ` :: ${JSON.stringify(capturedJsonResponse)}`;
        }

        if (logLine.length > 80) {
          logLine = logLine.slice(0, 79) + "…";
        }

        log(logLine);
      }
    });

    next();
  });

  const server = await registerRoutes(app, services, db);

  // Malformed JSON bodies and anything a handler let through.
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const { message, code, statusCode, details } = handleAPIError(
      err instanceof SyntaxError ? createError("VALIDATION_ERROR", undefined, "Request body is not valid JSON.") : err
    );
    if (statusCode >= 500) {
      logError(err, "express");
    }
    res.status(statusCode).json({ message, code, details });
  });

  return { app, server };
}
