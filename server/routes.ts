import type { Express, Response } from "express";
import { createServer, type Server } from "http";
import { z } from "zod";
import { parseISO } from "date-fns";
import { sql } from "drizzle-orm";
import { METRIC_CATEGORIES, MODEL_TYPES } from "@shared/schema";
import type { Database } from "./db";
import { handleAPIError, logError } from "./errors";
import type { Services } from "./services";
import { performanceInputSchema, predictionTypeSchema, startRunSchema } from "./ml/types";
import type { JobName } from "./jobs/jobScheduler";

const JOB_NAMES = ["metrics_recompute", "alert_evaluation", "prediction_archival"] as const satisfies readonly JobName[];

const dateString = z.string().date();

const recomputeSchema = z.object({
  periodStart: dateString,
  periodEnd: dateString,
});

const evaluateSchema = z.object({
  today: dateString.optional(),
});

const batchSchema = z.object({
  modelVersion: z.string().min(1),
  predictionType: predictionTypeSchema,
  predictions: z.array(z.unknown()),
});

const reconcileSchema = z.object({
  entityType: z.string().min(1).nullable(),
  entityId: z.number().int().nullable(),
  predictionType: predictionTypeSchema,
  actualValue: z.number().finite(),
  actualDate: dateString,
});

const completeRunSchema = z.object({
  durationSeconds: z.number().nonnegative().optional(),
  deploy: z.boolean().optional(),
});

const failRunSchema = z.object({
  errorMessage: z.string().min(1),
  durationSeconds: z.number().nonnegative().optional(),
});

const outcomeEvaluationSchema = z.object({
  modelType: z.enum(MODEL_TYPES),
  threshold: z.number().finite().optional(),
  evaluationDate: dateString.optional(),
});

const idParam = z.coerce.number().int().positive();

function sendError(res: Response, error: unknown, context: string) {
  const { message, code, statusCode, details } = handleAPIError(error);
  if (statusCode >= 500) {
    logError(error, context);
  }
  res.status(statusCode).json({ message, code, details });
}

export async function registerRoutes(app: Express, services: Services, db: Database): Promise<Server> {
  const { facts, metrics, alerts, ledger, registry, scheduler } = services;

  app.get("/api/health", async (_req, res) => {
    let store: "available" | "unavailable" = "available";
    try {
      await db.execute(sql`select 1`);
    } catch (error) {
      logError(error, "Health");
      store = "unavailable";
    }
    res.status(store === "available" ? 200 : 503).json({ store, jobs: scheduler.getJobStatus() });
  });

  // ---- Facts ----

  app.post("/api/facts/:kind", async (req, res) => {
    try {
      const records = z.array(z.unknown()).parse(req.body);
      const result = await facts.upsertBatch(req.params.kind, records);
      res.json(result);
    } catch (error) {
      sendError(res, error, "Facts");
    }
  });

  // ---- Metrics ----

  app.post("/api/metrics/recompute", async (req, res) => {
    try {
      const { periodStart, periodEnd } = recomputeSchema.parse(req.body);
      res.json(await metrics.recompute(periodStart, periodEnd));
    } catch (error) {
      sendError(res, error, "Metrics");
    }
  });

  app.get("/api/metrics/dashboard", async (req, res) => {
    try {
      const category = z.enum(METRIC_CATEGORIES).optional().parse(req.query.category);
      res.json(await metrics.getLatestDashboardMetrics(category));
    } catch (error) {
      sendError(res, error, "Metrics");
    }
  });

  app.get("/api/metrics/customers", async (req, res) => {
    try {
      const limit = z.coerce.number().int().positive().max(1000).default(100).parse(req.query.limit);
      res.json(await metrics.getCustomerMetrics(limit));
    } catch (error) {
      sendError(res, error, "Metrics");
    }
  });

  app.get("/api/metrics/timeseries/:metricName", async (req, res) => {
    try {
      const from = dateString.optional().parse(req.query.from);
      const to = dateString.optional().parse(req.query.to);
      res.json(await metrics.getTimeseries(req.params.metricName, from, to));
    } catch (error) {
      sendError(res, error, "Metrics");
    }
  });

  // ---- Alerts ----

  app.post("/api/alerts/evaluate", async (req, res) => {
    try {
      const { today } = evaluateSchema.parse(req.body ?? {});
      res.json(await alerts.evaluate({ today: today ? parseISO(today) : undefined }));
    } catch (error) {
      sendError(res, error, "Alerts");
    }
  });

  app.get("/api/alerts", async (req, res) => {
    try {
      const status = z.enum(["open", "resolved"]).optional().parse(req.query.status);
      const alertType = z.string().optional().parse(req.query.type);
      res.json(await alerts.listAlerts({ status, alertType }));
    } catch (error) {
      sendError(res, error, "Alerts");
    }
  });

  app.post("/api/alerts/:id/resolve", async (req, res) => {
    try {
      res.json(await alerts.resolve(idParam.parse(req.params.id)));
    } catch (error) {
      sendError(res, error, "Alerts");
    }
  });

  // ---- Predictions ----

  app.post("/api/predictions/batches", async (req, res) => {
    try {
      const { predictions, modelVersion, predictionType } = batchSchema.parse(req.body);
      const result = await ledger.ingestBatch(predictions, modelVersion, predictionType);
      res.status(201).json(result);
    } catch (error) {
      sendError(res, error, "Predictions");
    }
  });

  app.post("/api/predictions/reconcile", async (req, res) => {
    try {
      const body = reconcileSchema.parse(req.body);
      const result = await ledger.reconcile(
        body.entityType,
        body.entityId,
        body.predictionType,
        body.actualValue,
        body.actualDate
      );
      res.json(result);
    } catch (error) {
      sendError(res, error, "Predictions");
    }
  });

  app.get("/api/predictions/active", async (req, res) => {
    try {
      const predictionType = predictionTypeSchema.optional().parse(req.query.type);
      res.json(await ledger.getActivePredictions({ predictionType }));
    } catch (error) {
      sendError(res, error, "Predictions");
    }
  });

  app.get("/api/predictions/summary", async (_req, res) => {
    try {
      res.json(await ledger.getActiveSummary());
    } catch (error) {
      sendError(res, error, "Predictions");
    }
  });

  app.get("/api/predictions/accuracy", async (req, res) => {
    try {
      const predictionType = predictionTypeSchema.optional().parse(req.query.type);
      res.json(predictionType ? await ledger.getModelAccuracyFor(predictionType) : await ledger.getModelAccuracy());
    } catch (error) {
      sendError(res, error, "Predictions");
    }
  });

  // ---- Models ----

  app.post("/api/models/runs", async (req, res) => {
    try {
      res.status(201).json(await registry.startRun(startRunSchema.parse(req.body)));
    } catch (error) {
      sendError(res, error, "Models");
    }
  });

  app.post("/api/models/runs/:id/complete", async (req, res) => {
    try {
      const options = completeRunSchema.parse(req.body ?? {});
      res.json(await registry.completeRun(idParam.parse(req.params.id), options));
    } catch (error) {
      sendError(res, error, "Models");
    }
  });

  app.post("/api/models/runs/:id/fail", async (req, res) => {
    try {
      const { errorMessage, durationSeconds } = failRunSchema.parse(req.body);
      res.json(await registry.failRun(idParam.parse(req.params.id), errorMessage, durationSeconds));
    } catch (error) {
      sendError(res, error, "Models");
    }
  });

  app.post("/api/models/runs/:id/deploy", async (req, res) => {
    try {
      res.json(await registry.deployRun(idParam.parse(req.params.id)));
    } catch (error) {
      sendError(res, error, "Models");
    }
  });

  app.post("/api/models/performance", async (req, res) => {
    try {
      res.status(201).json(await registry.recordPerformance(performanceInputSchema.parse(req.body)));
    } catch (error) {
      sendError(res, error, "Models");
    }
  });

  app.post("/api/models/:modelName/evaluate", async (req, res) => {
    try {
      const { modelType, ...options } = outcomeEvaluationSchema.parse(req.body);
      res.status(201).json(await registry.evaluateFromOutcomes(req.params.modelName, modelType, options));
    } catch (error) {
      sendError(res, error, "Models");
    }
  });

  app.get("/api/models/:modelName", async (req, res) => {
    try {
      res.json(await registry.getModelSummary(req.params.modelName));
    } catch (error) {
      sendError(res, error, "Models");
    }
  });

  // ---- Jobs ----

  app.get("/api/jobs", (_req, res) => {
    res.json(scheduler.getJobStatus());
  });

  app.post("/api/jobs/:name/run", async (req, res) => {
    try {
      const name = z.enum(JOB_NAMES).parse(req.params.name);
      const result = await scheduler.runNow(name);
      res.status(result.success || result.skipped ? 200 : 500).json(result);
    } catch (error) {
      sendError(res, error, "Jobs");
    }
  });

  const httpServer = createServer(app);
  return httpServer;
}
