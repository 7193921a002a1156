/**
 * Model Registry & Performance Tracker
 *
 * Keeps the lifecycle of every training run and the evaluation metrics
 * recorded against each model.
 *
 * - A run starts PENDING and ends SUCCESS or FAILURE exactly once
 * - Only successful runs can be deployed; deployed_at is set once and never cleared
 * - The current deployment of a model is its most recently deployed run;
 *   earlier deployments stay as history
 */

import { and, asc, desc, eq, isNotNull, isNull } from "drizzle-orm";
import { format } from "date-fns";
import {
  mlModelPerformance,
  mlPredictions,
  mlTrainingHistory,
  type InsertModelPerformance,
  type ModelType,
} from "@shared/schema";
import type { Database } from "../db";
import { createError } from "../errors";
import { blobText } from "../lib/structuredBlob";
import { classificationMetrics, regressionMetrics } from "./evaluationMetrics";
import {
  performanceInputSchema,
  startRunSchema,
  toPerformanceRecord,
  toTrainingRun,
  type ModelPerformanceRecord,
  type PerformanceInput,
  type StartRunInput,
  type TrainingRun,
} from "./types";

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;

export interface TrainerOutcome {
  deploy?: boolean;
  performance?: DistributiveOmit<PerformanceInput, "modelName" | "trainingTimeSeconds">;
}

export type Trainer = (run: TrainingRun) => Promise<TrainerOutcome>;

export interface TrainingResult {
  modelName: string;
  success: boolean;
  run: TrainingRun | null;
  durationSeconds: number;
  performance?: ModelPerformanceRecord;
  error?: string;
}

export interface OutcomeEvaluationOptions {
  /** Values at or above this count as the positive class. Defaults to 0.5. */
  threshold?: number;
  evaluationDate?: string;
}

export interface ModelSummary {
  modelName: string;
  currentDeployment: TrainingRun | null;
  runs: TrainingRun[];
  performance: ModelPerformanceRecord[];
}

export class ModelRegistry {
  private activeTraining = new Set<string>();

  constructor(private readonly db: Database) {}

  async startRun(input: StartRunInput): Promise<TrainingRun> {
    const parsed = startRunSchema.parse(input);
    const [row] = await this.db
      .insert(mlTrainingHistory)
      .values({ ...parsed, trainingDate: new Date(), createdAt: new Date() })
      .returning();
    console.log(`[ModelRegistry] Run ${row.id} started for ${row.modelName}`);
    return toTrainingRun(row);
  }

  async completeRun(runId: number, options: { durationSeconds?: number; deploy?: boolean } = {}): Promise<TrainingRun> {
    const deployedAt = options.deploy ? new Date() : null;
    const [row] = await this.db
      .update(mlTrainingHistory)
      .set({
        success: true,
        trainingDurationSeconds: options.durationSeconds ?? null,
        deployed: deployedAt !== null,
        deployedAt,
      })
      .where(and(eq(mlTrainingHistory.id, runId), isNull(mlTrainingHistory.success)))
      .returning();

    if (!row) {
      throw await this.transitionError(runId, "complete");
    }
    console.log(`[ModelRegistry] Run ${runId} succeeded${deployedAt ? " and was deployed" : ""}`);
    return toTrainingRun(row);
  }

  async failRun(runId: number, errorMessage: string, durationSeconds?: number): Promise<TrainingRun> {
    const [row] = await this.db
      .update(mlTrainingHistory)
      .set({
        success: false,
        errorMessage: errorMessage || "Unknown error",
        trainingDurationSeconds: durationSeconds ?? null,
      })
      .where(and(eq(mlTrainingHistory.id, runId), isNull(mlTrainingHistory.success)))
      .returning();

    if (!row) {
      throw await this.transitionError(runId, "fail");
    }
    console.log(`[ModelRegistry] Run ${runId} failed: ${row.errorMessage}`);
    return toTrainingRun(row);
  }

  /** Deploying an already deployed run returns it unchanged. */
  async deployRun(runId: number): Promise<TrainingRun> {
    const [row] = await this.db
      .update(mlTrainingHistory)
      .set({ deployed: true, deployedAt: new Date() })
      .where(
        and(
          eq(mlTrainingHistory.id, runId),
          eq(mlTrainingHistory.success, true),
          eq(mlTrainingHistory.deployed, false)
        )
      )
      .returning();

    if (row) {
      console.log(`[ModelRegistry] Run ${runId} deployed for ${row.modelName}`);
      return toTrainingRun(row);
    }

    const existing = await this.getRun(runId);
    if (existing.state.status === "succeeded" && existing.state.deployment.status === "deployed") {
      return existing;
    }
    throw createError("INVALID_RUN_TRANSITION", { runId, from: existing.state.status, to: "deployed" });
  }

  async getRun(runId: number): Promise<TrainingRun> {
    const [row] = await this.db.select().from(mlTrainingHistory).where(eq(mlTrainingHistory.id, runId));
    if (!row) {
      throw createError("TRAINING_RUN_NOT_FOUND", { runId });
    }
    return toTrainingRun(row);
  }

  async getRuns(modelName: string, limit = 50): Promise<TrainingRun[]> {
    const rows = await this.db
      .select()
      .from(mlTrainingHistory)
      .where(eq(mlTrainingHistory.modelName, modelName))
      .orderBy(desc(mlTrainingHistory.trainingDate), desc(mlTrainingHistory.id))
      .limit(limit);
    return rows.map(toTrainingRun);
  }

  async getCurrentDeployment(modelName: string): Promise<TrainingRun | null> {
    const [row] = await this.db
      .select()
      .from(mlTrainingHistory)
      .where(and(eq(mlTrainingHistory.modelName, modelName), eq(mlTrainingHistory.deployed, true)))
      .orderBy(desc(mlTrainingHistory.deployedAt), desc(mlTrainingHistory.id))
      .limit(1);
    return row ? toTrainingRun(row) : null;
  }

  /**
   * Metrics that do not apply to the model type are stored as NULL; a metric
   * reported as 0 stays 0.
   */
  async recordPerformance(input: PerformanceInput): Promise<ModelPerformanceRecord> {
    const parsed = performanceInputSchema.parse(input);

    const values: InsertModelPerformance = {
      modelName: parsed.modelName,
      modelType: parsed.modelType,
      evaluationDate: parsed.evaluationDate ?? format(new Date(), "yyyy-MM-dd"),
      trainingSamples: parsed.trainingSamples ?? null,
      testSamples: parsed.testSamples ?? null,
      topFeatures: blobText(parsed.topFeatures),
      hyperparameters: blobText(parsed.hyperparameters),
      trainingTimeSeconds: parsed.trainingTimeSeconds ?? null,
      createdAt: new Date(),
    };

    if (parsed.modelType === "classification") {
      values.accuracy = parsed.metrics.accuracy ?? null;
      values.precisionScore = parsed.metrics.precision ?? null;
      values.recallScore = parsed.metrics.recall ?? null;
      values.f1Score = parsed.metrics.f1 ?? null;
      values.aucRoc = parsed.metrics.aucRoc ?? null;
    } else {
      values.mae = parsed.metrics.mae ?? null;
      values.rmse = parsed.metrics.rmse ?? null;
      values.r2Score = parsed.metrics.r2Score ?? null;
    }

    const [row] = await this.db.insert(mlModelPerformance).values(values).returning();
    return toPerformanceRecord(row);
  }

  /**
   * Scores a model against the predictions it published (model_version equal to
   * the model name) that have since been reconciled, and records the result.
   * Only numeric predictions take part. For classification, predicted values
   * are read as probabilities and both sides are split at `threshold`.
   */
  async evaluateFromOutcomes(
    modelName: string,
    modelType: ModelType,
    options: OutcomeEvaluationOptions = {}
  ): Promise<ModelPerformanceRecord> {
    const rows = await this.db
      .select({ predictedValue: mlPredictions.predictedValue, actualValue: mlPredictions.actualValue })
      .from(mlPredictions)
      .where(
        and(
          eq(mlPredictions.modelVersion, modelName),
          isNotNull(mlPredictions.predictedValue),
          isNotNull(mlPredictions.actualValue)
        )
      )
      .orderBy(asc(mlPredictions.id));

    const predicted: number[] = [];
    const actual: number[] = [];
    for (const row of rows) {
      if (row.predictedValue === null || row.actualValue === null) continue;
      predicted.push(row.predictedValue);
      actual.push(row.actualValue);
    }

    if (actual.length === 0) {
      throw createError("NO_EVALUATION_DATA", { modelName });
    }

    const base = { modelName, evaluationDate: options.evaluationDate, testSamples: actual.length };
    if (modelType === "classification") {
      const threshold = options.threshold ?? 0.5;
      const label = (value: number) => (value >= threshold ? "positive" : "negative");
      const metrics = classificationMetrics(actual.map(label), predicted.map(label), "positive", predicted);
      return this.recordPerformance({ ...base, modelType, metrics });
    }
    return this.recordPerformance({ ...base, modelType, metrics: regressionMetrics(actual, predicted) });
  }

  async getPerformanceHistory(modelName: string, limit = 50): Promise<ModelPerformanceRecord[]> {
    const rows = await this.db
      .select()
      .from(mlModelPerformance)
      .where(eq(mlModelPerformance.modelName, modelName))
      .orderBy(desc(mlModelPerformance.evaluationDate), desc(mlModelPerformance.id))
      .limit(limit);
    return rows.map(toPerformanceRecord);
  }

  async getModelSummary(modelName: string): Promise<ModelSummary> {
    const [currentDeployment, runs, performance] = await Promise.all([
      this.getCurrentDeployment(modelName),
      this.getRuns(modelName),
      this.getPerformanceHistory(modelName),
    ]);
    return { modelName, currentDeployment, runs, performance };
  }

  /**
   * Runs an external trainer inside a recorded run. A trainer failure becomes a
   * FAILURE row and a failed result; it is not rethrown.
   */
  async runTraining(input: StartRunInput, trainer: Trainer): Promise<TrainingResult> {
    const modelName = input.modelName;

    if (this.activeTraining.has(modelName)) {
      return {
        modelName,
        success: false,
        run: null,
        durationSeconds: 0,
        error: "Training already in progress",
      };
    }

    this.activeTraining.add(modelName);
    const startTime = Date.now();
    const run = await this.startRun(input).catch((error: unknown) => {
      this.activeTraining.delete(modelName);
      throw error;
    });

    try {
      const outcome = await trainer(run);
      const durationSeconds = (Date.now() - startTime) / 1000;

      const performance = outcome.performance
        ? await this.recordPerformance({ ...outcome.performance, modelName, trainingTimeSeconds: durationSeconds })
        : undefined;
      const completed = await this.completeRun(run.id, { durationSeconds, deploy: outcome.deploy });

      return { modelName, success: true, run: completed, durationSeconds, performance };
    } catch (error) {
      const durationSeconds = (Date.now() - startTime) / 1000;
      const message = error instanceof Error ? error.message : "Unknown error";
      console.error(`[ModelRegistry] Error training ${modelName}:`, error);
      const failed = await this.failRun(run.id, message, durationSeconds);
      return { modelName, success: false, run: failed, durationSeconds, error: message };
    } finally {
      this.activeTraining.delete(modelName);
    }
  }

  isTraining(modelName: string): boolean {
    return this.activeTraining.has(modelName);
  }

  private async transitionError(runId: number, action: "complete" | "fail") {
    const existing = await this.getRun(runId);
    return createError("INVALID_RUN_TRANSITION", {
      runId,
      from: existing.state.status,
      to: action === "complete" ? "succeeded" : "failed",
    });
  }
}
