import { z } from "zod";
import type { MlPrediction, ModelPerformanceRow, ModelType, PredictionType, TrainingRunRow } from "@shared/schema";
import { jsonValueSchema, StructuredBlob } from "../lib/structuredBlob";

// ============================================
// Predictions
// ============================================

export const predictionTypeSchema = z.string().trim().min(1);

export const predictionInputSchema = z
  .object({
    entityType: z.string().min(1).nullish(),
    entityId: z.number().int().nullish(),
    entityName: z.string().nullish(),
    predictionDate: z.string().date().optional(),
    targetDate: z.string().date().nullish(),
    predictedValue: z.number().finite().nullish(),
    predictedCategory: z.string().min(1).nullish(),
    confidenceScore: z.number().min(0).max(1).nullish(),
    featuresUsed: jsonValueSchema.optional(),
    metadata: jsonValueSchema.optional(),
  })
  .refine((input) => input.predictedValue != null || input.predictedCategory != null, {
    message: "predictedValue or predictedCategory is required",
  })
  .refine((input) => (input.entityType == null) === (input.entityId == null), {
    message: "entityType and entityId must be given together",
  });

export type PredictionInput = z.input<typeof predictionInputSchema>;
export type ParsedPrediction = z.output<typeof predictionInputSchema>;

export interface PredictionKey {
  predictionType: PredictionType;
  entityType: string | null;
  entityId: number | null;
}

export type PredictionActivation = { status: "active" } | { status: "superseded" };

export type PredictionOutcome =
  | { status: "pending" }
  | { status: "reconciled"; actualValue: number; actualDate: string | null; predictionError: number | null };

export interface Prediction {
  id: number;
  predictionType: PredictionType;
  entityType: string | null;
  entityId: number | null;
  entityName: string | null;
  predictionDate: string;
  targetDate: string | null;
  predictedValue: number | null;
  predictedCategory: string | null;
  confidenceScore: number | null;
  modelVersion: string;
  featuresUsed: StructuredBlob;
  metadata: StructuredBlob;
  activation: PredictionActivation;
  outcome: PredictionOutcome;
  createdAt: Date;
  updatedAt: Date;
}

export function toPrediction(row: MlPrediction): Prediction {
  return {
    id: row.id,
    predictionType: row.predictionType,
    entityType: row.entityType,
    entityId: row.entityId,
    entityName: row.entityName,
    predictionDate: row.predictionDate,
    targetDate: row.targetDate,
    predictedValue: row.predictedValue,
    predictedCategory: row.predictedCategory,
    confidenceScore: row.confidenceScore,
    modelVersion: row.modelVersion,
    featuresUsed: StructuredBlob.fromRaw(row.featuresUsed),
    metadata: StructuredBlob.fromRaw(row.metadata),
    activation: row.isActive ? { status: "active" } : { status: "superseded" },
    outcome:
      row.actualValue === null
        ? { status: "pending" }
        : {
            status: "reconciled",
            actualValue: row.actualValue,
            actualDate: row.actualDate,
            predictionError: row.predictionError,
          },
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}

export interface BatchResult {
  predictionType: PredictionType;
  modelVersion: string;
  inserted: number;
  superseded: number;
}

export type ReconcileResult =
  | { status: "reconciled"; prediction: Prediction }
  | { status: "already_reconciled"; prediction: Prediction }
  | { status: "pending" };

/** Accuracy over reconciled rows; averages are undefined until something is reconciled. */
export interface ModelAccuracy {
  predictionType: string;
  totalPredictions: number;
  verifiedPredictions: number;
  meanAbsoluteError: number | undefined;
  averageConfidence: number | undefined;
}

export interface ActivePredictionSummary {
  predictionType: string;
  entityType: string | null;
  predictionCount: number;
  avgConfidence: number | undefined;
  earliestPrediction: string | null;
  latestPrediction: string | null;
}

// ============================================
// Training runs
// ============================================

export type DeploymentState = { status: "not_deployed" } | { status: "deployed"; deployedAt: Date };

export type TrainingRunState =
  | { status: "pending" }
  | { status: "succeeded"; durationSeconds: number | null; deployment: DeploymentState }
  | { status: "failed"; errorMessage: string; durationSeconds: number | null };

export interface TrainingRun {
  id: number;
  modelName: string;
  trainingDate: Date;
  dateRangeStart: string | null;
  dateRangeEnd: string | null;
  recordsUsed: number | null;
  featuresCount: number | null;
  createdAt: Date;
  state: TrainingRunState;
}

export function toTrainingRun(row: TrainingRunRow): TrainingRun {
  let state: TrainingRunState;
  if (row.success === null) {
    state = { status: "pending" };
  } else if (row.success) {
    state = {
      status: "succeeded",
      durationSeconds: row.trainingDurationSeconds,
      deployment:
        row.deployed && row.deployedAt
          ? { status: "deployed", deployedAt: row.deployedAt }
          : { status: "not_deployed" },
    };
  } else {
    state = {
      status: "failed",
      errorMessage: row.errorMessage ?? "Unknown error",
      durationSeconds: row.trainingDurationSeconds,
    };
  }

  return {
    id: row.id,
    modelName: row.modelName,
    trainingDate: row.trainingDate,
    dateRangeStart: row.dateRangeStart,
    dateRangeEnd: row.dateRangeEnd,
    recordsUsed: row.recordsUsed,
    featuresCount: row.featuresCount,
    createdAt: row.createdAt,
    state,
  };
}

export const startRunSchema = z.object({
  modelName: z.string().min(1),
  dateRangeStart: z.string().date().nullish(),
  dateRangeEnd: z.string().date().nullish(),
  recordsUsed: z.number().int().nonnegative().nullish(),
  featuresCount: z.number().int().nonnegative().nullish(),
});

export type StartRunInput = z.input<typeof startRunSchema>;

// ============================================
// Model performance
// ============================================

export const regressionMetricsSchema = z
  .object({
    mae: z.number().nonnegative().optional(),
    rmse: z.number().nonnegative().optional(),
    r2Score: z.number().optional(),
  })
  .strict();

export const classificationMetricsSchema = z
  .object({
    accuracy: z.number().min(0).max(1).optional(),
    precision: z.number().min(0).max(1).optional(),
    recall: z.number().min(0).max(1).optional(),
    f1: z.number().min(0).max(1).optional(),
    aucRoc: z.number().min(0).max(1).optional(),
  })
  .strict();

export type RegressionMetrics = z.infer<typeof regressionMetricsSchema>;
export type ClassificationMetrics = z.infer<typeof classificationMetricsSchema>;

const performanceBase = {
  modelName: z.string().min(1),
  evaluationDate: z.string().date().optional(),
  trainingSamples: z.number().int().nonnegative().optional(),
  testSamples: z.number().int().nonnegative().optional(),
  topFeatures: jsonValueSchema.optional(),
  hyperparameters: jsonValueSchema.optional(),
  trainingTimeSeconds: z.number().nonnegative().optional(),
};

// A record carries only the metrics that apply to its model type.
export const performanceInputSchema = z.discriminatedUnion("modelType", [
  z.object({ ...performanceBase, modelType: z.literal("regression"), metrics: regressionMetricsSchema }),
  z.object({ ...performanceBase, modelType: z.literal("forecasting"), metrics: regressionMetricsSchema }),
  z.object({ ...performanceBase, modelType: z.literal("classification"), metrics: classificationMetricsSchema }),
]);

export type PerformanceInput = z.input<typeof performanceInputSchema>;

export type PerformanceMetrics =
  | { kind: "regression"; mae?: number; rmse?: number; r2Score?: number }
  | { kind: "classification"; accuracy?: number; precision?: number; recall?: number; f1?: number; aucRoc?: number };

export interface ModelPerformanceRecord {
  id: number;
  modelName: string;
  modelType: ModelType;
  evaluationDate: string;
  trainingSamples: number | undefined;
  testSamples: number | undefined;
  metrics: PerformanceMetrics;
  topFeatures: StructuredBlob;
  hyperparameters: StructuredBlob;
  trainingTimeSeconds: number | undefined;
  createdAt: Date;
}

function unset(value: number | null): number | undefined {
  return value === null ? undefined : value;
}

export function toPerformanceRecord(row: ModelPerformanceRow): ModelPerformanceRecord {
  const metrics: PerformanceMetrics =
    row.modelType === "classification"
      ? {
          kind: "classification",
          accuracy: unset(row.accuracy),
          precision: unset(row.precisionScore),
          recall: unset(row.recallScore),
          f1: unset(row.f1Score),
          aucRoc: unset(row.aucRoc),
        }
      : { kind: "regression", mae: unset(row.mae), rmse: unset(row.rmse), r2Score: unset(row.r2Score) };

  return {
    id: row.id,
    modelName: row.modelName,
    modelType: row.modelType,
    evaluationDate: row.evaluationDate,
    trainingSamples: unset(row.trainingSamples),
    testSamples: unset(row.testSamples),
    metrics,
    topFeatures: StructuredBlob.fromRaw(row.topFeatures),
    hyperparameters: StructuredBlob.fromRaw(row.hyperparameters),
    trainingTimeSeconds: unset(row.trainingTimeSeconds),
    createdAt: row.createdAt,
  };
}

