import { and, asc, desc, eq, inArray, isNull, lt, or, type SQL } from "drizzle-orm";
import { format } from "date-fns";
import {
  mlPredictions,
  mlPredictionsArchive,
  vActivePredictions,
  vModelAccuracy,
  type InsertMlPrediction,
  type PredictionType,
} from "@shared/schema";
import type { Database } from "../db";
import { createError } from "../errors";
import { withConflictRetry } from "../lib/conflictRetry";
import { blobText } from "../lib/structuredBlob";
import type { ModelRegistry } from "./modelRegistry";
import {
  predictionInputSchema,
  predictionTypeSchema,
  toPrediction,
  type ActivePredictionSummary,
  type BatchResult,
  type ModelAccuracy,
  type ParsedPrediction,
  type Prediction,
  type PredictionKey,
  type ReconcileResult,
} from "./types";

export interface LedgerOptions {
  /** Reject batches whose model version has no deployed training run. */
  requireDeployedModel: boolean;
}

const DEFAULT_OPTIONS: LedgerOptions = {
  requireDeployedModel: false,
};

// Keys per UPDATE when superseding a large batch.
const SUPERSEDE_CHUNK = 500;

function keyId(key: { entityType: string | null; entityId: number | null }): string {
  return `${key.entityType ?? ""}|${key.entityId ?? ""}`;
}

function entityMatches(entityType: string | null, entityId: number | null): SQL | undefined {
  return and(
    entityType === null ? isNull(mlPredictions.entityType) : eq(mlPredictions.entityType, entityType),
    entityId === null ? isNull(mlPredictions.entityId) : eq(mlPredictions.entityId, entityId)
  );
}

/**
 * Append-mostly store of model predictions. Exactly one row per
 * (prediction_type, entity_type, entity_id) is active; a new batch supersedes
 * the previous rows for the keys it covers in one transaction. Superseded rows
 * stay for auditing and can still be reconciled.
 */
export class PredictionLedger {
  private readonly options: LedgerOptions;

  constructor(
    private readonly db: Database,
    private readonly registry?: ModelRegistry,
    options: Partial<LedgerOptions> = {}
  ) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  async ingestBatch(
    predictions: readonly unknown[],
    modelVersion: string,
    predictionType: PredictionType
  ): Promise<BatchResult> {
    if (!predictionTypeSchema.safeParse(predictionType).success) {
      throw createError("INVALID_PREDICTION_BATCH", { predictionType }, "A prediction type is required.");
    }
    const parsed = this.validateBatch(predictions);

    if (this.options.requireDeployedModel) {
      const deployment = this.registry ? await this.registry.getCurrentDeployment(modelVersion) : null;
      if (!deployment) {
        throw createError("MODEL_NOT_DEPLOYED", { modelVersion });
      }
    }

    if (parsed.length === 0) {
      return { predictionType, modelVersion, inserted: 0, superseded: 0 };
    }

    const today = format(new Date(), "yyyy-MM-dd");

    return withConflictRetry(
      () =>
        this.db.transaction(async (tx) => {
          const now = new Date();
          let superseded = 0;

          for (let i = 0; i < parsed.length; i += SUPERSEDE_CHUNK) {
            const chunk = parsed.slice(i, i + SUPERSEDE_CHUNK);
            const deactivated = await tx
              .update(mlPredictions)
              .set({ isActive: false, updatedAt: now })
              .where(
                and(
                  eq(mlPredictions.predictionType, predictionType),
                  eq(mlPredictions.isActive, true),
                  or(...chunk.map((p) => entityMatches(p.entityType ?? null, p.entityId ?? null)))
                )
              )
              .returning({ id: mlPredictions.id });
            superseded += deactivated.length;
          }

          const rows: InsertMlPrediction[] = parsed.map((p) => ({
            predictionType,
            entityType: p.entityType ?? null,
            entityId: p.entityId ?? null,
            entityName: p.entityName ?? null,
            predictionDate: p.predictionDate ?? today,
            targetDate: p.targetDate ?? null,
            predictedValue: p.predictedValue ?? null,
            predictedCategory: p.predictedCategory ?? null,
            confidenceScore: p.confidenceScore ?? null,
            modelVersion,
            featuresUsed: blobText(p.featuresUsed),
            metadata: blobText(p.metadata),
            isActive: true,
            createdAt: now,
            updatedAt: now,
          }));
          await tx.insert(mlPredictions).values(rows);

          console.log(
            `[PredictionLedger] ${predictionType} batch from ${modelVersion}: ${rows.length} active, ${superseded} superseded`
          );
          return { predictionType, modelVersion, inserted: rows.length, superseded };
        }),
      { label: `${predictionType} batch` }
    );
  }

  /**
   * Attaches an observed outcome to the prediction for the key whose
   * target_date equals `actualDate`. The outcome is written once: when any row
   * for that key and date is already reconciled the call changes nothing.
   */
  async reconcile(
    entityType: string | null,
    entityId: number | null,
    predictionType: PredictionType,
    actualValue: number,
    actualDate: string
  ): Promise<ReconcileResult> {
    return withConflictRetry(
      () =>
        this.db.transaction(async (tx): Promise<ReconcileResult> => {
          const candidates = await tx
            .select()
            .from(mlPredictions)
            .where(
              and(
                eq(mlPredictions.predictionType, predictionType),
                entityMatches(entityType, entityId),
                eq(mlPredictions.targetDate, actualDate)
              )
            )
            .orderBy(desc(mlPredictions.isActive), desc(mlPredictions.createdAt), desc(mlPredictions.id))
            .for("update");

          if (candidates.length === 0) {
            return { status: "pending" };
          }

          const done = candidates.find((row) => row.actualValue !== null);
          if (done) {
            return { status: "already_reconciled", prediction: toPrediction(done) };
          }

          const target = candidates[0];
          const predictionError = target.predictedValue === null ? null : actualValue - target.predictedValue;
          const [updated] = await tx
            .update(mlPredictions)
            .set({ actualValue, actualDate, predictionError, updatedAt: new Date() })
            .where(and(eq(mlPredictions.id, target.id), isNull(mlPredictions.actualValue)))
            .returning();

          return { status: "reconciled", prediction: toPrediction(updated) };
        }),
      { label: `${predictionType} reconcile` }
    );
  }

  async getActivePredictions(filter: Partial<PredictionKey> = {}): Promise<Prediction[]> {
    const conditions: SQL[] = [eq(mlPredictions.isActive, true)];
    if (filter.predictionType) conditions.push(eq(mlPredictions.predictionType, filter.predictionType));
    if (filter.entityType) conditions.push(eq(mlPredictions.entityType, filter.entityType));
    if (filter.entityId !== undefined && filter.entityId !== null) {
      conditions.push(eq(mlPredictions.entityId, filter.entityId));
    }

    const rows = await this.db
      .select()
      .from(mlPredictions)
      .where(and(...conditions))
      .orderBy(asc(mlPredictions.predictionType), asc(mlPredictions.entityType), asc(mlPredictions.entityId));
    return rows.map(toPrediction);
  }

  /** Every row ever written for one key, oldest first. */
  async getHistory(key: PredictionKey): Promise<Prediction[]> {
    const rows = await this.db
      .select()
      .from(mlPredictions)
      .where(and(eq(mlPredictions.predictionType, key.predictionType), entityMatches(key.entityType, key.entityId)))
      .orderBy(asc(mlPredictions.createdAt), asc(mlPredictions.id));
    return rows.map(toPrediction);
  }

  async getActiveSummary(): Promise<ActivePredictionSummary[]> {
    const rows = await this.db
      .select()
      .from(vActivePredictions)
      .orderBy(asc(vActivePredictions.predictionType), asc(vActivePredictions.entityType));
    return rows.map((row) => ({
      predictionType: row.predictionType,
      entityType: row.entityType,
      predictionCount: row.predictionCount,
      avgConfidence: row.avgConfidence ?? undefined,
      earliestPrediction: row.earliestPrediction,
      latestPrediction: row.latestPrediction,
    }));
  }

  async getModelAccuracy(): Promise<ModelAccuracy[]> {
    const rows = await this.db.select().from(vModelAccuracy).orderBy(asc(vModelAccuracy.predictionType));
    return rows.map((row) => ({
      predictionType: row.predictionType,
      totalPredictions: row.totalPredictions,
      verifiedPredictions: row.verifiedPredictions,
      meanAbsoluteError: row.avgError ?? undefined,
      averageConfidence: row.avgConfidence ?? undefined,
    }));
  }

  /** Accuracy for one prediction type; a type with no rows reports zero counts. */
  async getModelAccuracyFor(predictionType: PredictionType): Promise<ModelAccuracy> {
    const [row] = await this.db.select().from(vModelAccuracy).where(eq(vModelAccuracy.predictionType, predictionType));
    if (!row) {
      return {
        predictionType,
        totalPredictions: 0,
        verifiedPredictions: 0,
        meanAbsoluteError: undefined,
        averageConfidence: undefined,
      };
    }
    return {
      predictionType: row.predictionType,
      totalPredictions: row.totalPredictions,
      verifiedPredictions: row.verifiedPredictions,
      meanAbsoluteError: row.avgError ?? undefined,
      averageConfidence: row.avgConfidence ?? undefined,
    };
  }

  /**
   * Moves superseded predictions that were never reconciled and were made
   * before `olderThan` into ml_predictions_archive. Active and reconciled rows
   * stay where the accuracy views can see them.
   */
  async archiveSuperseded(olderThan: Date): Promise<number> {
    const cutoff = format(olderThan, "yyyy-MM-dd");

    return this.db.transaction(async (tx) => {
      const rows = await tx
        .select()
        .from(mlPredictions)
        .where(
          and(
            eq(mlPredictions.isActive, false),
            isNull(mlPredictions.actualValue),
            lt(mlPredictions.predictionDate, cutoff)
          )
        )
        .for("update");

      if (rows.length === 0) return 0;

      const archivedAt = new Date();
      await tx.insert(mlPredictionsArchive).values(rows.map((row) => ({ ...row, archivedAt })));
      await tx.delete(mlPredictions).where(inArray(mlPredictions.id, rows.map((row) => row.id)));

      console.log(`[PredictionLedger] Archived ${rows.length} superseded predictions made before ${cutoff}`);
      return rows.length;
    });
  }

  private validateBatch(predictions: readonly unknown[]): ParsedPrediction[] {
    const parsed: ParsedPrediction[] = [];
    const errors: Array<{ index: number; error: string }> = [];
    const seen = new Set<string>();

    predictions.forEach((input, index) => {
      const result = predictionInputSchema.safeParse(input);
      if (!result.success) {
        errors.push({ index, error: result.error.issues.map((issue) => issue.message).join("; ") });
        return;
      }
      const id = keyId({ entityType: result.data.entityType ?? null, entityId: result.data.entityId ?? null });
      if (seen.has(id)) {
        errors.push({ index, error: `duplicate entity ${id} in batch` });
        return;
      }
      seen.add(id);
      parsed.push(result.data);
    });

    if (errors.length > 0) {
      throw createError("INVALID_PREDICTION_BATCH", { errors });
    }
    return parsed;
  }
}
