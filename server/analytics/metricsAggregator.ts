import { and, asc, desc, eq, gte, inArray, lte, type SQL } from "drizzle-orm";
import pLimit from "p-limit";
import {
  customerMetrics,
  dashboardMetrics,
  metricsTimeseries,
  type CustomerMetric,
  type DashboardMetric,
  type InsertDashboardMetric,
  type MetricCategory,
  type TimeseriesPoint,
} from "@shared/schema";
import type { Database } from "../db";
import { createError } from "../errors";
import type { FactStore } from "../ingestion/factStore";
import { blobText, StructuredBlob } from "../lib/structuredBlob";
import {
  computeCustomerRollups,
  computeDashboardMetrics,
  computeMonthlySeries,
  toDateKey,
  type CustomerRollup,
  type MetricWindow,
  type SeriesPoint,
} from "./metricDefinitions";

/**
 * How each derived entity is written. Dashboard metrics are history by default;
 * customer rollups and series points have a natural key and are always
 * replaced in place.
 */
export interface WritePolicies {
  dashboardMetrics: "append" | "replace";
  customerMetrics: "upsert_replace";
  timeseries: "upsert_replace";
}

export const DEFAULT_WRITE_POLICIES: WritePolicies = {
  dashboardMetrics: "append",
  customerMetrics: "upsert_replace",
  timeseries: "upsert_replace",
};

export interface RecomputeResult {
  periodStart: string;
  periodEnd: string;
  calculatedAt: Date;
  dashboardMetrics: number;
  customerMetrics: number;
  timeseriesPoints: number;
}

export type DashboardMetricView = Omit<DashboardMetric, "metadata"> & { metadata: StructuredBlob };
export type TimeseriesPointView = Omit<TimeseriesPoint, "metadata"> & { metadata: StructuredBlob };

const WRITE_CONCURRENCY = 4;

function normalizeDay(value: string | Date): string {
  return typeof value === "string" ? value : toDateKey(value);
}

export class MetricsAggregator {
  private readonly policies: WritePolicies;

  constructor(
    private readonly db: Database,
    private readonly facts: FactStore,
    policies: Partial<WritePolicies> = {}
  ) {
    this.policies = { ...DEFAULT_WRITE_POLICIES, ...policies };
  }

  /**
   * Recomputes every metric for the window from one fact snapshot. Each entity
   * is written independently, so an interrupted run leaves whatever it already
   * committed valid and a re-run converges on the same customer and series rows.
   */
  async recompute(periodStart: string | Date, periodEnd: string | Date): Promise<RecomputeResult> {
    const window: MetricWindow = { periodStart: normalizeDay(periodStart), periodEnd: normalizeDay(periodEnd) };
    if (window.periodStart > window.periodEnd) {
      throw createError("INVALID_PERIOD", { ...window });
    }

    const calculatedAt = new Date();
    const snapshot = await this.facts.snapshotAsOf();

    const metrics = computeDashboardMetrics(snapshot, window);
    const rollups = computeCustomerRollups(snapshot, window.periodEnd);
    const series = computeMonthlySeries(snapshot, window);

    const dashboardRows: InsertDashboardMetric[] = metrics.map((metric) => ({
      metricName: metric.name,
      metricCategory: metric.category,
      metricValue: metric.value,
      metricUnit: metric.unit,
      periodStart: window.periodStart,
      periodEnd: window.periodEnd,
      calculatedAt,
      metadata: blobText(metric.metadata),
    }));

    await this.writeDashboardMetrics(dashboardRows, window);
    await this.writeCustomerMetrics(rollups, calculatedAt);
    await this.writeTimeseries(series, calculatedAt);

    console.log(
      `[MetricsAggregator] ${window.periodStart}..${window.periodEnd}: ${dashboardRows.length} metrics, ${rollups.length} customers, ${series.length} series points`
    );

    return {
      ...window,
      calculatedAt,
      dashboardMetrics: dashboardRows.length,
      customerMetrics: rollups.length,
      timeseriesPoints: series.length,
    };
  }

  private async writeDashboardMetrics(rows: InsertDashboardMetric[], window: MetricWindow): Promise<void> {
    if (rows.length === 0) return;

    if (this.policies.dashboardMetrics === "append") {
      await this.db.insert(dashboardMetrics).values(rows);
      return;
    }

    const names = rows.map((row) => row.metricName);
    await this.db.transaction(async (tx) => {
      await tx.delete(dashboardMetrics).where(
        and(
          inArray(dashboardMetrics.metricName, names),
          eq(dashboardMetrics.periodStart, window.periodStart),
          eq(dashboardMetrics.periodEnd, window.periodEnd)
        )
      );
      await tx.insert(dashboardMetrics).values(rows);
    });
  }

  private async writeCustomerMetrics(rollups: CustomerRollup[], calculatedAt: Date): Promise<void> {
    const limit = pLimit(WRITE_CONCURRENCY);
    await Promise.all(
      rollups.map((rollup) =>
        limit(async () => {
          const row = { ...rollup, calculatedAt };
          await this.db
            .insert(customerMetrics)
            .values(row)
            .onConflictDoUpdate({
              target: customerMetrics.customerId,
              set: {
                customerName: row.customerName,
                totalRevenue: row.totalRevenue,
                invoiceCount: row.invoiceCount,
                avgPaymentDays: row.avgPaymentDays,
                lastInvoiceDate: row.lastInvoiceDate,
                paymentStatus: row.paymentStatus,
                lifetimeValue: row.lifetimeValue,
                calculatedAt,
              },
            });
        })
      )
    );
  }

  private async writeTimeseries(points: SeriesPoint[], createdAt: Date): Promise<void> {
    const limit = pLimit(WRITE_CONCURRENCY);
    await Promise.all(
      points.map((point) =>
        limit(async () => {
          const metadata = blobText(point.metadata);
          await this.db
            .insert(metricsTimeseries)
            .values({
              metricName: point.metricName,
              date: point.date,
              value: point.value,
              comparisonValue: point.comparisonValue,
              metadata,
              createdAt,
            })
            .onConflictDoUpdate({
              target: [metricsTimeseries.metricName, metricsTimeseries.date],
              set: { value: point.value, comparisonValue: point.comparisonValue, metadata },
            });
        })
      )
    );
  }

  /** Most recent snapshot row of each metric. */
  async getLatestDashboardMetrics(category?: MetricCategory): Promise<DashboardMetricView[]> {
    const rows = await this.db
      .selectDistinctOn([dashboardMetrics.metricName])
      .from(dashboardMetrics)
      .where(category ? eq(dashboardMetrics.metricCategory, category) : undefined)
      .orderBy(dashboardMetrics.metricName, desc(dashboardMetrics.calculatedAt), desc(dashboardMetrics.id));

    return rows.map((row) => ({ ...row, metadata: StructuredBlob.fromRaw(row.metadata) }));
  }

  async getMetricHistory(metricName: string, limit = 50): Promise<DashboardMetricView[]> {
    const rows = await this.db
      .select()
      .from(dashboardMetrics)
      .where(eq(dashboardMetrics.metricName, metricName))
      .orderBy(desc(dashboardMetrics.calculatedAt), desc(dashboardMetrics.id))
      .limit(limit);

    return rows.map((row) => ({ ...row, metadata: StructuredBlob.fromRaw(row.metadata) }));
  }

  async getCustomerMetrics(limit = 100): Promise<CustomerMetric[]> {
    return this.db
      .select()
      .from(customerMetrics)
      .orderBy(desc(customerMetrics.totalRevenue), asc(customerMetrics.customerId))
      .limit(limit);
  }

  async getTimeseries(metricName: string, from?: string, to?: string): Promise<TimeseriesPointView[]> {
    const conditions: SQL[] = [eq(metricsTimeseries.metricName, metricName)];
    if (from) conditions.push(gte(metricsTimeseries.date, from));
    if (to) conditions.push(lte(metricsTimeseries.date, to));

    const rows = await this.db
      .select()
      .from(metricsTimeseries)
      .where(and(...conditions))
      .orderBy(asc(metricsTimeseries.date));

    return rows.map((row) => ({ ...row, metadata: StructuredBlob.fromRaw(row.metadata) }));
  }
}
