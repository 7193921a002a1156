import type { Database } from "./db";
import type { Env } from "./config/env";
import { FactStore } from "./ingestion/factStore";
import { MetricsAggregator, type WritePolicies } from "./analytics/metricsAggregator";
import { AlertEngine } from "./alerts/alertEngine";
import { ModelRegistry } from "./ml/modelRegistry";
import { PredictionLedger } from "./ml/predictionLedger";
import { createDefaultJobs, JobScheduler } from "./jobs/jobScheduler";

export interface Services {
  facts: FactStore;
  metrics: MetricsAggregator;
  alerts: AlertEngine;
  registry: ModelRegistry;
  ledger: PredictionLedger;
  scheduler: JobScheduler;
}

export type ServiceSettings = Pick<
  Env,
  | "METRICS_WINDOW_DAYS"
  | "METRICS_INTERVAL_MINUTES"
  | "ALERTS_INTERVAL_MINUTES"
  | "ARCHIVE_INTERVAL_HOURS"
  | "ALERT_UPCOMING_LOOKAHEAD_DAYS"
  | "ALERT_LOW_CASH_THRESHOLD"
  | "PREDICTION_RETENTION_DAYS"
  | "LEDGER_REQUIRE_DEPLOYED_MODEL"
>;

export function createServices(
  db: Database,
  settings: ServiceSettings,
  writePolicies?: Partial<WritePolicies>
): Services {
  const facts = new FactStore(db);
  const metrics = new MetricsAggregator(db, facts, writePolicies);
  const alerts = new AlertEngine(db, facts, {
    upcomingLookaheadDays: settings.ALERT_UPCOMING_LOOKAHEAD_DAYS,
    lowCashThreshold: settings.ALERT_LOW_CASH_THRESHOLD,
  });
  const registry = new ModelRegistry(db);
  const ledger = new PredictionLedger(db, registry, {
    requireDeployedModel: settings.LEDGER_REQUIRE_DEPLOYED_MODEL,
  });

  const scheduler = new JobScheduler(
    createDefaultJobs(
      { metrics, alerts, ledger },
      {
        metricsWindowDays: settings.METRICS_WINDOW_DAYS,
        metricsIntervalMinutes: settings.METRICS_INTERVAL_MINUTES,
        alertsIntervalMinutes: settings.ALERTS_INTERVAL_MINUTES,
        archiveIntervalHours: settings.ARCHIVE_INTERVAL_HOURS,
        predictionRetentionDays: settings.PREDICTION_RETENTION_DAYS,
      }
    )
  );

  return { facts, metrics, alerts, registry, ledger, scheduler };
}
