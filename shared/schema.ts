import { sql } from "drizzle-orm";
import {
  boolean,
  check,
  date,
  doublePrecision,
  index,
  integer,
  pgTable,
  pgView,
  serial,
  text,
  timestamp,
  uniqueIndex,
} from "drizzle-orm/pg-core";
import { createInsertSchema } from "drizzle-zod";
import { z } from "zod";

// ============================================
// Synced facts
// Column names follow the upstream accounting API. Rows are only ever written
// through the fact store, which merges on dateChanged. firstSyncedAt is set on
// insert and kept across merges; syncedAt moves with every accepted version.
// ============================================

const isoDate = z.string().date();

export const companies = pgTable("companies_sync", {
  companyId: integer("companyId").primaryKey(),
  companyName: text("companyName"),
  organizationNo: text("organizationNo"),
  customerNumber: text("customerNumber"),
  email: text("email"),
  phone: text("phone"),
  dateChanged: timestamp("dateChanged").notNull(),
  firstSyncedAt: timestamp("firstSyncedAt").notNull().defaultNow(),
  syncedAt: timestamp("syncedAt").notNull().defaultNow(),
}, (table) => [
  index("idx_companies_name").on(table.companyName),
]);

export type Company = typeof companies.$inferSelect;
export type InsertCompany = typeof companies.$inferInsert;
export const insertCompanySchema = createInsertSchema(companies, {
  dateChanged: z.coerce.date(),
}).omit({ firstSyncedAt: true, syncedAt: true });

export const persons = pgTable("persons_sync", {
  personId: integer("personId").primaryKey(),
  companyId: integer("companyId"),
  customerId: integer("customerId"),
  name: text("name"),
  email: text("email"),
  phone: text("phone"),
  role: text("role"),
  dateChanged: timestamp("dateChanged").notNull(),
  firstSyncedAt: timestamp("firstSyncedAt").notNull().defaultNow(),
  syncedAt: timestamp("syncedAt").notNull().defaultNow(),
}, (table) => [
  index("idx_persons_company").on(table.companyId),
]);

export type Person = typeof persons.$inferSelect;
export type InsertPerson = typeof persons.$inferInsert;
export const insertPersonSchema = createInsertSchema(persons, {
  dateChanged: z.coerce.date(),
}).omit({ firstSyncedAt: true, syncedAt: true });

export const invoices = pgTable("invoices_sync", {
  invoiceId: integer("invoiceId").primaryKey(),
  orderId: integer("orderId"),
  customerId: integer("customerId"),
  customerName: text("customerName"),
  invoiceNo: text("invoiceNo"),
  supplierName: text("supplierName"),
  supplierOrgNo: text("supplierOrgNo"),
  invoiceText: text("invoiceText"),
  dateInvoiced: date("dateInvoiced", { mode: "string" }),
  dateDue: date("dateDue", { mode: "string" }),
  datePaid: date("datePaid", { mode: "string" }),
  dateChanged: timestamp("dateChanged").notNull(),
  totalIncVat: doublePrecision("totalIncVat").notNull().default(0),
  totalVat: doublePrecision("totalVat").notNull().default(0),
  amountPaid: doublePrecision("amountPaid").notNull().default(0),
  balance: doublePrecision("balance").notNull().default(0),
  currencySymbol: text("currencySymbol"),
  status: text("status"),
  externalStatus: text("externalStatus"),
  isCredited: boolean("isCredited").notNull().default(false),
  firstSyncedAt: timestamp("firstSyncedAt").notNull().defaultNow(),
  syncedAt: timestamp("syncedAt").notNull().defaultNow(),
}, (table) => [
  index("idx_invoices_customer").on(table.customerId),
  index("idx_invoices_date").on(table.dateInvoiced),
  index("idx_invoices_due").on(table.dateDue),
]);

export type Invoice = typeof invoices.$inferSelect;
export type InsertInvoice = typeof invoices.$inferInsert;
export const insertInvoiceSchema = createInsertSchema(invoices, {
  dateChanged: z.coerce.date(),
  dateInvoiced: isoDate.nullish(),
  dateDue: isoDate.nullish(),
  datePaid: isoDate.nullish(),
}).omit({ firstSyncedAt: true, syncedAt: true });

export const products = pgTable("products_sync", {
  productId: integer("productId").primaryKey(),
  productNo: text("productNo"),
  name: text("name"),
  description: text("description"),
  unitPrice: doublePrecision("unitPrice"),
  costPrice: doublePrecision("costPrice"),
  isActive: boolean("isActive").notNull().default(true),
  vatCode: text("vatCode"),
  dateChanged: timestamp("dateChanged").notNull(),
  firstSyncedAt: timestamp("firstSyncedAt").notNull().defaultNow(),
  syncedAt: timestamp("syncedAt").notNull().defaultNow(),
});

export type Product = typeof products.$inferSelect;
export type InsertProduct = typeof products.$inferInsert;
export const insertProductSchema = createInsertSchema(products, {
  dateChanged: z.coerce.date(),
}).omit({ firstSyncedAt: true, syncedAt: true });

export const transactions = pgTable("transactions_sync", {
  transactionId: text("transactionId").primaryKey(),
  voucherNo: text("voucherNo"),
  lineNo: integer("lineNo"),
  date: date("date", { mode: "string" }).notNull(),
  accountNo: text("accountNo"),
  amount: doublePrecision("amount").notNull(),
  debit: doublePrecision("debit").notNull().default(0),
  credit: doublePrecision("credit").notNull().default(0),
  currency: text("currency"),
  description: text("description"),
  invoiceNo: text("invoiceNo"),
  linkId: text("linkId"),
  ocr: text("ocr"),
  customerId: integer("customerId"),
  projectId: integer("projectId"),
  departmentId: integer("departmentId"),
  dateChanged: timestamp("dateChanged").notNull(),
  firstSyncedAt: timestamp("firstSyncedAt").notNull().defaultNow(),
  syncedAt: timestamp("syncedAt").notNull().defaultNow(),
}, (table) => [
  index("idx_transactions_date").on(table.date),
  index("idx_transactions_account").on(table.accountNo),
]);

export type Transaction = typeof transactions.$inferSelect;
export type InsertTransaction = typeof transactions.$inferInsert;
export const insertTransactionSchema = createInsertSchema(transactions, {
  dateChanged: z.coerce.date(),
  date: isoDate,
}).omit({ firstSyncedAt: true, syncedAt: true });

export const accounts = pgTable("accounts_sync", {
  accountNo: text("accountNo").primaryKey(),
  name: text("name"),
  accountType: text("accountType"),
  isActive: boolean("isActive").notNull().default(true),
  vatCode: text("vatCode"),
  openingBalance: doublePrecision("openingBalance"),
  closingBalance: doublePrecision("closingBalance"),
  dateChanged: timestamp("dateChanged").notNull(),
  firstSyncedAt: timestamp("firstSyncedAt").notNull().defaultNow(),
  syncedAt: timestamp("syncedAt").notNull().defaultNow(),
});

export type Account = typeof accounts.$inferSelect;
export type InsertAccount = typeof accounts.$inferInsert;
export const insertAccountSchema = createInsertSchema(accounts, {
  dateChanged: z.coerce.date(),
}).omit({ firstSyncedAt: true, syncedAt: true });

// ============================================
// Dashboard metrics
// ============================================

export const METRIC_CATEGORIES = ["financial", "operational", "customer", "tax"] as const;
export type MetricCategory = typeof METRIC_CATEGORIES[number];

// Append-only: each recompute writes a fresh snapshot row per metric.
export const dashboardMetrics = pgTable("dashboard_metrics", {
  id: serial("id").primaryKey(),
  metricName: text("metric_name").notNull(),
  metricCategory: text("metric_category", { enum: METRIC_CATEGORIES }).notNull(),
  metricValue: doublePrecision("metric_value"),
  metricValueText: text("metric_value_text"),
  metricUnit: text("metric_unit"),
  periodStart: date("period_start", { mode: "string" }),
  periodEnd: date("period_end", { mode: "string" }),
  calculatedAt: timestamp("calculated_at").notNull().defaultNow(),
  metadata: text("metadata"),
}, (table) => [
  index("idx_dashboard_metrics_name").on(table.metricName),
  index("idx_dashboard_metrics_category").on(table.metricCategory),
  index("idx_dashboard_metrics_calculated").on(table.calculatedAt),
]);

export type DashboardMetric = typeof dashboardMetrics.$inferSelect;
export type InsertDashboardMetric = typeof dashboardMetrics.$inferInsert;

export const ALERT_SEVERITIES = ["high", "medium", "low"] as const;
export type AlertSeverity = typeof ALERT_SEVERITIES[number];

export const ALERT_TYPES = ["overdue_invoice", "upcoming_payment", "low_cash", "unusual_transaction"] as const;
export type AlertType = typeof ALERT_TYPES[number];

// At most one open alert per (alert_type, entity_type, entity_id). Resolved rows
// are history and never reopen.
export const dashboardAlerts = pgTable("dashboard_alerts", {
  id: serial("id").primaryKey(),
  alertType: text("alert_type").notNull(),
  severity: text("severity", { enum: ALERT_SEVERITIES }).notNull(),
  title: text("title").notNull(),
  description: text("description"),
  amount: doublePrecision("amount"),
  dueDate: date("due_date", { mode: "string" }),
  entityId: text("entity_id"),
  entityType: text("entity_type"),
  isResolved: boolean("is_resolved").notNull().default(false),
  createdAt: timestamp("created_at").notNull().defaultNow(),
  resolvedAt: timestamp("resolved_at"),
}, (table) => [
  uniqueIndex("uq_dashboard_alerts_open")
    .on(table.alertType, sql`coalesce(${table.entityType}, '')`, sql`coalesce(${table.entityId}, '')`)
    .where(sql`${table.isResolved} = false`),
  index("idx_dashboard_alerts_type").on(table.alertType),
  check("chk_dashboard_alerts_resolution", sql`${table.isResolved} = (${table.resolvedAt} IS NOT NULL)`),
]);

export type DashboardAlert = typeof dashboardAlerts.$inferSelect;
export type InsertDashboardAlert = typeof dashboardAlerts.$inferInsert;

export const metricsTimeseries = pgTable("metrics_timeseries", {
  id: serial("id").primaryKey(),
  metricName: text("metric_name").notNull(),
  date: date("date", { mode: "string" }).notNull(),
  value: doublePrecision("value"),
  comparisonValue: doublePrecision("comparison_value"),
  metadata: text("metadata"),
  createdAt: timestamp("created_at").notNull().defaultNow(),
}, (table) => [
  uniqueIndex("uq_metrics_timeseries_name_date").on(table.metricName, table.date),
]);

export type TimeseriesPoint = typeof metricsTimeseries.$inferSelect;
export type InsertTimeseriesPoint = typeof metricsTimeseries.$inferInsert;

export const PAYMENT_STATUSES = ["fast_payer", "average", "slow_payer", "overdue"] as const;
export type PaymentStatus = typeof PAYMENT_STATUSES[number];

export const customerMetrics = pgTable("customer_metrics", {
  id: serial("id").primaryKey(),
  customerId: integer("customer_id").notNull(),
  customerName: text("customer_name"),
  totalRevenue: doublePrecision("total_revenue").notNull().default(0),
  invoiceCount: integer("invoice_count").notNull().default(0),
  avgPaymentDays: doublePrecision("avg_payment_days"),
  lastInvoiceDate: date("last_invoice_date", { mode: "string" }),
  paymentStatus: text("payment_status", { enum: PAYMENT_STATUSES }),
  lifetimeValue: doublePrecision("lifetime_value"),
  calculatedAt: timestamp("calculated_at").notNull().defaultNow(),
}, (table) => [
  uniqueIndex("uq_customer_metrics_customer").on(table.customerId),
]);

export type CustomerMetric = typeof customerMetrics.$inferSelect;
export type InsertCustomerMetric = typeof customerMetrics.$inferInsert;

// ============================================
// ML predictions & model registry
// ============================================

// Open-ended: cash_flow, revenue, churn_risk, payment_risk, clv and whatever
// else a model publishes.
export type PredictionType = string;

const predictionColumns = {
  id: serial("id").primaryKey(),
  predictionType: text("prediction_type").notNull(),
  entityType: text("entity_type"),
  entityId: integer("entity_id"),
  entityName: text("entity_name"),
  predictionDate: date("prediction_date", { mode: "string" }).notNull(),
  targetDate: date("target_date", { mode: "string" }),
  predictedValue: doublePrecision("predicted_value"),
  predictedCategory: text("predicted_category"),
  confidenceScore: doublePrecision("confidence_score"),
  modelVersion: text("model_version").notNull(),
  featuresUsed: text("features_used"),
  metadata: text("metadata"),
  isActive: boolean("is_active").notNull().default(true),
  actualValue: doublePrecision("actual_value"),
  actualDate: date("actual_date", { mode: "string" }),
  predictionError: doublePrecision("prediction_error"),
  createdAt: timestamp("created_at").notNull().defaultNow(),
  updatedAt: timestamp("updated_at").notNull().defaultNow(),
};

// One active row per (prediction_type, entity_type, entity_id); one reconciled
// outcome per key and target date.
export const mlPredictions = pgTable("ml_predictions", predictionColumns, (table) => [
  uniqueIndex("uq_ml_predictions_active")
    .on(table.predictionType, sql`coalesce(${table.entityType}, '')`, sql`coalesce(${table.entityId}, -1)`)
    .where(sql`${table.isActive}`),
  uniqueIndex("uq_ml_predictions_outcome")
    .on(table.predictionType, sql`coalesce(${table.entityType}, '')`, sql`coalesce(${table.entityId}, -1)`, table.targetDate)
    .where(sql`${table.actualValue} IS NOT NULL`),
  index("idx_ml_predictions_type").on(table.predictionType),
  index("idx_ml_predictions_entity").on(table.entityType, table.entityId),
  index("idx_ml_predictions_target").on(table.targetDate),
  check("chk_ml_predictions_error", sql`${table.actualValue} IS NOT NULL OR ${table.predictionError} IS NULL`),
  check("chk_ml_predictions_confidence", sql`${table.confidenceScore} IS NULL OR ${table.confidenceScore} BETWEEN 0 AND 1`),
]);

export type MlPrediction = typeof mlPredictions.$inferSelect;
export type InsertMlPrediction = typeof mlPredictions.$inferInsert;

// Superseded, never-reconciled predictions past the retention window.
export const mlPredictionsArchive = pgTable("ml_predictions_archive", {
  ...predictionColumns,
  id: integer("id").primaryKey(),
  archivedAt: timestamp("archived_at").notNull().defaultNow(),
});


export const MODEL_TYPES = ["regression", "classification", "forecasting"] as const;
export type ModelType = typeof MODEL_TYPES[number];

export const mlModelPerformance = pgTable("ml_model_performance", {
  id: serial("id").primaryKey(),
  modelName: text("model_name").notNull(),
  modelType: text("model_type", { enum: MODEL_TYPES }).notNull(),
  evaluationDate: date("evaluation_date", { mode: "string" }).notNull(),
  trainingSamples: integer("training_samples"),
  testSamples: integer("test_samples"),
  mae: doublePrecision("mae"),
  rmse: doublePrecision("rmse"),
  r2Score: doublePrecision("r2_score"),
  accuracy: doublePrecision("accuracy"),
  precisionScore: doublePrecision("precision_score"),
  recallScore: doublePrecision("recall_score"),
  f1Score: doublePrecision("f1_score"),
  aucRoc: doublePrecision("auc_roc"),
  topFeatures: text("top_features"),
  hyperparameters: text("hyperparameters"),
  trainingTimeSeconds: doublePrecision("training_time_seconds"),
  createdAt: timestamp("created_at").notNull().defaultNow(),
}, (table) => [
  index("idx_ml_model_performance_name").on(table.modelName, table.evaluationDate),
  check("chk_ml_model_performance_scope", sql`
    (${table.modelType} = 'classification' AND ${table.mae} IS NULL AND ${table.rmse} IS NULL AND ${table.r2Score} IS NULL)
    OR (${table.modelType} <> 'classification' AND ${table.accuracy} IS NULL AND ${table.precisionScore} IS NULL
        AND ${table.recallScore} IS NULL AND ${table.f1Score} IS NULL AND ${table.aucRoc} IS NULL)
  `),
]);

export type ModelPerformanceRow = typeof mlModelPerformance.$inferSelect;
export type InsertModelPerformance = typeof mlModelPerformance.$inferInsert;

// success: NULL while pending, then true/false. deployed_at is set iff deployed.
export const mlTrainingHistory = pgTable("ml_training_history", {
  id: serial("id").primaryKey(),
  modelName: text("model_name").notNull(),
  trainingDate: timestamp("training_date").notNull().defaultNow(),
  dateRangeStart: date("date_range_start", { mode: "string" }),
  dateRangeEnd: date("date_range_end", { mode: "string" }),
  recordsUsed: integer("records_used"),
  featuresCount: integer("features_count"),
  success: boolean("success"),
  errorMessage: text("error_message"),
  trainingDurationSeconds: doublePrecision("training_duration_seconds"),
  deployed: boolean("deployed").notNull().default(false),
  deployedAt: timestamp("deployed_at"),
  createdAt: timestamp("created_at").notNull().defaultNow(),
}, (table) => [
  index("idx_ml_training_history_model").on(table.modelName, table.trainingDate),
  check("chk_ml_training_history_deployed_at", sql`${table.deployed} = (${table.deployedAt} IS NOT NULL)`),
  check("chk_ml_training_history_deployed_success", sql`NOT ${table.deployed} OR ${table.success} IS TRUE`),
  check("chk_ml_training_history_failure", sql`${table.success} IS DISTINCT FROM false OR ${table.errorMessage} IS NOT NULL`),
]);

export type TrainingRunRow = typeof mlTrainingHistory.$inferSelect;
export type InsertTrainingRun = typeof mlTrainingHistory.$inferInsert;

// ============================================
// Views (DDL lives in migrations/0000_init.sql)
// ============================================

export const vActivePredictions = pgView("v_active_predictions", {
  predictionType: text("prediction_type").notNull(),
  entityType: text("entity_type"),
  predictionCount: integer("prediction_count").notNull(),
  avgConfidence: doublePrecision("avg_confidence"),
  earliestPrediction: date("earliest_prediction", { mode: "string" }),
  latestPrediction: date("latest_prediction", { mode: "string" }),
}).existing();

export const vModelAccuracy = pgView("v_model_accuracy", {
  predictionType: text("prediction_type").notNull(),
  totalPredictions: integer("total_predictions").notNull(),
  verifiedPredictions: integer("verified_predictions").notNull(),
  avgError: doublePrecision("avg_error"),
  avgConfidence: doublePrecision("avg_confidence"),
}).existing();
