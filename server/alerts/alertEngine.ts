import { and, desc, eq, inArray, type SQL } from "drizzle-orm";
import { dashboardAlerts, type AlertSeverity, type DashboardAlert } from "@shared/schema";
import type { Database } from "../db";
import { createError } from "../errors";
import type { FactStore } from "../ingestion/factStore";
import { alertKey, DEFAULT_RULES, DEFAULT_THRESHOLDS, type AlertRule, type AlertThresholds } from "./rules";

export type AlertState =
  | { status: "open" }
  | { status: "resolved"; resolvedAt: Date };

export interface Alert {
  id: number;
  alertType: string;
  severity: AlertSeverity;
  title: string;
  description: string | null;
  amount: number | null;
  dueDate: string | null;
  entityType: string | null;
  entityId: string | null;
  createdAt: Date;
  state: AlertState;
}

export interface EvaluationResult {
  evaluatedAt: Date;
  today: Date;
  candidates: number;
  created: number;
  deduplicated: number;
  resolved: number;
}

export function toAlert(row: DashboardAlert): Alert {
  const { isResolved, resolvedAt, ...rest } = row;
  const state: AlertState =
    isResolved && resolvedAt ? { status: "resolved", resolvedAt } : { status: "open" };
  return { ...rest, state };
}

/**
 * Turns rule conditions into alert rows. The open-alert unique index carries
 * deduplication: inserting a candidate that already has an open row is a no-op.
 * Open alerts whose condition no longer holds are resolved; a resolved row is
 * never reopened.
 */
export class AlertEngine {
  private readonly thresholds: AlertThresholds;

  constructor(
    private readonly db: Database,
    private readonly facts: FactStore,
    thresholds: Partial<AlertThresholds> = {},
    private readonly rules: readonly AlertRule[] = DEFAULT_RULES
  ) {
    this.thresholds = { ...DEFAULT_THRESHOLDS, ...thresholds };
  }

  async evaluate(options: { today?: Date } = {}): Promise<EvaluationResult> {
    const evaluatedAt = new Date();
    const snapshot = await this.facts.snapshotAsOf();
    const today = options.today ?? snapshot.asOf;

    const candidates = this.rules.flatMap((rule) => rule.evaluate(snapshot, today, this.thresholds));
    const ruleTypes = this.rules.map((rule) => rule.type);

    let created = 0;
    let deduplicated = 0;
    for (const candidate of candidates) {
      const inserted = await this.db
        .insert(dashboardAlerts)
        .values({ ...candidate, isResolved: false, createdAt: evaluatedAt })
        .onConflictDoNothing()
        .returning({ id: dashboardAlerts.id });
      if (inserted.length > 0) created++;
      else deduplicated++;
    }

    const stillTrue = new Set(candidates.map(alertKey));
    const open = ruleTypes.length === 0
      ? []
      : await this.db
          .select()
          .from(dashboardAlerts)
          .where(and(eq(dashboardAlerts.isResolved, false), inArray(dashboardAlerts.alertType, ruleTypes)));

    let resolved = 0;
    for (const alert of open) {
      if (stillTrue.has(alertKey(alert))) continue;
      if (await this.markResolved(alert.id, evaluatedAt)) resolved++;
    }

    console.log(
      `[AlertEngine] ${candidates.length} conditions: ${created} created, ${deduplicated} already open, ${resolved} resolved`
    );

    return { evaluatedAt, today, candidates: candidates.length, created, deduplicated, resolved };
  }

  /** Operator resolution. Resolving an already resolved alert changes nothing. */
  async resolve(alertId: number): Promise<Alert> {
    await this.markResolved(alertId, new Date());
    const [row] = await this.db.select().from(dashboardAlerts).where(eq(dashboardAlerts.id, alertId));
    if (!row) {
      throw createError("ALERT_NOT_FOUND", { alertId });
    }
    return toAlert(row);
  }

  async listAlerts(filter: { status?: AlertState["status"]; alertType?: string } = {}): Promise<Alert[]> {
    const conditions: SQL[] = [];
    if (filter.status) conditions.push(eq(dashboardAlerts.isResolved, filter.status === "resolved"));
    if (filter.alertType) conditions.push(eq(dashboardAlerts.alertType, filter.alertType));

    const rows = await this.db
      .select()
      .from(dashboardAlerts)
      .where(and(...conditions))
      .orderBy(desc(dashboardAlerts.createdAt), desc(dashboardAlerts.id));
    return rows.map(toAlert);
  }

  private async markResolved(alertId: number, resolvedAt: Date): Promise<boolean> {
    const updated = await this.db
      .update(dashboardAlerts)
      .set({ isResolved: true, resolvedAt })
      .where(and(eq(dashboardAlerts.id, alertId), eq(dashboardAlerts.isResolved, false)))
      .returning({ id: dashboardAlerts.id });
    return updated.length > 0;
  }
}
