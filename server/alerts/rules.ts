import { addDays, differenceInCalendarDays, parseISO, subDays } from "date-fns";
import type { AlertSeverity, AlertType } from "@shared/schema";
import { cashFlow, isOpenInvoice, toDateKey } from "../analytics/metricDefinitions";
import type { FactSnapshot } from "../ingestion/types";

export interface AlertThresholds {
  /** Days overdue above which an overdue invoice is high severity. */
  overdueHighDays: number;
  overdueMediumDays: number;
  upcomingLookaheadDays: number;
  /** low_cash fires when trailing net cash flow falls below -lowCashThreshold. */
  lowCashThreshold: number;
  lowCashLookbackDays: number;
  unusualMultiplier: number;
  unusualBaselineDays: number;
  unusualRecentDays: number;
}

export const DEFAULT_THRESHOLDS: AlertThresholds = {
  overdueHighDays: 60,
  overdueMediumDays: 30,
  upcomingLookaheadDays: 7,
  lowCashThreshold: 0,
  lowCashLookbackDays: 30,
  unusualMultiplier: 5,
  unusualBaselineDays: 90,
  unusualRecentDays: 7,
};

export interface AlertCandidate {
  alertType: AlertType;
  severity: AlertSeverity;
  title: string;
  description: string;
  amount: number | null;
  dueDate: string | null;
  entityType: string | null;
  entityId: string | null;
}

export interface AlertRule {
  type: AlertType;
  evaluate(snapshot: FactSnapshot, today: Date, thresholds: AlertThresholds): AlertCandidate[];
}

/** Identity of the "current" alert for a condition. */
export function alertKey(alert: { alertType: string; entityType: string | null; entityId: string | null }): string {
  return `${alert.alertType}|${alert.entityType ?? ""}|${alert.entityId ?? ""}`;
}

export function overdueSeverity(daysOverdue: number, thresholds: AlertThresholds): AlertSeverity {
  if (daysOverdue > thresholds.overdueHighDays) return "high";
  if (daysOverdue > thresholds.overdueMediumDays) return "medium";
  return "low";
}

function formatAmount(amount: number): string {
  return amount.toLocaleString("en-US", { minimumFractionDigits: 2, maximumFractionDigits: 2 });
}

export const overdueInvoiceRule: AlertRule = {
  type: "overdue_invoice",
  evaluate(snapshot, today, thresholds) {
    const todayKey = toDateKey(today);
    return snapshot.invoices
      .filter((invoice) => isOpenInvoice(invoice) && invoice.dateDue !== null && invoice.dateDue < todayKey)
      .map((invoice): AlertCandidate => {
        const daysOverdue = differenceInCalendarDays(today, parseISO(invoice.dateDue ?? todayKey));
        return {
          alertType: "overdue_invoice",
          severity: overdueSeverity(daysOverdue, thresholds),
          title: `Overdue invoice ${invoice.invoiceNo ?? invoice.invoiceId}`,
          description: `${invoice.customerName ?? "Unknown customer"}: ${formatAmount(invoice.balance)} outstanding, ${daysOverdue} days overdue`,
          amount: invoice.balance,
          dueDate: invoice.dateDue,
          entityType: "invoice",
          entityId: String(invoice.invoiceId),
        };
      });
  },
};

export const upcomingPaymentRule: AlertRule = {
  type: "upcoming_payment",
  evaluate(snapshot, today, thresholds) {
    const todayKey = toDateKey(today);
    const horizonKey = toDateKey(addDays(today, thresholds.upcomingLookaheadDays));
    return snapshot.invoices
      .filter(
        (invoice) =>
          isOpenInvoice(invoice) &&
          invoice.dateDue !== null &&
          invoice.dateDue >= todayKey &&
          invoice.dateDue <= horizonKey
      )
      .map((invoice): AlertCandidate => {
        const daysLeft = differenceInCalendarDays(parseISO(invoice.dateDue ?? todayKey), today);
        return {
          alertType: "upcoming_payment",
          severity: "low",
          title: `Invoice ${invoice.invoiceNo ?? invoice.invoiceId} due ${daysLeft === 0 ? "today" : `in ${daysLeft} days`}`,
          description: `${invoice.customerName ?? "Unknown customer"}: ${formatAmount(invoice.balance)} due ${invoice.dateDue}`,
          amount: invoice.balance,
          dueDate: invoice.dateDue,
          entityType: "invoice",
          entityId: String(invoice.invoiceId),
        };
      });
  },
};

export const lowCashRule: AlertRule = {
  type: "low_cash",
  evaluate(snapshot, today, thresholds) {
    const todayKey = toDateKey(today);
    const fromKey = toDateKey(subDays(today, thresholds.lowCashLookbackDays));
    const recent = snapshot.transactions.filter((txn) => txn.date > fromKey && txn.date <= todayKey);
    if (recent.length === 0) return [];

    const flow = cashFlow(recent);
    if (flow.net >= -thresholds.lowCashThreshold) return [];

    return [
      {
        alertType: "low_cash",
        severity: "high",
        title: "Negative cash flow",
        description: `Net cash flow over the last ${thresholds.lowCashLookbackDays} days is ${formatAmount(flow.net)} (in ${formatAmount(flow.inflow)}, out ${formatAmount(flow.outflow)})`,
        amount: flow.net,
        dueDate: null,
        entityType: "company",
        entityId: null,
      },
    ];
  },
};

export const unusualTransactionRule: AlertRule = {
  type: "unusual_transaction",
  evaluate(snapshot, today, thresholds) {
    const todayKey = toDateKey(today);
    const baselineFrom = toDateKey(subDays(today, thresholds.unusualBaselineDays));
    const recentFrom = toDateKey(subDays(today, thresholds.unusualRecentDays));

    const baseline = snapshot.transactions.filter((txn) => txn.date > baselineFrom && txn.date <= todayKey);
    if (baseline.length === 0) return [];
    const meanAbs = baseline.reduce((total, txn) => total + Math.abs(txn.amount), 0) / baseline.length;
    const limit = meanAbs * thresholds.unusualMultiplier;

    return baseline
      .filter((txn) => txn.date > recentFrom && Math.abs(txn.amount) > limit)
      .map((txn): AlertCandidate => ({
        alertType: "unusual_transaction",
        severity: "medium",
        title: `Unusual transaction ${txn.voucherNo ?? txn.transactionId}`,
        description: `${txn.description ?? "Transaction"} of ${formatAmount(txn.amount)} on ${txn.date} is more than ${thresholds.unusualMultiplier}x the ${thresholds.unusualBaselineDays}-day average`,
        amount: txn.amount,
        dueDate: null,
        entityType: "transaction",
        entityId: txn.transactionId,
      }));
  },
};

export const DEFAULT_RULES: readonly AlertRule[] = [
  overdueInvoiceRule,
  upcomingPaymentRule,
  lowCashRule,
  unusualTransactionRule,
];
