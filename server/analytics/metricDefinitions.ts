import { differenceInCalendarDays, eachMonthOfInterval, endOfMonth, format, parseISO, subDays, subYears } from "date-fns";
import type { Invoice, MetricCategory, PaymentStatus, Transaction } from "@shared/schema";
import type { FactSnapshot } from "../ingestion/types";
import type { JsonValue } from "../lib/structuredBlob";

export const DEFAULT_CURRENCY = "NOK";

/** Inclusive calendar window, both ends as yyyy-MM-dd. */
export interface MetricWindow {
  periodStart: string;
  periodEnd: string;
}

export interface ComputedMetric {
  name: string;
  category: MetricCategory;
  value: number;
  unit: string;
  metadata?: { [key: string]: JsonValue };
}

export interface CustomerRollup {
  customerId: number;
  customerName: string | null;
  totalRevenue: number;
  invoiceCount: number;
  avgPaymentDays: number | null;
  lastInvoiceDate: string | null;
  paymentStatus: PaymentStatus;
  lifetimeValue: number;
}

export interface SeriesPoint {
  metricName: string;
  date: string;
  value: number;
  comparisonValue: number | null;
  metadata?: { [key: string]: JsonValue };
}

export const AGING_BUCKETS = [
  { name: "current", daysFrom: 0, daysTo: 30 },
  { name: "30_days", daysFrom: 30, daysTo: 60 },
  { name: "60_days", daysFrom: 60, daysTo: 90 },
  { name: "90_plus_days", daysFrom: 90, daysTo: null },
] as const;

export const PAYMENT_SPEED = {
  fastPayerDays: 15,
  slowPayerDays: 45,
} as const;

const CUSTOMER_LOOKBACK_DAYS = 365;

export function toDateKey(date: Date): string {
  return format(date, "yyyy-MM-dd");
}

function round(value: number, places = 2): number {
  const factor = 10 ** places;
  return Math.round(value * factor) / factor;
}

function sum(values: readonly number[]): number {
  return round(values.reduce((total, value) => total + value, 0));
}

function inRange(date: string | null, start: string, end: string): date is string {
  return date !== null && date >= start && date <= end;
}

export function isCancelled(invoice: Invoice): boolean {
  return invoice.status?.toLowerCase() === "cancelled";
}

/** Still owed: not cancelled, not credited, balance left. */
export function isOpenInvoice(invoice: Invoice): boolean {
  return !isCancelled(invoice) && !invoice.isCredited && invoice.balance > 0;
}

export function paymentDays(invoice: Invoice): number | null {
  if (!invoice.dateInvoiced || !invoice.datePaid) return null;
  return differenceInCalendarDays(parseISO(invoice.datePaid), parseISO(invoice.dateInvoiced));
}

function invoicedIn(invoices: readonly Invoice[], start: string, end: string): Invoice[] {
  return invoices.filter((invoice) => !isCancelled(invoice) && inRange(invoice.dateInvoiced, start, end));
}

function postedIn(transactions: readonly Transaction[], start: string, end: string): Transaction[] {
  return transactions.filter((txn) => inRange(txn.date, start, end));
}

export function cashFlow(transactions: readonly Transaction[]): { inflow: number; outflow: number; net: number } {
  const inflow = sum(transactions.filter((txn) => txn.amount > 0).map((txn) => txn.amount));
  const outflow = sum(transactions.filter((txn) => txn.amount < 0).map((txn) => -txn.amount));
  return { inflow, outflow, net: round(inflow - outflow) };
}

export function computeFinancialMetrics(snapshot: FactSnapshot, window: MetricWindow): ComputedMetric[] {
  const { periodStart, periodEnd } = window;
  const windowInvoices = invoicedIn(snapshot.invoices, periodStart, periodEnd);
  const openInvoices = snapshot.invoices.filter(
    (invoice) => isOpenInvoice(invoice) && invoice.dateInvoiced !== null && invoice.dateInvoiced <= periodEnd
  );

  const revenue = sum(windowInvoices.map((invoice) => invoice.totalIncVat));
  const flow = cashFlow(postedIn(snapshot.transactions, periodStart, periodEnd));

  const metrics: ComputedMetric[] = [
    {
      name: "total_revenue",
      category: "financial",
      value: revenue,
      unit: DEFAULT_CURRENCY,
      metadata: { invoice_count: windowInvoices.length },
    },
    {
      name: "outstanding_receivables",
      category: "financial",
      value: sum(openInvoices.map((invoice) => invoice.balance)),
      unit: DEFAULT_CURRENCY,
      metadata: { invoice_count: openInvoices.length },
    },
    {
      name: "net_cash_flow",
      category: "financial",
      value: flow.net,
      unit: DEFAULT_CURRENCY,
      metadata: { inflow: flow.inflow, outflow: flow.outflow },
    },
  ];

  if (windowInvoices.length > 0) {
    metrics.push({
      name: "avg_invoice_value",
      category: "financial",
      value: round(revenue / windowInvoices.length),
      unit: DEFAULT_CURRENCY,
    });
  }

  const end = parseISO(periodEnd);
  for (const bucket of AGING_BUCKETS) {
    const inBucket = openInvoices.filter((invoice) => {
      const age = differenceInCalendarDays(end, parseISO(invoice.dateInvoiced ?? periodEnd));
      return age >= bucket.daysFrom && (bucket.daysTo === null || age < bucket.daysTo);
    });
    metrics.push({
      name: `aging_${bucket.name}`,
      category: "financial",
      value: sum(inBucket.map((invoice) => invoice.balance)),
      unit: DEFAULT_CURRENCY,
      metadata: { days_from: bucket.daysFrom, days_to: bucket.daysTo, invoice_count: inBucket.length },
    });
  }

  return metrics;
}

export function computeOperationalMetrics(snapshot: FactSnapshot, window: MetricWindow): ComputedMetric[] {
  const { periodStart, periodEnd } = window;
  const windowInvoices = invoicedIn(snapshot.invoices, periodStart, periodEnd);
  const overdue = snapshot.invoices.filter(
    (invoice) => isOpenInvoice(invoice) && invoice.dateDue !== null && invoice.dateDue < periodEnd
  );

  const metrics: ComputedMetric[] = [
    { name: "invoice_count", category: "operational", value: windowInvoices.length, unit: "count" },
    {
      name: "overdue_invoice_count",
      category: "operational",
      value: overdue.length,
      unit: "count",
      metadata: { total_amount: sum(overdue.map((invoice) => invoice.balance)) },
    },
  ];

  const collectionDays = snapshot.invoices
    .filter((invoice) => inRange(invoice.datePaid, periodStart, periodEnd))
    .map(paymentDays)
    .filter((days): days is number => days !== null);

  if (collectionDays.length > 0) {
    metrics.push({
      name: "avg_payment_days",
      category: "operational",
      value: round(collectionDays.reduce((total, days) => total + days, 0) / collectionDays.length, 1),
      unit: "days",
      metadata: { invoice_count: collectionDays.length },
    });
  }

  return metrics;
}

export function computeTaxMetrics(snapshot: FactSnapshot, window: MetricWindow): ComputedMetric[] {
  const windowInvoices = invoicedIn(snapshot.invoices, window.periodStart, window.periodEnd);
  return [
    {
      name: "vat_invoiced",
      category: "tax",
      value: sum(windowInvoices.map((invoice) => invoice.totalVat)),
      unit: DEFAULT_CURRENCY,
    },
  ];
}

export function computeCustomerSummaryMetrics(snapshot: FactSnapshot, window: MetricWindow): ComputedMetric[] {
  const revenueByCustomer = new Map<number, number>();
  for (const invoice of invoicedIn(snapshot.invoices, window.periodStart, window.periodEnd)) {
    if (invoice.customerId === null) continue;
    revenueByCustomer.set(invoice.customerId, (revenueByCustomer.get(invoice.customerId) ?? 0) + invoice.totalIncVat);
  }

  const activeCustomers = revenueByCustomer.size;
  const metrics: ComputedMetric[] = [
    { name: "active_customers", category: "customer", value: activeCustomers, unit: "count" },
  ];
  if (activeCustomers > 0) {
    metrics.push({
      name: "avg_customer_revenue",
      category: "customer",
      value: round(sum([...revenueByCustomer.values()]) / activeCustomers),
      unit: DEFAULT_CURRENCY,
    });
  }
  return metrics;
}

export function computeDashboardMetrics(snapshot: FactSnapshot, window: MetricWindow): ComputedMetric[] {
  return [
    ...computeFinancialMetrics(snapshot, window),
    ...computeOperationalMetrics(snapshot, window),
    ...computeTaxMetrics(snapshot, window),
    ...computeCustomerSummaryMetrics(snapshot, window),
  ];
}

export function classifyPaymentSpeed(avgPaymentDays: number | null, hasOverdue: boolean): PaymentStatus {
  if (hasOverdue) return "overdue";
  if (avgPaymentDays === null) return "average";
  if (avgPaymentDays < PAYMENT_SPEED.fastPayerDays) return "fast_payer";
  if (avgPaymentDays > PAYMENT_SPEED.slowPayerDays) return "slow_payer";
  return "average";
}

/**
 * One rollup per customer invoiced in the year up to `asOf`. Lifetime value
 * covers every invoice up to `asOf`.
 */
export function computeCustomerRollups(snapshot: FactSnapshot, asOf: string): CustomerRollup[] {
  const lookbackStart = toDateKey(subDays(parseISO(asOf), CUSTOMER_LOOKBACK_DAYS - 1));
  const byCustomer = new Map<number, Invoice[]>();

  for (const invoice of snapshot.invoices) {
    if (invoice.customerId === null || isCancelled(invoice)) continue;
    if (invoice.dateInvoiced === null || invoice.dateInvoiced > asOf) continue;
    const list = byCustomer.get(invoice.customerId) ?? [];
    list.push(invoice);
    byCustomer.set(invoice.customerId, list);
  }

  const rollups: CustomerRollup[] = [];
  for (const [customerId, customerInvoices] of byCustomer) {
    const recent = customerInvoices.filter((invoice) => inRange(invoice.dateInvoiced, lookbackStart, asOf));
    if (recent.length === 0) continue;

    const latest = recent.reduce((a, b) => ((a.dateInvoiced ?? "") >= (b.dateInvoiced ?? "") ? a : b));
    const days = recent.map(paymentDays).filter((value): value is number => value !== null);
    const avgPaymentDays = days.length > 0 ? round(days.reduce((t, d) => t + d, 0) / days.length, 1) : null;
    const hasOverdue = customerInvoices.some(
      (invoice) => isOpenInvoice(invoice) && invoice.dateDue !== null && invoice.dateDue < asOf
    );

    rollups.push({
      customerId,
      customerName: latest.customerName,
      totalRevenue: sum(recent.map((invoice) => invoice.totalIncVat)),
      invoiceCount: recent.length,
      avgPaymentDays,
      lastInvoiceDate: latest.dateInvoiced,
      paymentStatus: classifyPaymentSpeed(avgPaymentDays, hasOverdue),
      lifetimeValue: sum(customerInvoices.map((invoice) => invoice.totalIncVat)),
    });
  }

  return rollups.sort((a, b) => b.totalRevenue - a.totalRevenue || a.customerId - b.customerId);
}

interface MonthlyDefinition {
  metricName: string;
  /** null when the month has no source rows at all. */
  valueFor(snapshot: FactSnapshot, monthStart: string, monthEnd: string): number | null;
}

export const MONTHLY_SERIES: readonly MonthlyDefinition[] = [
  {
    metricName: "revenue_monthly",
    valueFor(snapshot, monthStart, monthEnd) {
      const monthInvoices = invoicedIn(snapshot.invoices, monthStart, monthEnd);
      return monthInvoices.length === 0 ? null : sum(monthInvoices.map((invoice) => invoice.totalIncVat));
    },
  },
  {
    metricName: "net_cash_flow_monthly",
    valueFor(snapshot, monthStart, monthEnd) {
      const monthTransactions = postedIn(snapshot.transactions, monthStart, monthEnd);
      return monthTransactions.length === 0 ? null : cashFlow(monthTransactions).net;
    },
  },
];

/**
 * One point per month touched by the window, dated at the month start. The
 * comparison value is the same measure over the month one year earlier.
 */
export function computeMonthlySeries(snapshot: FactSnapshot, window: MetricWindow): SeriesPoint[] {
  const months = eachMonthOfInterval({ start: parseISO(window.periodStart), end: parseISO(window.periodEnd) });
  const points: SeriesPoint[] = [];

  for (const definition of MONTHLY_SERIES) {
    for (const month of months) {
      const monthStart = toDateKey(month);
      const monthEnd = toDateKey(endOfMonth(month));
      const priorMonth = subYears(month, 1);

      points.push({
        metricName: definition.metricName,
        date: monthStart,
        value: definition.valueFor(snapshot, monthStart, monthEnd) ?? 0,
        comparisonValue: definition.valueFor(snapshot, toDateKey(priorMonth), toDateKey(endOfMonth(priorMonth))),
        metadata: { month: format(month, "yyyy-MM") },
      });
    }
  }

  return points;
}
