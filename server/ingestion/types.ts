import type { Account, Company, Invoice, Person, Product, Transaction } from "@shared/schema";

export const FACT_KINDS = ["company", "person", "invoice", "product", "transaction", "account"] as const;
export type FactKind = typeof FACT_KINDS[number];

export function isFactKind(value: string): value is FactKind {
  return FACT_KINDS.some((kind) => kind === value);
}

/** Primary key field of each synced record type. */
export const FACT_KEY_FIELDS: Record<FactKind, string> = {
  company: "companyId",
  person: "personId",
  invoice: "invoiceId",
  product: "productId",
  transaction: "transactionId",
  account: "accountNo",
};

export type MergeOutcome = "inserted" | "updated" | "stale" | "invalid";

export interface MergeResult {
  kind: FactKind;
  key: string;
  outcome: MergeOutcome;
  error?: string;
}

export interface IngestionResult {
  inserted: number;
  updated: number;
  skipped: number;
  errors: Array<{ externalId: string; error: string }>;
}

/**
 * Facts as committed at a single point in time. Every analytical pass reads
 * exactly one of these.
 */
export interface FactSnapshot {
  asOf: Date;
  companies: readonly Company[];
  persons: readonly Person[];
  invoices: readonly Invoice[];
  products: readonly Product[];
  transactions: readonly Transaction[];
  accounts: readonly Account[];
}
