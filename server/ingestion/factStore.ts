import { getTableColumns, lte, sql, type SQL } from "drizzle-orm";
import type { AnyPgColumn, PgTable } from "drizzle-orm/pg-core";
import { ZodError } from "zod";
import {
  accounts,
  companies,
  invoices,
  persons,
  products,
  transactions,
} from "@shared/schema";
import type { Database } from "../db";
import { createError } from "../errors";
import {
  accountRecordSchema,
  companyRecordSchema,
  describeValidationError,
  invoiceRecordSchema,
  personRecordSchema,
  productRecordSchema,
  transactionRecordSchema,
} from "./records";
import {
  FACT_KEY_FIELDS,
  isFactKind,
  type FactKind,
  type FactSnapshot,
  type IngestionResult,
  type MergeResult,
} from "./types";

type WriteOutcome = "inserted" | "updated" | "stale";

// xmax is 0 only on a freshly inserted tuple.
const MERGE_RETURNING = { inserted: sql<boolean>`(xmax = 0)` };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * SET list for ON CONFLICT DO UPDATE that copies every column from the proposed
 * row except the key and firstSyncedAt.
 */
function excludedSet(table: PgTable, keyColumn: AnyPgColumn): Record<string, SQL> {
  const set: Record<string, SQL> = {};
  for (const [field, column] of Object.entries(getTableColumns(table))) {
    if (column.name === keyColumn.name || column.name === "firstSyncedAt") continue;
    set[field] = sql.raw(`excluded."${column.name}"`);
  }
  return set;
}

function knownBy(firstSyncedAt: AnyPgColumn, asOf: Date | undefined): SQL | undefined {
  return asOf === undefined ? undefined : lte(firstSyncedAt, asOf);
}

function newerThanStored(dateChanged: AnyPgColumn): SQL {
  return sql`${dateChanged} < excluded."dateChanged"`;
}

/**
 * Synced fact tables. Records are merged last-write-wins on dateChanged: a
 * record that is not strictly newer than the stored row is a no-op.
 */
export class FactStore {
  constructor(private readonly db: Database) {}

  async upsert(kind: FactKind, record: unknown, syncedAt: Date = new Date()): Promise<MergeResult> {
    const key = this.recordKey(kind, record);
    try {
      const outcome = await this.merge(kind, record, syncedAt);
      return { kind, key, outcome };
    } catch (error) {
      if (error instanceof ZodError) {
        return { kind, key, outcome: "invalid", error: describeValidationError(error) };
      }
      throw error;
    }
  }

  /**
   * Each record is merged on its own; a malformed or failing record is reported
   * and the rest of the batch continues.
   */
  async upsertBatch(kind: string, records: readonly unknown[]): Promise<IngestionResult> {
    if (!isFactKind(kind)) {
      throw createError("UNKNOWN_FACT_KIND", { kind });
    }

    const result: IngestionResult = { inserted: 0, updated: 0, skipped: 0, errors: [] };
    const syncedAt = new Date();

    for (const record of records) {
      try {
        const merged = await this.upsert(kind, record, syncedAt);
        switch (merged.outcome) {
          case "inserted":
            result.inserted++;
            break;
          case "updated":
            result.updated++;
            break;
          case "stale":
            result.skipped++;
            break;
          case "invalid":
            result.errors.push({ externalId: merged.key, error: merged.error ?? "Invalid record" });
            break;
        }
      } catch (error) {
        result.errors.push({
          externalId: this.recordKey(kind, record),
          error: error instanceof Error ? error.message : "Unknown error",
        });
      }
    }

    console.log(
      `[FactStore] ${kind}: ${result.inserted} inserted, ${result.updated} updated, ${result.skipped} stale, ${result.errors.length} rejected`
    );
    return result;
  }

  /**
   * Reads all fact tables in one read-only REPEATABLE READ transaction, which is
   * the cut every analytical pass works from.
   *
   * With `asOf`, records that first reached the store after it are left out.
   * Records already known by then appear in their latest accepted version.
   */
  async snapshotAsOf(asOf?: Date): Promise<FactSnapshot> {
    return this.db.transaction(
      async (tx) => {
        const companyRows = await tx.select().from(companies).where(knownBy(companies.firstSyncedAt, asOf));
        const personRows = await tx.select().from(persons).where(knownBy(persons.firstSyncedAt, asOf));
        const invoiceRows = await tx.select().from(invoices).where(knownBy(invoices.firstSyncedAt, asOf));
        const productRows = await tx.select().from(products).where(knownBy(products.firstSyncedAt, asOf));
        const transactionRows = await tx
          .select()
          .from(transactions)
          .where(knownBy(transactions.firstSyncedAt, asOf));
        const accountRows = await tx.select().from(accounts).where(knownBy(accounts.firstSyncedAt, asOf));

        return Object.freeze({
          asOf: asOf ?? new Date(),
          companies: Object.freeze(companyRows),
          persons: Object.freeze(personRows),
          invoices: Object.freeze(invoiceRows),
          products: Object.freeze(productRows),
          transactions: Object.freeze(transactionRows),
          accounts: Object.freeze(accountRows),
        });
      },
      { isolationLevel: "repeatable read", accessMode: "read only" }
    );
  }

  private async merge(kind: FactKind, record: unknown, syncedAt: Date): Promise<WriteOutcome> {
    switch (kind) {
      case "company": {
        const row = { ...companyRecordSchema.parse(record), firstSyncedAt: syncedAt, syncedAt };
        return this.settle(
          this.db.insert(companies).values(row).onConflictDoUpdate({
            target: companies.companyId,
            set: excludedSet(companies, companies.companyId),
            setWhere: newerThanStored(companies.dateChanged),
          }).returning(MERGE_RETURNING)
        );
      }
      case "person": {
        const row = { ...personRecordSchema.parse(record), firstSyncedAt: syncedAt, syncedAt };
        return this.settle(
          this.db.insert(persons).values(row).onConflictDoUpdate({
            target: persons.personId,
            set: excludedSet(persons, persons.personId),
            setWhere: newerThanStored(persons.dateChanged),
          }).returning(MERGE_RETURNING)
        );
      }
      case "invoice": {
        const row = { ...invoiceRecordSchema.parse(record), firstSyncedAt: syncedAt, syncedAt };
        return this.settle(
          this.db.insert(invoices).values(row).onConflictDoUpdate({
            target: invoices.invoiceId,
            set: excludedSet(invoices, invoices.invoiceId),
            setWhere: newerThanStored(invoices.dateChanged),
          }).returning(MERGE_RETURNING)
        );
      }
      case "product": {
        const row = { ...productRecordSchema.parse(record), firstSyncedAt: syncedAt, syncedAt };
        return this.settle(
          this.db.insert(products).values(row).onConflictDoUpdate({
            target: products.productId,
            set: excludedSet(products, products.productId),
            setWhere: newerThanStored(products.dateChanged),
          }).returning(MERGE_RETURNING)
        );
      }
      case "transaction": {
        const row = { ...transactionRecordSchema.parse(record), firstSyncedAt: syncedAt, syncedAt };
        return this.settle(
          this.db.insert(transactions).values(row).onConflictDoUpdate({
            target: transactions.transactionId,
            set: excludedSet(transactions, transactions.transactionId),
            setWhere: newerThanStored(transactions.dateChanged),
          }).returning(MERGE_RETURNING)
        );
      }
      case "account": {
        const row = { ...accountRecordSchema.parse(record), firstSyncedAt: syncedAt, syncedAt };
        return this.settle(
          this.db.insert(accounts).values(row).onConflictDoUpdate({
            target: accounts.accountNo,
            set: excludedSet(accounts, accounts.accountNo),
            setWhere: newerThanStored(accounts.dateChanged),
          }).returning(MERGE_RETURNING)
        );
      }
    }
  }

  private async settle(query: PromiseLike<Array<{ inserted: boolean }>>): Promise<WriteOutcome> {
    const [row] = await query;
    if (!row) return "stale";
    return row.inserted ? "inserted" : "updated";
  }

  private recordKey(kind: FactKind, record: unknown): string {
    const value = isRecord(record) ? record[FACT_KEY_FIELDS[kind]] : undefined;
    return typeof value === "string" || typeof value === "number" ? String(value) : "(missing key)";
  }
}
