import { z } from "zod";
import {
  insertAccountSchema,
  insertCompanySchema,
  insertInvoiceSchema,
  insertPersonSchema,
  insertProductSchema,
  insertTransactionSchema,
} from "@shared/schema";

const AMOUNT_TOLERANCE = 0.005;

function roundCents(value: number): number {
  return Math.round(value * 100) / 100;
}

export const companyRecordSchema = insertCompanySchema;
export const personRecordSchema = insertPersonSchema;
export const productRecordSchema = insertProductSchema;
export const accountRecordSchema = insertAccountSchema;

// balance == totalIncVat - amountPaid unless the invoice has been credited.
export const invoiceRecordSchema = insertInvoiceSchema.transform((record, ctx) => {
  const expected = roundCents((record.totalIncVat ?? 0) - (record.amountPaid ?? 0));
  const isCredited = record.isCredited ?? false;

  if (record.balance === undefined) {
    return { ...record, balance: isCredited ? 0 : expected };
  }

  if (!isCredited && Math.abs(record.balance - expected) > AMOUNT_TOLERANCE) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ["balance"],
      message: `balance ${record.balance} does not equal totalIncVat - amountPaid (${expected})`,
    });
    return z.NEVER;
  }

  return { ...record, balance: record.balance };
});

// Signed amount is debit - credit; feeds that only send the signed amount are accepted as is.
export const transactionRecordSchema = insertTransactionSchema
  .extend({ amount: z.number().optional() })
  .transform((record, ctx) => {
    const debit = record.debit ?? 0;
    const credit = record.credit ?? 0;
    const expected = roundCents(debit - credit);

    if (record.amount === undefined) {
      return { ...record, amount: expected };
    }

    const hasLegs = debit !== 0 || credit !== 0;
    if (hasLegs && Math.abs(record.amount - expected) > AMOUNT_TOLERANCE) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["amount"],
        message: `amount ${record.amount} does not equal debit - credit (${expected})`,
      });
      return z.NEVER;
    }

    return { ...record, amount: record.amount };
  });

export function describeValidationError(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}
