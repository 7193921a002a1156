import { z } from "zod";

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(jsonValueSchema), z.record(jsonValueSchema)])
);

/**
 * A JSON-bearing text column (feature lists, hyperparameters, metadata).
 * The raw text is kept verbatim; the parsed view is computed on first access
 * and is `undefined` when the text is missing or not valid JSON.
 */
export class StructuredBlob<T extends JsonValue = JsonValue> {
  readonly raw: string | null;
  private parsed: { value: T | undefined } | null = null;

  private constructor(raw: string | null) {
    this.raw = raw;
  }

  static fromRaw<T extends JsonValue = JsonValue>(raw: string | null | undefined): StructuredBlob<T> {
    return new StructuredBlob<T>(raw ?? null);
  }

  static fromValue<T extends JsonValue>(value: T): StructuredBlob<T> {
    const blob = new StructuredBlob<T>(JSON.stringify(value));
    blob.parsed = { value };
    return blob;
  }

  get value(): T | undefined {
    if (!this.parsed) {
      this.parsed = { value: this.parse() };
    }
    return this.parsed.value;
  }

  get isReadable(): boolean {
    return this.value !== undefined;
  }

  toJSON(): JsonValue | string | null {
    const value = this.value;
    return value === undefined ? this.raw : value;
  }

  private parse(): T | undefined {
    if (this.raw === null || this.raw.trim() === "") return undefined;
    try {
      const value: T = JSON.parse(this.raw);
      return value;
    } catch (error) {
      console.warn(`[StructuredBlob] Unreadable payload (${error instanceof Error ? error.message : "parse error"})`);
      return undefined;
    }
  }
}

/**
 * Accepts either a ready JSON string or a structured value from an API caller.
 */
export function blobText(input: JsonValue | undefined): string | null {
  if (input === undefined || input === null) return null;
  if (typeof input === "string") return input;
  return JSON.stringify(input);
}
