import { afterEach, describe, expect, it, vi } from "vitest";
import { blobText, StructuredBlob } from "./structuredBlob";

describe("StructuredBlob", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("parses valid JSON on first access", () => {
    const blob = StructuredBlob.fromRaw('{"month":"2024-01","count":3}');

    expect(blob.raw).toBe('{"month":"2024-01","count":3}');
    expect(blob.value).toEqual({ month: "2024-01", count: 3 });
    expect(blob.isReadable).toBe(true);
  });

  it("keeps unreadable text and yields undefined", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const blob = StructuredBlob.fromRaw("{features: [revenue");

    expect(blob.value).toBeUndefined();
    expect(blob.isReadable).toBe(false);
    expect(blob.raw).toBe("{features: [revenue");
    expect(blob.toJSON()).toBe("{features: [revenue");
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it("parses only once", () => {
    const parse = vi.spyOn(JSON, "parse");
    const blob = StructuredBlob.fromRaw("[1,2]");

    void blob.value;
    void blob.value;

    expect(parse).toHaveBeenCalledTimes(1);
  });

  it("treats missing and blank text as absent", () => {
    expect(StructuredBlob.fromRaw(null).value).toBeUndefined();
    expect(StructuredBlob.fromRaw(undefined).raw).toBeNull();
    expect(StructuredBlob.fromRaw("   ").value).toBeUndefined();
    expect(StructuredBlob.fromRaw(null).toJSON()).toBeNull();
  });

  it("serializes to the parsed value", () => {
    const blob = StructuredBlob.fromValue({ depth: 6 });

    expect(blob.raw).toBe('{"depth":6}');
    expect(JSON.stringify({ hyperparameters: blob })).toBe('{"hyperparameters":{"depth":6}}');
  });
});

describe("blobText", () => {
  it("passes strings through untouched", () => {
    expect(blobText("not json")).toBe("not json");
  });

  it("stringifies structured values", () => {
    expect(blobText(["revenue", "days_overdue"])).toBe('["revenue","days_overdue"]');
    expect(blobText({ a: 1 })).toBe('{"a":1}');
  });

  it("maps absent values to null", () => {
    expect(blobText(undefined)).toBeNull();
    expect(blobText(null)).toBeNull();
  });
});
