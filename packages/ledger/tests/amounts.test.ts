import { describe, it, expect } from "vitest";
import { assertPositive, parseAmount } from "../src/amounts.js";
import { LedgerError } from "../src/types.js";

describe("parseAmount", () => {
  it("parses canonical integers", () => {
    expect(parseAmount("0")).toBe(0n);
    expect(parseAmount("1500")).toBe(1500n);
    expect(parseAmount("123456789012345678901234567890")).toBe(
      123456789012345678901234567890n,
    );
  });

  it.each(["", "-1", "1.5", " 1", "01", "1e3", "abc"])("rejects %j", (input) => {
    expect(() => parseAmount(input)).toThrow(LedgerError);
  });
});

describe("assertPositive", () => {
  it("accepts positive amounts", () => {
    expect(() => assertPositive(1n)).not.toThrow();
  });

  it("rejects zero and negatives with a labelled message", () => {
    expect(() => assertPositive(0n)).toThrow("amount must be positive, got 0");
    expect(() => assertPositive(-3n, "stake")).toThrow("stake must be positive, got -3");
  });
});
