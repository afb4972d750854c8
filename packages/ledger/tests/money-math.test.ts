/**
 * Tests for the deterministic money math engine.
 *
 * Covers:
 * - parseAmount / formatAmount
 * - Scale inference and alignment
 * - Exact multiplication and half-up rounding
 * - Validation and error cases
 */

import { describe, it, expect } from "vitest";
import type { Money } from "@coffer/types";
import {
  parseAmount,
  formatAmount,
  money,
  zeroMoney,
  addMoney,
  subtractMoney,
  multiplyMoney,
  multiplyByInteger,
  roundHalfUp,
  compareMoney,
  isZero,
  isPositive,
  isNegative,
  minMoney,
  displayAmount,
} from "../src/money-math.js";
import { LedgerError } from "../src/types.js";
import { thrownBy } from "./helpers.js";

function m(amount: string, decimals: number): Money {
  return { amount, decimals };
}

// ─── parseAmount ─────────────────────────────────────────────────────────

describe("parseAmount", () => {
  it("parses a decimal number", () => {
    expect(parseAmount("100.50", 2)).toBe(10050n);
  });

  it("pads the fractional part to the scale", () => {
    expect(parseAmount("1.5", 3)).toBe(1500n);
    expect(parseAmount("100", 2)).toBe(10000n);
  });

  it("parses negatives", () => {
    expect(parseAmount("-50.25", 2)).toBe(-5025n);
  });

  it("rejects more fractional digits than the scale", () => {
    expect(() => parseAmount("1.234", 2)).toThrow(LedgerError);
    expect(() => parseAmount("1.234", 2)).toThrow("has 3 decimal places");
  });

  it("rejects malformed strings", () => {
    expect(() => parseAmount("", 2)).toThrow(LedgerError);
    expect(() => parseAmount("abc", 2)).toThrow("Invalid amount format");
    expect(() => parseAmount("1e5", 2)).toThrow("Invalid amount format");
    expect(() => parseAmount("1.", 2)).toThrow("Invalid amount format");
  });

  it("uses the INVALID_AMOUNT code", () => {
    expect(thrownBy(() => parseAmount("x", 2))).toHaveProperty("code", "INVALID_AMOUNT");
  });
});

// ─── formatAmount ────────────────────────────────────────────────────────

describe("formatAmount", () => {
  it("formats with the given scale", () => {
    expect(formatAmount(10050n, 2)).toBe("100.50");
  });

  it("pads small values with leading zeros", () => {
    expect(formatAmount(5n, 2)).toBe("0.05");
  });

  it("formats negatives", () => {
    expect(formatAmount(-5025n, 2)).toBe("-50.25");
  });

  it("formats integers at scale 0", () => {
    expect(formatAmount(42n, 0)).toBe("42");
  });
});

// ─── Construction ────────────────────────────────────────────────────────

describe("money", () => {
  it("infers the scale from the literal", () => {
    expect(money("10.5")).toEqual(m("10.5", 1));
    expect(money("10.50")).toEqual(m("10.50", 2));
    expect(money("7")).toEqual(m("7", 0));
  });

  it("accepts bigint", () => {
    expect(money(42n)).toEqual(m("42", 0));
  });

  it("rejects exponent notation", () => {
    expect(() => money("1e5")).toThrow(LedgerError);
  });
});

describe("zeroMoney", () => {
  it("defaults to cents", () => {
    expect(zeroMoney()).toEqual(m("0.00", 2));
  });

  it("takes an explicit scale", () => {
    expect(zeroMoney(0)).toEqual(m("0", 0));
  });
});

// ─── Arithmetic ──────────────────────────────────────────────────────────

describe("addMoney / subtractMoney", () => {
  it("aligns operands to the larger scale", () => {
    expect(addMoney(money("10.5"), money("0.25"))).toEqual(m("10.75", 2));
  });

  it("can go negative", () => {
    expect(subtractMoney(money("1.00"), money("2.50"))).toEqual(m("-1.50", 2));
  });
});

describe("multiplyMoney", () => {
  it("keeps every digit of the product", () => {
    expect(multiplyMoney(money("123.45"), money("0.02"))).toEqual(m("2.4690", 4));
  });
});

describe("multiplyByInteger", () => {
  it("multiplies by a count", () => {
    expect(multiplyByInteger(money("2.50"), 2)).toEqual(m("5.00", 2));
  });

  it("rejects non-integer factors", () => {
    expect(() => multiplyByInteger(money("2.50"), 1.5)).toThrow("Multiplier must be an integer");
  });
});

describe("roundHalfUp", () => {
  it("rounds up at or above the half", () => {
    expect(roundHalfUp(m("2.4690", 4), 2)).toEqual(m("2.47", 2));
    expect(roundHalfUp(m("2.465", 3), 2)).toEqual(m("2.47", 2));
  });

  it("rounds down below the half", () => {
    expect(roundHalfUp(m("2.464", 3), 2)).toEqual(m("2.46", 2));
  });

  it("rounds negative halves away from zero", () => {
    expect(roundHalfUp(m("-2.465", 3), 2)).toEqual(m("-2.47", 2));
  });

  it("widens values already within the scale", () => {
    expect(roundHalfUp(m("5", 0), 2)).toEqual(m("5.00", 2));
  });
});

// ─── Comparison ──────────────────────────────────────────────────────────

describe("comparison", () => {
  it("compares regardless of scale", () => {
    expect(compareMoney(money("1.5"), money("1.50"))).toBe(0);
    expect(compareMoney(money("1.49"), money("1.5"))).toBe(-1);
    expect(compareMoney(money("2"), money("1.99"))).toBe(1);
  });

  it("classifies sign", () => {
    expect(isZero(money("0.00"))).toBe(true);
    expect(isPositive(money("0.01"))).toBe(true);
    expect(isPositive(money("0"))).toBe(false);
    expect(isNegative(money("-0.01"))).toBe(true);
  });

  it("picks the smaller value", () => {
    const small = money("5.00");
    const large = money("7.50");
    expect(minMoney(small, large)).toBe(small);
    expect(minMoney(large, small)).toBe(small);
  });
});

describe("displayAmount", () => {
  it("renders two decimals", () => {
    expect(displayAmount(money("1115"))).toBe("1115.00");
    expect(displayAmount(m("2.4690", 4))).toBe("2.47");
  });
});
