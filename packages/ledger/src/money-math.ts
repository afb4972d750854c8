/**
 * @coffer/ledger: Deterministic monetary arithmetic.
 *
 * All arithmetic uses bigint internally for precision.
 * String amounts are converted to/from bigint via decimal scaling.
 *
 * Rules:
 * - No floating-point operations
 * - Operands of different scale are aligned to the larger scale
 * - Rounding happens only when asked for (roundHalfUp)
 */

import type { Money } from "@coffer/types";
import { LedgerError } from "./types.js";

const AMOUNT_PATTERN = /^-?\d+(\.\d+)?$/;

// ─── Internal Helpers ────────────────────────────────────────────────────

/**
 * Parse a decimal string amount into a bigint scaled by decimals.
 *
 * "100.50" with decimals=2 → 10050n
 * "100" with decimals=4 → 1000000n
 * "-50.25" with decimals=2 → -5025n
 */
export function parseAmount(amount: string, decimals: number): bigint {
  if (typeof amount !== "string" || amount.trim() === "") {
    throw new LedgerError("INVALID_AMOUNT", `Invalid amount: "${String(amount)}"`);
  }

  const trimmed = amount.trim();

  if (!AMOUNT_PATTERN.test(trimmed)) {
    throw new LedgerError("INVALID_AMOUNT", `Invalid amount format: "${trimmed}"`);
  }

  const negative = trimmed.startsWith("-");
  const abs = negative ? trimmed.slice(1) : trimmed;
  const [intPart = "0", fracPart = ""] = abs.split(".");

  if (fracPart.length > decimals) {
    throw new LedgerError(
      "INVALID_AMOUNT",
      `Amount "${trimmed}" has ${String(fracPart.length)} decimal places, but only ${String(decimals)} are allowed`,
    );
  }

  const value = BigInt(intPart + fracPart.padEnd(decimals, "0"));
  return negative ? -value : value;
}

/**
 * Convert a scaled bigint back to a decimal string.
 *
 * 10050n with decimals=2 → "100.50"
 * -5025n with decimals=2 → "-50.25"
 */
export function formatAmount(scaled: bigint, decimals: number): string {
  if (decimals === 0) {
    return scaled.toString();
  }

  const negative = scaled < 0n;
  const abs = negative ? -scaled : scaled;
  const str = abs.toString().padStart(decimals + 1, "0");
  const result = `${str.slice(0, str.length - decimals)}.${str.slice(str.length - decimals)}`;

  return negative ? `-${result}` : result;
}

function scaled(m: Money, decimals: number): bigint {
  return parseAmount(m.amount, m.decimals) * 10n ** BigInt(decimals - m.decimals);
}

function fromScaled(value: bigint, decimals: number): Money {
  return { amount: formatAmount(value, decimals), decimals };
}

// ─── Construction ────────────────────────────────────────────────────────

/**
 * Build a Money value. The scale is taken from the literal:
 * money("10.5") has one decimal, money("10.50") two.
 */
export function money(amount: string | bigint): Money {
  const text = typeof amount === "bigint" ? amount.toString() : amount.trim();
  if (!AMOUNT_PATTERN.test(text)) {
    throw new LedgerError("INVALID_AMOUNT", `Invalid amount format: "${text}"`);
  }
  const dot = text.indexOf(".");
  const decimals = dot === -1 ? 0 : text.length - dot - 1;
  return fromScaled(parseAmount(text, decimals), decimals);
}

/**
 * Create a zero Money value.
 */
export function zeroMoney(decimals = 2): Money {
  return fromScaled(0n, decimals);
}

// ─── Arithmetic ──────────────────────────────────────────────────────────

/**
 * Add two Money values.
 */
export function addMoney(a: Money, b: Money): Money {
  const decimals = Math.max(a.decimals, b.decimals);
  return fromScaled(scaled(a, decimals) + scaled(b, decimals), decimals);
}

/**
 * Subtract b from a.
 */
export function subtractMoney(a: Money, b: Money): Money {
  const decimals = Math.max(a.decimals, b.decimals);
  return fromScaled(scaled(a, decimals) - scaled(b, decimals), decimals);
}

/**
 * Exact product. The result carries a.decimals + b.decimals digits.
 *
 * 123.45 × 0.02 → "2.4690"
 */
export function multiplyMoney(a: Money, b: Money): Money {
  return fromScaled(
    parseAmount(a.amount, a.decimals) * parseAmount(b.amount, b.decimals),
    a.decimals + b.decimals,
  );
}

/**
 * Multiply by an integer count (e.g. a per-transaction fee).
 */
export function multiplyByInteger(a: Money, factor: number): Money {
  if (!Number.isSafeInteger(factor)) {
    throw new LedgerError("INVALID_AMOUNT", `Multiplier must be an integer, got: ${String(factor)}`);
  }
  return fromScaled(parseAmount(a.amount, a.decimals) * BigInt(factor), a.decimals);
}

/**
 * Round to `decimals` digits, halves away from zero.
 *
 * "2.4690" → "2.47", "2.465" → "2.47", "-2.465" → "-2.47"
 */
export function roundHalfUp(m: Money, decimals: number): Money {
  if (m.decimals <= decimals) {
    return fromScaled(scaled(m, decimals), decimals);
  }

  const value = parseAmount(m.amount, m.decimals);
  const divisor = 10n ** BigInt(m.decimals - decimals);
  const negative = value < 0n;
  const abs = negative ? -value : value;
  let quotient = abs / divisor;
  if ((abs % divisor) * 2n >= divisor) {
    quotient += 1n;
  }
  return fromScaled(negative ? -quotient : quotient, decimals);
}

// ─── Comparison ──────────────────────────────────────────────────────────

/**
 * Compare two Money values regardless of scale. Returns -1, 0, or 1.
 */
export function compareMoney(a: Money, b: Money): -1 | 0 | 1 {
  const decimals = Math.max(a.decimals, b.decimals);
  const va = scaled(a, decimals);
  const vb = scaled(b, decimals);
  if (va < vb) return -1;
  if (va > vb) return 1;
  return 0;
}

/**
 * Check if a Money amount is zero.
 */
export function isZero(m: Money): boolean {
  return parseAmount(m.amount, m.decimals) === 0n;
}

/**
 * Check if a Money amount is positive (> 0).
 */
export function isPositive(m: Money): boolean {
  return parseAmount(m.amount, m.decimals) > 0n;
}

/**
 * Check if a Money amount is negative (< 0).
 */
export function isNegative(m: Money): boolean {
  return parseAmount(m.amount, m.decimals) < 0n;
}

export function minMoney(a: Money, b: Money): Money {
  return compareMoney(a, b) <= 0 ? a : b;
}

// ─── Display ─────────────────────────────────────────────────────────────

/**
 * Two-decimal rendering for statements and logs: "1115.00".
 */
export function displayAmount(m: Money): string {
  return roundHalfUp(m, 2).amount;
}
