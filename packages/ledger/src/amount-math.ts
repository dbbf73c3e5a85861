/**
 * @capvault/ledger: Native amount arithmetic.
 *
 * Amounts live in memory as bigint base units (wei-like).
 * Display strings are converted to/from base units via decimal scaling.
 *
 * Rules:
 * - No floating-point operations
 * - No negative amounts
 * - Zero runtime dependencies
 */

import { VaultError } from "./types.js";

function invalid(value: string): VaultError {
  return new VaultError({ code: "INVALID_AMOUNT", value });
}

/**
 * Assert that a bigint is a usable amount (non-negative).
 */
export function assertAmount(value: bigint): bigint {
  if (value < 0n) {
    throw invalid(value.toString());
  }
  return value;
}

/**
 * Parse a base-unit digit string ("1000") into a bigint.
 */
export function parseBaseUnits(text: string): bigint {
  const trimmed = text.trim();
  if (!/^\d+$/.test(trimmed)) {
    throw invalid(text);
  }
  return BigInt(trimmed);
}

/**
 * Parse a decimal display string into base units.
 *
 * "1.5" with decimals=18 → 1500000000000000000n
 * "100" with decimals=6 → 100000000n
 */
export function parseUnits(text: string, decimals: number): bigint {
  const trimmed = text.trim();

  if (!/^\d+(\.\d+)?$/.test(trimmed)) {
    throw invalid(text);
  }

  const [intPart = "0", fracPart = ""] = trimmed.split(".");

  if (fracPart.length > decimals) {
    throw invalid(text);
  }

  return BigInt(intPart + fracPart.padEnd(decimals, "0"));
}

/**
 * Convert base units back to a decimal display string.
 *
 * 1500000000000000000n with decimals=18 → "1.5"
 * 100000000n with decimals=6 → "100"
 *
 * Trailing fractional zeros are dropped.
 */
export function formatUnits(value: bigint, decimals: number): string {
  assertAmount(value);

  if (decimals === 0) {
    return value.toString();
  }

  const str = value.toString().padStart(decimals + 1, "0");
  const intPart = str.slice(0, str.length - decimals);
  const fracPart = str.slice(str.length - decimals).replace(/0+$/, "");

  return fracPart === "" ? intPart : `${intPart}.${fracPart}`;
}
