import type { DecimalValue } from "@fleetsight/shared";

/** Fixed-point value: `units / 10^scale`. */
export type Decimal = {
  units: bigint;
  scale: number;
};

const DECIMAL_PARTS = /^([+-])?(\d+)(?:\.(\d+))?$/;

function pow10(n: number): bigint {
  return 10n ** BigInt(n);
}

function numberToPlain(n: number): string {
  if (!Number.isFinite(n)) {
    throw new RangeError(`Not a finite number: ${n}`);
  }
  const s = String(n);
  if (!/e/i.test(s)) return s;
  // From 1e21 up every float is an integer and toFixed falls back to exponent notation
  if (Number.isInteger(n)) return BigInt(n).toString();
  // 20 places covers anything a float can carry below 1e21
  return n.toFixed(20).replace(/0+$/, "").replace(/\.$/, "");
}

export function parseDecimal(value: DecimalValue): Decimal {
  const text = typeof value === "number" ? numberToPlain(value) : value.trim();
  const match = DECIMAL_PARTS.exec(text);
  if (!match) {
    throw new RangeError(`Not a decimal value: "${text}"`);
  }
  const [, sign, whole, fraction = ""] = match;
  const magnitude = BigInt(`${whole}${fraction}`);
  return { units: sign === "-" ? -magnitude : magnitude, scale: fraction.length };
}

export function isDecimal(value: unknown): value is DecimalValue {
  if (typeof value === "number") return Number.isFinite(value);
  return typeof value === "string" && DECIMAL_PARTS.test(value.trim());
}

function align(a: Decimal, b: Decimal): [bigint, bigint] {
  if (a.scale === b.scale) return [a.units, b.units];
  if (a.scale > b.scale) return [a.units, b.units * pow10(a.scale - b.scale)];
  return [a.units * pow10(b.scale - a.scale), b.units];
}

export function compareDecimal(a: Decimal, b: Decimal): -1 | 0 | 1 {
  const [x, y] = align(a, b);
  if (x < y) return -1;
  if (x > y) return 1;
  return 0;
}

export function addDecimal(a: Decimal, b: Decimal): Decimal {
  const [x, y] = align(a, b);
  return { units: x + y, scale: Math.max(a.scale, b.scale) };
}

export function subtractDecimal(a: Decimal, b: Decimal): Decimal {
  return addDecimal(a, { units: -b.units, scale: b.scale });
}

/** Quotient truncated toward zero at `places` fractional digits; undefined when dividing by zero. */
export function divideDecimal(a: Decimal, b: Decimal, places: number): Decimal | undefined {
  if (b.units === 0n) return undefined;
  const numerator = a.units * pow10(b.scale + places);
  const denominator = b.units * pow10(a.scale);
  return { units: numerator / denominator, scale: places };
}

export function formatDecimal(d: Decimal): string {
  const negative = d.units < 0n;
  const digits = (negative ? -d.units : d.units).toString().padStart(d.scale + 1, "0");
  const whole = digits.slice(0, digits.length - d.scale);
  const fraction = d.scale > 0 ? `.${digits.slice(digits.length - d.scale)}` : "";
  return `${negative ? "-" : ""}${whole}${fraction}`;
}

export const ZERO: Decimal = { units: 0n, scale: 0 };
