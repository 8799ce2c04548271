/** Leading numeric prefix: optional whitespace, sign, digits, fraction, exponent */
const NUMERIC_PREFIX = /^[ \t\n\r\v\f]*([+-]?)(?:(\d+)(?:\.(\d*))?|\.(\d+))(?:[eE]([+-]?\d+))?/;

/** Leading integer prefix */
const INTEGER_PREFIX = /^[ \t\n\r\v\f]*[+-]?\d+/;

/**
 * Read a number from the start of a string, ignoring any trailing garbage.
 * Strings without a numeric prefix read as 0: "12.5kg" → 12.5, "abc" → 0, "" → 0
 */
export function toNumber(raw: string): number {
  const match = raw.match(NUMERIC_PREFIX);
  return match ? Number(match[0]) : 0;
}

/**
 * Exact integer written by the numeric prefix of a string, computed from its
 * decimal digits rather than through a float: "9007199254740993" → 9007199254740993n,
 * "1.5e3" → 1500n. Returns null when the prefix has a fractional part.
 */
export function toExactInteger(raw: string): bigint | null {
  const match = raw.match(NUMERIC_PREFIX);
  if (!match) return 0n;

  const [, sign, whole, fraction, bareFraction, exponent] = match;
  const fractionDigits = fraction ?? bareFraction ?? '';
  const digits = `${whole ?? ''}${fractionDigits}`;
  const scale = Number(exponent ?? '0') - fractionDigits.length;

  let magnitude: bigint;
  if (scale >= 0) {
    magnitude = BigInt(digits) * 10n ** BigInt(scale);
  } else {
    const cut = digits.length + scale;
    const kept = cut > 0 ? digits.substring(0, cut) : '0';
    const dropped = cut > 0 ? digits.substring(cut) : digits;
    if (/[^0]/.test(dropped)) return null;
    magnitude = BigInt(kept);
  }
  return sign === '-' ? -magnitude : magnitude;
}

/**
 * Read an integer from the start of a string: "3" → 3, "3.7" → 3, "x" → 0
 */
export function toInteger(raw: string): number {
  const match = raw.match(INTEGER_PREFIX);
  return match ? parseInt(match[0], 10) : 0;
}

/**
 * Loose string truthiness: only "" and "0" are false.
 * "false", "0.0" and " 0" are all true.
 */
export function toLooseBoolean(raw: string): boolean {
  return raw !== '' && raw !== '0';
}
