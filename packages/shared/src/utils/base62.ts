/**
 * Base62 codec
 *
 * Alphabet 0-9A-Za-z, most significant digit first, no padding.
 * Works on bigint so that 64-bit Snowflake composites round-trip exactly;
 * plain numbers are accepted as long as they are safe integers.
 */

import { SHORTCODE_CONFIG } from "../constants/index.js";

const ALPHABET = SHORTCODE_CONFIG.ALPHABET;
const BASE = BigInt(ALPHABET.length);

const DIGIT_VALUES: ReadonlyMap<string, bigint> = new Map(
  Array.from(ALPHABET, (char, index) => [char, BigInt(index)])
);

function toBigInt(value: number | bigint): bigint {
  if (typeof value === "bigint") return value;
  if (!Number.isSafeInteger(value)) {
    throw new RangeError(`Cannot encode non-integer or unsafe number to Base62: ${value}`);
  }
  return BigInt(value);
}

/**
 * Encode a non-negative integer to Base62.
 *
 * @example
 * ```ts
 * encodeBase62(0);   // "0"
 * encodeBase62(62);  // "10"
 * encodeBase62(3844n); // "100"
 * ```
 */
export function encodeBase62(value: number | bigint): string {
  let remaining = toBigInt(value);
  if (remaining < 0n) {
    throw new RangeError("Cannot encode negative number to Base62");
  }
  if (remaining === 0n) return ALPHABET[0];

  let encoded = "";
  while (remaining > 0n) {
    encoded = ALPHABET[Number(remaining % BASE)] + encoded;
    remaining /= BASE;
  }
  return encoded;
}

/**
 * Decode a Base62 string back to a bigint.
 *
 * @throws Error on an empty string or a character outside the alphabet
 */
export function decodeBase62(encoded: string): bigint {
  if (encoded.length === 0) {
    throw new Error("Cannot decode empty Base62 string");
  }

  let value = 0n;
  for (const char of encoded) {
    const digit = DIGIT_VALUES.get(char);
    if (digit === undefined) {
      throw new Error(`Invalid Base62 character: '${char}'`);
    }
    value = value * BASE + digit;
  }
  return value;
}

export function isBase62(value: string): boolean {
  if (value.length === 0) return false;
  for (const char of value) {
    if (!DIGIT_VALUES.has(char)) return false;
  }
  return true;
}
