/**
 * nbimport Runtime Host — ULID Generator
 *
 * Universally Unique Lexicographically Sortable Identifier, used as the
 * `event_id` of every line FileLogSink appends, so that lines written by
 * several processes to one log file stay distinguishable and sort by time.
 *
 * Format: 26 characters, Crockford Base32.
 *   - 10 chars: 48-bit millisecond timestamp
 *   - 16 chars: 80-bit cryptographic random
 *
 * @see https://github.com/ulid/spec
 */

import { randomBytes } from 'node:crypto';

// ---------------------------------------------------------------------------
// Crockford Base32 Encoding
// ---------------------------------------------------------------------------

/** Crockford Base32: no I, L, O or U. */
const CROCKFORD_ALPHABET = '0123456789ABCDEFGHJKMNPQRSTVWXYZ';

/** Number of bits encoded per character (log2(32) = 5). */
const BITS_PER_CHAR = 5;

/** Number of characters for the 48-bit time component. ceil(48/5) = 10. */
const TIME_CHARS = 10;

/** Number of characters for the 80-bit random component. ceil(80/5) = 16. */
const RANDOM_CHARS = 16;

/** Encode `value` as exactly `length` Crockford characters, zero-padded on the left. */
function encodeCrockford(value: bigint, length: number): string {
  let out = '';
  let v = value;
  for (let i = 0; i < length; i++) {
    out = (CROCKFORD_ALPHABET[Number(v & 0x1fn)] ?? '0') + out;
    v >>= BigInt(BITS_PER_CHAR);
  }
  return out;
}

// ---------------------------------------------------------------------------
// ULID Generator
// ---------------------------------------------------------------------------

/**
 * Generate a new ULID. The random part is not incremented monotonically
 * within a millisecond; ordering of same-millisecond events is arbitrary.
 */
export function ulid(): string {
  // 48-bit timestamp: milliseconds since epoch
  const nowMs = BigInt(Date.now());
  const timePart = encodeCrockford(nowMs, TIME_CHARS);

  // 80-bit random: 10 bytes = 80 bits
  const randBuf = randomBytes(10);
  let randValue = BigInt(0);
  for (const byte of randBuf) {
    randValue = (randValue << BigInt(8)) | BigInt(byte);
  }
  const randomPart = encodeCrockford(randValue, RANDOM_CHARS);

  return timePart + randomPart;
}
