import { configurationError } from "../errors";
import { MIN_SESSION_ID_LENGTH } from "../backend/StorageBackend";
import type { Clock } from "../utils/time";
import { systemClock } from "../utils/time";

/**
 * Minimum random bytes behind every generated identifier.
 */
export const MIN_RANDOM_BYTES = 32;

const PREFIX_LENGTH = 13;
// getRandomValues rejects requests above 64 KiB
const MAX_RANDOM_CHUNK = 65536;

export type RandomSource = {
  getRandomValues(array: Uint8Array): Uint8Array;
};

export type SessionIdGeneratorOptions = {
  random?: RandomSource;
  clock?: Clock;
};

/**
 * Produces session identifiers: a 13-character hexadecimal time prefix that keeps
 * identifiers from the same process distinct, followed by base64url text drawn from
 * a cryptographically strong source.
 */
export class SessionIdGenerator {
  private readonly random: RandomSource;
  private readonly clock: Clock;
  // microseconds since the epoch; only ever increases
  private lastTick = -1;

  constructor(options?: SessionIdGeneratorOptions) {
    const random = options?.random ?? resolveWebCrypto();
    if (!random) {
      throw configurationError("A cryptographically strong random source is required to generate session IDs.");
    }
    this.random = random;
    this.clock = options?.clock ?? systemClock;
  }

  generate(targetLength: number): string {
    assertIdLength(targetLength);

    const prefix = this.nextPrefix();
    const randomChars = targetLength - prefix.length;
    const randomBytes = Math.ceil((randomChars * 3) / 4);

    return prefix + toBase64Url(this.randomBytes(randomBytes)).slice(0, randomChars);
  }

  private nextPrefix(): string {
    const tick = Math.max(Math.floor(this.clock()) * 1000, this.lastTick + 1);
    this.lastTick = tick;

    const second = Math.floor(tick / 1_000_000);
    const sub = tick % 1_000_000;

    return (
      second.toString(16).padStart(8, "0").slice(-8) +
      sub.toString(16).padStart(PREFIX_LENGTH - 8, "0")
    );
  }

  private randomBytes(length: number): Uint8Array {
    const out = new Uint8Array(length);
    for (let offset = 0; offset < length; offset += MAX_RANDOM_CHUNK) {
      this.random.getRandomValues(out.subarray(offset, Math.min(length, offset + MAX_RANDOM_CHUNK)));
    }
    return out;
  }
}

/**
 * Throws a configuration error when `targetLength` cannot carry enough randomness.
 */
export function assertIdLength(targetLength: number): void {
  if (!Number.isInteger(targetLength) || targetLength < MIN_SESSION_ID_LENGTH) {
    throw configurationError(`Session ID length cannot be less than ${MIN_SESSION_ID_LENGTH}.`, {
      sessionIdLength: targetLength,
    });
  }

  const randomBytes = Math.floor(((targetLength - PREFIX_LENGTH) * 3) / 4);
  if (randomBytes < MIN_RANDOM_BYTES) {
    throw configurationError("Session ID length leaves too little room for random data.", {
      sessionIdLength: targetLength,
      randomBytes,
    });
  }
}

function resolveWebCrypto(): RandomSource | null {
  if (typeof crypto !== "undefined" && typeof crypto.getRandomValues === "function") {
    return { getRandomValues: (array) => crypto.getRandomValues(array) };
  }
  return null;
}

function toBase64Url(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString("base64url");
}
