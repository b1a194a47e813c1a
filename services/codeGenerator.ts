import type { RandomSource } from './randomSource.js';
import { CodeSpaceExhaustedError, ConfigError } from '../utils/errors.js';

/** 10^15 is the largest power of ten below Number.MAX_SAFE_INTEGER. */
export const MAX_DIGITS = 15;

export type CodeGeneratorOptions = {
  numDigits: number;
  random: RandomSource;
  /** Give up on a single code after this many rejected candidates. Unset: never give up. */
  maxAttempts?: number;
  /** Called once per rejected candidate. */
  onReject?: (candidate: string) => void;
};

/**
 * Number of positions at which the two strings differ, compared over the
 * length of the shorter one. Positions are Unicode code points.
 */
export function hammingDistance(a: string, b: string): number {
  const left = a[Symbol.iterator]();
  const right = b[Symbol.iterator]();
  let distance = 0;
  for (;;) {
    const l = left.next();
    const r = right.next();
    if (l.done || r.done) return distance;
    if (l.value !== r.value) distance++;
  }
}

/**
 * Smallest distance over all pairs of `codes`, and between each of `codes` and
 * each of `others`. Pairs within `others` are not compared. Null when there is
 * no pair to compare.
 */
export function minPairwiseDistance(codes: readonly string[], others: readonly string[] = []): number | null {
  let min: number | null = null;
  for (let i = 0; i < codes.length; i++) {
    for (let j = i + 1; j < codes.length; j++) {
      const d = hammingDistance(codes[i], codes[j]);
      if (min === null || d < min) min = d;
    }
    for (const other of others) {
      const d = hammingDistance(codes[i], other);
      if (min === null || d < min) min = d;
    }
  }
  return min;
}

function assertNonNegativeInt(name: string, value: number) {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new ConfigError(`${name} must be a non-negative integer, got ${value}`);
  }
}

/**
 * Produces codes by rejection sampling: draw a uniformly random zero-padded
 * number, keep it only if it is far enough from every code already in use.
 *
 * The used list is append-only and shared across prefixes, so a code with
 * prefix "A" still has to keep its distance from codes with prefix "B".
 */
export class CodeGenerator {
  readonly numDigits: number;
  private readonly upperExclusive: number;
  private readonly random: RandomSource;
  private readonly maxAttempts?: number;
  private readonly onReject?: (candidate: string) => void;
  private readonly usedCodes: string[] = [];

  constructor(options: CodeGeneratorOptions) {
    const { numDigits, maxAttempts } = options;
    if (!Number.isInteger(numDigits) || numDigits < 1 || numDigits > MAX_DIGITS) {
      throw new ConfigError(`numDigits must be an integer between 1 and ${MAX_DIGITS}, got ${numDigits}`);
    }
    if (maxAttempts !== undefined && (!Number.isSafeInteger(maxAttempts) || maxAttempts < 1)) {
      throw new ConfigError(`maxAttempts must be a positive integer, got ${maxAttempts}`);
    }

    this.numDigits = numDigits;
    this.upperExclusive = 10 ** numDigits;
    this.random = options.random;
    this.maxAttempts = maxAttempts;
    this.onReject = options.onReject;
  }

  get used(): readonly string[] {
    return this.usedCodes;
  }

  get usedCount(): number {
    return this.usedCodes.length;
  }

  /** Records codes that already exist elsewhere. They are stored verbatim. */
  addUsed(codes: Iterable<string>): void {
    for (const code of codes) this.usedCodes.push(code);
  }

  generateCandidate(prefix = ''): string {
    const value = this.random.nextInt(this.upperExclusive);
    return `${prefix}${String(value).padStart(this.numDigits, '0')}`;
  }

  isAcceptable(candidate: string, minHammingDistance: number): boolean {
    assertNonNegativeInt('minHammingDistance', minHammingDistance);
    if (minHammingDistance === 0) return true;
    return this.usedCodes.every((code) => hammingDistance(code, candidate) >= minHammingDistance);
  }

  /**
   * Draws until a candidate is accepted, records it as used and returns it.
   *
   * Without maxAttempts this does not return when the constraint cannot be met
   * (e.g. one digit and a minimum distance of 2 once any code exists).
   *
   * @throws CodeSpaceExhaustedError when maxAttempts candidates in a row were rejected
   */
  newCode(prefix: string, minHammingDistance: number): string {
    assertNonNegativeInt('minHammingDistance', minHammingDistance);

    let attempts = 1;
    let candidate = this.generateCandidate(prefix);
    while (!this.isAcceptable(candidate, minHammingDistance)) {
      this.onReject?.(candidate);
      if (this.maxAttempts !== undefined && attempts >= this.maxAttempts) {
        throw new CodeSpaceExhaustedError({
          prefix,
          minHammingDistance,
          attempts,
          usedCount: this.usedCodes.length,
        });
      }
      candidate = this.generateCandidate(prefix);
      attempts++;
    }

    this.usedCodes.push(candidate);
    return candidate;
  }
}
