import seedrandom from 'seedrandom';

/**
 * Uniform integers in [0, upperExclusive). Implementations built from a seed
 * must return the same sequence for the same sequence of calls.
 */
export interface RandomSource {
  nextInt(upperExclusive: number): number;
}

/**
 * seedrandom's ARC4 generator. Without a seed it is autoseeded from the
 * platform's entropy source.
 */
export function createRandomSource(seed?: string): RandomSource {
  const prng = seed === undefined ? seedrandom() : seedrandom(seed);

  return {
    nextInt(upperExclusive: number): number {
      if (!Number.isSafeInteger(upperExclusive) || upperExclusive <= 0) {
        throw new RangeError(`upperExclusive must be a positive safe integer, got ${upperExclusive}`);
      }
      // double() carries 56 bits of randomness; upper bounds stay below 2^53.
      return Math.floor(prng.double() * upperExclusive);
    },
  };
}
