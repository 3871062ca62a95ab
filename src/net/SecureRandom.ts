import crypto from 'crypto';

/** Integer source over the half-open range `[low, high)`. */
export interface RandomSource {
  randomInt(low: number, high: number): number;
}

export const secureRandom: RandomSource = {
  randomInt: (low, high) => crypto.randomInt(low, high),
};
