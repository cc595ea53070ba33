/**
 * Source of uniformly distributed numbers in [0, 1).
 * Injected wherever the simulation draws, so tests can script the draws.
 */
export interface IRandomSource {
  next(): number;
}

export class MathRandomSource implements IRandomSource {
  next(): number {
    return Math.random();
  }
}

/** Uniform integer in [min, max], both inclusive. */
export function randomInt(source: IRandomSource, min: number, max: number): number {
  return min + Math.floor(source.next() * (max - min + 1));
}

/** Uniform real in [min, max). */
export function uniform(source: IRandomSource, min: number, max: number): number {
  return min + source.next() * (max - min);
}
