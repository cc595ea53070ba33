import { inject, injectable } from 'tsyringe';
import { STAGE_COUNT, TRANSIT_STAGE_INDEX } from '../types/domain.types';
import { IRandomSource, randomInt, uniform } from '../utils/random.util';
import { IDurationAllocator } from './duration-allocator.interface';

@injectable()
export class DurationAllocatorService implements IDurationAllocator {
  static readonly MIN_TOTAL = 55;
  static readonly MAX_TOTAL = 60;
  static readonly MIN_TRANSIT_SHARE = 0.4;
  static readonly MAX_TRANSIT_SHARE = 0.5;

  constructor(@inject('IRandomSource') private readonly random: IRandomSource) {}

  allocate(): number[] {
    const total = randomInt(
      this.random,
      DurationAllocatorService.MIN_TOTAL,
      DurationAllocatorService.MAX_TOTAL
    );
    return this.allocateTotal(total);
  }

  /**
   * Splits `total` into stage durations: the transit stage takes 40-50%,
   * the six other stages share the rest by random weights.
   */
  allocateTotal(total: number): number[] {
    const transitShare = uniform(
      this.random,
      DurationAllocatorService.MIN_TRANSIT_SHARE,
      DurationAllocatorService.MAX_TRANSIT_SHARE
    );
    const transitTime = Math.floor(total * transitShare);
    const restTime = total - transitTime;

    const shares = this.splitProportionally(restTime, STAGE_COUNT - 1);
    const durations = [
      ...shares.slice(0, TRANSIT_STAGE_INDEX),
      transitTime,
      ...shares.slice(TRANSIT_STAGE_INDEX)
    ];

    return this.enforceMinimums(durations, total);
  }

  private splitProportionally(amount: number, parts: number): number[] {
    let weights = Array.from({ length: parts }, () => this.random.next());
    let weightSum = weights.reduce((sum, w) => sum + w, 0);
    if (weightSum === 0) {
      weights = weights.map(() => 1);
      weightSum = parts;
    }

    const shares = weights.map(w => Math.floor((w / weightSum) * amount));
    const remainder = amount - sum(shares);
    if (remainder !== 0) {
      shares[indexOfMax(shares)] += remainder;
    }
    return shares;
  }

  // Floor rounding can leave zero-length stages; lift them to 1 and take the
  // difference out of (or give it to) the largest stage.
  private enforceMinimums(durations: number[], total: number): number[] {
    const adjusted = durations.map(d => Math.max(1, d));
    const difference = total - sum(adjusted);
    if (difference !== 0) {
      adjusted[indexOfMax(adjusted)] += difference;
    }
    return adjusted;
  }
}

function sum(values: number[]): number {
  return values.reduce((acc, v) => acc + v, 0);
}

// First index holding the largest value
function indexOfMax(values: number[]): number {
  let best = 0;
  for (let i = 1; i < values.length; i++) {
    if (values[i] > values[best]) {
      best = i;
    }
  }
  return best;
}
