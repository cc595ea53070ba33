import { IClock } from '../utils/clock.util';

interface PendingSleep {
  wakeAt: number;
  resolve: () => void;
}

/**
 * Clock that only moves when told to. Sleepers wake when advance() passes
 * their deadline.
 */
export class ManualClock implements IClock {
  private current: number;
  private pending: PendingSleep[] = [];
  readonly sleepRequests: number[] = [];

  constructor(start = Date.UTC(2025, 0, 1)) {
    this.current = start;
  }

  now(): number {
    return this.current;
  }

  sleep(ms: number): Promise<void> {
    this.sleepRequests.push(ms);
    if (ms <= 0) {
      return Promise.resolve();
    }
    return new Promise(resolve => {
      this.pending.push({ wakeAt: this.current + ms, resolve });
    });
  }

  advance(ms: number): void {
    this.current += ms;
    const due = this.pending.filter(p => p.wakeAt <= this.current);
    this.pending = this.pending.filter(p => p.wakeAt > this.current);
    for (const sleeper of due) {
      sleeper.resolve();
    }
  }

  get sleeping(): number {
    return this.pending.length;
  }
}
