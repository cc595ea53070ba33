export interface IClock {
  /** Milliseconds since epoch. */
  now(): number;
  sleep(ms: number): Promise<void>;
}

export class SystemClock implements IClock {
  now(): number {
    return Date.now();
  }

  sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
  }
}
