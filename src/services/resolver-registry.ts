import { IncidentResolution } from '../types/result.types';

export interface ResolverRegistrySnapshot {
  inFlight: string[];
  completed: IncidentResolution[];
  spawned: number;
}

/**
 * Keeps track of running incident resolvers and the most recent outcomes.
 * Only the last `historyLimit` completions are kept.
 */
export class ResolverRegistry {
  private readonly inFlight = new Map<string, Promise<void>>();
  private readonly completed: IncidentResolution[] = [];
  private spawned = 0;

  constructor(private readonly historyLimit: number) {}

  /**
   * Registers a resolver task that never rejects.
   * Returns false when a resolver for the same shipment is still running.
   */
  track(tracking: string, task: Promise<IncidentResolution>): boolean {
    if (this.inFlight.has(tracking)) {
      return false;
    }

    this.spawned++;
    const settled = task.then(resolution => {
      this.inFlight.delete(tracking);
      this.record(resolution);
    });
    this.inFlight.set(tracking, settled);
    return true;
  }

  isInFlight(tracking: string): boolean {
    return this.inFlight.has(tracking);
  }

  async whenIdle(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all([...this.inFlight.values()]);
    }
  }

  snapshot(): ResolverRegistrySnapshot {
    return {
      inFlight: [...this.inFlight.keys()],
      completed: this.completed.map(r => ({ ...r })),
      spawned: this.spawned,
    };
  }

  private record(resolution: IncidentResolution): void {
    this.completed.push(resolution);
    if (this.completed.length > this.historyLimit) {
      this.completed.splice(0, this.completed.length - this.historyLimit);
    }
  }
}
