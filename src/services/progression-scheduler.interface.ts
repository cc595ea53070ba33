import { TickSummary } from '../types/result.types';
import { ResolverRegistrySnapshot } from './resolver-registry';

export interface IProgressionScheduler {
  /** Starts the periodic loop; calling it while running does nothing. */
  start(): void;
  /** Stops the loop and waits for the tick in progress, if any. */
  stop(): Promise<void>;
  isRunning(): boolean;
  /** Runs one progression pass over all active shipments. */
  tick(): Promise<TickSummary>;
  /** Resolves once no incident resolver is running. */
  whenIdle(): Promise<void>;
  getResolverSnapshot(): ResolverRegistrySnapshot;
}
