import { inject, injectable } from 'tsyringe';
import { IShipmentStore } from '../adapters/store/shipment-store.interface';
import { AppConfig } from '../config/app.config';
import {
  DELIVERY_STAGES,
  incidentStatus,
  LAST_STAGE_INDEX,
  Shipment,
  ShipmentMutation,
  TRANSIT_STAGE_INDEX,
} from '../types/domain.types';
import {
  IncidentOutcome,
  IncidentResolution,
  isUpdated,
  TickSummary,
} from '../types/result.types';
import { IClock } from '../utils/clock.util';
import { IRandomSource, randomInt } from '../utils/random.util';
import { IIncidentResolver } from './incident-resolver.interface';
import { cancellationChance } from './incident-resolver.service';
import { IProgressionScheduler } from './progression-scheduler.interface';
import { ResolverRegistry, ResolverRegistrySnapshot } from './resolver-registry';

type ProgressStep =
  | 'skipped'
  | 'held'
  | 'accumulated'
  | 'advanced'
  | 'delivered'
  | 'closed'
  | 'incident';

interface ProgressDecision {
  step: ProgressStep;
  mutation: ShipmentMutation | null;
  incidentDays?: number;
}

@injectable()
export class ProgressionSchedulerService implements IProgressionScheduler {
  static readonly MIN_INCIDENT_DAYS = 1;
  static readonly MAX_INCIDENT_DAYS = 9;

  private running = false;
  private generation = 0; // bumped by start(); a loop only reschedules itself while current
  private timer: NodeJS.Timeout | null = null;
  private currentTick: Promise<TickSummary> | null = null;
  private lastTickAt: number;
  private readonly registry: ResolverRegistry;

  constructor(
    @inject('IShipmentStore') private readonly store: IShipmentStore,
    @inject('IIncidentResolver') private readonly resolver: IIncidentResolver,
    @inject('IRandomSource') private readonly random: IRandomSource,
    @inject('IClock') private readonly clock: IClock,
    @inject('AppConfig') private readonly config: AppConfig,
  ) {
    this.lastTickAt = clock.now();
    this.registry = new ResolverRegistry(config.simulation.resolverHistoryLimit);
  }

  start(): void {
    if (this.running) {
      return;
    }
    this.running = true;
    this.generation++;
    this.lastTickAt = this.clock.now();
    this.scheduleNextTick(this.generation);
    console.log(`[Scheduler] Progression loop started (tick every ${this.config.simulation.tickIntervalMs}ms)`);
  }

  async stop(): Promise<void> {
    if (!this.running) {
      return;
    }
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    if (this.currentTick) {
      await this.currentTick.catch(() => undefined);
    }
    console.log('[Scheduler] Progression loop stopped');
  }

  isRunning(): boolean {
    return this.running;
  }

  async tick(): Promise<TickSummary> {
    const run = this.runTick();
    this.currentTick = run;
    try {
      return await run;
    } finally {
      if (this.currentTick === run) {
        this.currentTick = null;
      }
    }
  }

  whenIdle(): Promise<void> {
    return this.registry.whenIdle();
  }

  getResolverSnapshot(): ResolverRegistrySnapshot {
    return this.registry.snapshot();
  }

  // Chained timeouts: a slow tick delays the next one, never overlaps it
  private scheduleNextTick(generation: number): void {
    this.timer = setTimeout(() => {
      this.timer = null;
      this.runScheduledTick(generation).catch(error => {
        console.error('[Scheduler] Unexpected loop failure:', error);
      });
    }, this.config.simulation.tickIntervalMs);
  }

  private async runScheduledTick(generation: number): Promise<void> {
    try {
      await this.tick();
    } catch (error) {
      console.error('[Scheduler] Tick failed:', error);
    } finally {
      if (this.running && generation === this.generation) {
        this.scheduleNextTick(generation);
      }
    }
  }

  private async runTick(): Promise<TickSummary> {
    const now = this.clock.now();
    const delta = Math.max(0, now - this.lastTickAt) / this.config.simulation.timeUnitMs;
    this.lastTickAt = now;
    const at = new Date(now).toISOString();

    const shipments = await this.store.findActive();
    const summary: TickSummary = {
      delta,
      scanned: shipments.length,
      advanced: 0,
      finished: 0,
      incidents: 0,
      failed: 0,
    };

    const results = await Promise.allSettled(
      shipments.map(shipment => this.progressShipment(shipment.tracking, delta, at)),
    );

    results.forEach((result, i) => {
      if (result.status === 'rejected') {
        summary.failed++;
        const reason = result.reason instanceof Error ? result.reason.message : String(result.reason);
        console.error(`[Scheduler] Failed to progress shipment ${shipments[i].tracking}: ${reason}`);
        return;
      }

      switch (result.value) {
        case 'advanced':
          summary.advanced++;
          break;
        case 'delivered':
          summary.advanced++;
          summary.finished++;
          break;
        case 'closed':
          summary.finished++;
          break;
        case 'incident':
          summary.incidents++;
          break;
      }
    });

    return summary;
  }

  private async progressShipment(tracking: string, delta: number, at: string): Promise<ProgressStep> {
    // Filled in by the decision callback while the record is locked
    const outcome: { decision?: ProgressDecision } = {};

    const result = await this.store.exclusiveUpdate(tracking, current => {
      const decision = this.decide(current, delta, at);
      outcome.decision = decision;
      return decision.mutation;
    });

    const decision = outcome.decision;
    if (!decision || !isUpdated(result)) {
      return 'skipped';
    }

    switch (decision.step) {
      case 'advanced':
      case 'delivered':
        console.log(`[Scheduler] Shipment ${tracking} moved to "${result.shipment.status}"`);
        break;
      case 'closed':
        console.log(`[Scheduler] Shipment ${tracking} finished`);
        break;
      case 'incident':
        if (decision.incidentDays !== undefined) {
          this.launchResolver(tracking, decision.incidentDays);
        }
        break;
    }

    return decision.step;
  }

  private decide(current: Shipment, delta: number, at: string): ProgressDecision {
    // The record may have changed since findActive()
    if (current.finished || current.archived) {
      return { step: 'skipped', mutation: null };
    }

    const index = current.currentStepIndex;
    if (index >= LAST_STAGE_INDEX) {
      return { step: 'closed', mutation: { set: { finished: true } } };
    }

    if (current.onHold) {
      return { step: 'held', mutation: null };
    }

    const timeInStep = current.timeInStep + delta;

    if (index === TRANSIT_STAGE_INDEX && current.incidentDecision && !current.incidentChecked) {
      const days = randomInt(
        this.random,
        ProgressionSchedulerService.MIN_INCIDENT_DAYS,
        ProgressionSchedulerService.MAX_INCIDENT_DAYS,
      );
      const status = incidentStatus(days);
      return {
        step: 'incident',
        incidentDays: days,
        mutation: {
          set: { incidentChecked: true, onHold: true, status, timeInStep: 0 },
          appendHistory: { status, at },
        },
      };
    }

    if (timeInStep >= current.stepDurations[index]) {
      const nextIndex = index + 1;
      const status = DELIVERY_STAGES[nextIndex];
      const delivered = nextIndex >= LAST_STAGE_INDEX;
      return {
        step: delivered ? 'delivered' : 'advanced',
        mutation: {
          set: {
            currentStepIndex: nextIndex,
            status,
            timeInStep: 0,
            ...(delivered ? { finished: true } : {}),
          },
          appendHistory: { status, at },
        },
      };
    }

    return { step: 'accumulated', mutation: { set: { timeInStep } } };
  }

  private launchResolver(tracking: string, days: number): void {
    if (this.registry.isInFlight(tracking)) {
      console.warn(`[Scheduler] Resolver already running for ${tracking}, not starting another`);
      return;
    }

    const task = this.resolver.resolve(tracking, days).catch((error: unknown): IncidentResolution => {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`[Scheduler] Incident resolver for ${tracking} failed: ${message}`);
      return {
        tracking,
        days,
        chance: cancellationChance(days),
        outcome: IncidentOutcome.FAILED,
        completedAt: new Date(this.clock.now()).toISOString(),
        error: message,
      };
    });

    this.registry.track(tracking, task);
    console.log(`[Scheduler] Incident declared for ${tracking}, delay ${days} day(s)`);
  }
}
