import { inject, injectable } from 'tsyringe';
import { IShipmentStore } from '../adapters/store/shipment-store.interface';
import { AppConfig } from '../config/app.config';
import {
  CANCELLED_STATUS,
  DELIVERY_STAGES,
  ShipmentMutation,
  TRANSIT_STAGE_INDEX,
} from '../types/domain.types';
import {
  ExclusiveUpdateStatus,
  IncidentOutcome,
  IncidentResolution,
} from '../types/result.types';
import { IClock } from '../utils/clock.util';
import { IRandomSource, randomInt } from '../utils/random.util';
import { IIncidentResolver } from './incident-resolver.interface';

/** Percent chance that an incident of `days` days cancels the delivery. */
export function cancellationChance(days: number): number {
  return Math.min(10 + (days - 1) * 5, 100);
}

@injectable()
export class IncidentResolverService implements IIncidentResolver {
  constructor(
    @inject('IShipmentStore') private readonly store: IShipmentStore,
    @inject('IRandomSource') private readonly random: IRandomSource,
    @inject('IClock') private readonly clock: IClock,
    @inject('AppConfig') private readonly config: AppConfig,
  ) {}

  async resolve(tracking: string, days: number): Promise<IncidentResolution> {
    console.log(`[IncidentResolver] Handling incident for ${tracking}, estimated delay ${days} day(s)`);

    await this.clock.sleep(this.waitMs(days));

    const chance = cancellationChance(days);
    const draw = randomInt(this.random, 1, 100);
    const outcome = draw <= chance ? IncidentOutcome.CANCELLED : IncidentOutcome.RESUMED;
    const at = new Date(this.clock.now()).toISOString();

    const result = await this.store.exclusiveUpdate(tracking, () =>
      this.buildMutation(outcome, at),
    );

    if (result.status === ExclusiveUpdateStatus.NOT_FOUND) {
      console.warn(`[IncidentResolver] No shipment found for ${tracking} while resolving its incident`);
      return {
        tracking,
        days,
        chance,
        draw,
        outcome: IncidentOutcome.SHIPMENT_MISSING,
        completedAt: at,
      };
    }

    console.log(
      outcome === IncidentOutcome.CANCELLED
        ? `[IncidentResolver] Delivery cancelled for ${tracking} (draw ${draw} <= ${chance})`
        : `[IncidentResolver] Delivery resumed for ${tracking} (draw ${draw} > ${chance})`,
    );
    return { tracking, days, chance, draw, outcome, completedAt: at };
  }

  private waitMs(days: number): number {
    const { incidentWaitUnitsPerDay, timeUnitMs } = this.config.simulation;
    return days * incidentWaitUnitsPerDay * timeUnitMs;
  }

  // The archived flag is never touched, so an archive during the wait sticks.
  private buildMutation(outcome: IncidentOutcome, at: string): ShipmentMutation {
    if (outcome === IncidentOutcome.CANCELLED) {
      return {
        set: { status: CANCELLED_STATUS, finished: true },
        appendHistory: { status: CANCELLED_STATUS, at },
      };
    }

    const status = DELIVERY_STAGES[TRANSIT_STAGE_INDEX];
    return {
      set: { status, onHold: false },
      appendHistory: { status, at },
    };
  }
}
