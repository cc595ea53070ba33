import { inject, injectable } from 'tsyringe';
import { IShipmentStore } from '../adapters/store/shipment-store.interface';
import { AppConfig } from '../config/app.config';
import { DELIVERY_STAGES, Shipment } from '../types/domain.types';
import { DuplicateTrackingIdError, TrackingIdExhaustedError } from '../types/error.types';
import { IClock } from '../utils/clock.util';
import { IRandomSource, randomInt } from '../utils/random.util';
import { IDurationAllocator } from './duration-allocator.interface';
import { IShipmentFactory } from './shipment-factory.interface';

@injectable()
export class ShipmentFactoryService implements IShipmentFactory {
  static readonly MIN_TRACKING_ID = 10000000;
  static readonly MAX_TRACKING_ID = 99999999;

  constructor(
    @inject('IShipmentStore') private readonly store: IShipmentStore,
    @inject('IDurationAllocator') private readonly allocator: IDurationAllocator,
    @inject('IRandomSource') private readonly random: IRandomSource,
    @inject('IClock') private readonly clock: IClock,
    @inject('AppConfig') private readonly config: AppConfig,
  ) {}

  async createShipment(client: string, quantity: number, destination: string): Promise<string> {
    const stepDurations = this.allocator.allocate();
    const incidentDecision =
      randomInt(this.random, 1, 100) <= this.config.simulation.incidentProbabilityPercent;
    const createdAt = new Date(this.clock.now()).toISOString();

    const maxAttempts = this.config.trackingId.maxAttempts;
    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      const tracking = this.drawTrackingId();
      const shipment: Shipment = {
        tracking,
        client,
        quantity,
        destination,
        createdAt,
        status: DELIVERY_STAGES[0],
        history: [{ status: DELIVERY_STAGES[0], at: createdAt }],
        currentStepIndex: 0,
        stepDurations,
        timeInStep: 0,
        onHold: false,
        incidentDecision,
        incidentChecked: false,
        finished: false,
        archived: false,
      };

      try {
        await this.store.insert(shipment);
      } catch (error) {
        if (error instanceof DuplicateTrackingIdError) {
          console.warn(
            `[ShipmentFactory] Tracking id ${tracking} already taken (attempt ${attempt}/${maxAttempts})`,
          );
          continue;
        }
        throw error;
      }

      console.log(`[ShipmentFactory] Created shipment ${tracking} for ${client}`);
      return tracking;
    }

    throw new TrackingIdExhaustedError(maxAttempts);
  }

  private drawTrackingId(): string {
    return String(
      randomInt(
        this.random,
        ShipmentFactoryService.MIN_TRACKING_ID,
        ShipmentFactoryService.MAX_TRACKING_ID,
      ),
    );
  }
}
