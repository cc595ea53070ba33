import { injectable } from 'tsyringe';
import { Shipment } from '../../types/domain.types';
import { DuplicateTrackingIdError } from '../../types/error.types';
import { ExclusiveUpdateResult, ExclusiveUpdateStatus } from '../../types/result.types';
import { KeyedMutex } from '../../utils/keyed-mutex.util';
import { IShipmentStore, ShipmentDecision } from './shipment-store.interface';
import { applyMutation, cloneShipment, isEmptyMutation } from './shipment-mutation';

/**
 * Process-local store. Records are copied on the way in and out so callers
 * never hold a live reference.
 */
@injectable()
export class InMemoryShipmentStore implements IShipmentStore {
  private readonly shipments = new Map<string, Shipment>();
  private readonly mutex = new KeyedMutex();

  async connect(): Promise<void> {}

  async disconnect(): Promise<void> {}

  async findActive(): Promise<Shipment[]> {
    return [...this.shipments.values()]
      .filter(s => !s.finished && !s.archived)
      .map(cloneShipment);
  }

  async findAll(): Promise<Shipment[]> {
    return [...this.shipments.values()].map(cloneShipment);
  }

  async findByTrackingId(tracking: string): Promise<Shipment | null> {
    const shipment = this.shipments.get(tracking);
    return shipment ? cloneShipment(shipment) : null;
  }

  async insert(shipment: Shipment): Promise<void> {
    if (this.shipments.has(shipment.tracking)) {
      throw new DuplicateTrackingIdError(shipment.tracking);
    }
    this.shipments.set(shipment.tracking, cloneShipment(shipment));
  }

  async exclusiveUpdate(tracking: string, decide: ShipmentDecision): Promise<ExclusiveUpdateResult> {
    return this.mutex.runExclusive(tracking, async () => {
      const current = this.shipments.get(tracking);
      if (!current) {
        return { status: ExclusiveUpdateStatus.NOT_FOUND };
      }

      const mutation = decide(cloneShipment(current));
      if (mutation === null || isEmptyMutation(mutation)) {
        return { status: ExclusiveUpdateStatus.UNCHANGED };
      }

      const next = applyMutation(current, mutation);
      this.shipments.set(tracking, next);
      return { status: ExclusiveUpdateStatus.UPDATED, shipment: cloneShipment(next) };
    });
  }
}
