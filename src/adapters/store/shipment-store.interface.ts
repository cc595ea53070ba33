import { Shipment, ShipmentMutation } from '../../types/domain.types';
import { ExclusiveUpdateResult } from '../../types/result.types';

/**
 * Decides what to change on a shipment given its current state.
 * Runs while the record is held exclusively; return null to leave it as is.
 */
export type ShipmentDecision = (current: Shipment) => ShipmentMutation | null;

/**
 * Persistence for shipment records, keyed by tracking id.
 */
export interface IShipmentStore {
  connect(): Promise<void>;
  disconnect(): Promise<void>;

  /** Shipments with finished=false and archived=false. */
  findActive(): Promise<Shipment[]>;
  findAll(): Promise<Shipment[]>;
  findByTrackingId(tracking: string): Promise<Shipment | null>;

  /**
   * Persists a new shipment.
   * @throws DuplicateTrackingIdError when the tracking id is taken
   */
  insert(shipment: Shipment): Promise<void>;

  /**
   * Reads the record, applies `decide` and writes the result, with no other
   * exclusive update on the same tracking id interleaving.
   */
  exclusiveUpdate(tracking: string, decide: ShipmentDecision): Promise<ExclusiveUpdateResult>;
}
