import { ShipmentView } from '../types/domain.types';
import { Result } from '../types/result.types';

export interface IShipmentQuery {
  listShipments(): Promise<Result<ShipmentView[]>>;
  /** success without data when the tracking id is unknown */
  getShipment(tracking: string): Promise<Result<ShipmentView>>;
  /** Hides the shipment from scheduling; repeating it is harmless. */
  archiveShipment(tracking: string): Promise<Result<ShipmentView>>;
}
