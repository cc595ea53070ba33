import { inject, injectable } from 'tsyringe';
import { IShipmentStore } from '../adapters/store/shipment-store.interface';
import { ShipmentView, toShipmentView } from '../types/domain.types';
import { ExclusiveUpdateStatus, Result } from '../types/result.types';
import { IShipmentQuery } from './shipment-query.interface';

@injectable()
export class ShipmentQueryService implements IShipmentQuery {
  constructor(@inject('IShipmentStore') private readonly store: IShipmentStore) {}

  async listShipments(): Promise<Result<ShipmentView[]>> {
    try {
      const shipments = await this.store.findAll();
      return {
        success: true,
        data: shipments.map(toShipmentView),
        message: `${shipments.length} shipment(s) found`
      };
    } catch (error) {
      return { success: false, message: `Failed to list shipments: ${describe(error)}` };
    }
  }

  async getShipment(tracking: string): Promise<Result<ShipmentView>> {
    try {
      const shipment = await this.store.findByTrackingId(tracking);
      if (!shipment) {
        return { success: true, message: `Shipment ${tracking} not found` };
      }
      return {
        success: true,
        data: toShipmentView(shipment),
        message: `Shipment ${tracking} retrieved successfully`
      };
    } catch (error) {
      return { success: false, message: `Failed to load shipment ${tracking}: ${describe(error)}` };
    }
  }

  async archiveShipment(tracking: string): Promise<Result<ShipmentView>> {
    try {
      const result = await this.store.exclusiveUpdate(tracking, current =>
        current.archived ? null : { set: { archived: true } }
      );

      switch (result.status) {
        case ExclusiveUpdateStatus.NOT_FOUND:
          return { success: true, message: `Shipment ${tracking} not found` };
        case ExclusiveUpdateStatus.UPDATED:
          console.log(`[ShipmentQuery] Shipment ${tracking} archived`);
          return {
            success: true,
            data: toShipmentView(result.shipment),
            message: `Shipment ${tracking} archived`
          };
        case ExclusiveUpdateStatus.UNCHANGED:
          return this.getShipment(tracking);
      }
    } catch (error) {
      return { success: false, message: `Failed to archive shipment ${tracking}: ${describe(error)}` };
    }
  }
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
