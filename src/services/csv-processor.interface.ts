import { ShipmentView } from '../types/domain.types';
import { OrderRequest } from '../types/order.types';

export interface RejectedOrderRow {
  line: number;
  message: string;
}

export interface OrderImport {
  orders: OrderRequest[];
  rejected: RejectedOrderRow[];
}

export interface ICsvProcessor {
  readOrders(csvPath: string): Promise<OrderImport>;
  writeShipmentReport(outputPath: string, shipments: ShipmentView[]): Promise<void>;
}
