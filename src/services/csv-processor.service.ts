import * as fs from 'fs';
import { parse } from 'csv-parse';
import { stringify } from 'csv-stringify';
import { injectable } from 'tsyringe';
import { ShipmentView } from '../types/domain.types';
import { formatValidationIssues, OrderRequestSchema } from '../types/order.types';
import { ICsvProcessor, OrderImport } from './csv-processor.interface';

export const REPORT_COLUMNS = [
  'tracking',
  'client',
  'quantity',
  'destination',
  'status',
  'currentStepIndex',
  'finished',
  'archived',
  'lastUpdated'
] as const;

type ReportRow = Record<(typeof REPORT_COLUMNS)[number], string | number | boolean>;

export function toReportRow(shipment: ShipmentView): ReportRow {
  const lastEntry = shipment.history[shipment.history.length - 1];
  return {
    tracking: shipment.tracking,
    client: shipment.client,
    quantity: shipment.quantity,
    destination: shipment.destination,
    status: shipment.status,
    currentStepIndex: shipment.currentStepIndex,
    finished: shipment.finished,
    archived: shipment.archived,
    lastUpdated: lastEntry ? lastEntry.at : ''
  };
}

@injectable()
export class CsvProcessorService implements ICsvProcessor {
  async readOrders(csvPath: string): Promise<OrderImport> {
    return new Promise((resolve, reject) => {
      const result: OrderImport = { orders: [], rejected: [] };
      let line = 1; // header

      fs.createReadStream(csvPath)
        .on('error', (error) => reject(error))
        .pipe(parse({ columns: true, skip_empty_lines: true, trim: true }))
        .on('data', (row: Record<string, string>) => {
          line++;
          const parsed = OrderRequestSchema.safeParse(row);
          if (parsed.success) {
            result.orders.push(parsed.data);
          } else {
            result.rejected.push({ line, message: formatValidationIssues(parsed.error) });
          }
        })
        .on('end', () => resolve(result))
        .on('error', (error) => reject(error));
    });
  }

  async writeShipmentReport(outputPath: string, shipments: ShipmentView[]): Promise<void> {
    return new Promise((resolve, reject) => {
      const rows = shipments.map(toReportRow);

      stringify(
        rows,
        {
          header: true,
          columns: [...REPORT_COLUMNS],
          cast: { boolean: (value: boolean) => (value ? 'true' : 'false') }
        },
        (err, output) => {
          if (err) {
            reject(err);
            return;
          }

          fs.writeFile(outputPath, output, (writeErr) => {
            if (writeErr) {
              reject(writeErr);
              return;
            }
            resolve();
          });
        }
      );
    });
  }
}
