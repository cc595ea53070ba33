#!/usr/bin/env node
import "reflect-metadata";
import * as path from "path";
import { container } from "tsyringe";
import { IShipmentStore } from "./adapters/store/shipment-store.interface";
import { loadConfig } from "./config/app.config";
import { setupDI } from "./config/di.setup";
import { ICsvProcessor } from "./services/csv-processor.interface";
import { IShipmentFactory } from "./services/shipment-factory.interface";
import { IShipmentQuery } from "./services/shipment-query.interface";
import { ShipmentView } from "./types/domain.types";
import { isSuccess } from "./types/result.types";

const DEFAULT_REPORT_PATH = path.join(process.cwd(), "data/created-shipments.csv");

// Bulk order import: orders CSV in, CSV report of the created shipments out
async function main() {
  const [ordersPath, reportPath = DEFAULT_REPORT_PATH] = process.argv.slice(2);
  if (!ordersPath) {
    console.error("Usage: index <orders.csv> [report.csv]");
    process.exit(1);
  }

  const config = loadConfig();
  setupDI(config);

  const store = container.resolve<IShipmentStore>("IShipmentStore");
  const csvProcessor = container.resolve<ICsvProcessor>("ICsvProcessor");
  const factory = container.resolve<IShipmentFactory>("IShipmentFactory");
  const query = container.resolve<IShipmentQuery>("IShipmentQuery");

  await store.connect();
  try {
    const { orders, rejected } = await csvProcessor.readOrders(ordersPath);
    console.log(`Importing ${orders.length} order(s) from ${ordersPath}...`);
    for (const row of rejected) {
      console.warn(`Skipping line ${row.line}: ${row.message}`);
    }

    const created: ShipmentView[] = [];
    let failures = 0;
    for (const order of orders) {
      try {
        const tracking = await factory.createShipment(order.client, order.quantity, order.destination);
        const result = await query.getShipment(tracking);
        if (isSuccess(result)) {
          created.push(result.data);
        }
      } catch (error) {
        failures++;
        console.error(`Failed to create shipment for ${order.client}:`, error);
      }
    }

    await csvProcessor.writeShipmentReport(reportPath, created);
    console.log(`Report written to: ${reportPath}`);
    console.log(JSON.stringify({ created: created.length, rejected: rejected.length, failures }, null, 2));
    process.exitCode = failures > 0 ? 1 : 0;
  } finally {
    await store.disconnect();
  }
}

main().catch((error) => {
  console.error("Fatal error:", error);
  process.exit(1);
});
