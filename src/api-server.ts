import "reflect-metadata";
import express, { Response } from "express";
import cors from "cors";
import { container } from "tsyringe";
import { IShipmentStore } from "./adapters/store/shipment-store.interface";
import { loadConfig } from "./config/app.config";
import { setupDI } from "./config/di.setup";
import { IProgressionScheduler } from "./services/progression-scheduler.interface";
import { IShipmentFactory } from "./services/shipment-factory.interface";
import { IShipmentQuery } from "./services/shipment-query.interface";
import { formatValidationIssues, OrderRequestSchema } from "./types/order.types";
import { isFailure, isSuccess, Result } from "./types/result.types";

function sendResult<T>(res: Response, result: Result<T>): void {
  if (isSuccess(result)) {
    res.json(result.data);
  } else if (isFailure(result)) {
    res.status(500).json({ success: false, error: result.message });
  } else {
    res.status(404).json({ success: false, error: result.message });
  }
}

export function createApp(): express.Express {
  const app = express();

  // Middleware
  app.use(cors());
  app.use(express.json());

  app.get("/", (_req, res) => {
    res.send("Shipment tracking API");
  });

  // Health check endpoint
  app.get("/health", (_req, res) => {
    res.json({ status: "ok" });
  });

  app.get("/api/shipments", async (_req, res) => {
    const query = container.resolve<IShipmentQuery>("IShipmentQuery");
    sendResult(res, await query.listShipments());
  });

  // POST /api/shipments - Place an order and start tracking it
  app.post("/api/shipments", async (req, res) => {
    const parsed = OrderRequestSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      res.status(400).json({
        success: false,
        error: `Invalid request. ${formatValidationIssues(parsed.error)}`,
      });
      return;
    }

    try {
      const factory = container.resolve<IShipmentFactory>("IShipmentFactory");
      const { client, quantity, destination } = parsed.data;
      const tracking = await factory.createShipment(client, quantity, destination);
      res.json({ success: true, tracking });
    } catch (error) {
      console.error("[API] Shipment creation failed:", error);
      res.status(500).json({
        success: false,
        error: error instanceof Error ? error.message : "Unknown error occurred",
      });
    }
  });

  app.get("/api/shipments/:tracking", async (req, res) => {
    const query = container.resolve<IShipmentQuery>("IShipmentQuery");
    sendResult(res, await query.getShipment(req.params.tracking));
  });

  app.post("/api/shipments/:tracking/archive", async (req, res) => {
    const query = container.resolve<IShipmentQuery>("IShipmentQuery");
    const result = await query.archiveShipment(req.params.tracking);
    if (isSuccess(result)) {
      res.json({ success: true });
      return;
    }
    sendResult(res, result);
  });

  // Incident resolvers running now and recently finished
  app.get("/api/incidents", (_req, res) => {
    const scheduler = container.resolve<IProgressionScheduler>("IProgressionScheduler");
    res.json(scheduler.getResolverSnapshot());
  });

  return app;
}

async function main() {
  try {
    const config = loadConfig();
    setupDI(config);

    const store = container.resolve<IShipmentStore>("IShipmentStore");
    await store.connect();

    const scheduler = container.resolve<IProgressionScheduler>("IProgressionScheduler");
    scheduler.start();

    const server = createApp().listen(config.api.port, () => {
      console.log(`[API] Server running on http://localhost:${config.api.port}`);
      console.log(`[API] Health check: http://localhost:${config.api.port}/health`);
    });

    const shutdown = async (signal: string) => {
      console.log(`[API] ${signal} received, shutting down`);
      server.close();
      await scheduler.stop();
      await store.disconnect();
      process.exit(0);
    };

    for (const signal of ["SIGINT", "SIGTERM"] as const) {
      process.once(signal, () => {
        shutdown(signal).catch((error) => {
          console.error("[API] Shutdown failed:", error);
          process.exit(1);
        });
      });
    }
  } catch (error) {
    console.error("Fatal error:", error);
    process.exit(1);
  }
}

if (require.main === module) {
  void main();
}
