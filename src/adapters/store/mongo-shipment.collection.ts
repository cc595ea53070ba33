import mongoose, { FilterQuery, Schema, UpdateQuery } from 'mongoose';
import { HistoryEntry, Shipment } from '../../types/domain.types';

/**
 * The handful of collection operations the Mongo store needs. Documents come
 * back lean, so they may still carry driver fields such as `_id`.
 */
export interface ShipmentCollection {
  find(filter: FilterQuery<Shipment>): Promise<Shipment[]>;
  findOne(tracking: string): Promise<Shipment | null>;
  insertOne(shipment: Shipment): Promise<void>;
  /** Resolves with the number of matched documents. */
  updateOne(tracking: string, update: UpdateQuery<Shipment>): Promise<number>;
  close(): Promise<void>;
}

export type ShipmentCollectionOpener = (uri: string, dbName: string) => Promise<ShipmentCollection>;

interface PendingConnection<T> {
  asPromise(): Promise<T>;
  close(): Promise<void>;
}

const historyEntrySchema = new Schema<HistoryEntry>(
  {
    status: { type: String, required: true },
    at: { type: String, required: true }
  },
  { _id: false }
);

export const shipmentSchema = new Schema<Shipment>(
  {
    tracking: { type: String, required: true, unique: true },
    client: { type: String, required: true },
    quantity: { type: Number, required: true },
    destination: { type: String, required: true },
    createdAt: { type: String, required: true },
    status: { type: String, required: true },
    history: { type: [historyEntrySchema], default: [] },
    currentStepIndex: { type: Number, required: true, default: 0 },
    stepDurations: { type: [Number], required: true },
    timeInStep: { type: Number, required: true, default: 0 },
    onHold: { type: Boolean, required: true, default: false },
    incidentDecision: { type: Boolean, required: true, default: false },
    incidentChecked: { type: Boolean, required: true, default: false },
    finished: { type: Boolean, required: true, default: false },
    archived: { type: Boolean, required: true, default: false }
  },
  { versionKey: false }
);

shipmentSchema.index({ finished: 1, archived: 1 });

/**
 * Waits for a connection to open. A connection that fails to open is closed
 * before the error propagates, so a retry starts from a clean slate.
 */
export async function awaitConnection<T>(pending: PendingConnection<T>): Promise<T> {
  try {
    return await pending.asPromise();
  } catch (error) {
    await pending.close().catch((closeError: unknown) => {
      console.warn('[MongoStore] Failed to close a connection that did not open:', closeError);
    });
    throw error;
  }
}

export const openMongooseCollection: ShipmentCollectionOpener = async (uri, dbName) => {
  const pending = mongoose.createConnection(uri, { dbName });
  const connection = await awaitConnection(pending);

  try {
    const model = connection.model<Shipment>('Shipment', shipmentSchema, 'shipments');
    await model.createIndexes();

    return {
      find: filter => model.find(filter).lean<Shipment[]>().exec(),
      findOne: tracking => model.findOne({ tracking }).lean<Shipment>().exec(),
      insertOne: async shipment => {
        await model.create(shipment);
      },
      updateOne: async (tracking, update) => {
        const result = await model.updateOne({ tracking }, update).exec();
        return result.matchedCount;
      },
      close: () => connection.close()
    };
  } catch (error) {
    await connection.close();
    throw error;
  }
};
