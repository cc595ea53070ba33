import { UpdateQuery } from 'mongoose';
import { inject, injectable } from 'tsyringe';
import { AppConfig } from '../../config/app.config';
import { Shipment, ShipmentMutation } from '../../types/domain.types';
import { DuplicateTrackingIdError } from '../../types/error.types';
import { ExclusiveUpdateResult, ExclusiveUpdateStatus } from '../../types/result.types';
import { IClock } from '../../utils/clock.util';
import { KeyedMutex } from '../../utils/keyed-mutex.util';
import { IRandomSource } from '../../utils/random.util';
import { isTransientConnectionError, retryWithBackoff } from '../../utils/retry.util';
import { ShipmentCollection, ShipmentCollectionOpener } from './mongo-shipment.collection';
import { applyMutation, isEmptyMutation } from './shipment-mutation';
import { IShipmentStore, ShipmentDecision } from './shipment-store.interface';

// Strip driver fields (_id) from lean documents
export function toShipment(doc: Shipment): Shipment {
  return {
    tracking: doc.tracking,
    client: doc.client,
    quantity: doc.quantity,
    destination: doc.destination,
    createdAt: doc.createdAt,
    status: doc.status,
    history: (doc.history ?? []).map(entry => ({ status: entry.status, at: entry.at })),
    currentStepIndex: doc.currentStepIndex ?? 0,
    stepDurations: [...doc.stepDurations],
    timeInStep: doc.timeInStep ?? 0,
    onHold: doc.onHold ?? false,
    incidentDecision: doc.incidentDecision ?? false,
    incidentChecked: doc.incidentChecked ?? false,
    finished: doc.finished ?? false,
    archived: doc.archived ?? false
  };
}

export function isDuplicateKeyError(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 11000;
}

/** One update document: field changes in `$set`, the history entry in `$push`. */
export function toUpdateQuery(mutation: ShipmentMutation): UpdateQuery<Shipment> {
  return {
    ...(mutation.set ? { $set: mutation.set } : {}),
    ...(mutation.appendHistory ? { $push: { history: mutation.appendHistory } } : {})
  };
}

/**
 * MongoDB-backed store. Exclusive updates are serialized per tracking id
 * inside this process; the scheduler is expected to run in a single process.
 */
@injectable()
export class MongoShipmentStore implements IShipmentStore {
  private collection: ShipmentCollection | null = null;
  private readonly mutex = new KeyedMutex();

  constructor(
    @inject('AppConfig') private readonly config: AppConfig,
    @inject('ShipmentCollectionOpener') private readonly openCollection: ShipmentCollectionOpener,
    @inject('IClock') private readonly clock: IClock,
    @inject('IRandomSource') private readonly random: IRandomSource
  ) {}

  async connect(): Promise<void> {
    if (this.collection) {
      return;
    }

    const { mongoUri, dbName } = this.config.store;
    if (!mongoUri) {
      throw new Error('MongoDB URI is not configured');
    }

    this.collection = await retryWithBackoff(
      () => this.openCollection(mongoUri, dbName),
      this.config.retry,
      {
        isRetryable: isTransientConnectionError,
        onRetry: (error, attempt, delayMs) =>
          console.warn(`[MongoStore] Connection attempt ${attempt} failed (${error.message}), retrying in ${Math.round(delayMs)}ms`)
      },
      this.clock,
      this.random
    );
    console.log(`[MongoStore] Connected to database "${dbName}"`);
  }

  async disconnect(): Promise<void> {
    if (!this.collection) {
      return;
    }
    const collection = this.collection;
    this.collection = null;
    await collection.close();
    console.log('[MongoStore] Disconnected');
  }

  async findActive(): Promise<Shipment[]> {
    const docs = await this.requireCollection().find({ finished: false, archived: false });
    return docs.map(toShipment);
  }

  async findAll(): Promise<Shipment[]> {
    const docs = await this.requireCollection().find({});
    return docs.map(toShipment);
  }

  async findByTrackingId(tracking: string): Promise<Shipment | null> {
    const doc = await this.requireCollection().findOne(tracking);
    return doc ? toShipment(doc) : null;
  }

  async insert(shipment: Shipment): Promise<void> {
    try {
      await this.requireCollection().insertOne(shipment);
    } catch (error) {
      if (isDuplicateKeyError(error)) {
        throw new DuplicateTrackingIdError(shipment.tracking);
      }
      throw error;
    }
  }

  async exclusiveUpdate(tracking: string, decide: ShipmentDecision): Promise<ExclusiveUpdateResult> {
    const collection = this.requireCollection();

    return this.mutex.runExclusive(tracking, async () => {
      const doc = await collection.findOne(tracking);
      if (!doc) {
        return { status: ExclusiveUpdateStatus.NOT_FOUND };
      }

      const current = toShipment(doc);
      const mutation = decide(current);
      if (mutation === null || isEmptyMutation(mutation)) {
        return { status: ExclusiveUpdateStatus.UNCHANGED };
      }

      // Deleted between the read and the write
      const matched = await collection.updateOne(tracking, toUpdateQuery(mutation));
      if (matched === 0) {
        return { status: ExclusiveUpdateStatus.NOT_FOUND };
      }

      return { status: ExclusiveUpdateStatus.UPDATED, shipment: applyMutation(current, mutation) };
    });
  }

  private requireCollection(): ShipmentCollection {
    if (!this.collection) {
      throw new Error('MongoShipmentStore is not connected');
    }
    return this.collection;
  }
}
