import 'reflect-metadata';
import { AppConfig } from '../../config/app.config';
import { ManualClock } from '../../testing/manual.clock';
import { makeConfig, makeShipment, makeTransitShipment } from '../../testing/shipment.fixtures';
import { DuplicateTrackingIdError } from '../../types/error.types';
import { ExclusiveUpdateStatus } from '../../types/result.types';
import { MathRandomSource } from '../../utils/random.util';
import { RetryExhaustedError } from '../../utils/retry.util';
import { awaitConnection, ShipmentCollection, ShipmentCollectionOpener } from './mongo-shipment.collection';
import { isDuplicateKeyError, MongoShipmentStore, toShipment, toUpdateQuery } from './mongo-shipment.store';

function mongoConfig(): AppConfig {
  const config = makeConfig();
  return {
    ...config,
    store: { driver: 'mongo', mongoUri: 'mongodb://test-host:27017', dbName: 'tracking-test' },
    retry: { maxRetries: 2, baseDelay: 0, maxDelay: 0, jitterFactor: 0 }
  };
}

describe('MongoShipmentStore helpers', () => {
  // Test: Driver fields are stripped from lean documents
  it('should map a lean document to a plain shipment', () => {
    const shipment = makeShipment({ tracking: '12345678' });
    const doc = { ...shipment, _id: 'abc123' };

    const mapped = toShipment(doc);

    expect(mapped).toEqual(shipment);
    expect('_id' in mapped).toBe(false);
  });

  // Test: Only the unique-index violation code counts as a duplicate
  it('should recognize duplicate key errors by code', () => {
    expect(isDuplicateKeyError({ code: 11000, message: 'E11000 duplicate key error' })).toBe(true);
    expect(isDuplicateKeyError({ code: 121 })).toBe(false);
    expect(isDuplicateKeyError(new Error('E11000'))).toBe(false);
    expect(isDuplicateKeyError(null)).toBe(false);
  });

  // Test: Field changes and the history entry travel in one update document
  it('should build a single $set/$push update', () => {
    const entry = { status: 'arrived at distribution center', at: '2025-01-01T00:01:00.000Z' };

    expect(toUpdateQuery({ set: { currentStepIndex: 4, timeInStep: 0 }, appendHistory: entry })).toEqual({
      $set: { currentStepIndex: 4, timeInStep: 0 },
      $push: { history: entry }
    });
    expect(toUpdateQuery({ set: { timeInStep: 3 } })).toEqual({ $set: { timeInStep: 3 } });
  });
});

describe('MongoShipmentStore', () => {
  let collection: jest.Mocked<ShipmentCollection>;
  let openCollection: jest.MockedFunction<ShipmentCollectionOpener>;
  let store: MongoShipmentStore;

  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);

    collection = {
      find: jest.fn().mockResolvedValue([]),
      findOne: jest.fn().mockResolvedValue(null),
      insertOne: jest.fn().mockResolvedValue(undefined),
      updateOne: jest.fn().mockResolvedValue(1),
      close: jest.fn().mockResolvedValue(undefined)
    };
    openCollection = jest.fn<Promise<ShipmentCollection>, [string, string]>().mockResolvedValue(collection);
    store = new MongoShipmentStore(mongoConfig(), openCollection, new ManualClock(), new MathRandomSource());
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('connect', () => {
    it('should open the configured database once', async () => {
      await store.connect();
      await store.connect();

      expect(openCollection).toHaveBeenCalledTimes(1);
      expect(openCollection).toHaveBeenCalledWith('mongodb://test-host:27017', 'tracking-test');
    });

    // Test: Transient connection failures are retried
    it('should retry when the server is not reachable yet', async () => {
      const unreachable = new Error('Server selection timed out');
      unreachable.name = 'MongoServerSelectionError';
      openCollection.mockRejectedValueOnce(unreachable);

      await store.connect();

      expect(openCollection).toHaveBeenCalledTimes(2);
      expect(console.warn).toHaveBeenCalledWith(
        '[MongoStore] Connection attempt 1 failed (Server selection timed out), retrying in 0ms'
      );
    });

    it('should give up after the configured retries', async () => {
      openCollection.mockRejectedValue(new Error('connect ECONNREFUSED 127.0.0.1:27017'));

      await expect(store.connect()).rejects.toBeInstanceOf(RetryExhaustedError);
      expect(openCollection).toHaveBeenCalledTimes(3);
    });

    it('should fail to connect without a URI', async () => {
      const noUri = new MongoShipmentStore(makeConfig(), openCollection, new ManualClock(), new MathRandomSource());

      await expect(noUri.connect()).rejects.toThrow('MongoDB URI is not configured');
      expect(openCollection).not.toHaveBeenCalled();
    });

    // Test: Queries before connect() fail loudly
    it('should refuse queries before connecting', async () => {
      await expect(store.findActive()).rejects.toThrow('MongoShipmentStore is not connected');
    });

    it('should close the collection on disconnect', async () => {
      await store.connect();

      await store.disconnect();

      expect(collection.close).toHaveBeenCalledTimes(1);
      await expect(store.findAll()).rejects.toThrow('MongoShipmentStore is not connected');
    });
  });

  describe('queries', () => {
    beforeEach(async () => {
      await store.connect();
    });

    it('should ask only for unfinished, unarchived shipments', async () => {
      const doc = { ...makeShipment({ tracking: '1' }), _id: 'x' };
      collection.find.mockResolvedValue([doc]);

      const active = await store.findActive();

      expect(collection.find).toHaveBeenCalledWith({ finished: false, archived: false });
      expect(active).toEqual([makeShipment({ tracking: '1' })]);
    });

    // Test: Unique index violations become domain errors
    it('should map a duplicate key error to DuplicateTrackingIdError', async () => {
      collection.insertOne.mockRejectedValue({ code: 11000, message: 'E11000 duplicate key error' });

      const error = await store.insert(makeShipment({ tracking: '12345678' })).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(DuplicateTrackingIdError);
      expect(error instanceof DuplicateTrackingIdError && error.message).toBe(
        new DuplicateTrackingIdError('12345678').message
      );
    });

    it('should rethrow other insert failures unchanged', async () => {
      const failure = new Error('write concern timeout');
      collection.insertOne.mockRejectedValue(failure);

      await expect(store.insert(makeShipment())).rejects.toBe(failure);
    });
  });

  describe('exclusiveUpdate', () => {
    beforeEach(async () => {
      await store.connect();
    });

    // Test: The decision is written as one $set/$push update
    it('should write the decided mutation in a single update', async () => {
      collection.findOne.mockResolvedValue(makeTransitShipment({ tracking: '1' }));
      const entry = { status: 'arrived at distribution center', at: '2025-01-01T00:01:00.000Z' };

      const result = await store.exclusiveUpdate('1', current => ({
        set: { currentStepIndex: current.currentStepIndex + 1, status: entry.status, timeInStep: 0 },
        appendHistory: entry
      }));

      expect(collection.updateOne).toHaveBeenCalledTimes(1);
      expect(collection.updateOne).toHaveBeenCalledWith('1', {
        $set: { currentStepIndex: 4, status: 'arrived at distribution center', timeInStep: 0 },
        $push: { history: entry }
      });
      expect(result.status).toBe(ExclusiveUpdateStatus.UPDATED);
      expect(result.status === ExclusiveUpdateStatus.UPDATED && result.shipment.history).toHaveLength(5);
    });

    it('should report NOT_FOUND when the shipment disappears before the write', async () => {
      collection.findOne.mockResolvedValue(makeShipment({ tracking: '1' }));
      collection.updateOne.mockResolvedValue(0);

      const result = await store.exclusiveUpdate('1', () => ({ set: { timeInStep: 1 } }));

      expect(result).toEqual({ status: ExclusiveUpdateStatus.NOT_FOUND });
    });

    it('should report NOT_FOUND without deciding when there is no such shipment', async () => {
      const decide = jest.fn();

      const result = await store.exclusiveUpdate('missing', decide);

      expect(result).toEqual({ status: ExclusiveUpdateStatus.NOT_FOUND });
      expect(decide).not.toHaveBeenCalled();
      expect(collection.updateOne).not.toHaveBeenCalled();
    });

    it('should skip the write when the decision is to leave the shipment alone', async () => {
      collection.findOne.mockResolvedValue(makeShipment({ tracking: '1' }));

      const result = await store.exclusiveUpdate('1', () => null);

      expect(result).toEqual({ status: ExclusiveUpdateStatus.UNCHANGED });
      expect(collection.updateOne).not.toHaveBeenCalled();
    });
  });
});

describe('awaitConnection', () => {
  // Test: A connection that failed to open is closed before the error surfaces
  it('should close a connection that fails to open', async () => {
    const failure = new Error('connect ECONNREFUSED 127.0.0.1:27017');
    const pending = {
      asPromise: jest.fn<Promise<string>, []>().mockRejectedValue(failure),
      close: jest.fn<Promise<void>, []>().mockResolvedValue(undefined)
    };

    await expect(awaitConnection(pending)).rejects.toBe(failure);
    expect(pending.close).toHaveBeenCalledTimes(1);
  });

  it('should leave an open connection alone', async () => {
    const pending = {
      asPromise: jest.fn<Promise<string>, []>().mockResolvedValue('connection'),
      close: jest.fn<Promise<void>, []>().mockResolvedValue(undefined)
    };

    await expect(awaitConnection(pending)).resolves.toBe('connection');
    expect(pending.close).not.toHaveBeenCalled();
  });
});
