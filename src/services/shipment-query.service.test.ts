import 'reflect-metadata';
import { InMemoryShipmentStore } from '../adapters/store/in-memory-shipment.store';
import { makeShipment } from '../testing/shipment.fixtures';
import { isFailure, isNotFound, isSuccess } from '../types/result.types';
import { ShipmentQueryService } from './shipment-query.service';

describe('ShipmentQueryService', () => {
  let store: InMemoryShipmentStore;
  let query: ShipmentQueryService;

  beforeEach(async () => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    store = new InMemoryShipmentStore();
    query = new ShipmentQueryService(store);
    await store.insert(makeShipment({ tracking: '11111111', client: 'Alpha Co', quantity: 4 }));
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  // Test: Views expose the public projection only
  it('should return the public view of a shipment', async () => {
    const result = await query.getShipment('11111111');

    expect(isSuccess(result) && result.data).toEqual({
      tracking: '11111111',
      client: 'Alpha Co',
      quantity: 4,
      destination: 'Test City',
      status: 'order confirmed',
      archived: false,
      finished: false,
      currentStepIndex: 0,
      history: [{ status: 'order confirmed', at: '2025-01-01T00:00:00.000Z' }]
    });
  });

  // Test: Unknown tracking ids are success without data
  it('should report unknown shipments as not found', async () => {
    const result = await query.getShipment('00000000');

    expect(isNotFound(result)).toBe(true);
    expect(result.message).toBe('Shipment 00000000 not found');
  });

  // Test: Listing includes archived and finished shipments
  it('should list every shipment', async () => {
    await store.insert(makeShipment({ tracking: '22222222', archived: true, finished: true }));

    const result = await query.listShipments();

    expect(isSuccess(result) && result.data.map(v => v.tracking)).toEqual(['11111111', '22222222']);
  });

  // Test: Archiving sets the flag and appends no history
  it('should archive a shipment without touching its history', async () => {
    const result = await query.archiveShipment('11111111');

    expect(isSuccess(result) && result.data.archived).toBe(true);
    const stored = await store.findByTrackingId('11111111');
    expect(stored?.archived).toBe(true);
    expect(stored?.history).toHaveLength(1);
    expect(await store.findActive()).toEqual([]);
  });

  // Test: Archiving twice is harmless
  it('should treat a repeated archive as success', async () => {
    await query.archiveShipment('11111111');

    const result = await query.archiveShipment('11111111');

    expect(isSuccess(result) && result.data.archived).toBe(true);
  });

  // Test: Archiving an unknown shipment is not found
  it('should report not found when archiving an unknown shipment', async () => {
    const result = await query.archiveShipment('00000000');

    expect(isNotFound(result)).toBe(true);
  });

  // Test: Store errors become failures
  it('should turn store errors into a failure result', async () => {
    jest.spyOn(store, 'findAll').mockRejectedValue(new Error('connection reset'));

    const result = await query.listShipments();

    expect(isFailure(result)).toBe(true);
    expect(result.message).toBe('Failed to list shipments: connection reset');
  });
});
