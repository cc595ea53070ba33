import { AppConfig } from '../config/app.config';
import { DELIVERY_STAGES, Shipment } from '../types/domain.types';

export const FIXTURE_TIMESTAMP = '2025-01-01T00:00:00.000Z';

// 5 + 5 + 5 + 25 + 5 + 5 + 5 = 55
export const FIXTURE_DURATIONS = [5, 5, 5, 25, 5, 5, 5];

export function makeShipment(overrides: Partial<Shipment> = {}): Shipment {
  return {
    tracking: '10000001',
    client: 'test-client',
    quantity: 1,
    destination: 'Test City',
    createdAt: FIXTURE_TIMESTAMP,
    status: DELIVERY_STAGES[0],
    history: [{ status: DELIVERY_STAGES[0], at: FIXTURE_TIMESTAMP }],
    currentStepIndex: 0,
    stepDurations: [...FIXTURE_DURATIONS],
    timeInStep: 0,
    onHold: false,
    incidentDecision: false,
    incidentChecked: false,
    finished: false,
    archived: false,
    ...overrides
  };
}

/** Shipment sitting at the start of the transit stage. */
export function makeTransitShipment(overrides: Partial<Shipment> = {}): Shipment {
  return makeShipment({
    currentStepIndex: 3,
    status: DELIVERY_STAGES[3],
    history: DELIVERY_STAGES.slice(0, 4).map(status => ({ status, at: FIXTURE_TIMESTAMP })),
    ...overrides
  });
}

export function makeConfig(simulation: Partial<AppConfig['simulation']> = {}): AppConfig {
  return {
    store: { driver: 'memory', dbName: 'tracking' },
    simulation: {
      tickIntervalMs: 1000,
      timeUnitMs: 1000,
      incidentWaitUnitsPerDay: 5,
      incidentProbabilityPercent: 15,
      resolverHistoryLimit: 100,
      ...simulation
    },
    trackingId: { maxAttempts: 5 },
    retry: { maxRetries: 0, baseDelay: 0, maxDelay: 0, jitterFactor: 0 },
    api: { port: 5000 }
  };
}
