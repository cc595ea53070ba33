// Domain types - shipment state machine and its history

export const DELIVERY_STAGES = [
  'order confirmed',
  'package prepared',
  'picked up by carrier',
  'in transit',
  'arrived at distribution center',
  'out for delivery',
  'delivered'
] as const;

export type DeliveryStage = (typeof DELIVERY_STAGES)[number];

export const STAGE_COUNT = DELIVERY_STAGES.length;
export const TRANSIT_STAGE_INDEX = 3;
export const LAST_STAGE_INDEX = STAGE_COUNT - 1;

export const CANCELLED_STATUS = 'delivery cancelled';

export function incidentStatus(days: number): string {
  return `incident declared, delay=${days} days`;
}

export interface HistoryEntry {
  status: string;
  at: string; // ISO 8601
}

export interface Shipment {
  tracking: string;
  client: string;
  quantity: number;
  destination: string;
  createdAt: string; // ISO 8601
  status: string;
  history: HistoryEntry[];
  currentStepIndex: number;
  stepDurations: number[]; // time units, one per stage
  timeInStep: number;      // time units
  onHold: boolean;
  incidentDecision: boolean;
  incidentChecked: boolean;
  finished: boolean;
  archived: boolean;
}

/**
 * Fields a scheduler tick, a resolver or an archive request may change.
 * Identity, order details, durations and history are never set directly.
 */
export type MutableShipmentFields = Pick<
  Shipment,
  | 'status'
  | 'currentStepIndex'
  | 'timeInStep'
  | 'onHold'
  | 'incidentChecked'
  | 'finished'
  | 'archived'
>;

export interface ShipmentMutation {
  set?: Partial<MutableShipmentFields>;
  appendHistory?: HistoryEntry;
}

/** Public projection returned by the API and written to reports. */
export interface ShipmentView {
  tracking: string;
  client: string;
  quantity: number;
  destination: string;
  status: string;
  archived: boolean;
  finished: boolean;
  currentStepIndex: number;
  history: HistoryEntry[];
}

export function toShipmentView(shipment: Shipment): ShipmentView {
  return {
    tracking: shipment.tracking,
    client: shipment.client,
    quantity: shipment.quantity,
    destination: shipment.destination,
    status: shipment.status,
    archived: shipment.archived,
    finished: shipment.finished,
    currentStepIndex: shipment.currentStepIndex,
    history: shipment.history.map(entry => ({ ...entry }))
  };
}
