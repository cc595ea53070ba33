import { Shipment, ShipmentMutation } from '../../types/domain.types';

export function cloneShipment(shipment: Shipment): Shipment {
  return {
    ...shipment,
    stepDurations: [...shipment.stepDurations],
    history: shipment.history.map(entry => ({ ...entry }))
  };
}

export function isEmptyMutation(mutation: ShipmentMutation): boolean {
  const hasFields = mutation.set !== undefined && Object.keys(mutation.set).length > 0;
  return !hasFields && mutation.appendHistory === undefined;
}

export function applyMutation(shipment: Shipment, mutation: ShipmentMutation): Shipment {
  const next: Shipment = { ...cloneShipment(shipment), ...mutation.set };
  if (mutation.appendHistory) {
    next.history.push({ ...mutation.appendHistory });
  }
  return next;
}
