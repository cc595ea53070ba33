// Domain errors raised by the store and the shipment factory

export class DuplicateTrackingIdError extends Error {
  constructor(public readonly tracking: string) {
    super(`Tracking id ${tracking} already exists`);
    this.name = 'DuplicateTrackingIdError';
  }
}

export class TrackingIdExhaustedError extends Error {
  constructor(public readonly attempts: number) {
    super(`Could not allocate a unique tracking id after ${attempts} attempts`);
    this.name = 'TrackingIdExhaustedError';
  }
}
