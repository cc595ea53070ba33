export interface IShipmentFactory {
  /** Persists a new shipment at the first stage and returns its tracking id. */
  createShipment(client: string, quantity: number, destination: string): Promise<string>;
}
