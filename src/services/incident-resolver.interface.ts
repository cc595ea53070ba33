import { IncidentResolution } from '../types/result.types';

export interface IIncidentResolver {
  /**
   * Waits out an incident of `days` days, then cancels or resumes the shipment.
   * A shipment that disappeared meanwhile yields SHIPMENT_MISSING, not an error.
   */
  resolve(tracking: string, days: number): Promise<IncidentResolution>;
}
