// Result types for store and service responses

import { Shipment } from './domain.types';

/**
 * Represents the outcome of an operation that may succeed or fail.
 * Discriminated union prevents invalid states.
 */
export type Result<T> =
  | { readonly success: true; readonly data: T; readonly message: string }        // Success with data
  | { readonly success: true; readonly message: string }                          // Success without data (not found)
  | { readonly success: false; readonly message: string };                        // Failure

export enum ExclusiveUpdateStatus {
  UPDATED = 'UPDATED',
  UNCHANGED = 'UNCHANGED',
  NOT_FOUND = 'NOT_FOUND'
}

/**
 * Result of an exclusive read-decide-write on one shipment.
 * UPDATED carries the record as written.
 */
export type ExclusiveUpdateResult =
  | {
      readonly status: ExclusiveUpdateStatus.UPDATED;
      readonly shipment: Shipment;
    }
  | {
      readonly status: ExclusiveUpdateStatus.UNCHANGED;
    }
  | {
      readonly status: ExclusiveUpdateStatus.NOT_FOUND;
    };

export enum IncidentOutcome {
  CANCELLED = 'CANCELLED',
  RESUMED = 'RESUMED',
  SHIPMENT_MISSING = 'SHIPMENT_MISSING',
  FAILED = 'FAILED'
}

export interface IncidentResolution {
  tracking: string;
  days: number;
  chance: number;
  draw?: number;
  outcome: IncidentOutcome;
  completedAt: string; // ISO 8601
  error?: string;
}

export interface TickSummary {
  delta: number;     // time units credited to every shipment this tick
  scanned: number;
  advanced: number;
  finished: number;
  incidents: number;
  failed: number;
}

// ============================================================================
// Type Guards - Shared utility functions for type narrowing
// ============================================================================

/**
 * Type guard to check if Result has data (success with data case).
 */
export function isSuccess<T>(result: Result<T>): result is { readonly success: true; readonly data: T; readonly message: string } {
  return result.success && 'data' in result;
}

/**
 * Type guard to check if Result is not found (success without data case).
 */
export function isNotFound<T>(result: Result<T>): result is { readonly success: true; readonly message: string } {
  return result.success && !('data' in result);
}

/**
 * Type guard to check if Result is a failure.
 */
export function isFailure<T>(result: Result<T>): result is { readonly success: false; readonly message: string } {
  return !result.success;
}

export function isUpdated(
  result: ExclusiveUpdateResult
): result is Extract<ExclusiveUpdateResult, { status: ExclusiveUpdateStatus.UPDATED }> {
  return result.status === ExclusiveUpdateStatus.UPDATED;
}
