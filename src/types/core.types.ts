/**
 * @fileoverview Core type definitions for the ORGA runtime.
 *
 * These primitives are shared by every component of the reasoning loop:
 * branded identifiers, timestamps, severities and the injectable clock.
 *
 * @module orga-runtime/types
 * @version 0.1.0
 */

import { v4 as uuidv4 } from 'uuid';

/**
 * Unique identifier type used throughout the system.
 * Format: UUID v4 string for global uniqueness.
 */
export type UniqueId = string & { readonly __brand: 'UniqueId' };

/**
 * Identity of the agent a loop run is executed for.
 * Supplied by the caller; not necessarily a UUID.
 */
export type AgentId = string & { readonly __brand: 'AgentId' };

/**
 * Unix timestamp in milliseconds.
 */
export type Timestamp = number & { readonly __brand: 'Timestamp' };

/**
 * Severity levels for logging and error reporting.
 */
export enum Severity {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR',
}

/**
 * Source of time for the loop, executor and breakers.
 *
 * @remarks
 * `sleep` resolves early (without rejecting) when the signal aborts;
 * callers check `signal.aborted` afterwards.
 */
export interface Clock {
  now(): number;
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

/**
 * Clock backed by `Date.now` and `setTimeout`.
 */
export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms, signal) =>
    new Promise<void>(resolve => {
      if (signal?.aborted === true || ms <= 0) {
        resolve();
        return;
      }
      const onAbort = (): void => {
        clearTimeout(timer);
        resolve();
      };
      const timer = setTimeout(() => {
        signal?.removeEventListener('abort', onAbort);
        resolve();
      }, ms);
      signal?.addEventListener('abort', onAbort, { once: true });
    }),
};

/**
 * Creates a branded UniqueId from a string.
 */
export function createUniqueId(value: string): UniqueId {
  return value as UniqueId;
}

/**
 * Generates a fresh UUID v4 identifier.
 */
export function generateId(): UniqueId {
  return createUniqueId(uuidv4());
}

/**
 * Creates a branded AgentId from a string.
 */
export function createAgentId(value: string): AgentId {
  return value as AgentId;
}

/**
 * Creates a branded Timestamp, defaulting to the current time.
 */
export function createTimestamp(value?: number): Timestamp {
  return (value ?? Date.now()) as Timestamp;
}
