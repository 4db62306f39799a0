import { setTimeout as delay } from 'node:timers/promises';

/**
 * Waits `ms` milliseconds. Rejects with an `AbortError` when `signal` fires.
 */
export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

/** Injection token for the {@link Sleep} implementation. */
export const SLEEP = Symbol('SLEEP');

export const sleep: Sleep = async (ms, signal) => {
  await delay(ms, undefined, { signal });
};

/**
 * True for the rejection produced by an aborted {@link Sleep}.
 */
export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError';
}
