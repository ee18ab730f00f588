/**
 * Shared type definitions for Switchboard.
 * Kept minimal so components depend on interfaces, not implementations.
 */

// --- Logging ---

export interface Logger {
  info(msg: string): void;
  warn(msg: string): void;
  error(msg: string): void;
  debug?(msg: string): void;
}

// --- Checked outcomes ---

/** Success with a value. */
export interface Ok<T> {
  ok: true;
  value: T;
}

/** Failure with a human-readable reason. */
export interface Err {
  ok: false;
  error: string;
}

/**
 * Explicit outcome for operations whose failure is expected and recovered
 * locally (discovery, classification). Callers branch on `ok` instead of
 * catching.
 */
export type Result<T> = Ok<T> | Err;

export function ok<T>(value: T): Ok<T> {
  return { ok: true, value };
}

export function err(error: string): Err {
  return { ok: false, error };
}

/** Render an unknown thrown value as a message. */
export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
