/**
 * Generator Context
 *
 * Collaborators the generator receives from its caller rather than
 * constructing itself.
 */

/** Minimum severity a logger emits */
export type LogLevel = "debug" | "info" | "warn" | "error";

/**
 * Structured logger handed to the generator stages.
 * Diagnostics (e.g. unsupported column types) are reported through it
 * instead of console.log.
 */
export interface Logger {
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
  debug(message: string, data?: Record<string, unknown>): void;
}
