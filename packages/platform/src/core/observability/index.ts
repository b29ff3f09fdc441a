/**
 * Observability Module
 *
 * Captures unexpected faults and warning/error messages.
 * Follows the provider pattern — pluggable backends with a console fallback.
 *
 * Usage:
 *   import { initObservability, captureException, captureMessage } from "./observability";
 *
 *   initObservability();  // Call once at startup
 *
 *   captureException(error, { method: "GET", path: "/posts/1" });
 *   captureMessage("Slow finder", "warning", { durationMs: 5200 });
 */

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type ObservabilitySeverity = "fatal" | "error" | "warning" | "info" | "debug";

/** Context tags attached to every event for filtering */
export interface ObservabilityContext {
  [key: string]: unknown;
}

/** The provider contract. Every observability backend implements this. */
export interface ObservabilityProvider {
  /** Provider name (for logging) */
  readonly name: string;

  captureException(error: Error, context?: ObservabilityContext): void;

  captureMessage(
    message: string,
    level: ObservabilitySeverity,
    context?: ObservabilityContext
  ): void;

  /** Flush pending events to the backend (for graceful shutdown) */
  flush(timeoutMs?: number): Promise<void>;
}

// ---------------------------------------------------------------------------
// Console Provider (default — zero deps)
// ---------------------------------------------------------------------------

export class ConsoleObservabilityProvider implements ObservabilityProvider {
  readonly name = "console";

  captureException(error: Error, context?: ObservabilityContext): void {
    console.error(
      JSON.stringify({
        level: "error",
        context: "observability",
        event: "exception",
        message: error.message,
        stack: error.stack,
        ...context,
        timestamp: new Date().toISOString(),
      })
    );
  }

  captureMessage(
    message: string,
    level: ObservabilitySeverity,
    context?: ObservabilityContext
  ): void {
    // Only exceptions go to the console here; messages were already
    // written by the logger that forwarded them.
    if (level === "fatal") {
      console.error(
        JSON.stringify({
          level,
          context: "observability",
          event: "message",
          message,
          ...context,
          timestamp: new Date().toISOString(),
        })
      );
    }
  }

  async flush(): Promise<void> {
    // Console provider: no-op (console writes are synchronous)
  }
}

// ---------------------------------------------------------------------------
// State
// ---------------------------------------------------------------------------

let provider: ObservabilityProvider = new ConsoleObservabilityProvider();

/**
 * Initialize the observability module with the console provider, or
 * with the given provider. Safe to call multiple times. Never throws.
 */
export function initObservability(custom?: ObservabilityProvider): void {
  provider = custom ?? new ConsoleObservabilityProvider();
}

// ---------------------------------------------------------------------------
// Public API (delegates to provider)
// ---------------------------------------------------------------------------

export function captureException(
  error: Error,
  context?: ObservabilityContext
): void {
  provider.captureException(error, context);
}

export function captureMessage(
  message: string,
  level: ObservabilitySeverity = "info",
  context?: ObservabilityContext
): void {
  provider.captureMessage(message, level, context);
}

/** Flush pending events (call during graceful shutdown) */
export async function flushObservability(timeoutMs?: number): Promise<void> {
  await provider.flush(timeoutMs);
}

/** Get the current observability provider (for testing/inspection) */
export function getObservabilityProvider(): ObservabilityProvider {
  return provider;
}

/** Override the observability provider (for testing) */
export function setObservabilityProvider(p: ObservabilityProvider): void {
  provider = p;
}

/** Reset observability module state (for testing only) */
export function resetObservability(): void {
  provider = new ConsoleObservabilityProvider();
}
