/**
 * Serializer Contract
 *
 * The platform never writes response bodies itself. It hands the logical
 * result of a handler (or the errors of a failed request) to a Serializer.
 * The platform ships a default implementation; applications may replace it
 * through Config.serializer.
 */

import type {
  DocumentData,
  ErrorDocument,
  ErrorSource,
  ResourceObject,
  SuccessDocument,
} from "./document.js";
import type { QueryParams } from "./context.js";

/** A failure ready to be rendered: status, human-readable message, extras */
export interface ErrorInstance {
  readonly status: number;
  readonly title: string;
  readonly message: string;
  readonly source?: ErrorSource;
  readonly meta?: Record<string, unknown>;
}

/** Callback invoked once per error, before the error document is built */
export type ErrorLogger = (error: ErrorInstance) => void;

/** The logical result of a successful request, already encoded */
export interface SuccessPayload {
  /** Primary data (resource objects or identifiers) */
  data: DocumentData;

  /** Related resource objects collected through include */
  included: ResourceObject[];

  /** URL of the requested document */
  self: string;

  /** Normalized query parameters (sparse fieldsets are applied from these) */
  params: QueryParams;
}

export interface Serializer {
  /** Build the success document for a 200/201 response */
  serializeSuccess(payload: SuccessPayload): SuccessDocument;

  /** Build the error document; logError runs once per error first */
  serializeErrors(
    errors: readonly ErrorInstance[],
    logError?: ErrorLogger
  ): ErrorDocument;
}
