/**
 * Engine Configuration
 *
 * Process-wide settings with an init-then-freeze lifecycle:
 *
 *   1. Construct (optionally with hooks)
 *   2. Declare resources / populate the role and sideload tables
 *   3. freeze() — one-way; every later write throws ConfigFrozenError
 *
 * After freeze the configuration is only read, so requests can share it
 * without any coordination.
 */

import type {
  CallerRole,
  ErrorLogger,
  Logger,
  RequestHeaders,
  Serializer,
} from "@resourceful/contracts";
import { ConfigFrozenError } from "../errors/index.js";
import { RoleTable } from "./role-table.js";
import { SideloadTable } from "./sideload-table.js";
import { DocumentSerializer } from "../serializer/index.js";
import { createLogger } from "../logging/index.js";

/** What the role resolver sees of a request */
export interface RoleRequest {
  readonly method: string;
  readonly path: string;
  readonly headers: RequestHeaders;
  readonly locals: Readonly<Record<string, unknown>>;
}

/** Computes the caller's role. Called at most once per request. */
export type RoleResolver = (request: RoleRequest) => CallerRole;

/**
 * Wraps a unit of work. Implementations provide atomicity (begin, commit,
 * rollback) and must rethrow the original error after rolling back.
 */
export type TransactionHook = <T>(work: () => Promise<T>) => Promise<T>;

/** Statuses an application error class may be mapped onto */
export type MappedStatus = 400 | 403 | 404 | 409 | 422;

export type ErrorClass = abstract new (...args: never[]) => Error;

export interface ErrorMapping {
  readonly errorClass: ErrorClass;
  readonly status: MappedStatus;
}

export interface ConfigOptions {
  role?: RoleResolver;
  errorLogger?: ErrorLogger;
  transaction?: TransactionHook;
  serializer?: Serializer;
  logger?: Logger;
}

const NULL_ROLE: RoleResolver = () => null;

const PASSTHROUGH_TRANSACTION: TransactionHook = (work) => work();

export class Config {
  readonly resourceRoles = new RoleTable();
  readonly resourceSideload = new SideloadTable();

  private roleResolver: RoleResolver;
  private errorLoggerHook: ErrorLogger | undefined;
  private transactionHook: TransactionHook;
  private serializerImpl: Serializer;
  private loggerImpl: Logger;
  private readonly errorMappings: ErrorMapping[] = [];
  private frozenState = false;

  constructor(options: ConfigOptions = {}) {
    this.roleResolver = options.role ?? NULL_ROLE;
    this.errorLoggerHook = options.errorLogger;
    this.transactionHook = options.transaction ?? PASSTHROUGH_TRANSACTION;
    this.serializerImpl = options.serializer ?? new DocumentSerializer();
    this.loggerImpl = options.logger ?? createLogger("jsonapi");
  }

  get frozen(): boolean {
    return this.frozenState;
  }

  get role(): RoleResolver {
    return this.roleResolver;
  }

  set role(resolver: RoleResolver) {
    this.assertMutable("replace the role resolver");
    this.roleResolver = resolver;
  }

  get errorLogger(): ErrorLogger | undefined {
    return this.errorLoggerHook;
  }

  set errorLogger(logger: ErrorLogger | undefined) {
    this.assertMutable("replace the error logger");
    this.errorLoggerHook = logger;
  }

  get transaction(): TransactionHook {
    return this.transactionHook;
  }

  set transaction(hook: TransactionHook) {
    this.assertMutable("replace the transaction hook");
    this.transactionHook = hook;
  }

  get serializer(): Serializer {
    return this.serializerImpl;
  }

  set serializer(serializer: Serializer) {
    this.assertMutable("replace the serializer");
    this.serializerImpl = serializer;
  }

  get logger(): Logger {
    return this.loggerImpl;
  }

  set logger(logger: Logger) {
    this.assertMutable("replace the logger");
    this.loggerImpl = logger;
  }

  /**
   * Maps an application error class onto a response status, so that e.g.
   * a repository's RecordNotFound becomes a 404 document instead of a 500.
   * Earlier mappings win.
   */
  mapError(errorClass: ErrorClass, status: MappedStatus): void {
    this.assertMutable(`map ${errorClass.name} to ${status}`);
    this.errorMappings.push({ errorClass, status });
  }

  /** Status mapped for an error, if any mapping matches */
  statusFor(error: unknown): MappedStatus | undefined {
    return this.errorMappings.find((m) => error instanceof m.errorClass)?.status;
  }

  /** Makes the configuration and both tables immutable. Cannot be undone. */
  freeze(): void {
    this.resourceRoles.freeze();
    this.resourceSideload.freeze();
    this.frozenState = true;
  }

  private assertMutable(what: string): void {
    if (this.frozenState) throw new ConfigFrozenError(what);
  }
}
