/**
 * @resourceful/platform
 *
 * The engine. Provides the configuration registry, the resource
 * registrar, guarded dispatch, the request lifecycle and the Fastify
 * adapter.
 */

// Environment config
export { loadConfig, type AppConfig } from "./core/config/index.js";

// Engine config
export {
  Config,
  type ConfigOptions,
  type RoleRequest,
  type RoleResolver,
  type TransactionHook,
  type MappedStatus,
  type ErrorClass,
} from "./core/registry/config.js";
export { RoleTable, Roles, type ResourceRoles, type ActionRoles } from "./core/registry/role-table.js";
export { SideloadTable, type ResourceSideload } from "./core/registry/sideload-table.js";

// Lifecycle
export {
  JsonApi,
  createJsonApi,
  type JsonApiRequest,
  type JsonApiResponse,
} from "./core/lifecycle/api.js";
export { normalizeQuery, type RawQuery } from "./core/lifecycle/negotiation.js";

// Naming
export {
  canonicalizeResourceName,
  dasherize,
  camelize,
} from "./core/resource/naming.js";

// Dispatch
export { actions, pfilters, nullif, type GuardOutcome, type Condition } from "./core/dispatch/guards.js";

// Errors
export {
  HttpError,
  BadRequestError,
  ForbiddenError,
  NotFoundError,
  MethodNotAllowedError,
  NotAcceptableError,
  ConflictError,
  UnsupportedMediaTypeError,
  UnprocessableEntityError,
  ERROR_CODES,
  errorForStatus,
  titleForStatus,
  HaltSignal,
  ConfigurationError,
  ConfigFrozenError,
} from "./core/errors/index.js";

// Serializer
export { DocumentSerializer, defaultEncoder, toResourceObject } from "./core/serializer/index.js";

// Logging
export { createLogger, silentLogger, logRequest } from "./core/logging/index.js";

// Observability
export {
  initObservability,
  captureException,
  captureMessage,
  flushObservability,
  getObservabilityProvider,
  setObservabilityProvider,
  resetObservability,
  ConsoleObservabilityProvider,
  type ObservabilityProvider,
  type ObservabilityContext,
  type ObservabilitySeverity,
} from "./core/observability/index.js";

// Adapters
export { registerJsonApiRoutes, type JsonApiRouteOptions } from "./adapters/rest/adapter.js";
