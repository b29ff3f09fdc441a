/**
 * @resourceful/contracts
 *
 * Public API — the shared boundary between platform and domain.
 * Both sides import from this package. Neither imports from the other.
 */

// Actions
export type {
  Action,
  ResourceAction,
  HasOneAction,
  HasManyAction,
} from "./action.js";
export {
  RESOURCE_ACTIONS,
  HAS_ONE_ACTIONS,
  HAS_MANY_ACTIONS,
  MUTATING_ACTIONS,
  isAction,
} from "./action.js";

// Roles
export type { Role, CallerRole } from "./permission.js";
export { ANY_ROLE } from "./permission.js";

// Relationships
export type { RelationshipType, RelationshipRef } from "./relationship.js";

// Handler context
export type {
  HandlerContext,
  Logger,
  QueryParams,
  RequestHeaders,
} from "./context.js";

// Resource declarations
export type {
  Awaitable,
  Finder,
  Encoder,
  EncodedRecord,
  IndexHandler,
  CreateHandler,
  ShowHandler,
  UpdateHandler,
  MemberHandler,
  PluckHandler,
  FetchHandler,
  GraftHandler,
  LinkageHandler,
  ActionOptions,
  IndexOptions,
  RelationshipOptions,
  HasOneBuilder,
  HasManyBuilder,
  ResourceBuilder,
  ResourceBody,
  ResourceHost,
  ResourceDeclaration,
} from "./resource.js";
export { defineResource } from "./resource.js";

// Documents
export type {
  ResourceIdentifier,
  ResourcePayload,
  PrimaryData,
  RequestDocument,
  Links,
  RelationshipObject,
  ResourceObject,
  PrimaryResource,
  DocumentData,
  SuccessDocument,
  ErrorSource,
  ErrorObject,
  ErrorDocument,
} from "./document.js";
export {
  MIME_TYPE,
  JSONAPI_VERSION,
  resourceIdentifierSchema,
  relationshipPayloadSchema,
  resourcePayloadSchema,
  primaryDataSchema,
  requestDocumentSchema,
} from "./document.js";

// Serializer collaborator
export type {
  ErrorInstance,
  ErrorLogger,
  SuccessPayload,
  Serializer,
} from "./serializer.js";
