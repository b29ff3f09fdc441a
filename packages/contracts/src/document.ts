/**
 * Document Types
 *
 * The wire format: JSON documents served as application/vnd.api+json.
 *
 * Request payloads are described by Zod schemas so the platform can parse
 * and validate a body in one step. Response documents are plain interfaces;
 * the platform's serializer builds them.
 */

import { z } from "zod";

/** The only media type accepted for request bodies and served in responses */
export const MIME_TYPE = "application/vnd.api+json";

/** Version advertised in every document's top-level "jsonapi" member */
export const JSONAPI_VERSION = "1.0";

// ---------------------------------------------------------------------------
// Request payload schemas
// ---------------------------------------------------------------------------

/** { type, id } — points at one resource */
export const resourceIdentifierSchema = z.object({
  type: z.string().min(1),
  id: z.string().min(1),
  meta: z.record(z.unknown()).optional(),
});

/** Relationship member inside a resource payload */
export const relationshipPayloadSchema = z.object({
  data: z.union([
    resourceIdentifierSchema,
    z.array(resourceIdentifierSchema),
    z.null(),
  ]),
});

/** A resource object as sent by a client (id is optional on create) */
export const resourcePayloadSchema = z.object({
  type: z.string().min(1),
  id: z.string().min(1).optional(),
  attributes: z.record(z.unknown()).optional(),
  relationships: z.record(relationshipPayloadSchema).optional(),
  meta: z.record(z.unknown()).optional(),
});

/**
 * The primary payload of a request document.
 *   - object: a resource (create/update) or a to-one linkage (graft)
 *   - array:  to-many linkage (replace/merge/subtract/clear)
 *   - null:   an emptied to-one relationship (prune)
 */
export const primaryDataSchema = z.union([
  resourcePayloadSchema,
  z.array(resourceIdentifierSchema),
  z.null(),
]);

/** A complete request document */
export const requestDocumentSchema = z.object({
  data: primaryDataSchema,
  meta: z.record(z.unknown()).optional(),
});

export type ResourceIdentifier = z.infer<typeof resourceIdentifierSchema>;
export type ResourcePayload = z.infer<typeof resourcePayloadSchema>;
export type PrimaryData = z.infer<typeof primaryDataSchema>;
export type RequestDocument = z.infer<typeof requestDocumentSchema>;

// ---------------------------------------------------------------------------
// Response documents
// ---------------------------------------------------------------------------

export interface Links {
  self?: string;
  related?: string;
}

export interface RelationshipObject {
  links?: Links;
  data?: ResourceIdentifier | ResourceIdentifier[] | null;
}

/** A resource object as served by the platform */
export interface ResourceObject {
  type: string;
  id: string;
  attributes?: Record<string, unknown>;
  relationships?: Record<string, RelationshipObject>;
  links?: Links;
}

/** A full resource object, or only its linkage */
export type PrimaryResource = ResourceObject | ResourceIdentifier;

/** Anything that can be primary data of a success document */
export type DocumentData = PrimaryResource | PrimaryResource[] | null;

export interface SuccessDocument {
  jsonapi: { version: string };
  data: DocumentData;
  included?: ResourceObject[];
  links?: Links;
  meta?: Record<string, unknown>;
}

/** Where in the request an error originated */
export interface ErrorSource {
  pointer?: string;
  parameter?: string;
}

export interface ErrorObject {
  status: string;
  title: string;
  detail?: string;
  source?: ErrorSource;
  meta?: Record<string, unknown>;
}

export interface ErrorDocument {
  jsonapi: { version: string };
  errors: ErrorObject[];
}
