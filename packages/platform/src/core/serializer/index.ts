/**
 * Document Serializer
 *
 * Default implementation of the Serializer contract. Builds the top-level
 * success and error documents; record encoding lives in ./encode.ts.
 */

import {
  JSONAPI_VERSION,
  type DocumentData,
  type ErrorDocument,
  type ErrorInstance,
  type ErrorLogger,
  type ErrorObject,
  type PrimaryResource,
  type ResourceObject,
  type Serializer,
  type SuccessDocument,
  type SuccessPayload,
} from "@resourceful/contracts";

export { defaultEncoder, toResourceObject } from "./encode.js";
export type { ResourceObjectOptions } from "./encode.js";

type Fieldsets = Record<string, string[]>;

function isResourceObject(entry: PrimaryResource): entry is ResourceObject {
  return "attributes" in entry || "relationships" in entry || "links" in entry;
}

function pick<T>(record: Record<string, T>, keep: ReadonlySet<string>): Record<string, T> {
  return Object.fromEntries(
    Object.entries(record).filter(([key]) => keep.has(key))
  );
}

/** Keeps only the attributes and relationships listed in fields[type] */
function sparseObject(entry: ResourceObject, fields: Fieldsets): ResourceObject {
  const allowed = fields[entry.type];
  if (!allowed) return entry;

  const keep = new Set(allowed);
  const sparse: ResourceObject = { type: entry.type, id: entry.id };
  if (entry.attributes) sparse.attributes = pick(entry.attributes, keep);
  if (entry.relationships) sparse.relationships = pick(entry.relationships, keep);
  if (entry.links) sparse.links = entry.links;
  return sparse;
}

/** Linkage passes through untouched */
function applyFieldset(entry: PrimaryResource, fields: Fieldsets): PrimaryResource {
  return isResourceObject(entry) ? sparseObject(entry, fields) : entry;
}

function applyFieldsets(data: DocumentData, fields: Fieldsets): DocumentData {
  if (data === null) return null;
  if (Array.isArray(data)) return data.map((entry) => applyFieldset(entry, fields));
  return applyFieldset(data, fields);
}

function toErrorObject(error: ErrorInstance): ErrorObject {
  const object: ErrorObject = {
    status: String(error.status),
    title: error.title,
    detail: error.message,
  };
  if (error.source) object.source = error.source;
  if (error.meta) object.meta = error.meta;
  return object;
}

export class DocumentSerializer implements Serializer {
  serializeSuccess({ data, included, self, params }: SuccessPayload): SuccessDocument {
    const document: SuccessDocument = {
      jsonapi: { version: JSONAPI_VERSION },
      data: applyFieldsets(data, params.fields),
    };

    if (included.length > 0) {
      document.included = included.map((entry) => sparseObject(entry, params.fields));
    }

    document.links = { self };
    return document;
  }

  serializeErrors(errors: readonly ErrorInstance[], logError?: ErrorLogger): ErrorDocument {
    if (logError) {
      for (const error of errors) logError(error);
    }

    return {
      jsonapi: { version: JSONAPI_VERSION },
      errors: errors.map(toErrorObject),
    };
  }
}
