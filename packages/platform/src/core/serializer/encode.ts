/**
 * Record Encoding
 *
 * Turns a domain record into a resource object. Resources may declare an
 * encoder; otherwise the record's own `id` is used and every other own
 * field becomes an attribute. Attribute keys are dasherized on the way out.
 */

import type { EncodedRecord, ResourceObject } from "@resourceful/contracts";
import { dasherizeKeys } from "../resource/naming.js";

/** Encoder used when a resource declares none */
export function defaultEncoder(record: unknown): EncodedRecord {
  if (typeof record === "object" && record !== null && "id" in record) {
    const id = record.id;
    if (typeof id === "string" || typeof id === "number") {
      const attributes = Object.fromEntries(
        Object.entries(record).filter(([key]) => key !== "id")
      );
      return { id, attributes };
    }
  }
  throw new TypeError(
    "Cannot encode a record without a string or numeric id; declare an encoder"
  );
}

export interface ResourceObjectOptions {
  /** Path prefix the API is mounted under ("" when mounted at the root) */
  basePath: string;

  /** Relationship names to advertise links for */
  relationships?: readonly string[];
}

export function toResourceObject(
  type: string,
  encoded: EncodedRecord,
  options: ResourceObjectOptions
): ResourceObject {
  const id = String(encoded.id);
  const self = `${options.basePath}/${type}/${id}`;
  const object: ResourceObject = { type, id, links: { self } };

  if (encoded.attributes) {
    object.attributes = dasherizeKeys(encoded.attributes);
  }

  const relationships = options.relationships ?? [];
  if (relationships.length > 0) {
    object.relationships = Object.fromEntries(
      relationships.map((rel) => [
        rel,
        {
          links: {
            self: `${self}/relationships/${rel}`,
            related: `${self}/${rel}`,
          },
        },
      ])
    );
  }

  return object;
}
