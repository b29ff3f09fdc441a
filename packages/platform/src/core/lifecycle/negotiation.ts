/**
 * Content Negotiation & Query Normalization
 *
 * Client requests must prefer the document media type in Accept (406
 * otherwise) and, when they carry a body, send it as that media type with
 * at most a charset parameter (415 otherwise).
 *
 * The standard query groups arrive as bracketed keys and are normalized
 * into QueryParams with empty defaults:
 *
 *   ?fields[posts]=title,body&include=author&filter[author]=9&page[size]=10&sort=-title
 */

import { MIME_TYPE, type QueryParams, type RequestHeaders } from "@resourceful/contracts";
import { NotAcceptableError, UnsupportedMediaTypeError } from "../errors/index.js";

/** Raw query values as a Node query-string parser delivers them */
export type RawQuery = Readonly<Record<string, string | string[] | undefined>>;

interface MediaRange {
  type: string;
  quality: number;
  params: Map<string, string>;
}

export function headerValue(headers: RequestHeaders, name: string): string | undefined {
  const value = headers[name.toLowerCase()];
  return Array.isArray(value) ? value.join(", ") : value;
}

function parseMediaRange(entry: string): MediaRange {
  const [type = "", ...rest] = entry.split(";").map((part) => part.trim());
  const params = new Map<string, string>();
  let quality = 1;

  for (const param of rest) {
    const [key = "", value = ""] = param.split("=").map((part) => part.trim());
    if (key.toLowerCase() === "q") {
      const parsed = Number.parseFloat(value);
      quality = Number.isNaN(parsed) ? 0 : parsed;
    } else if (key) {
      params.set(key.toLowerCase(), value);
    }
  }

  return { type: type.toLowerCase(), quality, params };
}

/** The client's most preferred media range; ties keep header order, q=0 ranges are refused */
export function preferredMediaRange(accept: string | undefined): MediaRange | undefined {
  if (!accept) return undefined;
  const ranges = accept
    .split(",")
    .map((entry) => entry.trim())
    .filter(Boolean)
    .map(parseMediaRange)
    .filter((range) => range.quality > 0);
  return ranges.sort((a, b) => b.quality - a.quality)[0];
}

/** Throws 406 unless the preferred Accept range is exactly the document media type */
export function assertAcceptable(headers: RequestHeaders): void {
  const preferred = preferredMediaRange(headerValue(headers, "accept"));
  if (!preferred || preferred.type !== MIME_TYPE || preferred.params.size > 0) {
    throw new NotAcceptableError(`Accept must prefer ${MIME_TYPE}`);
  }
}

/** Throws 415 unless a non-empty body is sent as the document media type */
export function assertSupportedBody(headers: RequestHeaders, body: string | undefined): void {
  if (body === undefined || body.length === 0) return;

  const contentType = headerValue(headers, "content-type");
  const range = contentType ? parseMediaRange(contentType) : undefined;
  const onlyCharset = range
    ? Array.from(range.params.keys()).every((key) => key === "charset")
    : false;

  if (!range || range.type !== MIME_TYPE || !onlyCharset) {
    throw new UnsupportedMediaTypeError(`Content-Type must be ${MIME_TYPE}`);
  }
}

const GROUP_KEY = /^(fields|filter|page)\[([^\]]+)\]$/;

function splitList(value: string): string[] {
  return value
    .split(",")
    .map((part) => part.trim())
    .filter(Boolean);
}

export function normalizeQuery(query: RawQuery): QueryParams {
  const params: QueryParams = { fields: {}, include: [], filter: {}, page: {}, sort: "" };

  for (const [key, raw] of Object.entries(query)) {
    if (raw === undefined) continue;
    const value = Array.isArray(raw) ? raw.join(",") : raw;

    if (key === "include") {
      params.include = splitList(value);
      continue;
    }
    if (key === "sort") {
      params.sort = value;
      continue;
    }

    const group = GROUP_KEY.exec(key);
    if (!group) continue;
    const [, name, member = ""] = group;
    if (name === "fields") {
      params.fields[member] = splitList(value);
    } else if (name === "filter") {
      params.filter[member] = value;
    } else {
      params.page[member] = value;
    }
  }

  return params;
}
