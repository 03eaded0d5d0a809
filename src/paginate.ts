import type { NcmClient } from "./client.js";
import type { EndpointDescriptor } from "./endpoints.js";
import { ApiError, PartialResultError, RequestError } from "./errors.js";
import { createLogger } from "./logger.js";
import {
  encodeQuery,
  pageParams,
  resolvePageSize,
  validateQuery,
  type PageLimit,
  type QuerySpec,
} from "./query.js";

export type ApiRecord = Record<string, unknown>;

export interface WalkOptions {
  /** Stop after this many records; "all" (default) walks until the server is exhausted */
  limit?: PageLimit;
  /** Throttle the first request too (set when the walk runs inside a larger loop) */
  throttleFirst?: boolean;
  /** Called after each page is read */
  onPage?: (page: Page) => void;
}

/** Where the next page comes from */
export type Cursor =
  | { kind: "url"; url: string }
  | { kind: "offset"; offset: number };

export interface Page {
  records: ApiRecord[];
  next: Cursor | null;
}

const log = createLogger("paginate");

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Split a response into records and the cursor for the next page.
 *
 * v2 pages carry `meta.next`, v3 pages `links.next`. A response with neither
 * envelope falls back to offset counting: a full page means there may be more.
 */
export function readPage(payload: unknown, endpoint: EndpointDescriptor, pageSize: number, offset: number): Page {
  let data: unknown;
  let envelope: Record<string, unknown> | undefined;
  if (Array.isArray(payload)) {
    data = payload;
  } else if (isObject(payload)) {
    data = payload.data ?? [];
    const meta = payload.meta;
    const links = payload.links;
    if (isObject(links) && "next" in links) envelope = links;
    else if (isObject(meta) && "next" in meta) envelope = meta;
  }

  const items = Array.isArray(data) ? data : [data];
  const records: ApiRecord[] = [];
  for (const item of items) {
    if (!isObject(item)) {
      throw new ApiError(`Unexpected record in ${endpoint.name} page`, undefined, item, { endpoint: endpoint.name });
    }
    records.push(item);
  }

  let next: Cursor | null = null;
  if (envelope) {
    const url = envelope.next;
    if (typeof url === "string" && url !== "") next = { kind: "url", url };
  } else if (endpoint.version === "v2" && records.length === pageSize) {
    next = { kind: "offset", offset: offset + records.length };
  }
  return { records, next };
}

/** A v3 record cut down to the requested attributes, flattened; records without attributes pass through */
export function projectAttributes(record: ApiRecord, fields: readonly string[]): ApiRecord {
  const attributes = record.attributes;
  if (!isObject(attributes)) return record;
  const wanted = new Set(fields);
  return Object.fromEntries(Object.entries(attributes).filter(([key]) => wanted.has(key)));
}

/**
 * Walk a paged collection, yielding records in server order.
 *
 * Retries happen per page inside the dispatcher. If a page still fails after
 * at least one page has been read, the walk throws a PartialResultError
 * holding every record yielded so far; a failure on the first page is
 * rethrown unchanged.
 */
export async function* paginate(
  client: NcmClient,
  endpoint: EndpointDescriptor,
  query: QuerySpec = {},
  options: WalkOptions = {},
): AsyncGenerator<ApiRecord, void, undefined> {
  const limit = options.limit ?? "all";
  if (limit !== "all" && (!Number.isInteger(limit) || limit < 1)) {
    throw new RequestError(`limit must be a positive integer or "all", got ${limit}`, undefined, null, {
      endpoint: endpoint.name,
    });
  }
  validateQuery(endpoint, query);

  const pageSize = resolvePageSize(endpoint, query, limit);
  const baseQuery = encodeQuery(endpoint, query);
  const projection = endpoint.version === "v3" && query.fields?.length ? query.fields : undefined;
  const yielded: ApiRecord[] = [];
  let pages = 0;
  let cursor: Cursor | null = { kind: "offset", offset: 0 };

  while (cursor) {
    const current: Cursor = cursor;
    let page: Page;
    try {
      const payload = await client.dispatch({
        method: "GET",
        endpoint,
        url: current.kind === "url" ? current.url : undefined,
        query:
          current.kind === "offset"
            ? { ...baseQuery, ...pageParams(endpoint, pageSize, current.offset) }
            : undefined,
        read: "collection",
        throttle: pages > 0 || options.throttleFirst,
      });
      page = readPage(payload, endpoint, pageSize, current.kind === "offset" ? current.offset : yielded.length);
    } catch (err) {
      if (pages === 0) throw err;
      throw new PartialResultError(yielded, pages, err, { endpoint: endpoint.name });
    }
    pages++;
    options.onPage?.(page);
    log.debug({ endpoint: endpoint.name, page: pages, records: page.records.length, total: yielded.length }, "page");

    for (const raw of page.records) {
      if (limit !== "all" && yielded.length >= limit) return;
      const record = projection ? projectAttributes(raw, projection) : raw;
      yielded.push(record);
      yield record;
    }
    if (limit !== "all" && yielded.length >= limit) return;
    cursor = page.next;
  }
}

/** Drain a walk into an array */
export async function collect<T>(walk: AsyncIterable<T>): Promise<T[]> {
  const records: T[] = [];
  for await (const record of walk) records.push(record);
  return records;
}

/** Fetch a paged collection into one array */
export async function fetchAll(
  client: NcmClient,
  endpoint: EndpointDescriptor,
  query: QuerySpec = {},
  options: WalkOptions = {},
): Promise<ApiRecord[]> {
  return collect(paginate(client, endpoint, query, options));
}
