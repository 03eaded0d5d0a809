import type { NcmClient } from "./client.js";
import type { EndpointDescriptor } from "./endpoints.js";
import { PartialResultError, RequestError } from "./errors.js";
import { createLogger } from "./logger.js";
import { collect, paginate, type ApiRecord, type WalkOptions } from "./paginate.js";
import { filterValues, type FilterScalar, type PageLimit, type QuerySpec } from "./query.js";

/** Server cap on the number of values in one multi-value filter */
export const MAX_FILTER_VALUES = 100;

const log = createLogger("chunk");

/** Values in first-occurrence order, duplicates dropped. Values that encode the same (1 and "1") count once. */
export function distinctValues<T>(values: readonly T[]): T[] {
  const seen = new Set<string>();
  return values.filter((value) => {
    const key = String(value);
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}

/** Split the distinct values into contiguous chunks of at most `size`, in first-occurrence order */
export function chunkValues<T>(values: readonly T[], size = MAX_FILTER_VALUES): T[][] {
  if (!Number.isInteger(size) || size < 1) {
    throw new RequestError(`chunk size must be a positive integer, got ${size}`, undefined, null);
  }
  const unique = distinctValues(values);
  const chunks: T[][] = [];
  for (let i = 0; i < unique.length; i += size) {
    chunks.push(unique.slice(i, i + size));
  }
  return chunks;
}

/** The single filter whose value set exceeds `chunkSize`, or null. More than one is rejected. */
export function oversizedFilter(
  query: QuerySpec,
  chunkSize = MAX_FILTER_VALUES,
  endpoint?: EndpointDescriptor,
): { key: string; values: readonly FilterScalar[] } | null {
  const oversized = Object.entries(query.filters ?? {})
    .map(([key, value]) => ({ key, values: distinctValues(filterValues(value)) }))
    .filter((f) => f.values.length > chunkSize);
  if (oversized.length > 1) {
    throw new RequestError(
      `Only one filter may exceed ${chunkSize} values; got ${oversized.map((f) => f.key).join(", ")}`,
      undefined,
      null,
      { endpoint: endpoint?.name },
    );
  }
  return oversized[0] ?? null;
}

export interface ChunkOptions {
  chunkSize?: number;
}

/**
 * Run a query whose multi-value filter may be larger than the server accepts.
 * Each chunk is walked to exhaustion and results are concatenated in chunk
 * order. A failing chunk stops the run with a PartialResultError holding
 * everything fetched before it, including the failing chunk's own pages.
 */
export async function* chunkedQuery(
  client: NcmClient,
  endpoint: EndpointDescriptor,
  query: QuerySpec,
  options: ChunkOptions = {},
): AsyncGenerator<ApiRecord, void, undefined> {
  const chunkSize = options.chunkSize ?? MAX_FILTER_VALUES;
  const target = oversizedFilter(query, chunkSize, endpoint);
  if (!target) {
    yield* paginate(client, endpoint, query);
    return;
  }

  const chunks = chunkValues(target.values, chunkSize);
  log.debug({ endpoint: endpoint.name, filter: target.key, values: target.values.length, chunks: chunks.length }, "chunking");

  const fetched: ApiRecord[] = [];
  let pages = 0;
  const onPage = () => {
    pages++;
  };
  for (const [index, values] of chunks.entries()) {
    const chunkQuery: QuerySpec = { ...query, filters: { ...query.filters, [target.key]: values } };
    try {
      for await (const record of paginate(client, endpoint, chunkQuery, { limit: "all", throttleFirst: index > 0, onPage })) {
        fetched.push(record);
        yield record;
      }
    } catch (err) {
      if (pages === 0) throw err;
      const cause = err instanceof PartialResultError ? err.cause : err;
      throw new PartialResultError(fetched, pages, cause, { endpoint: endpoint.name, chunk: index });
    }
  }
}

/**
 * List records, chunking automatically when a filter is oversized. A numeric
 * limit cannot be combined with chunking.
 */
export async function listAll(
  client: NcmClient,
  endpoint: EndpointDescriptor,
  query: QuerySpec = {},
  options: WalkOptions & ChunkOptions = {},
): Promise<ApiRecord[]> {
  const limit: PageLimit = options.limit ?? "all";
  if (oversizedFilter(query, options.chunkSize, endpoint)) {
    if (limit !== "all") {
      throw new RequestError(
        "limit cannot be combined with a filter that is split into chunks; fetch all and slice instead",
        undefined,
        null,
        { endpoint: endpoint.name },
      );
    }
    return collect(chunkedQuery(client, endpoint, query, options));
  }
  return collect(paginate(client, endpoint, query, options));
}
