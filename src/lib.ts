export { NcmClient, DEFAULT_BASE_URL, DEFAULT_BASE_URL_V3, parseRetryAfter } from "./client.js";
export type { ClientOptions, DispatchOptions } from "./client.js";
export { selectAuth, legacyHeaders, isComplete, maskCredentials } from "./credentials.js";
export type { ApiVersion, AuthSelection, Credentials } from "./credentials.js";
export { ENDPOINTS, DUAL_ROUTES, endpointByName, itemPath, resolveRoutes } from "./endpoints.js";
export type { DualRoute, EndpointDescriptor, EndpointName } from "./endpoints.js";
export * from "./errors.js";
export { paginate, collect, fetchAll, readPage } from "./paginate.js";
export type { ApiRecord, Page, WalkOptions } from "./paginate.js";
export { chunkedQuery, chunkValues, distinctValues, listAll, MAX_FILTER_VALUES } from "./chunk.js";
export { encodeQuery, parseFilterPairs } from "./query.js";
export type { FilterValue, PageLimit, QuerySpec } from "./query.js";
export * from "./operations.js";
export { clientFromEnv, createClient, resolveConfig } from "./config.js";
