import { describe, expect, test, vi } from "vitest";
import { ENDPOINTS } from "../endpoints.js";
import { ApiError, AuthError, PartialResultError, RequestError, ServerError } from "../errors.js";
import { collect, fetchAll, paginate, projectAttributes, readPage } from "../paginate.js";
import { WITH_TOKEN, jsonResponse, makeClient, queueFetch, sent } from "./helpers.js";

const V2 = "https://www.cradlepointecm.com/api/v2";
const V3 = "https://api.cradlepointecm.com/api/v3";

describe("readPage", () => {
  test("v2 envelope with meta.next", () => {
    const page = readPage({ data: [{ id: 1 }], meta: { next: `${V2}/routers/?offset=1` } }, ENDPOINTS.routers, 1, 0);
    expect(page).toEqual({ records: [{ id: 1 }], next: { kind: "url", url: `${V2}/routers/?offset=1` } });
  });

  test("v3 envelope with links.next null ends the walk", () => {
    const page = readPage({ data: [{ id: "a" }], links: { next: null } }, ENDPOINTS.subscriptions, 1, 0);
    expect(page.next).toBeNull();
  });

  test("bare v2 array falls back to offset counting on a full page", () => {
    expect(readPage([{ id: 1 }, { id: 2 }], ENDPOINTS.routers, 2, 4).next).toEqual({ kind: "offset", offset: 6 });
    expect(readPage([{ id: 1 }], ENDPOINTS.routers, 2, 4).next).toBeNull();
  });

  test("non-object records are rejected", () => {
    expect(() => readPage({ data: [1, 2] }, ENDPOINTS.routers, 2, 0)).toThrow(ApiError);
  });
});

describe("paginate", () => {
  test("follows meta.next until it is null", async () => {
    const fetch = queueFetch(
      jsonResponse({ data: [{ id: 1 }, { id: 2 }], meta: { next: `${V2}/routers/?limit=2&offset=2` } }),
      jsonResponse({ data: [{ id: 3 }], meta: { next: null } }),
    );
    const { client, delays } = makeClient(fetch);
    const records = await collect(paginate(client, ENDPOINTS.routers, { pageSize: 2 }));

    expect(records).toEqual([{ id: 1 }, { id: 2 }, { id: 3 }]);
    expect(sent(fetch).map((r) => r.url)).toEqual([
      `${V2}/routers/?limit=2&offset=0`,
      `${V2}/routers/?limit=2&offset=2`,
    ]);
    // Only requests after the first are throttled
    expect(delays).toEqual([200]);
  });

  test("follows links.next on v3 endpoints", async () => {
    const fetch = queueFetch(
      jsonResponse({ data: [{ id: "a" }], links: { next: `${V3}/subscriptions?page[after]=a` } }),
      jsonResponse({ data: [{ id: "b" }], links: { next: null } }),
    );
    const { client } = makeClient(fetch, { credentials: WITH_TOKEN });
    const records = await fetchAll(client, ENDPOINTS.subscriptions, { filters: { type: "NCX" } });

    expect(records).toEqual([{ id: "a" }, { id: "b" }]);
    const [first, second] = sent(fetch);
    const firstUrl = new URL(first?.url ?? "");
    expect(firstUrl.pathname).toBe("/api/v3/subscriptions");
    expect(firstUrl.searchParams.get("page[size]")).toBe("50");
    expect(firstUrl.searchParams.get("filter[type]")).toBe("NCX");
    expect(second?.url).toBe(`${V3}/subscriptions?page[after]=a`);
  });

  test("counts offsets when the server sends no pagination envelope", async () => {
    const fetch = queueFetch(jsonResponse([{ id: 1 }, { id: 2 }]), jsonResponse([{ id: 3 }]));
    const { client } = makeClient(fetch);
    const records = await fetchAll(client, ENDPOINTS.routers, { pageSize: 2 });

    expect(records.map((r) => r.id)).toEqual([1, 2, 3]);
    expect(sent(fetch).map((r) => new URL(r.url).searchParams.get("offset"))).toEqual(["0", "2"]);
  });

  test("a numeric limit stops exactly at the limit without fetching further pages", async () => {
    const fetch = queueFetch(
      jsonResponse({ data: [{ id: 1 }, { id: 2 }], meta: { next: `${V2}/routers/?limit=2&offset=2` } }),
      jsonResponse({ data: [{ id: 3 }, { id: 4 }], meta: { next: `${V2}/routers/?limit=2&offset=4` } }),
    );
    const { client } = makeClient(fetch);
    const records = await fetchAll(client, ENDPOINTS.routers, { pageSize: 2 }, { limit: 3 });

    expect(records.map((r) => r.id)).toEqual([1, 2, 3]);
    expect(fetch).toHaveBeenCalledTimes(2);
  });

  test("page size never exceeds a smaller limit", async () => {
    const fetch = queueFetch(jsonResponse({ data: [{ id: 1 }, { id: 2 }], meta: { next: `${V2}/routers/?offset=2` } }));
    const { client } = makeClient(fetch);
    await fetchAll(client, ENDPOINTS.routers, {}, { limit: 2 });

    const [req] = sent(fetch);
    expect(new URL(req?.url ?? "").searchParams.get("limit")).toBe("2");
    expect(fetch).toHaveBeenCalledTimes(1);
  });

  test("a page that fails after retries yields a PartialResultError with earlier records", async () => {
    const fetch = queueFetch(
      jsonResponse({ data: [{ id: 1 }, { id: 2 }], meta: { next: `${V2}/routers/?limit=2&offset=2` } }),
      jsonResponse({ data: [{ id: 3 }, { id: 4 }], meta: { next: `${V2}/routers/?limit=2&offset=4` } }),
      jsonResponse({}, 500),
      jsonResponse({}, 500),
      jsonResponse({}, 500),
    );
    const { client } = makeClient(fetch);
    const err = await fetchAll(client, ENDPOINTS.routers, { pageSize: 2 }).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(PartialResultError);
    if (!(err instanceof PartialResultError)) return;
    expect(err.records).toEqual([{ id: 1 }, { id: 2 }, { id: 3 }, { id: 4 }]);
    expect(err.pages).toBe(2);
    expect(err.cause).toBeInstanceOf(ServerError);
    expect(fetch).toHaveBeenCalledTimes(5);
  });

  test("a failure on the first page is rethrown as is", async () => {
    const fetch = queueFetch(jsonResponse({ detail: "bad key" }, 403));
    const { client } = makeClient(fetch);
    await expect(fetchAll(client, ENDPOINTS.routers)).rejects.toBeInstanceOf(AuthError);
  });

  test("a missing collection is an empty result", async () => {
    const fetch = queueFetch(jsonResponse({ detail: "Not found." }, 404));
    const { client } = makeClient(fetch);
    expect(await fetchAll(client, ENDPOINTS.routers)).toEqual([]);
  });

  test("records arrive lazily, one page at a time", async () => {
    const fetch = queueFetch(
      jsonResponse({ data: [{ id: 1 }], meta: { next: `${V2}/routers/?offset=1` } }),
      jsonResponse({ data: [{ id: 2 }], meta: { next: null } }),
    );
    const { client } = makeClient(fetch);
    const walk = paginate(client, ENDPOINTS.routers, { pageSize: 1 });

    const first = await walk.next();
    expect(first.value).toEqual({ id: 1 });
    expect(fetch).toHaveBeenCalledTimes(1);
    await walk.return(undefined);
    expect(fetch).toHaveBeenCalledTimes(1);
  });

  test("onPage sees every page", async () => {
    const fetch = queueFetch(
      jsonResponse({ data: [{ id: 1 }], meta: { next: `${V2}/routers/?offset=1` } }),
      jsonResponse({ data: [], meta: { next: null } }),
    );
    const { client } = makeClient(fetch);
    const onPage = vi.fn();
    await fetchAll(client, ENDPOINTS.routers, {}, { onPage });
    expect(onPage).toHaveBeenCalledTimes(2);
  });

  test("rejects invalid limits and filters before sending anything", async () => {
    const fetch = queueFetch();
    const { client } = makeClient(fetch);

    await expect(fetchAll(client, ENDPOINTS.routers, {}, { limit: 0 })).rejects.toBeInstanceOf(RequestError);
    const err = await fetchAll(client, ENDPOINTS.routers, { filters: { colour: "blue" } }).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(RequestError);
    expect(err).toMatchObject({ body: { invalid: ["colour"] } });
    expect(fetch).not.toHaveBeenCalled();
  });

  test("a next link to another host stops the walk", async () => {
    const fetch = queueFetch(
      jsonResponse({ data: [{ id: 1 }], meta: { next: "https://ncm.example.net/api/v2/routers/?offset=1" } }),
    );
    const { client } = makeClient(fetch);
    const err = await fetchAll(client, ENDPOINTS.routers).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(PartialResultError);
    expect(err).toMatchObject({ records: [{ id: 1 }], pages: 1 });
    if (err instanceof PartialResultError) expect(err.cause).toBeInstanceOf(RequestError);
    expect(fetch).toHaveBeenCalledTimes(1);
  });

  test("v3 fields project each record to those attributes", async () => {
    const fetch = queueFetch(
      jsonResponse({
        data: [{ id: "u1", type: "users", attributes: { email: "ops@example.com", first_name: "Ops", is_active: true } }],
        links: { next: null },
      }),
    );
    const { client } = makeClient(fetch, { credentials: WITH_TOKEN });
    const records = await fetchAll(client, ENDPOINTS.users, { fields: ["email", "is_active"] });

    expect(records).toEqual([{ email: "ops@example.com", is_active: true }]);
    expect(new URL(sent(fetch)[0]?.url ?? "").searchParams.get("filter[fields]")).toBe("email,is_active");
  });

  test("v2 fields leave records as the server sent them", async () => {
    const fetch = queueFetch(jsonResponse({ data: [{ id: 1, name: "r1" }], meta: { next: null } }));
    const { client } = makeClient(fetch);
    expect(await fetchAll(client, ENDPOINTS.routers, { fields: ["name"] })).toEqual([{ id: 1, name: "r1" }]);
  });
});

describe("projectAttributes", () => {
  test("keeps only the requested attributes", () => {
    expect(projectAttributes({ id: "a", attributes: { x: 1, y: 2 } }, ["y", "z"])).toEqual({ y: 2 });
  });

  test("records without attributes pass through", () => {
    expect(projectAttributes({ id: "a" }, ["y"])).toEqual({ id: "a" });
  });
});
