import { describe, expect, test } from "vitest";
import { ENDPOINTS } from "../endpoints.js";
import { RequestError } from "../errors.js";
import { encodeQuery, pageParams, parseFilterPairs, resolvePageSize, validateQuery } from "../query.js";

describe("encodeQuery", () => {
  test("v2 joins lists with commas and maps sort to order_by", () => {
    expect(
      encodeQuery(ENDPOINTS.routers, {
        filters: { state: "online", id__in: [1, 2, 3] },
        fields: ["id", "name"],
        sort: ["-created_at", "name"],
        expand: ["account"],
      }),
    ).toEqual({
      state: "online",
      id__in: "1,2,3",
      fields: "id,name",
      order_by: "-created_at,name",
      expand: "account",
    });
  });

  test("v2 keeps dotted filter keys as they are", () => {
    expect(encodeQuery(ENDPOINTS.configuration_managers, { filters: { "router.id": "42" } })).toEqual({
      "router.id": "42",
    });
  });

  test("v3 uses filter[], search[] and sort", () => {
    expect(
      encodeQuery(ENDPOINTS.subscriptions, {
        filters: { name: "prime", end_time__gt: "2026-01-01" },
        search: { name: "pri" },
        fields: ["id", "name"],
        sort: ["-start_time"],
      }),
    ).toEqual({
      "filter[name]": "prime",
      "filter[end_time][gt]": "2026-01-01",
      "search[name]": "pri",
      "filter[fields]": "id,name",
      sort: "-start_time",
    });
  });
});

describe("validateQuery", () => {
  test("accepts allowed filters", () => {
    expect(() => validateQuery(ENDPOINTS.routers, { filters: { name: "edge-1" } })).not.toThrow();
  });

  test("lists the invalid keys and the allowed ones", () => {
    try {
      validateQuery(ENDPOINTS.products, { filters: { colour: "red", id: 1 } });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(RequestError);
      expect(err).toMatchObject({ body: { invalid: ["colour"], allowed: ["id", "id__in"] } });
    }
  });

  test("rejects options the API version does not support", () => {
    expect(() => validateQuery(ENDPOINTS.subscriptions, { expand: ["account"] })).toThrow(RequestError);
    expect(() => validateQuery(ENDPOINTS.routers, { search: { name: "x" } })).toThrow(RequestError);
    expect(() => validateQuery(ENDPOINTS.routers, { pageSize: 0 })).toThrow(RequestError);
  });
});

describe("resolvePageSize", () => {
  test("defaults per version and clamps to the maximum", () => {
    expect(resolvePageSize(ENDPOINTS.routers, {})).toBe(500);
    expect(resolvePageSize(ENDPOINTS.routers, { pageSize: 1000 })).toBe(500);
    expect(resolvePageSize(ENDPOINTS.subscriptions, {})).toBe(50);
    expect(resolvePageSize(ENDPOINTS.subscriptions, { pageSize: 10 })).toBe(10);
  });

  test("never exceeds a numeric limit", () => {
    expect(resolvePageSize(ENDPOINTS.routers, {}, 20)).toBe(20);
    expect(resolvePageSize(ENDPOINTS.routers, { pageSize: 5 }, 20)).toBe(5);
  });
});

describe("pageParams", () => {
  test("offset paging on v2, page[size] on v3", () => {
    expect(pageParams(ENDPOINTS.routers, 25, 50)).toEqual({ limit: "25", offset: "50" });
    expect(pageParams(ENDPOINTS.subscriptions, 25)).toEqual({ "page[size]": "25" });
  });
});

describe("parseFilterPairs", () => {
  test("parses scalars, comma lists and repeated keys", () => {
    expect(parseFilterPairs(["state=online", "id__in=1,2", "router=5", "router=6", "name=a=b"])).toEqual({
      state: "online",
      id__in: ["1", "2"],
      router: ["5", "6"],
      name: "a=b",
    });
  });

  test("__in filters are always lists", () => {
    expect(parseFilterPairs(["id__in=5"])).toEqual({ id__in: ["5"] });
  });

  test("rejects pairs without a key", () => {
    expect(() => parseFilterPairs(["online"])).toThrow(RequestError);
    expect(() => parseFilterPairs(["=online"])).toThrow(RequestError);
  });
});
