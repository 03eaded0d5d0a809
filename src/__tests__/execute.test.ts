import { describe, expect, test } from "vitest";
import { NcmClient } from "../client.js";
import { COMMANDS, type CmdDef } from "../commands.js";
import { NotFoundError, RequestError } from "../errors.js";
import { executeCommand, executeRaw, rawEndpoint, resolveRequest } from "../execute.js";
import { LEGACY, WITH_TOKEN, jsonResponse, makeClient, queueFetch, sent } from "./helpers.js";

function findCmd(group: string, action: string): CmdDef {
  const cmd = COMMANDS.find((c) => c.group === group && c.action === action);
  if (!cmd) throw new Error(`no command ${group} ${action}`);
  return cmd;
}

const routersList = findCmd("routers", "list");
const routersGet = findCmd("routers", "get");
const routersDelete = findCmd("routers", "delete");
const groupsCreate = findCmd("groups", "create");
const groupsPatch = findCmd("groups", "patch");
const subscriptionsGet = findCmd("subscriptions", "get");

describe("resolveRequest", () => {
  const legacy = new NcmClient({ credentials: LEGACY });

  test("list includes filters and the first page's paging params", () => {
    const req = resolveRequest(routersList, { args: {}, filters: { state: "online" } }, legacy);
    expect(req).toEqual({
      method: "GET",
      url: "https://www.cradlepointecm.com/api/v2/routers/?state=online&limit=500&offset=0",
      version: "v2",
      body: undefined,
    });
  });

  test("list page size follows a smaller limit", () => {
    const req = resolveRequest(routersList, { args: {}, limit: 10 }, legacy);
    expect(req.url).toBe("https://www.cradlepointecm.com/api/v2/routers/?limit=10&offset=0");
  });

  test("routers commands stay on the routers collection when a token is configured", () => {
    const current = new NcmClient({ credentials: WITH_TOKEN });
    const list = resolveRequest(routersList, { args: {}, filters: { state: "online" } }, current);
    expect(list.url).toBe("https://www.cradlepointecm.com/api/v2/routers/?state=online&limit=500&offset=0");
    const remove = resolveRequest(routersDelete, { args: { id: "42" } }, current);
    expect(remove).toMatchObject({ method: "DELETE", url: "https://www.cradlepointecm.com/api/v2/routers/42/", version: "v2" });
  });

  test("item commands substitute the id", () => {
    const req = resolveRequest(routersGet, { args: { id: "42" } }, legacy);
    expect(req.url).toBe("https://www.cradlepointecm.com/api/v2/routers/42/");
  });

  test("body only for commands that take one", () => {
    expect(resolveRequest(groupsCreate, { args: {}, body: { name: "east" } }, legacy).body).toEqual({ name: "east" });
    expect(resolveRequest(routersGet, { args: { id: "1" }, body: { name: "east" } }, legacy).body).toBeUndefined();
  });

  test("item commands need an id", () => {
    expect(() => resolveRequest(routersGet, { args: {} }, legacy)).toThrow(RequestError);
  });
});

describe("executeCommand", () => {
  test("list walks every page and returns the records", async () => {
    const fetch = queueFetch(
      jsonResponse({ data: [{ id: 1 }], meta: { next: "https://www.cradlepointecm.com/api/v2/routers/?offset=1" } }),
      jsonResponse({ data: [{ id: 2 }], meta: { next: null } }),
    );
    const { client } = makeClient(fetch);
    expect(await executeCommand(routersList, { args: {} }, client)).toEqual([{ id: 1 }, { id: 2 }]);
  });

  test("v3 get unwraps the data member", async () => {
    const fetch = queueFetch(jsonResponse({ data: { id: "s1", type: "subscriptions" } }));
    const { client } = makeClient(fetch, { credentials: WITH_TOKEN });
    const result = await executeCommand(subscriptionsGet, { args: { id: "s1" } }, client);

    expect(result).toEqual({ id: "s1", type: "subscriptions" });
    expect(sent(fetch)[0]?.url).toBe("https://api.cradlepointecm.com/api/v3/subscriptions/s1");
  });

  test("routers delete with both credential sets goes to the v2 router", async () => {
    const fetch = queueFetch(new Response(null, { status: 204 }));
    const { client } = makeClient(fetch, { credentials: WITH_TOKEN });
    await executeCommand(routersDelete, { args: { id: "42" } }, client);

    const [req] = sent(fetch);
    expect(req).toMatchObject({ method: "DELETE", url: "https://www.cradlepointecm.com/api/v2/routers/42/" });
    expect(req?.headers.get("X-CP-API-ID")).toBe("test-cp-id");
  });

  test("get on a missing record is NotFoundError", async () => {
    const fetch = queueFetch(jsonResponse({ detail: "Not found." }, 404));
    const { client } = makeClient(fetch);
    await expect(executeCommand(routersGet, { args: { id: "9" } }, client)).rejects.toBeInstanceOf(NotFoundError);
  });

  test("patch sends the body to the item path", async () => {
    const fetch = queueFetch(jsonResponse({ id: 7, name: "west" }));
    const { client } = makeClient(fetch);
    const result = await executeCommand(groupsPatch, { args: { id: "7" }, body: { name: "west" } }, client);

    expect(result).toEqual({ id: 7, name: "west" });
    const [req] = sent(fetch);
    expect(req).toMatchObject({
      method: "PATCH",
      url: "https://www.cradlepointecm.com/api/v2/groups/7/",
      body: { name: "west" },
    });
  });

  test("body commands without a body are rejected before sending", async () => {
    const fetch = queueFetch();
    const { client } = makeClient(fetch);
    await expect(executeCommand(groupsCreate, { args: {} }, client)).rejects.toBeInstanceOf(RequestError);
    expect(fetch).not.toHaveBeenCalled();
  });
});

describe("executeRaw", () => {
  test("sends any path to the chosen API version", async () => {
    const fetch = queueFetch(jsonResponse({ data: [] }));
    const { client } = makeClient(fetch, { credentials: WITH_TOKEN });
    await executeRaw(client, "get", "beta/users", { version: "v3", query: { "filter[email]": "ops@example.com" } });

    const [req] = sent(fetch);
    expect(req?.method).toBe("GET");
    const url = new URL(req?.url ?? "");
    expect(url.pathname).toBe("/api/v3/beta/users");
    expect(url.searchParams.get("filter[email]")).toBe("ops@example.com");
    expect(req?.headers.get("Authorization")).toBe("Bearer test-token");
  });

  test("raw endpoints default to v2", () => {
    expect(rawEndpoint("/products/")).toEqual({
      name: "/products/",
      version: "v2",
      path: "/products/",
      defaultPageSize: 500,
      maxPageSize: 500,
    });
  });
});
