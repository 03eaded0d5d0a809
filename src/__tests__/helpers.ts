import { vi } from "vitest";
import { NcmClient, type ClientOptions } from "../client.js";
import type { Credentials } from "../credentials.js";

export const LEGACY: Credentials = {
  cpApiId: "test-cp-id",
  cpApiKey: "test-cp-key",
  ecmApiId: "test-ecm-id",
  ecmApiKey: "test-ecm-key",
};

export const WITH_TOKEN: Credentials = { ...LEGACY, token: "test-token" };

export function jsonResponse(body: unknown, status = 200, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json", ...headers },
  });
}

/** A fetch that answers each call with the next queued reply; an Error reply is thrown */
export function queueFetch(...replies: Array<Response | Error>) {
  const queue = [...replies];
  return vi.fn<typeof globalThis.fetch>(async () => {
    const next = queue.shift();
    if (!next) throw new Error("no reply queued");
    if (next instanceof Error) throw next;
    return next;
  });
}

export interface SentRequest {
  url: string;
  method: string;
  headers: Headers;
  body: unknown;
}

/** Requests a fake fetch received, in order */
export function sent(fetchMock: ReturnType<typeof queueFetch>): SentRequest[] {
  return fetchMock.mock.calls.map(([input, init]) => ({
    url: String(input),
    method: init?.method ?? "GET",
    headers: new Headers(init?.headers),
    body: typeof init?.body === "string" ? JSON.parse(init.body) : undefined,
  }));
}

export function recordSleep() {
  const delays: number[] = [];
  const sleep = async (ms: number) => {
    delays.push(ms);
  };
  return { delays, sleep };
}

export function makeClient(
  fetchMock: typeof globalThis.fetch,
  options: ClientOptions = {},
): { client: NcmClient; delays: number[] } {
  const { delays, sleep } = recordSleep();
  const client = new NcmClient({ credentials: LEGACY, fetch: fetchMock, sleep, ...options });
  return { client, delays };
}
