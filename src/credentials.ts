import { ConfigurationError } from "./errors.js";

export type ApiVersion = "v2" | "v3";

export interface Credentials {
  /** X-CP-API-ID */
  cpApiId?: string;
  /** X-CP-API-KEY */
  cpApiKey?: string;
  /** X-ECM-API-ID */
  ecmApiId?: string;
  /** X-ECM-API-KEY */
  ecmApiKey?: string;
  /** Bearer token for the v3 API (without the "Bearer" prefix) */
  token?: string;
}

export type AuthMode = "bearer" | "legacy";

export interface AuthSelection {
  mode: AuthMode;
  headers: Record<string, string>;
}

/** The four legacy headers, or null unless every one of them is set */
export function legacyHeaders(creds: Credentials): Record<string, string> | null {
  const { cpApiId, cpApiKey, ecmApiId, ecmApiKey } = creds;
  if (!cpApiId || !cpApiKey || !ecmApiId || !ecmApiKey) return null;
  return {
    "X-CP-API-ID": cpApiId,
    "X-CP-API-KEY": cpApiKey,
    "X-ECM-API-ID": ecmApiId,
    "X-ECM-API-KEY": ecmApiKey,
  };
}

export function hasToken(creds: Credentials): boolean {
  return !!creds.token;
}

/** True when at least one complete auth mode is configured */
export function isComplete(creds: Credentials): boolean {
  return hasToken(creds) || legacyHeaders(creds) !== null;
}

/**
 * Pick auth headers for an endpoint. v3 endpoints use the bearer token when
 * one is configured; everything else needs the full legacy key set.
 */
export function selectAuth(creds: Credentials, version: ApiVersion): AuthSelection {
  if (version === "v3" && creds.token) {
    return { mode: "bearer", headers: { Authorization: `Bearer ${creds.token}` } };
  }
  const legacy = legacyHeaders(creds);
  if (legacy) return { mode: "legacy", headers: legacy };

  const missing =
    version === "v3"
      ? "a bearer token (NCM_API_TOKEN) or all four legacy API keys"
      : "all four legacy API keys (X_CP_API_ID, X_CP_API_KEY, X_ECM_API_ID, X_ECM_API_KEY)";
  throw new ConfigurationError(`Missing credentials: ${version} requests need ${missing}`);
}

/** Mask every secret for display, keeping whether it is set */
export function maskCredentials(creds: Credentials): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [k, v] of Object.entries(creds)) {
    out[k] = v ? "***" : "(missing)";
  }
  return out;
}
