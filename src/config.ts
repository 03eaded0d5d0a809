import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { homedir } from "node:os";
import { dirname, join } from "node:path";
import { z } from "zod";
import { NcmClient, type ClientOptions } from "./client.js";
import { isComplete, type Credentials } from "./credentials.js";
import { ConfigurationError } from "./errors.js";
import { createLogger } from "./logger.js";

const log = createLogger("config");

export const FileConfigSchema = z
  .object({
    cpApiId: z.string().min(1),
    cpApiKey: z.string().min(1),
    ecmApiId: z.string().min(1),
    ecmApiKey: z.string().min(1),
    token: z.string().min(1),
    baseUrl: z.string().url(),
    baseUrlV3: z.string().url(),
    readOnly: z.boolean(),
  })
  .partial();

export type FileConfig = z.infer<typeof FileConfigSchema>;

export interface Config {
  credentials: Credentials;
  baseUrl?: string;
  baseUrlV3?: string;
  readOnly: boolean;
}

/** Global CLI flags that feed the config */
export type CliOptions = {
  apiId?: string;
  apiKey?: string;
  ecmId?: string;
  ecmKey?: string;
  token?: string;
  baseUrl?: string;
  baseUrlV3?: string;
  readOnly?: boolean;
};

export function configPath(env: NodeJS.ProcessEnv = process.env): string {
  return env.NCM_CONFIG_FILE || join(env.HOME || homedir(), ".config", "ncm-cli", "config.json");
}

export function loadFileConfig(path = configPath()): FileConfig {
  if (!existsSync(path)) return {};
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf-8"));
  } catch (err) {
    log.warn({ path, error: err instanceof Error ? err.message : String(err) }, "ignoring unreadable config file");
    return {};
  }
  const parsed = FileConfigSchema.safeParse(raw);
  if (!parsed.success) {
    log.warn({ path, issues: parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`) }, "ignoring invalid config file");
    return {};
  }
  return parsed.data;
}

/** Merge settings into the config file, validating the result. Returns the saved keys. */
export function saveConfig(config: FileConfig, path = configPath()): string[] {
  const merged = FileConfigSchema.parse({ ...loadFileConfig(path), ...config });
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, JSON.stringify(merged, null, 2) + "\n", { mode: 0o600 });
  return Object.keys(config);
}

/** Resolve settings: CLI flags, then environment, then the config file */
export function resolveConfig(
  cliOpts: CliOptions,
  env: NodeJS.ProcessEnv = process.env,
  file: FileConfig = loadFileConfig(configPath(env)),
): Config {
  return {
    credentials: {
      cpApiId: cliOpts.apiId || env.X_CP_API_ID || file.cpApiId,
      cpApiKey: cliOpts.apiKey || env.X_CP_API_KEY || file.cpApiKey,
      ecmApiId: cliOpts.ecmId || env.X_ECM_API_ID || file.ecmApiId,
      ecmApiKey: cliOpts.ecmKey || env.X_ECM_API_KEY || file.ecmApiKey,
      token: cliOpts.token || env.NCM_API_TOKEN || env.TOKEN || file.token,
    },
    baseUrl: cliOpts.baseUrl || env.CP_BASE_URL || file.baseUrl,
    baseUrlV3: cliOpts.baseUrlV3 || env.CP_BASE_URL_V3 || file.baseUrlV3,
    readOnly: !!(cliOpts.readOnly || env.NCM_READ_ONLY === "1" || file.readOnly),
  };
}

export function requireCredentials(config: Config): void {
  if (!isComplete(config.credentials)) {
    throw new ConfigurationError(
      "Missing credentials. Set --token / NCM_API_TOKEN, or all four of " +
        "X_CP_API_ID, X_CP_API_KEY, X_ECM_API_ID, X_ECM_API_KEY, or run: ncm-cli configure",
    );
  }
}

/** Build a client from resolved config; `overrides` wins over config values */
export function createClient(config: Config, overrides: ClientOptions = {}): NcmClient {
  return new NcmClient({
    credentials: config.credentials,
    baseUrl: config.baseUrl,
    baseUrlV3: config.baseUrlV3,
    ...overrides,
  });
}

/** Client configured from the environment and config file alone (no CLI flags) */
export function clientFromEnv(
  env: NodeJS.ProcessEnv = process.env,
  overrides: ClientOptions = {},
): NcmClient {
  return createClient(resolveConfig({}, env), overrides);
}
