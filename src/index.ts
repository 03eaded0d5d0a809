#!/usr/bin/env node

import { Command, InvalidArgumentError } from "commander";
import { createRequire } from "node:module";
import { readFileSync } from "node:fs";
import {
  configPath,
  createClient,
  requireCredentials,
  resolveConfig,
  saveConfig,
  type CliOptions,
  type Config,
  type FileConfig,
} from "./config.js";
import { selectAuth, type ApiVersion } from "./credentials.js";
import { COMMANDS, GROUP_DESCRIPTIONS, type CmdDef } from "./commands.js";
import { ConfigurationError, PartialResultError, errorDetail } from "./errors.js";
import { executeCommand, executeRaw, rawEndpoint, resolveRequest, type ExecuteParams } from "./execute.js";
import {
  copyRouterConfiguration,
  dayWindow,
  findDeviceBySerial,
  getAccountByName,
  getHistoricalLocations,
  getRouterAlerts,
  getRouterByName,
  getRouterLogs,
  last24Hours,
  patchRouterConfiguration,
  rebootGroup,
  rebootRouter,
  regrade,
  type RegradeAction,
} from "./operations.js";
import { formatOutput, pickFields } from "./output.js";
import { parseFilterPairs, type PageLimit } from "./query.js";

const require = createRequire(import.meta.url);
const pkg = require("../package.json") as { version: string };

type GlobalOptions = CliOptions & {
  format: string;
  dryRun?: boolean;
  fields?: string;
};

type WindowOptions = {
  date?: string;
  tzOffset: number;
};

type ActionOptions = {
  filter?: string[];
  search?: string[];
  limit?: PageLimit;
  pageSize?: number;
  sort?: string;
  expand?: string;
  data?: string;
};

// ---------------------------------------------------------------------------
// CLI setup
// ---------------------------------------------------------------------------

const program = new Command();

program
  .name("ncm-cli")
  .version(pkg.version)
  .description(
    "CLI for the NCM device-management API (v2 and v3)\n\n" +
    "All output is JSON by default, designed for scripting and AI/LLM tool use.\n\n" +
    "Configuration (in priority order):\n" +
    "  1. CLI flags:      --api-id, --api-key, --ecm-id, --ecm-key, --token\n" +
    "  2. Env vars:       X_CP_API_ID, X_CP_API_KEY, X_ECM_API_ID, X_ECM_API_KEY, NCM_API_TOKEN\n" +
    "  3. Config file:    ~/.config/ncm-cli/config.json\n\n" +
    "Quick start:\n" +
    "  $ ncm-cli configure --token YOUR_TOKEN --api-id ... --api-key ... --ecm-id ... --ecm-key ...\n" +
    "  $ ncm-cli routers list --filter state=online --limit 20\n" +
    "  $ ncm-cli net-devices list --filter router__in=1,2,3",
  )
  .option("--api-id <id>", "X-CP-API-ID")
  .option("--api-key <key>", "X-CP-API-KEY")
  .option("--ecm-id <id>", "X-ECM-API-ID")
  .option("--ecm-key <key>", "X-ECM-API-KEY")
  .option("--token <token>", "Bearer token for v3 endpoints")
  .option("--base-url <url>", "Base URL of the v2 API")
  .option("--base-url-v3 <url>", "Base URL of the v3 API")
  .option("--format <fmt>", "Output format: json, jsonl, table", "json")
  .option("--dry-run", "Print the HTTP request instead of executing it")
  .option("--fields <list>", "Comma-separated list of fields to include in output (dotted paths allowed)");

function globalConfig(): { opts: GlobalOptions; config: Config } {
  const opts = program.opts<GlobalOptions>();
  return { opts, config: resolveConfig(opts) };
}

// ── configure ─────────────────────────────────────────────────────────

program
  .command("configure")
  .description("Save credentials and settings to ~/.config/ncm-cli/config.json")
  .option("--api-id <id>", "X-CP-API-ID")
  .option("--api-key <key>", "X-CP-API-KEY")
  .option("--ecm-id <id>", "X-ECM-API-ID")
  .option("--ecm-key <key>", "X-ECM-API-KEY")
  .option("--token <token>", "Bearer token for v3 endpoints")
  .option("--base-url <url>", "Base URL of the v2 API")
  .option("--base-url-v3 <url>", "Base URL of the v3 API")
  .option("--read-only", "Expose only read tools from the MCP server")
  .action((opts: CliOptions) => {
    const toSave: FileConfig = {};
    if (opts.apiId) toSave.cpApiId = opts.apiId;
    if (opts.apiKey) toSave.cpApiKey = opts.apiKey;
    if (opts.ecmId) toSave.ecmApiId = opts.ecmId;
    if (opts.ecmKey) toSave.ecmApiKey = opts.ecmKey;
    if (opts.token) toSave.token = opts.token;
    if (opts.baseUrl) toSave.baseUrl = opts.baseUrl;
    if (opts.baseUrlV3) toSave.baseUrlV3 = opts.baseUrlV3;
    if (opts.readOnly) toSave.readOnly = true;
    if (Object.keys(toSave).length === 0) {
      console.error(JSON.stringify({ error: "Provide at least one setting, e.g. --token or --api-id" }));
      process.exit(1);
    }
    try {
      const saved = saveConfig(toSave);
      console.log(JSON.stringify({ ok: true, saved, path: configPath() }));
    } catch (err) {
      fail(err, "json");
    }
  });

// ── operations ────────────────────────────────────────────────────────

program
  .command("operations")
  .description("List all available resource commands with method, endpoint, and description")
  .action(() => {
    const { config } = globalConfig();
    const client = createClient(config);
    const ops = COMMANDS.map((cmd) => {
      const endpoint = client.endpoint(cmd.resource);
      return {
        command: `${cmd.group} ${cmd.action}`,
        method: cmd.method,
        version: endpoint.version,
        path: endpoint.path,
        summary: cmd.summary,
        hasBody: cmd.hasBody,
      };
    });
    console.log(JSON.stringify(ops, null, 2));
  });

// ── raw ───────────────────────────────────────────────────────────────

program
  .command("raw <method> <path>")
  .description("Make a raw API request (e.g. ncm-cli raw GET /routers/42/)")
  .option("-d, --data <json>", "Request body JSON (or @file.json, or - for stdin)")
  .option("-q, --query <pair>", "Query param key=value (repeatable)", collect, [])
  .option("--v3", "Send to the v3 API")
  .action(async (method: string, path: string, opts: { data?: string; query: string[]; v3?: boolean }) => {
    const { opts: globalOpts, config } = globalConfig();
    const version: ApiVersion = opts.v3 ? "v3" : "v2";
    try {
      const query: Record<string, string> = {};
      for (const pair of opts.query) {
        const idx = pair.indexOf("=");
        if (idx <= 0) throw new InvalidArgumentError(`Invalid query param "${pair}", expected key=value`);
        query[pair.slice(0, idx)] = pair.slice(idx + 1);
      }
      const body = opts.data ? await resolveBody(opts.data) : undefined;

      const client = createClient(config);
      if (globalOpts.dryRun) {
        const url = client.buildUrl({ endpoint: rawEndpoint(path, version), query });
        printDryRun(config, method.toUpperCase(), url.toString(), version, body);
        return;
      }

      requireCredentials(config);
      const result = await executeRaw(client, method, path, { version, query, body });
      print(result, globalOpts);
    } catch (err) {
      fail(err, globalOpts.format);
    }
  });

// ── mcp ───────────────────────────────────────────────────────────────

program
  .command("mcp")
  .description("Start MCP server (stdio), exposes all resource commands as LLM tools")
  .action(async () => {
    const { startMcpServer } = await import("./mcp.js");
    await startMcpServer();
  });

// ---------------------------------------------------------------------------
// Register all resource commands
// ---------------------------------------------------------------------------

function registerCommands(): Map<string, Command> {
  const groups = new Map<string, Command>();

  for (const cmd of COMMANDS) {
    let groupCmd = groups.get(cmd.group);
    if (!groupCmd) {
      groupCmd = program.command(cmd.group).description(GROUP_DESCRIPTIONS[cmd.group] ?? cmd.group);
      groups.set(cmd.group, groupCmd);
    }
    registerAction(groupCmd, cmd);
  }
  return groups;
}

function registerAction(parent: Command, cmd: CmdDef) {
  const argParts = cmd.args.map((a) => `<${a.name}>`).join(" ");
  const cmdStr = argParts ? `${cmd.action} ${argParts}` : cmd.action;

  const sub = parent.command(cmdStr).description(cmd.summary);

  if (cmd.action === "list") {
    sub.option("--filter <key=value>", "Filter, e.g. state=online or id__in=1,2,3 (repeatable)", collect, []);
    sub.option("--limit <n>", "Maximum records to return, or \"all\"", parseLimit, "all");
    sub.option("--page-size <n>", "Records per request (clamped to the endpoint maximum)", parsePositiveInt);
    sub.option("--sort <keys>", "Comma-separated sort keys, - prefix for descending");
    sub.option("--expand <list>", "Comma-separated related resources to inline (v2)");
    sub.option("--search <key=value>", "Free-text search by field (v3, repeatable)", collect, []);
  }

  if (cmd.hasBody) {
    sub.option("-d, --data <json>", "Request body as JSON string (or @file.json to read from file, or - for stdin)");
  }

  sub.action(async (...actionArgs: unknown[]) => {
    // Commander passes positional args first, then options, then the Command
    const command = actionArgs.at(-1);
    if (!(command instanceof Command)) return;
    const opts = command.opts<ActionOptions>();
    const { opts: globalOpts, config } = globalConfig();

    try {
      const argsMap: Record<string, string> = {};
      cmd.args.forEach((arg, i) => {
        const value = command.args[i];
        if (value !== undefined) argsMap[arg.name] = value;
      });

      const params: ExecuteParams = {
        args: argsMap,
        filters: opts.filter?.length ? parseFilterPairs(opts.filter) : undefined,
        search: opts.search?.length ? parseSearch(opts.search) : undefined,
        limit: opts.limit,
        pageSize: opts.pageSize,
        sort: splitList(opts.sort),
        expand: splitList(opts.expand),
        body: cmd.hasBody && opts.data ? await resolveBody(opts.data) : undefined,
      };

      const client = createClient(config);
      if (globalOpts.dryRun) {
        const req = resolveRequest(cmd, params, client);
        printDryRun(config, req.method, req.url, req.version, req.body);
        return;
      }

      requireCredentials(config);
      print(await executeCommand(cmd, params, client), globalOpts);
    } catch (err) {
      fail(err, globalOpts.format);
    }
  });
}

// ---------------------------------------------------------------------------
// Helper commands
// ---------------------------------------------------------------------------

function registerHelpers(groups: Map<string, Command>) {
  const routers = groups.get("routers");
  const accounts = groups.get("accounts");
  const grp = groups.get("groups");
  const subscriptions = groups.get("subscriptions");
  const routerLogs = groups.get("router-logs");
  const routerAlerts = groups.get("router-alerts");
  const locations = groups.get("historical-locations");
  if (!routers || !accounts || !grp || !subscriptions || !routerLogs || !routerAlerts || !locations) return;

  routers
    .command("reboot <id>")
    .description("Reboot a router")
    .action((id: string) => runHelper((client) => rebootRouter(client, id)));

  grp
    .command("reboot <id>")
    .description("Reboot every router in a group")
    .action((id: string) => runHelper((client) => rebootGroup(client, id)));

  routers
    .command("find <name>")
    .description("Get the first router with this exact name")
    .action((name: string) => runHelper((client) => getRouterByName(client, name)));

  routers
    .command("find-serial <serialNumber>")
    .description("Get the device with this serial number (v3 asset endpoint when a token is configured)")
    .action((serial: string) => runHelper((client) => findDeviceBySerial(client, serial)));

  accounts
    .command("find <name>")
    .description("Get the first account with this exact name")
    .action((name: string) => runHelper((client) => getAccountByName(client, name)));

  routers
    .command("config-patch <id>")
    .description("Patch a router's configuration ([updates, removals] pair)")
    .requiredOption("-d, --data <json>", "Configuration JSON (or @file.json, or - for stdin)")
    .action(async (id: string, opts: { data: string }) => {
      await runHelper(async (client) => patchRouterConfiguration(client, id, await resolveBody(opts.data)));
    });

  routers
    .command("config-copy <sourceId> <targetId>")
    .description("Copy one router's configuration onto another (masked secrets are skipped)")
    .action((sourceId: string, targetId: string) =>
      runHelper((client) => copyRouterConfiguration(client, sourceId, targetId)));

  routerLogs
    .command("window <routerId>")
    .description("Log entries of a router for the last 24 hours, or for --date")
    .option("--date <day>", "Calendar day as YYYY-MM-DD")
    .option("--tz-offset <hours>", "UTC offset of the local timezone in hours", parseOffset, 0)
    .action((routerId: string, opts: WindowOptions) =>
      runHelper((client) => getRouterLogs(client, routerId, windowOf(opts))));

  routerAlerts
    .command("window [routerIds...]")
    .description("Alerts for the last 24 hours, or for --date; all routers unless IDs are given")
    .option("--date <day>", "Calendar day as YYYY-MM-DD")
    .option("--tz-offset <hours>", "UTC offset of the local timezone in hours", parseOffset, 0)
    .action((routerIds: string[], opts: WindowOptions) =>
      runHelper((client) => getRouterAlerts(client, windowOf(opts), routerIds)));

  locations
    .command("for-date <routerId> <day>")
    .description("Location history of a router for one calendar day (YYYY-MM-DD)")
    .option("--tz-offset <hours>", "UTC offset of the local timezone in hours", parseOffset, 0)
    .option("--limit <n>", "Maximum records to return, or \"all\"", parseLimit, "all")
    .action((routerId: string, day: string, opts: { tzOffset: number; limit: PageLimit }) =>
      runHelper((client) => getHistoricalLocations(client, routerId, dayWindow(day, opts.tzOffset), opts.limit)));

  subscriptions
    .command("regrade <subscriptionId> <assets...>")
    .description("Apply a subscription to assets given by MAC address or serial number")
    .option("--action <action>", "UPGRADE or DOWNGRADE", parseRegradeAction, "UPGRADE")
    .action((subscriptionId: string, assets: string[], opts: { action: RegradeAction }) =>
      runHelper((client) => regrade(client, subscriptionId, assets, opts.action)));
}

async function runHelper(fn: (client: ReturnType<typeof createClient>) => Promise<unknown>): Promise<void> {
  const { opts, config } = globalConfig();
  try {
    requireCredentials(config);
    print(await fn(createClient(config)), opts);
  } catch (err) {
    fail(err, opts.format);
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function parsePositiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) throw new InvalidArgumentError("Expected a positive integer.");
  return n;
}

function parseLimit(value: string): PageLimit {
  return value === "all" ? "all" : parsePositiveInt(value);
}

function parseOffset(value: string): number {
  const n = Number(value);
  if (value.trim() === "" || !Number.isFinite(n) || Math.abs(n) > 14) {
    throw new InvalidArgumentError("Expected an offset in hours between -14 and 14.");
  }
  return n;
}

function windowOf(opts: WindowOptions) {
  return opts.date ? dayWindow(opts.date, opts.tzOffset) : last24Hours(opts.tzOffset);
}

function parseRegradeAction(value: string): RegradeAction {
  const upper = value.toUpperCase();
  if (upper === "UPGRADE" || upper === "DOWNGRADE") return upper;
  throw new InvalidArgumentError("Expected UPGRADE or DOWNGRADE.");
}

function parseSearch(pairs: string[]): Record<string, string> {
  const search: Record<string, string> = {};
  for (const pair of pairs) {
    const idx = pair.indexOf("=");
    if (idx <= 0) throw new InvalidArgumentError(`Invalid search "${pair}", expected key=value`);
    search[pair.slice(0, idx)] = pair.slice(idx + 1);
  }
  return search;
}

function splitList(value: string | undefined): string[] | undefined {
  const items = value?.split(",").map((s) => s.trim()).filter(Boolean);
  return items?.length ? items : undefined;
}

function print(result: unknown, opts: GlobalOptions) {
  const fields = splitList(opts.fields) ?? [];
  console.log(formatOutput(pickFields(result, fields), opts.format));
}

function printDryRun(config: Config, method: string, url: string, version: ApiVersion, body: unknown) {
  let headers: Record<string, string>;
  try {
    const auth = selectAuth(config.credentials, version);
    headers = Object.fromEntries(Object.keys(auth.headers).map((k) => [k, "***"]));
  } catch (err) {
    if (!(err instanceof ConfigurationError)) throw err;
    headers = { auth: "(missing)" };
  }
  console.log(JSON.stringify({ dryRun: true, method, url, body: body ?? null, headers }, null, 2));
}

/** Print the error as JSON on stderr and exit. Partial results still go to stdout first. */
function fail(err: unknown, format: string): never {
  if (err instanceof PartialResultError) {
    console.log(formatOutput(err.records, format));
  }
  console.error(JSON.stringify(errorDetail(err), null, 2));
  process.exit(1);
}

async function resolveBody(data: string): Promise<unknown> {
  if (data === "-") {
    const chunks: Buffer[] = [];
    for await (const chunk of process.stdin) {
      chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
    }
    return JSON.parse(Buffer.concat(chunks).toString("utf-8"));
  }
  if (data.startsWith("@")) {
    return JSON.parse(readFileSync(data.slice(1), "utf-8"));
  }
  return JSON.parse(data);
}

// ---------------------------------------------------------------------------
// Main
// ---------------------------------------------------------------------------

registerHelpers(registerCommands());

program.parseAsync(process.argv).catch((err: unknown) => {
  console.error(JSON.stringify({ error: String(err) }));
  process.exit(1);
});
