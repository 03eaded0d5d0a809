import { createRequire } from "node:module";
import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  ListResourcesRequestSchema,
  ReadResourceRequestSchema,
  ListResourceTemplatesRequestSchema,
  ListPromptsRequestSchema,
  GetPromptRequestSchema,
} from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import { listAll } from "./chunk.js";
import type { ClientOptions, NcmClient } from "./client.js";
import { COMMANDS, toolName, type CmdDef } from "./commands.js";
import { createClient, requireCredentials, resolveConfig, type Config } from "./config.js";
import { PartialResultError, errorDetail } from "./errors.js";
import { executeCommand, type ExecuteParams } from "./execute.js";
import { createLogger } from "./logger.js";

const require = createRequire(import.meta.url);
const pkg = require("../package.json") as { version: string };

const log = createLogger("mcp");

// ---------------------------------------------------------------------------
// Tool arguments
// ---------------------------------------------------------------------------

const FilterScalarSchema = z.union([z.string(), z.number(), z.boolean()]);

const ToolArgsSchema = z.object({
  id: z.union([z.string(), z.number()]).transform(String).optional(),
  filters: z.record(z.union([FilterScalarSchema, z.array(FilterScalarSchema)])).optional(),
  limit: z.union([z.number().int().positive(), z.literal("all")]).optional(),
  pageSize: z.number().int().positive().optional(),
  fields: z.array(z.string()).optional(),
  sort: z.array(z.string()).optional(),
  expand: z.array(z.string()).optional(),
  search: z.record(z.string()).optional(),
  body: z.unknown().optional(),
});

function buildInputSchema(cmd: CmdDef): Record<string, unknown> {
  const properties: Record<string, unknown> = {};
  const required: string[] = [];

  for (const arg of cmd.args) {
    properties[arg.name] = { type: "string", description: arg.desc };
    required.push(arg.name);
  }

  if (cmd.action === "list") {
    properties.filters = {
      type: "object",
      description:
        "Filters keyed by field or field__op (e.g. {\"state\": \"online\", \"id__in\": [1, 2]}). " +
        "Lists longer than 100 values are split into several requests automatically.",
      additionalProperties: {
        anyOf: [
          { type: ["string", "number", "boolean"] },
          { type: "array", items: { type: ["string", "number", "boolean"] } },
        ],
      },
    };
    properties.limit = {
      anyOf: [{ type: "integer", minimum: 1 }, { type: "string", enum: ["all"] }],
      description: "Maximum records to return (omit to fetch all pages)",
    };
    properties.pageSize = { type: "integer", minimum: 1, description: "Records per request" };
    properties.fields = { type: "array", items: { type: "string" }, description: "Fields to return" };
    properties.sort = { type: "array", items: { type: "string" }, description: "Sort keys, - prefix for descending" };
    properties.expand = { type: "array", items: { type: "string" }, description: "Related resources to inline (v2)" };
    properties.search = {
      type: "object",
      additionalProperties: { type: "string" },
      description: "Free-text search by field (v3)",
    };
  }

  if (cmd.hasBody) {
    properties.body = { type: "object", description: "Request body object", additionalProperties: true };
    required.push("body");
  }

  return {
    type: "object",
    properties,
    required: required.length ? required : undefined,
  };
}

const toolMap = new Map<string, CmdDef>();
for (const cmd of COMMANDS) {
  toolMap.set(toolName(cmd), cmd);
}

function errorResult(detail: Record<string, unknown>) {
  return {
    content: [{ type: "text" as const, text: JSON.stringify(detail, null, 2) }],
    isError: true,
  };
}

// ---------------------------------------------------------------------------
// MCP Server
// ---------------------------------------------------------------------------

const READ_ONLY_METHODS = new Set(["GET", "HEAD", "OPTIONS"]);

export interface McpOptions {
  /** Resolved config; defaults to environment and config file */
  config?: Config;
  /** Extra client options (transport, retry tuning) */
  clientOptions?: ClientOptions;
}

export async function startMcpServer(customTransport?: Transport, options: McpOptions = {}): Promise<Server> {
  const config = options.config ?? resolveConfig({});
  const readOnly = config.readOnly;

  const server = new Server(
    { name: "ncm-cli", version: pkg.version },
    { capabilities: { tools: {}, resources: {}, prompts: {} } },
  );

  let client: NcmClient | null = null;
  function getClient(): NcmClient {
    requireCredentials(config);
    client ??= createClient(config, options.clientOptions);
    return client;
  }

  // ── ListTools ─────────────────────────────────────────────────────
  server.setRequestHandler(ListToolsRequestSchema, async () => {
    const cmds = readOnly
      ? COMMANDS.filter((cmd) => READ_ONLY_METHODS.has(cmd.method))
      : COMMANDS;
    const tools = cmds.map((cmd) => ({
      name: toolName(cmd),
      description: `${cmd.summary}. API: ${cmd.method} ${cmd.resource}`,
      inputSchema: buildInputSchema(cmd),
    }));
    return { tools };
  });

  // ── CallTool ──────────────────────────────────────────────────────
  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;
    const cmd = toolMap.get(name);

    if (!cmd) {
      return errorResult({ error: `Unknown tool: ${name}` });
    }

    if (readOnly && !READ_ONLY_METHODS.has(cmd.method)) {
      return errorResult({
        error: `Read-only mode: ${cmd.method} ${cmd.resource} is not allowed`,
        hint: "Unset NCM_READ_ONLY to enable write operations",
      });
    }

    const parsed = ToolArgsSchema.safeParse(args ?? {});
    if (!parsed.success) {
      return errorResult({
        error: "Invalid tool arguments",
        detail: parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`),
      });
    }
    const input = parsed.data;

    const params: ExecuteParams = {
      args: input.id !== undefined ? { id: input.id } : {},
      filters: input.filters,
      limit: input.limit,
      pageSize: input.pageSize,
      fields: input.fields,
      sort: input.sort,
      expand: input.expand,
      search: input.search,
      body: input.body,
    };

    try {
      const result = await executeCommand(cmd, params, getClient());
      return {
        content: [{ type: "text" as const, text: JSON.stringify(result, null, 2) }],
      };
    } catch (err) {
      log.warn({ tool: name, error: err instanceof Error ? err.message : String(err) }, "tool call failed");
      const detail = errorDetail(err);
      if (err instanceof PartialResultError) detail.records = err.records;
      return errorResult(detail);
    }
  });

  // ── ListResources ─────────────────────────────────────────────────
  server.setRequestHandler(ListResourcesRequestSchema, async () => {
    return {
      resources: [
        {
          uri: "ncm://accounts",
          name: "Accounts",
          description: "All accounts visible to the configured credentials",
          mimeType: "application/json",
        },
        {
          uri: "ncm://routers",
          name: "Routers",
          description: "All routers",
          mimeType: "application/json",
        },
      ],
    };
  });

  // ── ListResourceTemplates ─────────────────────────────────────────
  server.setRequestHandler(ListResourceTemplatesRequestSchema, async () => {
    return {
      resourceTemplates: [
        {
          uriTemplate: "ncm://routers/{routerId}/net_devices",
          name: "Router net devices",
          description: "Modems and other network interfaces of one router",
          mimeType: "application/json",
        },
      ],
    };
  });

  // ── ReadResource ──────────────────────────────────────────────────
  server.setRequestHandler(ReadResourceRequestSchema, async (request) => {
    const uri = request.params.uri;
    const api = getClient();

    const json = (data: unknown) => ({
      contents: [{ uri, mimeType: "application/json", text: JSON.stringify(data, null, 2) }],
    });

    if (uri === "ncm://accounts") {
      return json(await listAll(api, api.endpoint("accounts")));
    }

    if (uri === "ncm://routers") {
      return json(await listAll(api, api.endpoint("routers")));
    }

    const templateMatch = uri.match(/^ncm:\/\/routers\/([^/]+)\/net_devices$/);
    if (templateMatch?.[1]) {
      const routerId = decodeURIComponent(templateMatch[1]);
      return json(await listAll(api, api.endpoint("net_devices"), { filters: { router: routerId } }));
    }

    throw new Error(`Unknown resource URI: ${uri}`);
  });

  // ── ListPrompts ───────────────────────────────────────────────────
  server.setRequestHandler(ListPromptsRequestSchema, async () => {
    return {
      prompts: [
        {
          name: "fleet-health",
          description: "Check router fleet health: connection state, modems, and recent alerts",
          arguments: [
            { name: "account", description: "Account ID to limit the check to", required: false },
          ],
        },
      ],
    };
  });

  // ── GetPrompt ─────────────────────────────────────────────────────
  server.setRequestHandler(GetPromptRequestSchema, async (request) => {
    const { name, arguments: promptArgs } = request.params;
    if (name !== "fleet-health") throw new Error(`Unknown prompt: ${name}`);

    const account = promptArgs?.account;
    const scope = account ? `account ${account}` : "all accounts";
    const accountFilter = account ? ` (filters: {"account": "${account}"})` : "";

    return {
      messages: [
        {
          role: "user" as const,
          content: {
            type: "text" as const,
            text: [
              `Check the health of the router fleet for ${scope}.`,
              "",
              "Steps:",
              `1. Use the **routers_list** tool${accountFilter} to get every router and its state.`,
              "2. Use the **net_devices_list** tool with filters {\"connection_state\": \"connected\"} " +
                "and the router IDs from step 1 to see which modems are up.",
              "3. Use the **router_alerts_list** tool with filters {\"router__in\": [...]} " +
                "to fetch recent alerts for routers that are offline.",
              "",
              "Then report:",
              "- A summary table: router name, product, state, firmware, and active WAN.",
              "- Routers that are offline, and how long since their state changed.",
              "- Routers with no connected modem.",
              "- Any repeated alert types and recommended next steps.",
            ].join("\n"),
          },
        },
      ],
    };
  });

  // ── Start ─────────────────────────────────────────────────────────
  const transport = customTransport ?? new StdioServerTransport();
  await server.connect(transport);
  return server;
}
