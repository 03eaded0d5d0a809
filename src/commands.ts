// ---------------------------------------------------------------------------
// Command registry, one entry per resource action
// ---------------------------------------------------------------------------

export type CmdKind = "list" | "get" | "create" | "update" | "patch" | "delete";

export interface CmdDef {
  /** Command group (kebab-case resource name) */
  group: string;
  /** Action name (e.g. "list", "get", "create") */
  action: CmdKind;
  /** Catalog resource name (see ENDPOINTS) */
  resource: string;
  /** HTTP method */
  method: string;
  /** Human-readable summary */
  summary: string;
  /** Positional CLI arguments */
  args: { name: string; desc: string }[];
  /** Whether it accepts a JSON request body */
  hasBody: boolean;
}

const METHODS: Record<CmdKind, string> = {
  list: "GET",
  get: "GET",
  create: "POST",
  update: "PUT",
  patch: "PATCH",
  delete: "DELETE",
};

interface ResourceDef {
  resource: string;
  /** Singular noun for summaries */
  noun: string;
  actions: CmdKind[];
  description: string;
}

const RESOURCES: ResourceDef[] = [
  { resource: "accounts", noun: "account", actions: ["list", "get", "create", "update", "delete"],
    description: "Manage accounts and subaccounts" },
  { resource: "activity_logs", noun: "activity log entry", actions: ["list"],
    description: "View the NCM activity log" },
  { resource: "alerts", noun: "alert", actions: ["list"],
    description: "View account alerts" },
  { resource: "configuration_managers", noun: "configuration manager", actions: ["list", "get", "update", "patch"],
    description: "Inspect and edit per-router configuration managers" },
  { resource: "failovers", noun: "failover event", actions: ["list"],
    description: "View WAN failover events" },
  { resource: "firmwares", noun: "firmware", actions: ["list", "get"],
    description: "List device firmwares" },
  { resource: "groups", noun: "group", actions: ["list", "get", "create", "update", "patch", "delete"],
    description: "Manage router groups and their configuration" },
  { resource: "historical_locations", noun: "historical location", actions: ["list"],
    description: "View locations visited by a router (filter by router)" },
  { resource: "locations", noun: "location", actions: ["list", "get", "create", "delete"],
    description: "Manage current router locations" },
  { resource: "net_devices", noun: "net device", actions: ["list", "get"],
    description: "View modems and other network interfaces" },
  { resource: "products", noun: "product", actions: ["list", "get"],
    description: "List router product models" },
  { resource: "router_alerts", noun: "router alert", actions: ["list"],
    description: "View device alert history" },
  { resource: "router_logs", noun: "router log entry", actions: ["list"],
    description: "View device event logs (filter by router)" },
  { resource: "routers", noun: "router", actions: ["list", "get", "update", "delete"],
    description: "Manage routers" },
  { resource: "asset_endpoints", noun: "asset endpoint", actions: ["list", "get"],
    description: "View v3 asset endpoints" },
  { resource: "subscriptions", noun: "subscription", actions: ["list", "get"],
    description: "View subscriptions and apply them to assets" },
  { resource: "regrades", noun: "regrade job", actions: ["list"],
    description: "View subscription regrade jobs" },
  { resource: "users", noun: "user", actions: ["list", "get", "create", "update", "delete"],
    description: "Manage NCM users" },
  { resource: "exchange_sites", noun: "exchange site", actions: ["list", "get", "create", "update", "delete"],
    description: "Manage NetCloud Exchange sites" },
  { resource: "exchange_resources", noun: "exchange resource", actions: ["list", "get", "create", "update", "delete"],
    description: "Manage NetCloud Exchange resources" },
  { resource: "private_cellular_networks", noun: "private cellular network", actions: ["list", "get", "create", "update", "delete"],
    description: "Manage private cellular networks" },
  { resource: "group_modem_upgrade_jobs", noun: "modem upgrade job", actions: ["list", "get"],
    description: "View group modem upgrade jobs" },
];

function summaryFor(kind: CmdKind, def: ResourceDef): string {
  switch (kind) {
    case "list": return `List ${def.noun} records (all pages unless --limit is given)`;
    case "get": return `Get a single ${def.noun} by ID`;
    case "create": return `Create a ${def.noun}`;
    case "update": return `Replace fields of a ${def.noun} (PUT)`;
    case "patch": return `Patch a ${def.noun} (PATCH)`;
    case "delete": return `Delete a ${def.noun}`;
  }
}

export const COMMANDS: CmdDef[] = RESOURCES.flatMap((def) =>
  def.actions.map((action): CmdDef => ({
    group: def.resource.replace(/_/g, "-"),
    action,
    resource: def.resource,
    method: METHODS[action],
    summary: summaryFor(action, def),
    args: action === "list" || action === "create" ? [] : [{ name: "id", desc: `${def.noun} ID` }],
    hasBody: action === "create" || action === "update" || action === "patch",
  })),
);

// ---------------------------------------------------------------------------
// Group descriptions
// ---------------------------------------------------------------------------

export const GROUP_DESCRIPTIONS: Record<string, string> = Object.fromEntries(
  RESOURCES.map((def) => [def.resource.replace(/_/g, "-"), def.description]),
);

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Generate a tool name from a command definition: group_action */
export function toolName(cmd: CmdDef): string {
  return `${cmd.group.replace(/-/g, "_")}_${cmd.action.replace(/-/g, "_")}`;
}
