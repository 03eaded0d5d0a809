export type OutputFormat = "json" | "jsonl" | "table";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Read a dotted path ("state.signal") from a record */
function readPath(obj: Record<string, unknown>, path: string): { found: boolean; value: unknown } {
  let current: unknown = obj;
  for (const part of path.split(".")) {
    if (!isRecord(current) || !(part in current)) return { found: false, value: undefined };
    current = current[part];
  }
  return { found: true, value: current };
}

/** Pick specific fields (dotted paths allowed) from a record or a list of records */
export function pickFields(data: unknown, fields: string[]): unknown {
  if (!fields.length) return data;

  const pick = (obj: unknown): unknown => {
    if (!isRecord(obj)) return obj;
    const result: Record<string, unknown> = {};
    for (const f of fields) {
      const { found, value } = readPath(obj, f);
      if (found) result[f] = value;
    }
    return result;
  };

  return Array.isArray(data) ? data.map(pick) : pick(data);
}

export function formatOutput(data: unknown, format: string): string {
  switch (format) {
    case "jsonl":
      if (Array.isArray(data)) return data.map((d) => JSON.stringify(d)).join("\n");
      return JSON.stringify(data);
    case "table":
      return formatTable(data);
    case "json":
    default:
      return JSON.stringify(data, null, 2);
  }
}

function formatTable(data: unknown): string {
  let items: Record<string, unknown>[];
  if (Array.isArray(data)) {
    items = data.filter(isRecord);
  } else if (isRecord(data)) {
    items = [data];
  } else {
    return String(data);
  }

  if (!items.length) return "(no results)";

  const keys = [...new Set(items.flatMap((item) => Object.keys(item)))];

  const fmt = (v: unknown): string => {
    if (v === null || v === undefined) return "";
    if (typeof v === "object") return JSON.stringify(v);
    return String(v);
  };

  const widths = keys.map((k) => {
    const vals = items.map((item) => fmt(item[k]));
    return Math.min(60, Math.max(k.length, ...vals.map((v) => v.length)));
  });

  const header = keys.map((k, i) => k.padEnd(widths[i] ?? 0)).join("  ").trimEnd();
  const sep = widths.map((w) => "─".repeat(w)).join("──");
  const rows = items.map((item) =>
    keys
      .map((k, i) => {
        const width = widths[i] ?? 0;
        const s = fmt(item[k]);
        return s.length > width ? s.slice(0, width - 1) + "…" : s.padEnd(width);
      })
      .join("  ")
      .trimEnd(),
  );

  return [header, sep, ...rows, "", `(${items.length} ${items.length === 1 ? "row" : "rows"})`].join("\n");
}
