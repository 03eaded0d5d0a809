import { describe, expect, test } from "vitest";
import { formatOutput, pickFields } from "../output.js";

describe("pickFields", () => {
  test("picks top-level and dotted fields from each record", () => {
    const data = [{ id: 1, name: "edge-1", state: { signal: 5, carrier: "test" } }];
    expect(pickFields(data, ["id", "state.signal"])).toEqual([{ id: 1, "state.signal": 5 }]);
  });

  test("missing fields are left out", () => {
    expect(pickFields({ id: 1 }, ["id", "name"])).toEqual({ id: 1 });
  });

  test("no fields returns the data unchanged", () => {
    const data = { id: 1 };
    expect(pickFields(data, [])).toBe(data);
  });
});

describe("formatOutput", () => {
  test("json is pretty-printed", () => {
    expect(formatOutput({ id: 1 }, "json")).toBe('{\n  "id": 1\n}');
  });

  test("jsonl writes one record per line", () => {
    expect(formatOutput([{ id: 1 }, { id: 2 }], "jsonl")).toBe('{"id":1}\n{"id":2}');
  });

  test("table aligns columns", () => {
    const out = formatOutput([{ id: 1, name: "alpha" }, { id: 22, name: "b" }], "table");
    expect(out).toBe(["id  name", "─────────", "1   alpha", "22  b", "", "(2 rows)"].join("\n"));
  });

  test("table of nothing", () => {
    expect(formatOutput([], "table")).toBe("(no results)");
  });

  test("unknown formats fall back to json", () => {
    expect(formatOutput([1], "xml")).toBe("[\n  1\n]");
  });
});
