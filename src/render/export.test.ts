/**
 * Data Export: Unit Tests
 */

import { describe, it, expect } from "vitest";
import { dataExportPath, parseDataExport, renderDataExport } from "./export.js";
import { ExportFormatError } from "../errors.js";
import { sampleSnapshot } from "../testing/snapshot.js";

const TIMESTAMP = new Date(Date.UTC(2024, 0, 2, 3, 4, 5));

describe("renderDataExport", () => {
  it("names the file after the UTC timestamp", () => {
    expect(dataExportPath(TIMESTAMP)).toBe("data/azure_resources_2024-01-02-03-04-05.json");
    expect(renderDataExport(sampleSnapshot(), [], TIMESTAMP).path).toBe("data/azure_resources_2024-01-02-03-04-05.json");
  });

  it("round-trips records field for field", () => {
    const snapshot = sampleSnapshot();
    const { content } = renderDataExport(snapshot, [], TIMESTAMP);

    const parsed = parseDataExport(content);

    expect(parsed.generatedAt).toBe("2024-01-02T03:04:05.000Z");
    expect(parsed.snapshot).toEqual(snapshot);
  });

  it("stores raw payloads as JSON-safe values", () => {
    const { content } = renderDataExport(
      sampleSnapshot(),
      [{ id: "/r/1", type: "Contoso.Widgets/gadgets", apiVersion: "2024-01-01", payload: { name: "g-1", nested: { on: true } } }],
      TIMESTAMP,
    );

    expect(parseDataExport(content).rawPayloads).toEqual([
      { id: "/r/1", type: "Contoso.Widgets/gadgets", apiVersion: "2024-01-01", payload: { name: "g-1", nested: { on: true } } },
    ]);
  });
});

describe("parseDataExport", () => {
  it("rejects malformed JSON", () => {
    expect(() => parseDataExport("{")).toThrow(ExportFormatError);
  });

  it("lists schema errors by path", () => {
    const { content } = renderDataExport(sampleSnapshot(), [], TIMESTAMP);
    const broken = content.replace('"handler": "typed"', '"handler": "custom"');

    try {
      parseDataExport(broken);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ExportFormatError);
      const paths = (error instanceof ExportFormatError ? error.errors : []).map((e) => e.split(":")[0]);
      expect(paths).toContain("/resources/0/handler");
    }
  });
});
