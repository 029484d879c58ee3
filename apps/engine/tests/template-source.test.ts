import { describe, expect, it } from "vitest";

import { TemplateParseError } from "@/lib/errors";
import { parseTemplateSource } from "@/lib/exporters/template-source";

describe("parseTemplateSource", () => {
  it("reads name, path, extras and body", () => {
    const template = parseTemplateSource(
      JSON.stringify({
        name: " Sample ",
        path: "sample/colors.conf",
        extras: { KEYWORD: 4 },
        formatter: "kw={KEYWORDHEX}",
      })
    );

    expect(template.name).toBe("Sample");
    expect(template.path).toBe("sample/colors.conf");
    expect(template.declaredExtras).toEqual(["KEYWORD"]);
    expect([...template.suggestedExtras]).toEqual([["KEYWORD", 4]]);
    expect(template.segments).toEqual([
      { kind: "literal", text: "kw=" },
      { kind: "extra", key: "KEYWORD" },
    ]);
  });

  it("leaves the path empty when the document has none", () => {
    const template = parseTemplateSource('{"name":"Plain","formatter":"{NAME}"}');

    expect(template.path).toBeNull();
    expect(template.declaredExtras).toEqual([]);
  });

  it("passes the palette size through", () => {
    const source = '{"name":"Four","formatter":"{HEX3}"}';

    expect(parseTemplateSource(source, { paletteSize: 4 }).paletteSize).toBe(4);
    expect(() => parseTemplateSource('{"name":"Four","formatter":"{HEX4}"}', { paletteSize: 4 })).toThrow(
      "{HEX4} is outside a palette of 4 colors"
    );
  });

  it.each([
    ["{", "not valid JSON"],
    ["[]", "exporter document must be a JSON object"],
    ['{"formatter":""}', "name must be a non-empty string"],
  ])("reports %s against the origin", (source, reason) => {
    expect(() => parseTemplateSource(source, { origin: "custom.json" })).toThrow(
      `template "custom.json": ${reason}`
    );
  });

  it.each([
    ['{"name":"Doc"}', "formatter must be a string"],
    ['{"name":"Doc","formatter":"","path":3}', "path must be a string"],
    ['{"name":"Doc","formatter":"","extras":[]}', "extras must map names to palette slots"],
    ['{"name":"Doc","formatter":"","extras":{"FG":"1"}}', 'extra "FG" must name a palette slot'],
  ])("reports %s against the document name", (source, reason) => {
    expect(() => parseTemplateSource(source)).toThrow(`template "Doc": ${reason}`);
  });

  it("throws TemplateParseError for malformed documents", () => {
    expect(() => parseTemplateSource("nope")).toThrow(TemplateParseError);
  });
});
