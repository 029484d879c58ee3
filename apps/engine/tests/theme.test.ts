import { describe, expect, it } from "vitest";

import { colorFromHex, colorToHex } from "@/lib/color/color";
import type { Color } from "@/lib/color/types";
import { DuplicateKeyError, InvalidExtrasError, InvalidParameterError } from "@/lib/errors";
import { buildTheme, extrasToRecord, setPaletteColor, updateTheme } from "@/lib/theme/theme";

import { buildFixtureTheme, colorAt, paletteFromHex, SIXTEEN_HEX } from "./theme-fixtures";

const ACCENT = colorFromHex("ff00ff");

describe("theme", () => {
  it("accepts extras as a record, a map, or entries", () => {
    const fromRecord = buildFixtureTheme("Test", { CONSTANT: 3, COMMENT: 8 });
    const fromMap = buildFixtureTheme("Test", new Map([["CONSTANT", 3], ["COMMENT", 8]]));
    const fromEntries = buildFixtureTheme("Test", [["CONSTANT", 3], ["COMMENT", 8]]);

    expect(extrasToRecord(fromRecord.extras)).toEqual({ CONSTANT: 3, COMMENT: 8 });
    expect([...fromMap.extras]).toEqual([...fromRecord.extras]);
    expect([...fromEntries.extras]).toEqual([...fromRecord.extras]);
  });

  it.each([-1, 16, 1.5])("rejects an extra pointing at slot %s", (slot) => {
    expect(() => buildFixtureTheme("Test", { CONSTANT: slot })).toThrow(InvalidExtrasError);
  });

  it("names the offending extra", () => {
    expect(() => buildFixtureTheme("Test", { COMMENT: 16 })).toThrow(
      'extra "COMMENT" points at slot 16, palette has 16 colors'
    );
  });

  it("rejects empty extra names", () => {
    expect(() => buildFixtureTheme("Test", { "": 0 })).toThrow("extras keys must be non-empty");
  });

  it("rejects repeated extra names", () => {
    expect(() =>
      buildFixtureTheme("Test", [
        ["CONSTANT", 1],
        ["CONSTANT", 2],
      ])
    ).toThrow(DuplicateKeyError);
  });

  it("rejects an empty palette", () => {
    expect(() => buildTheme("Empty", [], ACCENT)).toThrow(InvalidParameterError);
  });

  it("is frozen and detached from its inputs", () => {
    const palette: Color[] = [...paletteFromHex(SIXTEEN_HEX)];
    const extras = new Map([["CONSTANT", 3]]);
    const theme = buildTheme("Test", palette, ACCENT, extras);

    palette[0] = colorFromHex("123456");
    extras.set("CONSTANT", 4);

    expect(Object.isFrozen(theme)).toBe(true);
    expect(Object.isFrozen(theme.palette)).toBe(true);
    expect(colorToHex(colorAt(theme.palette, 0))).toBe("000000");
    expect(theme.extras.get("CONSTANT")).toBe(3);
  });

  it("exposes extras without mutators", () => {
    const theme = buildFixtureTheme("Test", { CONSTANT: 3 });

    expect(Object.isFrozen(theme.extras)).toBe(true);
    expect("set" in theme.extras).toBe(false);
    expect("delete" in theme.extras).toBe(false);
    expect("clear" in theme.extras).toBe(false);
    expect(Reflect.set(theme.extras, "size", 0)).toBe(false);
    expect(theme.extras.size).toBe(1);
  });

  it("updates by building a new theme", () => {
    const theme = buildFixtureTheme("Test", { CONSTANT: 3 });
    const renamed = updateTheme(theme, { name: "Renamed" });
    const recolored = setPaletteColor(theme, 3, colorFromHex("445566"));

    expect(theme.name).toBe("Test");
    expect(renamed.name).toBe("Renamed");
    expect(renamed.extras.get("CONSTANT")).toBe(3);
    expect(colorToHex(colorAt(recolored.palette, 3))).toBe("445566");
    expect(colorToHex(colorAt(theme.palette, 3))).toBe("112233");
  });

  it("revalidates extras against a replaced palette", () => {
    const theme = buildFixtureTheme("Test", { CONSTANT: 3 });

    expect(() => updateTheme(theme, { palette: paletteFromHex(["000000", "ffffff"]) })).toThrow(
      InvalidExtrasError
    );
  });

  it("rejects recoloring a slot outside the palette", () => {
    expect(() => setPaletteColor(buildFixtureTheme(), 16, ACCENT)).toThrow(
      "slot 16 is outside a palette of 16 colors"
    );
  });
});
