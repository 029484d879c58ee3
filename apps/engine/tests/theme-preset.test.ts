import { describe, expect, it } from "vitest";

import { colorFromHex, colorToHex } from "@/lib/color/color";
import { DuplicateKeyError, InvalidExtrasError, InvalidPresetError } from "@/lib/errors";
import { buildTheme } from "@/lib/theme/theme";
import {
  findDuplicateJsonKey,
  parseThemePreset,
  serializeThemePreset,
  themeToPreset,
} from "@/lib/theme/theme-preset";

import { buildFixtureTheme, paletteFromHex, SIXTEEN_HEX } from "./theme-fixtures";

const presetText = (extras: string) =>
  `{"name":"Preset","palette":["000000","ffffff"],"accent":"ff00ff","extras":${extras}}`;

describe("theme presets", () => {
  it("serializes as indented JSON", () => {
    const theme = buildTheme(
      "Tiny",
      paletteFromHex(["000000", "ffffff"]),
      colorFromHex("ff00ff"),
      { FG: 1 }
    );

    expect(serializeThemePreset(theme)).toBe(
      [
        "{",
        '  "name": "Tiny",',
        '  "palette": [',
        '    "000000",',
        '    "ffffff"',
        "  ],",
        '  "accent": "ff00ff",',
        '  "extras": {',
        '    "FG": 1',
        "  }",
        "}",
        "",
      ].join("\n")
    );
  });

  it("reads back what it writes", () => {
    const theme = buildFixtureTheme("Round Trip", { CONSTANT: 3, COMMENT: 8 });
    const parsed = parseThemePreset(serializeThemePreset(theme));

    expect(themeToPreset(parsed)).toEqual({
      name: "Round Trip",
      palette: SIXTEEN_HEX,
      accent: "ff00ff",
      extras: { CONSTANT: 3, COMMENT: 8 },
    });
  });

  it("accepts hex with a leading # and missing extras", () => {
    const theme = parseThemePreset('{"name":"Bare","palette":["#ABC"],"accent":"#abc"}');

    expect(colorToHex(theme.accent)).toBe("aabbcc");
    expect(theme.extras.size).toBe(0);
  });

  it("rejects duplicate keys", () => {
    expect(() => parseThemePreset(presetText('{"FG":1,"FG":0}'))).toThrow(DuplicateKeyError);
    expect(() => parseThemePreset(presetText('{"FG":1,"FG":0}'))).toThrow('duplicate key "FG"');
  });

  it("validates extras against the palette", () => {
    expect(() => parseThemePreset(presetText('{"FG":2}'))).toThrow(InvalidExtrasError);
  });

  it("points at the invalid field", () => {
    const fieldOf = (text: string): string | null => {
      try {
        parseThemePreset(text);
        return null;
      } catch (error) {
        return error instanceof InvalidPresetError ? error.field : null;
      }
    };

    expect(fieldOf("{")).toBe("document");
    expect(fieldOf("[]")).toBe("document");
    expect(fieldOf('{"palette":[],"accent":"000000"}')).toBe("name");
    expect(fieldOf('{"name":"x","palette":["000000","nope"],"accent":"000000"}')).toBe(
      "palette[1]"
    );
    expect(fieldOf('{"name":"x","palette":["000000"],"accent":7}')).toBe("accent");
    expect(fieldOf(presetText('{"FG":"1"}'))).toBe("extras.FG");
  });

  describe("findDuplicateJsonKey", () => {
    it("only compares keys within the same object", () => {
      expect(findDuplicateJsonKey('{"a":{"b":1},"c":{"b":2}}')).toBeNull();
      expect(findDuplicateJsonKey('[{"a":1},{"a":2}]')).toBeNull();
    });

    it("ignores braces and commas inside strings", () => {
      expect(findDuplicateJsonKey('{"a":"x,{\\"a\\":1","b":1}')).toBeNull();
    });

    it("decodes escaped keys", () => {
      expect(findDuplicateJsonKey('{"a\\"b":1,"a\\"b":2}')).toBe('a"b');
      expect(findDuplicateJsonKey('{"\\u0041":1,"A":2}')).toBe("A");
    });
  });
});
