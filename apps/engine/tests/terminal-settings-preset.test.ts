import { describe, expect, it } from "vitest";

import { colorToHex } from "@/lib/color/color";
import { DuplicateKeyError, InvalidPresetError } from "@/lib/errors";
import {
  buildTerminalPalette,
  createTerminalSettings,
  DEFAULT_TERMINAL_SETTINGS,
  type TerminalThemeSettings,
} from "@/lib/palette/terminal-palette";
import {
  parseTerminalSettings,
  serializeTerminalSettings,
} from "@/lib/palette/terminal-settings-preset";

const defaults = (): TerminalThemeSettings => ({ ...DEFAULT_TERMINAL_SETTINGS });

const fieldOf = (text: string): string | null => {
  try {
    parseTerminalSettings(text);
    return null;
  } catch (error) {
    return error instanceof InvalidPresetError ? error.field : null;
  }
};

const documentWith = (patch: Record<string, unknown>): string =>
  JSON.stringify({ ...defaults(), ...patch });

describe("terminal settings documents", () => {
  it("serializes as indented JSON", () => {
    const lines = serializeTerminalSettings(defaults()).split("\n");

    expect(lines.slice(0, 7)).toEqual([
      "{",
      '  "space": "lab",',
      '  "background": {',
      '    "lightness": 0,',
      '    "chroma": 0,',
      '    "hue": 0',
      "  },",
    ]);
    expect(lines.slice(-3)).toEqual(['  "accent": 11', "}", ""]);
  });

  it("reads back the defaults", () => {
    expect(parseTerminalSettings(serializeTerminalSettings(defaults()))).toEqual(defaults());
  });

  it("reopens tweaked settings into the same palette", () => {
    const settings = createTerminalSettings(
      { accent: 4, spectrum: { lightness: 0.55, chroma: 0.12, hue: 25 } },
      { HUEKIT_COLOR_SPACE: "oklab" }
    );
    const reopened = parseTerminalSettings(serializeTerminalSettings(settings));

    expect(reopened).toEqual(settings);
    expect(buildTerminalPalette(reopened).map((color) => colorToHex(color))).toEqual(
      buildTerminalPalette(settings).map((color) => colorToHex(color))
    );
  });

  it("rejects duplicate keys", () => {
    const text = serializeTerminalSettings(defaults()).replace(
      '"accent": 11',
      '"accent": 11,\n  "accent": 3'
    );

    expect(() => parseTerminalSettings(text)).toThrow(DuplicateKeyError);
  });

  it("points at the invalid field", () => {
    expect(fieldOf("{")).toBe("document");
    expect(fieldOf("[]")).toBe("document");
    expect(fieldOf(documentWith({ space: "cmyk" }))).toBe("space");
    expect(fieldOf(documentWith({ accent: 16 }))).toBe("accent");
    expect(fieldOf(documentWith({ accent: 2.5 }))).toBe("accent");
    expect(fieldOf(documentWith({ background: null }))).toBe("background");
    expect(fieldOf(documentWith({ spectrumBright: { lightness: 65, chroma: 65 } }))).toBe(
      "spectrumBright.hue"
    );
    expect(fieldOf(documentWith({ foreground: { lightness: "100", chroma: 0, hue: 0 } }))).toBe(
      "foreground.lightness"
    );
  });
});
