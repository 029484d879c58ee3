import { colorFromHex, colorToHex } from "@/lib/color/color";
import { normalizeHexColor } from "@/lib/color/color-math";
import { DuplicateKeyError, InvalidPresetError } from "@/lib/errors";
import { buildTheme, extrasToRecord, type Theme } from "@/lib/theme/theme";

export interface ThemePresetDocument {
  name: string;
  palette: string[];
  accent: string;
  extras: Record<string, number>;
}

export function themeToPreset(theme: Theme): ThemePresetDocument {
  return {
    name: theme.name,
    palette: theme.palette.map((color) => colorToHex(color)),
    accent: colorToHex(theme.accent),
    extras: extrasToRecord(theme.extras),
  };
}

export function serializeThemePreset(theme: Theme): string {
  return `${JSON.stringify(themeToPreset(theme), null, 2)}\n`;
}

/**
 * Returns the first key repeated inside any single object of a JSON text.
 * Expects text that `JSON.parse` already accepted.
 */
export function findDuplicateJsonKey(text: string): string | null {
  const frames: Array<{ keys: Set<string> | null; expectKey: boolean }> = [];
  let index = 0;

  while (index < text.length) {
    const char = text[index];
    const frame = frames[frames.length - 1];

    if (char === '"') {
      let end = index + 1;
      while (end < text.length && text[end] !== '"') {
        end += text[end] === "\\" ? 2 : 1;
      }
      if (frame?.keys && frame.expectKey) {
        const key: unknown = JSON.parse(text.slice(index, end + 1));
        if (typeof key === "string") {
          if (frame.keys.has(key)) return key;
          frame.keys.add(key);
        }
        frame.expectKey = false;
      }
      index = end + 1;
      continue;
    }

    if (char === "{") {
      frames.push({ keys: new Set(), expectKey: true });
    } else if (char === "[") {
      frames.push({ keys: null, expectKey: false });
    } else if (char === "}" || char === "]") {
      frames.pop();
    } else if (char === "," && frame?.keys) {
      frame.expectKey = true;
    }
    index += 1;
  }

  return null;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

function parseHexField(field: string, value: unknown): string {
  const hex = typeof value === "string" ? normalizeHexColor(value) : null;
  if (!hex) {
    throw new InvalidPresetError(field, `${field} must be a hex color`);
  }
  return hex;
}

function parseExtrasField(value: unknown): Array<[string, number]> {
  if (value === undefined) return [];
  if (!isRecord(value)) {
    throw new InvalidPresetError("extras", "extras must map names to palette slots");
  }
  return Object.entries(value).map(([key, slot]) => {
    if (typeof slot !== "number") {
      throw new InvalidPresetError(`extras.${key}`, `extras.${key} must be a number`);
    }
    return [key, slot];
  });
}

/** Parses the `{ name, palette, accent, extras }` preset document into a validated Theme. */
export function parseThemePreset(text: string): Theme {
  let document: unknown;
  try {
    document = JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new InvalidPresetError("document", `preset is not valid JSON: ${reason}`);
  }

  const duplicate = findDuplicateJsonKey(text);
  if (duplicate !== null) {
    throw new DuplicateKeyError(duplicate);
  }

  if (!isRecord(document)) {
    throw new InvalidPresetError("document", "preset must be a JSON object");
  }
  if (typeof document.name !== "string") {
    throw new InvalidPresetError("name", "name must be a string");
  }
  if (!Array.isArray(document.palette)) {
    throw new InvalidPresetError("palette", "palette must be a list of hex colors");
  }

  const palette = document.palette.map((entry: unknown, index) =>
    colorFromHex(parseHexField(`palette[${index}]`, entry))
  );
  const accent = colorFromHex(parseHexField("accent", document.accent));

  return buildTheme(document.name, palette, accent, parseExtrasField(document.extras));
}
