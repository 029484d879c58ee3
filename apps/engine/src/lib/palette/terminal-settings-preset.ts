import { COLOR_SPACE_IDS, isColorSpaceId } from "@/lib/color/color-spaces";
import type { PolarColor } from "@/lib/color/types";
import { DuplicateKeyError, InvalidPresetError } from "@/lib/errors";
import {
  TERMINAL_PALETTE_SIZE,
  type TerminalThemeSettings,
} from "@/lib/palette/terminal-palette";
import { findDuplicateJsonKey } from "@/lib/theme/theme-preset";

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

/** Generator settings as a reopenable document, so a theme can be tweaked later. */
export function serializeTerminalSettings(settings: TerminalThemeSettings): string {
  const document = {
    space: settings.space,
    background: settings.background,
    foreground: settings.foreground,
    spectrum: settings.spectrum,
    spectrumBright: settings.spectrumBright,
    accent: settings.accent,
  };
  return `${JSON.stringify(document, null, 2)}\n`;
}

function parseNumberField(field: string, value: unknown): number {
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new InvalidPresetError(field, `${field} must be a finite number`);
  }
  return value;
}

function parsePolarField(field: string, value: unknown): PolarColor {
  if (!isRecord(value)) {
    throw new InvalidPresetError(field, `${field} must be an object with lightness, chroma and hue`);
  }
  return {
    lightness: parseNumberField(`${field}.lightness`, value.lightness),
    chroma: parseNumberField(`${field}.chroma`, value.chroma),
    hue: parseNumberField(`${field}.hue`, value.hue),
  };
}

export function parseTerminalSettings(text: string): TerminalThemeSettings {
  let document: unknown;
  try {
    document = JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new InvalidPresetError("document", `settings are not valid JSON: ${reason}`);
  }

  const duplicate = findDuplicateJsonKey(text);
  if (duplicate !== null) {
    throw new DuplicateKeyError(duplicate);
  }

  if (!isRecord(document)) {
    throw new InvalidPresetError("document", "settings must be a JSON object");
  }
  const { space, accent } = document;
  if (!isColorSpaceId(space)) {
    throw new InvalidPresetError("space", `space must be one of ${COLOR_SPACE_IDS.join(", ")}`);
  }
  if (
    typeof accent !== "number" ||
    !Number.isInteger(accent) ||
    accent < 0 ||
    accent >= TERMINAL_PALETTE_SIZE
  ) {
    throw new InvalidPresetError(
      "accent",
      `accent must be an integer slot in [0, ${TERMINAL_PALETTE_SIZE})`
    );
  }

  const background = parsePolarField("background", document.background);
  const foreground = parsePolarField("foreground", document.foreground);
  const spectrum = parsePolarField("spectrum", document.spectrum);
  const spectrumBright = parsePolarField("spectrumBright", document.spectrumBright);

  return { space, background, foreground, spectrum, spectrumBright, accent };
}
