import { colorFromRgb } from "@/lib/color/color";
import { mixPolar } from "@/lib/color/color-math";
import { fromSRGB, polarToSRGB, toPolar } from "@/lib/color/gamut";
import type { ColorSpaceId, Palette, PolarColor } from "@/lib/color/types";
import { getDefaultColorSpace } from "@/lib/config";
import { InvalidParameterError } from "@/lib/errors";
import { buildTheme, type ExtrasInput, type Theme } from "@/lib/theme/theme";

export const TERMINAL_PALETTE_SIZE = 16;

export interface TerminalThemeSettings {
  space: ColorSpaceId;
  background: PolarColor;
  foreground: PolarColor;
  spectrum: PolarColor;
  spectrumBright: PolarColor;
  /** Palette slot used as the accent color. */
  accent: number;
}

// Slots filled by hues rotating 60° at a time: red, yellow, green, cyan, blue, magenta.
const SPECTRUM_SLOTS = [1, 3, 2, 6, 4, 5] as const;
const SPECTRUM_BRIGHT_SLOTS = [9, 11, 10, 14, 12, 13] as const;

export const DEFAULT_TERMINAL_SETTINGS: Readonly<TerminalThemeSettings> = Object.freeze({
  space: "lab",
  background: { lightness: 0, chroma: 0, hue: 0 },
  foreground: { lightness: 100, chroma: 0, hue: 0 },
  spectrum: { lightness: 35, chroma: 35, hue: 0 },
  spectrumBright: { lightness: 65, chroma: 65, hue: 0 },
  accent: 11,
});

function convertPolar(polar: PolarColor, from: ColorSpaceId, to: ColorSpaceId): PolarColor {
  if (from === to) return { ...polar };
  return toPolar(to, fromSRGB(to, polarToSRGB(from, polar)));
}

/** The default layout expressed in `space`; the Lab defaults are carried over through sRGB. */
export function defaultTerminalSettings(space: ColorSpaceId): TerminalThemeSettings {
  const from = DEFAULT_TERMINAL_SETTINGS.space;
  return {
    space,
    background: convertPolar(DEFAULT_TERMINAL_SETTINGS.background, from, space),
    foreground: convertPolar(DEFAULT_TERMINAL_SETTINGS.foreground, from, space),
    spectrum: convertPolar(DEFAULT_TERMINAL_SETTINGS.spectrum, from, space),
    spectrumBright: convertPolar(DEFAULT_TERMINAL_SETTINGS.spectrumBright, from, space),
    accent: DEFAULT_TERMINAL_SETTINGS.accent,
  };
}

export function createTerminalSettings(
  overrides: Partial<TerminalThemeSettings> = {},
  env: NodeJS.ProcessEnv = process.env
): TerminalThemeSettings {
  const space = overrides.space ?? getDefaultColorSpace(env);
  return { ...defaultTerminalSettings(space), ...overrides };
}

function rotations(seed: PolarColor): PolarColor[] {
  return SPECTRUM_SLOTS.map((_, step) => ({ ...seed, hue: seed.hue + 60 * step }));
}

export function buildTerminalPalette(settings: TerminalThemeSettings): Palette {
  const slots: PolarColor[] = new Array<PolarColor>(TERMINAL_PALETTE_SIZE).fill(
    settings.background
  );

  slots[0] = settings.background;
  slots[8] = mixPolar(settings.background, settings.foreground, 1 / 3);
  slots[7] = mixPolar(settings.foreground, settings.background, 1 / 3);
  slots[15] = settings.foreground;

  rotations(settings.spectrum).forEach((polar, step) => {
    slots[SPECTRUM_SLOTS[step] ?? 0] = polar;
  });
  rotations(settings.spectrumBright).forEach((polar, step) => {
    slots[SPECTRUM_BRIGHT_SLOTS[step] ?? 0] = polar;
  });

  return Object.freeze(slots.map((polar) => colorFromRgb(polarToSRGB(settings.space, polar))));
}

export function generateTerminalTheme(
  name: string,
  settings: TerminalThemeSettings,
  extras: ExtrasInput = {}
): Theme {
  if (!Number.isInteger(settings.accent) || settings.accent < 0 || settings.accent >= TERMINAL_PALETTE_SIZE) {
    throw new InvalidParameterError(
      "accent",
      `accent slot must be an integer in [0, ${TERMINAL_PALETTE_SIZE}), got ${settings.accent}`
    );
  }

  const palette = buildTerminalPalette(settings);
  const accent = palette[settings.accent];
  if (!accent) {
    throw new InvalidParameterError("accent", `accent slot ${settings.accent} is empty`);
  }
  return buildTheme(name, palette, accent, extras);
}
