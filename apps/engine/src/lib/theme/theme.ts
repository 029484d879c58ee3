import type { Color, Palette } from "@/lib/color/types";
import { DuplicateKeyError, InvalidExtrasError, InvalidParameterError } from "@/lib/errors";
import { FrozenMap } from "@/lib/frozen-map";

export type ThemeExtras = ReadonlyMap<string, number>;

export type ExtrasInput =
  | ThemeExtras
  | Readonly<Record<string, number>>
  | Iterable<readonly [string, number]>;

export interface Theme {
  readonly name: string;
  readonly palette: Palette;
  readonly accent: Color;
  readonly extras: ThemeExtras;
}

export interface ThemePatch {
  name?: string;
  palette?: Palette;
  accent?: Color;
  extras?: ExtrasInput;
}

function isEntryIterable(value: ExtrasInput): value is Iterable<readonly [string, number]> {
  return Symbol.iterator in value;
}

function extrasEntries(extras: ExtrasInput): Array<readonly [string, number]> {
  if (isEntryIterable(extras)) return [...extras];
  return Object.entries(extras);
}

function validateExtras(extras: ExtrasInput, paletteSize: number): ThemeExtras {
  const validated = new Map<string, number>();
  for (const [key, index] of extrasEntries(extras)) {
    if (typeof key !== "string" || key.length === 0) {
      throw new InvalidExtrasError("", index, paletteSize);
    }
    if (validated.has(key)) {
      throw new DuplicateKeyError(key);
    }
    if (!Number.isInteger(index) || index < 0 || index >= paletteSize) {
      throw new InvalidExtrasError(key, index, paletteSize);
    }
    validated.set(key, index);
  }
  return new FrozenMap(validated);
}

/**
 * Binds a palette to its metadata. The result is frozen; palette and extras are
 * copied so later changes to the inputs never reach the theme, and the extras
 * view has no mutators.
 */
export function buildTheme(
  name: string,
  palette: Palette,
  accent: Color,
  extras: ExtrasInput = {}
): Theme {
  if (palette.length === 0) {
    throw new InvalidParameterError("palette", "palette must contain at least one color");
  }

  return Object.freeze({
    name,
    palette: Object.freeze([...palette]),
    accent,
    extras: validateExtras(extras, palette.length),
  });
}

export function updateTheme(theme: Theme, patch: ThemePatch): Theme {
  return buildTheme(
    patch.name ?? theme.name,
    patch.palette ?? theme.palette,
    patch.accent ?? theme.accent,
    patch.extras ?? theme.extras
  );
}

export function setPaletteColor(theme: Theme, index: number, color: Color): Theme {
  if (!Number.isInteger(index) || index < 0 || index >= theme.palette.length) {
    throw new InvalidParameterError(
      "index",
      `slot ${index} is outside a palette of ${theme.palette.length} colors`
    );
  }
  return updateTheme(theme, {
    palette: theme.palette.map((existing, slot) => (slot === index ? color : existing)),
  });
}

export function extrasToRecord(extras: ThemeExtras): Record<string, number> {
  return Object.fromEntries(extras);
}
