import { hexToRgb, rgbToHex } from "@/lib/color/color-math";
import { fromSRGB, toSRGB } from "@/lib/color/gamut";
import type { Color, ColorSpaceId, Coords, Rgb } from "@/lib/color/types";
import { InvalidParameterError } from "@/lib/errors";

// Colors are held in Oklab; sRGB is derived on demand through the gamut mapper.

export function colorFromRgb(rgb: Rgb): Color {
  return Object.freeze({ oklab: Object.freeze(fromSRGB("oklab", rgb)) });
}

export function colorFromHex(hex: string): Color {
  const rgb = hexToRgb(hex);
  if (!rgb) {
    throw new InvalidParameterError("hex", `"${hex}" is not a hex color`);
  }
  return colorFromRgb(rgb);
}

/** Builds a color from coordinates in any space, snapping it into the sRGB gamut. */
export function colorFromCoords(space: ColorSpaceId, coords: Coords): Color {
  return colorFromRgb(toSRGB(space, coords));
}

export function colorToRgb(color: Color): Rgb {
  return toSRGB("oklab", color.oklab);
}

export function colorToHex(color: Color): string {
  return rgbToHex(colorToRgb(color));
}

export function colorToCoords(color: Color, space: ColorSpaceId): Coords {
  return space === "oklab" ? color.oklab : fromSRGB(space, colorToRgb(color));
}

export function colorsEqual(first: Color, second: Color): boolean {
  return colorToHex(first) === colorToHex(second);
}
