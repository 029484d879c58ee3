import { clamp, normalizeHue, quantizeRgb, rgbToFloat } from "@/lib/color/color-math";
import { getColorSpace } from "@/lib/color/color-spaces";
import type {
  ColorSpaceDefinition,
  ColorSpaceId,
  Coords,
  PolarColor,
  Rgb,
  RgbFloat,
} from "@/lib/color/types";

// Float error tolerated before a channel counts as out of gamut. Far below one 8-bit step.
const GAMUT_EPSILON = 1e-6;
const CHROMA_SEARCH_STEPS = 32;

export function isInGamut(rgb: RgbFloat): boolean {
  return rgb.every((channel) => channel >= -GAMUT_EPSILON && channel <= 1 + GAMUT_EPSILON);
}

function sanitizePolar(definition: ColorSpaceDefinition, polar: PolarColor): PolarColor {
  const [minLightness, maxLightness] = definition.lightnessRange;
  const lightness = Number.isNaN(polar.lightness)
    ? minLightness
    : clamp(polar.lightness, minLightness, maxLightness);
  const chroma = Number.isFinite(polar.chroma) ? Math.max(0, polar.chroma) : 0;
  return { lightness, chroma, hue: normalizeHue(polar.hue) };
}

/**
 * Pulls an out-of-gamut color back inside the sRGB cube along constant hue and
 * lightness. Lightness is first clamped to the space's range, then the largest
 * chroma scale in [0, 1] that still fits is found by bisection.
 */
export function mapToGamut(space: ColorSpaceId, coords: Coords): RgbFloat {
  const definition = getColorSpace(space);
  const polar = sanitizePolar(definition, definition.toPolar(coords));
  const convert = (scale: number): RgbFloat =>
    definition.toRgb(definition.fromPolar({ ...polar, chroma: polar.chroma * scale }));

  const full = convert(1);
  if (isInGamut(full)) return full;

  let low = 0;
  let high = 1;
  for (let step = 0; step < CHROMA_SEARCH_STEPS; step += 1) {
    const middle = (low + high) / 2;
    if (isInGamut(convert(middle))) {
      low = middle;
    } else {
      high = middle;
    }
  }
  return convert(low);
}

/** Converts coordinates in `space` to 8-bit sRGB. Never fails; every channel lands in [0, 255]. */
export function toSRGB(space: ColorSpaceId, coords: Coords): Rgb {
  const raw = getColorSpace(space).toRgb(coords);
  return quantizeRgb(isInGamut(raw) ? raw : mapToGamut(space, coords));
}

export function fromSRGB(space: ColorSpaceId, rgb: Rgb): Coords {
  return getColorSpace(space).fromRgb(rgbToFloat(rgb));
}

export function toPolar(space: ColorSpaceId, coords: Coords): PolarColor {
  return getColorSpace(space).toPolar(coords);
}

export function fromPolar(space: ColorSpaceId, polar: PolarColor): Coords {
  return getColorSpace(space).fromPolar(polar);
}

export function polarToSRGB(space: ColorSpaceId, polar: PolarColor): Rgb {
  return toSRGB(space, fromPolar(space, polar));
}
