import { colorToCoords, colorFromRgb } from "@/lib/color/color";
import { clamp, normalizeHue } from "@/lib/color/color-math";
import { getColorSpace } from "@/lib/color/color-spaces";
import { polarToSRGB, toPolar } from "@/lib/color/gamut";
import type { Color, ColorSpaceId, Palette } from "@/lib/color/types";
import { InvalidParameterError } from "@/lib/errors";

export type LightnessCurve =
  | { kind: "linear"; from: number; to: number }
  | { kind: "explicit"; values: readonly number[] };

export type HuePolicy =
  | { kind: "equal-steps" }
  | { kind: "offsets"; offsets: readonly number[] };

export type ChromaPolicy =
  | { kind: "constant"; value: number }
  /** Peaks at mid lightness and tapers to zero at both ends of the space's range. */
  | { kind: "lightness-scaled"; value: number }
  | { kind: "base" }
  | { kind: "explicit"; values: readonly number[] };

export interface PaletteRequest {
  base: Color;
  space: ColorSpaceId;
  size: number;
  lightness: LightnessCurve;
  hue: HuePolicy;
  chroma: ChromaPolicy;
}

function assertFinite(parameter: string, value: number): void {
  if (!Number.isFinite(value)) {
    throw new InvalidParameterError(parameter, `${parameter} must be a finite number`);
  }
}

function expandSeries(parameter: string, values: readonly number[], size: number): number[] {
  if (values.length !== size) {
    throw new InvalidParameterError(
      parameter,
      `${parameter} has ${values.length} entries, palette size is ${size}`
    );
  }
  values.forEach((value, index) => assertFinite(`${parameter}[${index}]`, value));
  return [...values];
}

function resolveLightness(curve: LightnessCurve, size: number): number[] {
  if (curve.kind === "explicit") {
    return expandSeries("lightness", curve.values, size);
  }

  assertFinite("lightness.from", curve.from);
  assertFinite("lightness.to", curve.to);
  if (size === 1) return [curve.from];
  return Array.from(
    { length: size },
    (_, index) => curve.from + ((curve.to - curve.from) * index) / (size - 1)
  );
}

function resolveHueOffsets(policy: HuePolicy, size: number): number[] {
  if (policy.kind === "offsets") {
    return expandSeries("hue.offsets", policy.offsets, size);
  }
  return Array.from({ length: size }, (_, index) => (360 * index) / size);
}

function resolveChroma(
  policy: ChromaPolicy,
  lightness: readonly number[],
  space: ColorSpaceId,
  baseChroma: number
): number[] {
  const [minLightness, maxLightness] = getColorSpace(space).lightnessRange;

  switch (policy.kind) {
    case "constant":
      assertFinite("chroma.value", policy.value);
      return lightness.map(() => policy.value);
    case "lightness-scaled":
      assertFinite("chroma.value", policy.value);
      return lightness.map((value) => {
        const t = clamp((value - minLightness) / (maxLightness - minLightness), 0, 1);
        return policy.value * Math.sin(Math.PI * t);
      });
    case "base":
      return lightness.map(() => baseChroma);
    case "explicit":
      return expandSeries("chroma.values", policy.values, lightness.length);
  }
}

/**
 * Spreads `size` colors around the base hue in a uniform space. Slot i gets
 * (lightness[i], chroma(lightness[i]), baseHue + offset[i]) and is gamut mapped to sRGB.
 * Slots are never reordered.
 */
export function generatePalette(request: PaletteRequest): Palette {
  const { base, space, size } = request;
  if (!Number.isInteger(size) || size <= 0) {
    throw new InvalidParameterError("size", `palette size must be a positive integer, got ${size}`);
  }

  const basePolar = toPolar(space, colorToCoords(base, space));
  const lightness = resolveLightness(request.lightness, size);
  const offsets = resolveHueOffsets(request.hue, size);
  const chroma = resolveChroma(request.chroma, lightness, space, basePolar.chroma);

  const palette = lightness.map((slotLightness, index) =>
    colorFromRgb(
      polarToSRGB(space, {
        lightness: slotLightness,
        chroma: Math.max(0, chroma[index] ?? 0),
        hue: normalizeHue(basePolar.hue + (offsets[index] ?? 0)),
      })
    )
  );

  return Object.freeze(palette);
}
