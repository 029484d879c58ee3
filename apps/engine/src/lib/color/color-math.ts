import type { PolarColor, Rgb, RgbFloat } from "@/lib/color/types";

const HEX_RE = /^#?([0-9a-fA-F]{3}|[0-9a-fA-F]{6}|[0-9a-fA-F]{8})$/;

export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

/** Returns six lowercase hex digits without `#`, or null. Alpha digits are dropped. */
export function normalizeHexColor(value: string): string | null {
  const trimmed = value.trim();
  const match = trimmed.match(HEX_RE);
  if (!match) return null;

  const raw = match[1];
  if (!raw) return null;

  const six =
    raw.length === 3
      ? `${raw[0]}${raw[0]}${raw[1]}${raw[1]}${raw[2]}${raw[2]}`
      : raw.length === 8
        ? raw.slice(0, 6)
        : raw;
  return six.toLowerCase();
}

export function toHexByte(value: number): string {
  return clamp(Math.round(value), 0, 255).toString(16).padStart(2, "0");
}

export function rgbToHex(rgb: Rgb): string {
  return `${toHexByte(rgb.red)}${toHexByte(rgb.green)}${toHexByte(rgb.blue)}`;
}

export function hexToRgb(value: string): Rgb | null {
  const hex = normalizeHexColor(value);
  if (!hex) return null;

  return {
    red: parseInt(hex.slice(0, 2), 16),
    green: parseInt(hex.slice(2, 4), 16),
    blue: parseInt(hex.slice(4, 6), 16),
  };
}

export function rgbToFloat(rgb: Rgb): RgbFloat {
  return [rgb.red / 255, rgb.green / 255, rgb.blue / 255];
}

export function quantizeChannel(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.round(clamp(value, 0, 1) * 255);
}

export function quantizeRgb(rgb: RgbFloat): Rgb {
  return {
    red: quantizeChannel(rgb[0]),
    green: quantizeChannel(rgb[1]),
    blue: quantizeChannel(rgb[2]),
  };
}

// Transfer functions are mirrored around zero so out-of-gamut values stay monotonic.
export function srgbToLinear(channel: number): number {
  const magnitude = Math.abs(channel);
  const linear = magnitude <= 0.04045 ? magnitude / 12.92 : ((magnitude + 0.055) / 1.055) ** 2.4;
  return channel < 0 ? -linear : linear;
}

export function linearToSrgb(channel: number): number {
  const magnitude = Math.abs(channel);
  const encoded = magnitude <= 0.0031308 ? magnitude * 12.92 : 1.055 * magnitude ** (1 / 2.4) - 0.055;
  return channel < 0 ? -encoded : encoded;
}

export function normalizeHue(hue: number): number {
  if (!Number.isFinite(hue)) return 0;
  const wrapped = hue % 360;
  return wrapped < 0 ? wrapped + 360 : wrapped;
}

export function hueDistance(first: number, second: number): number {
  const delta = Math.abs(normalizeHue(first) - normalizeHue(second));
  return delta > 180 ? 360 - delta : delta;
}

/** Lightness and chroma mix linearly; hue travels the shorter arc. */
export function mixPolar(first: PolarColor, second: PolarColor, ratio: number): PolarColor {
  const t = clamp(ratio, 0, 1);
  let delta = normalizeHue(second.hue) - normalizeHue(first.hue);
  if (delta > 180) delta -= 360;
  if (delta < -180) delta += 360;

  return {
    lightness: first.lightness + (second.lightness - first.lightness) * t,
    chroma: first.chroma + (second.chroma - first.chroma) * t,
    hue: normalizeHue(first.hue + delta * t),
  };
}
