export interface Rgb {
  red: number;
  green: number;
  blue: number;
}

/** sRGB channels as gamma-encoded floats; 0..1 when in gamut, unbounded otherwise. */
export type RgbFloat = readonly [number, number, number];

export type Coords = readonly [number, number, number];

export type ColorSpaceId = "lab" | "oklab" | "jzazbz" | "hsv";

export interface PolarColor {
  lightness: number;
  chroma: number;
  /** Degrees. */
  hue: number;
}

export interface ColorSpaceDefinition {
  id: ColorSpaceId;
  label: string;
  lightnessRange: readonly [number, number];
  fromRgb: (rgb: RgbFloat) => Coords;
  toRgb: (coords: Coords) => RgbFloat;
  toPolar: (coords: Coords) => PolarColor;
  fromPolar: (polar: PolarColor) => Coords;
}

export interface Color {
  readonly oklab: Coords;
}

export type Palette = readonly Color[];
