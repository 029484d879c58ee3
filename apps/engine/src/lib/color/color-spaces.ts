import { linearToSrgb, normalizeHue, srgbToLinear } from "@/lib/color/color-math";
import type {
  ColorSpaceDefinition,
  ColorSpaceId,
  Coords,
  PolarColor,
  RgbFloat,
} from "@/lib/color/types";

type Matrix3 = readonly [Coords, Coords, Coords];

function multiply(matrix: Matrix3, vector: Coords): Coords {
  const [x, y, z] = vector;
  const [r0, r1, r2] = matrix;
  return [
    r0[0] * x + r0[1] * y + r0[2] * z,
    r1[0] * x + r1[1] * y + r1[2] * z,
    r2[0] * x + r2[1] * y + r2[2] * z,
  ];
}

function invert(matrix: Matrix3): Matrix3 {
  const [[a, b, c], [d, e, f], [g, h, i]] = matrix;
  const co00 = e * i - f * h;
  const co01 = f * g - d * i;
  const co02 = d * h - e * g;
  const det = a * co00 + b * co01 + c * co02;
  return [
    [co00 / det, (c * h - b * i) / det, (b * f - c * e) / det],
    [co01 / det, (a * i - c * g) / det, (c * d - a * f) / det],
    [co02 / det, (b * g - a * h) / det, (a * e - b * d) / det],
  ];
}

function spow(value: number, exponent: number): number {
  return Math.sign(value) * Math.abs(value) ** exponent;
}

const decode = (rgb: RgbFloat): Coords => [
  srgbToLinear(rgb[0]),
  srgbToLinear(rgb[1]),
  srgbToLinear(rgb[2]),
];

const encode = (linear: Coords): RgbFloat => [
  linearToSrgb(linear[0]),
  linearToSrgb(linear[1]),
  linearToSrgb(linear[2]),
];

// Linear sRGB <-> CIE XYZ, D65.
const LINEAR_SRGB_TO_XYZ: Matrix3 = [
  [0.41239079926595934, 0.357584339383878, 0.1804807884018343],
  [0.21263900587151027, 0.715168678767756, 0.07219231536073371],
  [0.01933081871559182, 0.11919477979462598, 0.9505321522496607],
];

const XYZ_TO_LINEAR_SRGB = invert(LINEAR_SRGB_TO_XYZ);

const D65_WHITE: Coords = [0.3127 / 0.329, 1, (1 - 0.3127 - 0.329) / 0.329];

// --- CIE Lab -----------------------------------------------------------------

const LAB_EPSILON = 216 / 24389;
const LAB_KAPPA = 24389 / 27;

function labForward(t: number): number {
  return t > LAB_EPSILON ? Math.cbrt(t) : (LAB_KAPPA * t + 16) / 116;
}

function labFromRgb(rgb: RgbFloat): Coords {
  const [x, y, z] = multiply(LINEAR_SRGB_TO_XYZ, decode(rgb));
  const fx = labForward(x / D65_WHITE[0]);
  const fy = labForward(y / D65_WHITE[1]);
  const fz = labForward(z / D65_WHITE[2]);
  return [116 * fy - 16, 500 * (fx - fy), 200 * (fy - fz)];
}

function labToRgb(coords: Coords): RgbFloat {
  const [lightness, a, b] = coords;
  const fy = (lightness + 16) / 116;
  const fx = fy + a / 500;
  const fz = fy - b / 200;

  const fx3 = fx ** 3;
  const fz3 = fz ** 3;
  const x = fx3 > LAB_EPSILON ? fx3 : (116 * fx - 16) / LAB_KAPPA;
  const y = lightness > LAB_KAPPA * LAB_EPSILON ? fy ** 3 : lightness / LAB_KAPPA;
  const z = fz3 > LAB_EPSILON ? fz3 : (116 * fz - 16) / LAB_KAPPA;

  return encode(
    multiply(XYZ_TO_LINEAR_SRGB, [x * D65_WHITE[0], y * D65_WHITE[1], z * D65_WHITE[2]])
  );
}

// --- Oklab ---------------------------------------------------------------------

const OKLAB_LMS: Matrix3 = [
  [0.4122214708, 0.5363325363, 0.0514459929],
  [0.2119034982, 0.6806995451, 0.1073969566],
  [0.0883024619, 0.2817188376, 0.6299787005],
];

const OKLAB_FROM_LMS: Matrix3 = [
  [0.2104542553, 0.793617785, -0.0040720468],
  [1.9779984951, -2.428592205, 0.4505937099],
  [0.0259040371, 0.7827717662, -0.808675766],
];

const OKLAB_TO_LMS: Matrix3 = [
  [1, 0.3963377774, 0.2158037573],
  [1, -0.1055613458, -0.0638541728],
  [1, -0.0894841775, -1.291485548],
];

const OKLAB_LMS_TO_LINEAR: Matrix3 = [
  [4.0767416621, -3.3077115913, 0.2309699292],
  [-1.2684380046, 2.6097574011, -0.3413193965],
  [-0.0041960863, -0.7034186147, 1.707614701],
];

export function linearToOklab(linear: Coords): Coords {
  const [l, m, s] = multiply(OKLAB_LMS, linear);
  return multiply(OKLAB_FROM_LMS, [Math.cbrt(l), Math.cbrt(m), Math.cbrt(s)]);
}

export function oklabToLinear(coords: Coords): Coords {
  const [l, m, s] = multiply(OKLAB_TO_LMS, coords);
  return multiply(OKLAB_LMS_TO_LINEAR, [l ** 3, m ** 3, s ** 3]);
}

// --- JzAzBz --------------------------------------------------------------------

// Relative XYZ is scaled to absolute luminance with an SDR reference white.
const JZ_WHITE_LUMINANCE = 203;
const JZ_B = 1.15;
const JZ_G = 0.66;
const JZ_D = -0.56;
const JZ_D0 = 1.6295499532821566e-11;
const PQ_C1 = 3424 / 4096;
const PQ_C2 = 2413 / 128;
const PQ_C3 = 2392 / 128;
const PQ_N = 2610 / 16384;
const PQ_P = (1.7 * 2523) / 32;

const JZ_XYZ_TO_LMS: Matrix3 = [
  [0.41478972, 0.579999, 0.014648],
  [-0.20151, 1.120649, 0.0531008],
  [-0.0166008, 0.2648, 0.6684799],
];

const JZ_LMS_TO_XYZ = invert(JZ_XYZ_TO_LMS);

const JZ_LMS_TO_IAB: Matrix3 = [
  [0.5, 0.5, 0],
  [3.524, -4.066708, 0.542708],
  [0.199076, 1.096799, -1.295875],
];

const JZ_IAB_TO_LMS = invert(JZ_LMS_TO_IAB);

function pqEncode(value: number): number {
  const scaled = spow(value / 10000, PQ_N);
  return spow((PQ_C1 + PQ_C2 * scaled) / (1 + PQ_C3 * scaled), PQ_P);
}

function pqDecode(value: number): number {
  const root = spow(value, 1 / PQ_P);
  return 10000 * spow((PQ_C1 - root) / (PQ_C3 * root - PQ_C2), 1 / PQ_N);
}

function jzazbzFromRgb(rgb: RgbFloat): Coords {
  const relative = multiply(LINEAR_SRGB_TO_XYZ, decode(rgb));
  const x = relative[0] * JZ_WHITE_LUMINANCE;
  const y = relative[1] * JZ_WHITE_LUMINANCE;
  const z = relative[2] * JZ_WHITE_LUMINANCE;
  const xp = JZ_B * x - (JZ_B - 1) * z;
  const yp = JZ_G * y - (JZ_G - 1) * x;

  const [l, m, s] = multiply(JZ_XYZ_TO_LMS, [xp, yp, z]);
  const [iz, az, bz] = multiply(JZ_LMS_TO_IAB, [pqEncode(l), pqEncode(m), pqEncode(s)]);
  const jz = ((1 + JZ_D) * iz) / (1 + JZ_D * iz) - JZ_D0;
  return [jz, az, bz];
}

function jzazbzToRgb(coords: Coords): RgbFloat {
  const [jz, az, bz] = coords;
  const iz = (jz + JZ_D0) / (1 + JZ_D - JZ_D * (jz + JZ_D0));
  const [lp, mp, sp] = multiply(JZ_IAB_TO_LMS, [iz, az, bz]);
  const [xp, yp, z] = multiply(JZ_LMS_TO_XYZ, [pqDecode(lp), pqDecode(mp), pqDecode(sp)]);

  const x = (xp + (JZ_B - 1) * z) / JZ_B;
  const y = (yp + (JZ_G - 1) * x) / JZ_G;

  return encode(
    multiply(XYZ_TO_LINEAR_SRGB, [
      x / JZ_WHITE_LUMINANCE,
      y / JZ_WHITE_LUMINANCE,
      z / JZ_WHITE_LUMINANCE,
    ])
  );
}

const JZ_WHITE = jzazbzFromRgb([1, 1, 1])[0];

// --- HSV -------------------------------------------------------------------------

function hsvFromRgb(rgb: RgbFloat): Coords {
  const [red, green, blue] = rgb;
  const max = Math.max(red, green, blue);
  const min = Math.min(red, green, blue);
  const delta = max - min;

  let hue = 0;
  if (delta !== 0) {
    if (max === red) {
      hue = ((green - blue) / delta) % 6;
    } else if (max === green) {
      hue = (blue - red) / delta + 2;
    } else {
      hue = (red - green) / delta + 4;
    }
    hue *= 60;
    if (hue < 0) hue += 360;
  }

  const saturation = max === 0 ? 0 : delta / max;
  return [hue, saturation * 100, max * 100];
}

function hsvToRgb(coords: Coords): RgbFloat {
  const hue = normalizeHue(coords[0]);
  // Negative saturation would mirror the hue instead of leaving the gamut.
  const saturation = Math.max(0, coords[1]) / 100;
  const value = coords[2] / 100;

  const chroma = value * saturation;
  const sector = hue / 60;
  const x = chroma * (1 - Math.abs((sector % 2) - 1));
  const m = value - chroma;

  let channels: Coords;
  if (sector < 1) channels = [chroma, x, 0];
  else if (sector < 2) channels = [x, chroma, 0];
  else if (sector < 3) channels = [0, chroma, x];
  else if (sector < 4) channels = [0, x, chroma];
  else if (sector < 5) channels = [x, 0, chroma];
  else channels = [chroma, 0, x];

  return [channels[0] + m, channels[1] + m, channels[2] + m];
}

// --- Polar accessors ---------------------------------------------------------

function cartesianToPolar(coords: Coords): PolarColor {
  const [lightness, a, b] = coords;
  return {
    lightness,
    chroma: Math.hypot(a, b),
    hue: normalizeHue((Math.atan2(b, a) * 180) / Math.PI),
  };
}

function polarToCartesian(polar: PolarColor): Coords {
  const radians = (normalizeHue(polar.hue) * Math.PI) / 180;
  return [polar.lightness, polar.chroma * Math.cos(radians), polar.chroma * Math.sin(radians)];
}

export const COLOR_SPACES = {
  lab: {
    id: "lab",
    label: "CIE Lab",
    lightnessRange: [0, 100],
    fromRgb: labFromRgb,
    toRgb: labToRgb,
    toPolar: cartesianToPolar,
    fromPolar: polarToCartesian,
  },
  oklab: {
    id: "oklab",
    label: "Oklab",
    lightnessRange: [0, 1],
    fromRgb: (rgb) => linearToOklab(decode(rgb)),
    toRgb: (coords) => encode(oklabToLinear(coords)),
    toPolar: cartesianToPolar,
    fromPolar: polarToCartesian,
  },
  jzazbz: {
    id: "jzazbz",
    label: "JzAzBz",
    lightnessRange: [0, JZ_WHITE],
    fromRgb: jzazbzFromRgb,
    toRgb: jzazbzToRgb,
    toPolar: cartesianToPolar,
    fromPolar: polarToCartesian,
  },
  hsv: {
    id: "hsv",
    label: "HSV",
    lightnessRange: [0, 100],
    fromRgb: hsvFromRgb,
    toRgb: hsvToRgb,
    toPolar: (coords) => ({ lightness: coords[2], chroma: coords[1], hue: normalizeHue(coords[0]) }),
    fromPolar: (polar) => [normalizeHue(polar.hue), polar.chroma, polar.lightness],
  },
} as const satisfies Record<ColorSpaceId, ColorSpaceDefinition>;

export const COLOR_SPACE_IDS: readonly ColorSpaceId[] = Object.freeze([
  "lab",
  "oklab",
  "jzazbz",
  "hsv",
]);

export const isColorSpaceId = (value: unknown): value is ColorSpaceId =>
  typeof value === "string" && Object.prototype.hasOwnProperty.call(COLOR_SPACES, value);

export function getColorSpace(space: ColorSpaceId): ColorSpaceDefinition {
  return COLOR_SPACES[space];
}
