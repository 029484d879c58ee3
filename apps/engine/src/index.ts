export type {
  Color,
  ColorSpaceDefinition,
  ColorSpaceId,
  Coords,
  Palette,
  PolarColor,
  Rgb,
  RgbFloat,
} from "@/lib/color/types";
export {
  clamp,
  hexToRgb,
  hueDistance,
  mixPolar,
  normalizeHexColor,
  normalizeHue,
  rgbToHex,
} from "@/lib/color/color-math";
export {
  COLOR_SPACE_IDS,
  COLOR_SPACES,
  getColorSpace,
  isColorSpaceId,
} from "@/lib/color/color-spaces";
export { fromPolar, fromSRGB, isInGamut, mapToGamut, toPolar, toSRGB } from "@/lib/color/gamut";
export {
  colorFromCoords,
  colorFromHex,
  colorFromRgb,
  colorsEqual,
  colorToCoords,
  colorToHex,
  colorToRgb,
} from "@/lib/color/color";

export type {
  ChromaPolicy,
  HuePolicy,
  LightnessCurve,
  PaletteRequest,
} from "@/lib/palette/palette-generator";
export { generatePalette } from "@/lib/palette/palette-generator";
export type { TerminalThemeSettings } from "@/lib/palette/terminal-palette";
export {
  parseTerminalSettings,
  serializeTerminalSettings,
} from "@/lib/palette/terminal-settings-preset";
export {
  buildTerminalPalette,
  createTerminalSettings,
  DEFAULT_TERMINAL_SETTINGS,
  defaultTerminalSettings,
  generateTerminalTheme,
  TERMINAL_PALETTE_SIZE,
} from "@/lib/palette/terminal-palette";

export type { ExtrasInput, Theme, ThemeExtras, ThemePatch } from "@/lib/theme/theme";
export { buildTheme, extrasToRecord, setPaletteColor, updateTheme } from "@/lib/theme/theme";
export type { ThemePresetDocument } from "@/lib/theme/theme-preset";
export {
  findDuplicateJsonKey,
  parseThemePreset,
  serializeThemePreset,
  themeToPreset,
} from "@/lib/theme/theme-preset";

export type {
  DeclaredExtras,
  ExporterTemplate,
  ParseTemplateOptions,
  RenderedExport,
  TemplateSegment,
} from "@/lib/exporters/exporter-template";
export {
  adoptTemplateExtras,
  DEFAULT_TEMPLATE_PALETTE_SIZE,
  parseTemplate,
  render,
  renderExport,
} from "@/lib/exporters/exporter-template";
export type { TemplateSourceDocument } from "@/lib/exporters/template-source";
export { parseTemplateSource } from "@/lib/exporters/template-source";
export type { CreateExporterRegistryOptions } from "@/lib/exporters/exporter-registry";
export {
  BUILTIN_EXPORTERS_DIRECTORY,
  createExporterRegistry,
  ExporterRegistry,
  loadBuiltinExporters,
  loadExporterDirectory,
} from "@/lib/exporters/exporter-registry";

export {
  DEFAULT_COLOR_SPACE,
  getDefaultColorSpace,
  getExportersDirectory,
  shouldSkipBuiltinExporters,
} from "@/lib/config";
export * from "@/lib/errors";
export { FrozenMap } from "@/lib/frozen-map";
