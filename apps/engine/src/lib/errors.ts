export type HuekitErrorKind =
  | "invalid_parameter"
  | "invalid_extras"
  | "duplicate_key"
  | "template_parse"
  | "missing_extra"
  | "palette_size_mismatch"
  | "unknown_exporter"
  | "invalid_preset";

export class InvalidParameterError extends Error {
  readonly kind = "invalid_parameter" as const;
  parameter: string;

  constructor(parameter: string, message: string) {
    super(message);
    this.name = "InvalidParameterError";
    this.parameter = parameter;
  }
}

export class InvalidExtrasError extends Error {
  readonly kind = "invalid_extras" as const;
  key: string;
  index: number;
  paletteSize: number;

  constructor(key: string, index: number, paletteSize: number) {
    super(
      key.length === 0
        ? "extras keys must be non-empty"
        : `extra "${key}" points at slot ${index}, palette has ${paletteSize} colors`
    );
    this.name = "InvalidExtrasError";
    this.key = key;
    this.index = index;
    this.paletteSize = paletteSize;
  }
}

export class DuplicateKeyError extends Error {
  readonly kind = "duplicate_key" as const;
  key: string;

  constructor(key: string) {
    super(`duplicate key "${key}"`);
    this.name = "DuplicateKeyError";
    this.key = key;
  }
}

export class TemplateParseError extends Error {
  readonly kind = "template_parse" as const;
  template: string;
  line: number | null;
  column: number | null;

  constructor(template: string, reason: string, position?: { line: number; column: number }) {
    const where = position ? ` at ${position.line}:${position.column}` : "";
    super(`template "${template}"${where}: ${reason}`);
    this.name = "TemplateParseError";
    this.template = template;
    this.line = position?.line ?? null;
    this.column = position?.column ?? null;
  }
}

export class MissingExtraError extends Error {
  readonly kind = "missing_extra" as const;
  template: string;
  key: string;

  constructor(template: string, key: string) {
    super(`exporter "${template}" needs extra "${key}", which the theme does not define`);
    this.name = "MissingExtraError";
    this.template = template;
    this.key = key;
  }
}

export class PaletteSizeMismatchError extends Error {
  readonly kind = "palette_size_mismatch" as const;
  template: string;
  expected: number;
  actual: number;

  constructor(template: string, expected: number, actual: number) {
    super(`exporter "${template}" expects ${expected} palette colors, theme has ${actual}`);
    this.name = "PaletteSizeMismatchError";
    this.template = template;
    this.expected = expected;
    this.actual = actual;
  }
}

export class UnknownExporterError extends Error {
  readonly kind = "unknown_exporter" as const;
  exporter: string;

  constructor(exporter: string) {
    super(`unknown exporter "${exporter}"`);
    this.name = "UnknownExporterError";
    this.exporter = exporter;
  }
}

export class InvalidPresetError extends Error {
  readonly kind = "invalid_preset" as const;
  field: string;

  constructor(field: string, message: string) {
    super(message);
    this.name = "InvalidPresetError";
    this.field = field;
  }
}

export type HuekitError =
  | InvalidParameterError
  | InvalidExtrasError
  | DuplicateKeyError
  | TemplateParseError
  | MissingExtraError
  | PaletteSizeMismatchError
  | UnknownExporterError
  | InvalidPresetError;

export const isHuekitError = (error: unknown): error is HuekitError =>
  error instanceof InvalidParameterError ||
  error instanceof InvalidExtrasError ||
  error instanceof DuplicateKeyError ||
  error instanceof TemplateParseError ||
  error instanceof MissingExtraError ||
  error instanceof PaletteSizeMismatchError ||
  error instanceof UnknownExporterError ||
  error instanceof InvalidPresetError;
