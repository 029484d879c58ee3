import { colorToHex } from "@/lib/color/color";
import {
  MissingExtraError,
  PaletteSizeMismatchError,
  TemplateParseError,
} from "@/lib/errors";
import { FrozenMap } from "@/lib/frozen-map";
import { buildTheme, type Theme } from "@/lib/theme/theme";

export const DEFAULT_TEMPLATE_PALETTE_SIZE = 16;

const TOKEN_CHAR_RE = /[A-Za-z0-9_]/;
const EXTRA_NAME_RE = /^[A-Za-z0-9_]+$/;
const HEX_INDEX_RE = /^HEX(\d+)$/;

export type TemplateSegment =
  | { kind: "literal"; text: string }
  | { kind: "name" }
  | { kind: "hex"; index: number }
  | { kind: "accent" }
  | { kind: "extra"; key: string };

export interface ExporterTemplate {
  readonly name: string;
  /** Where the rendered file conventionally lives; null when the source gives none. */
  readonly path: string | null;
  readonly paletteSize: number;
  readonly declaredExtras: readonly string[];
  /** Slots the template source suggests for its extras. */
  readonly suggestedExtras: ReadonlyMap<string, number>;
  readonly body: string;
  readonly segments: readonly TemplateSegment[];
}

export interface ParseTemplateOptions {
  name?: string;
  paletteSize?: number;
}

export interface RenderedExport {
  name: string;
  path: string | null;
  text: string;
}

export type DeclaredExtras = Iterable<string> | ReadonlyMap<string, number>;

function positionAt(text: string, offset: number): { line: number; column: number } {
  let line = 1;
  let column = 1;
  for (let index = 0; index < offset; index += 1) {
    if (text[index] === "\n") {
      line += 1;
      column = 1;
    } else {
      column += 1;
    }
  }
  return { line, column };
}

function isDeclarationMap(value: DeclaredExtras): value is ReadonlyMap<string, number> {
  return value instanceof Map || value instanceof FrozenMap;
}

function normalizeDeclarations(
  templateName: string,
  declared: DeclaredExtras,
  paletteSize: number
): { names: string[]; suggested: Map<string, number> } {
  const names: string[] = [];
  const suggested = new Map<string, number>();
  const entries: Array<[string, number | null]> = isDeclarationMap(declared)
    ? [...declared.entries()]
    : [...declared].map((name): [string, null] => [name, null]);

  for (const [name, slot] of entries) {
    if (!EXTRA_NAME_RE.test(name)) {
      throw new TemplateParseError(
        templateName,
        `extra "${name}" must use only letters, digits and underscores`
      );
    }
    if (name === "ACC") {
      throw new TemplateParseError(templateName, 'extra "ACC" collides with {ACCHEX}');
    }
    if (suggested.has(name) || names.includes(name)) {
      throw new TemplateParseError(templateName, `extra "${name}" is declared twice`);
    }
    if (slot !== null) {
      if (!Number.isInteger(slot) || slot < 0 || slot >= paletteSize) {
        throw new TemplateParseError(
          templateName,
          `extra "${name}" suggests slot ${slot}, palette has ${paletteSize} colors`
        );
      }
      suggested.set(name, slot);
    }
    names.push(name);
  }

  return { names, suggested };
}

/** True when a `}` ends the span starting at `from` before another `{` or the end of the line. */
function closesSpan(text: string, from: number): boolean {
  for (let index = from; index < text.length; index += 1) {
    const char = text[index];
    if (char === "}") return true;
    if (char === "{" || char === "\n") return false;
  }
  return false;
}

function classifyToken(
  token: string,
  declared: ReadonlySet<string>
): TemplateSegment | null {
  if (token === "NAME") return { kind: "name" };
  if (token === "ACCHEX") return { kind: "accent" };

  const hexMatch = token.match(HEX_INDEX_RE);
  if (hexMatch?.[1] !== undefined) {
    return { kind: "hex", index: Number.parseInt(hexMatch[1], 10) };
  }

  if (token.endsWith("HEX")) {
    const key = token.slice(0, -3);
    if (declared.has(key)) return { kind: "extra", key };
  }
  return null;
}

/**
 * Scans `rawText` once, splitting it into literal runs and placeholders.
 * Brace spans that do not match the placeholder grammar stay literal. A
 * placeholder name whose span is never closed on its line is an error.
 */
export function parseTemplate(
  rawText: string,
  declaredExtras: DeclaredExtras,
  destinationPathHint: string | null,
  options: ParseTemplateOptions = {}
): ExporterTemplate {
  const name = options.name ?? "template";
  const paletteSize = options.paletteSize ?? DEFAULT_TEMPLATE_PALETTE_SIZE;
  if (!Number.isInteger(paletteSize) || paletteSize <= 0) {
    throw new TemplateParseError(name, `palette size must be a positive integer, got ${paletteSize}`);
  }

  const { names, suggested } = normalizeDeclarations(name, declaredExtras, paletteSize);
  const declared = new Set(names);
  const segments: TemplateSegment[] = [];
  let literal = "";

  const flushLiteral = () => {
    if (literal) {
      segments.push({ kind: "literal", text: literal });
      literal = "";
    }
  };

  let index = 0;
  while (index < rawText.length) {
    const char = rawText[index] ?? "";
    if (char !== "{") {
      literal += char;
      index += 1;
      continue;
    }

    let end = index + 1;
    while (end < rawText.length && TOKEN_CHAR_RE.test(rawText[end] ?? "")) {
      end += 1;
    }
    const token = rawText.slice(index + 1, end);
    const segment = token ? classifyToken(token, declared) : null;

    if (segment && rawText[end] === "}") {
      if (segment.kind === "hex" && segment.index >= paletteSize) {
        throw new TemplateParseError(
          name,
          `{${token}} is outside a palette of ${paletteSize} colors`,
          positionAt(rawText, index)
        );
      }
      flushLiteral();
      segments.push(segment);
      index = end + 1;
      continue;
    }

    if (segment && !closesSpan(rawText, end)) {
      throw new TemplateParseError(
        name,
        `unterminated placeholder {${token}`,
        positionAt(rawText, index)
      );
    }

    literal += char;
    index += 1;
  }
  flushLiteral();

  return Object.freeze({
    name,
    path: destinationPathHint,
    paletteSize,
    declaredExtras: Object.freeze(names),
    suggestedExtras: new FrozenMap(suggested),
    body: rawText,
    segments: Object.freeze(segments),
  });
}

function assertRenderable(template: ExporterTemplate, theme: Theme): void {
  if (theme.palette.length !== template.paletteSize) {
    throw new PaletteSizeMismatchError(template.name, template.paletteSize, theme.palette.length);
  }
  for (const key of template.declaredExtras) {
    if (!theme.extras.has(key)) {
      throw new MissingExtraError(template.name, key);
    }
  }
}

function hexAt(theme: Theme, index: number): string {
  const color = theme.palette[index];
  if (!color) {
    throw new PaletteSizeMismatchError("theme", index + 1, theme.palette.length);
  }
  return colorToHex(color);
}

/** Substitutes theme values into the template. Substituted text is never scanned again. */
export function render(template: ExporterTemplate, theme: Theme): string {
  assertRenderable(template, theme);

  return template.segments
    .map((segment) => {
      switch (segment.kind) {
        case "literal":
          return segment.text;
        case "name":
          return theme.name;
        case "hex":
          return hexAt(theme, segment.index);
        case "accent":
          return colorToHex(theme.accent);
        case "extra":
          return hexAt(theme, theme.extras.get(segment.key) ?? -1);
      }
    })
    .join("");
}

export function renderExport(template: ExporterTemplate, theme: Theme): RenderedExport {
  return { name: template.name, path: template.path, text: render(template, theme) };
}

/**
 * Returns a new theme that also carries the template's suggested slots for any
 * extras it lacks. Existing theme extras win.
 */
export function adoptTemplateExtras(theme: Theme, template: ExporterTemplate): Theme {
  const extras = new Map(template.suggestedExtras);
  for (const [key, slot] of theme.extras) {
    extras.set(key, slot);
  }
  return buildTheme(theme.name, theme.palette, theme.accent, extras);
}
