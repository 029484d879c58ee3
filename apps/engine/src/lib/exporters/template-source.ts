import { TemplateParseError } from "@/lib/errors";
import {
  parseTemplate,
  type ExporterTemplate,
} from "@/lib/exporters/exporter-template";

export interface TemplateSourceDocument {
  name: string;
  path?: string;
  extras?: Record<string, number>;
  formatter: string;
}

export interface ParseTemplateSourceOptions {
  /** Used in errors before the document's own name is known, e.g. the file name. */
  origin?: string;
  paletteSize?: number;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

function parseExtras(origin: string, value: unknown): Map<string, number> {
  const extras = new Map<string, number>();
  if (value === undefined) return extras;
  if (!isRecord(value)) {
    throw new TemplateParseError(origin, "extras must map names to palette slots");
  }

  for (const [key, slot] of Object.entries(value)) {
    if (typeof slot !== "number") {
      throw new TemplateParseError(origin, `extra "${key}" must name a palette slot`);
    }
    extras.set(key, slot);
  }
  return extras;
}

/** Reads an exporter document: `{ name, path?, extras?, formatter }`. */
export function parseTemplateSource(
  text: string,
  options: ParseTemplateSourceOptions = {}
): ExporterTemplate {
  const origin = options.origin ?? "exporter";

  let document: unknown;
  try {
    document = JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new TemplateParseError(origin, `not valid JSON: ${reason}`);
  }

  if (!isRecord(document)) {
    throw new TemplateParseError(origin, "exporter document must be a JSON object");
  }

  const name = typeof document.name === "string" ? document.name.trim() : "";
  if (!name) {
    throw new TemplateParseError(origin, "name must be a non-empty string");
  }
  const { formatter, path } = document;
  if (typeof formatter !== "string") {
    throw new TemplateParseError(name, "formatter must be a string");
  }
  if (path !== undefined && typeof path !== "string") {
    throw new TemplateParseError(name, "path must be a string");
  }

  const pathHint = typeof path === "string" ? path : null;
  return parseTemplate(formatter, parseExtras(name, document.extras), pathHint, {
    name,
    paletteSize: options.paletteSize,
  });
}
