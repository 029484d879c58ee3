import { readdir, readFile } from "node:fs/promises";
import { extname, join } from "node:path";
import { fileURLToPath } from "node:url";

import { getExportersDirectory, shouldSkipBuiltinExporters } from "@/lib/config";
import { UnknownExporterError } from "@/lib/errors";
import { render, type ExporterTemplate } from "@/lib/exporters/exporter-template";
import { parseTemplateSource } from "@/lib/exporters/template-source";
import type { Theme } from "@/lib/theme/theme";

export const BUILTIN_EXPORTERS_DIRECTORY = fileURLToPath(
  new URL("../../../builtins", import.meta.url)
);

export class ExporterRegistry {
  private readonly templates = new Map<string, ExporterTemplate>();

  constructor(templates: Iterable<ExporterTemplate> = []) {
    for (const template of templates) {
      this.register(template);
    }
  }

  /** Later registrations replace earlier ones with the same name. */
  register(template: ExporterTemplate): void {
    this.templates.set(template.name, template);
  }

  get(name: string): ExporterTemplate | null {
    return this.templates.get(name) ?? null;
  }

  require(name: string): ExporterTemplate {
    const template = this.templates.get(name);
    if (!template) {
      throw new UnknownExporterError(name);
    }
    return template;
  }

  names(): string[] {
    return [...this.templates.keys()].sort();
  }

  list(): ExporterTemplate[] {
    return this.names().map((name) => this.require(name));
  }

  render(name: string, theme: Theme): string {
    return render(this.require(name), theme);
  }
}

const isMissingDirectory = (error: unknown): boolean =>
  error instanceof Error && "code" in error && (error.code === "ENOENT" || error.code === "ENOTDIR");

/**
 * Loads every `*.json` exporter document in `directory`, in file-name order.
 * Documents that cannot be read or parsed are skipped with a warning.
 */
export async function loadExporterDirectory(directory: string): Promise<ExporterTemplate[]> {
  let entries: string[];
  try {
    entries = await readdir(directory);
  } catch (error) {
    if (isMissingDirectory(error)) return [];
    throw error;
  }

  const templates: ExporterTemplate[] = [];
  for (const entry of entries.filter((file) => extname(file) === ".json").sort()) {
    const filePath = join(directory, entry);
    try {
      const text = await readFile(filePath, "utf8");
      templates.push(parseTemplateSource(text, { origin: entry }));
    } catch (error) {
      console.warn(`[huekit:exporters] Skipping ${filePath}`, error);
    }
  }
  return templates;
}

export function loadBuiltinExporters(): Promise<ExporterTemplate[]> {
  return loadExporterDirectory(BUILTIN_EXPORTERS_DIRECTORY);
}

export interface CreateExporterRegistryOptions {
  /** Defaults to the configured exporters directory; null skips user documents. */
  userDirectory?: string | null;
  includeBuiltins?: boolean;
  env?: NodeJS.ProcessEnv;
}

export async function createExporterRegistry(
  options: CreateExporterRegistryOptions = {}
): Promise<ExporterRegistry> {
  const env = options.env ?? process.env;
  const includeBuiltins = options.includeBuiltins ?? !shouldSkipBuiltinExporters(env);
  const userDirectory =
    options.userDirectory === undefined ? getExportersDirectory(env) : options.userDirectory;

  const registry = new ExporterRegistry(includeBuiltins ? await loadBuiltinExporters() : []);
  if (userDirectory) {
    for (const template of await loadExporterDirectory(userDirectory)) {
      registry.register(template);
    }
  }
  return registry;
}
