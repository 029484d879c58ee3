import os from "node:os";
import { join } from "node:path";

import { isColorSpaceId } from "@/lib/color/color-spaces";
import type { ColorSpaceId } from "@/lib/color/types";

export const DEFAULT_COLOR_SPACE: ColorSpaceId = "lab";

const warnedColorSpaces = new Set<string>();

const readEnv = (env: NodeJS.ProcessEnv, name: string): string => (env[name] ?? "").trim();

export function getExportersDirectory(env: NodeJS.ProcessEnv = process.env): string {
  const explicit = readEnv(env, "HUEKIT_EXPORTERS_DIR");
  if (explicit) return explicit;

  const configHome = readEnv(env, "XDG_CONFIG_HOME") || join(os.homedir(), ".config");
  return join(configHome, "huekit", "exporters");
}

export function getDefaultColorSpace(env: NodeJS.ProcessEnv = process.env): ColorSpaceId {
  const raw = readEnv(env, "HUEKIT_COLOR_SPACE").toLowerCase();
  if (!raw) return DEFAULT_COLOR_SPACE;
  if (isColorSpaceId(raw)) return raw;

  if (!warnedColorSpaces.has(raw)) {
    warnedColorSpaces.add(raw);
    console.warn(
      `[huekit:config] unknown HUEKIT_COLOR_SPACE "${raw}", falling back to "${DEFAULT_COLOR_SPACE}"`
    );
  }
  return DEFAULT_COLOR_SPACE;
}

export function shouldSkipBuiltinExporters(env: NodeJS.ProcessEnv = process.env): boolean {
  return /^(1|true)$/i.test(readEnv(env, "HUEKIT_SKIP_BUILTINS"));
}
