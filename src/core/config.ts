import fs from "node:fs";
import path from "node:path";
import { z } from "zod";

export const DEFAULT_SIDECAR_EXTENSIONS = [
  ".shx",
  ".dbf",
  ".prj",
  ".cpg",
  ".sbn",
  ".sbx",
  ".qix",
  ".mwd",
  ".mwx",
] as const;

const OutputDefaultsSchema = z.object({
  memoryLayer: z.boolean().default(false),
  overwrite: z.boolean().default(false),
  addToMap: z.boolean().default(true),
});

const ToolboxConfigSchema = z.object({
  logLevel: z.enum(["debug", "info", "warn", "error", "silent"]).default("info"),
  output: OutputDefaultsSchema.default({}),
  sidecarExtensions: z
    .array(z.string().regex(/^\.[A-Za-z0-9_]+$/, "extensions start with a dot"))
    .default([...DEFAULT_SIDECAR_EXTENSIONS]),
});

export type ToolboxConfig = z.infer<typeof ToolboxConfigSchema>;
export type OutputDefaults = z.infer<typeof OutputDefaultsSchema>;

export const DEFAULT_CONFIG_FILENAME = "geotool.config.json";

export function loadToolboxConfig(raw: unknown): ToolboxConfig {
  return ToolboxConfigSchema.parse(raw);
}

export function readToolboxConfig(file: string): ToolboxConfig {
  const text = fs.readFileSync(file, "utf-8");
  return loadToolboxConfig(JSON.parse(text));
}

/** Walks up from `startDir` and loads the first config file found. */
export function findToolboxConfig(startDir: string, filename = DEFAULT_CONFIG_FILENAME): ToolboxConfig | null {
  let dir = path.resolve(startDir);
  while (true) {
    const candidate = path.join(dir, filename);
    if (fs.existsSync(candidate)) return readToolboxConfig(candidate);
    const parent = path.dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }
  return null;
}
