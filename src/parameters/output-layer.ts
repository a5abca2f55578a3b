import path from "node:path";
import { z } from "zod";
import type { OutputDefaults } from "../core/config.js";
import { VALID, invalid, type ParameterValidation } from "./types.js";

/** Destination of a produced artifact. */
export interface OutputLayerInfo {
  /** File path for disk output, display name for memory layers. */
  name: string;
  memoryLayer: boolean;
  overwrite: boolean;
  addToMap: boolean;
}

export const OutputLayerInfoSchema = z
  .object({
    name: z.string(),
    memoryLayer: z.boolean(),
    overwrite: z.boolean(),
    addToMap: z.boolean(),
  })
  .partial()
  .strict();

export const DEFAULT_OUTPUT: OutputDefaults = {
  memoryLayer: false,
  overwrite: false,
  addToMap: true,
};

export function createOutputLayerInfo(
  partial: Partial<OutputLayerInfo> = {},
  defaults: OutputDefaults = DEFAULT_OUTPUT
): OutputLayerInfo {
  return {
    name: partial.name ?? "",
    memoryLayer: partial.memoryLayer ?? defaults.memoryLayer,
    overwrite: partial.overwrite ?? defaults.overwrite,
    addToMap: partial.addToMap ?? defaults.addToMap,
  };
}

export function validateOutputLayerInfo(info: OutputLayerInfo): ParameterValidation {
  const name = info.name.trim();
  if (name === "") {
    return invalid("Output name is not specified.");
  }
  if (info.memoryLayer) {
    return VALID;
  }
  if (name.endsWith("/") || name.endsWith("\\")) {
    return invalid(`Output filename points to a directory: ${name}`);
  }
  if (path.extname(name) === "") {
    return invalid(`Output filename must have an extension: ${name}`);
  }
  return VALID;
}
