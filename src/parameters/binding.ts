import { z } from "zod";
import { createOutputLayerInfo, OutputLayerInfoSchema } from "./output-layer.js";
import {
  VALID,
  invalid,
  isNumericParameter,
  type Parameter,
  type ParameterValidation,
} from "./types.js";

export interface RangeDeclaration {
  minimum: number;
  maximum: number;
}

/**
 * Projects declared bounds onto a numeric parameter. Integer parameters take
 * the bounds truncated toward zero; other kinds ignore the range.
 */
export function applyRange(parameter: Parameter, range: RangeDeclaration): void {
  if (!isNumericParameter(parameter)) return;
  if (parameter.kind === "integer") {
    parameter.minValue = Math.trunc(range.minimum);
    parameter.maxValue = Math.trunc(range.maximum);
  } else {
    parameter.minValue = range.minimum;
    parameter.maxValue = range.maximum;
  }
}

const finiteNumber = z.number().finite();

function describeIssue(error: z.ZodError): string {
  return error.issues.map((issue) => issue.message).join("; ");
}

/** Binds a declared default onto any parameter kind, checking it fits. */
export function setDefaultValue(parameter: Parameter, raw: unknown): ParameterValidation {
  switch (parameter.kind) {
    case "integer": {
      const parsed = finiteNumber.safeParse(raw);
      if (!parsed.success) return invalid(`Invalid default for ${parameter.name}: ${describeIssue(parsed.error)}`);
      parameter.defaultValue = Math.trunc(parsed.data);
      parameter.value = parameter.defaultValue;
      return VALID;
    }
    case "double": {
      const parsed = finiteNumber.safeParse(raw);
      if (!parsed.success) return invalid(`Invalid default for ${parameter.name}: ${describeIssue(parsed.error)}`);
      parameter.defaultValue = parsed.data;
      parameter.value = parsed.data;
      return VALID;
    }
    case "string": {
      const parsed = z.string().safeParse(raw);
      if (!parsed.success) return invalid(`Invalid default for ${parameter.name}: ${describeIssue(parsed.error)}`);
      parameter.defaultValue = parsed.data;
      parameter.value = parsed.data;
      return VALID;
    }
    case "boolean": {
      const parsed = z.boolean().safeParse(raw);
      if (!parsed.success) return invalid(`Invalid default for ${parameter.name}: ${describeIssue(parsed.error)}`);
      parameter.defaultValue = parsed.data;
      parameter.value = parsed.data;
      return VALID;
    }
    case "outputLayer": {
      const parsed = OutputLayerInfoSchema.safeParse(raw);
      if (!parsed.success) return invalid(`Invalid default for ${parameter.name}: ${describeIssue(parsed.error)}`);
      const info = createOutputLayerInfo({ ...parameter.value, ...parsed.data });
      parameter.defaultValue = info;
      parameter.value = { ...info };
      return VALID;
    }
    case "layer":
      return invalid(`Layer parameter ${parameter.name} does not accept a default value`);
  }
}
