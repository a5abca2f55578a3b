import { validateOutputLayerInfo } from "./output-layer.js";
import {
  VALID,
  invalid,
  type NumericParameter,
  type Parameter,
  type ParameterValidation,
  type ValueParameter,
} from "./types.js";

function validateNumeric(parameter: NumericParameter): ParameterValidation {
  const value = parameter.value ?? parameter.defaultValue;
  if (value === undefined) {
    return parameter.required ? invalid(`${parameter.displayName} is required.`) : VALID;
  }
  if (!Number.isFinite(value)) {
    return invalid(`${parameter.displayName} must be a finite number.`);
  }
  if (parameter.kind === "integer" && !Number.isInteger(value)) {
    return invalid(`${parameter.displayName} must be a whole number.`);
  }

  const { minValue, maxValue } = parameter;
  if (minValue !== undefined && maxValue !== undefined) {
    if (value < minValue || value > maxValue) {
      return invalid(`${parameter.displayName} must be between ${minValue} and ${maxValue}.`);
    }
  } else if (minValue !== undefined && value < minValue) {
    return invalid(`${parameter.displayName} must be at least ${minValue}.`);
  } else if (maxValue !== undefined && value > maxValue) {
    return invalid(`${parameter.displayName} must be at most ${maxValue}.`);
  }
  return VALID;
}

function validateValue(parameter: ValueParameter): ParameterValidation {
  switch (parameter.kind) {
    case "integer":
    case "double":
      return validateNumeric(parameter);
    case "string": {
      const value = parameter.value ?? parameter.defaultValue;
      if (parameter.required && (value === undefined || value.trim() === "")) {
        return invalid(`${parameter.displayName} is required.`);
      }
      return VALID;
    }
    case "boolean":
      return VALID;
  }
}

/**
 * Validates a single parameter. Layer parameters carry no checks here; the
 * selection is resolved by the tool at run time.
 */
export function validateParameter(parameter: Parameter): ParameterValidation {
  switch (parameter.kind) {
    case "outputLayer":
      return validateOutputLayerInfo(parameter.value);
    case "layer":
      return VALID;
    default:
      return validateValue(parameter);
  }
}
