import type { LayerCollection } from "../types.js";
import type { OutputLayerInfo } from "./output-layer.js";

export type NumericParameterKind = "integer" | "double";
export type ValueParameterKind = NumericParameterKind | "string" | "boolean";
export type ParameterKind = ValueParameterKind | "layer" | "outputLayer";

export const PARAMETER_KINDS = [
  "integer",
  "double",
  "string",
  "boolean",
  "layer",
  "outputLayer",
] as const satisfies readonly ParameterKind[];

export interface ParameterIdentity {
  name: string;
  index: number;
  displayName: string;
  required: boolean;
}

interface BaseParameter<Kind extends ParameterKind> {
  readonly kind: Kind;
  /** Slot identifier the parameter was discovered from. */
  readonly name: string;
  readonly index: number;
  displayName: string;
  required: boolean;
}

interface BaseNumericParameter<Kind extends NumericParameterKind> extends BaseParameter<Kind> {
  value?: number;
  defaultValue?: number;
  minValue?: number;
  maxValue?: number;
}

export type IntegerParameter = BaseNumericParameter<"integer">;
export type DoubleParameter = BaseNumericParameter<"double">;

export interface StringParameter extends BaseParameter<"string"> {
  value?: string;
  defaultValue?: string;
}

export interface BooleanParameter extends BaseParameter<"boolean"> {
  value?: boolean;
  defaultValue?: boolean;
}

export interface LayerParameter extends BaseParameter<"layer"> {
  /** Handle of the selected layer within the bound collection. */
  value?: number;
  layers?: LayerCollection;
}

export interface OutputLayerParameter extends BaseParameter<"outputLayer"> {
  value: OutputLayerInfo;
  defaultValue?: OutputLayerInfo;
}

export type NumericParameter = IntegerParameter | DoubleParameter;
export type ValueParameter = NumericParameter | StringParameter | BooleanParameter;

export type Parameter = ValueParameter | LayerParameter | OutputLayerParameter;

export type ParameterOf<Kind extends ParameterKind> = Extract<Parameter, { kind: Kind }>;

export type ParameterValidation = { ok: true } | { ok: false; message: string };

export const VALID: ParameterValidation = { ok: true };

export function invalid(message: string): ParameterValidation {
  return { ok: false, message };
}

export function isParameterOfKind<Kind extends ParameterKind>(
  parameter: Parameter,
  kind: Kind
): parameter is ParameterOf<Kind> {
  return parameter.kind === kind;
}

export function isNumericParameter(parameter: Parameter): parameter is NumericParameter {
  return parameter.kind === "integer" || parameter.kind === "double";
}

export function isValueParameter(parameter: Parameter): parameter is ValueParameter {
  return isNumericParameter(parameter) || parameter.kind === "string" || parameter.kind === "boolean";
}

export function isOutputParameter(parameter: Parameter): parameter is OutputLayerParameter {
  return parameter.kind === "outputLayer";
}

export function isLayerParameter(parameter: Parameter): parameter is LayerParameter {
  return parameter.kind === "layer";
}
