import type { OutputDefaults } from "../core/config.js";
import { createOutputLayerInfo, DEFAULT_OUTPUT } from "./output-layer.js";
import type { ParameterIdentity, ParameterKind, ParameterOf } from "./types.js";

export interface ParameterFactoryOptions {
  outputDefaults?: OutputDefaults;
}

type ParameterConstructor<Kind extends ParameterKind> = (
  identity: ParameterIdentity,
  options: ParameterFactoryOptions
) => ParameterOf<Kind>;

type ParameterConstructors = { [Kind in ParameterKind]: ParameterConstructor<Kind> };

const constructors: ParameterConstructors = {
  integer: (identity) => ({ kind: "integer", ...identity }),
  double: (identity) => ({ kind: "double", ...identity }),
  string: (identity) => ({ kind: "string", ...identity }),
  boolean: (identity) => ({ kind: "boolean", ...identity }),
  layer: (identity) => ({ kind: "layer", ...identity }),
  outputLayer: (identity, options) => ({
    kind: "outputLayer",
    ...identity,
    value: createOutputLayerInfo({}, options.outputDefaults ?? DEFAULT_OUTPUT),
  }),
};

/** Builds a parameter instance of the given kind with no value bound. */
export function createParameter<Kind extends ParameterKind>(
  kind: Kind,
  identity: ParameterIdentity,
  options: ParameterFactoryOptions = {}
): ParameterOf<Kind> {
  const construct: ParameterConstructor<Kind> = constructors[kind];
  return construct(identity, options);
}
