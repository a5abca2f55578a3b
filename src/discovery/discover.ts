import type { OutputDefaults } from "../core/config.js";
import { defaultLogger, type Logger } from "../core/logger.js";
import { applyRange, setDefaultValue } from "../parameters/binding.js";
import { createParameter } from "../parameters/factory.js";
import type { Parameter } from "../parameters/types.js";
import { ParameterDeclarationSchema, SLOT_ID_PATTERN, type ParameterDeclarations } from "./declarations.js";

export interface DiscoveryOptions {
  logger?: Logger;
  outputDefaults?: OutputDefaults;
}

export interface DiscoveredParameters {
  /** Parameters in slot-declaration order. */
  readonly list: readonly Parameter[];
  readonly slots: ReadonlyMap<string, Parameter>;
}

/**
 * Builds the parameter set of a tool from its declaration table. Slots whose
 * declaration cannot be projected onto a parameter are skipped with a warning.
 */
export function discoverParameters(
  declarations: ParameterDeclarations,
  options: DiscoveryOptions = {}
): DiscoveredParameters {
  const logger = options.logger ?? defaultLogger;
  const list: Parameter[] = [];
  const slots = new Map<string, Parameter>();

  for (const [slot, declaration] of Object.entries(declarations)) {
    const parameter = instantiate(slot, declaration, options, logger);
    if (!parameter) continue;
    list.push(parameter);
    slots.set(slot, parameter);
  }

  return { list: Object.freeze(list), slots };
}

function instantiate(
  slot: string,
  declaration: unknown,
  options: DiscoveryOptions,
  logger: Logger
): Parameter | undefined {
  if (!SLOT_ID_PATTERN.test(slot)) {
    logger.warn(`Skipping parameter slot with invalid id: ${slot}`);
    return undefined;
  }

  const parsed = ParameterDeclarationSchema.safeParse(declaration);
  if (!parsed.success) {
    logger.warn(`Skipping parameter slot ${slot}: invalid declaration`, {
      issues: parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    });
    return undefined;
  }

  const { kind, index, displayName, required, range, defaultValue } = parsed.data;
  const parameter = createParameter(
    kind,
    { name: slot, index, displayName, required },
    { outputDefaults: options.outputDefaults }
  );

  if (range) {
    applyRange(parameter, range);
  }

  if (defaultValue !== undefined) {
    const bound = setDefaultValue(parameter, defaultValue);
    if (!bound.ok) {
      logger.warn(`Skipping parameter slot ${slot}: ${bound.message}`);
      return undefined;
    }
  }

  return parameter;
}

export function sortByIndex(parameters: readonly Parameter[]): Parameter[] {
  return [...parameters].sort((a, b) => a.index - b.index);
}
