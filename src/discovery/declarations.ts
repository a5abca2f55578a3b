import { z } from "zod";
import type { RangeDeclaration } from "../parameters/binding.js";
import { PARAMETER_KINDS, type ParameterKind, type ParameterOf } from "../parameters/types.js";

export interface DeclarationInput<Kind extends ParameterKind = ParameterKind> {
  kind: Kind;
  index: number;
  displayName: string;
  range?: RangeDeclaration;
  defaultValue?: unknown;
}

/** Declarative metadata for one parameter slot of a tool. */
export interface ParameterDeclaration<Kind extends ParameterKind = ParameterKind> extends DeclarationInput<Kind> {
  required: boolean;
}

/**
 * Slot table keyed by slot id. Key order is the declaration order, so slot
 * ids must be identifiers (integer-like keys would be reordered).
 */
export type ParameterDeclarations = Readonly<Record<string, ParameterDeclaration>>;

export type SlotId<D extends ParameterDeclarations> = Extract<keyof D, string>;

export type SlotKind<D extends ParameterDeclarations, S extends SlotId<D>> = D[S]["kind"];

export type SlotParameter<D extends ParameterDeclarations, S extends SlotId<D>> = ParameterOf<SlotKind<D, S>>;

export function required<Kind extends ParameterKind>(declaration: DeclarationInput<Kind>): ParameterDeclaration<Kind> {
  return { ...declaration, required: true };
}

export function optional<Kind extends ParameterKind>(declaration: DeclarationInput<Kind>): ParameterDeclaration<Kind> {
  return { ...declaration, required: false };
}

export function defineParameters<D extends ParameterDeclarations>(declarations: D): D {
  return declarations;
}

export const SLOT_ID_PATTERN = /^[A-Za-z_$][A-Za-z0-9_$]*$/;

export const ParameterDeclarationSchema = z
  .object({
    kind: z.enum(PARAMETER_KINDS),
    index: z.number().int(),
    displayName: z.string(),
    required: z.boolean(),
    range: z.object({ minimum: z.number(), maximum: z.number() }).optional(),
    defaultValue: z.unknown().optional(),
  })
  .superRefine((declaration, ctx) => {
    // Ranges only bind to numeric kinds; elsewhere they are ignored unchecked.
    const numeric = declaration.kind === "integer" || declaration.kind === "double";
    if (numeric && declaration.range && declaration.range.minimum > declaration.range.maximum) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["range"],
        message: "range minimum exceeds maximum",
      });
    }
  });
