// Shared types for pairforge packages

/**
 * One input dimension as supplied by a caller: a name and its ordered,
 * distinct value labels.
 */
export interface ParameterDefinition {
  readonly name: string;
  readonly values: readonly string[];
}

/**
 * Mapping form of a parameter set. Declaration order is the property order
 * of the object (note that integer-like keys are enumerated first by JS).
 */
export type ParameterMapping = Readonly<Record<string, readonly string[]>>;

export type ParameterInput = ParameterMapping | readonly ParameterDefinition[];

export type ParameterOrder = 'declared' | 'largest-domain-first';

export const PARAMETER_ORDERS: readonly ParameterOrder[] = [
  'declared',
  'largest-domain-first',
] as const;

export function isParameterDefinitionList(
  input: ParameterInput
): input is readonly ParameterDefinition[] {
  return Array.isArray(input);
}
