/**
 * Domain model of the pairwise engine.
 *
 * All structures are immutable for the duration of one generation run; the
 * engine never mutates caller-owned values.
 */

/**
 * A named input dimension with an ordered sequence of distinct values.
 * Invariants (enforced by createParameterSet): non-empty unique name,
 * at least 2 values, values non-empty and unique.
 */
export interface Parameter {
  readonly name: string;
  readonly values: readonly string[];
}

/**
 * Validated, frozen parameter set in declaration order.
 */
export interface ParameterSet {
  readonly parameters: readonly Parameter[];
}

/**
 * A parameter paired with one of its values.
 */
export interface Assignment {
  readonly parameter: string;
  readonly value: string;
}

/**
 * Canonical identity of an unordered pair of assignments.
 */
export type PairKey = string;

/**
 * Unordered pair of compatible assignments. `first` and `second` are
 * oriented by parameter name so that the key does not depend on the order
 * the assignments were given in.
 */
export interface Pair {
  readonly key: PairKey;
  readonly first: Assignment;
  readonly second: Assignment;
}

export type RequiredPairs = ReadonlyMap<PairKey, Pair>;

/**
 * Total assignment: one value per parameter, aligned with declaration order.
 */
export type TestCase = readonly string[];

/**
 * Ordered test cases. Order drives first-covered-by attribution.
 */
export type TestSuite = readonly TestCase[];
