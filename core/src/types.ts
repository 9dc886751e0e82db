/**
 * Core domain types for parameter definitions, relations and values.
 */

/**
 * Declared value type of a typed parameter. The definition file spells these
 * `R32`, `I32` and `ENUM`; the long forms are accepted as well.
 */
export type ParameterType = 'real32' | 'int32' | 'enumerated';

/**
 * `typed` blocks come from `T_NAME` and define a parameter.
 * `alias` blocks come from a bare `NAME` and only override display fields of
 * a system parameter with the same name.
 */
export type DefinitionKind = 'typed' | 'alias';

/** Inclusive numeric bounds. */
export interface Subrange {
  min: number;
  max: number;
}

// =============================================================================
// Relation expressions
// =============================================================================

/**
 * A reference to a value, either a named scalar (`SW`) or one element of an
 * indexed array (`D[1]`). `key` is canonical: upper case, with aliases such as
 * `d1` folded into `D[1]`. `name` keeps the spelling used in the source.
 */
export type ValueReference =
  | { kind: 'scalar'; key: string; name: string }
  | { kind: 'element'; key: string; name: string; array: string; index: number };

export type BinaryOperator = '+' | '-' | '*' | '/';
export type UnaryOperator = '+' | '-';

export type ExpressionNode =
  | { type: 'number'; value: number; raw: string }
  | { type: 'reference'; ref: ValueReference }
  | { type: 'unary'; operator: UnaryOperator; operand: ExpressionNode }
  | { type: 'binary'; operator: BinaryOperator; left: ExpressionNode; right: ExpressionNode }
  | { type: 'call'; name: string; key: string; args: ExpressionNode[] };

export interface RelationStatement {
  target: ValueReference;
  expression: ExpressionNode;
}

/**
 * A parsed REL or INV_REL. `source` is the text exactly as it appeared
 * between the quotes; it is what gets written back on serialization.
 */
export interface Relation {
  source: string;
  statements: RelationStatement[];
}

// =============================================================================
// Definitions
// =============================================================================

export interface ParameterDefinition {
  /** Name as spelled in the file */
  name: string;
  /** Canonical lookup key */
  key: string;
  kind: DefinitionKind;
  type?: ParameterType;
  /** Class tag such as ACQU */
  className?: string;
  subrange?: Subrange;
  unit?: string;
  format?: string;
  text?: string;
  /** External resource reference, e.g. `lists/pp` */
  extFunction?: string;
  /** False when the block carries NONEDIT */
  editable: boolean;
  rel?: Relation;
  invRel?: Relation;
  /** Label of the most recent HEADER line preceding the block */
  section?: string;
}

/** Where a definition was read from. */
export interface DefinitionSource {
  filePath?: string;
  line: number;
}

// =============================================================================
// Values
// =============================================================================

/** Current parameter values keyed by canonical key (`SW`, `D[1]`). */
export type ParameterValues = Readonly<Record<string, number>>;

/**
 * Resolves a reference to its current value, or undefined when unknown.
 */
export type ValueLookup = (ref: ValueReference) => number | undefined;
