import type { ExpressionNode, Relation, RelationStatement } from '../types.js';

function visit(node: ExpressionNode, onNode: (node: ExpressionNode) => void): void {
  onNode(node);
  switch (node.type) {
    case 'unary':
      visit(node.operand, onNode);
      return;
    case 'binary':
      visit(node.left, onNode);
      visit(node.right, onNode);
      return;
    case 'call':
      for (const arg of node.args) {
        visit(arg, onNode);
      }
      return;
    default:
      return;
  }
}

/**
 * A statement copying a value onto itself under another spelling, such as
 * `d1=D[1]` where `d1` folds into `D[1]`.
 */
export function isIdentityAlias(statement: RelationStatement): boolean {
  const expression = statement.expression;
  return expression.type === 'reference' && expression.ref.key === statement.target.key;
}

export interface ReferenceOptions {
  /** Ignore reads made by identity alias statements */
  skipIdentityAliases?: boolean;
}

/**
 * Canonical keys a relation reads, in first-seen order. Keys assigned by an
 * earlier statement of the same relation are internal and not reported.
 */
export function collectReferences(relation: Relation, options: ReferenceOptions = {}): string[] {
  const seen = new Set<string>();
  const assigned = new Set<string>();
  for (const statement of relation.statements) {
    if (options.skipIdentityAliases && isIdentityAlias(statement)) {
      assigned.add(statement.target.key);
      continue;
    }
    visit(statement.expression, (node) => {
      if (node.type === 'reference' && !assigned.has(node.ref.key)) {
        seen.add(node.ref.key);
      }
    });
    assigned.add(statement.target.key);
  }
  return Array.from(seen);
}

/**
 * Canonical keys a relation writes, in statement order.
 */
export function relationTargets(relation: Relation): string[] {
  return Array.from(new Set(relation.statements.map((statement) => statement.target.key)));
}

/**
 * Lower-cased names of the functions a relation calls.
 */
export function collectFunctionCalls(relation: Relation): string[] {
  const names = new Set<string>();
  for (const statement of relation.statements) {
    visit(statement.expression, (node) => {
      if (node.type === 'call') {
        names.add(node.key);
      }
    });
  }
  return Array.from(names);
}
