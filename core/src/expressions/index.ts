export { tokenizeExpression } from './tokenizer.js';
export type { Token, TokenType } from './tokenizer.js';
export { parseRelation, parseExpression } from './parser.js';
export type { RelationParseOptions } from './parser.js';
export { evaluateExpression, evaluateRelation } from './evaluator.js';
export type { EvaluationContext, RelationAssignment } from './evaluator.js';
export { collectReferences, relationTargets, collectFunctionCalls, isIdentityAlias } from './references.js';
export type { ReferenceOptions } from './references.js';
export {
  createFunctionRegistry,
  emptyFunctionRegistry,
  standardFunctions,
} from './functions.js';
export type { FunctionRegistry, RelationFunction } from './functions.js';
