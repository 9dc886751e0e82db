export { resolveRecomputeOrder } from './dependency-resolver.js';
export type { InverseStep, ResolutionPlan, ResolutionState, ResolverOptions } from './dependency-resolver.js';
export { buildRelationGraph } from './relation-graph.js';
export type { RelationGraph } from './relation-graph.js';
