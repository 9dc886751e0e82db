export { validateValue, isValidValue } from './constraint-validator.js';
export type { ConstraintResult } from './constraint-validator.js';
export { validateParameterTable } from './table-validator.js';
export type { TableValidatorOptions } from './table-validator.js';
