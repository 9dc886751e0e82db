export { parseDefinitionText, BLOCK_KEYWORDS } from './definition-parser.js';
export type { BlockKeyword, DefinitionParseOptions } from './definition-parser.js';
export { loadDefinitionFile } from './definition-loader.js';
export type { DefinitionLoadOptions, DefinitionResourceReader } from './definition-loader.js';
export { serializeDefinition, serializeParameterTable } from './definition-serializer.js';
export {
  DEFAULT_ARRAY_NAMES,
  canonicalKey,
  formatElementKey,
  isIdentifier,
  referenceForElement,
  referenceForIdentifier,
} from './canonical-keys.js';
export { tokenizeLine, quoteString } from './line-lexer.js';
export type { LineToken } from './line-lexer.js';
