export * from './types.js';
export * from './errors/index.js';
export { createLogger } from './logger.js';
export type { Logger, LoggerOptions, LogLevel, LogMeta } from './logger.js';
export { DEFAULT_ENGINE_CONFIG, loadEngineConfig, parseEngineConfig } from './config.js';
export type { EngineConfig } from './config.js';
export { findProjectRoot, loadEnv, PROJECT_CONFIG_FILE } from './env-loader.js';
export type { EnvLoaderOptions, EnvLoaderResult } from './env-loader.js';

export * from './parsing/index.js';
export { ParameterTable } from './table/parameter-table.js';
export type { ParameterTableEntry, ParameterTableSnapshot } from './table/parameter-table.js';
export * from './expressions/index.js';
export * from './validation/index.js';
export * from './resolution/index.js';
export { computeTopologyLayers, groupByLayer } from './topology/index.js';
export type { GraphEdge, GraphNode, TopologyResult } from './topology/index.js';
export { ParameterStore } from './engine/parameter-store.js';
export { checkRoundTrip, withinTolerance } from './engine/round-trip.js';
export type { RoundTripDeviation, RoundTripOptions, RoundTripResult } from './engine/round-trip.js';
export type {
  InverseWrite,
  ParameterStoreOptions,
  StaleEntry,
  UpdateReport,
  ValueChange,
} from './engine/parameter-store.js';
export {
  DisplayFormatError,
  formatParameterValue,
  isRenderableFormat,
  parseDisplayFormat,
  renderDisplayFormat,
} from './format/display-format.js';
export type { Conversion, ConversionSpec, FormatSegment, ParsedDisplayFormat } from './format/display-format.js';
export * from './acquisition/index.js';
