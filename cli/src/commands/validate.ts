import { resolve } from 'node:path';
import {
  formatError,
  isAcqparError,
  validateParameterTable,
  type EngineConfig,
  type Logger,
  type ValidationIssue,
} from '@acqpar/core';
import { cliFunctions, loadTable } from '../lib/engine.js';

export interface ValidateOptions {
  definitionPath: string;
  config: EngineConfig;
  /** Skip warning-level validations */
  errorsOnly?: boolean;
  logger?: Partial<Logger>;
}

export interface ValidateResult {
  valid: boolean;
  path: string;
  parameterCount?: number;
  sections?: string[];
  /** Formatted load or parse failure */
  error?: string;
  errors?: ValidationIssue[];
  warnings?: ValidationIssue[];
}

export async function runValidate(options: ValidateOptions): Promise<ValidateResult> {
  const path = resolve(options.definitionPath);
  try {
    const table = await loadTable(path, options.config, options.logger);
    const validation = validateParameterTable(table, {
      functions: cliFunctions,
      strictFunctions: options.config.strictFunctions,
      errorsOnly: options.errorsOnly,
      filePath: path,
    });

    return {
      valid: validation.valid,
      path,
      parameterCount: table.size,
      sections: [...table.snapshot().sections],
      errors: validation.errors,
      warnings: validation.warnings,
    };
  } catch (error) {
    if (!isAcqparError(error)) {
      throw error;
    }
    return { valid: false, path, error: formatError(error) };
  }
}
