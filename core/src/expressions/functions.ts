/**
 * External functions callable from relation expressions (`aqcalc(...)`).
 *
 * The engine never resolves EXTFUNCT paths or built-in instrument routines by
 * itself; callers inject what they need through a registry.
 */

export type RelationFunction = (args: readonly number[]) => number;

export interface FunctionRegistry {
  has(name: string): boolean;
  get(name: string): RelationFunction | undefined;
  names(): string[];
}

function normalizeName(name: string): string {
  return name.trim().toLowerCase();
}

/**
 * Builds a case-insensitive registry. Later sources override earlier ones.
 */
export function createFunctionRegistry(
  ...sources: Array<Record<string, RelationFunction> | FunctionRegistry>
): FunctionRegistry {
  const entries = new Map<string, RelationFunction>();
  for (const source of sources) {
    if (isRegistry(source)) {
      for (const name of source.names()) {
        const fn = source.get(name);
        if (fn) {
          entries.set(normalizeName(name), fn);
        }
      }
      continue;
    }
    for (const [name, fn] of Object.entries(source)) {
      entries.set(normalizeName(name), fn);
    }
  }

  return {
    has: (name) => entries.has(normalizeName(name)),
    get: (name) => entries.get(normalizeName(name)),
    names: () => Array.from(entries.keys()),
  };
}

function isRegistry(value: Record<string, RelationFunction> | FunctionRegistry): value is FunctionRegistry {
  return typeof value.has === 'function' && typeof value.names === 'function' && typeof value.get === 'function';
}

export const emptyFunctionRegistry: FunctionRegistry = createFunctionRegistry();

function unary(fn: (value: number) => number): RelationFunction {
  return (args) => {
    if (args.length !== 1) {
      throw new Error(`expected 1 argument, received ${args.length}`);
    }
    return fn(args[0]);
  };
}

function variadic(fn: (...values: number[]) => number): RelationFunction {
  return (args) => {
    if (args.length === 0) {
      throw new Error('expected at least 1 argument');
    }
    return fn(...args);
  };
}

/**
 * Plain arithmetic helpers. Not registered by default; merge them into a
 * registry when a definition file relies on them.
 */
export const standardFunctions: Record<string, RelationFunction> = {
  abs: unary(Math.abs),
  sqrt: unary(Math.sqrt),
  floor: unary(Math.floor),
  ceil: unary(Math.ceil),
  round: unary(Math.round),
  exp: unary(Math.exp),
  log: unary(Math.log),
  min: variadic(Math.min),
  max: variadic(Math.max),
};
