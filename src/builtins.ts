// src/builtins.ts - Built-in keyword tables and the dispatch boundary
import { DispatchError } from './errors';
import { BuiltinCategory, Value } from './types';
import { formatValue, NONE } from './values';

/**
 * Parameter names per built-in keyword. Arity is the list length.
 */
export const builtinTables: Record<
  BuiltinCategory,
  Readonly<Record<string, readonly string[]>>
> = {
  ml: {
    linear_regression: ['features', 'targets'],
    mlp_classifier: ['features', 'targets', 'config'],
    neural_network: ['features', 'targets', 'config'],
    predict: ['model', 'input'],
    train: ['model', 'data'],
    kmeans: ['data', 'k'],
    fit_predict: ['model', 'data'],
    get_centroids: ['model'],
    autoencoder: ['data', 'config'],
    encode: ['model', 'input'],
    decode: ['model', 'input'],
    reconstruct: ['model', 'input'],
    reconstruction_error: ['model', 'input'],
  },
  io: {
    read_file: ['path'],
    write_file: ['path', 'data'],
    print: ['value'],
  },
  plot: {
    plot: ['data'],
    scatter: ['x', 'y'],
    histogram: ['data'],
  },
};

// Fixed resolution order when a keyword is looked up by name
const resolutionOrder: readonly BuiltinCategory[] = ['ml', 'io', 'plot'];

export interface BuiltinSignature {
  category: BuiltinCategory;
  keyword: string;
  params: readonly string[];
}

export function builtinParams(
  category: BuiltinCategory,
  keyword: string
): readonly string[] | undefined {
  const table = builtinTables[category];
  return Object.prototype.hasOwnProperty.call(table, keyword)
    ? table[keyword]
    : undefined;
}

export function resolveBuiltin(keyword: string): BuiltinSignature | undefined {
  for (const category of resolutionOrder) {
    const params = builtinParams(category, keyword);
    if (params) return { category, keyword, params };
  }
  return undefined;
}

export type DispatchResult =
  | { result: Value; error?: undefined }
  | { result?: undefined; error: DispatchError };

/**
 * Dispatcher: the evaluator's only way to reach ML, IO and plot collaborators.
 */
export interface Dispatcher {
  dispatch(
    category: BuiltinCategory,
    keyword: string,
    args: readonly Value[]
  ): DispatchResult;
}

export type BuiltinHandler = (
  args: readonly Value[],
  keyword: string
) => DispatchResult;

/**
 * Registry: maps `category.keyword` to host-supplied handlers.
 */
export class BuiltinRegistry implements Dispatcher {
  private handlers = new Map<string, BuiltinHandler>();

  register(
    category: BuiltinCategory,
    keyword: string,
    handler: BuiltinHandler
  ): this {
    if (!builtinParams(category, keyword)) {
      throw new DispatchError(
        category,
        keyword,
        `'${keyword}' is not in the ${category} table`
      );
    }
    this.handlers.set(`${category}.${keyword}`, handler);
    return this;
  }

  has(category: BuiltinCategory, keyword: string): boolean {
    return this.handlers.has(`${category}.${keyword}`);
  }

  dispatch(
    category: BuiltinCategory,
    keyword: string,
    args: readonly Value[]
  ): DispatchResult {
    const params = builtinParams(category, keyword);
    if (!params) {
      return {
        error: new DispatchError(category, keyword, `Unknown built-in ${category}.${keyword}`),
      };
    }
    if (params.length !== args.length) {
      return {
        error: new DispatchError(
          category,
          keyword,
          `${keyword} expects ${params.length} arguments (${params.join(', ')}), got ${args.length}`
        ),
      };
    }
    const handler = this.handlers.get(`${category}.${keyword}`);
    if (!handler) {
      return {
        error: new DispatchError(
          category,
          keyword,
          `No handler registered for ${category}.${keyword}`
        ),
      };
    }
    try {
      return handler(args, keyword);
    } catch (e) {
      if (e instanceof DispatchError) return { error: e };
      const reason = e instanceof Error ? e.message : String(e);
      return {
        error: new DispatchError(category, keyword, `${keyword} failed: ${reason}`, e),
      };
    }
  }
}

/**
 * Installs an `io.print` handler that writes each value on its own line.
 */
export function registerPrint(
  registry: BuiltinRegistry,
  write: (line: string) => void
): BuiltinRegistry {
  return registry.register('io', 'print', ([value]) => {
    write(formatValue(value));
    return { result: NONE };
  });
}
