// src/index.ts
// Entry point
import * as fs from 'fs/promises';
import { BuiltinRegistry, Dispatcher, registerPrint } from './builtins';
import { Environment } from './environment';
import { toDiagnostic } from './errors';
import { evaluate } from './evaluator';
import { tokenize } from './lexer';
import { parse } from './parser';
import { Diagnostic, Program, Value } from './types';

export interface InterpretOptions {
  /** Defaults to an empty BuiltinRegistry, where every built-in call fails with DispatchFailure. */
  dispatcher?: Dispatcher;
  env?: Environment;
  trace?: boolean;
  /** Installs `print` on the default registry. Ignored when `dispatcher` is given. */
  write?: (line: string) => void;
}

function defaultDispatcher(write?: (line: string) => void): Dispatcher {
  const registry = new BuiltinRegistry();
  return write ? registerPrint(registry, write) : registry;
}

export interface InterpretResult {
  results: Record<string, Value>; // Top-level bindings after the run
  errors: Diagnostic[];
  trace: string[];
}

function collect(env: Environment): Record<string, Value> {
  return Object.fromEntries(env.entries());
}

export function interpret(
  source: string,
  options: InterpretOptions = {}
): InterpretResult {
  // Full pipeline: tokenize → parse → evaluate
  const env = options.env ?? new Environment();
  const dispatcher = options.dispatcher ?? defaultDispatcher(options.write);
  const trace: string[] = [];
  let program: Program;
  try {
    program = parse(tokenize(source));
  } catch (e) {
    return { results: {}, errors: [toDiagnostic(e)], trace };
  }
  try {
    evaluate(program, env, dispatcher, {
      trace: options.trace ? trace : undefined,
    });
  } catch (e) {
    return { results: collect(env), errors: [toDiagnostic(e)], trace };
  }
  return { results: collect(env), errors: [], trace };
}

export async function runFile(
  filePath: string,
  options: InterpretOptions = {}
): Promise<InterpretResult> {
  const source = await fs.readFile(filePath, 'utf8');
  return interpret(source, options);
}

export * from './types';
export * from './errors';
export * from './lexer';
export * from './parser';
export * from './values';
export * from './environment';
export * from './builtins';
export * from './evaluator';
export { buildMatrix, transpose, inverse, matmult, matadd, matsub } from './matrix';
