// src/values.ts - Runtime value constructors and helpers
import {
  FunctionValue,
  ListValue,
  MatrixValue,
  NoneValue,
  NumberValue,
  StringValue,
  Value,
} from './types';

export const NONE: NoneValue = { kind: 'none' };

export function num(value: number): NumberValue {
  return { kind: 'number', value };
}

export function str(value: string): StringValue {
  return { kind: 'string', value };
}

export function list(items: readonly Value[]): ListValue {
  return { kind: 'list', items: Object.freeze([...items]) };
}

/**
 * Builds a matrix from a rectangular grid. Callers validate the shape first.
 */
export function matrix(data: readonly (readonly number[])[]): MatrixValue {
  const rows = Object.freeze(data.map((row) => Object.freeze([...row])));
  return {
    kind: 'matrix',
    rows: rows.length,
    cols: rows.length > 0 ? rows[0].length : 0,
    data: rows,
  };
}

export function valuesEqual(a: Value, b: Value): boolean {
  switch (a.kind) {
    case 'number':
      return b.kind === 'number' && a.value === b.value;
    case 'string':
      return b.kind === 'string' && a.value === b.value;
    case 'none':
      return b.kind === 'none';
    case 'list':
      return (
        b.kind === 'list' &&
        a.items.length === b.items.length &&
        a.items.every((item, i) => valuesEqual(item, b.items[i]))
      );
    case 'matrix':
      return (
        b.kind === 'matrix' &&
        a.rows === b.rows &&
        a.cols === b.cols &&
        a.data.every((row, i) => row.every((x, j) => x === b.data[i][j]))
      );
    case 'function':
    case 'handle':
      return a === b;
  }
}

function formatNested(value: Value): string {
  return value.kind === 'string' ? `"${value.value}"` : formatValue(value);
}

function formatFunction(fn: FunctionValue): string {
  return `<function ${fn.name}(${fn.params.join(', ')})>`;
}

/**
 * Human-readable rendering used by `print`. Top-level strings print bare.
 */
export function formatValue(value: Value): string {
  switch (value.kind) {
    case 'number':
      return String(value.value);
    case 'string':
      return value.value;
    case 'none':
      return 'none';
    case 'list':
      return `[${value.items.map(formatNested).join(', ')}]`;
    case 'matrix':
      return `[${value.data.map((row) => `[${row.join(', ')}]`).join(', ')}]`;
    case 'function':
      return formatFunction(value);
    case 'handle':
      return `<${value.tag}>`;
  }
}
