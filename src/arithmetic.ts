// src/arithmetic.ts - Numeric operators, trig functions and relational tests
import { RuntimeError } from './errors';
import {
  AstNode,
  BinaryOperator,
  NumberValue,
  RelationalOperator,
  TrigFunction,
  Value,
} from './types';
import { num, str, valuesEqual } from './values';

type At = Pick<AstNode, 'kind' | 'position'>;

function expectNumber(value: Value, role: string, at: At): number {
  if (value.kind !== 'number') {
    throw new RuntimeError(
      'TypeMismatch',
      `${role} must be a number, got ${value.kind}`,
      at
    );
  }
  return value.value;
}

function power(base: number, exponent: number, at: At): NumberValue {
  if (base === 0 && exponent < 0) {
    throw new RuntimeError('DomainError', `0 ^ ${exponent} is undefined`, at);
  }
  const result = Math.pow(base, exponent);
  if (Number.isNaN(result)) {
    throw new RuntimeError(
      'DomainError',
      `${base} ^ ${exponent} is not a real number`,
      at
    );
  }
  return num(result);
}

export function applyBinary(
  op: BinaryOperator,
  left: Value,
  right: Value,
  at: At
): Value {
  // String concatenation
  if (op === '+' && left.kind === 'string' && right.kind === 'string') {
    return str(left.value + right.value);
  }
  const a = expectNumber(left, `Left operand of '${op}'`, at);
  const b = expectNumber(right, `Right operand of '${op}'`, at);
  if (op === '^') return power(a, b, at);
  const result = numeric(op, a, b, at);
  // Overflowed operands, e.g. Infinity % 3 or Infinity - Infinity
  if (Number.isNaN(result)) {
    throw new RuntimeError('DomainError', `${a} ${op} ${b} is not a real number`, at);
  }
  return num(result);
}

function numeric(
  op: Exclude<BinaryOperator, '^'>,
  a: number,
  b: number,
  at: At
): number {
  switch (op) {
    case '+':
      return a + b;
    case '-':
      return a - b;
    case '*':
      return a * b;
    case '/':
      if (b === 0) throw new RuntimeError('DivisionByZero', `${a} / 0`, at);
      return a / b;
    case '%':
      if (b === 0) throw new RuntimeError('DivisionByZero', `${a} % 0`, at);
      return a % b;
  }
}

export function negate(operand: Value, at: At): Value {
  return num(-expectNumber(operand, 'Operand of unary -', at));
}

export function applyTrig(func: TrigFunction, arg: Value, at: At): Value {
  const x = expectNumber(arg, `Argument of ${func}`, at);
  switch (func) {
    case 'sin':
      return num(Math.sin(x));
    case 'cos':
      return num(Math.cos(x));
    case 'tan':
      return num(Math.tan(x));
    case 'sqrt':
      if (x < 0) {
        throw new RuntimeError('DomainError', `sqrt(${x}) is not a real number`, at);
      }
      return num(Math.sqrt(x));
  }
}

export function compare(
  op: RelationalOperator,
  left: Value,
  right: Value,
  at: At
): boolean {
  if (op === '==') return valuesEqual(left, right);
  if (op === '!=') return !valuesEqual(left, right);
  const a = expectNumber(left, `Left operand of '${op}'`, at);
  const b = expectNumber(right, `Right operand of '${op}'`, at);
  switch (op) {
    case '<':
      return a < b;
    case '<=':
      return a <= b;
    case '>':
      return a > b;
    case '>=':
      return a >= b;
  }
}

/**
 * Truthiness of a bare condition: a non-zero number.
 */
export function isTruthy(value: Value, at: At): boolean {
  return expectNumber(value, 'Condition', at) !== 0;
}
