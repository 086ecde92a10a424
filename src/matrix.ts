// src/matrix.ts - Matrix construction and operations
import { RuntimeError } from './errors';
import { AstNode, MatrixOperator, MatrixValue, Value } from './types';
import { matrix } from './values';

type At = Pick<AstNode, 'kind' | 'position'>;


function shape(m: MatrixValue): string {
  return `${m.rows}x${m.cols}`;
}

/**
 * Builds a matrix from evaluated bracketed rows. Items must be numbers and
 * rows must share one length.
 */
export function buildMatrix(rows: readonly (readonly Value[])[], at: At): MatrixValue {
  const cols = rows[0].length;
  const data = rows.map((row, r) => {
    if (row.length !== cols) {
      throw new RuntimeError(
        'ShapeError',
        `Matrix row ${r + 1} has ${row.length} columns, expected ${cols}`,
        at,
        { suggestedFix: 'Give every row the same number of items' }
      );
    }
    return row.map((item) => {
      if (item.kind !== 'number') {
        throw new RuntimeError(
          'TypeMismatch',
          `Matrix items must be numbers, got ${item.kind}`,
          at
        );
      }
      return item.value;
    });
  });
  return matrix(data);
}

export function transpose(m: MatrixValue): MatrixValue {
  const data: number[][] = [];
  for (let c = 0; c < m.cols; c++) {
    data.push(m.data.map((row) => row[c]));
  }
  return matrix(data);
}

function elementwise(
  a: MatrixValue,
  b: MatrixValue,
  op: 'matadd' | 'matsub',
  at: At
): MatrixValue {
  if (a.rows !== b.rows || a.cols !== b.cols) {
    throw new RuntimeError(
      'ShapeError',
      `${op} needs equal shapes, got ${shape(a)} and ${shape(b)}`,
      at
    );
  }
  const sign = op === 'matadd' ? 1 : -1;
  return matrix(a.data.map((row, i) => row.map((x, j) => x + sign * b.data[i][j])));
}

export function matadd(a: MatrixValue, b: MatrixValue, at: At): MatrixValue {
  return elementwise(a, b, 'matadd', at);
}

export function matsub(a: MatrixValue, b: MatrixValue, at: At): MatrixValue {
  return elementwise(a, b, 'matsub', at);
}

export function matmult(a: MatrixValue, b: MatrixValue, at: At): MatrixValue {
  if (a.cols !== b.rows) {
    throw new RuntimeError(
      'ShapeError',
      `matmult needs columns of the left to match rows of the right, got ${shape(a)} and ${shape(b)}`,
      at
    );
  }
  const data: number[][] = [];
  for (let i = 0; i < a.rows; i++) {
    const row: number[] = [];
    for (let j = 0; j < b.cols; j++) {
      let sum = 0;
      for (let k = 0; k < a.cols; k++) sum += a.data[i][k] * b.data[k][j];
      row.push(sum);
    }
    data.push(row);
  }
  return matrix(data);
}

/**
 * Gauss-Jordan elimination with partial pivoting.
 */
export function inverse(m: MatrixValue, at: At): MatrixValue {
  if (m.rows !== m.cols) {
    throw new RuntimeError(
      'ShapeError',
      `inverse needs a square matrix, got ${shape(m)}`,
      at
    );
  }
  const n = m.rows;
  // Pivot tolerance scales with the largest entry
  const largest = Math.max(0, ...m.data.map((row) => Math.max(0, ...row.map(Math.abs))));
  const tolerance = n * Number.EPSILON * largest;
  const aug = m.data.map((row, i) => [
    ...row,
    ...Array.from({ length: n }, (_, j) => (i === j ? 1 : 0)),
  ]);
  for (let col = 0; col < n; col++) {
    let pivot = col;
    for (let r = col + 1; r < n; r++) {
      if (Math.abs(aug[r][col]) > Math.abs(aug[pivot][col])) pivot = r;
    }
    if (Math.abs(aug[pivot][col]) <= tolerance) {
      throw new RuntimeError('ShapeError', 'inverse of a singular matrix', at);
    }
    [aug[col], aug[pivot]] = [aug[pivot], aug[col]];
    const p = aug[col][col];
    aug[col] = aug[col].map((x) => x / p);
    for (let r = 0; r < n; r++) {
      if (r === col) continue;
      const factor = aug[r][col];
      if (factor === 0) continue;
      aug[r] = aug[r].map((x, j) => x - factor * aug[col][j]);
    }
  }
  return matrix(aug.map((row) => row.slice(n)));
}

/**
 * Applies a matrix keyword to evaluated operands.
 */
export function applyMatrixOp(
  op: MatrixOperator,
  operands: readonly Value[],
  at: At
): MatrixValue {
  const ms = operands.map((operand, i) => {
    if (operand.kind !== 'matrix') {
      throw new RuntimeError(
        'TypeMismatch',
        `${op} argument ${i + 1} must be a matrix, got ${operand.kind}`,
        at,
        { suggestedFix: 'Build matrices from bracketed rows, e.g. [[1, 2], [3, 4]]' }
      );
    }
    return operand;
  });
  switch (op) {
    case 'transpose':
      return transpose(ms[0]);
    case 'inverse':
      return inverse(ms[0], at);
    case 'matmult':
      return matmult(ms[0], ms[1], at);
    case 'matadd':
      return matadd(ms[0], ms[1], at);
    case 'matsub':
      return matsub(ms[0], ms[1], at);
  }
}
