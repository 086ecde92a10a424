// src/types.ts - Core interfaces and types for the pipeline language

/**
 * Source position: 1-based line and column of the first character.
 */
export interface Position {
  line: number;
  column: number;
}

/**
 * Reserved words: lexeme -> token kind. Checked before the identifier rule.
 */
export const keywords = {
  if: 'IF',
  else: 'ELSE',
  for: 'FOR',
  while: 'WHILE',
  def: 'DEF',
  return: 'RETURN',
  linear_regression: 'LINEAR_REGRESSION',
  mlp_classifier: 'MLP_CLASSIFIER',
  neural_network: 'NEURAL_NETWORK',
  predict: 'PREDICT',
  train: 'TRAIN',
  kmeans: 'KMEANS',
  fit_predict: 'FIT_PREDICT',
  get_centroids: 'GET_CENTROIDS',
  autoencoder: 'AUTOENCODER',
  encode: 'ENCODE',
  decode: 'DECODE',
  reconstruct: 'RECONSTRUCT',
  reconstruction_error: 'RECONSTRUCTION_ERROR',
  transpose: 'TRANSPOSE',
  inverse: 'INVERSE',
  matmult: 'MATMULT',
  matadd: 'MATADD',
  matsub: 'MATSUB',
  read_file: 'READ_FILE',
  write_file: 'WRITE_FILE',
  print: 'PRINT',
  plot: 'PLOT',
  scatter: 'SCATTER',
  histogram: 'HISTOGRAM',
  sin: 'SIN',
  cos: 'COS',
  tan: 'TAN',
  sqrt: 'SQRT',
} as const;
export type Keyword = keyof typeof keywords;
export type KeywordKind = (typeof keywords)[Keyword];

export type TokenKind =
  | KeywordKind
  | 'ASSIGN'
  | 'PLUS'
  | 'MINUS'
  | 'MULT'
  | 'DIV'
  | 'MOD'
  | 'POWER'
  | 'EQ'
  | 'NE'
  | 'LT'
  | 'LE'
  | 'GT'
  | 'GE' // Operators
  | 'LPAREN'
  | 'RPAREN'
  | 'LBRACE'
  | 'RBRACE'
  | 'LBRACKET'
  | 'RBRACKET'
  | 'COMMA'
  | 'SEMICOLON' // Punctuation
  | 'NUMBER'
  | 'FLOAT'
  | 'STRING'
  | 'ID'
  | 'EOF';

/**
 * Token: Basic unit from lexing, with kind, source text, and position.
 */
export interface Token {
  readonly kind: TokenKind;
  readonly lexeme: string;
  readonly position: Position;
}

export type BinaryOperator = '+' | '-' | '*' | '/' | '%' | '^';
export type RelationalOperator = '==' | '!=' | '<' | '<=' | '>' | '>=';
export type TrigFunction = 'sin' | 'cos' | 'tan' | 'sqrt';
export type MatrixOperator =
  | 'transpose'
  | 'inverse'
  | 'matmult'
  | 'matadd'
  | 'matsub';
export type BuiltinCategory = 'ml' | 'io' | 'plot';
export type CallCategory = 'user' | BuiltinCategory;

export interface Program {
  kind: 'Program';
  body: Statement[];
  position: Position;
}

export type Statement =
  | Assignment
  | Conditional
  | ForLoop
  | WhileLoop
  | FunctionDef
  | ExpressionStatement;

export interface Assignment {
  kind: 'Assignment';
  name: string;
  expr: Expression;
  position: Position;
}

export interface Conditional {
  kind: 'Conditional';
  cond: Condition;
  thenBlock: Statement[];
  elseBlock?: Statement[];
  position: Position;
}

export interface ForLoop {
  kind: 'ForLoop';
  init: Assignment;
  cond: Condition;
  step: Assignment;
  body: Statement[];
  position: Position;
}

export interface WhileLoop {
  kind: 'WhileLoop';
  cond: Condition;
  body: Statement[];
  position: Position;
}

export interface FunctionDef {
  kind: 'FunctionDef';
  name: string;
  params: string[];
  body: Statement[];
  returnExpr: Expression; // Mandatory trailing return
  position: Position;
}

export interface ExpressionStatement {
  kind: 'ExpressionStatement';
  expr: Expression;
  position: Position;
}

/**
 * Condition: a relational test, or a truthiness test of `left` alone.
 */
export interface Condition {
  kind: 'Condition';
  left: Expression;
  op?: RelationalOperator;
  right?: Expression;
  position: Position;
}

export type Expression =
  | BinaryOp
  | UnaryMinus
  | TrigCall
  | Literal
  | Identifier
  | ListLiteral
  | MatrixOp
  | Call
  | Grouping;

export interface BinaryOp {
  kind: 'BinaryOp';
  op: BinaryOperator;
  left: Expression;
  right: Expression;
  position: Position;
}

export interface UnaryMinus {
  kind: 'UnaryMinus';
  operand: Expression;
  position: Position;
}

export interface TrigCall {
  kind: 'TrigCall';
  func: TrigFunction;
  arg: Expression;
  position: Position;
}

export interface Literal {
  kind: 'Literal';
  literalType: 'number' | 'float' | 'string';
  value: number | string;
  position: Position;
}

export interface Identifier {
  kind: 'Identifier';
  name: string;
  position: Position;
}

/**
 * Row: a bracketed row inside a list literal, e.g. `[1, 2]` in `[[1, 2], [3, 4]]`.
 */
export interface Row {
  kind: 'Row';
  items: Expression[];
  position: Position;
}

/**
 * List Literal: rows kept verbatim; list vs. matrix is decided at evaluation.
 */
export interface ListLiteral {
  kind: 'ListLiteral';
  rows: (Expression | Row)[];
  position: Position;
}

export interface MatrixOp {
  kind: 'MatrixOp';
  op: MatrixOperator;
  operands: Expression[];
  position: Position;
}

export interface Call {
  kind: 'Call';
  category: CallCategory;
  callee: string;
  args: Expression[];
  position: Position;
}

export interface Grouping {
  kind: 'Grouping';
  inner: Expression;
  position: Position;
}

export type AstNode = Program | Statement | Expression | Condition | Row;

/**
 * Runtime values. All are immutable once built.
 */
export type Value =
  | NumberValue
  | StringValue
  | ListValue
  | MatrixValue
  | FunctionValue
  | HandleValue
  | NoneValue;

export interface NumberValue {
  readonly kind: 'number';
  readonly value: number;
}

export interface StringValue {
  readonly kind: 'string';
  readonly value: string;
}

export interface ListValue {
  readonly kind: 'list';
  readonly items: readonly Value[];
}

export interface MatrixValue {
  readonly kind: 'matrix';
  readonly rows: number;
  readonly cols: number;
  readonly data: readonly (readonly number[])[];
}

export interface FunctionValue {
  readonly kind: 'function';
  readonly name: string;
  readonly params: readonly string[];
  readonly body: readonly Statement[];
  readonly returnExpr: Expression;
  readonly closure: Scope;
}

/**
 * Handle: opaque value owned by a built-in collaborator (e.g. a trained model).
 */
export interface HandleValue {
  readonly kind: 'handle';
  readonly tag: string;
  readonly ref: unknown;
}

export interface NoneValue {
  readonly kind: 'none';
}

/**
 * Scope: what a closure needs from its defining frame.
 */
export interface Scope {
  lookup(name: string): Value | undefined;
}

/**
 * Diagnostic: Structured error details handed to hosts.
 */
export interface Diagnostic {
  type: 'syntax' | 'runtime';
  code: string;
  message: string;
  line?: number;
  column?: number;
  suggestedFix?: string;
}
