// src/errors.ts - Error taxonomy for lexing, parsing and evaluation
import {
  AstNode,
  BuiltinCategory,
  Diagnostic,
  Position,
  TokenKind,
} from './types';

export abstract class DslError extends Error {
  abstract readonly code: string;
  readonly position?: Position;
  readonly suggestedFix?: string;

  constructor(message: string, position?: Position, suggestedFix?: string) {
    super(position ? `${message} at ${position.line}:${position.column}` : message);
    this.name = new.target.name;
    this.position = position;
    this.suggestedFix = suggestedFix;
  }
}

export class LexError extends DslError {
  readonly code = 'LexError';
  readonly unexpectedChar: string;
  declare readonly position: Position;

  constructor(position: Position, unexpectedChar: string, suggestedFix?: string) {
    super(`Unexpected character '${unexpectedChar}'`, position, suggestedFix);
    this.unexpectedChar = unexpectedChar;
  }
}

export class ParseError extends DslError {
  readonly code = 'ParseError';
  readonly expectedKinds: readonly TokenKind[];
  readonly foundKind: TokenKind;
  declare readonly position: Position;

  constructor(
    position: Position,
    expectedKinds: readonly TokenKind[],
    foundKind: TokenKind,
    suggestedFix?: string
  ) {
    super(
      `Expected ${expectedKinds.length === 1 ? expectedKinds[0] : `one of ${expectedKinds.join(', ')}`}, got ${foundKind}`,
      position,
      suggestedFix
    );
    this.expectedKinds = expectedKinds;
    this.foundKind = foundKind;
  }
}

/**
 * Failure reported by a built-in collaborator through the dispatch interface.
 */
export class DispatchError extends Error {
  readonly category: BuiltinCategory;
  readonly keyword: string;
  readonly cause?: unknown;

  constructor(
    category: BuiltinCategory,
    keyword: string,
    message: string,
    cause?: unknown
  ) {
    super(message);
    this.name = 'DispatchError';
    this.category = category;
    this.keyword = keyword;
    this.cause = cause;
  }
}

export type RuntimeErrorKind =
  | 'UndefinedVariable'
  | 'UndefinedFunction'
  | 'ArityError'
  | 'DivisionByZero'
  | 'DomainError'
  | 'ShapeError'
  | 'TypeMismatch'
  | 'DispatchFailure';

export class RuntimeError extends DslError {
  readonly code = 'RuntimeError';
  readonly kind: RuntimeErrorKind;
  readonly nodeKind?: AstNode['kind'];
  readonly dispatchError?: DispatchError;

  constructor(
    kind: RuntimeErrorKind,
    message: string,
    node?: Pick<AstNode, 'kind' | 'position'>,
    options: { suggestedFix?: string; dispatchError?: DispatchError } = {}
  ) {
    super(message, node?.position, options.suggestedFix);
    this.kind = kind;
    this.nodeKind = node?.kind;
    this.dispatchError = options.dispatchError;
  }
}

/**
 * Converts a thrown DSL error into the record hosts display.
 * Anything that is not a DslError is not ours to report and is rethrown.
 */
export function toDiagnostic(error: unknown): Diagnostic {
  if (!(error instanceof DslError)) throw error;
  const diagnostic: Diagnostic = {
    type: error instanceof RuntimeError ? 'runtime' : 'syntax',
    code: error instanceof RuntimeError ? error.kind : error.code,
    message: error.message,
  };
  if (error.position) {
    diagnostic.line = error.position.line;
    diagnostic.column = error.position.column;
  }
  if (error.suggestedFix) diagnostic.suggestedFix = error.suggestedFix;
  return diagnostic;
}
