// src/parser.ts - Predictive recursive descent parser
import { resolveBuiltin } from './builtins';
import { ParseError } from './errors';
import {
  Assignment,
  BinaryOperator,
  Condition,
  Expression,
  FunctionDef,
  ListLiteral,
  MatrixOperator,
  Program,
  RelationalOperator,
  Row,
  Statement,
  Token,
  TokenKind,
  TrigFunction,
} from './types';

const additiveOps: Partial<Record<TokenKind, BinaryOperator>> = {
  PLUS: '+',
  MINUS: '-',
};
const multiplicativeOps: Partial<Record<TokenKind, BinaryOperator>> = {
  MULT: '*',
  DIV: '/',
  MOD: '%',
};
const relationalOps: Partial<Record<TokenKind, RelationalOperator>> = {
  EQ: '==',
  NE: '!=',
  LT: '<',
  LE: '<=',
  GT: '>',
  GE: '>=',
};
const trigFunctions: Partial<Record<TokenKind, TrigFunction>> = {
  SIN: 'sin',
  COS: 'cos',
  TAN: 'tan',
  SQRT: 'sqrt',
};
const matrixOps: Partial<Record<TokenKind, { op: MatrixOperator; arity: number }>> = {
  TRANSPOSE: { op: 'transpose', arity: 1 },
  INVERSE: { op: 'inverse', arity: 1 },
  MATMULT: { op: 'matmult', arity: 2 },
  MATADD: { op: 'matadd', arity: 2 },
  MATSUB: { op: 'matsub', arity: 2 },
};

// Tokens that can open an expression; used for error reporting
const expressionStart: readonly TokenKind[] = [
  'ID',
  'NUMBER',
  'FLOAT',
  'STRING',
  'LPAREN',
  'LBRACKET',
  'MINUS',
  'SIN',
  'COS',
  'TAN',
  'SQRT',
  'TRANSPOSE',
  'INVERSE',
  'MATMULT',
  'MATADD',
  'MATSUB',
  'LINEAR_REGRESSION',
  'MLP_CLASSIFIER',
  'NEURAL_NETWORK',
  'PREDICT',
  'TRAIN',
  'KMEANS',
  'FIT_PREDICT',
  'GET_CENTROIDS',
  'AUTOENCODER',
  'ENCODE',
  'DECODE',
  'RECONSTRUCT',
  'RECONSTRUCTION_ERROR',
  'READ_FILE',
  'WRITE_FILE',
  'PRINT',
  'PLOT',
  'SCATTER',
  'HISTOGRAM',
];
const statementStart: readonly TokenKind[] = [
  'IF',
  'FOR',
  'WHILE',
  'DEF',
  ...expressionStart,
];

class Parser {
  private tokens: Token[];
  private pos: number = 0;

  constructor(tokens: Token[]) {
    this.tokens = tokens;
  }

  parse(): Program {
    const position = this.peek().position;
    const body = this.parseStatements(['EOF']);
    this.consume('EOF');
    return { kind: 'Program', body, position };
  }

  // statement* up to (not including) one of the terminators
  private parseStatements(
    terminators: readonly TokenKind[],
    suggestedFix?: string
  ): Statement[] {
    const statements: Statement[] = [];
    while (!terminators.includes(this.peek().kind)) {
      if (!statementStart.includes(this.peek().kind)) {
        throw this.error([...terminators, ...statementStart], suggestedFix);
      }
      statements.push(this.parseStatement());
    }
    return statements;
  }

  private parseStatement(): Statement {
    switch (this.peek().kind) {
      case 'IF':
        return this.parseConditional();
      case 'FOR':
        return this.parseFor();
      case 'WHILE':
        return this.parseWhile();
      case 'DEF':
        return this.parseFunctionDef();
      default:
        return this.parseSimpleStatement();
    }
  }

  // assignment ';' | expression ';'
  private parseSimpleStatement(): Statement {
    const expr = this.parseExpression();
    if (this.check('ASSIGN')) {
      if (expr.kind !== 'Identifier') {
        throw this.error(['SEMICOLON'], 'Only a variable name can be assigned to');
      }
      this.advance();
      const value = this.parseExpression();
      this.consume('SEMICOLON', "Terminate the assignment with ';'");
      return {
        kind: 'Assignment',
        name: expr.name,
        expr: value,
        position: expr.position,
      };
    }
    this.consume('SEMICOLON', "Terminate the statement with ';'");
    return { kind: 'ExpressionStatement', expr, position: expr.position };
  }

  private parseAssignment(): Assignment {
    const name = this.consume('ID');
    this.consume('ASSIGN');
    const expr = this.parseExpression();
    return { kind: 'Assignment', name: name.lexeme, expr, position: name.position };
  }

  private parseBlock(): Statement[] {
    this.consume('LBRACE');
    const body = this.parseStatements(['RBRACE']);
    this.consume('RBRACE');
    return body;
  }

  private parseConditional(): Statement {
    const start = this.consume('IF');
    this.consume('LPAREN');
    const cond = this.parseCondition();
    this.consume('RPAREN');
    const thenBlock = this.parseBlock();
    if (this.check('ELSE')) {
      this.advance();
      const elseBlock = this.parseBlock();
      return { kind: 'Conditional', cond, thenBlock, elseBlock, position: start.position };
    }
    return { kind: 'Conditional', cond, thenBlock, position: start.position };
  }

  private parseFor(): Statement {
    const start = this.consume('FOR');
    this.consume('LPAREN');
    const init = this.parseAssignment();
    this.consume('SEMICOLON');
    const cond = this.parseCondition();
    this.consume('SEMICOLON');
    const step = this.parseAssignment();
    this.consume('RPAREN');
    const body = this.parseBlock();
    return { kind: 'ForLoop', init, cond, step, body, position: start.position };
  }

  private parseWhile(): Statement {
    const start = this.consume('WHILE');
    this.consume('LPAREN');
    const cond = this.parseCondition();
    this.consume('RPAREN');
    const body = this.parseBlock();
    return { kind: 'WhileLoop', cond, body, position: start.position };
  }

  private parseFunctionDef(): FunctionDef {
    const start = this.consume('DEF');
    const name = this.consume('ID', 'Built-in keywords cannot be redefined');
    this.consume('LPAREN');
    const params: string[] = [];
    if (this.check('ID')) {
      params.push(this.advance().lexeme);
      while (this.check('COMMA')) {
        this.advance();
        params.push(this.consume('ID').lexeme);
      }
    }
    this.consume('RPAREN');
    this.consume('LBRACE');
    const body = this.parseStatements(
      ['RETURN'],
      "Functions must end with 'return <expression>;'"
    );
    this.consume('RETURN');
    const returnExpr = this.parseExpression();
    this.consume('SEMICOLON');
    this.consume('RBRACE', "'return' must be the last statement of a function");
    return {
      kind: 'FunctionDef',
      name: name.lexeme,
      params,
      body,
      returnExpr,
      position: start.position,
    };
  }

  private parseCondition(): Condition {
    const left = this.parseExpression();
    const op = relationalOps[this.peek().kind];
    if (op) {
      this.advance();
      const right = this.parseExpression();
      return { kind: 'Condition', left, op, right, position: left.position };
    }
    return { kind: 'Condition', left, position: left.position };
  }

  // expression := term (('+' | '-') term)*
  private parseExpression(): Expression {
    let left = this.parseTerm();
    let op = additiveOps[this.peek().kind];
    while (op) {
      this.advance();
      const right = this.parseTerm();
      left = { kind: 'BinaryOp', op, left, right, position: left.position };
      op = additiveOps[this.peek().kind];
    }
    return left;
  }

  // term := factor (('*' | '/' | '%') factor)*
  private parseTerm(): Expression {
    let left = this.parseFactor();
    let op = multiplicativeOps[this.peek().kind];
    while (op) {
      this.advance();
      const right = this.parseFactor();
      left = { kind: 'BinaryOp', op, left, right, position: left.position };
      op = multiplicativeOps[this.peek().kind];
    }
    return left;
  }

  // factor := base ('^' base)*, folded left to right
  private parseFactor(): Expression {
    let left = this.parseBase();
    while (this.check('POWER')) {
      this.advance();
      const right = this.parseBase();
      left = { kind: 'BinaryOp', op: '^', left, right, position: left.position };
    }
    return left;
  }

  private parseBase(): Expression {
    const token = this.peek();
    switch (token.kind) {
      case 'ID': {
        this.advance();
        if (this.check('LPAREN')) {
          return {
            kind: 'Call',
            category: 'user',
            callee: token.lexeme,
            args: this.parseArguments(),
            position: token.position,
          };
        }
        return { kind: 'Identifier', name: token.lexeme, position: token.position };
      }
      case 'NUMBER':
      case 'FLOAT':
        this.advance();
        return {
          kind: 'Literal',
          literalType: token.kind === 'NUMBER' ? 'number' : 'float',
          value: Number(token.lexeme),
          position: token.position,
        };
      case 'STRING':
        this.advance();
        return this.stringLiteral(token);
      case 'LPAREN': {
        this.advance();
        const inner = this.parseExpression();
        this.consume('RPAREN');
        return { kind: 'Grouping', inner, position: token.position };
      }
      case 'LBRACKET':
        return this.parseListLiteral();
      case 'MINUS':
        this.advance();
        return { kind: 'UnaryMinus', operand: this.parseBase(), position: token.position };
    }
    const func = trigFunctions[token.kind];
    if (func) {
      this.advance();
      this.consume('LPAREN');
      const arg = this.parseExpression();
      this.consume('RPAREN');
      return { kind: 'TrigCall', func, arg, position: token.position };
    }
    const matrixOp = matrixOps[token.kind];
    if (matrixOp) {
      this.advance();
      return {
        kind: 'MatrixOp',
        op: matrixOp.op,
        operands: this.parseFixedArguments(matrixOp.arity, () => this.parseExpression()),
        position: token.position,
      };
    }
    // Only keyword tokens carry a built-in name as their lexeme
    const signature = resolveBuiltin(token.lexeme);
    if (signature) {
      this.advance();
      const { category, params } = signature;
      const args = this.parseFixedArguments(params.length, (index) =>
        category === 'io' && params[index] === 'path'
          ? this.stringLiteral(this.consume('STRING', 'File paths must be string literals'))
          : this.parseExpression()
      );
      return {
        kind: 'Call',
        category,
        callee: signature.keyword,
        args,
        position: token.position,
      };
    }
    throw this.error(expressionStart);
  }

  // '[' (row (',' row)*)? ']'
  private parseListLiteral(): ListLiteral {
    const start = this.consume('LBRACKET');
    const rows: (Expression | Row)[] = [];
    if (!this.check('RBRACKET')) {
      rows.push(this.parseRow());
      while (this.check('COMMA')) {
        this.advance();
        rows.push(this.parseRow());
      }
    }
    this.consume('RBRACKET');
    return { kind: 'ListLiteral', rows, position: start.position };
  }

  // A row opening with '[' is a bracketed row, never a nested list expression
  private parseRow(): Expression | Row {
    if (!this.check('LBRACKET')) return this.parseExpression();
    const start = this.advance();
    const items = [this.parseExpression()];
    while (this.check('COMMA')) {
      this.advance();
      items.push(this.parseExpression());
    }
    this.consume('RBRACKET');
    return { kind: 'Row', items, position: start.position };
  }

  // '(' (expression (',' expression)*)? ')'
  private parseArguments(): Expression[] {
    this.consume('LPAREN');
    const args: Expression[] = [];
    if (!this.check('RPAREN')) {
      args.push(this.parseExpression());
      while (this.check('COMMA')) {
        this.advance();
        args.push(this.parseExpression());
      }
    }
    this.consume('RPAREN');
    return args;
  }

  // '(' arg (',' arg){arity-1} ')'
  private parseFixedArguments(
    arity: number,
    parseArg: (index: number) => Expression
  ): Expression[] {
    this.consume('LPAREN');
    const args: Expression[] = [];
    for (let i = 0; i < arity; i++) {
      if (i > 0) this.consume('COMMA', `Expected ${arity} arguments`);
      args.push(parseArg(i));
    }
    this.consume('RPAREN', `Expected ${arity} argument${arity === 1 ? '' : 's'}`);
    return args;
  }

  private stringLiteral(token: Token): Expression {
    return {
      kind: 'Literal',
      literalType: 'string',
      value: token.lexeme.slice(1, -1),
      position: token.position,
    };
  }

  private peek(): Token {
    const token = this.tokens[this.pos];
    if (token) return token;
    const last = this.tokens[this.tokens.length - 1];
    return { kind: 'EOF', lexeme: '', position: last ? last.position : { line: 1, column: 1 } };
  }

  private check(kind: TokenKind): boolean {
    return this.peek().kind === kind;
  }

  private advance(): Token {
    const token = this.peek();
    if (token.kind !== 'EOF') this.pos++;
    return token;
  }

  private consume(kind: TokenKind, suggestedFix?: string): Token {
    if (this.check(kind)) return this.advance();
    throw this.error([kind], suggestedFix);
  }

  private error(expectedKinds: readonly TokenKind[], suggestedFix?: string): ParseError {
    const found = this.peek();
    return new ParseError(found.position, expectedKinds, found.kind, suggestedFix);
  }
}

export function parse(tokens: Token[]): Program {
  const parser = new Parser(tokens);
  return parser.parse();
}
