// src/lexer.ts - Tokenizer
import { LexError } from './errors';
import { Keyword, keywords, Position, Token, TokenKind } from './types';

const twoCharOperators: Record<string, TokenKind> = {
  '==': 'EQ',
  '!=': 'NE',
  '<=': 'LE',
  '>=': 'GE',
};

const singleCharTokens: Record<string, TokenKind> = {
  '=': 'ASSIGN',
  '+': 'PLUS',
  '-': 'MINUS',
  '*': 'MULT',
  '/': 'DIV',
  '%': 'MOD',
  '^': 'POWER',
  '<': 'LT',
  '>': 'GT',
  '(': 'LPAREN',
  ')': 'RPAREN',
  '{': 'LBRACE',
  '}': 'RBRACE',
  '[': 'LBRACKET',
  ']': 'RBRACKET',
  ',': 'COMMA',
  ';': 'SEMICOLON',
};

const isDigit = (c: string) => c >= '0' && c <= '9';
const isIdStart = (c: string) => /[A-Za-z_]/.test(c);
const isIdPart = (c: string) => /[A-Za-z0-9_]/.test(c);

function isKeyword(word: string): word is Keyword {
  return Object.prototype.hasOwnProperty.call(keywords, word);
}

export function tokenize(source: string): Token[] {
  const tokens: Token[] = [];
  let pos = 0;
  let line = 1;
  let column = 1;

  const peek = (offset = 0) => source[pos + offset] ?? '';
  const here = (): Position => ({ line, column });
  const advance = (count = 1) => {
    for (let i = 0; i < count; i++) {
      if (source[pos] === '\n') {
        line++;
        column = 1;
      } else {
        column++;
      }
      pos++;
    }
  };
  const push = (kind: TokenKind, lexeme: string, position: Position) => {
    tokens.push({ kind, lexeme, position });
  };

  while (pos < source.length) {
    const char = peek();
    // Skip whitespace
    if (char === ' ' || char === '\t' || char === '\r' || char === '\n') {
      advance();
      continue;
    }
    // Line comment
    if (char === '/' && peek(1) === '/') {
      while (pos < source.length && peek() !== '\n') advance();
      continue;
    }
    const start = here();
    // NUMBER or FLOAT; a trailing '.' needs at least one digit after it
    if (isDigit(char)) {
      let text = '';
      while (isDigit(peek())) {
        text += peek();
        advance();
      }
      if (peek() === '.') {
        if (!isDigit(peek(1))) {
          throw new LexError(here(), '.', `Write '${text}.0' or '${text}'`);
        }
        text += '.';
        advance();
        while (isDigit(peek())) {
          text += peek();
          advance();
        }
        push('FLOAT', text, start);
      } else {
        push('NUMBER', text, start);
      }
      continue;
    }
    // STRING: no escapes, no embedded quotes
    if (char === '"') {
      const end = source.indexOf('"', pos + 1);
      if (end === -1) {
        throw new LexError(start, '"', 'Close the string with a double quote');
      }
      const lexeme = source.slice(pos, end + 1);
      advance(lexeme.length);
      push('STRING', lexeme, start);
      continue;
    }
    // Keyword or identifier
    if (isIdStart(char)) {
      let word = '';
      while (isIdPart(peek())) {
        word += peek();
        advance();
      }
      push(isKeyword(word) ? keywords[word] : 'ID', word, start);
      continue;
    }
    const two = source.slice(pos, pos + 2);
    const twoKind = twoCharOperators[two];
    if (twoKind) {
      advance(2);
      push(twoKind, two, start);
      continue;
    }
    const oneKind = singleCharTokens[char];
    if (oneKind) {
      advance();
      push(oneKind, char, start);
      continue;
    }
    throw new LexError(start, char);
  }
  push('EOF', '', here());
  return tokens;
}
