// tests/evaluator.test.ts
import { evaluate } from '../src/evaluator';
import { parse } from '../src/parser';
import { tokenize } from '../src/lexer';
import { Environment } from '../src/environment';
import { DispatchResult } from '../src/builtins';
import { DispatchError, RuntimeError } from '../src/errors';
import { BuiltinCategory, HandleValue, Value } from '../src/types';
import { list, matrix, NONE, num, str } from '../src/values';

function mockDispatcher(
  impl: () => DispatchResult = () => ({ result: NONE })
) {
  return {
    dispatch: jest.fn<DispatchResult, [BuiltinCategory, string, readonly Value[]]>(impl),
  };
}

function run(
  source: string,
  dispatcher = mockDispatcher(),
  trace?: string[]
): Environment {
  const env = new Environment();
  evaluate(parse(tokenize(source)), env, dispatcher, { trace });
  return env;
}

function runtimeError(source: string, dispatcher = mockDispatcher()): RuntimeError {
  try {
    run(source, dispatcher);
  } catch (e) {
    if (e instanceof RuntimeError) return e;
    throw e;
  }
  throw new Error('expected a RuntimeError');
}

function matrixData(env: Environment, name: string): readonly (readonly number[])[] {
  const value = env.lookup(name);
  if (value?.kind !== 'matrix') throw new Error(`${name} is not a matrix`);
  return value.data;
}

describe('Evaluator', () => {
  describe('arithmetic', () => {
    it('should respect operator precedence', () => {
      const env = run(`
        a = 2 + 3 * 4;
        b = 2 ^ 3 ^ 2;
        c = (1 + 1) * 2;
        d = 20 % 7;
        e = -2 ^ 2;
        f = 7 - 2 - 2;
        g = 9 / 3;
      `);
      expect(env.lookup('a')).toEqual(num(14));
      expect(env.lookup('b')).toEqual(num(64));
      expect(env.lookup('c')).toEqual(num(4));
      expect(env.lookup('d')).toEqual(num(6));
      expect(env.lookup('e')).toEqual(num(4));
      expect(env.lookup('f')).toEqual(num(3));
      expect(env.lookup('g')).toEqual(num(3));
    });

    it('should raise DivisionByZero for / and %', () => {
      const div = runtimeError('x = 1 / 0;');
      expect(div.kind).toBe('DivisionByZero');
      expect(div.message).toBe('1 / 0 at 1:5');
      expect(runtimeError('x = 5 % 0;').kind).toBe('DivisionByZero');
    });

    it('should raise DomainError outside the reals', () => {
      expect(runtimeError('x = (-8) ^ 0.5;').kind).toBe('DomainError');
      expect(runtimeError('x = sqrt(-1);').kind).toBe('DomainError');
      const zero = runtimeError('x = 0 ^ -1;');
      expect(zero.kind).toBe('DomainError');
      expect(zero.message).toBe('0 ^ -1 is undefined at 1:5');
      expect(run('x = 2 ^ -1;').lookup('x')).toEqual(num(0.5));
    });

    it('should raise DomainError instead of storing NaN after overflow', () => {
      const rem = runtimeError('x = 10 ^ 400 % 3;');
      expect(rem.kind).toBe('DomainError');
      expect(rem.message).toBe('Infinity % 3 is not a real number at 1:5');
      expect(runtimeError('x = 10 ^ 400 - 10 ^ 400;').message).toBe(
        'Infinity - Infinity is not a real number at 1:5'
      );
      expect(run('x = 10 ^ 400 + 1;').lookup('x')).toEqual(num(Infinity));
    });

    it('should evaluate trig functions', () => {
      const env = run('s = sin(0); c = cos(0);');
      expect(env.lookup('s')).toEqual(num(0));
      expect(env.lookup('c')).toEqual(num(1));
    });

    it('should concatenate strings and reject other string arithmetic', () => {
      expect(run('s = "ab" + "cd";').lookup('s')).toEqual(str('abcd'));
      const error = runtimeError('x = "a" * 2;');
      expect(error.kind).toBe('TypeMismatch');
      expect(error.message).toBe("Left operand of '*' must be a number, got string at 1:5");
    });
  });

  describe('lists and matrices', () => {
    it('should classify list literals by their rows', () => {
      const env = run('m = [[1, 2], [3, 4]]; l = [1, "a"]; e = [];');
      expect(env.lookup('m')).toEqual(matrix([[1, 2], [3, 4]]));
      expect(env.lookup('l')).toEqual(list([num(1), str('a')]));
      expect(env.lookup('e')).toEqual({ kind: 'list', items: [] });
    });

    it('should reject mixed, ragged and non-numeric rows', () => {
      expect(runtimeError('z = [1, [2, 3]];').kind).toBe('ShapeError');
      const ragged = runtimeError('z = [[1, 2], [3]];');
      expect(ragged.kind).toBe('ShapeError');
      expect(ragged.message).toBe('Matrix row 2 has 1 columns, expected 2 at 1:5');
      expect(runtimeError('z = [["a"]];').kind).toBe('TypeMismatch');
    });

    it('should apply matrix operations', () => {
      const env = run(`
        a = [[1, 2], [3, 4]];
        b = [[10, 20], [30, 40]];
        s = matadd(b, a);
        d = matsub(b, a);
        p = matmult(a, [[5, 6], [7, 8]]);
        t = transpose(transpose(a));
        r = transpose([[1, 2, 3]]);
      `);
      expect(matrixData(env, 's')).toEqual([[11, 22], [33, 44]]);
      expect(matrixData(env, 'd')).toEqual([[9, 18], [27, 36]]);
      expect(matrixData(env, 'p')).toEqual([[19, 22], [43, 50]]);
      expect(env.lookup('t')).toEqual(env.lookup('a'));
      expect(matrixData(env, 'r')).toEqual([[1], [2], [3]]);
    });

    it('should round-trip a non-square matrix through transpose', () => {
      const env = run('a = [[1, 2, 3], [4, 5, 6]]; t = transpose(a); u = transpose(t);');
      expect(matrixData(env, 't')).toEqual([[1, 4], [2, 5], [3, 6]]);
      expect(env.lookup('u')).toEqual(env.lookup('a'));
    });

    it('should invert a square matrix', () => {
      const [[a, b], [c, d]] = matrixData(run('i = inverse([[4, 7], [2, 6]]);'), 'i');
      expect(a).toBeCloseTo(0.6);
      expect(b).toBeCloseTo(-0.7);
      expect(c).toBeCloseTo(-0.2);
      expect(d).toBeCloseTo(0.4);
    });

    it('should invert matrices whose entries are all tiny', () => {
      const [[x]] = matrixData(run('i = inverse([[0.0000000000005]]);'), 'i');
      expect(x * 0.0000000000005).toBeCloseTo(1);
      const [[a, b], [c, d]] = matrixData(
        run('j = inverse([[0.0000000000001, 0], [0, 0.0000000000001]]);'),
        'j'
      );
      expect(a * 0.0000000000001).toBeCloseTo(1);
      expect(b).toBe(0);
      expect(c).toBe(0);
      expect(d * 0.0000000000001).toBeCloseTo(1);
    });

    it('should raise ShapeError on incompatible shapes', () => {
      const add = runtimeError('x = matadd([[1, 2]], [[1], [2]]);');
      expect(add.kind).toBe('ShapeError');
      expect(add.message).toBe('matadd needs equal shapes, got 1x2 and 2x1 at 1:5');
      expect(runtimeError('x = matmult([[1, 2]], [[1, 2]]);').kind).toBe('ShapeError');
      expect(runtimeError('x = inverse([[1, 2, 3], [4, 5, 6]]);').kind).toBe('ShapeError');
      expect(runtimeError('x = inverse([[1, 2], [2, 4]]);').message).toBe(
        'inverse of a singular matrix at 1:5'
      );
    });

    it('should reject matrix operations on lists', () => {
      expect(runtimeError('x = transpose([1, 2]);').kind).toBe('TypeMismatch');
    });
  });

  describe('variables and functions', () => {
    it('should report undefined variables at the identifier', () => {
      const error = runtimeError('y = x + 1;');
      expect(error.kind).toBe('UndefinedVariable');
      expect(error.position).toEqual({ line: 1, column: 5 });
      expect(error.nodeKind).toBe('Identifier');
      expect(error.suggestedFix).toBe('Assign x before using it');
    });

    it('should evaluate recursive functions', () => {
      const env = run(`
        def fact(n) {
          r = 1;
          if (n > 1) { r = n * fact(n - 1); }
          return r;
        }
        v = fact(5);
      `);
      expect(env.lookup('v')).toEqual(num(120));
    });

    it('should keep function frames local', () => {
      const env = run(`
        a = 1;
        def f(b) { a = b + 100; c = a; return c; }
        c = f(5);
      `);
      expect(env.lookup('c')).toEqual(num(105));
      expect(env.lookup('a')).toEqual(num(1));
      expect(env.lookup('b')).toBeUndefined();
    });

    it('should read globals through the defining frame', () => {
      const env = run('k = 10; def addk(x) { return x + k; } y = addk(5);');
      expect(env.lookup('y')).toEqual(num(15));
    });

    it('should let the last definition win', () => {
      const env = run('def g() { return 1; } def g() { return 2; } v = g();');
      expect(env.lookup('v')).toEqual(num(2));
    });

    it('should check arity before evaluating arguments', () => {
      const tooFew = runtimeError('def h(a, b) { return a; } h(1);');
      expect(tooFew.kind).toBe('ArityError');
      expect(tooFew.message).toBe("Function 'h' expects 2 arguments, got 1 at 1:27");
      expect(runtimeError('def h(a) { return a; } h(1, missing);').kind).toBe('ArityError');
    });

    it('should reject calls to unknown names and non-functions', () => {
      expect(runtimeError('q(1);').kind).toBe('UndefinedFunction');
      const error = runtimeError('x = 1; x(2);');
      expect(error.kind).toBe('TypeMismatch');
      expect(error.message).toBe("'x' is a number, not a function at 1:8");
    });
  });

  describe('control flow', () => {
    it('should run for loops with their step', () => {
      const dispatcher = mockDispatcher();
      run('for (i = 0; i < 3; i = i + 1) { print(i); }', dispatcher);
      expect(dispatcher.dispatch).toHaveBeenCalledTimes(3);
      expect(dispatcher.dispatch).toHaveBeenNthCalledWith(1, 'io', 'print', [num(0)]);
      expect(dispatcher.dispatch).toHaveBeenNthCalledWith(2, 'io', 'print', [num(1)]);
      expect(dispatcher.dispatch).toHaveBeenNthCalledWith(3, 'io', 'print', [num(2)]);
    });

    it('should run while loops', () => {
      const env = run('i = 0; s = 0; while (i < 5) { s = s + i; i = i + 1; }');
      expect(env.lookup('s')).toEqual(num(10));
    });

    it('should treat non-zero numbers as true', () => {
      const env = run('if (0) { t = 1; } else { t = 2; } if (3) { u = 1; }');
      expect(env.lookup('t')).toEqual(num(2));
      expect(env.lookup('u')).toEqual(num(1));
    });

    it('should require a number for a bare condition', () => {
      expect(runtimeError('if ("yes") { x = 1; }').kind).toBe('TypeMismatch');
    });

    it('should compare values structurally with == and !=', () => {
      const env = run(`
        if ([1, 2] == [1, 2]) { e = 1; } else { e = 0; }
        if ("a" != "b") { n = 1; } else { n = 0; }
      `);
      expect(env.lookup('e')).toEqual(num(1));
      expect(env.lookup('n')).toEqual(num(1));
    });

    it('should only order numbers', () => {
      expect(runtimeError('if ("a" < "b") { x = 1; }').kind).toBe('TypeMismatch');
    });
  });

  describe('built-in dispatch', () => {
    it('should pass evaluated arguments and keep returned handles', () => {
      const model: HandleValue = { kind: 'handle', tag: 'kmeans', ref: {} };
      const dispatcher = mockDispatcher(() => ({ result: model }));
      const env = run('m = kmeans([[1, 2], [3, 4]], 3);', dispatcher);
      expect(dispatcher.dispatch).toHaveBeenCalledWith('ml', 'kmeans', [
        matrix([[1, 2], [3, 4]]),
        num(3),
      ]);
      expect(env.lookup('m')).toBe(model);
    });

    it('should raise DispatchFailure carrying the collaborator error', () => {
      const failure = new DispatchError('plot', 'histogram', 'boom');
      const error = runtimeError(
        'histogram(1);',
        mockDispatcher(() => ({ error: failure }))
      );
      expect(error.kind).toBe('DispatchFailure');
      expect(error.message).toBe('boom at 1:1');
      expect(error.dispatchError).toBe(failure);
    });
  });

  describe('trace', () => {
    it('should record top-level assignments and dispatches', () => {
      const trace: string[] = [];
      run('x = 1; print(x);', mockDispatcher(), trace);
      expect(trace).toEqual(['Assigned x (number)', 'Dispatching io.print with 1 args']);
    });

    it('should record user calls but not their inner assignments', () => {
      const trace: string[] = [];
      run('def f(a) { b = a; return b; } y = f(2);', mockDispatcher(), trace);
      expect(trace).toEqual(['Calling f(number)', 'Assigned y (number)']);
    });
  });
});
