// src/evaluator.ts - Tree-walking evaluator
import { applyBinary, applyTrig, compare, isTruthy, negate } from './arithmetic';
import { Dispatcher } from './builtins';
import { Environment } from './environment';
import { RuntimeError } from './errors';
import { applyMatrixOp, buildMatrix } from './matrix';
import {
  BuiltinCategory,
  Call,
  Condition,
  Expression,
  ListLiteral,
  Program,
  Row,
  Statement,
  Value,
} from './types';
import { list, num, str } from './values';

export interface EvaluateOptions {
  /** Receives one line per assignment at top level, user call and dispatched built-in. */
  trace?: string[];
}

/**
 * Runs a program against `env`. The first runtime error aborts the run.
 * Loops and recursion are not bounded here; hosts impose their own limits.
 */
export function evaluate(
  program: Program,
  env: Environment,
  dispatcher: Dispatcher,
  options: EvaluateOptions = {}
): void {
  const trace = options.trace;
  let depth = 0;

  function execBlock(statements: readonly Statement[], frame: Environment) {
    for (const statement of statements) {
      execStatement(statement, frame);
    }
  }

  function execStatement(node: Statement, frame: Environment) {
    switch (node.kind) {
      case 'Assignment': {
        const value = evalExpr(node.expr, frame);
        frame.set(node.name, value);
        if (trace && depth === 0) trace.push(`Assigned ${node.name} (${value.kind})`);
        return;
      }
      case 'Conditional':
        if (evalCondition(node.cond, frame)) {
          execBlock(node.thenBlock, frame);
        } else if (node.elseBlock) {
          execBlock(node.elseBlock, frame);
        }
        return;
      case 'WhileLoop':
        while (evalCondition(node.cond, frame)) {
          execBlock(node.body, frame);
        }
        return;
      case 'ForLoop':
        execStatement(node.init, frame);
        while (evalCondition(node.cond, frame)) {
          execBlock(node.body, frame);
          execStatement(node.step, frame);
        }
        return;
      case 'FunctionDef':
        // Last definition wins
        frame.set(node.name, {
          kind: 'function',
          name: node.name,
          params: node.params,
          body: node.body,
          returnExpr: node.returnExpr,
          closure: frame,
        });
        return;
      case 'ExpressionStatement':
        evalExpr(node.expr, frame);
        return;
    }
  }

  function evalCondition(cond: Condition, frame: Environment): boolean {
    const left = evalExpr(cond.left, frame);
    if (!cond.op || !cond.right) return isTruthy(left, cond);
    return compare(cond.op, left, evalExpr(cond.right, frame), cond);
  }

  function evalExpr(node: Expression, frame: Environment): Value {
    switch (node.kind) {
      case 'Literal':
        return typeof node.value === 'number' ? num(node.value) : str(node.value);
      case 'Identifier': {
        const value = frame.lookup(node.name);
        if (!value) {
          throw new RuntimeError(
            'UndefinedVariable',
            `Variable '${node.name}' is not defined`,
            node,
            { suggestedFix: `Assign ${node.name} before using it` }
          );
        }
        return value;
      }
      case 'Grouping':
        return evalExpr(node.inner, frame);
      case 'BinaryOp':
        return applyBinary(
          node.op,
          evalExpr(node.left, frame),
          evalExpr(node.right, frame),
          node
        );
      case 'UnaryMinus':
        return negate(evalExpr(node.operand, frame), node);
      case 'TrigCall':
        return applyTrig(node.func, evalExpr(node.arg, frame), node);
      case 'ListLiteral':
        return evalList(node, frame);
      case 'MatrixOp':
        return applyMatrixOp(
          node.op,
          node.operands.map((operand) => evalExpr(operand, frame)),
          node
        );
      case 'Call':
        return node.category === 'user'
          ? callUser(node, frame)
          : callBuiltin(node, node.category, frame);
    }
  }

  // All bare rows -> list; all bracketed rows -> matrix; mixed -> ShapeError
  function evalList(node: ListLiteral, frame: Environment): Value {
    const items = node.rows.filter((row): row is Expression => row.kind !== 'Row');
    if (items.length === node.rows.length) {
      return list(items.map((item) => evalExpr(item, frame)));
    }
    const rows = node.rows.filter((row): row is Row => row.kind === 'Row');
    if (rows.length !== node.rows.length) {
      throw new RuntimeError(
        'ShapeError',
        'List literal mixes bracketed rows with bare items',
        node,
        { suggestedFix: 'Use only [a, b] rows for a matrix, or only bare items for a list' }
      );
    }
    return buildMatrix(
      rows.map((row) => row.items.map((item) => evalExpr(item, frame))),
      node
    );
  }

  function callUser(node: Call, frame: Environment): Value {
    const fn = frame.lookup(node.callee);
    if (!fn) {
      throw new RuntimeError(
        'UndefinedFunction',
        `Function '${node.callee}' is not defined`,
        node,
        { suggestedFix: `Define it first with def ${node.callee}(...) { ... }` }
      );
    }
    if (fn.kind !== 'function') {
      throw new RuntimeError(
        'TypeMismatch',
        `'${node.callee}' is a ${fn.kind}, not a function`,
        node
      );
    }
    if (fn.params.length !== node.args.length) {
      throw new RuntimeError(
        'ArityError',
        `Function '${fn.name}' expects ${fn.params.length} arguments, got ${node.args.length}`,
        node
      );
    }
    const args = node.args.map((arg) => evalExpr(arg, frame));
    if (trace) trace.push(`Calling ${fn.name}(${args.map((a) => a.kind).join(', ')})`);
    const callFrame = new Environment(fn.closure);
    fn.params.forEach((param, i) => callFrame.set(param, args[i]));
    depth++;
    try {
      execBlock(fn.body, callFrame);
      return evalExpr(fn.returnExpr, callFrame);
    } finally {
      depth--;
    }
  }

  function callBuiltin(
    node: Call,
    category: BuiltinCategory,
    frame: Environment
  ): Value {
    const args = node.args.map((arg) => evalExpr(arg, frame));
    if (trace) trace.push(`Dispatching ${category}.${node.callee} with ${args.length} args`);
    const outcome = dispatcher.dispatch(category, node.callee, args);
    if (outcome.error) {
      throw new RuntimeError('DispatchFailure', outcome.error.message, node, {
        dispatchError: outcome.error,
      });
    }
    return outcome.result;
  }

  execBlock(program.body, env);
}
