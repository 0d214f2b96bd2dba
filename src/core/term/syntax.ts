/**
 * Shape-level operations on a single layer of syntax.
 * Everything here switches over `kind` exhaustively.
 */
import type { ChildGroup, Syntax } from './types.js';

function assertNever(value: never): never {
  throw new Error(`Unhandled syntax kind: ${JSON.stringify(value)}`);
}

function fixed<F>(key: string, children: readonly F[]): ChildGroup<F> {
  return { key, arity: 'fixed', children };
}

function variable<F>(key: string, children: readonly F[]): ChildGroup<F> {
  return { key, arity: 'variable', children };
}

function optional<F>(child: F | null): readonly F[] {
  return child === null ? [] : [child];
}

/**
 * Children of one node, grouped by field in declared order.
 */
export function childGroups<L, F>(syntax: Syntax<L, F>): ChildGroup<F>[] {
  switch (syntax.kind) {
    case 'Leaf':
    case 'Comment':
      return [];
    case 'Indexed':
      return [variable('children', syntax.children)];
    case 'Fixed':
      return [fixed('children', syntax.children)];
    case 'Keyed':
      return syntax.entries.map(([key, child]) => fixed(`key:${key}`, [child]));
    case 'FunctionCall':
      return [fixed('callee', [syntax.callee]), variable('args', syntax.args)];
    case 'Function':
      return [
        fixed('id', optional(syntax.id)),
        fixed('params', optional(syntax.params)),
        fixed('body', [syntax.body]),
      ];
    case 'Assignment':
      return [fixed('target', [syntax.target]), fixed('value', [syntax.value])];
    case 'MemberAccess':
      return [fixed('object', [syntax.object]), fixed('property', [syntax.property])];
    case 'MethodCall':
      return [
        fixed('target', [syntax.target]),
        fixed('method', [syntax.method]),
        variable('args', syntax.args),
      ];
    case 'If':
      return [fixed('condition', [syntax.condition]), fixed('branches', syntax.branches)];
    case 'Operator':
      return [fixed('operands', syntax.operands)];
    case 'ParseError':
      return [variable('children', syntax.children)];
    case 'Pair':
      return [fixed('key', [syntax.key]), fixed('value', [syntax.value])];
    case 'Switch':
      return [variable('subject', syntax.subject), variable('cases', syntax.cases)];
    case 'Case':
      return [fixed('test', [syntax.test]), variable('body', syntax.body)];
    case 'While':
      return [fixed('condition', [syntax.condition]), variable('body', syntax.body)];
    case 'Return':
    case 'Yield':
      return [variable('values', syntax.values)];
    case 'Throw':
      return [fixed('expression', [syntax.expression])];
    case 'Break':
    case 'Continue':
      return [fixed('label', optional(syntax.label))];
    default:
      return assertNever(syntax);
  }
}

/**
 * All children in declared order. Each child appears exactly once.
 */
export function syntaxChildren<L, F>(syntax: Syntax<L, F>): F[] {
  return childGroups(syntax).flatMap((group) => group.children);
}

/**
 * Rebuild a layer with every child replaced by `fn(child)`.
 * Children are visited in declared order.
 */
export function mapSyntax<L, A, B>(syntax: Syntax<L, A>, fn: (child: A) => B): Syntax<L, B> {
  const opt = (child: A | null): B | null => (child === null ? null : fn(child));

  switch (syntax.kind) {
    case 'Leaf':
      return { kind: 'Leaf', value: syntax.value };
    case 'Comment':
      return { kind: 'Comment', text: syntax.text };
    case 'Indexed':
      return { kind: 'Indexed', children: syntax.children.map(fn) };
    case 'Fixed':
      return { kind: 'Fixed', children: syntax.children.map(fn) };
    case 'Keyed':
      return { kind: 'Keyed', entries: syntax.entries.map(([key, child]) => [key, fn(child)] as const) };
    case 'FunctionCall': {
      const callee = fn(syntax.callee);
      return { kind: 'FunctionCall', callee, args: syntax.args.map(fn) };
    }
    case 'Function': {
      const id = opt(syntax.id);
      const params = opt(syntax.params);
      return { kind: 'Function', id, params, body: fn(syntax.body) };
    }
    case 'Assignment': {
      const target = fn(syntax.target);
      return { kind: 'Assignment', target, value: fn(syntax.value) };
    }
    case 'MemberAccess': {
      const object = fn(syntax.object);
      return { kind: 'MemberAccess', object, property: fn(syntax.property) };
    }
    case 'MethodCall': {
      const target = fn(syntax.target);
      const method = fn(syntax.method);
      return { kind: 'MethodCall', target, method, args: syntax.args.map(fn) };
    }
    case 'If': {
      const condition = fn(syntax.condition);
      return { kind: 'If', condition, branches: syntax.branches.map(fn) };
    }
    case 'Operator':
      return { kind: 'Operator', operands: syntax.operands.map(fn) };
    case 'ParseError':
      return { kind: 'ParseError', children: syntax.children.map(fn) };
    case 'Pair': {
      const key = fn(syntax.key);
      return { kind: 'Pair', key, value: fn(syntax.value) };
    }
    case 'Switch': {
      const subject = syntax.subject.map(fn);
      return { kind: 'Switch', subject, cases: syntax.cases.map(fn) };
    }
    case 'Case': {
      const test = fn(syntax.test);
      return { kind: 'Case', test, body: syntax.body.map(fn) };
    }
    case 'While': {
      const condition = fn(syntax.condition);
      return { kind: 'While', condition, body: syntax.body.map(fn) };
    }
    case 'Return':
      return { kind: 'Return', values: syntax.values.map(fn) };
    case 'Yield':
      return { kind: 'Yield', values: syntax.values.map(fn) };
    case 'Throw':
      return { kind: 'Throw', expression: fn(syntax.expression) };
    case 'Break':
      return { kind: 'Break', label: opt(syntax.label) };
    case 'Continue':
      return { kind: 'Continue', label: opt(syntax.label) };
    default:
      return assertNever(syntax);
  }
}

/**
 * The atomic payload carried by Leaf and Comment nodes, or null for branches.
 */
export function leafPayload<L, F>(syntax: Syntax<L, F>): { value: L } | null {
  switch (syntax.kind) {
    case 'Leaf':
      return { value: syntax.value };
    case 'Comment':
      return { value: syntax.text };
    default:
      return null;
  }
}
