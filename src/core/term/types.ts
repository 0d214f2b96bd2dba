/**
 * Types for the canonical syntax tree shared by both sides of a comparison.
 */

/**
 * Language-independent node categories.
 * Assigned upstream from grammar-specific node names.
 */
export const CATEGORIES = [
  'Program',
  'ParseError',
  'Comment',
  'Identifier',
  'StringLiteral',
  'IntegerLiteral',
  'NumberLiteral',
  'BooleanLiteral',
  'NullLiteral',
  'RegexLiteral',
  'TemplateString',
  'ArrayLiteral',
  'ObjectLiteral',
  'Pair',
  'Operator',
  'BinaryOperator',
  'UnaryOperator',
  'BooleanOperator',
  'MathOperator',
  'RelationalOperator',
  'BitwiseOperator',
  'RangeExpression',
  'ScopeOperator',
  'Assignment',
  'MathAssignment',
  'MemberAccess',
  'SubscriptAccess',
  'FunctionCall',
  'MethodCall',
  'Args',
  'Params',
  'Function',
  'Method',
  'Class',
  'If',
  'Switch',
  'Case',
  'While',
  'DoWhile',
  'For',
  'Try',
  'Catch',
  'Finally',
  'Return',
  'Yield',
  'Throw',
  'Break',
  'Continue',
  'ExpressionStatements',
  'Other',
] as const;

export type Category = (typeof CATEGORIES)[number];

/** Half-open byte range into the source. */
export interface Range {
  start: number;
  end: number;
}

/** 1-based line/column position. */
export interface Position {
  line: number;
  column: number;
}

export interface Span {
  start: Position;
  end: Position;
}

/**
 * Metadata attached to every node by the parser.
 */
export interface Annotation {
  readonly range: Readonly<Range>;
  readonly span: Readonly<Span>;
  readonly category: Category;
}

/**
 * One level of syntax. `L` is the leaf payload, `F` the type of a child.
 * The set of kinds is closed; every consumer switches over `kind` exhaustively.
 */
export type Syntax<L, F> =
  /** Identifier or atomic literal. */
  | { readonly kind: 'Leaf'; readonly value: L }
  /** Variable-length ordered children, e.g. a statement list. */
  | { readonly kind: 'Indexed'; readonly children: readonly F[] }
  /** Fixed-arity ordered children, e.g. a binary operator and its operands. */
  | { readonly kind: 'Fixed'; readonly children: readonly F[] }
  /** Children addressed by key, insertion ordered. Keys are unique. */
  | { readonly kind: 'Keyed'; readonly entries: readonly (readonly [string, F])[] }
  | { readonly kind: 'FunctionCall'; readonly callee: F; readonly args: readonly F[] }
  | { readonly kind: 'Function'; readonly id: F | null; readonly params: F | null; readonly body: F }
  | { readonly kind: 'Assignment'; readonly target: F; readonly value: F }
  /** `object.property` */
  | { readonly kind: 'MemberAccess'; readonly object: F; readonly property: F }
  /** `target.method(args)` */
  | { readonly kind: 'MethodCall'; readonly target: F; readonly method: F; readonly args: readonly F[] }
  | { readonly kind: 'If'; readonly condition: F; readonly branches: readonly F[] }
  | { readonly kind: 'Operator'; readonly operands: readonly F[] }
  /** Whatever the parser recovered around a syntax error. */
  | { readonly kind: 'ParseError'; readonly children: readonly F[] }
  | { readonly kind: 'Comment'; readonly text: L }
  | { readonly kind: 'Pair'; readonly key: F; readonly value: F }
  | { readonly kind: 'Switch'; readonly subject: readonly F[]; readonly cases: readonly F[] }
  | { readonly kind: 'Case'; readonly test: F; readonly body: readonly F[] }
  | { readonly kind: 'While'; readonly condition: F; readonly body: readonly F[] }
  | { readonly kind: 'Return'; readonly values: readonly F[] }
  | { readonly kind: 'Yield'; readonly values: readonly F[] }
  | { readonly kind: 'Throw'; readonly expression: F }
  | { readonly kind: 'Break'; readonly label: F | null }
  | { readonly kind: 'Continue'; readonly label: F | null };

export type SyntaxKind = Syntax<unknown, unknown>['kind'];

/**
 * An annotated syntax tree node. Each parent owns its children exclusively.
 */
export interface Term<L = string> {
  readonly annotation: Annotation;
  readonly syntax: Syntax<L, Term<L>>;
}

/**
 * A named group of children within one node.
 * `fixed` groups pair children by position when two nodes are matched,
 * `variable` groups pair them by best match.
 */
export interface ChildGroup<F> {
  readonly key: string;
  readonly arity: 'fixed' | 'variable';
  readonly children: readonly F[];
}

/** Turns a leaf payload into a string for equality and hashing. */
export type LeafKey<L> = (value: L) => string;
