/**
 * Syntax tree model exports.
 */
export { CATEGORIES } from './types.js';
export type {
  Annotation,
  Category,
  ChildGroup,
  LeafKey,
  Position,
  Range,
  Span,
  Syntax,
  SyntaxKind,
  Term,
} from './types.js';
export { childGroups, syntaxChildren, mapSyntax, leafPayload } from './syntax.js';
export {
  createTerm,
  defaultLeafKey,
  foldTerm,
  termSize,
  termEquals,
  ownContentEquals,
  contentKey,
} from './term.js';
export { IndexedTree } from './indexed-tree.js';
export { ContentInterner } from './content-ids.js';
export type { IndexedNode, IndexedGroup } from './indexed-tree.js';
