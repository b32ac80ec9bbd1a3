/**
 * @module parent-linked-bst
 * Ordered set on a plain binary search tree with parent-linked nodes.
 *
 * Contracts (performance-first):
 * - No self-balancing: sorted insertion order gives a list-shaped tree.
 * - Keys are unique; inserting an equivalent key is a no-op.
 * - Cursors are invalidated by structural mutation on their path.
 * - Invalid input => undefined behavior (no defensive checks).
 */

export { BinarySearchTree } from './binary-search-tree';
export { ConstTreeIterator, TreeIterator } from './iterator';
export type { BuildOptions } from './builder';
export type { TraversalOrder, Visitor } from './traversal';
export { defaultCompare, hashValue } from './compare';
export type { Comparator, EqualityFunction, HashFunction } from './compare';
