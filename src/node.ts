import type { Comparator } from './compare';

// ============================================================================
// NODE STORE
// ============================================================================

/**
 * A single tree node.
 *
 * `left` and `right` are the owning links: a subtree lives exactly as long as
 * the link that holds it. `parent` is a lookup-only back-reference used for
 * successor/predecessor math; nothing is ever kept alive or released through it.
 *
 * @template T - Element type.
 */
export class BSTNode<T> {
    left: BSTNode<T> | null = null;
    right: BSTNode<T> | null = null;

    constructor(
        public value: T,
        /** Non-owning. `null` for the root. */
        public parent: BSTNode<T> | null = null
    ) {}
}

/**
 * Owning link of the root node.
 * Shared by a tree and its iterators so that `prev()` from the end position
 * can find the maximum without holding a node.
 */
export interface RootLink<T> {
    root: BSTNode<T> | null;
}

/** Leftmost node of a non-empty subtree. */
export function leftmost<T>(node: BSTNode<T>): BSTNode<T> {
    while (node.left) node = node.left;
    return node;
}

/** Rightmost node of a non-empty subtree. */
export function rightmost<T>(node: BSTNode<T>): BSTNode<T> {
    while (node.right) node = node.right;
    return node;
}

export function minNode<T>(node: BSTNode<T> | null): BSTNode<T> | null {
    return node ? leftmost(node) : null;
}

export function maxNode<T>(node: BSTNode<T> | null): BSTNode<T> | null {
    return node ? rightmost(node) : null;
}

/** Iterative key lookup. Returns `null` when no equivalent node exists. */
export function findNode<T>(root: BSTNode<T> | null, key: T, compare: Comparator<T>): BSTNode<T> | null {
    let current = root;
    while (current) {
        const cmp = compare(key, current.value);
        if (cmp === 0) return current;
        current = cmp < 0 ? current.left : current.right;
    }
    return null;
}

/**
 * Creates a structural deep copy of a subtree.
 * The copy shares no nodes with the source; element values are copied by reference.
 * Complexity: O(N)
 */
export function copySubtree<T>(node: BSTNode<T> | null, parent: BSTNode<T> | null = null): BSTNode<T> | null {
    if (!node) return null;
    const root = new BSTNode(node.value, parent);
    // (source, copy) pairs; explicit stack because list-shaped trees are legal
    const stack: Array<[BSTNode<T>, BSTNode<T>]> = [[node, root]];
    let pair: [BSTNode<T>, BSTNode<T>] | undefined;
    while ((pair = stack.pop())) {
        const [source, copy] = pair;
        if (source.left) {
            copy.left = new BSTNode(source.left.value, copy);
            stack.push([source.left, copy.left]);
        }
        if (source.right) {
            copy.right = new BSTNode(source.right.value, copy);
            stack.push([source.right, copy.right]);
        }
    }
    return root;
}

/** Number of nodes on the longest root-to-leaf path. Empty = 0. */
export function subtreeHeight<T>(node: BSTNode<T> | null): number {
    if (!node) return 0;
    let height = 0;
    let level: BSTNode<T>[] = [node];
    while (level.length) {
        height++;
        const nextLevel: BSTNode<T>[] = [];
        for (const n of level) {
            if (n.left) nextLevel.push(n.left);
            if (n.right) nextLevel.push(n.right);
        }
        level = nextLevel;
    }
    return height;
}
