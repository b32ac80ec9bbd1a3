import type { BSTNode } from './node';

// ============================================================================
// TRAVERSAL ENGINE
// ============================================================================

export type TraversalOrder = 'in-order' | 'pre-order' | 'post-order';

export type Visitor<T> = (value: T) => void;

/**
 * Left, self, right. Yields ascending order for a valid tree.
 * Explicit stack instead of recursion: list-shaped trees are legal here.
 */
export function* inOrder<T>(root: BSTNode<T> | null): Generator<T, void, undefined> {
    const stack: BSTNode<T>[] = [];
    let curr = root;
    while (curr || stack.length) {
        while (curr) { stack.push(curr); curr = curr.left; }
        const top = stack.pop();
        if (!top) break;
        yield top.value;
        curr = top.right;
    }
}

/** Self, left, right. */
export function* preOrder<T>(root: BSTNode<T> | null): Generator<T, void, undefined> {
    if (!root) return;
    const stack: BSTNode<T>[] = [root];
    let node: BSTNode<T> | undefined;
    while ((node = stack.pop())) {
        yield node.value;
        // right first so that left is popped first
        if (node.right) stack.push(node.right);
        if (node.left) stack.push(node.left);
    }
}

/** Left, right, self. */
export function* postOrder<T>(root: BSTNode<T> | null): Generator<T, void, undefined> {
    const stack: BSTNode<T>[] = [];
    let curr = root;
    let lastVisited: BSTNode<T> | null = null;
    while (curr || stack.length) {
        if (curr) {
            stack.push(curr);
            curr = curr.left;
            continue;
        }
        const top = stack[stack.length - 1];
        if (top.right && top.right !== lastVisited) {
            curr = top.right;
        } else {
            yield top.value;
            lastVisited = top;
            stack.pop();
        }
    }
}

export function traverse<T>(root: BSTNode<T> | null, order: TraversalOrder): Generator<T, void, undefined> {
    switch (order) {
        case 'in-order': return inOrder(root);
        case 'pre-order': return preOrder(root);
        case 'post-order': return postOrder(root);
    }
}

/** Calls `visit` once per element in the requested order. */
export function walk<T>(root: BSTNode<T> | null, order: TraversalOrder, visit: Visitor<T>): void {
    for (const value of traverse(root, order)) visit(value);
}
