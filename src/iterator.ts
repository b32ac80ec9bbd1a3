import { type BSTNode, type RootLink, leftmost, maxNode, rightmost } from './node';

// ============================================================================
// BIDIRECTIONAL ITERATOR
// ============================================================================

function successor<T>(node: BSTNode<T>): BSTNode<T> | null {
    if (node.right) return leftmost(node.right);
    let child = node;
    let p = node.parent;
    while (p && child === p.right) {
        child = p;
        p = p.parent;
    }
    return p;
}

function predecessor<T>(node: BSTNode<T>): BSTNode<T> | null {
    if (node.left) return rightmost(node.left);
    let child = node;
    let p = node.parent;
    while (p && child === p.left) {
        child = p;
        p = p.parent;
    }
    return p;
}

/**
 * Read-only cursor over a tree in sorted order.
 *
 * A position is either a node or the end sentinel ("one past the maximum").
 * Successor and predecessor are computed on demand by walking parent links,
 * so the cursor holds no stack and costs O(1) to copy.
 *
 * Any structural mutation touching the referenced node or its path
 * invalidates the cursor. No checks are made.
 */
export class ConstTreeIterator<T> {
    constructor(
        protected node: BSTNode<T> | null,
        protected readonly link: RootLink<T>
    ) {}

    get isEnd(): boolean { return this.node === null; }

    /** The element at this position. Throws at the end position. */
    get value(): T { return this.current().value; }

    /** Advances to the in-order successor. Stays at the end position once there. */
    next(): this {
        if (this.node) this.node = successor(this.node);
        return this;
    }

    /**
     * Steps back to the in-order predecessor.
     * From the end position this lands on the maximum of the tree;
     * from the minimum it lands on the end position.
     */
    prev(): this {
        this.node = this.node ? predecessor(this.node) : maxNode(this.link.root);
        return this;
    }

    equals(other: ConstTreeIterator<T>): boolean { return this.node === other.node; }

    protected current(): BSTNode<T> {
        if (!this.node) throw new Error('InvalidOperation: Cannot dereference the end iterator.');
        return this.node;
    }

    clone(): ConstTreeIterator<T> { return new ConstTreeIterator(this.node, this.link); }
}

/**
 * Mutable cursor. Adds in-place replacement of the referenced element.
 * Converts one way to {@link ConstTreeIterator} (it is one); there is no way back.
 */
export class TreeIterator<T> extends ConstTreeIterator<T> {
    get value(): T { return this.current().value; }

    /** The replacement must order exactly like the element it replaces. */
    set value(value: T) { this.current().value = value; }

    clone(): TreeIterator<T> { return new TreeIterator(this.node, this.link); }

    asConst(): ConstTreeIterator<T> { return new ConstTreeIterator(this.node, this.link); }
}
