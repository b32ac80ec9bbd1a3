import { type Comparator, defaultCompare } from './compare';
import { type BuildOptions, type BuiltTree, buildFromInorderPostorder, buildFromPreorderInorder } from './builder';
import { ConstTreeIterator, TreeIterator } from './iterator';
import { BSTNode, type RootLink, copySubtree, findNode, leftmost, minNode, subtreeHeight } from './node';
import { type TraversalOrder, type Visitor, traverse, walk } from './traversal';

const same = <T>(value: T): T => value;

/**
 * An ordered set of unique elements stored in a plain (unbalanced) binary search tree.
 *
 * Features:
 * - O(h) insert/erase/find, where h is the height: log N on average, N when
 *   elements arrive sorted.
 * - Nodes carry parent back-references, so cursors step to the successor or
 *   predecessor without a stack.
 * - Reconstruction from (pre-order, in-order) or (in-order, post-order) pairs.
 *
 * Contracts:
 * - Elements must not be mutated in a way that changes their ordering.
 * - Structural mutation during a traversal or while a cursor is in use on the
 *   affected path is undefined behavior.
 *
 * @template T - Element type.
 */
export class BinarySearchTree<T> implements Iterable<T> {
    #link: RootLink<T> = { root: null };
    #size = 0;
    #compare: Comparator<T>;

    constructor(compare: Comparator<T> = defaultCompare) {
        this.#compare = compare;
    }

    /** Inserts `values` one by one; later duplicates are ignored. */
    static of<U>(...values: U[]): BinarySearchTree<U> {
        return BinarySearchTree.from(values);
    }

    static from<U>(values: Iterable<U>, compare?: Comparator<U>): BinarySearchTree<U> {
        const tree = new BinarySearchTree<U>(compare);
        for (const v of values) tree.insert(v);
        return tree;
    }

    /**
     * Move construction: steals the node graph of `source` in O(1).
     * `source` is left empty but usable.
     */
    static take<U>(source: BinarySearchTree<U>): BinarySearchTree<U> {
        const tree = new BinarySearchTree<U>(source.#compare);
        tree.moveFrom(source);
        return tree;
    }

    /** Rebuilds the tree described by a pre-order and an in-order listing of the same elements. */
    static fromPreorderInorder<U>(preorder: readonly U[], inorder: readonly U[], options: BuildOptions<U> = {}): BinarySearchTree<U> {
        return BinarySearchTree.#adopt(buildFromPreorderInorder(preorder, inorder, options), options.compare);
    }

    /** Rebuilds the tree described by an in-order and a post-order listing of the same elements. */
    static fromInorderPostorder<U>(inorder: readonly U[], postorder: readonly U[], options: BuildOptions<U> = {}): BinarySearchTree<U> {
        return BinarySearchTree.#adopt(buildFromInorderPostorder(inorder, postorder, options), options.compare);
    }

    static #adopt<U>(built: BuiltTree<U>, compare?: Comparator<U>): BinarySearchTree<U> {
        const tree = new BinarySearchTree<U>(compare);
        tree.#link.root = built.root;
        tree.#size = built.size;
        return tree;
    }

    // === CAPACITY ===

    get size(): number { return this.#size; }
    isEmpty(): boolean { return this.#size === 0; }

    /** Length of the longest root-to-leaf path. O(N). */
    get height(): number { return subtreeHeight(this.#link.root); }

    // === COPY / MOVE ===

    /** Deep copy. The copy shares no nodes with this tree. */
    clone(): BinarySearchTree<T> {
        const tree = new BinarySearchTree<T>(this.#compare);
        tree.#link.root = copySubtree(this.#link.root);
        tree.#size = this.#size;
        return tree;
    }

    /** Copy assignment: replaces the contents with a deep copy of `other`. */
    assign(other: BinarySearchTree<T>): this {
        if (other !== this) this.swap(other.clone());
        return this;
    }

    /** Move assignment: takes over the node graph of `source`, leaving it empty. */
    moveFrom(source: BinarySearchTree<T>): this {
        if (source === this) return this;
        this.#link.root = source.#link.root;
        this.#size = source.#size;
        this.#compare = source.#compare;
        source.clear();
        return this;
    }

    swap(other: BinarySearchTree<T>): void {
        const root = this.#link.root;
        const size = this.#size;
        const compare = this.#compare;
        this.#link.root = other.#link.root;
        this.#size = other.#size;
        this.#compare = other.#compare;
        other.#link.root = root;
        other.#size = size;
        other.#compare = compare;
    }

    // === MODIFIERS ===

    /** Inserts `value` unless an equivalent element exists. Returns the position of whichever is in the tree. */
    insert(value: T): TreeIterator<T> {
        return this.emplace(same, value)[0];
    }

    /**
     * Builds a candidate with `make(...args)` and inserts it unless an equivalent element exists.
     * @returns The position of the new or existing element, and whether an insertion happened.
     */
    emplace<A extends unknown[]>(make: (...args: A) => T, ...args: A): [TreeIterator<T>, boolean] {
        const value = make(...args);

        let parent = this.#link.root;
        if (!parent) {
            this.#link.root = new BSTNode(value);
            this.#size++;
            return [this.#at(this.#link.root), true];
        }

        for (;;) {
            const cmp = this.#compare(value, parent.value);
            if (cmp === 0) return [this.#at(parent), false];
            const side = cmp < 0 ? 'left' : 'right';
            const child: BSTNode<T> | null = parent[side];
            if (!child) {
                const node = new BSTNode(value, parent);
                parent[side] = node;
                this.#size++;
                return [this.#at(node), true];
            }
            parent = child;
        }
    }

    /**
     * Removes the element equivalent to `key`.
     *
     * A node with two children is not unlinked: it receives its successor's
     * value and the successor's node is unlinked instead. Cursors on that
     * successor node become stale.
     *
     * @returns The position following the erased element, or `end()` if it was
     * the maximum or `key` is absent.
     */
    erase(key: T): TreeIterator<T> {
        const target = findNode(this.#link.root, key, this.#compare);
        if (!target) return this.end();

        let following: TreeIterator<T>;
        if (target.left && target.right) {
            const succ = leftmost(target.right);
            target.value = succ.value;
            this.#replace(succ, succ.right);
            following = this.#at(target);
        } else {
            following = this.#at(target).next();
            this.#replace(target, target.left ?? target.right);
        }

        this.#size--;
        return following;
    }

    /** Drops every node. */
    clear(): void {
        this.#link.root = null;
        this.#size = 0;
    }

    /**
     * Moves `replacement` (possibly `null`) into the slot that owns `node`:
     * the parent's left or right link, or the root link.
     */
    #replace(node: BSTNode<T>, replacement: BSTNode<T> | null) {
        const parent = node.parent;
        if (replacement) replacement.parent = parent;
        if (!parent) this.#link.root = replacement;
        else if (parent.left === node) parent.left = replacement;
        else parent.right = replacement;
        node.parent = null;
    }

    // === LOOKUP ===

    find(key: T): TreeIterator<T> {
        return this.#at(findNode(this.#link.root, key, this.#compare));
    }

    cfind(key: T): ConstTreeIterator<T> {
        return new ConstTreeIterator(findNode(this.#link.root, key, this.#compare), this.#link);
    }

    contains(key: T): boolean {
        return findNode(this.#link.root, key, this.#compare) !== null;
    }

    // === ITERATORS ===

    #at(node: BSTNode<T> | null): TreeIterator<T> {
        return new TreeIterator(node, this.#link);
    }

    begin(): TreeIterator<T> { return this.#at(minNode(this.#link.root)); }
    end(): TreeIterator<T> { return this.#at(null); }
    cbegin(): ConstTreeIterator<T> { return this.begin().asConst(); }
    cend(): ConstTreeIterator<T> { return this.end().asConst(); }

    *[Symbol.iterator](): Iterator<T> {
        const end = this.end();
        for (const it = this.begin(); !it.equals(end); it.next()) yield it.value;
    }

    /** Descending order, stepping back from `end()`. */
    *reversed(): Generator<T, void, undefined> {
        if (this.isEmpty()) return;
        const first = this.begin();
        const it = this.end();
        do {
            it.prev();
            yield it.value;
        } while (!it.equals(first));
    }

    // === TRAVERSALS ===

    inOrder(visit: Visitor<T>): void { walk(this.#link.root, 'in-order', visit); }
    preOrder(visit: Visitor<T>): void { walk(this.#link.root, 'pre-order', visit); }
    postOrder(visit: Visitor<T>): void { walk(this.#link.root, 'post-order', visit); }

    /** Lazy, restartable walk in the given order. */
    values(order: TraversalOrder = 'in-order'): Generator<T, void, undefined> {
        return traverse(this.#link.root, order);
    }

    toArray(): T[] { return [...this.values()]; }

    toString(): string { return `{${this.toArray().join(', ')}}`; }
    [Symbol.for('nodejs.util.inspect.custom')]() { return this.toString(); }
}
