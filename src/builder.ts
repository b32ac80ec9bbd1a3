import { type Comparator, type EqualityFunction, type HashFunction, defaultCompare, equivalence, hashValue } from './compare';
import { BSTNode } from './node';

// ============================================================================
// TREE BUILDER
// ============================================================================

/**
 * Capabilities needed to rebuild a tree from a traversal pair.
 *
 * The builder looks values up by hash and equality, which is a separate
 * requirement from the ordering the tree uses afterwards.
 */
export interface BuildOptions<T> {
    /** Ordering used by the resulting tree. Defaults to {@link defaultCompare}. */
    compare?: Comparator<T>;
    /** Defaults to {@link hashValue}. */
    hash?: HashFunction<T>;
    /** Defaults to `compare(a, b) === 0`. */
    equals?: EqualityFunction<T>;
}

export interface BuiltTree<T> {
    root: BSTNode<T> | null;
    size: number;
}

/**
 * Hash-bucketed lookup from element value to its position in the in-order sequence.
 * A value listed twice keeps its last position.
 */
class PositionIndex<T> {
    #buckets = new Map<number, Array<{ value: T, index: number }>>();

    constructor(
        values: readonly T[],
        private readonly hash: HashFunction<T>,
        private readonly equals: EqualityFunction<T>
    ) {
        for (let i = 0; i < values.length; i++) this.#set(values[i], i);
    }

    #set(value: T, index: number) {
        const h = this.hash(value);
        const bucket = this.#buckets.get(h);
        if (!bucket) {
            this.#buckets.set(h, [{ value, index }]);
            return;
        }
        const entry = bucket.find(e => this.equals(e.value, value));
        if (entry) entry.index = index;
        else bucket.push({ value, index });
    }

    indexOf(value: T): number {
        const entry = this.#buckets.get(this.hash(value))?.find(e => this.equals(e.value, value));
        if (!entry) throw new Error(`InvalidOperation: ${String(value)} does not occur in the in-order sequence.`);
        return entry.index;
    }
}

function resolve<T>(options: BuildOptions<T>): { hash: HashFunction<T>, equals: EqualityFunction<T> } {
    const compare: Comparator<T> = options.compare ?? defaultCompare;
    const hash: HashFunction<T> = options.hash ?? hashValue;
    return { hash, equals: options.equals ?? equivalence(compare) };
}

/** A pending subtree: the in-order range it spans and the link that will own it. */
interface Frame<T> {
    start: number;
    end: number;
    parent: BSTNode<T> | null;
    side: 'left' | 'right';
}

/**
 * Shapes the tree from an in-order range split, taking subtree roots one by one.
 * Explicit stack instead of recursion: list-shaped trees are legal here.
 * `rightFirst` visits the right range before the left, for post-order read backwards.
 */
function assemble<T>(length: number, take: () => T, index: PositionIndex<T>, rightFirst: boolean): BSTNode<T> | null {
    let root: BSTNode<T> | null = null;
    const stack: Frame<T>[] = [{ start: 0, end: length - 1, parent: null, side: 'left' }];
    let frame: Frame<T> | undefined;
    while ((frame = stack.pop())) {
        const { start, end, parent, side } = frame;
        if (start > end) continue;

        const value = take();
        const node = new BSTNode(value, parent);
        if (parent) parent[side] = node;
        else root = node;

        const mid = index.indexOf(value);
        const left: Frame<T> = { start, end: mid - 1, parent: node, side: 'left' };
        const right: Frame<T> = { start: mid + 1, end, parent: node, side: 'right' };
        // the frame pushed last is taken next
        if (rightFirst) stack.push(left, right);
        else stack.push(right, left);
    }
    return root;
}

/**
 * Reconstructs the node graph described by a pre-order and an in-order sequence.
 *
 * The shape comes from position arithmetic alone: no comparisons, no validation.
 * A pair that does not describe a real tree yields an inconsistent tree.
 * Empty or length-mismatched input yields an empty tree.
 */
export function buildFromPreorderInorder<T>(
    preorder: readonly T[],
    inorder: readonly T[],
    options: BuildOptions<T> = {}
): BuiltTree<T> {
    if (preorder.length === 0 || preorder.length !== inorder.length) return { root: null, size: 0 };

    const { hash, equals } = resolve(options);
    const index = new PositionIndex(inorder, hash, equals);
    let next = 0;
    const root = assemble(inorder.length, () => preorder[next++], index, false);
    return { root, size: preorder.length };
}

/**
 * Reconstructs the node graph described by an in-order and a post-order sequence.
 * Post-order is consumed from the back, so the right subtree is built first.
 */
export function buildFromInorderPostorder<T>(
    inorder: readonly T[],
    postorder: readonly T[],
    options: BuildOptions<T> = {}
): BuiltTree<T> {
    if (postorder.length === 0 || postorder.length !== inorder.length) return { root: null, size: 0 };

    const { hash, equals } = resolve(options);
    const index = new PositionIndex(inorder, hash, equals);
    let next = postorder.length - 1;
    const root = assemble(inorder.length, () => postorder[next--], index, true);
    return { root, size: postorder.length };
}
