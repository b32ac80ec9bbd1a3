import { describe, it, expect } from 'vitest';
import { BinarySearchTree } from '../src/index';

const preorder = [10, 5, 3, 7, 15, 12, 18];
const inorder = [3, 5, 7, 10, 12, 15, 18];
const postorder = [3, 7, 5, 12, 18, 15, 10];

class Fruit {
    constructor(public id: number, public name: string) {}
}

describe('fromPreorderInorder', () => {
    it('reproduces the post-order of the source tree', () => {
        const tree = BinarySearchTree.fromPreorderInorder(preorder, inorder);
        expect(tree.size).toBe(7);
        const out: number[] = [];
        tree.postOrder(v => out.push(v));
        expect(out).toEqual(postorder);
    });

    it('links parents so cursors walk both ways', () => {
        const tree = BinarySearchTree.fromPreorderInorder(preorder, inorder);
        expect([...tree]).toEqual(inorder);
        expect([...tree.reversed()]).toEqual([...inorder].reverse());
    });

    it('produces a tree that accepts further mutation', () => {
        const tree = BinarySearchTree.fromPreorderInorder(preorder, inorder);
        tree.insert(8);
        tree.erase(10);
        expect(tree.toArray()).toEqual([3, 5, 7, 8, 12, 15, 18]);
        expect(tree.size).toBe(7);
    });

    it('yields an empty tree for empty or mismatched input', () => {
        expect(BinarySearchTree.fromPreorderInorder<number>([], []).isEmpty()).toBe(true);
        const mismatched = BinarySearchTree.fromPreorderInorder([1, 2], [1]);
        expect(mismatched.size).toBe(0);
        expect(mismatched.toArray()).toEqual([]);
    });

    it('takes the shape as given without checking the ordering', () => {
        const tree = BinarySearchTree.fromPreorderInorder(['a', 'b', 'c'], ['b', 'a', 'c']);
        expect(tree.toArray()).toEqual(['b', 'a', 'c']);
        expect([...tree.values('pre-order')]).toEqual(['a', 'b', 'c']);
    });

    it('throws when a root value is missing from the in-order sequence', () => {
        expect(() => BinarySearchTree.fromPreorderInorder([1, 2], [1, 3])).toThrow(/does not occur/);
    });

    it('looks objects up through the supplied hash and equality', () => {
        const pre = [new Fruit(2, 'fig'), new Fruit(1, 'apple'), new Fruit(3, 'kiwi')];
        const ino = [new Fruit(1, ''), new Fruit(2, ''), new Fruit(3, '')];
        const tree = BinarySearchTree.fromPreorderInorder(pre, ino, {
            compare: (a, b) => a.id - b.id,
            hash: f => f.id,
            equals: (a, b) => a.id === b.id,
        });
        expect(tree.toArray().map(f => f.name)).toEqual(['apple', 'fig', 'kiwi']);
        expect(tree.find(new Fruit(3, '')).value.name).toBe('kiwi');
        expect(tree.contains(new Fruit(4, ''))).toBe(false);
    });

    it('falls back to comparator equality when no hash is given', () => {
        const pre = [new Fruit(2, 'fig'), new Fruit(1, 'apple')];
        const ino = [new Fruit(1, ''), new Fruit(2, '')];
        const tree = BinarySearchTree.fromPreorderInorder(pre, ino, { compare: (a, b) => a.id - b.id });
        expect([...tree.values('post-order')].map(f => f.id)).toEqual([1, 2]);
    });
});

describe('fromInorderPostorder', () => {
    it('reproduces the pre-order of the source tree', () => {
        const tree = BinarySearchTree.fromInorderPostorder(inorder, postorder);
        expect(tree.size).toBe(7);
        const out: number[] = [];
        tree.preOrder(v => out.push(v));
        expect(out).toEqual(preorder);
    });

    it('steps back from end to the maximum', () => {
        const tree = BinarySearchTree.fromInorderPostorder(inorder, postorder);
        expect(tree.end().prev().value).toBe(18);
    });

    it('yields an empty tree for empty or mismatched input', () => {
        expect(BinarySearchTree.fromInorderPostorder<number>([], []).size).toBe(0);
        expect(BinarySearchTree.fromInorderPostorder([1], [1, 2]).isEmpty()).toBe(true);
    });

    it('builds a right-leaning chain', () => {
        const tree = BinarySearchTree.fromInorderPostorder([1, 2, 3], [3, 2, 1]);
        expect([...tree.values('pre-order')]).toEqual([1, 2, 3]);
        expect(tree.height).toBe(3);
    });
});

describe('round trips', () => {
    let seed = 7;
    const rand = (n: number) => {
        seed = (Math.imul(seed, 1103515245) + 12345) >>> 0;
        return seed % n;
    };

    it('rebuilds random trees from either traversal pair', () => {
        for (let round = 0; round < 25; round++) {
            const tree = new BinarySearchTree<number>();
            const count = 1 + rand(60);
            for (let i = 0; i < count; i++) tree.insert(rand(200));

            const pre = [...tree.values('pre-order')];
            const ino = [...tree.values('in-order')];
            const post = [...tree.values('post-order')];

            const a = BinarySearchTree.fromPreorderInorder(pre, ino);
            expect([...a.values('post-order')]).toEqual(post);
            expect(a.size).toBe(tree.size);

            const b = BinarySearchTree.fromInorderPostorder(ino, post);
            expect([...b.values('pre-order')]).toEqual(pre);
            expect(b.height).toBe(tree.height);
        }
    });
});

describe('list-shaped trees', () => {
    const n = 20000;
    const ascending = Array.from({ length: n }, (_, i) => i);
    const descending = [...ascending].reverse();

    it('rebuilds a right-leaning chain from pre-order and in-order', () => {
        const chain = BinarySearchTree.fromPreorderInorder(ascending, ascending);
        expect(chain.size).toBe(n);
        expect(chain.height).toBe(n);
        expect([...chain.values('post-order')]).toEqual(descending);
        expect(chain.end().prev().value).toBe(n - 1);
    });

    it('rebuilds a left-leaning chain from in-order and post-order', () => {
        const chain = BinarySearchTree.fromInorderPostorder(ascending, ascending);
        expect(chain.height).toBe(n);
        expect([...chain.values('pre-order')]).toEqual(descending);
        expect(chain.begin().value).toBe(0);
    });

    it('clones and assigns a chain', () => {
        const chain = BinarySearchTree.fromPreorderInorder(ascending, ascending);
        const copy = chain.clone();
        expect(copy.height).toBe(n);
        expect(copy.toArray()).toEqual(ascending);

        copy.erase(0);
        expect(chain.size).toBe(n);
        expect(copy.size).toBe(n - 1);
        expect(copy.begin().value).toBe(1);

        const target = BinarySearchTree.of(-1);
        target.assign(chain);
        expect(target.size).toBe(n);
        expect([...target.reversed()][0]).toBe(n - 1);
        expect(target.contains(-1)).toBe(false);
    });
});
