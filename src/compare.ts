// ============================================================================
// ORDERING & HASHING
// ============================================================================

/**
 * Three-way ordering function.
 * Negative if a < b, positive if a > b, 0 if the two are equivalent.
 */
export type Comparator<T> = (a: T, b: T) => number;

export type HashFunction<T> = (value: T) => number;

export type EqualityFunction<T> = (a: T, b: T) => boolean;

const FNV_PRIME = 16777619;
const FNV_OFFSET = 2166136261;
const floatBuffer = new ArrayBuffer(8);
const view = new DataView(floatBuffer);

function hashNumber(val: number): number {
    if ((val | 0) === val) return val | 0;
    view.setFloat64(0, val, true);
    let h = FNV_OFFSET;
    h ^= view.getInt32(0, true);
    h = Math.imul(h, FNV_PRIME);
    h ^= view.getInt32(4, true);
    h = Math.imul(h, FNV_PRIME);
    return h >>> 0;
}

function hashString(str: string): number {
    let h = FNV_OFFSET;
    const len = str.length;
    for (let i = 0; i < len; i++) {
        h ^= str.charCodeAt(i);
        h = Math.imul(h, FNV_PRIME);
    }
    return h >>> 0;
}

/** Unwraps boxed values and `valueOf()` carriers such as `Date`. */
function primitiveOf(v: unknown): unknown {
    if (typeof v === 'object' && v !== null) {
        const inner: unknown = v.valueOf();
        if (typeof inner !== 'object') return inner;
    }
    return v;
}

/**
 * Computes a deterministic hash code for a value.
 * Numbers, strings, bigints, booleans and arrays of those are hashed by content;
 * objects by their `valueOf()` primitive. Everything else hashes to 0.
 */
export function hashValue(v: unknown): number {
    const p = primitiveOf(v);
    if (typeof p === 'number') return hashNumber(p);
    if (typeof p === 'string') return hashString(p);
    if (typeof p === 'bigint') return hashString(p.toString());
    if (typeof p === 'boolean') return p ? 1 : 2;

    if (Array.isArray(p)) {
        let h = FNV_OFFSET;
        for (let i = 0; i < p.length; i++) {
            h ^= hashValue(p[i]);
            h = Math.imul(h, FNV_PRIME);
        }
        return h >>> 0;
    }
    return 0;
}

function kindRank(v: unknown): number {
    switch (typeof v) {
        case 'number': return 1;
        case 'bigint': return 2;
        case 'string': return 3;
        case 'boolean': return 4;
        default: return 0;
    }
}

/**
 * Default ordering over the primitive universe.
 *
 * Order of kinds: number < bigint < string < boolean.
 * Objects are ordered by their `valueOf()` primitive, so `Date` works out of the box.
 * Values without a primitive form need an explicit comparator. NaN (including
 * an invalid `Date`) is rejected.
 */
export function defaultCompare(a: unknown, b: unknown): number {
    if (a === b) return 0;
    const x = primitiveOf(a);
    const y = primitiveOf(b);

    if (Number.isNaN(x) || Number.isNaN(y)) {
        throw new Error('InvalidOperation: NaN has no place in an ordering.');
    }

    const rx = kindRank(x);
    const ry = kindRank(y);
    if (rx === 0 || ry === 0) {
        throw new Error(`InvalidOperation: No default ordering for ${String(a)} and ${String(b)}; supply a comparator.`);
    }
    if (rx !== ry) return rx - ry;

    if (typeof x === 'number' && typeof y === 'number') return x < y ? -1 : (y < x ? 1 : 0);
    if (typeof x === 'bigint' && typeof y === 'bigint') return x < y ? -1 : (y < x ? 1 : 0);
    if (typeof x === 'string' && typeof y === 'string') return x < y ? -1 : (y < x ? 1 : 0);
    if (typeof x === 'boolean' && typeof y === 'boolean') return Number(x) - Number(y);
    return 0;
}

/** Derives the equivalence relation `!(a < b) && !(b < a)` from an ordering. */
export function equivalence<T>(compare: Comparator<T>): EqualityFunction<T> {
    return (a, b) => compare(a, b) === 0;
}
