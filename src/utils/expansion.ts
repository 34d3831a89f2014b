/**
 * Exact floating-point expansion arithmetic.
 *
 * An expansion is a list of doubles, sorted by increasing magnitude and
 * non-overlapping, whose exact sum is the represented value. Zero components
 * are always eliminated, so the empty list represents 0 and the last
 * component carries the sign of the whole value.
 *
 * Follows J. R. Shewchuk, "Adaptive Precision Floating-Point Arithmetic and
 * Fast Robust Geometric Predicates" (1997).
 */
export type Expansion = number[];

// 2^ceil(53 / 2) + 1
const SPLITTER = 134217729;

/** Exact a + b as [rounded sum, round-off error]. */
export function twoSum(a: number, b: number): [number, number] {
    const x = a + b;
    const bVirtual = x - a;
    const aVirtual = x - bVirtual;
    const bRoundoff = b - bVirtual;
    const aRoundoff = a - aVirtual;
    return [x, aRoundoff + bRoundoff];
}

/** Exact a - b as [rounded difference, round-off error]. */
export function twoDiff(a: number, b: number): [number, number] {
    const x = a - b;
    const bVirtual = a - x;
    const aVirtual = x + bVirtual;
    const bRoundoff = bVirtual - b;
    const aRoundoff = a - aVirtual;
    return [x, aRoundoff + bRoundoff];
}

function split(a: number): [number, number] {
    const c = SPLITTER * a;
    const aBig = c - a;
    const aHi = c - aBig;
    return [aHi, a - aHi];
}

/** Exact a * b as [rounded product, round-off error]. */
export function twoProduct(a: number, b: number): [number, number] {
    const x = a * b;
    const [aHi, aLo] = split(a);
    const [bHi, bLo] = split(b);
    const err1 = x - aHi * bHi;
    const err2 = err1 - aLo * bHi;
    const err3 = err2 - aHi * bLo;
    return [x, aLo * bLo - err3];
}

/** Turn a [head, tail] pair into an expansion. */
export function fromPair([head, tail]: [number, number]): Expansion {
    const e: Expansion = [];
    if (tail !== 0) e.push(tail);
    if (head !== 0) e.push(head);
    return e;
}

export function growExpansion(e: Expansion, b: number): Expansion {
    const h: Expansion = [];
    let q = b;
    for (const component of e) {
        const [sum, err] = twoSum(q, component);
        if (err !== 0) h.push(err);
        q = sum;
    }
    if (q !== 0) h.push(q);
    return h;
}

export function expansionSum(e: Expansion, f: Expansion): Expansion {
    return f.reduce(growExpansion, e);
}

export function negate(e: Expansion): Expansion {
    return e.map((component) => -component);
}

export function expansionDiff(e: Expansion, f: Expansion): Expansion {
    return expansionSum(e, negate(f));
}

export function scaleExpansion(e: Expansion, b: number): Expansion {
    if (e.length === 0 || b === 0) return [];

    const h: Expansion = [];
    let [q, low] = twoProduct(e[0], b);
    if (low !== 0) h.push(low);

    for (let i = 1; i < e.length; i++) {
        const [productHi, productLo] = twoProduct(e[i], b);
        const [sum, sumErr] = twoSum(q, productLo);
        if (sumErr !== 0) h.push(sumErr);
        const [total, totalErr] = twoSum(productHi, sum);
        if (totalErr !== 0) h.push(totalErr);
        q = total;
    }
    if (q !== 0) h.push(q);
    return h;
}

export function expansionProduct(e: Expansion, f: Expansion): Expansion {
    let product: Expansion = [];
    for (const component of f)
        product = expansionSum(product, scaleExpansion(e, component));
    return product;
}

/** Approximate value; the most significant component, so the sign is exact. */
export function estimate(e: Expansion): number {
    return e.length === 0 ? 0 : e[e.length - 1];
}
