import { Vec2Like } from '../interface';
import {
    Expansion,
    estimate,
    expansionDiff,
    expansionProduct,
    expansionSum,
    fromPair,
    twoDiff,
    twoProduct,
} from '../utils/expansion';

export enum Orientation {
    Right = -1,
    Collinear = 0,
    Left = 1,
}

export enum CirclePosition {
    Outside = -1,
    On = 0,
    Inside = 1,
}

// 2^-53
const EPSILON = 1.1102230246251565e-16;
const CCW_ERRBOUND_A = (3 + 16 * EPSILON) * EPSILON;
const ICC_ERRBOUND_A = (10 + 96 * EPSILON) * EPSILON;

function product(a: number, b: number): Expansion {
    return fromPair(twoProduct(a, b));
}

function orient2dExact(a: Vec2Like, b: Vec2Like, c: Vec2Like): number {
    // ax*by - ax*cy - ay*bx + ay*cx + bx*cy - by*cx, every product exact
    let det = product(a.x, b.y);
    det = expansionSum(det, product(-a.x, c.y));
    det = expansionSum(det, product(-a.y, b.x));
    det = expansionSum(det, product(a.y, c.x));
    det = expansionSum(det, product(b.x, c.y));
    det = expansionSum(det, product(-b.y, c.x));
    return estimate(det);
}

/**
 * Twice the signed area of (a, b, c): positive when c lies left of the
 * directed line a→b. The magnitude is approximate, the sign is exact.
 */
export function orient2d(a: Vec2Like, b: Vec2Like, c: Vec2Like): number {
    const detLeft = (a.x - c.x) * (b.y - c.y);
    const detRight = (a.y - c.y) * (b.x - c.x);
    const det = detLeft - detRight;
    let detSum: number;

    if (detLeft > 0) {
        if (detRight <= 0) return det;
        detSum = detLeft + detRight;
    } else if (detLeft < 0) {
        if (detRight >= 0) return det;
        detSum = -detLeft - detRight;
    } else {
        return det;
    }

    const errBound = CCW_ERRBOUND_A * detSum;
    if (det >= errBound || -det >= errBound) return det;

    return orient2dExact(a, b, c);
}

export function orientation(a: Vec2Like, b: Vec2Like, c: Vec2Like): Orientation {
    const det = orient2d(a, b, c);
    if (det > 0) return Orientation.Left;
    if (det < 0) return Orientation.Right;
    return Orientation.Collinear;
}

function diff(a: number, b: number): Expansion {
    return fromPair(twoDiff(a, b));
}

function incircleExact(a: Vec2Like, b: Vec2Like, c: Vec2Like, d: Vec2Like): number {
    const adx = diff(a.x, d.x), ady = diff(a.y, d.y);
    const bdx = diff(b.x, d.x), bdy = diff(b.y, d.y);
    const cdx = diff(c.x, d.x), cdy = diff(c.y, d.y);

    const aLift = expansionSum(expansionProduct(adx, adx), expansionProduct(ady, ady));
    const bLift = expansionSum(expansionProduct(bdx, bdx), expansionProduct(bdy, bdy));
    const cLift = expansionSum(expansionProduct(cdx, cdx), expansionProduct(cdy, cdy));

    const bc = expansionDiff(expansionProduct(bdx, cdy), expansionProduct(cdx, bdy));
    const ca = expansionDiff(expansionProduct(cdx, ady), expansionProduct(adx, cdy));
    const ab = expansionDiff(expansionProduct(adx, bdy), expansionProduct(bdx, ady));

    let det = expansionProduct(aLift, bc);
    det = expansionSum(det, expansionProduct(bLift, ca));
    det = expansionSum(det, expansionProduct(cLift, ab));
    return estimate(det);
}

/**
 * Positive when d lies inside the circle through a, b and c, taken in
 * counter-clockwise order; negative outside, zero on the circle. The sign
 * is exact.
 */
export function incircle(a: Vec2Like, b: Vec2Like, c: Vec2Like, d: Vec2Like): number {
    const adx = a.x - d.x;
    const bdx = b.x - d.x;
    const cdx = c.x - d.x;
    const ady = a.y - d.y;
    const bdy = b.y - d.y;
    const cdy = c.y - d.y;

    const bdxcdy = bdx * cdy;
    const cdxbdy = cdx * bdy;
    const aLift = adx * adx + ady * ady;

    const cdxady = cdx * ady;
    const adxcdy = adx * cdy;
    const bLift = bdx * bdx + bdy * bdy;

    const adxbdy = adx * bdy;
    const bdxady = bdx * ady;
    const cLift = cdx * cdx + cdy * cdy;

    const det = aLift * (bdxcdy - cdxbdy)
              + bLift * (cdxady - adxcdy)
              + cLift * (adxbdy - bdxady);

    const permanent = (Math.abs(bdxcdy) + Math.abs(cdxbdy)) * aLift
                    + (Math.abs(cdxady) + Math.abs(adxcdy)) * bLift
                    + (Math.abs(adxbdy) + Math.abs(bdxady)) * cLift;
    const errBound = ICC_ERRBOUND_A * permanent;
    if (det > errBound || -det > errBound) return det;

    return incircleExact(a, b, c, d);
}

export function inCircle(a: Vec2Like, b: Vec2Like, c: Vec2Like, d: Vec2Like): CirclePosition {
    const det = incircle(a, b, c, d);
    if (det > 0) return CirclePosition.Inside;
    if (det < 0) return CirclePosition.Outside;
    return CirclePosition.On;
}
