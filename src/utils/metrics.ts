import polygonClipping from 'polygon-clipping';
import { TriangleIndices, Vec2Like } from '../interface';
import { CirclePosition, Orientation, inCircle, orientation } from '../core/predicates';

type Ring = [number, number][];
type Polygon = Ring[];
type MultiPolygon = Polygon[];

function toRing(poly: readonly Vec2Like[]): Ring {
    if (poly.length === 0) return [];
    const ring: Ring = poly.map((p) => [p.x, p.y]);
    const [x0, y0] = ring[0];
    const [xl, yl] = ring[ring.length - 1];
    if (x0 !== xl || y0 !== yl)
        ring.push([x0, y0]);
    return ring;
}

function ringArea(ring: Ring): number {
    if (ring.length < 3) return 0;
    let area = 0;
    const n = ring.length;
    for (let i = 0; i < n; i++) {
        const [x1, y1] = ring[i];
        const [x2, y2] = ring[(i + 1) % n];
        area += x1 * y2 - x2 * y1;
    }
    return Math.abs(area) / 2;
}

function polygonArea(poly: Polygon): number {
    let a = ringArea(poly[0]);
    for (let i = 1; i < poly.length; i++) a -= ringArea(poly[i]);
    return a;
}

function multiPolygonArea(geom: MultiPolygon): number {
    return geom.reduce((sum, p) => sum + polygonArea(p), 0);
}

/**
 * Convex hull by Andrew's monotone chain, counter-clockwise, without
 * collinear points.
 */
export function convexHullPolygon(points: readonly Vec2Like[]): Vec2Like[] {
    const sorted = [...points].sort((a, b) => a.x - b.x || a.y - b.y);
    if (sorted.length < 3) return sorted;

    const half = (pts: Vec2Like[]): Vec2Like[] => {
        const chain: Vec2Like[] = [];
        for (const p of pts) {
            while (chain.length >= 2
                && orientation(chain[chain.length - 2], chain[chain.length - 1], p) !== Orientation.Left)
                chain.pop();
            chain.push(p);
        }
        chain.pop();
        return chain;
    };
    return [...half(sorted), ...half([...sorted].reverse())];
}

export interface Coverage {
    /** Sum of the triangle areas. */
    triangleArea: number;
    /** Area of the union of the triangles. */
    unionArea: number;
    hullArea: number;
}

/**
 * How well the triangles tile the convex hull of the points. A valid
 * triangulation has all three areas equal: no overlaps and no gaps.
 */
export function coverage(points: readonly Vec2Like[], triangles: readonly TriangleIndices[]): Coverage {
    const polygons: Polygon[] = triangles.map((t) => [toRing(t.map((i) => points[i]))]);
    const triangleArea = polygons.reduce((sum, p) => sum + polygonArea(p), 0);
    const [first, ...rest] = polygons;
    const unionArea = first ? multiPolygonArea(polygonClipping.union(first, ...rest)) : 0;
    const hull = convexHullPolygon(points);
    const hullArea = hull.length < 3 ? 0 : ringArea(toRing(hull));
    return { triangleArea, unionArea, hullArea };
}

/** Pairs (triangle, point) where the point lies strictly inside the triangle's circumcircle. */
export function delaunayViolations(
    points: readonly Vec2Like[],
    triangles: readonly TriangleIndices[],
): [number, number][] {
    const violations: [number, number][] = [];
    triangles.forEach(([i, j, k], t) => {
        const [a, b, c] = orientation(points[i], points[j], points[k]) === Orientation.Right
            ? [points[i], points[k], points[j]]
            : [points[i], points[j], points[k]];
        points.forEach((d, v) => {
            if (v === i || v === j || v === k) return;
            if (inCircle(a, b, c, d) === CirclePosition.Inside) violations.push([t, v]);
        });
    });
    return violations;
}

/** Triangle count of any triangulation of n points with h of them on the hull boundary. */
export const eulerExpectedTriangles = (n: number, h: number): number => 2 * n - h - 2;
