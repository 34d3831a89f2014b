import { Graph, alg } from 'graphlib';
import { TriangleIndices, Vec2Like } from '../interface';

const edgeKey = (u: number, v: number): string => (u < v ? u + '-' + v : v + '-' + u);

/** Edges used by exactly one triangle. */
export function boundaryEdges(triangles: readonly TriangleIndices[]): [number, number][] {
    const edgeMap = new Map<string, [number, number]>();

    for (const [i, j, k] of triangles) {
        for (const [u, v] of [[i, j], [j, k], [k, i]]) {
            const key = edgeKey(u, v);
            if (!edgeMap.has(key)) edgeMap.set(key, [u, v]);
            else edgeMap.delete(key);
        }
    }
    return [...edgeMap.values()];
}

/**
 * Boundary loops of a triangle list, one per connected component of the
 * boundary. Each loop starts at its smallest index and continues towards the
 * smaller of that index's two neighbours.
 */
export function extractBoundaryLoops(triangles: readonly TriangleIndices[]): number[][] {
    const boundary = new Graph({ directed: false });
    for (const [u, v] of boundaryEdges(triangles))
        boundary.setEdge(String(u), String(v));

    return alg.components(boundary).map((component) => {
        const start = component.reduce((min, node) => (Number(node) < Number(min) ? node : min));
        const loop = alg.preorder(boundary, [start]).map((node) => Number(node));
        if (loop.length > 2 && loop[1] > loop[loop.length - 1])
            loop.splice(1, loop.length - 1, ...loop.slice(1).reverse());
        return loop;
    });
}

/** Twice the signed area of a closed polygon; positive when counter-clockwise. */
export function signedArea2(loop: readonly number[], points: readonly Vec2Like[]): number {
    let area = 0;
    for (let i = 0; i < loop.length; i++) {
        const p = points[loop[i]];
        const q = points[loop[(i + 1) % loop.length]];
        area += p.x * q.y - q.x * p.y;
    }
    return area;
}

/** The same loop, counter-clockwise and still starting at its first index. */
export function orientLoop(loop: readonly number[], points: readonly Vec2Like[]): number[] {
    if (signedArea2(loop, points) >= 0) return [...loop];
    return [loop[0], ...loop.slice(1).reverse()];
}
