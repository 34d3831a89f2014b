import { InsertionOrder, TriangleIndices, TriangulationOptions, Vec2Like, resolveOptions } from '../interface';
import { TriangulationError, isTriangulationError } from './errors';
import { Triangulation } from './triangulation';

export type TriangulationResult =
    | {
        ok: true;
        /** Canonical triangles by input index. */
        triangles: TriangleIndices[];
        /** Hull vertices counter-clockwise, starting from the smallest index. */
        hull: number[];
        vertexCount: number;
        flips: number;
    }
    | { ok: false; error: TriangulationError };

/**
 * The order in which the points are inserted. `spatial` sorts by x, then y;
 * the sort is stable, so equal points keep their input order.
 */
export function insertionSequence(points: readonly Vec2Like[], order: InsertionOrder): number[] {
    const sequence = points.map((_, i) => i);
    if (order === 'spatial')
        sequence.sort((i, j) => points[i].x - points[j].x || points[i].y - points[j].y || i - j);
    return sequence;
}

/**
 * Build the Delaunay triangulation of `points` in one batch. Any failure
 * aborts the whole construction and no triangles are returned.
 */
export function insertAll(
    points: readonly Vec2Like[],
    options: Partial<TriangulationOptions> = {},
): TriangulationResult {
    const resolved = resolveOptions(options);
    const triangulation = new Triangulation(resolved);

    try {
        for (const i of insertionSequence(points, resolved.insertionOrder))
            triangulation.insert(points[i], i);

        const triangles = triangulation.triangles();
        const hull = triangulation.convexHull();
        if (resolved.verbose)
            console.log(`[Triangulation] inserted ${points.length} points, ${triangulation.flips} flips, ${triangles.length} triangles`);

        return {
            ok: true,
            triangles,
            hull,
            vertexCount: triangulation.vertexCount,
            flips: triangulation.flips,
        };
    } catch (e) {
        if (!isTriangulationError(e)) throw e;
        if (resolved.verbose)
            console.warn(`[Triangulation] ${e.kind}: ${e.message}`);
        return { ok: false, error: e };
    }
}

/** Like {@link insertAll}, but returns the triangles or throws the error. */
export function triangulate(points: readonly Vec2Like[], options: Partial<TriangulationOptions> = {}): TriangleIndices[] {
    const result = insertAll(points, options);
    if (!result.ok) throw result.error;
    return result.triangles;
}
