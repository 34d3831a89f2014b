import { TriangulationError } from './errors';
import { GHOST, Mesh } from './mesh';
import { CirclePosition, Orientation, inCircle, orientation } from './predicates';

/**
 * Whether vertex q lies in the circumcircle of the face (a, b, c). For a
 * ghost face the "circle" is the open half-plane beyond its hull edge plus
 * the open hull segment itself.
 */
function inFaceCircle(mesh: Mesh, a: number, b: number, c: number, q: number): CirclePosition {
    if (q === GHOST) return CirclePosition.Outside;

    if (a === GHOST || b === GHOST || c === GHOST) {
        // the real edge, in face order
        const [u, v] = a === GHOST ? [b, c] : b === GHOST ? [c, a] : [a, b];
        const pu = mesh.point(u), pv = mesh.point(v), pq = mesh.point(q);
        const side = orientation(pu, pv, pq);
        if (side === Orientation.Left) return CirclePosition.Inside;
        if (side === Orientation.Right) return CirclePosition.Outside;
        const between = Math.min(pu.x, pv.x) <= pq.x && pq.x <= Math.max(pu.x, pv.x)
                     && Math.min(pu.y, pv.y) <= pq.y && pq.y <= Math.max(pu.y, pv.y)
                     && !pq.equals(pu) && !pq.equals(pv);
        return between ? CirclePosition.Inside : CirclePosition.Outside;
    }

    return inCircle(mesh.point(a), mesh.point(b), mesh.point(c), mesh.point(q));
}

/**
 * Whether e = a→b must be flipped: the apex q of the face across e lies
 * inside the circumcircle of e's own face (a, b, p).
 *
 * Co-circular quadrilaterals keep the diagonal touching the vertex with the
 * smallest input index, as if every lifted point were pushed down by an
 * infinitesimal that grows as the index shrinks. The outcome is then unique
 * and does not depend on insertion order.
 */
export function isIllegal(mesh: Mesh, e: number): boolean {
    const a = mesh.origin(e), b = mesh.destination(e), p = mesh.apex(e);
    const q = mesh.apex(mesh.twin(e));

    switch (inFaceCircle(mesh, a, b, p, q)) {
        case CirclePosition.Inside: return true;
        case CirclePosition.Outside: return false;
        case CirclePosition.On: {
            const keep = Math.min(mesh.inputIndex(a), mesh.inputIndex(b));
            const flipTo = Math.min(mesh.inputIndex(p), mesh.inputIndex(q));
            return flipTo < keep;
        }
    }
}

/**
 * Drain the stack of half-edges, flipping every illegal one and pushing the
 * two edges each flip exposes. Returns the number of flips.
 */
export function legalize(mesh: Mesh, stack: number[]): number {
    // each insertion flips at most once per edge it ends up incident to
    const limit = mesh.halfEdgeCount + stack.length + 16;
    let flips = 0;
    let e: number | undefined;

    while ((e = stack.pop()) !== undefined) {
        if (!isIllegal(mesh, e)) continue;
        if (!mesh.isFlippable(e))
            throw TriangulationError.numericalInconsistency(`edge ${e} is not locally Delaunay but cannot be flipped`);
        if (++flips > limit)
            throw TriangulationError.numericalInconsistency(`legalization did not settle after ${limit} flips`);
        stack.push(...mesh.flipEdge(e));
    }
    return flips;
}
