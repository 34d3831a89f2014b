import { Vec2 } from '../interface';
import { Orientation, orientation } from './predicates';

/** The symbolic vertex at infinity closing the mesh around the convex hull. */
export const GHOST = -1;
export const NO_EDGE = -1;

// Face f owns half-edges 3f, 3f+1 and 3f+2, in counter-clockwise order.
export const next = (e: number): number => (e % 3 === 2 ? e - 2 : e + 1);
export const prev = (e: number): number => (e % 3 === 0 ? e + 2 : e - 1);
export const faceOf = (e: number): number => (e / 3) | 0;

export interface VertexEntry {
    point: Vec2;
    /** Input index reported in the extracted triangles. */
    index: number;
    /** An outgoing half-edge, NO_EDGE until the vertex is part of a face. */
    edge: number;
}

/**
 * Half-edge arena of a triangulated planar subdivision.
 *
 * Vertices, half-edges and faces are addressed by integer handles. Every
 * hull edge is paired with a ghost face whose third vertex is GHOST, so once
 * the first triangle exists each half-edge has a twin. Splits append faces;
 * flips rewrite the two affected faces in place, so handles stay valid.
 */
export class Mesh {
    readonly vertices: VertexEntry[] = [];
    private readonly origins: number[] = [];
    private readonly twins: number[] = [];

    get faceSlots(): number {
        return this.origins.length / 3;
    }
    get halfEdgeCount(): number {
        return this.origins.length;
    }

    addVertex(point: Vec2, index: number): number {
        this.vertices.push({ point, index, edge: NO_EDGE });
        return this.vertices.length - 1;
    }
    point(v: number): Vec2 {
        if (v === GHOST)
            throw new Error('The ghost vertex has no position');
        return this.vertices[v].point;
    }
    inputIndex(v: number): number {
        return this.vertices[v].index;
    }

    origin(e: number): number {
        return this.origins[e];
    }
    destination(e: number): number {
        return this.origins[next(e)];
    }
    /** The vertex of e's face opposite to e. */
    apex(e: number): number {
        return this.origins[prev(e)];
    }
    twin(e: number): number {
        return this.twins[e];
    }

    faceVertices(f: number): [number, number, number] {
        return [this.origins[3 * f], this.origins[3 * f + 1], this.origins[3 * f + 2]];
    }
    isGhostFace(f: number): boolean {
        return this.origins[3 * f] === GHOST
            || this.origins[3 * f + 1] === GHOST
            || this.origins[3 * f + 2] === GHOST;
    }
    isGhostEdge(e: number): boolean {
        return this.origin(e) === GHOST || this.destination(e) === GHOST;
    }
    /** The single real half-edge of a ghost face; the hull lies to its right. */
    realEdgeOfGhost(f: number): number {
        for (let e = 3 * f; e < 3 * f + 3; e++)
            if (!this.isGhostEdge(e)) return e;
        throw new Error(`Face ${f} is not a ghost face`);
    }

    /** Outgoing half-edges of v in counter-clockwise order. */
    *edgesAround(v: number): Generator<number> {
        const start = this.vertices[v].edge;
        if (start === NO_EDGE) return;
        let e = start;
        do {
            yield e;
            e = this.twins[prev(e)];
        } while (e !== start);
    }

    /** Hull edges as seen from outside, i.e. walking the hull clockwise. */
    *hullEdges(): Generator<number> {
        for (let f = 0; f < this.faceSlots; f++)
            if (this.isGhostFace(f)) yield this.realEdgeOfGhost(f);
    }

    private setFace(f: number, a: number, b: number, c: number): void {
        this.origins[3 * f] = a;
        this.origins[3 * f + 1] = b;
        this.origins[3 * f + 2] = c;
    }
    private addFace(a: number, b: number, c: number): number {
        const f = this.faceSlots;
        this.origins.push(a, b, c);
        this.twins.push(NO_EDGE, NO_EDGE, NO_EDGE);
        return f;
    }
    private link(e1: number, e2: number): void {
        this.twins[e1] = e2;
        this.twins[e2] = e1;
    }
    private touch(v: number, e: number): void {
        if (v !== GHOST) this.vertices[v].edge = e;
    }

    /** Bootstrap the mesh with one counter-clockwise triangle and its three ghosts. */
    createTriangle(a: number, b: number, c: number): number {
        if (this.faceSlots > 0)
            throw new Error('Mesh already has faces');
        if (orientation(this.point(a), this.point(b), this.point(c)) !== Orientation.Left)
            throw new Error(`Initial triangle (${a}, ${b}, ${c}) is not counter-clockwise`);

        const f = this.addFace(a, b, c);
        const gab = this.addFace(b, a, GHOST);
        const gbc = this.addFace(c, b, GHOST);
        const gca = this.addFace(a, c, GHOST);

        this.link(3 * f, 3 * gab);
        this.link(3 * f + 1, 3 * gbc);
        this.link(3 * f + 2, 3 * gca);
        this.link(3 * gab + 2, 3 * gbc + 1);
        this.link(3 * gbc + 2, 3 * gca + 1);
        this.link(3 * gca + 2, 3 * gab + 1);

        this.touch(a, 3 * f);
        this.touch(b, 3 * f + 1);
        this.touch(c, 3 * f + 2);
        return f;
    }

    /**
     * Replace face f = (a, b, c) by (a, b, p), (b, c, p), (c, a, p).
     * Returns the three half-edges opposite p.
     */
    splitFace(f: number, p: number): number[] {
        const [a, b, c] = this.faceVertices(f);
        const t0 = this.twins[3 * f];
        const t1 = this.twins[3 * f + 1];
        const t2 = this.twins[3 * f + 2];

        this.setFace(f, a, b, p);
        const g = this.addFace(b, c, p);
        const h = this.addFace(c, a, p);

        this.link(3 * f, t0);
        this.link(3 * g, t1);
        this.link(3 * h, t2);
        this.link(3 * f + 1, 3 * g + 2);
        this.link(3 * g + 1, 3 * h + 2);
        this.link(3 * h + 1, 3 * f + 2);

        this.touch(p, 3 * f + 2);
        this.touch(a, 3 * f);
        this.touch(b, 3 * g);
        this.touch(c, 3 * h);
        return [3 * f, 3 * g, 3 * h];
    }

    /**
     * Split the edge e = a→b and both faces (a, b, c) and (b, a, d) sharing it
     * at p, which must lie on the open segment. Returns the four half-edges
     * opposite p.
     */
    splitEdge(e: number, p: number): number[] {
        const t = this.twins[e];
        const a = this.origin(e), b = this.destination(e), c = this.apex(e), d = this.apex(t);
        const f1 = faceOf(e), f2 = faceOf(t);
        const tbc = this.twins[next(e)];
        const tca = this.twins[prev(e)];
        const tad = this.twins[next(t)];
        const tdb = this.twins[prev(t)];

        this.setFace(f1, a, p, c);
        const g = this.addFace(p, b, c);
        this.setFace(f2, b, p, d);
        const h = this.addFace(p, a, d);

        this.link(3 * f1 + 2, tca);
        this.link(3 * g + 1, tbc);
        this.link(3 * f2 + 2, tdb);
        this.link(3 * h + 1, tad);
        this.link(3 * f1, 3 * h);
        this.link(3 * f1 + 1, 3 * g + 2);
        this.link(3 * g, 3 * f2);
        this.link(3 * f2 + 1, 3 * h + 2);

        this.touch(p, 3 * f1 + 1);
        this.touch(a, 3 * f1);
        this.touch(b, 3 * g + 1);
        this.touch(c, 3 * f1 + 2);
        this.touch(d, 3 * f2 + 2);
        return [3 * f1 + 2, 3 * g + 1, 3 * f2 + 2, 3 * h + 1];
    }

    /**
     * Whether the quadrilateral around e is strictly convex, so that e can be
     * replaced by the other diagonal. Diagonals to the ghost vertex never are.
     */
    isFlippable(e: number): boolean {
        const t = this.twins[e];
        const a = this.origin(e), b = this.destination(e), p = this.apex(e), q = this.apex(t);
        if (p === GHOST || q === GHOST) return false;
        if (a !== GHOST && orientation(this.point(a), this.point(q), this.point(p)) !== Orientation.Left)
            return false;
        if (b !== GHOST && orientation(this.point(q), this.point(b), this.point(p)) !== Orientation.Left)
            return false;
        return true;
    }

    /**
     * Replace e = a→b, shared by (a, b, p) and (b, a, q), with the diagonal
     * p–q, giving (a, q, p) and (q, b, p). Returns the two half-edges of the
     * new faces opposite p: a→q and q→b.
     */
    flipEdge(e: number): [number, number] {
        if (!this.isFlippable(e))
            throw new Error(`Cannot flip edge ${e}: quadrilateral is not strictly convex`);

        const t = this.twins[e];
        const a = this.origin(e), b = this.destination(e), p = this.apex(e), q = this.apex(t);
        const f1 = faceOf(e), f2 = faceOf(t);
        const tbp = this.twins[next(e)];
        const tpa = this.twins[prev(e)];
        const taq = this.twins[next(t)];
        const tqb = this.twins[prev(t)];

        this.setFace(f1, a, q, p);
        this.setFace(f2, q, b, p);

        this.link(3 * f1, taq);
        this.link(3 * f1 + 1, 3 * f2 + 2);
        this.link(3 * f1 + 2, tpa);
        this.link(3 * f2, tqb);
        this.link(3 * f2 + 1, tbp);

        this.touch(a, 3 * f1);
        this.touch(q, 3 * f2);
        this.touch(b, 3 * f2 + 1);
        this.touch(p, 3 * f1 + 2);
        return [3 * f1, 3 * f2];
    }
}
