import { TriangleIndices, TriangulationOptions, Vec2, Vec2Like, resolveOptions } from '../interface';
import VertexHasher from '../utils/vertexHasher';
import { TriangulationError } from './errors';
import { extract } from './extract';
import { legalize } from './legalize';
import { Location, locate } from './locate';
import { GHOST, Mesh, faceOf } from './mesh';
import { CirclePosition, Orientation, inCircle, orientation } from './predicates';

// Outside this range the exact predicates may overflow or lose bits to underflow.
const MAX_COORDINATE = 2 ** 201;
const MIN_COORDINATE = 2 ** -142;

function isSupported(v: number): boolean {
    const m = Math.abs(v);
    return Number.isFinite(v) && m <= MAX_COORDINATE && (m === 0 || m >= MIN_COORDINATE);
}

/**
 * Incrementally built Delaunay triangulation.
 *
 * Points are added one at a time with {@link Triangulation.insert}. Until
 * three of them span a triangle they are only recorded; the first point off
 * their common line creates the initial face and the recorded points are
 * then inserted like any other.
 */
export class Triangulation {
    readonly mesh = new Mesh();
    readonly options: TriangulationOptions;
    private readonly hasher: VertexHasher;
    /** Collinear vertices waiting for a point off their line. */
    private pending: number[] = [];
    private hint = 0;
    private flipCount = 0;

    constructor(options: Partial<TriangulationOptions> = {}) {
        this.options = resolveOptions(options);
        this.hasher = new VertexHasher(this.options.tolerance);
    }

    get vertexCount(): number {
        return this.mesh.vertices.length;
    }
    get faceCount(): number {
        let count = 0;
        for (let f = 0; f < this.mesh.faceSlots; f++)
            if (!this.mesh.isGhostFace(f)) count++;
        return count;
    }
    get isBootstrapped(): boolean {
        return this.mesh.faceSlots > 0;
    }
    /** Edge flips performed so far. */
    get flips(): number {
        return this.flipCount;
    }

    /**
     * Add a point. `index` is the label it carries in the output triangles and
     * defaults to the number of points inserted before it.
     *
     * Throws a {@link TriangulationError} if the coordinates are out of range
     * or the point coincides with an earlier one; the triangulation is left
     * untouched in both cases.
     * @returns the vertex handle
     */
    insert(point: Vec2Like, index: number = this.vertexCount): number {
        const p = this.validatePoint(point, index);

        const duplicateOf = this.hasher.find(p);
        if (duplicateOf !== undefined)
            throw TriangulationError.duplicatePoint(index, duplicateOf);

        if (!this.isBootstrapped)
            return this.insertPending(p, index);

        const location = locate(this.mesh, p, this.hint);
        if (location.kind === 'vertex')
            throw TriangulationError.duplicatePoint(index, this.mesh.inputIndex(location.vertex));

        const v = this.mesh.addVertex(p, index);
        this.hasher.add(p, index);
        this.insertAt(v, location);
        return v;
    }

    locate(point: Vec2Like): Location {
        if (!this.isBootstrapped)
            throw TriangulationError.degenerateInput(this.vertexCount);
        return locate(this.mesh, point, this.hint);
    }

    /** Canonical triangles, by input index. */
    triangles(): TriangleIndices[] {
        if (!this.isBootstrapped)
            throw TriangulationError.degenerateInput(this.vertexCount);
        return extract(this.mesh);
    }

    /**
     * Input indices of the hull vertices in counter-clockwise order, starting
     * from the smallest. Points in the interior of hull edges are included.
     */
    convexHull(): number[] {
        if (!this.isBootstrapped)
            throw TriangulationError.degenerateInput(this.vertexCount);

        // ghost faces see the hull edges reversed
        const ccwNext = new Map<number, number>();
        for (const e of this.mesh.hullEdges())
            ccwNext.set(this.mesh.destination(e), this.mesh.origin(e));

        let start = -1;
        for (const v of ccwNext.keys())
            if (start < 0 || this.mesh.inputIndex(v) < this.mesh.inputIndex(start)) start = v;

        const hull: number[] = [];
        let v = start;
        do {
            hull.push(this.mesh.inputIndex(v));
            const u = ccwNext.get(v);
            if (u === undefined || hull.length > ccwNext.size)
                throw TriangulationError.numericalInconsistency('convex hull does not close');
            v = u;
        } while (v !== start);
        return hull;
    }

    /** No vertex lies strictly inside the circumcircle of a real face. */
    isDelaunay(): boolean {
        const mesh = this.mesh;
        for (let f = 0; f < mesh.faceSlots; f++) {
            if (mesh.isGhostFace(f)) continue;
            for (let e = 3 * f; e < 3 * f + 3; e++) {
                const q = mesh.apex(mesh.twin(e));
                if (q === GHOST) continue;
                const a = mesh.point(mesh.origin(e)), b = mesh.point(mesh.destination(e));
                const c = mesh.point(mesh.apex(e));
                if (inCircle(a, b, c, mesh.point(q)) === CirclePosition.Inside) return false;
            }
        }
        return true;
    }

    private validatePoint(point: Vec2Like, index: number): Vec2 {
        if (!isSupported(point.x) || !isSupported(point.y))
            throw TriangulationError.invalidCoordinate(index, point);
        return Vec2.from(point);
    }

    private insertPending(p: Vec2, index: number): number {
        const [first, second] = this.pending;
        const spansTriangle = second !== undefined
            && orientation(this.mesh.point(first), this.mesh.point(second), p) !== Orientation.Collinear;

        const v = this.mesh.addVertex(p, index);
        this.hasher.add(p, index);
        if (!spansTriangle) {
            this.pending.push(v);
            return v;
        }

        const left = orientation(this.mesh.point(first), this.mesh.point(second), p) === Orientation.Left;
        const f = left
            ? this.mesh.createTriangle(first, second, v)
            : this.mesh.createTriangle(second, first, v);
        this.hint = f;

        const rest = this.pending.slice(2);
        this.pending = [];
        for (const u of rest) {
            const location = locate(this.mesh, this.mesh.point(u), this.hint);
            if (location.kind === 'vertex')
                throw TriangulationError.numericalInconsistency(`pending vertex ${u} located on an existing vertex`);
            this.insertAt(u, location);
        }
        return v;
    }

    private insertAt(v: number, location: Exclude<Location, { kind: 'vertex' }>): void {
        const stack = location.kind === 'edge'
            ? this.mesh.splitEdge(location.edge, v)
            : this.mesh.splitFace(location.face, v);
        this.flipCount += legalize(this.mesh, stack);
        this.hint = faceOf(this.mesh.vertices[v].edge);
    }
}
