import { GHOST, Mesh, NO_EDGE } from '@/core/mesh';
import { Orientation, orientation } from '@/core/predicates';

/** Small seeded PRNG, uniform in [0, 1). */
export function mulberry32(seed: number): () => number {
    let a = seed >>> 0;
    return () => {
        a = (a + 0x6d2b79f5) >>> 0;
        let t = a;
        t = Math.imul(t ^ (t >>> 15), t | 1);
        t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
        return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    };
}

export function shuffle<T>(items: readonly T[], random: () => number): T[] {
    const out = [...items];
    for (let i = out.length - 1; i > 0; i--) {
        const j = Math.floor(random() * (i + 1));
        [out[i], out[j]] = [out[j], out[i]];
    }
    return out;
}

/** Structural problems of a mesh; empty when twins, windings and vertex edges are consistent. */
export function meshProblems(mesh: Mesh): string[] {
    const problems: string[] = [];
    for (let e = 0; e < mesh.halfEdgeCount; e++) {
        const t = mesh.twin(e);
        if (t === NO_EDGE) {
            problems.push(`edge ${e} has no twin`);
            continue;
        }
        if (mesh.twin(t) !== e) problems.push(`twin of ${e} does not point back`);
        if (mesh.origin(t) !== mesh.destination(e) || mesh.destination(t) !== mesh.origin(e))
            problems.push(`edge ${e} and its twin ${t} do not share endpoints`);
    }
    for (let f = 0; f < mesh.faceSlots; f++) {
        if (mesh.isGhostFace(f)) continue;
        const [a, b, c] = mesh.faceVertices(f);
        if (orientation(mesh.point(a), mesh.point(b), mesh.point(c)) !== Orientation.Left)
            problems.push(`face ${f} is not counter-clockwise`);
    }
    mesh.vertices.forEach((vertex, v) => {
        if (vertex.edge !== NO_EDGE && mesh.origin(vertex.edge) !== v)
            problems.push(`vertex ${v} points at an edge it does not start`);
    });
    for (let e = 0; e < mesh.halfEdgeCount; e++)
        if (mesh.origin(e) === GHOST && mesh.destination(e) === GHOST)
            problems.push(`edge ${e} joins the ghost vertex to itself`);
    return problems;
}

export const GRID_3X3 = [
    [0, 1, 4], [0, 3, 4], [1, 2, 5], [1, 4, 5],
    [3, 4, 7], [3, 6, 7], [4, 5, 8], [4, 7, 8],
];
