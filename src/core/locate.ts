import { Vec2Like } from '../interface';
import { TriangulationError } from './errors';
import { Mesh, faceOf, next, prev } from './mesh';
import { Orientation, orientation } from './predicates';

export type Location =
    | { kind: 'face'; face: number }
    | { kind: 'edge'; edge: number }
    | { kind: 'vertex'; vertex: number }
    /** Outside the hull; `face` is a ghost face whose hull edge sees the point. */
    | { kind: 'outside'; face: number };

type Step = Location | { kind: 'step'; face: number };

type LinePosition = 'before' | 'origin' | 'inside' | 'destination' | 'beyond';

/** Where p, known to be collinear with u→v, lies along that segment. */
function positionOnLine(u: Vec2Like, v: Vec2Like, p: Vec2Like): LinePosition {
    const useX = u.x !== v.x;
    const pu = useX ? p.x : p.y;
    const uu = useX ? u.x : u.y;
    const vv = useX ? v.x : v.y;
    const dir = vv > uu ? 1 : -1;

    if (pu === uu) return 'origin';
    if (pu === vv) return 'destination';
    if ((pu - uu) * dir < 0) return 'before';
    if ((pu - vv) * dir > 0) return 'beyond';
    return 'inside';
}

function stepGhost(mesh: Mesh, f: number, p: Vec2Like): Step {
    const e = mesh.realEdgeOfGhost(f);
    const u = mesh.origin(e), v = mesh.destination(e);
    const side = orientation(mesh.point(u), mesh.point(v), p);

    if (side === Orientation.Right) return { kind: 'step', face: faceOf(mesh.twin(e)) };
    if (side === Orientation.Left) return { kind: 'outside', face: f };

    switch (positionOnLine(mesh.point(u), mesh.point(v), p)) {
        case 'origin': return { kind: 'vertex', vertex: u };
        case 'destination': return { kind: 'vertex', vertex: v };
        case 'inside': return { kind: 'edge', edge: e };
        // walk along the hull line: next(e) is v→GHOST, prev(e) is GHOST→u
        case 'beyond': return { kind: 'step', face: faceOf(mesh.twin(next(e))) };
        case 'before': return { kind: 'step', face: faceOf(mesh.twin(prev(e))) };
    }
}

function stepReal(mesh: Mesh, f: number, p: Vec2Like, rotation: number): Step {
    const sides: Orientation[] = [];
    for (let k = 0; k < 3; k++) {
        const e = 3 * f + k;
        sides.push(orientation(mesh.point(mesh.origin(e)), mesh.point(mesh.destination(e)), p));
    }
    for (let k = 0; k < 3; k++) {
        const slot = (k + rotation) % 3;
        if (sides[slot] === Orientation.Right)
            return { kind: 'step', face: faceOf(mesh.twin(3 * f + slot)) };
    }

    const onLine = sides.flatMap((side, slot) => side === Orientation.Collinear ? [3 * f + slot] : []);
    if (onLine.length === 0) return { kind: 'face', face: f };
    if (onLine.length === 1) return { kind: 'edge', edge: onLine[0] };
    // on two edge lines at once: the vertex they share, opposite the third edge
    const offLine = [0, 1, 2].map((slot) => 3 * f + slot).filter((e) => !onLine.includes(e));
    if (offLine.length !== 1)
        throw TriangulationError.numericalInconsistency(`point lies on all three edges of face ${f}`);
    return { kind: 'vertex', vertex: mesh.apex(offLine[0]) };
}

function classify(mesh: Mesh, f: number, p: Vec2Like): Location | null {
    const step = mesh.isGhostFace(f) ? stepGhost(mesh, f, p) : stepReal(mesh, f, p, 0);
    return step.kind === 'step' ? null : step;
}

/** Try every face; only used when the walk fails to make progress. */
export function scan(mesh: Mesh, p: Vec2Like): Location {
    for (let f = 0; f < mesh.faceSlots; f++) {
        if (mesh.isGhostFace(f)) continue;
        const location = classify(mesh, f, p);
        if (location) return location;
    }
    for (let f = 0; f < mesh.faceSlots; f++) {
        if (!mesh.isGhostFace(f)) continue;
        const location = classify(mesh, f, p);
        if (location) return location;
    }
    throw TriangulationError.numericalInconsistency(`no face contains (${p.x}, ${p.y})`);
}

/**
 * Visibility walk from `start` towards p. Each step crosses an edge that has
 * p strictly on its right; the walk ends in a real face with p on the left
 * of or on all three edges, or in a ghost face whose hull edge sees p.
 */
export function locate(mesh: Mesh, p: Vec2Like, start = 0): Location {
    if (mesh.faceSlots === 0)
        throw new Error('Cannot locate a point in an empty mesh');

    const visited = new Set<number>();
    let face = start < mesh.faceSlots ? start : 0;

    while (true) {
        if (visited.has(face)) {
            console.warn(`[PointLocator] walk revisited face ${face} after ${visited.size} steps, scanning all faces`);
            return scan(mesh, p);
        }
        visited.add(face);

        const step = mesh.isGhostFace(face)
            ? stepGhost(mesh, face, p)
            : stepReal(mesh, face, p, visited.size % 3);
        if (step.kind !== 'step') return step;
        face = step.face;
    }
}

