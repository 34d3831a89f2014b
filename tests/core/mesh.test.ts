import { GHOST, Mesh, faceOf, next, prev } from '@/core/mesh';
import { Vec2 } from '@/interface';
import { meshProblems } from '../helpers';

function meshOf(coords: [number, number][]): Mesh {
    const mesh = new Mesh();
    coords.forEach(([x, y], i) => mesh.addVertex(new Vec2(x, y), i));
    return mesh;
}

describe('Mesh', () => {
    it('navigates half-edges arithmetically', () => {
        expect([0, 1, 2].map(next)).toEqual([1, 2, 0]);
        expect([3, 4, 5].map(prev)).toEqual([5, 3, 4]);
        expect([6, 7, 8].map(faceOf)).toEqual([2, 2, 2]);
    });

    describe('createTriangle', () => {
        it('closes the first face with three ghost faces', () => {
            const mesh = meshOf([[0, 0], [1, 0], [0, 1]]);
            expect(mesh.createTriangle(0, 1, 2)).toBe(0);

            expect(mesh.faceSlots).toBe(4);
            expect(mesh.faceVertices(0)).toEqual([0, 1, 2]);
            expect([1, 2, 3].every((f) => mesh.isGhostFace(f))).toBe(true);
            expect([...mesh.hullEdges()]).toHaveLength(3);
            expect(meshProblems(mesh)).toEqual([]);
        });

        it('refuses a clockwise triangle', () => {
            const mesh = meshOf([[0, 0], [1, 0], [0, 1]]);
            expect(() => mesh.createTriangle(0, 2, 1)).toThrow('not counter-clockwise');
        });

        it('refuses a second bootstrap', () => {
            const mesh = meshOf([[0, 0], [1, 0], [0, 1]]);
            mesh.createTriangle(0, 1, 2);
            expect(() => mesh.createTriangle(0, 1, 2)).toThrow('already has faces');
        });

        it('has no position for the ghost vertex', () => {
            expect(() => new Mesh().point(GHOST)).toThrow('no position');
        });
    });

    describe('splitFace', () => {
        it('replaces one face by three around the new vertex', () => {
            const mesh = meshOf([[0, 0], [1, 0], [0, 1], [0.25, 0.25]]);
            mesh.createTriangle(0, 1, 2);

            expect(mesh.splitFace(0, 3)).toEqual([0, 12, 15]);
            expect(mesh.faceVertices(0)).toEqual([0, 1, 3]);
            expect(mesh.faceVertices(4)).toEqual([1, 2, 3]);
            expect(mesh.faceVertices(5)).toEqual([2, 0, 3]);
            expect(meshProblems(mesh)).toEqual([]);
        });

        it('walks the neighbours of a vertex counter-clockwise', () => {
            const mesh = meshOf([[0, 0], [1, 0], [0, 1], [0.25, 0.25]]);
            mesh.createTriangle(0, 1, 2);
            mesh.splitFace(0, 3);

            expect([...mesh.edgesAround(3)].map((e) => mesh.destination(e))).toEqual([0, 1, 2]);
        });
    });

    describe('splitEdge', () => {
        it('replaces the two faces of an edge by four', () => {
            const mesh = meshOf([[0, 0], [2, 0], [0, 2], [1, 1]]);
            mesh.createTriangle(0, 1, 2);

            // edge 1 runs from vertex 1 to vertex 2 and has (1, 1) in its interior
            const opposite = mesh.splitEdge(1, 3);
            expect(opposite).toHaveLength(4);
            expect(mesh.faceSlots).toBe(6);
            expect(mesh.faceVertices(0)).toEqual([1, 3, 0]);
            expect(mesh.faceVertices(4)).toEqual([3, 2, 0]);
            expect(opposite.map((e) => [mesh.origin(e), mesh.destination(e)]))
                .toEqual([[0, 1], [2, 0], [GHOST, 2], [1, GHOST]]);
            expect(meshProblems(mesh)).toEqual([]);
        });
    });

    describe('flipEdge', () => {
        function square(): Mesh {
            const mesh = meshOf([[0, 0], [1, 0], [1, 1], [0, 1]]);
            mesh.createTriangle(0, 1, 2);
            // face 3 is the ghost face behind edge 2 -> 0
            mesh.splitFace(3, 3);
            return mesh;
        }

        it('swaps the diagonal of a convex quadrilateral', () => {
            const mesh = square();
            expect(mesh.faceVertices(3)).toEqual([0, 2, 3]);
            expect(mesh.isFlippable(9)).toBe(true);

            expect(mesh.flipEdge(9)).toEqual([9, 0]);
            expect(mesh.faceVertices(3)).toEqual([0, 1, 3]);
            expect(mesh.faceVertices(0)).toEqual([1, 2, 3]);
            expect(meshProblems(mesh)).toEqual([]);
        });

        it('refuses hull edges', () => {
            const mesh = square();
            // edge 0 runs 0 -> 1 along the hull
            expect(mesh.isFlippable(0)).toBe(false);
            expect(() => mesh.flipEdge(0)).toThrow('not strictly convex');
        });

        it('refuses a non-convex quadrilateral', () => {
            const mesh = meshOf([[0, 0], [4, 0], [0, 4], [1, 1]]);
            mesh.createTriangle(0, 1, 2);
            mesh.splitFace(0, 3);
            // edge 13 runs 2 -> 3; the quadrilateral around it is reflex at 3
            expect(mesh.isFlippable(13)).toBe(false);
        });
    });
});
