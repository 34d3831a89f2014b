import { extract } from '@/core/extract';
import { isIllegal, legalize } from '@/core/legalize';
import { Mesh } from '@/core/mesh';
import { Vec2 } from '@/interface';
import { meshProblems } from '../helpers';

function meshOf(coords: [number, number][]): Mesh {
    const mesh = new Mesh();
    coords.forEach(([x, y], i) => mesh.addVertex(new Vec2(x, y), i));
    return mesh;
}

describe('legalize', () => {
    it('flips the long diagonal of a flat quadrilateral', () => {
        const mesh = meshOf([[0, 0], [4, 0], [2, 1], [2, -1]]);
        mesh.createTriangle(0, 1, 2);
        // vertex 3 lies below the hull edge 0 -> 1, seen by ghost face 1
        const stack = mesh.splitFace(1, 3);
        expect(stack).toEqual([3, 12, 15]);
        expect(isIllegal(mesh, 3)).toBe(true);
        expect(isIllegal(mesh, 12)).toBe(false);
        expect(isIllegal(mesh, 15)).toBe(false);

        expect(legalize(mesh, stack)).toBe(1);
        expect(stack).toEqual([]);
        expect(extract(mesh)).toEqual([[0, 2, 3], [1, 2, 3]]);
        expect(meshProblems(mesh)).toEqual([]);
    });

    it('leaves a legal mesh alone', () => {
        const mesh = meshOf([[0, 0], [4, 0], [0, 4], [1, 1]]);
        mesh.createTriangle(0, 1, 2);
        const stack = mesh.splitFace(0, 3);
        expect(legalize(mesh, stack)).toBe(0);
        expect(extract(mesh)).toEqual([[0, 1, 3], [0, 2, 3], [1, 2, 3]]);
    });

    it('keeps the diagonal at the smallest index of a co-circular quadrilateral', () => {
        // unit square inserted as 1, 2, 3 and then 0
        const mesh = new Mesh();
        mesh.addVertex(new Vec2(1, 0), 1);
        mesh.addVertex(new Vec2(1, 1), 2);
        mesh.addVertex(new Vec2(0, 1), 3);
        mesh.addVertex(new Vec2(0, 0), 0);
        mesh.createTriangle(0, 1, 2);
        // handle 3 = input 0 is seen from the ghost behind handles 2 -> 0
        expect(legalize(mesh, mesh.splitFace(3, 3))).toBe(1);
        expect(extract(mesh)).toEqual([[0, 1, 2], [0, 2, 3]]);
    });
});
