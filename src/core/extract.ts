import { TriangleIndices } from '../interface';
import { Mesh } from './mesh';

export function compareTriangles(a: TriangleIndices, b: TriangleIndices): number {
    return a[0] - b[0] || a[1] - b[1] || a[2] - b[2];
}

export function sortTriangle([i, j, k]: readonly number[]): TriangleIndices {
    const sorted: TriangleIndices = [i, j, k];
    return sorted.sort((x, y) => x - y);
}

/**
 * Order-independent form of a triangle list: each triple ascending, the list
 * ascending lexicographically. Returns a new array; canonical input comes back
 * unchanged.
 */
export function canonicalize(triangles: readonly (readonly number[])[]): TriangleIndices[] {
    return triangles.map(sortTriangle).sort(compareTriangles);
}

/** Canonical triangles of the real faces of the mesh, by input index. */
export function extract(mesh: Mesh): TriangleIndices[] {
    const triangles: TriangleIndices[] = [];
    for (let f = 0; f < mesh.faceSlots; f++) {
        if (mesh.isGhostFace(f)) continue;
        const [a, b, c] = mesh.faceVertices(f);
        triangles.push([mesh.inputIndex(a), mesh.inputIndex(b), mesh.inputIndex(c)]);
    }
    return canonicalize(triangles);
}
