import { TriangleIndices } from '../interface';

export const formatTriangle = ([i, j, k]: TriangleIndices): string => `[${i}, ${j}, ${k}]`;

/** One `[i, j, k]` line per triangle, in the order given. */
export function formatTriangles(triangles: readonly TriangleIndices[]): string {
    return triangles.map(formatTriangle).join('\n');
}
