/** A triangle as three input indices. Canonical triangles are sorted ascending. */
export type TriangleIndices = [number, number, number];

