import * as THREE from 'three';
import { TriangleIndices, Vec2Like } from '../interface';
import { Orientation, orientation } from '../core/predicates';

/**
 * Build a Three.js mesh in the z = 0 plane from a point list and triangles
 * given by point index. Triangles are wound counter-clockwise, so the
 * normals face +z.
 * @param points - vertex positions
 * @param triangles - index triples, in any winding
 */
export const buildMesh = (points: readonly Vec2Like[], triangles: readonly TriangleIndices[]): THREE.Mesh => {
    const geometry = new THREE.BufferGeometry();
    const material = new THREE.MeshStandardMaterial({
        color: 0xffffff,
        side: THREE.DoubleSide,
    });
    const positions = new Float32Array(points.length * 3);
    points.forEach((v, i) => {
        positions[i * 3] = v.x;
        positions[i * 3 + 1] = v.y;
        positions[i * 3 + 2] = 0;
    });
    const index = triangles.flatMap(([i, j, k]) =>
        orientation(points[i], points[j], points[k]) === Orientation.Right ? [i, k, j] : [i, j, k]);

    geometry.setAttribute('position', new THREE.BufferAttribute(positions, 3));
    geometry.setIndex(index);
    geometry.computeVertexNormals();

    return new THREE.Mesh(geometry, material);
}

/**
 * Read the triangles back out of an indexed geometry, in stored winding.
 */
export const extractTriangles = (geometry: THREE.BufferGeometry): TriangleIndices[] => {
    const index = geometry.getIndex();
    if (!index)
        throw new Error('Geometry is not indexed');

    const triangles: TriangleIndices[] = [];
    for (let i = 0; i + 2 < index.count; i += 3)
        triangles.push([index.getX(i), index.getX(i + 1), index.getX(i + 2)]);
    return triangles;
}
