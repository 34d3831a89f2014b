import { boundaryEdges, extractBoundaryLoops, orientLoop, signedArea2 } from '@/utils/topo';
import { gridPoints } from '@/utils/grid';
import { TriangleIndices } from '@/interface';
import { GRID_3X3 } from '../helpers';

const grid: TriangleIndices[] = GRID_3X3.map(([i, j, k]) => [i, j, k]);

describe('topo', () => {
    it('keeps edges used by a single triangle', () => {
        const edges = boundaryEdges(grid).map(([u, v]) => (u < v ? `${u}-${v}` : `${v}-${u}`)).sort();
        expect(edges).toEqual(['0-1', '0-3', '1-2', '2-5', '3-6', '5-8', '6-7', '7-8']);
    });

    it('extracts the boundary loop of a triangulation', () => {
        expect(extractBoundaryLoops(grid)).toEqual([[0, 1, 2, 5, 8, 7, 6, 3]]);
    });

    it('extracts one loop per component', () => {
        expect(extractBoundaryLoops([[0, 1, 2], [3, 4, 5]])).toEqual([[0, 1, 2], [3, 4, 5]]);
    });

    it('orients loops counter-clockwise', () => {
        const points = gridPoints(3, 3);
        expect(signedArea2([0, 2, 8, 6], points)).toBe(8);
        expect(orientLoop([0, 3, 6, 7, 8, 5, 2, 1], points)).toEqual([0, 1, 2, 5, 8, 7, 6, 3]);
        expect(orientLoop([0, 1, 2, 5, 8, 7, 6, 3], points)).toEqual([0, 1, 2, 5, 8, 7, 6, 3]);
    });
});
