#!/usr/bin/env node
import { insertAll } from '../core/delaunay';
import { formatTriangles } from '../utils/format';
import { gridPoints } from '../utils/grid';

export const ORACLE_HEADER = '3x3 grid triangles (indices into 0..8 in row-major order):';

/**
 * Triangulate the 3x3 integer grid and print its canonical triangles.
 * @returns the process exit code
 */
export function main(log: (line: string) => void = console.log): number {
    const result = insertAll(gridPoints(3, 3));
    if (!result.ok) {
        console.error(`[Oracle] ${result.error.kind}: ${result.error.message}`);
        return 1;
    }
    log(ORACLE_HEADER);
    log(formatTriangles(result.triangles));
    return 0;
}

if (require.main === module)
    process.exitCode = main();
