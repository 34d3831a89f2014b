export type InsertionOrder = 'input' | 'spatial';

export interface TriangulationOptions {
    /**
     * Distance at or below which two points count as the same point.
     * 0 rejects only bit-identical coordinates.
     */
    tolerance: number;
    /**
     * `input` inserts points in the order given; `spatial` sorts them by x,
     * then y first. The triangles are the same either way.
     */
    insertionOrder: InsertionOrder;
    /** Log a summary of each batch construction. */
    verbose: boolean;
}

export const DEFAULT_OPTIONS: Readonly<TriangulationOptions> = {
    tolerance: 0,
    insertionOrder: 'input',
    verbose: false,
};

export function resolveOptions(options: Partial<TriangulationOptions> = {}): TriangulationOptions {
    const resolved: TriangulationOptions = {
        tolerance: options.tolerance ?? DEFAULT_OPTIONS.tolerance,
        insertionOrder: options.insertionOrder ?? DEFAULT_OPTIONS.insertionOrder,
        verbose: options.verbose ?? DEFAULT_OPTIONS.verbose,
    };
    if (!Number.isFinite(resolved.tolerance) || resolved.tolerance < 0)
        throw new RangeError(`tolerance must be a finite non-negative number, got ${resolved.tolerance}`);
    if (resolved.insertionOrder !== 'input' && resolved.insertionOrder !== 'spatial')
        throw new RangeError(`unknown insertion order '${String(resolved.insertionOrder)}'`);
    return resolved;
}
