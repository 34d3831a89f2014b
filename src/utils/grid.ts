import { Vec2 } from '../interface';

/**
 * Integer lattice points (x, y) for 0 <= x < width, 0 <= y < height in
 * row-major order, so point y * width + x sits at (x, y).
 */
export function gridPoints(width: number, height: number): Vec2[] {
    if (!Number.isInteger(width) || !Number.isInteger(height) || width < 0 || height < 0)
        throw new RangeError(`grid dimensions must be non-negative integers, got ${width}x${height}`);

    const points: Vec2[] = [];
    for (let y = 0; y < height; y++)
        for (let x = 0; x < width; x++)
            points.push(new Vec2(x, y));
    return points;
}
