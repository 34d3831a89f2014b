import { Vec2Like } from '../interface';

interface Entry {
    x: number;
    y: number;
    index: number;
}

/**
 * Spatial hash of inserted points, used to reject duplicates before the mesh
 * is touched. With a zero tolerance points are keyed by their exact
 * coordinates; otherwise by a grid cell of side `tolerance`, and a query
 * checks the 3x3 block of cells around it.
 */
export default class VertexHasher {
    private readonly buckets = new Map<string, Entry[]>();
    private readonly tolerance: number;

    constructor(tolerance = 0) {
        this.tolerance = tolerance;
    }

    private cell(p: Vec2Like): [number, number] {
        return [Math.floor(p.x / this.tolerance), Math.floor(p.y / this.tolerance)];
    }

    private key(p: Vec2Like): string {
        if (this.tolerance === 0) return `${p.x}:${p.y}`; // -0 prints as 0
        const [i, j] = this.cell(p);
        return `${i}:${j}`;
    }

    /** Index of a stored point coinciding with p, if any. */
    find(p: Vec2Like): number | undefined {
        if (this.tolerance === 0) {
            const match = this.buckets.get(this.key(p))?.find((q) => q.x === p.x && q.y === p.y);
            return match?.index;
        }

        const [i, j] = this.cell(p);
        const limit = this.tolerance * this.tolerance;
        let best: Entry | undefined;
        for (let di = -1; di <= 1; di++) {
            for (let dj = -1; dj <= 1; dj++) {
                for (const q of this.buckets.get(`${i + di}:${j + dj}`) ?? []) {
                    const dx = q.x - p.x, dy = q.y - p.y;
                    if (dx * dx + dy * dy <= limit && (!best || q.index < best.index)) best = q;
                }
            }
        }
        return best?.index;
    }

    add(p: Vec2Like, index: number): void {
        const key = this.key(p);
        const entry: Entry = { x: p.x, y: p.y, index };
        const bucket = this.buckets.get(key);
        if (bucket) bucket.push(entry);
        else this.buckets.set(key, [entry]);
    }
}
