export type Vec2Like = { readonly x: number; readonly y: number };

export class Vec2 {
	/**
	 * An immutable point of the Euclidean plane.
	 * @constructor Vec2
	 * @property {number} x The x coordinate. Default value is 0.
	 * @property {number} y The y coordinate. Default value is 0.
	 */
	public readonly x: number;
	public readonly y: number;
	constructor(x = 0, y = 0) {
		this.x = x;
		this.y = y;
	}

	static from(p: Vec2Like): Vec2 {
		return p instanceof Vec2 ? p : new Vec2(p.x, p.y);
	}

	/**
	 * Bitwise coordinate equality (-0 and 0 compare equal).
	 * @method Vec2#equals
	 */
	equals(v: Vec2Like): boolean {
		return this.x === v.x && this.y === v.y;
	}
}
