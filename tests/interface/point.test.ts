import { Vec2 } from '@/interface';

describe('Vec2', () => {
    it('compares coordinates', () => {
        expect(new Vec2(-0, 1).equals({ x: 0, y: 1 })).toBe(true);
        expect(new Vec2(1, 2).equals({ x: 1, y: 2 + 2 ** -50 })).toBe(false);
    });

    it('wraps plain points and reuses instances', () => {
        const v = new Vec2(1, 2);
        expect(Vec2.from(v)).toBe(v);
        expect(Vec2.from({ x: 1, y: 2 })).toEqual(v);
        expect(new Vec2()).toEqual(new Vec2(0, 0));
    });
});
