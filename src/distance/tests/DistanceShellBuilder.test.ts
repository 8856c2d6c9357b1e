import { describe, it, expect } from 'vitest';
import { buildShells, maxShellDistance } from '../DistanceShellBuilder';

describe('DistanceShellBuilder', () => {
    it('should group nodes by distance in first-seen order', () => {
        const shells = buildShells(
            new Map([
                ['b', 1],
                ['c', 2],
                ['d', 1],
                ['e', 4],
            ])
        );

        expect([...shells.entries()]).toEqual([
            [1, ['b', 'd']],
            [2, ['c']],
            [4, ['e']],
        ]);
        expect(maxShellDistance(shells)).toBe(4);
    });

    it('should drop the source itself', () => {
        const shells = buildShells(
            new Map([
                ['a', 0],
                ['b', 2],
            ])
        );

        expect([...shells.keys()]).toEqual([2]);
    });

    it('should have no depth when nothing is reachable', () => {
        const shells = buildShells(new Map([['a', 0]]));

        expect(shells.size).toBe(0);
        expect(maxShellDistance(shells)).toBeUndefined();
    });
});
