import { describe, expect, it } from 'vitest';
import { DEFAULT_SCORING, clarityScore, engagementScore, scoreHook } from './quality-scorer.js';

const HOOK = 'POV: you just landed your dream job';

describe('clarityScore', () => {
    it('is 1 inside the ideal length band', () => {
        expect(HOOK.length).toBe(35);
        expect(clarityScore(HOOK)).toBe(1);
    });

    it('penalizes short hooks per missing character', () => {
        expect(clarityScore('Hi there')).toBeCloseTo(0.46, 10);
    });

    it('penalizes long hooks per extra character', () => {
        expect(clarityScore('a'.repeat(130))).toBeCloseTo(0.9, 10);
    });

    it('penalizes hooks without a recognizable word', () => {
        expect(clarityScore('123 456 789 000 111 222')).toBeCloseTo(0.75, 10);
    });

    it('never drops below the floor', () => {
        expect(clarityScore('!!')).toBe(0.1);
    });
});

describe('engagementScore', () => {
    it('is 0 without engagement and 1 at the ceiling', () => {
        expect(engagementScore({ likes: 0, views: 0 })).toBe(0);
        expect(engagementScore({ likes: 40000, views: 60000 })).toBe(1);
    });

    it('is clamped above the ceiling', () => {
        expect(engagementScore({ likes: 5_000_000, views: 9_000_000 })).toBe(1);
    });

    it('never drops when combined engagement doubles below the ceiling', () => {
        for (const combined of [0, 1, 7, 250, 3000, 20000, 49999]) {
            const base = engagementScore({ likes: combined, views: 0 });
            const doubled = engagementScore({ likes: combined, views: combined });
            expect(doubled).toBeGreaterThanOrEqual(base);
        }
    });

    it('scales logarithmically', () => {
        expect(engagementScore({ likes: 99, views: 0 }, 9999)).toBeCloseTo(0.5, 10);
    });
});

describe('scoreHook', () => {
    it('blends clarity and engagement', () => {
        expect(scoreHook(HOOK, { likes: 0, views: 0 })).toBe(0.5);
        expect(scoreHook(HOOK, { likes: 40000, views: 60000 })).toBe(1);
    });

    it('scores an empty hook as 0', () => {
        expect(scoreHook('', { likes: 40000, views: 60000 })).toBe(0);
        expect(scoreHook('   ', { likes: 1, views: 1 })).toBe(0);
    });

    it('honours custom weights', () => {
        const options = { ...DEFAULT_SCORING, clarityWeight: 1, engagementWeight: 0 };
        expect(scoreHook('Hi there', { likes: 40000, views: 60000 }, options)).toBeCloseTo(0.46, 10);
    });

    it('stays within [0, 1]', () => {
        const options = { ...DEFAULT_SCORING, clarityWeight: 2, engagementWeight: 2 };
        expect(scoreHook(HOOK, { likes: 40000, views: 60000 }, options)).toBe(1);
    });
});
