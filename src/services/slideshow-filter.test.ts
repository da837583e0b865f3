import { describe, expect, it } from 'vitest';
import type { RawPost } from '../scrapers/raw-post.js';
import { SlideshowFilter, isCarousel } from './slideshow-filter.js';

function post(overrides: Partial<RawPost> = {}): RawPost {
    return {
        id: '1',
        caption: 'Five things I wish I knew',
        mediaType: 'slideshow',
        likes: 2000,
        views: 10000,
        ...overrides,
    };
}

describe('isCarousel', () => {
    it('recognizes carousel media types case-insensitively', () => {
        expect(isCarousel({ mediaType: 'PhotoMode' })).toBe(true);
        expect(isCarousel({ mediaType: 'IMAGEPOST' })).toBe(true);
        expect(isCarousel({ mediaType: 'video' })).toBe(false);
    });

    it('treats more than one image as a carousel', () => {
        expect(isCarousel({ mediaType: 'video', imageCount: 2 })).toBe(true);
        expect(isCarousel({ mediaType: 'video', imageCount: 1 })).toBe(false);
    });
});

describe('SlideshowFilter', () => {
    const filter = new SlideshowFilter();

    it('passes carousels at the thresholds', () => {
        expect(filter.evaluate(post({ likes: 1000, views: 5000 })))
            .toEqual({ passed: true, reason: 'Passed slideshow filter' });
    });

    it('rejects videos', () => {
        expect(filter.evaluate(post({ mediaType: 'video' })))
            .toEqual({ passed: false, reason: 'Not a carousel (video)' });
    });

    it('rejects low engagement and counts missing metrics as zero', () => {
        expect(filter.evaluate(post({ likes: 999 })).reason).toBe('Too few likes (999 < 1000)');
        expect(filter.evaluate(post({ views: undefined })).reason).toBe('Too few views (0 < 5000)');
        expect(filter.accepts(post({ likes: null }))).toBe(false);
    });

    it('uses custom thresholds', () => {
        const lenient = new SlideshowFilter({ minLikes: 0 });
        expect(lenient.thresholds).toEqual({ minLikes: 0, minViews: 5000 });
        expect(lenient.accepts(post({ likes: 0 }))).toBe(true);
    });
});
