/**
 * Slideshow Filter
 * Keeps carousel posts with enough engagement; everything else is dropped.
 * Rejection is the common case and never an error.
 */

import type { RawPost } from '../scrapers/raw-post.js';

const CAROUSEL_MARKERS = [
    'slideshow', 'carousel', 'photo', 'album',
    'gallery', 'imagepost', 'multi',
];

export interface FilterThresholds {
    minLikes: number;
    minViews: number;
}

export const DEFAULT_THRESHOLDS: FilterThresholds = {
    minLikes: 1000,
    minViews: 5000,
};

export interface FilterResult {
    passed: boolean;
    reason: string;
}

export function isCarousel(post: Pick<RawPost, 'mediaType' | 'imageCount'>): boolean {
    const marker = post.mediaType.toLowerCase();
    if (CAROUSEL_MARKERS.some(indicator => marker.includes(indicator))) {
        return true;
    }
    return (post.imageCount ?? 0) > 1;
}

export class SlideshowFilter {
    readonly thresholds: FilterThresholds;

    constructor(thresholds: Partial<FilterThresholds> = {}) {
        this.thresholds = { ...DEFAULT_THRESHOLDS, ...thresholds };
    }

    evaluate(post: RawPost): FilterResult {
        if (!isCarousel(post)) {
            return { passed: false, reason: `Not a carousel (${post.mediaType})` };
        }

        const likes = post.likes ?? 0;
        const views = post.views ?? 0;
        const { minLikes, minViews } = this.thresholds;

        if (likes < minLikes) {
            return { passed: false, reason: `Too few likes (${likes} < ${minLikes})` };
        }
        if (views < minViews) {
            return { passed: false, reason: `Too few views (${views} < ${minViews})` };
        }

        return { passed: true, reason: 'Passed slideshow filter' };
    }

    accepts(post: RawPost): boolean {
        return this.evaluate(post).passed;
    }
}
