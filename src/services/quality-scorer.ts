/**
 * Hook Quality Scorer
 * Weighted blend of a clarity score (length and readability) and an
 * engagement score (log-scaled likes + views).
 */

import type { EngagementStats } from '../types.js';

export interface ScoringOptions {
    clarityWeight: number;
    engagementWeight: number;
    engagementCeiling: number;
    idealMinLength: number;
    idealMaxLength: number;
}

export const DEFAULT_SCORING: ScoringOptions = {
    clarityWeight: 0.5,
    engagementWeight: 0.5,
    engagementCeiling: 100000,
    idealMinLength: 20,
    idealMaxLength: 120,
};

const SHORT_PENALTY_PER_CHAR = 0.045;
const LONG_PENALTY_PER_CHAR = 0.01;
const NO_WORDS_PENALTY = 0.25;
const MIN_CLARITY = 0.1;

function clamp(value: number, min = 0, max = 1): number {
    return Math.min(max, Math.max(min, value));
}

export function hasRecognizableWord(hook: string): boolean {
    return /\p{L}{2,}/u.test(hook);
}

export function clarityScore(hook: string, options: ScoringOptions = DEFAULT_SCORING): number {
    const length = hook.length;
    let penalty = 0;

    if (length < options.idealMinLength) {
        penalty += (options.idealMinLength - length) * SHORT_PENALTY_PER_CHAR;
    } else if (length > options.idealMaxLength) {
        penalty += (length - options.idealMaxLength) * LONG_PENALTY_PER_CHAR;
    }

    if (!hasRecognizableWord(hook)) {
        penalty += NO_WORDS_PENALTY;
    }

    return Math.max(MIN_CLARITY, 1 - penalty);
}

export function engagementScore(
    engagement: Pick<EngagementStats, 'likes' | 'views'>,
    ceiling: number = DEFAULT_SCORING.engagementCeiling,
): number {
    const combined = Math.max(0, engagement.likes) + Math.max(0, engagement.views);
    return clamp(Math.log10(1 + combined) / Math.log10(1 + ceiling));
}

export function scoreHook(
    hook: string,
    engagement: Pick<EngagementStats, 'likes' | 'views'>,
    options: ScoringOptions = DEFAULT_SCORING,
): number {
    if (!hook.trim()) return 0;

    const score = options.clarityWeight * clarityScore(hook, options)
        + options.engagementWeight * engagementScore(engagement, options.engagementCeiling);
    return clamp(score);
}
