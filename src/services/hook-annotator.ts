/**
 * Derives a post's hook (extract -> classify -> score)
 */

import type { Config } from '../config.js';
import type { EngagementStats, Hook } from '../types.js';
import { classifyHook, HOOK_RULES } from './hook-classifier.js';
import type { HookRule } from './hook-classifier.js';
import { DEFAULT_HOOK_MAX_LENGTH, extractHook } from './hook-extractor.js';
import { DEFAULT_SCORING, scoreHook } from './quality-scorer.js';
import type { ScoringOptions } from './quality-scorer.js';

export interface HookOptions {
    maxLength: number;
    scoring: ScoringOptions;
    rules: readonly HookRule[];
}

export const DEFAULT_HOOK_OPTIONS: HookOptions = {
    maxLength: DEFAULT_HOOK_MAX_LENGTH,
    scoring: DEFAULT_SCORING,
    rules: HOOK_RULES,
};

export function hookOptionsFromConfig(config: Config): HookOptions {
    return {
        maxLength: config.hookMaxLength,
        scoring: {
            clarityWeight: config.clarityWeight,
            engagementWeight: config.engagementWeight,
            engagementCeiling: config.engagementCeiling,
            idealMinLength: config.idealHookMin,
            idealMaxLength: config.idealHookMax,
        },
        rules: HOOK_RULES,
    };
}

export function deriveHook(
    caption: string,
    engagement: Pick<EngagementStats, 'likes' | 'views'>,
    options: HookOptions = DEFAULT_HOOK_OPTIONS,
): Hook {
    const text = extractHook(caption, options.maxLength);
    return {
        text,
        category: classifyHook(text, options.rules),
        qualityScore: scoreHook(text, engagement, options.scoring),
    };
}
