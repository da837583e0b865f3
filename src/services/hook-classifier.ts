/**
 * Hook Classifier
 * Ordered rule list: the first rule that matches decides the category, and
 * Statement catches everything else. Rules run on a lower-cased copy of the
 * hook, so they stay deterministic and free of any language model.
 */

import type { HookCategory } from '../types.js';

export interface HookRule {
    category: HookCategory;
    matches: (hook: string) => boolean;
}

const INTERROGATIVES = [
    'how', 'why', 'what', 'when', 'where', 'who', 'which',
    'is', 'are', 'do', 'does', 'can', 'will',
];

// Words that do not count as the noun after "best"/"worst"
const FUNCTION_WORDS = new Set([
    'and', 'any', 'are', 'but', 'can', 'did', 'does', 'ever', 'for', 'from',
    'has', 'have', 'her', 'his', 'its', 'not', 'our', 'the', 'their', 'this',
    'that', 'was', 'way', 'were', 'with', 'you', 'your',
]);

/**
 * Lower-case and fold typographic apostrophes so "can’t" matches "can't".
 */
export function normalizeForMatching(hook: string): string {
    return hook.toLowerCase().replace(/[‘’ʼ]/g, '\'').trim();
}

function containsAny(text: string, phrases: readonly string[]): boolean {
    return phrases.some(phrase => text.includes(phrase));
}

function startsWithInterrogative(text: string): boolean {
    const firstWord = text.replace(/^[^\p{L}\p{N}]+/u, '').match(/^[\p{L}]+/u)?.[0];
    return firstWord !== undefined && INTERROGATIVES.includes(firstWord);
}

function hasLeadingNumeral(text: string): boolean {
    return /^#\d+/.test(text)
        || /^top\s+\d+/.test(text)
        || /^\d{1,3}(?:st|nd|rd|th)?\s+\p{L}/u.test(text);
}

function hasRankedNoun(text: string): boolean {
    for (const match of text.matchAll(/(?:^|[^\p{L}])(?:best|worst)\s+(\p{L}+)/gu)) {
        const word = match[1];
        if (word.length >= 3 && !FUNCTION_WORDS.has(word)) return true;
    }
    return false;
}

function countOf(text: string, char: string): number {
    return text.split(char).length - 1;
}

export const HOOK_RULES: readonly HookRule[] = [
    {
        category: 'Question',
        matches: hook => startsWithInterrogative(hook) || hook.endsWith('?'),
    },
    {
        category: 'Story',
        matches: hook => containsAny(hook, ['pov', 'story time', 'when i', 'that time']),
    },
    {
        category: 'List',
        matches: hook => hasLeadingNumeral(hook) || hasRankedNoun(hook),
    },
    {
        category: 'Challenge',
        matches: hook => containsAny(hook, ['challenge', 'dare', 'try this', 'bet you can\'t']),
    },
    {
        category: 'Emotional',
        matches: hook => {
            const affect = containsAny(hook, ['omg', 'shocking', 'can\'t believe']) || countOf(hook, '!') >= 2;
            const urgency = containsAny(hook, ['now', 'today', 'before it\'s too late']);
            return affect && urgency;
        },
    },
    {
        category: 'Educational',
        matches: hook => containsAny(hook, ['learn', 'tutorial', 'how to', 'guide', 'tips']),
    },
    {
        category: 'Controversial',
        matches: hook => containsAny(hook, ['unpopular opinion', 'hot take', 'nobody talks about', 'controversial']),
    },
];

export const FALLBACK_CATEGORY: HookCategory = 'Statement';

export function classifyHook(hook: string, rules: readonly HookRule[] = HOOK_RULES): HookCategory {
    const text = normalizeForMatching(hook);
    if (!text) return FALLBACK_CATEGORY;

    for (const rule of rules) {
        if (rule.matches(text)) return rule.category;
    }
    return FALLBACK_CATEGORY;
}
