/**
 * Text features shared by the dataset aggregator: tags, mentions, emoji,
 * and the corpus-wide patterns reported in dataset statistics.
 */

import type { EmojiCount, HookPatterns, PatternCount, WordCount } from '../types.js';

const HASHTAG = /#([\p{L}\p{N}_]+)/gu;
const MENTION = /@([\p{L}\p{N}_]+)/gu;
const EMOJI = /\p{Extended_Pictographic}/gu;

const STOP_WORDS = new Set([
    'the', 'a', 'an', 'and', 'or', 'but', 'in', 'on', 'at', 'to',
    'for', 'of', 'with', 'by', 'is', 'are', 'was', 'were',
]);

export interface PatternLimits {
    openings: number;
    endings: number;
    words: number;
    emoji: number;
}

export const DEFAULT_PATTERN_LIMITS: PatternLimits = {
    openings: 10,
    endings: 10,
    words: 20,
    emoji: 10,
};

function uniqueMatches(text: string, pattern: RegExp): string[] {
    const seen = new Set<string>();
    for (const match of text.matchAll(pattern)) seen.add(match[1]);
    return [...seen];
}

/** Hashtags without the `#`, first occurrence order, no repeats. */
export function extractHashtags(text: string): string[] {
    return uniqueMatches(text, HASHTAG);
}

/** Mentioned handles without the `@`, first occurrence order, no repeats. */
export function extractMentions(text: string): string[] {
    return uniqueMatches(text, MENTION);
}

export function extractEmojis(text: string): string[] {
    return text.match(EMOJI) ?? [];
}

export function splitWords(text: string): string[] {
    return text.split(/\s+/).filter(Boolean);
}

function stripPunctuation(word: string): string {
    return word.replace(/^[^\p{L}\p{N}]+|[^\p{L}\p{N}]+$/gu, '');
}

/**
 * Count occurrences and keep the most frequent, ties broken alphabetically.
 */
export function mostCommon(values: Iterable<string>, limit: number): Array<[string, number]> {
    const counts = new Map<string, number>();
    for (const value of values) counts.set(value, (counts.get(value) ?? 0) + 1);

    return [...counts.entries()]
        .sort((a, b) => b[1] - a[1] || (a[0] < b[0] ? -1 : a[0] > b[0] ? 1 : 0))
        .slice(0, limit);
}

export function extractPatterns(hooks: readonly string[], limits: PatternLimits = DEFAULT_PATTERN_LIMITS): HookPatterns {
    const openings: string[] = [];
    const endings: string[] = [];
    const words: string[] = [];
    const emojis: string[] = [];

    for (const hook of hooks) {
        const tokens = splitWords(hook);
        if (tokens.length === 0) continue;

        openings.push(tokens.slice(0, 2).join(' ').toLowerCase());
        if (tokens.length > 2) endings.push(tokens.slice(-2).join(' ').toLowerCase());

        for (const token of tokens) {
            const word = stripPunctuation(token.toLowerCase());
            if (word.length > 2 && !STOP_WORDS.has(word)) words.push(word);
        }
        emojis.push(...extractEmojis(hook));
    }

    const asPatterns = (values: string[], limit: number): PatternCount[] =>
        mostCommon(values, limit).map(([pattern, count]) => ({ pattern, count }));

    const frequentWords: WordCount[] = mostCommon(words, limits.words).map(([word, count]) => ({ word, count }));
    const emojiUsage: EmojiCount[] = mostCommon(emojis, limits.emoji).map(([emoji, count]) => ({ emoji, count }));

    return {
        commonOpenings: asPatterns(openings, limits.openings),
        commonEndings: asPatterns(endings, limits.endings),
        frequentWords,
        emojiUsage,
    };
}
