/**
 * Dataset Aggregator
 * Rebuilds the training dataset from every stored post. Hooks are always
 * re-derived from captions, never read from stored annotations, so the same
 * store always produces the same document.
 */

import fs from 'fs';
import path from 'path';
import { PersistenceError } from '../errors.js';
import type {
    Dataset,
    DatasetStatistics,
    HookCategory,
    LengthBucket,
    Profile,
    TrainingRecord,
    WordCount,
} from '../types.js';
import { DEFAULT_HOOK_OPTIONS, deriveHook } from './hook-annotator.js';
import type { HookOptions } from './hook-annotator.js';
import type { PostSource } from './post-store.js';
import { extractHashtags, extractMentions, extractPatterns, splitWords } from './text-features.js';

export interface DatasetOptions {
    hook: HookOptions;
    topOpeningWords: number;
}

export const DEFAULT_DATASET_OPTIONS: DatasetOptions = {
    hook: DEFAULT_HOOK_OPTIONS,
    topOpeningWords: 10,
};

function emptyCategoryCounts(): Record<HookCategory, number> {
    return {
        Question: 0,
        Story: 0,
        List: 0,
        Challenge: 0,
        Emotional: 0,
        Educational: 0,
        Controversial: 0,
        Statement: 0,
    };
}

function emptyLengthDistribution(): Record<LengthBucket, number> {
    return { '0-20': 0, '21-40': 0, '41-60': 0, '61-80': 0, '81+': 0 };
}

function lengthBucket(length: number): LengthBucket {
    if (length <= 20) return '0-20';
    if (length <= 40) return '21-40';
    if (length <= 60) return '41-60';
    if (length <= 80) return '61-80';
    return '81+';
}

/**
 * First word of a hook, lower-cased, with surrounding punctuation removed.
 */
export function openingWord(hook: string): string | null {
    const first = hook.trim().split(/\s+/)[0] ?? '';
    const word = first.toLowerCase().replace(/^[^\p{L}\p{N}]+|[^\p{L}\p{N}]+$/gu, '');
    return word || null;
}

export function topOpeningWords(hooks: readonly string[], limit: number): WordCount[] {
    const counts = new Map<string, number>();
    for (const hook of hooks) {
        const word = openingWord(hook);
        if (word) counts.set(word, (counts.get(word) ?? 0) + 1);
    }

    return [...counts.entries()]
        .map(([word, count]) => ({ word, count }))
        .sort((a, b) => b.count - a.count || (a.word < b.word ? -1 : a.word > b.word ? 1 : 0))
        .slice(0, limit);
}

function mean(values: readonly number[]): number {
    if (values.length === 0) return 0;
    return values.reduce((sum, value) => sum + value, 0) / values.length;
}

export function computeStatistics(records: readonly TrainingRecord[], topWords: number): DatasetStatistics {
    const categoryCounts = emptyCategoryCounts();
    const lengthDistribution = emptyLengthDistribution();
    const profiles = new Set<string>();

    for (const record of records) {
        categoryCounts[record.category]++;
        lengthDistribution[lengthBucket(record.hook.length)]++;
        profiles.add(record.profileHandle);
    }

    const scores = records.map(record => record.qualityScore);
    const hooks = records.map(record => record.hook);

    return {
        totalRecords: records.length,
        totalProfiles: profiles.size,
        categoryCounts,
        averageHookLength: mean(hooks.map(hook => hook.length)),
        averageWordCount: mean(hooks.map(hook => splitWords(hook).length)),
        averageQualityScore: mean(scores),
        minQualityScore: scores.length > 0 ? Math.min(...scores) : 0,
        maxQualityScore: scores.length > 0 ? Math.max(...scores) : 0,
        topOpeningWords: topOpeningWords(hooks, topWords),
        lengthDistribution,
        patterns: extractPatterns(hooks),
    };
}

export function buildDataset(
    profiles: readonly Profile[],
    posts: PostSource,
    options: DatasetOptions = DEFAULT_DATASET_OPTIONS,
): Dataset {
    const records: TrainingRecord[] = [];

    for (const profile of profiles) {
        for (const post of posts.listByProfile(profile.handle)) {
            const hook = deriveHook(post.caption, post.stats, options.hook);
            records.push({
                hook: hook.text,
                category: hook.category,
                qualityScore: hook.qualityScore,
                engagement: { ...post.stats },
                profileHandle: post.profileHandle,
                postId: post.postId,
                hashtags: extractHashtags(post.caption),
                mentions: extractMentions(post.caption),
            });
        }
    }

    console.log(`[Dataset] Built ${records.length} record(s) from ${profiles.length} profile(s)`);
    return { records, statistics: computeStatistics(records, options.topOpeningWords) };
}

export interface WriteOptions {
    simplified?: boolean;
}

export function simplifiedPath(outputPath: string): string {
    const ext = path.extname(outputPath);
    const base = ext ? outputPath.slice(0, -ext.length) : outputPath;
    return `${base}_simplified${ext || '.json'}`;
}

function writeWhole(file: string, body: string): void {
    const tmp = `${file}.tmp-${process.pid}`;
    try {
        fs.mkdirSync(path.dirname(path.resolve(file)), { recursive: true });
        fs.writeFileSync(tmp, body, 'utf8');
        fs.renameSync(tmp, file);
    } catch (error) {
        if (fs.existsSync(tmp)) fs.rmSync(tmp, { force: true });
        throw new PersistenceError(`Cannot write dataset to ${file}`, { cause: error });
    }
}

/**
 * Write the dataset document. Returns the paths written.
 */
export function writeDataset(dataset: Dataset, outputPath: string, options: WriteOptions = {}): string[] {
    writeWhole(outputPath, JSON.stringify(dataset, null, 2) + '\n');
    const written = [outputPath];

    if (options.simplified) {
        const rows = dataset.records.map(record => ({
            text: record.hook,
            category: record.category,
            quality: record.qualityScore,
        }));
        const file = simplifiedPath(outputPath);
        writeWhole(file, JSON.stringify(rows, null, 2) + '\n');
        written.push(file);
    }

    console.log(`[Dataset] Saved ${dataset.records.length} record(s) to ${written.join(', ')}`);
    return written;
}
