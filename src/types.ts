/**
 * Shared type definitions for the hook harvester
 */

export const PROFILE_STATUSES = ['pending', 'scraping', 'completed', 'failed', 'skipped'] as const;

export type ProfileStatus = typeof PROFILE_STATUSES[number];

export interface Profile {
    handle: string;
    status: ProfileStatus;
    addedAt: string;
    lastScrapedAt: string | null;
    /** Slideshow posts currently stored */
    postCount: number;
    /** Posts fetched by the last completed scrape, slideshow or not */
    totalPostCount: number;
    failureReason: string | null;
    errorCount: number;
    lastErrorAt: string | null;
}

export type ClaimResult =
    | { ok: true; profile: Profile }
    | { ok: false; reason: 'not-found' | 'terminal' };

export interface EngagementStats {
    likes: number;
    views: number;
    comments: number;
    shares: number;
    bookmarks: number;
}

// Ordered: this is also the order used in dataset statistics
export const HOOK_CATEGORIES = [
    'Question',
    'Story',
    'List',
    'Challenge',
    'Emotional',
    'Educational',
    'Controversial',
    'Statement',
] as const;

export type HookCategory = typeof HOOK_CATEGORIES[number];

export interface Hook {
    text: string;
    category: HookCategory;
    qualityScore: number;
}

export interface Post {
    profileHandle: string;
    postId: string;
    caption: string;
    mediaType: string;
    imageCount: number | null;
    stats: EngagementStats;
    postedAt: string | null;
    capturedAt: string;
}

export interface AnnotatedPost extends Post {
    hook: Hook;
}

export interface StoredPost extends Post {
    hook: Hook | null;
}

export interface TrainingRecord {
    hook: string;
    category: HookCategory;
    qualityScore: number;
    engagement: EngagementStats;
    profileHandle: string;
    postId: string;
    /** Caption hashtags without `#` */
    hashtags: string[];
    /** Caption mentions without `@` */
    mentions: string[];
}

export const LENGTH_BUCKETS = ['0-20', '21-40', '41-60', '61-80', '81+'] as const;

export type LengthBucket = typeof LENGTH_BUCKETS[number];

export interface WordCount {
    word: string;
    count: number;
}

export interface PatternCount {
    pattern: string;
    count: number;
}

export interface EmojiCount {
    emoji: string;
    count: number;
}

export interface HookPatterns {
    commonOpenings: PatternCount[];
    commonEndings: PatternCount[];
    frequentWords: WordCount[];
    emojiUsage: EmojiCount[];
}

export interface DatasetStatistics {
    totalRecords: number;
    totalProfiles: number;
    categoryCounts: Record<HookCategory, number>;
    averageHookLength: number;
    averageWordCount: number;
    averageQualityScore: number;
    minQualityScore: number;
    maxQualityScore: number;
    topOpeningWords: WordCount[];
    lengthDistribution: Record<LengthBucket, number>;
    patterns: HookPatterns;
}

export interface Dataset {
    records: TrainingRecord[];
    statistics: DatasetStatistics;
}

export interface FailedProfile {
    handle: string;
    reason: string;
}

export interface ScrapeSummary {
    completed: string[];
    failed: FailedProfile[];
    skipped: FailedProfile[];
    postsAccepted: number;
    postsRejected: number;
    postsMalformed: number;
    aborted: boolean;
}
