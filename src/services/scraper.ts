/**
 * Main Scrape Job Orchestrator
 * Claims profiles from the registry, fetches their posts through a pool of
 * fetcher sessions, filters and annotates slideshows, and stores them.
 */

import type { DelayRange } from '../config.js';
import { PersistenceError, describeError } from '../errors.js';
import type { PageFetcher } from '../scrapers/base.js';
import { parseRawPost } from '../scrapers/raw-post.js';
import type { RawPost } from '../scrapers/raw-post.js';
import type { AnnotatedPost, Profile, ScrapeSummary } from '../types.js';
import { NO_DELAY, randomDelay, sleep as defaultSleep } from '../utils/delay.js';
import type { Sleep } from '../utils/delay.js';
import { DEFAULT_HOOK_OPTIONS, deriveHook } from './hook-annotator.js';
import type { HookOptions } from './hook-annotator.js';
import type { PostStore } from './post-store.js';
import { normalizeHandle } from './profile-registry.js';
import type { ProfileRegistry } from './profile-registry.js';
import type { SlideshowFilter } from './slideshow-filter.js';

export const ABORTED_REASON = 'Scrape aborted';

export interface ScrapeJobOptions {
    registry: ProfileRegistry;
    store: PostStore;
    filter: SlideshowFilter;
    createFetcher: () => PageFetcher;
    postLimit: number;
    workerCount: number;
    /** Explicit targets; when omitted every pending profile is scraped */
    handles?: readonly string[];
    hookOptions?: HookOptions;
    profileDelay?: DelayRange;
    signal?: AbortSignal;
    sleep?: Sleep;
    random?: () => number;
    now?: () => Date;
}

interface JobContext extends ScrapeJobOptions {
    queue: string[] | null;
    stop: AbortController;
    summary: ScrapeSummary;
}

function toPost(raw: RawPost, handle: string, capturedAt: string, hookOptions: HookOptions): AnnotatedPost {
    const stats = {
        likes: raw.likes ?? 0,
        views: raw.views ?? 0,
        comments: raw.comments ?? 0,
        shares: raw.shares ?? 0,
        bookmarks: raw.bookmarks ?? 0,
    };

    return {
        profileHandle: handle,
        postId: raw.id,
        caption: raw.caption,
        mediaType: raw.mediaType,
        imageCount: raw.imageCount ?? null,
        stats,
        postedAt: raw.postedAt ?? null,
        capturedAt: raw.capturedAt ?? capturedAt,
        hook: deriveHook(raw.caption, stats, hookOptions),
    };
}

/**
 * Take the next profile this run should work on, or null when there is none.
 */
function claimNext(ctx: JobContext): Profile | null {
    if (!ctx.queue) {
        return ctx.registry.claimNext();
    }

    while (ctx.queue.length > 0) {
        const handle = ctx.queue.shift();
        if (handle === undefined) break;

        const result = ctx.registry.claim(handle);
        if (result.ok) return result.profile;

        const reason = result.reason === 'terminal'
            ? 'Already completed or skipped; reset it to scrape again'
            : 'Profile is not tracked';
        console.log(`  [Scraper] Skipping @${handle}: ${reason}`);
        ctx.summary.skipped.push({ handle, reason });
    }
    return null;
}

function hasMoreWork(ctx: JobContext): boolean {
    return ctx.queue ? ctx.queue.length > 0 : ctx.registry.nextPending() !== null;
}

async function scrapeProfile(profile: Profile, fetcher: PageFetcher, ctx: JobContext): Promise<void> {
    const { handle } = profile;
    const signal = ctx.stop.signal;
    const hookOptions = ctx.hookOptions ?? DEFAULT_HOOK_OPTIONS;
    const now = ctx.now ?? (() => new Date());

    console.log(`\n[Scraper] Scraping @${handle}`);

    try {
        const candidates = (await fetcher.fetchPosts(handle, { limit: ctx.postLimit, signal }))
            .slice(0, ctx.postLimit);
        console.log(`  [Scraper] Fetched ${candidates.length} candidate(s)`);

        let accepted = 0;
        let rejected = 0;
        let malformed = 0;

        for (const candidate of candidates) {
            if (signal.aborted) break;

            const parsed = parseRawPost(candidate);
            if (!parsed.ok) {
                malformed++;
                console.warn(`  [Scraper] Skipping malformed post: ${parsed.error.message}`);
                continue;
            }

            const verdict = ctx.filter.evaluate(parsed.post);
            if (!verdict.passed) {
                rejected++;
                continue;
            }

            // One post per write so an abort keeps what was already saved
            ctx.store.save([toPost(parsed.post, handle, now().toISOString(), hookOptions)]);
            accepted++;
        }

        ctx.summary.postsAccepted += accepted;
        ctx.summary.postsRejected += rejected;
        ctx.summary.postsMalformed += malformed;
        console.log(`  [Scraper] @${handle}: ${accepted} kept, ${rejected} filtered, ${malformed} malformed`);

        if (signal.aborted) {
            ctx.registry.markFailed(handle, ABORTED_REASON);
            ctx.summary.failed.push({ handle, reason: ABORTED_REASON });
            return;
        }

        ctx.registry.markCompleted(handle, ctx.store.countByProfile(handle), candidates.length);
        ctx.summary.completed.push(handle);
    } catch (error) {
        if (error instanceof PersistenceError) throw error;

        const reason = signal.aborted ? ABORTED_REASON : describeError(error);
        console.error(`  [Scraper] Failed @${handle}: ${reason}`);
        ctx.registry.markFailed(handle, reason);
        ctx.summary.failed.push({ handle, reason });
    }
}

async function runWorker(workerId: number, ctx: JobContext): Promise<void> {
    let fetcher: PageFetcher | null = null;
    let processed = 0;

    try {
        while (!ctx.stop.signal.aborted) {
            if (processed > 0) {
                if (!hasMoreWork(ctx)) break;
                const waited = await randomDelay(ctx.profileDelay ?? NO_DELAY, {
                    sleep: ctx.sleep ?? defaultSleep,
                    random: ctx.random,
                    signal: ctx.stop.signal,
                });
                if (waited > 0) console.log(`  [Worker ${workerId}] Waited ${waited}ms between profiles`);
                if (ctx.stop.signal.aborted) break;
            }

            const profile = claimNext(ctx);
            if (!profile) break;

            fetcher ??= ctx.createFetcher();
            await scrapeProfile(profile, fetcher, ctx);
            processed++;
        }
    } finally {
        if (fetcher) {
            await fetcher.close().catch(error => {
                console.warn(`  [Worker ${workerId}] Failed to close fetcher:`, describeError(error));
            });
        }
    }
}

function emptySummary(): ScrapeSummary {
    return {
        completed: [],
        failed: [],
        skipped: [],
        postsAccepted: 0,
        postsRejected: 0,
        postsMalformed: 0,
        aborted: false,
    };
}

/**
 * Run a scrape job. Per-profile failures are recorded and the run carries
 * on; a PersistenceError stops every worker and is rethrown.
 */
export async function runScrapeJob(options: ScrapeJobOptions): Promise<ScrapeSummary> {
    const queue = options.handles
        ? [...new Set(options.handles.map(normalizeHandle).filter(Boolean))]
        : null;
    const stop = new AbortController();
    const ctx: JobContext = { ...options, queue, stop, summary: emptySummary() };

    const onAbort = () => stop.abort();
    if (options.signal?.aborted) {
        stop.abort();
    } else {
        options.signal?.addEventListener('abort', onAbort, { once: true });
    }

    const targets = queue ? queue.length : options.registry.statusCounts().pending;
    const workerCount = Math.max(1, Math.min(options.workerCount, targets));
    console.log(`=== Starting scrape job (${targets} profile(s), ${workerCount} worker(s)) ===`);

    let fatal: unknown = null;
    const workers = Array.from({ length: workerCount }, (_, index) =>
        runWorker(index + 1, ctx).catch(error => {
            fatal ??= error;
            stop.abort();
        })
    );

    try {
        await Promise.all(workers);
    } finally {
        options.signal?.removeEventListener('abort', onAbort);
    }

    if (fatal !== null) {
        console.error('[Scraper] Scrape job stopped:', describeError(fatal));
        throw fatal;
    }

    const { summary } = ctx;
    summary.aborted = options.signal?.aborted ?? false;

    console.log('\n=== Scrape job complete ===');
    console.log(`Completed: ${summary.completed.length}`);
    console.log(`Failed: ${summary.failed.length}`);
    console.log(`Posts kept: ${summary.postsAccepted}`);
    console.log(`Posts filtered: ${summary.postsRejected}`);
    return summary;
}
