/**
 * Command-line interface
 * Every command opens the workspace database, does its work, and closes it.
 */

import { Command, InvalidArgumentError } from 'commander';
import path from 'path';
import { createInterface } from 'readline/promises';
import { loadConfig as defaultLoadConfig } from './config.js';
import type { Config } from './config.js';
import { openDatabase } from './db.js';
import type { Db } from './db.js';
import { ProfileNotFoundError, describeError } from './errors.js';
import type { PageFetcher } from './scrapers/base.js';
import { PuppeteerFetcher, puppeteerOptionsFromConfig } from './scrapers/puppeteer.js';
import { buildDataset, writeDataset } from './services/dataset-aggregator.js';
import { hookOptionsFromConfig } from './services/hook-annotator.js';
import { PostStore } from './services/post-store.js';
import { ProfileRegistry, normalizeHandle } from './services/profile-registry.js';
import { runScrapeJob } from './services/scraper.js';
import { SlideshowFilter } from './services/slideshow-filter.js';
import { HOOK_CATEGORIES, PROFILE_STATUSES } from './types.js';
import type { Profile } from './types.js';

export const DEFAULT_OUTPUT = 'training_dataset.json';

export interface FetcherSettings {
    headless: boolean;
}

export interface CliDeps {
    loadConfig?: () => Config;
    createFetcher?: (config: Config, settings: FetcherSettings) => PageFetcher;
    confirm?: (question: string) => Promise<boolean>;
    now?: () => Date;
}

export interface Workspace {
    db: Db;
    registry: ProfileRegistry;
    store: PostStore;
    warnings: string[];
}

export function databasePath(config: Config, dataDir = config.dataDir): string {
    return path.join(dataDir, config.dbFile);
}

export function openWorkspace(file: string, now: () => Date = () => new Date()): Workspace {
    const { db, warnings } = openDatabase(file, now);
    return {
        db,
        registry: new ProfileRegistry(db, now),
        store: new PostStore(db),
        warnings,
    };
}

async function askYesNo(question: string): Promise<boolean> {
    const rl = createInterface({ input: process.stdin, output: process.stdout });
    try {
        const answer = await rl.question(`${question} [y/N] `);
        return ['y', 'yes'].includes(answer.trim().toLowerCase());
    } finally {
        rl.close();
    }
}

function parsePositiveInt(value: string): number {
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed < 1) {
        throw new InvalidArgumentError('Expected a positive integer.');
    }
    return parsed;
}

export function formatProfileRow(profile: Profile): string {
    return [
        `@${profile.handle}`.padEnd(25),
        profile.status.padEnd(10),
        String(profile.totalPostCount).padStart(6),
        String(profile.postCount).padStart(10),
        String(profile.errorCount).padStart(7),
    ].join(' ');
}

const TABLE_HEADER = [
    'Handle'.padEnd(25),
    'Status'.padEnd(10),
    'Posts'.padStart(6),
    'Slideshows'.padStart(10),
    'Errors'.padStart(7),
].join(' ');

function capitalize(word: string): string {
    return word.charAt(0).toUpperCase() + word.slice(1);
}

interface ScrapeOptions {
    profiles?: string[];
    all?: boolean;
    limit?: number;
    workers?: number;
    headed?: boolean;
}

interface AnalyzeOptions {
    output: string;
    dataDir?: string;
    simplified?: boolean;
}

export function createProgram(deps: CliDeps = {}): Command {
    const loadConfig = deps.loadConfig ?? (() => defaultLoadConfig());
    const createFetcher = deps.createFetcher
        ?? ((config: Config, settings: FetcherSettings) =>
            new PuppeteerFetcher({ ...puppeteerOptionsFromConfig(config), headless: settings.headless }));
    const confirm = deps.confirm ?? askYesNo;
    const now = deps.now ?? (() => new Date());

    async function withWorkspace<T>(fn: (workspace: Workspace, config: Config) => Promise<T> | T, dataDir?: string): Promise<T> {
        const config = loadConfig();
        const workspace = openWorkspace(databasePath(config, dataDir), now);
        for (const warning of workspace.warnings) console.warn(`Warning: ${warning}`);
        try {
            return await fn(workspace, config);
        } finally {
            workspace.db.close();
        }
    }

    const program = new Command();
    program
        .name('hook-harvester')
        .description('Scrape slideshow posts from tracked profiles and build a hook training dataset');

    program
        .command('add')
        .description('Track one or more profiles (with or without @)')
        .argument('<handles...>', 'profile handles')
        .action((handles: string[]) => withWorkspace(({ registry }) => {
            for (const raw of handles) {
                const handle = normalizeHandle(raw);
                if (!handle) continue;
                if (registry.add([handle]) > 0) {
                    console.log(`Added profile: @${handle}`);
                } else {
                    console.log(`Profile already exists: @${handle}`);
                }
            }
        }));

    program
        .command('remove')
        .description('Stop tracking profiles and delete their posts')
        .argument('<handles...>', 'profile handles')
        .action((handles: string[]) => withWorkspace(({ registry }) => {
            for (const raw of handles) {
                const handle = normalizeHandle(raw);
                if (!handle) continue;
                if (registry.remove([handle]) > 0) {
                    console.log(`Removed profile: @${handle}`);
                } else {
                    console.log(`Profile not found: @${handle}`);
                }
            }
        }));

    program
        .command('list')
        .description('List tracked profiles and their status')
        .action(() => withWorkspace(({ registry }) => {
            const profiles = registry.listAll();
            if (profiles.length === 0) {
                console.log('No profiles tracked');
                return;
            }

            console.log(TABLE_HEADER);
            console.log('-'.repeat(TABLE_HEADER.length));
            for (const profile of profiles) console.log(formatProfileRow(profile));

            const counts = registry.statusCounts();
            const parts = PROFILE_STATUSES.map(status => `${capitalize(status)}: ${counts[status]}`);
            console.log(`\nTotal: ${profiles.length} | ${parts.join(' | ')}`);
        }));

    program
        .command('info')
        .description('Show details for one profile')
        .argument('<handle>', 'profile handle')
        .action((raw: string) => withWorkspace(({ registry, store }) => {
            const profile = registry.get(raw);
            if (!profile) {
                console.log(`Profile @${normalizeHandle(raw)} is not tracked`);
                return;
            }

            console.log(`Profile: @${profile.handle}`);
            console.log(`status: ${profile.status}`);
            console.log(`addedAt: ${profile.addedAt}`);
            console.log(`lastScrapedAt: ${profile.lastScrapedAt ?? '-'}`);
            console.log(`totalPostCount: ${profile.totalPostCount}`);
            console.log(`postCount: ${profile.postCount}`);
            console.log(`storedPosts: ${store.countByProfile(profile.handle)}`);
            console.log(`errorCount: ${profile.errorCount}`);
            console.log(`lastErrorAt: ${profile.lastErrorAt ?? '-'}`);
            console.log(`failureReason: ${profile.failureReason ?? '-'}`);
        }));

    program
        .command('reset')
        .description('Return profiles to pending (all failed profiles when none are named)')
        .argument('[handles...]', 'profile handles')
        .option('--clear-history', 'also forget post counts and last scrape time')
        .action((handles: string[], opts: { clearHistory?: boolean }) => withWorkspace(({ registry }) => {
            const targets = handles.length > 0
                ? handles
                : registry.listAll().filter(profile => profile.status === 'failed').map(profile => profile.handle);
            if (targets.length === 0) {
                console.log('No failed profiles to reset');
                return;
            }
            const changed = registry.reset(targets, { clearHistory: opts.clearHistory });
            console.log(`Reset ${changed} profile(s) to pending`);
        }));

    program
        .command('skip')
        .description('Exclude profiles from future scrapes until reset')
        .argument('<handles...>', 'profile handles')
        .action((handles: string[]) => withWorkspace(({ registry }) => {
            for (const raw of handles) {
                try {
                    const profile = registry.markSkipped(raw);
                    console.log(`Skipped profile: @${profile.handle}`);
                } catch (error) {
                    if (!(error instanceof ProfileNotFoundError)) throw error;
                    console.log(`Profile not found: @${error.handle}`);
                }
            }
        }));

    program
        .command('scrape')
        .description('Scrape profiles for slideshow posts (all pending profiles by default)')
        .option('-p, --profiles <handles...>', 'specific profiles to scrape')
        .option('--all', 'scrape every pending profile')
        .option('-l, --limit <n>', 'maximum posts to fetch per profile', parsePositiveInt)
        .option('-w, --workers <n>', 'number of concurrent browser sessions', parsePositiveInt)
        .option('--headed', 'show the browser window')
        .action((opts: ScrapeOptions) => withWorkspace(async ({ registry, store }, config) => {
            const handles = opts.all ? undefined : opts.profiles;
            if (!handles && registry.statusCounts().pending === 0) {
                console.log('No pending profiles to scrape');
                return;
            }

            const settings: FetcherSettings = { headless: opts.headed ? false : config.headless };
            const fetcher = createFetcher(config, settings);
            if (!fetcher.isConfigured()) {
                throw new Error(`Fetcher "${fetcher.name}" is not configured; set CHROME_EXECUTABLE_PATH`);
            }
            await fetcher.close();

            const controller = new AbortController();
            const onSigint = () => {
                console.log('\nInterrupted, finishing current posts...');
                controller.abort();
            };
            process.once('SIGINT', onSigint);

            try {
                const summary = await runScrapeJob({
                    registry,
                    store,
                    filter: new SlideshowFilter({ minLikes: config.minLikes, minViews: config.minViews }),
                    createFetcher: () => createFetcher(config, settings),
                    hookOptions: hookOptionsFromConfig(config),
                    postLimit: opts.limit ?? config.postLimit,
                    workerCount: opts.workers ?? config.workerCount,
                    profileDelay: config.profileDelay,
                    handles,
                    signal: controller.signal,
                    now,
                });

                console.log('\nScraping summary');
                console.log('-'.repeat(40));
                for (const handle of summary.completed) {
                    console.log(`@${handle}: completed (${store.countByProfile(handle)} posts stored)`);
                }
                for (const { handle, reason } of summary.failed) {
                    console.log(`@${handle}: failed (${reason})`);
                }
                for (const { handle, reason } of summary.skipped) {
                    console.log(`@${handle}: skipped (${reason})`);
                }
                console.log(`Posts kept: ${summary.postsAccepted}, filtered: ${summary.postsRejected}, malformed: ${summary.postsMalformed}`);
                if (summary.aborted) console.log('Run was interrupted');
            } finally {
                process.off('SIGINT', onSigint);
            }
        }));

    program
        .command('analyze')
        .description('Build the hook training dataset from stored posts')
        .option('-o, --output <file>', 'output file path', DEFAULT_OUTPUT)
        .option('-d, --data-dir <dir>', 'directory holding the database')
        .option('--simplified', 'also write a text/category/quality file')
        .action((opts: AnalyzeOptions) => withWorkspace(({ registry, store }, config) => {
            const dataset = buildDataset(registry.listAll(), store, {
                hook: hookOptionsFromConfig(config),
                topOpeningWords: config.topOpeningWords,
            });
            const written = writeDataset(dataset, opts.output, { simplified: opts.simplified });

            const { statistics } = dataset;
            if (statistics.totalRecords === 0) {
                console.log('No hooks found in stored posts');
            }
            console.log(`Total hooks: ${statistics.totalRecords}`);
            console.log(`Profiles: ${statistics.totalProfiles}`);
            console.log(`Average quality: ${statistics.averageQualityScore.toFixed(3)}`);
            console.log(`Average words per hook: ${statistics.averageWordCount.toFixed(1)}`);
            console.log('\nCategories:');
            for (const category of HOOK_CATEGORIES) {
                const count = statistics.categoryCounts[category];
                if (count > 0) console.log(`  ${category}: ${count}`);
            }
            const openings = statistics.patterns.commonOpenings.slice(0, 5);
            if (openings.length > 0) {
                console.log('\nCommon openings:');
                for (const { pattern, count } of openings) console.log(`  "${pattern}": ${count}`);
            }
            for (const file of written) console.log(`Saved ${file}`);
        }, opts.dataDir));

    program
        .command('clean')
        .description('Delete all stored posts and reset every profile')
        .option('--force', 'do not ask for confirmation')
        .action((opts: { force?: boolean }) => withWorkspace(async ({ registry, store }) => {
            if (!opts.force && !(await confirm('Delete all stored posts and reset every profile?'))) {
                console.log('Cancelled');
                return;
            }
            const removed = store.clear();
            const reset = registry.reset(registry.listAll().map(profile => profile.handle), { clearHistory: true });
            console.log(`Deleted ${removed} post(s) and reset ${reset} profile(s)`);
        }));

    return program;
}

export function reportFailure(error: unknown): void {
    console.error(`Error: ${describeError(error)}`);
}
