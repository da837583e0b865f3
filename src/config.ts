/**
 * Configuration module for the hook harvester
 * Loads from environment variables with sensible defaults
 */

import 'dotenv/config';

export interface DelayRange {
    minMs: number;
    maxMs: number;
}

export interface Config {
    // Storage
    dataDir: string;
    dbFile: string;

    // Slideshow filter
    minLikes: number;
    minViews: number;

    // Hook extraction and scoring
    hookMaxLength: number;
    clarityWeight: number;
    engagementWeight: number;
    engagementCeiling: number;
    idealHookMin: number;
    idealHookMax: number;
    topOpeningWords: number;

    // Scraping
    workerCount: number;
    postLimit: number;
    profileDelay: DelayRange;
    scrollPause: DelayRange;
    maxScrolls: number;
    navigationTimeoutMs: number;
    headless: boolean;
    chromeExecutablePath: string;
}

type Env = Record<string, string | undefined>;

function optional(env: Env, name: string, defaultValue: string): string {
    return env[name] || defaultValue;
}

function integer(env: Env, name: string, defaultValue: number, min = 0): number {
    const raw = optional(env, name, String(defaultValue));
    const value = Number(raw);
    if (!Number.isInteger(value) || value < min) {
        throw new Error(`Invalid ${name}: expected an integer >= ${min}, got "${raw}"`);
    }
    return value;
}

function weight(env: Env, name: string, defaultValue: number): number {
    const raw = optional(env, name, String(defaultValue));
    const value = Number(raw);
    if (!Number.isFinite(value) || value < 0) {
        throw new Error(`Invalid ${name}: expected a non-negative number, got "${raw}"`);
    }
    return value;
}

function flag(env: Env, name: string, defaultValue: boolean): boolean {
    const raw = env[name];
    if (!raw) return defaultValue;
    return !['false', '0', 'no', 'off'].includes(raw.trim().toLowerCase());
}

function range(env: Env, minName: string, maxName: string, defaults: DelayRange): DelayRange {
    const minMs = integer(env, minName, defaults.minMs);
    const maxMs = integer(env, maxName, defaults.maxMs);
    if (minMs > maxMs) {
        throw new Error(`Invalid delay range: ${minName} (${minMs}) is greater than ${maxName} (${maxMs})`);
    }
    return { minMs, maxMs };
}

export function loadConfig(env: Env = process.env): Config {
    const idealHookMin = integer(env, 'IDEAL_HOOK_MIN', 20);
    const idealHookMax = integer(env, 'IDEAL_HOOK_MAX', 120);
    if (idealHookMin > idealHookMax) {
        throw new Error(`Invalid ideal hook band: ${idealHookMin} > ${idealHookMax}`);
    }

    return {
        dataDir: optional(env, 'DATA_DIR', 'scraped_data'),
        dbFile: optional(env, 'DB_FILE', 'hooks.db'),

        minLikes: integer(env, 'MIN_LIKES', 1000),
        minViews: integer(env, 'MIN_VIEWS', 5000),

        hookMaxLength: integer(env, 'HOOK_MAX_LENGTH', 200, 1),
        clarityWeight: weight(env, 'CLARITY_WEIGHT', 0.5),
        engagementWeight: weight(env, 'ENGAGEMENT_WEIGHT', 0.5),
        engagementCeiling: integer(env, 'ENGAGEMENT_CEILING', 100000, 1),
        idealHookMin,
        idealHookMax,
        topOpeningWords: integer(env, 'TOP_OPENING_WORDS', 10),

        workerCount: integer(env, 'SCRAPE_WORKERS', 2, 1),
        postLimit: integer(env, 'SCRAPE_POST_LIMIT', 50, 1),
        profileDelay: range(env, 'PROFILE_DELAY_MIN_MS', 'PROFILE_DELAY_MAX_MS', { minMs: 10000, maxMs: 20000 }),
        scrollPause: range(env, 'SCROLL_PAUSE_MIN_MS', 'SCROLL_PAUSE_MAX_MS', { minMs: 3000, maxMs: 5000 }),
        maxScrolls: integer(env, 'MAX_SCROLLS', 10),
        navigationTimeoutMs: integer(env, 'NAVIGATION_TIMEOUT_MS', 30000, 1),
        headless: flag(env, 'HEADLESS', true),
        chromeExecutablePath: optional(env, 'CHROME_EXECUTABLE_PATH', ''),
    };
}

export default loadConfig;
