/**
 * Puppeteer-based fetcher for profile pages
 * Uses a local Chrome (puppeteer-core) to render the profile, scrolls to
 * load more posts, then reads the post list embedded in the page.
 */

import puppeteer from 'puppeteer-core';
import type { Browser, Page } from 'puppeteer-core';
import type { Config, DelayRange } from '../config.js';
import { FetchError, describeError } from '../errors.js';
import { randomDelay, sleep as defaultSleep } from '../utils/delay.js';
import type { Sleep } from '../utils/delay.js';
import { PageFetcher } from './base.js';
import type { FetchOptions } from './base.js';
import { extractProfileItems, extractUniversalData, isRecord, toRawPostCandidate } from './page-data.js';

export const PROFILE_URL_BASE = 'https://www.tiktok.com/@';

const POST_ITEM_SELECTOR = 'div[data-e2e="user-post-item"]';

const USER_AGENT = 'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

const COUNT_ITEMS_SCRIPT = `document.querySelectorAll('${POST_ITEM_SELECTOR}').length`;

// In-page fallback when the state script is missing from the served HTML
const PAGE_STATE_SCRIPT = `
    (() => {
        const universal = document.getElementById('__UNIVERSAL_DATA_FOR_REHYDRATION__');
        if (universal && universal.textContent) {
            try { return JSON.parse(universal.textContent); } catch (e) { }
        }
        if (window.SIGI_STATE) return window.SIGI_STATE;
        if (window.__INIT_DATA__) return window.__INIT_DATA__;
        return null;
    })()
`;

export interface PuppeteerFetcherOptions {
    executablePath: string;
    headless: boolean;
    navigationTimeoutMs: number;
    maxScrolls: number;
    scrollPause: DelayRange;
    sleep?: Sleep;
}

export function puppeteerOptionsFromConfig(config: Config): PuppeteerFetcherOptions {
    return {
        executablePath: config.chromeExecutablePath,
        headless: config.headless,
        navigationTimeoutMs: config.navigationTimeoutMs,
        maxScrolls: config.maxScrolls,
        scrollPause: config.scrollPause,
    };
}

export class PuppeteerFetcher extends PageFetcher {
    name = 'puppeteer';
    private browser: Browser | null = null;

    constructor(private readonly options: PuppeteerFetcherOptions) {
        super();
    }

    isConfigured(): boolean {
        return !!this.options.executablePath;
    }

    private async getBrowser(): Promise<Browser> {
        if (!this.browser || !this.browser.connected) {
            console.log(`  [Puppeteer] Launching browser (headless: ${this.options.headless})...`);
            try {
                this.browser = await puppeteer.launch({
                    executablePath: this.options.executablePath,
                    headless: this.options.headless,
                    args: [
                        '--no-sandbox',
                        '--disable-setuid-sandbox',
                        '--disable-dev-shm-usage',
                        '--disable-gpu',
                    ],
                });
            } catch (error) {
                throw new FetchError(`Could not launch browser: ${describeError(error)}`, { cause: error });
            }
        }
        return this.browser;
    }

    async fetchPosts(handle: string, { limit, signal }: FetchOptions): Promise<unknown[]> {
        signal?.throwIfAborted();
        const browser = await this.getBrowser();
        let page: Page;
        try {
            page = await browser.newPage();
        } catch (error) {
            throw new FetchError(`Could not open a page: ${describeError(error)}`, { cause: error });
        }

        try {
            await page.setViewport({ width: 1920, height: 1080 });
            await page.setUserAgent(USER_AGENT);
            page.setDefaultTimeout(this.options.navigationTimeoutMs);

            const url = `${PROFILE_URL_BASE}${encodeURIComponent(handle)}`;
            console.log(`  [Puppeteer] Visiting ${url}`);
            try {
                await page.goto(url, { waitUntil: 'networkidle2', timeout: this.options.navigationTimeoutMs });
                await page.waitForSelector(POST_ITEM_SELECTOR, { timeout: 10000 });
            } catch (error) {
                throw new FetchError(`Failed to load profile @${handle}: ${describeError(error)}`, { cause: error });
            }

            await this.scrollForPosts(page, limit, signal);
            signal?.throwIfAborted();

            const data = extractUniversalData(await page.content()) ?? await this.readPageState(page);
            if (!data) {
                throw new FetchError(`No embedded post data found for @${handle}`);
            }

            const items = extractProfileItems(data).slice(0, limit);
            console.log(`  [Puppeteer] Extracted ${items.length} post(s) for @${handle}`);
            return items.map(toRawPostCandidate);
        } finally {
            await page.close().catch(error => {
                console.warn('  [Puppeteer] Failed to close page:', describeError(error));
            });
        }
    }

    private async countItems(page: Page): Promise<number> {
        const count = await page.evaluate(COUNT_ITEMS_SCRIPT);
        return typeof count === 'number' ? count : 0;
    }

    private async readPageState(page: Page): Promise<Record<string, unknown> | null> {
        const state = await page.evaluate(PAGE_STATE_SCRIPT);
        return isRecord(state) ? state : null;
    }

    /**
     * Scroll until the page stops loading new items, limit is reached,
     * or maxScrolls runs out.
     */
    private async scrollForPosts(page: Page, limit: number, signal?: AbortSignal): Promise<number> {
        let loaded = await this.countItems(page);

        for (let scroll = 0; scroll < this.options.maxScrolls && loaded < limit; scroll++) {
            await page.evaluate('window.scrollTo(0, document.body.scrollHeight)');
            await randomDelay(this.options.scrollPause, { sleep: this.options.sleep ?? defaultSleep, signal });
            signal?.throwIfAborted();

            const current = await this.countItems(page);
            if (current === loaded) {
                console.log(`  [Puppeteer] No new posts after scroll ${scroll + 1}`);
                break;
            }
            loaded = current;
            console.log(`  [Puppeteer] Loaded ${loaded} posts after scroll ${scroll + 1}`);
        }

        return loaded;
    }

    async close(): Promise<void> {
        if (this.browser) {
            const browser = this.browser;
            this.browser = null;
            await browser.close();
        }
    }
}

export default PuppeteerFetcher;
