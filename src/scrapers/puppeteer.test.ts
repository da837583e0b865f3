import type { Browser } from 'puppeteer-core';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

vi.mock('puppeteer-core', () => ({
    default: { launch: vi.fn() },
}));

import puppeteer from 'puppeteer-core';
import { FetchError } from '../errors.js';
import { PuppeteerFetcher } from './puppeteer.js';
import type { PuppeteerFetcherOptions } from './puppeteer.js';

const STATE = {
    __DEFAULT_SCOPE__: {
        'webapp.user-detail': {
            userInfo: {
                itemList: [
                    { id: '1', desc: 'First slideshow', imagePost: { images: [{}, {}] }, stats: { diggCount: 10, playCount: 20 } },
                    { id: '2', desc: 'A video', stats: { diggCount: 5, playCount: 6 } },
                ],
            },
        },
    },
};

const HTML = `<html><body><script id="__UNIVERSAL_DATA_FOR_REHYDRATION__">${JSON.stringify(STATE)}</script></body></html>`;

function fakePage(overrides: Record<string, unknown> = {}) {
    return {
        setViewport: vi.fn(async () => undefined),
        setUserAgent: vi.fn(async () => undefined),
        setDefaultTimeout: vi.fn(),
        goto: vi.fn(async () => null),
        waitForSelector: vi.fn(async () => null),
        evaluate: vi.fn(async (script: string) => (script.includes('querySelectorAll') ? 2 : null)),
        content: vi.fn(async () => HTML),
        close: vi.fn(async () => undefined),
        ...overrides,
    };
}

function fakeBrowser(page: ReturnType<typeof fakePage>) {
    return {
        connected: true,
        newPage: vi.fn(async () => page),
        close: vi.fn(async () => undefined),
    };
}

const OPTIONS: PuppeteerFetcherOptions = {
    executablePath: '/usr/bin/chromium',
    headless: true,
    navigationTimeoutMs: 1000,
    maxScrolls: 3,
    scrollPause: { minMs: 0, maxMs: 0 },
    sleep: async () => undefined,
};

describe('PuppeteerFetcher', () => {
    beforeEach(() => {
        vi.spyOn(console, 'log').mockImplementation(() => undefined);
        vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    });

    afterEach(() => {
        vi.restoreAllMocks();
        vi.mocked(puppeteer.launch).mockReset();
    });

    it('is configured only with a browser executable', () => {
        expect(new PuppeteerFetcher(OPTIONS).isConfigured()).toBe(true);
        expect(new PuppeteerFetcher({ ...OPTIONS, executablePath: '' }).isConfigured()).toBe(false);
    });

    it('returns post candidates from the profile page', async () => {
        const page = fakePage();
        const browser = fakeBrowser(page);
        vi.mocked(puppeteer.launch).mockResolvedValue(browser as unknown as Browser);

        const fetcher = new PuppeteerFetcher(OPTIONS);
        const candidates = await fetcher.fetchPosts('alice', { limit: 1 });

        expect(page.goto).toHaveBeenCalledWith('https://www.tiktok.com/@alice', { waitUntil: 'networkidle2', timeout: 1000 });
        expect(candidates).toEqual([{
            id: '1',
            caption: 'First slideshow',
            mediaType: 'slideshow',
            imageCount: 2,
            postedAt: undefined,
            likes: 10,
            views: 20,
            comments: undefined,
            shares: undefined,
            bookmarks: undefined,
        }]);
        expect(page.close).toHaveBeenCalledOnce();

        await fetcher.close();
        expect(browser.close).toHaveBeenCalledOnce();
    });

    it('wraps navigation failures in FetchError and closes the page', async () => {
        const page = fakePage({ goto: vi.fn(async () => { throw new Error('net::ERR_TIMED_OUT'); }) });
        vi.mocked(puppeteer.launch).mockResolvedValue(fakeBrowser(page) as unknown as Browser);

        const fetcher = new PuppeteerFetcher(OPTIONS);
        const attempt = fetcher.fetchPosts('alice', { limit: 5 });

        await expect(attempt).rejects.toThrow(FetchError);
        await expect(attempt).rejects.toThrow('Failed to load profile @alice: net::ERR_TIMED_OUT');
        expect(page.close).toHaveBeenCalledOnce();
    });

    it('wraps launch failures in FetchError', async () => {
        vi.mocked(puppeteer.launch).mockRejectedValue(new Error('No usable sandbox'));

        await expect(new PuppeteerFetcher(OPTIONS).fetchPosts('alice', { limit: 5 }))
            .rejects.toThrow('Could not launch browser: No usable sandbox');
    });

    it('wraps page creation failures in FetchError', async () => {
        const browser = {
            connected: true,
            newPage: vi.fn(async () => { throw new Error('Target closed'); }),
            close: vi.fn(async () => undefined),
        };
        vi.mocked(puppeteer.launch).mockResolvedValue(browser as unknown as Browser);

        const attempt = new PuppeteerFetcher(OPTIONS).fetchPosts('alice', { limit: 5 });

        await expect(attempt).rejects.toThrow(FetchError);
        await expect(attempt).rejects.toThrow('Could not open a page: Target closed');
    });

    it('keeps items next to one with an out-of-range createTime', async () => {
        const state = {
            __DEFAULT_SCOPE__: {
                'webapp.user-detail': {
                    userInfo: {
                        itemList: [
                            { id: '1', desc: 'Broken clock', createTime: 1e20, imagePost: { images: [{}, {}] } },
                            { id: '2', desc: 'Fine', createTime: 1700000000, imagePost: { images: [{}, {}] } },
                        ],
                    },
                },
            },
        };
        const page = fakePage({
            content: vi.fn(async () => `<script id="__UNIVERSAL_DATA_FOR_REHYDRATION__">${JSON.stringify(state)}</script>`),
        });
        vi.mocked(puppeteer.launch).mockResolvedValue(fakeBrowser(page) as unknown as Browser);

        const candidates = await new PuppeteerFetcher(OPTIONS).fetchPosts('alice', { limit: 5 });

        expect(candidates).toMatchObject([
            { id: '1', postedAt: undefined },
            { id: '2', postedAt: '2023-11-14T22:13:20.000Z' },
        ]);
    });
});
