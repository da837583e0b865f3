import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { extractProfileItems, extractUniversalData, toRawPostCandidate } from './page-data.js';

function universalPage(state: unknown): string {
    return `<html><head>
        <script id="__UNIVERSAL_DATA_FOR_REHYDRATION__" type="application/json">${JSON.stringify(state)}</script>
    </head><body></body></html>`;
}

describe('extractUniversalData', () => {
    beforeEach(() => {
        vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('reads the rehydration script', () => {
        expect(extractUniversalData(universalPage({ __DEFAULT_SCOPE__: {} }))).toEqual({ __DEFAULT_SCOPE__: {} });
    });

    it('falls back to a SIGI_STATE assignment', () => {
        const html = '<html><body><script>window.SIGI_STATE = {"ItemModule":{}};</script></body></html>';
        expect(extractUniversalData(html)).toEqual({ ItemModule: {} });
    });

    it('returns null when no state is embedded', () => {
        expect(extractUniversalData('<html><body><p>Log in</p></body></html>')).toBeNull();
        expect(extractUniversalData('<script id="__UNIVERSAL_DATA_FOR_REHYDRATION__">{broken</script>')).toBeNull();
    });
});

describe('extractProfileItems', () => {
    beforeEach(() => {
        vi.spyOn(console, 'log').mockImplementation(() => undefined);
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('collects items from every supported location without duplicates', () => {
        const items = extractProfileItems({
            __DEFAULT_SCOPE__: {
                'webapp.user-detail': { userInfo: { itemList: [{ id: '1' }] } },
                'webapp.video-list': { itemList: [{ id: '1' }, { id: '2' }] },
                'seo.abtest': { itemList: [{ id: '9' }] },
            },
            ItemModule: { 3: { id: '3' } },
            items: [{ id: 2 }, { id: '4' }],
        });

        expect(items).toEqual([{ id: '1' }, { id: '2' }, { id: '3' }, { id: '4' }]);
    });

    it('returns nothing for unrelated state', () => {
        expect(extractProfileItems({ user: { name: 'alice' } })).toEqual([]);
    });
});

describe('toRawPostCandidate', () => {
    it('maps an image post', () => {
        expect(toRawPostCandidate({
            id: '7301',
            desc: '3 things I learned',
            createTime: 1700000000,
            imagePost: { images: [{}, {}, {}] },
            stats: { diggCount: 1200, playCount: 8000, commentCount: 4, shareCount: 2, collectCount: 9 },
        })).toEqual({
            id: '7301',
            caption: '3 things I learned',
            mediaType: 'slideshow',
            imageCount: 3,
            postedAt: '2023-11-14T22:13:20.000Z',
            likes: 1200,
            views: 8000,
            comments: 4,
            shares: 2,
            bookmarks: 9,
        });
    });

    it('reads alternative stat fields and defaults to video', () => {
        const candidate = toRawPostCandidate({
            video_id: 55,
            description: 'Morning routine',
            statsV2: { playCount: '9000', diggCount: '1500' },
        });

        expect(candidate).toMatchObject({ id: 55, caption: 'Morning routine', mediaType: 'video', views: '9000', likes: '1500' });
        expect(candidate.imageCount).toBeUndefined();
    });

    it('leaves postedAt unset when createTime is outside the date range', () => {
        const candidate = toRawPostCandidate({ id: '9', desc: 'Far future', createTime: 1e20 });
        expect(candidate.postedAt).toBeUndefined();
        expect(toRawPostCandidate({ id: '9', createTime: '1e20' }).postedAt).toBeUndefined();
    });

    it('returns an empty candidate for non-objects', () => {
        expect(toRawPostCandidate('nope')).toEqual({});
    });
});
