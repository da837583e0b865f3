/**
 * Page data extraction for profile pages
 * Profile pages embed their post list as JSON, either in the
 * __UNIVERSAL_DATA_FOR_REHYDRATION__ script or a window.SIGI_STATE assignment.
 */

import * as cheerio from 'cheerio';

type JsonRecord = Record<string, unknown>;

export function isRecord(value: unknown): value is JsonRecord {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseJson(text: string): unknown {
    try {
        return JSON.parse(text);
    } catch (error) {
        console.warn('  [PageData] Embedded JSON could not be parsed:', error instanceof Error ? error.message : error);
        return null;
    }
}

/**
 * Pull the embedded state object out of a profile page's HTML.
 */
export function extractUniversalData(html: string): JsonRecord | null {
    const $ = cheerio.load(html);

    const scripts = [
        $('script#__UNIVERSAL_DATA_FOR_REHYDRATION__').first(),
        $('script[id^="__UNIVERSAL"][id*="DATA"]').first(),
    ];
    for (const script of scripts) {
        const text = script.text().trim();
        if (!text) continue;
        const parsed = parseJson(text);
        if (isRecord(parsed)) return parsed;
    }

    let sigiState: JsonRecord | null = null;
    $('script').each((_, el) => {
        const text = $(el).text();
        const match = text.match(/window\.SIGI_STATE\s*=\s*(\{[\s\S]*?\});/);
        if (!match) return;
        const parsed = parseJson(match[1]);
        if (isRecord(parsed)) {
            sigiState = parsed;
            return false;
        }
    });

    return sigiState;
}

function asItemList(value: unknown): unknown[] {
    if (isRecord(value) && Array.isArray(value.itemList)) {
        return value.itemList;
    }
    return [];
}

function itemId(item: unknown): string | null {
    if (!isRecord(item)) return null;
    const id = item.id ?? item.itemId ?? item.video_id;
    return typeof id === 'string' || typeof id === 'number' ? String(id) : null;
}

/**
 * Collect every post item in the embedded state, de-duplicated by id,
 * in page order.
 */
export function extractProfileItems(data: JsonRecord): unknown[] {
    const items: unknown[] = [];

    const scope = data.__DEFAULT_SCOPE__;
    if (isRecord(scope)) {
        const userDetail = scope['webapp.user-detail'];
        if (isRecord(userDetail)) {
            items.push(...asItemList(userDetail.userInfo));
        }
        for (const [key, value] of Object.entries(scope)) {
            if (key.startsWith('webapp.')) items.push(...asItemList(value));
        }
    }

    if (isRecord(data.ItemModule)) {
        items.push(...Object.values(data.ItemModule));
    }

    if (Array.isArray(data.items)) {
        items.push(...data.items);
    }

    const seen = new Set<string>();
    const unique: unknown[] = [];
    for (const item of items) {
        const id = itemId(item);
        if (id !== null) {
            if (seen.has(id)) continue;
            seen.add(id);
        }
        unique.push(item);
    }

    console.log(`  [PageData] Found ${unique.length} post item(s)`);
    return unique;
}

const CAPTION_FIELDS = ['desc', 'description', 'caption', 'text', 'title'];

const STAT_FIELDS: Record<'likes' | 'views' | 'comments' | 'shares' | 'bookmarks', string[]> = {
    views: ['playCount', 'play_count', 'views', 'video_play_count'],
    likes: ['diggCount', 'digg_count', 'likes', 'heart_count'],
    comments: ['commentCount', 'comment_count', 'comments'],
    shares: ['shareCount', 'share_count', 'shares'],
    bookmarks: ['collectCount', 'collect_count', 'bookmarks', 'save_count'],
};

function firstDefined(sources: JsonRecord[], fields: string[]): unknown {
    for (const source of sources) {
        for (const field of fields) {
            const value = source[field];
            if (value !== undefined && value !== null && value !== '') return value;
        }
    }
    return undefined;
}

function imageList(item: JsonRecord): unknown[] | null {
    if (isRecord(item.imagePost) && Array.isArray(item.imagePost.images)) {
        return item.imagePost.images;
    }
    if (Array.isArray(item.images)) {
        return item.images;
    }
    return null;
}

function fromEpochSeconds(seconds: number): string | undefined {
    const date = new Date(seconds * 1000);
    return Number.isNaN(date.getTime()) ? undefined : date.toISOString();
}

// Epoch seconds outside the Date range leave the post without a timestamp
function toIsoTimestamp(value: unknown): string | undefined {
    if (typeof value === 'number' && Number.isFinite(value)) {
        return fromEpochSeconds(value);
    }
    if (typeof value === 'string' && value.trim()) {
        const seconds = Number(value);
        return Number.isFinite(seconds) ? fromEpochSeconds(seconds) : value;
    }
    return undefined;
}

/**
 * Map a page item onto the RawPost shape. Fields that cannot be found are
 * left out; validation decides whether the candidate is usable.
 */
export function toRawPostCandidate(item: unknown): JsonRecord {
    if (!isRecord(item)) return {};

    const statSources = [item.stats, item.statistics, item.statsV2]
        .filter(isRecord);
    statSources.push(item);

    const images = imageList(item);
    const declaredType = typeof item.type === 'string' ? item.type : undefined;
    const mediaType = images && images.length > 0 ? 'slideshow' : declaredType ?? 'video';

    const candidate: JsonRecord = {
        id: item.id ?? item.itemId ?? item.video_id,
        caption: firstDefined([item], CAPTION_FIELDS),
        mediaType,
        imageCount: images ? images.length : undefined,
        postedAt: toIsoTimestamp(firstDefined([item], ['createTime', 'create_time', 'createdAt', 'created_at', 'timestamp'])),
    };

    for (const [stat, fields] of Object.entries(STAT_FIELDS)) {
        candidate[stat] = firstDefined(statSources, fields);
    }

    return candidate;
}
