/**
 * Post Store
 * Append-only collection of retained posts per profile, keyed by post id.
 * Saving a post id that already exists overwrites it in place.
 */

import type { Db } from '../db.js';
import { persist } from '../db.js';
import { HOOK_CATEGORIES } from '../types.js';
import type { AnnotatedPost, HookCategory, StoredPost } from '../types.js';
import { normalizeHandle } from './profile-registry.js';

interface PostRow {
    profileHandle: string;
    postId: string;
    caption: string;
    mediaType: string;
    imageCount: number | null;
    likes: number;
    views: number;
    comments: number;
    shares: number;
    bookmarks: number;
    postedAt: string | null;
    capturedAt: string;
    hookText: string | null;
    hookCategory: string | null;
    hookScore: number | null;
}

function isHookCategory(value: string): value is HookCategory {
    return (HOOK_CATEGORIES as readonly string[]).includes(value);
}

function rowToPost(row: PostRow): StoredPost {
    const hook = row.hookText !== null && row.hookCategory !== null && row.hookScore !== null && isHookCategory(row.hookCategory)
        ? { text: row.hookText, category: row.hookCategory, qualityScore: row.hookScore }
        : null;

    return {
        profileHandle: row.profileHandle,
        postId: row.postId,
        caption: row.caption,
        mediaType: row.mediaType,
        imageCount: row.imageCount,
        stats: {
            likes: row.likes,
            views: row.views,
            comments: row.comments,
            shares: row.shares,
            bookmarks: row.bookmarks,
        },
        postedAt: row.postedAt,
        capturedAt: row.capturedAt,
        hook,
    };
}

export interface PostSource {
    listByProfile(handle: string): StoredPost[];
}

export class PostStore implements PostSource {
    constructor(private readonly db: Db) { }

    /**
     * Upsert posts in one transaction. Returns the number of rows written.
     */
    save(posts: readonly AnnotatedPost[]): number {
        const upsert = this.db.prepare(`
            INSERT INTO posts (
                profileHandle, postId, caption, mediaType, imageCount,
                likes, views, comments, shares, bookmarks,
                postedAt, capturedAt, hookText, hookCategory, hookScore
            ) VALUES (
                @profileHandle, @postId, @caption, @mediaType, @imageCount,
                @likes, @views, @comments, @shares, @bookmarks,
                @postedAt, @capturedAt, @hookText, @hookCategory, @hookScore
            )
            ON CONFLICT(profileHandle, postId) DO UPDATE SET
                caption = excluded.caption,
                mediaType = excluded.mediaType,
                imageCount = excluded.imageCount,
                likes = excluded.likes,
                views = excluded.views,
                comments = excluded.comments,
                shares = excluded.shares,
                bookmarks = excluded.bookmarks,
                postedAt = excluded.postedAt,
                capturedAt = excluded.capturedAt,
                hookText = excluded.hookText,
                hookCategory = excluded.hookCategory,
                hookScore = excluded.hookScore
        `);

        const saveMany = this.db.transaction((list: readonly AnnotatedPost[]) => {
            for (const post of list) {
                upsert.run({
                    profileHandle: post.profileHandle,
                    postId: post.postId,
                    caption: post.caption,
                    mediaType: post.mediaType,
                    imageCount: post.imageCount,
                    likes: post.stats.likes,
                    views: post.stats.views,
                    comments: post.stats.comments,
                    shares: post.stats.shares,
                    bookmarks: post.stats.bookmarks,
                    postedAt: post.postedAt,
                    capturedAt: post.capturedAt,
                    hookText: post.hook.text,
                    hookCategory: post.hook.category,
                    hookScore: post.hook.qualityScore,
                });
            }
            return list.length;
        });

        return persist('Saving posts', () => saveMany(posts));
    }

    listByProfile(handle: string): StoredPost[] {
        const rows = persist('Reading posts', () =>
            this.db.prepare(
                'SELECT * FROM posts WHERE profileHandle = ? ORDER BY id ASC'
            ).all(normalizeHandle(handle)) as PostRow[]
        );
        return rows.map(rowToPost);
    }

    countByProfile(handle: string): number {
        const row = persist('Counting posts', () =>
            this.db.prepare('SELECT COUNT(*) AS count FROM posts WHERE profileHandle = ?')
                .get(normalizeHandle(handle)) as { count: number }
        );
        return row.count;
    }

    countAll(): number {
        const row = persist('Counting posts', () =>
            this.db.prepare('SELECT COUNT(*) AS count FROM posts').get() as { count: number }
        );
        return row.count;
    }

    clear(): number {
        const result = persist('Clearing posts', () => this.db.prepare('DELETE FROM posts').run());
        if (result.changes > 0) console.log(`[Store] Deleted ${result.changes} post(s)`);
        return result.changes;
    }
}
