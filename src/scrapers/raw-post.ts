/**
 * Validation of fetched post candidates
 * Everything a fetcher returns passes through parseRawPost before the
 * pipeline sees it, so malformed fields never surface as type errors later.
 */

import { z } from 'zod';
import { MalformedPostError } from '../errors.js';

const count = z.union([
    z.number().int().nonnegative(),
    z.string().trim().regex(/^\d+$/, 'Expected a whole number').transform(Number),
]).nullish();

export const rawPostSchema = z.object({
    id: z.union([
        z.string().trim().min(1, 'Post id is empty'),
        z.number().int().nonnegative().transform(String),
    ]),
    caption: z.string().nullish().transform(value => value ?? ''),
    mediaType: z.string().trim().min(1, 'Media type is empty'),
    imageCount: count,
    likes: count,
    views: count,
    comments: count,
    shares: count,
    bookmarks: count,
    postedAt: z.string().nullish(),
    capturedAt: z.string().datetime({ offset: true }).nullish(),
});

export type RawPost = z.infer<typeof rawPostSchema>;

export type ParseResult =
    | { ok: true; post: RawPost }
    | { ok: false; error: MalformedPostError };

export function parseRawPost(candidate: unknown): ParseResult {
    const result = rawPostSchema.safeParse(candidate);
    if (result.success) {
        return { ok: true, post: result.data };
    }

    const details = result.error.issues
        .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
    return { ok: false, error: new MalformedPostError(details) };
}
