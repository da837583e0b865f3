import { describe, expect, it } from 'vitest';
import { MalformedPostError } from '../errors.js';
import { parseRawPost } from './raw-post.js';

describe('parseRawPost', () => {
    it('accepts numeric ids, digit strings and a null caption', () => {
        const result = parseRawPost({ id: 7301, caption: null, mediaType: 'slideshow', likes: '1500', views: 8000 });
        expect(result).toEqual({
            ok: true,
            post: { id: '7301', caption: '', mediaType: 'slideshow', likes: 1500, views: 8000 },
        });
    });

    it('keeps optional fields when present', () => {
        const result = parseRawPost({
            id: 'abc',
            caption: 'Hello',
            mediaType: 'slideshow',
            imageCount: 4,
            postedAt: '2024-01-02T03:04:05.000Z',
            capturedAt: '2024-01-03T00:00:00Z',
        });
        expect(result.ok && result.post.imageCount).toBe(4);
        expect(result.ok && result.post.capturedAt).toBe('2024-01-03T00:00:00Z');
    });

    it('reports a missing media type', () => {
        const result = parseRawPost({ id: 'abc' });
        expect(result.ok).toBe(false);
        if (result.ok) return;
        expect(result.error).toBeInstanceOf(MalformedPostError);
        expect(result.error.message).toBe('mediaType: Required');
    });

    it('rejects negative counts and bad timestamps', () => {
        const negative = parseRawPost({ id: 'a', mediaType: 'slideshow', likes: -5 });
        expect(negative.ok).toBe(false);
        if (!negative.ok) expect(negative.error.message.startsWith('likes: ')).toBe(true);

        const badDate = parseRawPost({ id: 'a', mediaType: 'slideshow', capturedAt: 'yesterday' });
        expect(badDate.ok).toBe(false);
        if (!badDate.ok) expect(badDate.error.message.startsWith('capturedAt: ')).toBe(true);
    });

    it('rejects values that are not objects', () => {
        const result = parseRawPost('not a post');
        expect(result.ok).toBe(false);
        if (!result.ok) expect(result.error.message.startsWith('(root): ')).toBe(true);
    });
});
