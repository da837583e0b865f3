/**
 * Hook Extractor
 * The hook is the first meaningful sentence or line of a caption.
 */

export const DEFAULT_HOOK_MAX_LENGTH = 200;

const MIN_SEGMENT_LENGTH = 3;

// Body of a sentence followed by its run of terminal punctuation
const SENTENCE_PATTERN = /([^.!?]*)([.!?]*)/g;

function normalizeWhitespace(caption: string): string {
    return caption
        .replace(/\r\n?/g, '\n')
        .replace(/[^\S\n]+/g, ' ');
}

/**
 * Cut to at most maxLength UTF-16 units without leaving half a surrogate pair.
 */
export function truncate(text: string, maxLength: number): string {
    if (text.length <= maxLength) return text;
    let cut = text.slice(0, maxLength);
    const last = cut.charCodeAt(cut.length - 1);
    if (last >= 0xd800 && last <= 0xdbff) {
        cut = cut.slice(0, -1);
    }
    return cut.trimEnd();
}

/**
 * Split a caption into sentence/line segments, in order. Periods that end a
 * segment are dropped; ! and ? stay with it.
 */
export function segmentCaption(caption: string): Array<{ body: string; text: string }> {
    const segments: Array<{ body: string; text: string }> = [];

    for (const line of normalizeWhitespace(caption).split('\n')) {
        for (const match of line.matchAll(SENTENCE_PATTERN)) {
            const [whole, body, terminal] = match;
            if (!whole) continue;
            const trimmedBody = body.trim();
            const marks = terminal.replace(/\./g, '');
            segments.push({ body: trimmedBody, text: `${trimmedBody}${marks}`.trim() });
        }
    }

    return segments;
}

export function extractHook(caption: string, maxLength: number = DEFAULT_HOOK_MAX_LENGTH): string {
    const trimmed = normalizeWhitespace(caption).trim();
    if (!trimmed) return '';

    const hook = segmentCaption(trimmed).find(segment => segment.body.length >= MIN_SEGMENT_LENGTH);
    if (hook) {
        return truncate(hook.text, maxLength);
    }

    return truncate(trimmed.replace(/\s*\n\s*/g, ' '), maxLength);
}
