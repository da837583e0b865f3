import { describe, expect, it } from 'vitest';
import { loadConfig } from '../config.js';
import { deriveHook, hookOptionsFromConfig } from './hook-annotator.js';

describe('deriveHook', () => {
    it('extracts, classifies and scores in one pass', () => {
        expect(deriveHook('Top 10 cafes in Lisbon. Save this for later', { likes: 0, views: 0 })).toEqual({
            text: 'Top 10 cafes in Lisbon',
            category: 'List',
            qualityScore: 0.5,
        });
    });

    it('keeps the first sentence of a POV caption as a Story hook', () => {
        const hook = deriveHook('POV: you just landed your dream job. Here\'s how.', { likes: 0, views: 0 });
        expect(hook.text).toBe('POV: you just landed your dream job');
        expect(hook.category).toBe('Story');
    });

    it('applies configured length and weights', () => {
        const options = hookOptionsFromConfig(loadConfig({ HOOK_MAX_LENGTH: '6', CLARITY_WEIGHT: '0', ENGAGEMENT_WEIGHT: '1' }));
        expect(deriveHook('Unpopular opinion: tea wins', { likes: 40000, views: 60000 }, options)).toEqual({
            text: 'Unpopu',
            category: 'Statement',
            qualityScore: 1,
        });
    });
});
