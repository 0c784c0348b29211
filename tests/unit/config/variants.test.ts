import { getVariant, listVariantNames } from '../../../src/config/variants';
import { MAX_BAND_RATIO } from '../../../src/domain/services/LayoutCalculator';

describe('pipeline variants', () => {
    test('should list the five presets', () => {
        expect(listVariantNames()).toEqual([
            'classic-slideshow',
            'sunset-overlay',
            'dark-sunset-12s',
            'dark-sunset-5s',
            'swipeable-carousel',
        ]);
    });

    test('should return undefined for an unknown name', () => {
        expect(getVariant('neon')).toBeUndefined();
    });

    test.each(listVariantNames())('%s should stay within the phrase and layout limits', (name) => {
        const variant = getVariant(name);

        expect(variant).toBeDefined();
        if (!variant) return;
        expect(variant.phraseCount).toBeGreaterThanOrEqual(3);
        expect(variant.phraseCount).toBeLessThanOrEqual(6);
        expect(variant.maxPhraseLength).toBeGreaterThanOrEqual(25);
        expect(variant.maxPhraseLength).toBeLessThanOrEqual(35);
        expect(variant.bandRatio).toBeGreaterThan(0);
        expect(variant.bandRatio).toBeLessThanOrEqual(MAX_BAND_RATIO);
        expect(variant.platforms.length).toBeGreaterThan(0);
    });

    test('classic-slideshow should show one phrase per six-second slot', () => {
        const variant = getVariant('classic-slideshow');

        expect(variant?.format === 'reel' && variant.timing).toEqual({ kind: 'slots', slotSeconds: 6 });
        expect(variant?.themeStrategy).toBe('generated');
    });

    test('dark-sunset-12s should take its length from the music', () => {
        const variant = getVariant('dark-sunset-12s');

        expect(variant?.format === 'reel' && variant.timing).toEqual({ kind: 'audio' });
        expect(variant?.audio?.file).toBe('relaxing_pads-12sec.mp3');
    });

    test('dark-sunset-5s should run five phrases over the whole background clip', () => {
        const variant = getVariant('dark-sunset-5s');

        expect(variant?.format === 'reel' && variant.timing).toEqual({ kind: 'background' });
        expect(variant?.phraseCount).toBe(5);
        expect(variant?.maxPhraseLength).toBe(30);
        expect(variant?.caption.hashtags.startsWith('#Affirmations #DailyAffirmations #PositiveAffirmations')).toBe(true);
        expect(variant?.caption.maxSentenceLength).toBe(200);
    });

    test('swipeable-carousel should publish to Instagram only, three phrases per slide', () => {
        const variant = getVariant('swipeable-carousel');

        expect(variant?.format).toBe('carousel');
        expect(variant?.format === 'carousel' && variant.phrasesPerSlide).toBe(3);
        expect(variant?.platforms).toEqual(['instagram']);
        expect(variant?.audio).toBeUndefined();
    });
});
