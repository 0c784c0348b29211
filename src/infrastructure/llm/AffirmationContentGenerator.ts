import { AffirmationSet, createAffirmationSet } from '../../domain/entities/AffirmationSet';
import { errorMessage } from '../../domain/errors';
import { ContentRequest, IContentGenerator, ThemeStrategy } from '../../domain/ports/IContentGenerator';
import { IMetricsPort, METRICS } from '../../domain/ports/IMetricsPort';
import { ITextCompletionClient } from '../../domain/ports/ITextCompletionClient';
import { buildCaption, CaptionTemplate, sanitizeSentence } from '../../domain/services/CaptionFormatter';
import { parseJSON } from './OpenAIService';
import {
    AFFIRMATIONS_PROMPT,
    AFFIRMATION_WRITER_SYSTEM_PROMPT,
    CAPTION_PROMPT,
    CAPTION_WRITER_SYSTEM_PROMPT,
    THEME_PROMPT,
    THEME_SYSTEM_PROMPT,
} from './Prompts';

export const THEME_VOCABULARY: readonly string[] = [
    'Self-Love',
    'Abundance',
    'Growth',
    'Confidence',
    'Peace',
    'Gratitude',
    'Resilience',
    'Joy',
];

export const FALLBACK_PHRASES: readonly string[] = [
    'I am worthy of love',
    'I trust my journey',
    'I embrace my power',
    'I choose happiness',
    'I am enough',
    'I create my joy',
];

export const MAX_PHRASE_COUNT = 6;

/**
 * Turns the text-generation capability into a theme, phrases and a caption.
 * Every capability failure is logged and replaced by fixed content.
 */
export class AffirmationContentGenerator implements IContentGenerator {
    constructor(
        private readonly llm: ITextCompletionClient,
        private readonly metrics: IMetricsPort,
        private readonly random: () => number = Math.random
    ) { }

    async chooseTheme(strategy: ThemeStrategy): Promise<string> {
        if (strategy === 'generated') {
            try {
                const reply = await this.llm.complete(
                    [
                        { role: 'system', content: THEME_SYSTEM_PROMPT },
                        { role: 'user', content: THEME_PROMPT },
                    ],
                    { temperature: 0.9, maxTokens: 10 }
                );
                const theme = sanitizeTheme(reply);
                if (theme) {
                    console.log(`[ContentGenerator] Generated theme: ${theme}`);
                    return theme;
                }
                console.warn('[ContentGenerator] Model returned an empty theme, picking from vocabulary');
            } catch (error) {
                console.warn(`[ContentGenerator] Theme generation failed: ${errorMessage(error)}`);
            }
            this.metrics.incrementCounter(METRICS.CONTENT_FALLBACKS, { step: 'theme' });
        }

        const index = Math.min(Math.floor(this.random() * THEME_VOCABULARY.length), THEME_VOCABULARY.length - 1);
        const theme = THEME_VOCABULARY[index];
        console.log(`[ContentGenerator] Selected theme: ${theme}`);
        return theme;
    }

    async generatePhrases(theme: string, count: number, maxLength: number): Promise<string[]> {
        if (!Number.isInteger(count) || count < 1 || count > MAX_PHRASE_COUNT) {
            throw new Error(`Phrase count must be between 1 and ${MAX_PHRASE_COUNT}, got ${count}`);
        }
        if (!Number.isInteger(maxLength) || maxLength < 1) {
            throw new Error(`maxLength must be a positive integer, got ${maxLength}`);
        }

        let phrases: string[];
        try {
            const prompt = AFFIRMATIONS_PROMPT
                .replace(/{{count}}/g, () => count.toString())
                .replace(/{{theme}}/g, () => theme)
                .replace(/{{maxLength}}/g, () => maxLength.toString());

            const reply = await this.llm.complete(
                [
                    { role: 'system', content: AFFIRMATION_WRITER_SYSTEM_PROMPT },
                    { role: 'user', content: prompt },
                ],
                { jsonMode: true }
            );
            phrases = extractPhrases(parseJSON(reply));
            if (phrases.length === 0) {
                throw new Error('response held no usable affirmations');
            }
        } catch (error) {
            console.error(`[ContentGenerator] Error generating affirmations: ${errorMessage(error)}`);
            this.metrics.incrementCounter(METRICS.CONTENT_FALLBACKS, { step: 'phrases' });
            phrases = FALLBACK_PHRASES.slice(0, count);
        }

        return fitPhrases(phrases, count, maxLength);
    }

    async generateCaption(phrases: readonly string[], theme: string, template: CaptionTemplate): Promise<string> {
        let sentence = '';
        try {
            const prompt = CAPTION_PROMPT
                .replace('{{affirmations}}', () => phrases.join('\n'))
                .replace('{{theme}}', () => theme)
                .replace('{{maxLength}}', () => template.maxSentenceLength.toString());

            const reply = await this.llm.complete(
                [
                    { role: 'system', content: CAPTION_WRITER_SYSTEM_PROMPT },
                    { role: 'user', content: prompt },
                ],
                { temperature: 0.7, maxTokens: 100 }
            );
            sentence = sanitizeSentence(reply, template.maxSentenceLength);
        } catch (error) {
            console.error(`[ContentGenerator] Error generating caption: ${errorMessage(error)}`);
        }

        if (!sentence) {
            this.metrics.incrementCounter(METRICS.CONTENT_FALLBACKS, { step: 'caption' });
            sentence = template.fallbackSentence;
        }

        return buildCaption(sentence, phrases, theme, template);
    }

    async generate(request: ContentRequest): Promise<AffirmationSet> {
        const requestedTheme = request.theme?.trim();
        const theme = requestedTheme || (await this.chooseTheme(request.themeStrategy));
        const phrases = await this.generatePhrases(theme, request.phraseCount, request.maxPhraseLength);
        const caption = await this.generateCaption(phrases, theme, request.caption);

        console.log(`[ContentGenerator] ✅ ${phrases.length} affirmations ready for "${theme}"`);
        return createAffirmationSet(theme, phrases, caption);
    }
}

/**
 * First word of the reply, letters and hyphens only.
 */
export function sanitizeTheme(reply: string): string {
    const [first = ''] = reply.trim().split(/\s+/);
    return first.replace(/[^A-Za-z-]/g, '');
}

function extractPhrases(parsed: unknown): string[] {
    let list: unknown = parsed;
    if (typeof parsed === 'object' && parsed !== null && !Array.isArray(parsed) && 'affirmations' in parsed) {
        list = parsed.affirmations;
    }
    if (!Array.isArray(list)) {
        throw new Error('expected an "affirmations" array');
    }

    return list
        .filter((item): item is string => typeof item === 'string')
        .map((item) => item.trim())
        .filter((item) => item.length > 0);
}

/**
 * Exactly `count` phrases, each at most `maxLength` characters.
 * Extras are dropped, gaps are filled from the fallback list, long phrases are cut.
 */
export function fitPhrases(phrases: readonly string[], count: number, maxLength: number): string[] {
    const result = phrases.slice(0, count);

    for (const fallback of FALLBACK_PHRASES) {
        if (result.length >= count) break;
        if (!result.includes(fallback)) {
            result.push(fallback);
        }
    }
    while (result.length < count) {
        result.push(FALLBACK_PHRASES[result.length % FALLBACK_PHRASES.length]);
    }

    return result.map((phrase) => {
        // Lengths count code points so a cut never splits a surrogate pair
        const chars = Array.from(phrase);
        if (chars.length <= maxLength) {
            return phrase;
        }
        const truncated = chars.slice(0, maxLength).join('').trim();
        console.warn(`[ContentGenerator] Affirmation too long (${chars.length} chars), truncated: "${truncated}"`);
        return truncated;
    });
}
