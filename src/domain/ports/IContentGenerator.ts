import { AffirmationSet } from '../entities/AffirmationSet';
import { CaptionTemplate } from '../services/CaptionFormatter';

/**
 * 'vocabulary' picks from the fixed theme list, 'generated' asks the model for one word.
 */
export type ThemeStrategy = 'vocabulary' | 'generated';

export interface ContentRequest {
    /** Skips theme selection when provided */
    theme?: string;
    themeStrategy: ThemeStrategy;
    phraseCount: number;
    maxPhraseLength: number;
    caption: CaptionTemplate;
}

/**
 * IContentGenerator - Produces the theme, phrases and caption for one post.
 * Capability failures degrade to fallback content; only invalid requests throw.
 */
export interface IContentGenerator {
    chooseTheme(strategy: ThemeStrategy): Promise<string>;
    generatePhrases(theme: string, count: number, maxLength: number): Promise<string[]>;
    generateCaption(phrases: readonly string[], theme: string, template: CaptionTemplate): Promise<string>;
    generate(request: ContentRequest): Promise<AffirmationSet>;
}
