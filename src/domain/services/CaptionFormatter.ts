/**
 * How a post caption is assembled around the generated sentence.
 */
export interface CaptionTemplate {
    /** Prefix placed before each phrase line */
    bullet: string;
    /** Hashtag block appended verbatim */
    hashtags: string;
    /** Cap applied to the generated sentence */
    maxSentenceLength: number;
    fallbackSentence: string;
}

export function themeHashtag(theme: string): string {
    return `#${theme.replace(/[^A-Za-z0-9]/g, '')}`;
}

/**
 * sentence, blank line, bulleted phrases, blank line, hashtag block.
 * The theme tag is appended on its own line unless the block already has it.
 */
export function buildCaption(
    sentence: string,
    phrases: readonly string[],
    theme: string,
    template: CaptionTemplate
): string {
    const lines = phrases.map((phrase) => `${template.bullet}${phrase}`).join('\n');
    const block = template.hashtags.trim();
    const themeTag = themeHashtag(theme);

    const hasThemeTag = block
        .split(/\s+/)
        .some((tag) => tag.toLowerCase() === themeTag.toLowerCase());

    const tags = hasThemeTag || themeTag === '#' ? block : `${block}\n${themeTag}`;

    return `${sentence.trim()}\n\n${lines}\n\n${tags}`;
}

/**
 * Strips quotes and hashtags from a model-written sentence and caps its length.
 */
export function sanitizeSentence(raw: string, maxLength: number): string {
    const cleaned = raw
        .replace(/["“”]/g, '')
        .replace(/^'+|'+$/g, '')
        .replace(/#\w+/g, '')
        .replace(/\s+/g, ' ')
        .trim();

    const chars = Array.from(cleaned);
    if (chars.length <= maxLength) {
        return cleaned;
    }
    return chars.slice(0, maxLength).join('').trim();
}
