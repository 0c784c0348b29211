/**
 * The generated text content of one post.
 */
export interface AffirmationSet {
    /** Single theme word, e.g. "Gratitude" */
    readonly theme: string;
    /** Short first-person phrases, in display order */
    readonly phrases: readonly string[];
    /** Full caption including the phrase list and hashtag block */
    readonly caption: string;
}

/**
 * Creates an immutable AffirmationSet.
 */
export function createAffirmationSet(theme: string, phrases: string[], caption: string): AffirmationSet {
    if (!theme.trim()) {
        throw new Error('AffirmationSet theme cannot be empty');
    }
    if (phrases.length === 0) {
        throw new Error('AffirmationSet must contain at least one phrase');
    }

    return Object.freeze({
        theme,
        phrases: Object.freeze([...phrases]),
        caption,
    });
}
