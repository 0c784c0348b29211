export const AFFIRMATION_WRITER_SYSTEM_PROMPT =
    'You are a professional affirmation writer. You respond with only valid JSON.';

export const CAPTION_WRITER_SYSTEM_PROMPT =
    'You are a social media expert who writes engaging, personal captions.';

export const THEME_SYSTEM_PROMPT = 'You are a professional content creator.';

export const THEME_PROMPT = `Generate a single word theme for daily affirmations. The theme should be:
1. Positive and uplifting
2. Universal and relatable
3. Simple and clear
4. Suitable for personal development

Examples: Growth, Courage, Peace, Joy, Strength, Balance, Wisdom, Love, Hope, Power

Return just the single word theme.`;

export const AFFIRMATIONS_PROMPT = `Generate {{count}} affirmations about {{theme}}. Each affirmation must:
1. Be a maximum of {{maxLength}} characters (including spaces)
2. Start with "I" and be in present tense
3. Be personal and positive
4. Be easy to read quickly
5. Not use the word "{{theme}}" directly

Respond with ONLY a valid JSON object containing an array of exactly {{count}} affirmations, like this:
{"affirmations": ["I choose joy every day", "I radiate peace and calm"]}`;

export const CAPTION_PROMPT = `Given these affirmations:

{{affirmations}}

Write a single engaging sentence (max {{maxLength}} characters) for an Instagram caption that captures the theme "{{theme}}" and the emotion of these affirmations.
The tone should be uplifting, inspiring, and personal. Do not include hashtags, emojis or quotation marks in your response.`;
