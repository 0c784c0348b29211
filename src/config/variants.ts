import { BackgroundKind, TextStyle } from '../domain/entities/Media';
import { TimingMode } from '../domain/entities/LayoutPlan';
import { Platform } from '../domain/entities/PublishResult';
import { CaptionTemplate } from '../domain/services/CaptionFormatter';
import { ThemeStrategy } from '../domain/ports/IContentGenerator';

interface VariantBase {
    name: string;
    background: { kind: BackgroundKind; file: string };
    audio?: { file: string; volume: number };
    phraseCount: number;
    maxPhraseLength: number;
    bandRatio: number;
    textStyle: TextStyle;
    caption: CaptionTemplate;
    themeStrategy: ThemeStrategy;
    platforms: Platform[];
}

export interface ReelVariant extends VariantBase {
    format: 'reel';
    timing: TimingMode;
}

export interface CarouselVariant extends VariantBase {
    format: 'carousel';
    phrasesPerSlide: number;
}

/**
 * One preset of the pipeline: which assets, how many phrases, how they are timed
 * and where the result is published. Asset files are relative to ASSETS_DIR.
 */
export type PipelineVariant = ReelVariant | CarouselVariant;

export const DEFAULT_MUSIC_FILE = 'background_music_ambient.mp3';
export const DEFAULT_MUSIC_VOLUME = 0.3;

const PLAYFAIR_REGULAR = 'fonts/Playfair_Display/static/PlayfairDisplay-Regular.ttf';
const PLAYFAIR_VARIABLE = 'fonts/Playfair_Display/PlayfairDisplay-VariableFont_wght.ttf';

const REEL_HASHTAGS =
    '#selfcare #selfcaretips #selfcarequotes #mentalhealth #selfcarejourney #selflove ' +
    '#glowup #glowuptips #selfcareroutine #selfdevelopment #growth #mindset #dailyquotes ' +
    '#dailymotivationalquotes #healthylifestyle #selflovequotes #innerhealing #healingquotes ' +
    '#positivemindset #affirmations #affirmationjournal #selfloveclub #mentalwellness #wellness ' +
    '#dailymantra #manifestation';

const AFFIRMATION_HASHTAGS =
    '#Affirmations #DailyAffirmations #PositiveAffirmations #SelfLove #SelfCare #PositiveVibes ' +
    '#Motivation #Mindset #Gratitude #Positivity #Healing #Manifestation #Inspiration #Mindfulness ' +
    '#AffirmationOfTheDay #affirmationjournal';

const FALLBACK_SENTENCE = 'Start your day with these powerful affirmations to uplift your spirit.';

const REEL_CAPTION: CaptionTemplate = {
    bullet: '• ',
    hashtags: REEL_HASHTAGS,
    maxSentenceLength: 150,
    fallbackSentence: FALLBACK_SENTENCE,
};

const AFFIRMATION_CAPTION: CaptionTemplate = {
    bullet: '• ',
    hashtags: AFFIRMATION_HASHTAGS,
    maxSentenceLength: 200,
    fallbackSentence: FALLBACK_SENTENCE,
};

const WHITE_TEXT: TextStyle = {
    fontFile: PLAYFAIR_REGULAR,
    fontFamily: 'Playfair Display',
    fontSize: 65,
    color: 'white',
};

const defaultMusic = { file: DEFAULT_MUSIC_FILE, volume: DEFAULT_MUSIC_VOLUME };

const VARIANTS: readonly PipelineVariant[] = [
    {
        name: 'classic-slideshow',
        format: 'reel',
        background: { kind: 'image', file: 'Iphone_Affirmation_Background.jpg' },
        audio: defaultMusic,
        phraseCount: 5,
        maxPhraseLength: 35,
        timing: { kind: 'slots', slotSeconds: 6 },
        bandRatio: 0.7,
        textStyle: {
            fontFile: PLAYFAIR_VARIABLE,
            fontFamily: 'Playfair Display',
            fontSize: 75,
            color: 'black',
            strokeWidth: 1.5,
            strokeColor: 'black',
        },
        caption: REEL_CAPTION,
        themeStrategy: 'generated',
        platforms: ['facebook', 'instagram'],
    },
    {
        name: 'sunset-overlay',
        format: 'reel',
        background: { kind: 'video', file: 'dark_sunrise.mov' },
        audio: defaultMusic,
        phraseCount: 5,
        maxPhraseLength: 30,
        timing: { kind: 'background' },
        bandRatio: 0.7,
        textStyle: WHITE_TEXT,
        caption: REEL_CAPTION,
        themeStrategy: 'vocabulary',
        platforms: ['facebook', 'instagram'],
    },
    {
        name: 'dark-sunset-12s',
        format: 'reel',
        background: { kind: 'video', file: '12-sec_sunset_dark.mov' },
        audio: { file: 'relaxing_pads-12sec.mp3', volume: DEFAULT_MUSIC_VOLUME },
        phraseCount: 5,
        maxPhraseLength: 30,
        timing: { kind: 'audio' },
        bandRatio: 0.7,
        textStyle: WHITE_TEXT,
        caption: REEL_CAPTION,
        themeStrategy: 'vocabulary',
        platforms: ['facebook', 'instagram'],
    },
    {
        name: 'dark-sunset-5s',
        format: 'reel',
        background: { kind: 'video', file: 'dark_sunrise.mov' },
        audio: defaultMusic,
        phraseCount: 5,
        maxPhraseLength: 30,
        timing: { kind: 'background' },
        bandRatio: 0.7,
        textStyle: WHITE_TEXT,
        caption: AFFIRMATION_CAPTION,
        themeStrategy: 'vocabulary',
        platforms: ['facebook', 'instagram'],
    },
    {
        name: 'swipeable-carousel',
        format: 'carousel',
        background: { kind: 'image', file: 'iphone_affirmation_background.jpg' },
        phraseCount: 6,
        maxPhraseLength: 30,
        bandRatio: 0.8,
        textStyle: { ...WHITE_TEXT, color: 'black' },
        caption: AFFIRMATION_CAPTION,
        themeStrategy: 'vocabulary',
        platforms: ['instagram'],
        phrasesPerSlide: 3,
    },
];

export function getVariant(name: string): PipelineVariant | undefined {
    return VARIANTS.find((variant) => variant.name === name);
}

export function listVariantNames(): string[] {
    return VARIANTS.map((variant) => variant.name);
}
