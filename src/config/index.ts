import dotenv from 'dotenv';

// Load environment variables
dotenv.config();

export type StorageProvider = 's3' | 'cloudinary';
export type MetricsBackend = 'console' | 'prometheus' | 'none';

/**
 * Application configuration loaded from environment variables.
 */
export interface Config {
    // Server
    port: number;
    environment: string;

    // OpenAI
    openaiApiKey: string;
    openaiModel: string;
    openaiBaseUrl: string;

    // Facebook / Instagram Graph API
    facebookPageId: string;
    facebookAccessToken: string;
    instagramAccountId: string; // Empty means look it up from the page
    graphApiBaseUrl: string;

    // Instagram container polling
    igPollIntervalMs: number;
    igMaxPollAttempts: number;
    igCarouselPollIntervalMs: number;
    igCarouselMaxPollAttempts: number;

    // Staging storage
    storageProvider: StorageProvider;
    s3BucketName: string;
    awsRegion: string;
    awsAccessKeyId: string;
    awsSecretAccessKey: string;

    // Cloudinary (alternative staging storage)
    cloudinaryCloudName: string;
    cloudinaryApiKey: string;
    cloudinaryApiSecret: string;

    // Media
    assetsDir: string;
    outputDir: string; // Empty disables the copy
    pipelineVariant: string;

    // Observability
    metricsBackend: MetricsBackend;
}

function getEnvVar(key: string, defaultValue?: string): string {
    let value = process.env[key];
    if (value === undefined) {
        if (defaultValue !== undefined) {
            return defaultValue;
        }
        throw new Error(`Missing required environment variable: ${key}`);
    }

    // Trim whitespace and remove wrapping quotes
    value = value.trim();
    if (value.startsWith('"') && value.endsWith('"')) {
        value = value.substring(1, value.length - 1);
    } else if (value.startsWith("'") && value.endsWith("'")) {
        value = value.substring(1, value.length - 1);
    }

    return value;
}

function getEnvVarNumber(key: string, defaultValue?: number): number {
    const value = getEnvVar(key, defaultValue?.toString());
    const parsed = parseFloat(value);
    if (isNaN(parsed)) {
        throw new Error(`Environment variable ${key} must be a number, got: ${value}`);
    }
    return parsed;
}

function getEnvVarChoice<T extends string>(key: string, choices: readonly T[], defaultValue: T): T {
    const value = getEnvVar(key, defaultValue).toLowerCase();
    const match = choices.find((choice) => choice === value);
    if (!match) {
        throw new Error(`Environment variable ${key} must be one of ${choices.join(', ')}, got: ${value}`);
    }
    return match;
}

/**
 * Loads configuration from environment variables.
 * Credentials default to empty strings; see validateConfig.
 */
export function loadConfig(): Config {
    return {
        // Server
        port: getEnvVarNumber('PORT', 3000),
        environment: getEnvVar('NODE_ENV', 'development'),

        // OpenAI
        openaiApiKey: getEnvVar('OPENAI_API_KEY', ''),
        openaiModel: getEnvVar('OPENAI_MODEL', 'gpt-4'),
        openaiBaseUrl: getEnvVar('OPENAI_BASE_URL', 'https://api.openai.com'),

        // Graph API
        facebookPageId: getEnvVar('FACEBOOK_PAGE_ID', ''),
        facebookAccessToken: getEnvVar('FACEBOOK_ACCESS_TOKEN', ''),
        instagramAccountId: getEnvVar('INSTAGRAM_ACCOUNT_ID', ''),
        graphApiBaseUrl: getEnvVar('GRAPH_API_BASE_URL', 'https://graph.facebook.com/v18.0'),

        igPollIntervalMs: getEnvVarNumber('IG_POLL_INTERVAL_MS', 10000),
        igMaxPollAttempts: getEnvVarNumber('IG_MAX_POLL_ATTEMPTS', 30),
        igCarouselPollIntervalMs: getEnvVarNumber('IG_CAROUSEL_POLL_INTERVAL_MS', 5000),
        igCarouselMaxPollAttempts: getEnvVarNumber('IG_CAROUSEL_MAX_POLL_ATTEMPTS', 20),

        // Storage
        storageProvider: getEnvVarChoice('STORAGE_PROVIDER', ['s3', 'cloudinary'] as const, 's3'),
        s3BucketName: getEnvVar('S3_BUCKET_NAME', ''),
        awsRegion: getEnvVar('AWS_DEFAULT_REGION', 'us-east-1'),
        awsAccessKeyId: getEnvVar('AWS_ACCESS_KEY_ID', ''),
        awsSecretAccessKey: getEnvVar('AWS_SECRET_ACCESS_KEY', ''),

        cloudinaryCloudName: getEnvVar('CLOUDINARY_CLOUD_NAME', ''),
        cloudinaryApiKey: getEnvVar('CLOUDINARY_API_KEY', ''),
        cloudinaryApiSecret: getEnvVar('CLOUDINARY_API_SECRET', ''),

        // Media
        assetsDir: getEnvVar('ASSETS_DIR', './assets'),
        outputDir: getEnvVar('OUTPUT_DIR', ''),
        pipelineVariant: getEnvVar('PIPELINE_VARIANT', 'sunset-overlay'),

        metricsBackend: getEnvVarChoice('METRICS_BACKEND', ['console', 'prometheus', 'none'] as const, 'console'),
    };
}

/**
 * Lists the settings that are missing for the configured features.
 * Nothing here is fatal at startup: each component fails when it is used.
 */
export function validateConfig(config: Config): string[] {
    const errors: string[] = [];

    if (!config.openaiApiKey) {
        errors.push('OPENAI_API_KEY is missing; fallback affirmations and captions will be used');
    }
    if (!config.facebookPageId) {
        errors.push('FACEBOOK_PAGE_ID is required for Facebook and Instagram publishing');
    }
    if (!config.facebookAccessToken) {
        errors.push('FACEBOOK_ACCESS_TOKEN is required for Facebook and Instagram publishing');
    }
    if (!config.s3BucketName) {
        errors.push('S3_BUCKET_NAME is required to stage media for Instagram');
    }
    if (config.storageProvider === 'cloudinary') {
        if (!config.cloudinaryCloudName || !config.cloudinaryApiKey || !config.cloudinaryApiSecret) {
            errors.push('Cloudinary credentials are required when STORAGE_PROVIDER is "cloudinary"');
        }
    }
    if (!(config.igMaxPollAttempts >= 1)) {
        errors.push('IG_MAX_POLL_ATTEMPTS must be at least 1');
    }

    return errors;
}
