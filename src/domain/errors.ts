/**
 * Raised when a component is used without a configuration value it needs.
 * Configuration is not validated upfront; this surfaces at first use.
 */
export class ConfigurationError extends Error {
    constructor(public readonly variable: string, message?: string) {
        super(message ?? `Missing required configuration: ${variable}`);
        this.name = 'ConfigurationError';
    }
}

/**
 * A background, music or font file the pipeline was told to use does not exist.
 */
export class MissingAssetError extends Error {
    constructor(public readonly assetPath: string, kind: string = 'asset') {
        super(`${kind} not found at ${assetPath}`);
        this.name = 'MissingAssetError';
    }
}

/**
 * FFmpeg or image rendering failed.
 */
export class RenderError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'RenderError';
    }
}

export function errorMessage(error: unknown): string {
    if (error instanceof Error) {
        return error.message;
    }
    // SDKs such as cloudinary reject with plain objects
    if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
        return error.message;
    }
    return String(error);
}
