#!/usr/bin/env node
import { loadConfig, validateConfig } from './config';
import { createDependencies } from './presentation/app';
import { getVariant, listVariantNames } from './config/variants';
import { errorMessage } from './domain/errors';

/**
 * Runs the pipeline once, e.g. from cron.
 * Usage: affirmation-poster [variant] [theme]
 * Exits 0 when every targeted platform published, 1 otherwise.
 */
async function main(argv: string[]): Promise<number> {
    const [variantArg, themeArg] = argv;
    const config = loadConfig();

    const variant = variantArg ?? config.pipelineVariant;
    if (!getVariant(variant)) {
        console.error(`❌ Unknown variant "${variant}". Available: ${listVariantNames().join(', ')}`);
        return 1;
    }

    const configWarnings = validateConfig(config);
    if (configWarnings.length > 0) {
        console.warn('⚠️  Configuration is incomplete:');
        configWarnings.forEach((warning) => console.warn(`  - ${warning}`));
    }

    const { pipeline, metrics } = createDependencies(config);
    try {
        const result = await pipeline.run({ variant, theme: themeArg });

        console.log(`Generated Theme: ${result.theme}`);
        for (const publish of result.results) {
            const detail = publish.success ? `posted (${publish.postId})` : `failed [${publish.failure}] ${publish.message}`;
            console.log(`  ${publish.platform}: ${detail}`);
        }
        return result.success ? 0 : 1;
    } catch (error) {
        console.error(`💥 Pipeline failed: ${errorMessage(error)}`);
        return 1;
    } finally {
        await metrics.flush();
    }
}

main(process.argv.slice(2))
    .then((code) => process.exit(code))
    .catch((error) => {
        console.error('Fatal error:', error);
        process.exit(1);
    });
